/**
 * Analytics
 *
 * Click analytics for a user's links.
 */

export {
	createAnalyticsService,
	ANALYTICS_MIN_DAYS,
	ANALYTICS_MAX_DAYS,
	ANALYTICS_DEFAULT_DAYS,
	type AnalyticsService,
	type AnalyticsServiceDeps,
	type GeoLookup,
} from './analytics-service.js';
export {
	analyticsWindow,
	previousWindowStart,
	summarizeClicks,
	summarizeGeography,
	topLinks,
	deviceBreakdown,
	growthPercentage,
	round1,
	EMPTY_ANALYTICS,
	EMPTY_GEOGRAPHIC,
	type AnalyticsWindow,
	type ClickFigures,
	type AnalyticsSummary,
	type GeographicSummary,
	type DailyStats,
	type LinkStats,
	type DeviceStats,
	type CountryStats,
	type CityStats,
} from './aggregate.js';
export { countryName } from './country-names.js';
