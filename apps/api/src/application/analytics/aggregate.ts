/**
 * Click Aggregation
 *
 * Pure functions that shape the click counts read for a window into the
 * analytics summaries.
 */

import type { DeviceType, Link } from '../../domain/index.js';
import type {
	ClickTotals,
	CountryClickCount,
	DayCount,
	DeviceClickCount,
	LinkClickCount,
} from '../../infrastructure/persistence/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const TOP_LINKS_LIMIT = 5;
const TOP_COUNTRIES_LIMIT = 10;

export interface AnalyticsWindow {
	readonly start: Date;
	readonly end: Date;
	readonly days: number;
}

export type DailyStats = DayCount;

export interface LinkStats {
	readonly linkId: string;
	readonly title: string;
	readonly clicks: number;
	readonly percentage: number;
}

export interface DeviceStats {
	readonly deviceType: DeviceType;
	readonly count: number;
	readonly percentage: number;
}

export interface AnalyticsSummary {
	readonly totalClicks: number;
	readonly uniqueVisitors: number;
	readonly dailyStats: readonly DailyStats[];
	readonly topLinks: readonly LinkStats[];
	readonly deviceStats: readonly DeviceStats[];
	readonly growthPercentage: number;
}

export interface CountryStats {
	readonly countryCode: string;
	readonly countryName: string;
	readonly clicks: number;
	readonly percentage: number;
	readonly uniqueVisitors: number;
}

export interface CityStats {
	readonly city: string;
	readonly countryCode: string;
	readonly countryName: string;
	readonly clicks: number;
	readonly percentage: number;
}

export interface GeographicSummary {
	readonly totalCountries: number;
	readonly topCountries: readonly CountryStats[];
	/** Clicks carry no city yet */
	readonly cityBreakdown: readonly CityStats[];
	readonly geographicTrends: readonly DailyStats[];
}

export const EMPTY_ANALYTICS: AnalyticsSummary = Object.freeze({
	totalClicks: 0,
	uniqueVisitors: 0,
	dailyStats: [],
	topLinks: [],
	deviceStats: [],
	growthPercentage: 0,
});

export const EMPTY_GEOGRAPHIC: GeographicSummary = Object.freeze({
	totalCountries: 0,
	topCountries: [],
	cityBreakdown: [],
	geographicTrends: [],
});

/**
 * Window of `days` days ending at `now`.
 */
export function analyticsWindow(days: number, now: Date = new Date()): AnalyticsWindow {
	return { start: new Date(now.getTime() - days * DAY_MS), end: now, days };
}

/**
 * Start of the window before this one, of the same length.
 */
export function previousWindowStart(window: AnalyticsWindow): Date {
	return new Date(window.start.getTime() - window.days * DAY_MS);
}

export function round1(value: number): number {
	return Math.round(value * 10) / 10;
}

function share(part: number, total: number): number {
	return total > 0 ? round1((part / total) * 100) : 0;
}

/**
 * Top five links by clicks in the window. The sort is stable, so ties keep
 * the order of `links`.
 */
export function topLinks(links: readonly Link[], counts: readonly LinkClickCount[]): LinkStats[] {
	const byLink = new Map(counts.map((entry) => [entry.linkId, entry.clicks]));

	const performance = links.map((link) => ({ link, clicks: byLink.get(link.id) ?? 0 }));
	const total = performance.reduce((sum, entry) => sum + entry.clicks, 0);

	return performance
		.sort((a, b) => b.clicks - a.clicks)
		.slice(0, TOP_LINKS_LIMIT)
		.map(({ link, clicks }) => ({
			linkId: link.id,
			title: link.title,
			clicks,
			percentage: share(clicks, total),
		}));
}

export function deviceBreakdown(counts: readonly DeviceClickCount[]): DeviceStats[] {
	const total = counts.reduce((sum, entry) => sum + entry.clicks, 0);
	if (total === 0) return [];

	return counts
		.map(({ deviceType, clicks }) => ({ deviceType, count: clicks, percentage: share(clicks, total) }))
		.sort((a, b) => b.count - a.count || a.deviceType.localeCompare(b.deviceType));
}

/**
 * Percentage change against the previous window. A previous count of zero
 * reads as 100% growth when there is any current traffic.
 */
export function growthPercentage(current: number, previous: number): number {
	if (previous === 0) {
		return current > 0 ? 100 : 0;
	}
	return round1(((current - previous) / previous) * 100);
}

/**
 * Counts for one analytics window, as read from the click events.
 */
export interface ClickFigures {
	readonly totals: ClickTotals;
	/** Clicks in the window before, of the same length */
	readonly previousClicks: number;
	readonly daily: readonly DayCount[];
	readonly byLink: readonly LinkClickCount[];
	readonly byDevice: readonly DeviceClickCount[];
}

export function summarizeClicks(links: readonly Link[], figures: ClickFigures): AnalyticsSummary {
	if (links.length === 0) return EMPTY_ANALYTICS;

	return {
		totalClicks: figures.totals.clicks,
		uniqueVisitors: figures.totals.uniqueVisitors,
		dailyStats: [...figures.daily],
		topLinks: topLinks(links, figures.byLink),
		deviceStats: deviceBreakdown(figures.byDevice),
		growthPercentage: growthPercentage(figures.totals.clicks, figures.previousClicks),
	};
}

/**
 * Country breakdown of located clicks. Percentages are taken against all
 * located clicks before the list is cut to ten.
 */
export function summarizeGeography(
	byCountry: readonly CountryClickCount[],
	trends: readonly DayCount[],
	countryName: (code: string) => string,
): GeographicSummary {
	const total = byCountry.reduce((sum, entry) => sum + entry.clicks, 0);
	const topCountries = [...byCountry]
		.sort((a, b) => b.clicks - a.clicks || a.country.localeCompare(b.country))
		.slice(0, TOP_COUNTRIES_LIMIT)
		.map((entry) => ({
			countryCode: entry.country,
			countryName: countryName(entry.country),
			clicks: entry.clicks,
			percentage: share(entry.clicks, total),
			uniqueVisitors: entry.uniqueVisitors,
		}));

	return {
		totalCountries: topCountries.length,
		topCountries,
		cityBreakdown: [],
		geographicTrends: [...trends],
	};
}
