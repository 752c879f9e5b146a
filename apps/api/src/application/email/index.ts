export {
	createWeeklyAnalyticsJob,
	type WeeklyAnalyticsJob,
	type WeeklyAnalyticsDeps,
	type WeeklyAnalyticsResult,
	type EmailStats,
} from './weekly-analytics.js';
