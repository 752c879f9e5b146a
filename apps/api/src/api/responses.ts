/**
 * Response Bodies
 *
 * TypeBox schemas and mappers for the JSON the API returns. Field names
 * are snake_case.
 */

import { Type, type Static } from '@biotap/http';

import type { Link, User } from '../domain/index.js';
import type {
	AnalyticsSummary,
	GeographicSummary,
	DailyStats,
	GeoLookup,
} from '../application/analytics/index.js';
import type { EmailStats, WeeklyAnalyticsResult } from '../application/email/index.js';
import type { AccessToken } from '../application/auth/index.js';

const NullableString = Type.Union([Type.String(), Type.Null()]);
const NullableDateTime = Type.Union([Type.String({ format: 'date-time' }), Type.Null()]);

// ─── Users ──────────────────────────────────────────────────────────────────

export const UserResponseSchema = Type.Object({
	id: Type.String(),
	username: Type.String(),
	email: Type.String(),
	full_name: NullableString,
	is_active: Type.Boolean(),
	created_at: Type.String({ format: 'date-time' }),
	updated_at: NullableDateTime,
});

export type UserResponse = Static<typeof UserResponseSchema>;

export function toUserResponse(user: User): UserResponse {
	return {
		id: user.id,
		username: user.username,
		email: user.email,
		full_name: user.fullName,
		is_active: user.isActive,
		created_at: user.createdAt.toISOString(),
		updated_at: user.updatedAt?.toISOString() ?? null,
	};
}

export const TokenResponseSchema = Type.Object({
	access_token: Type.String(),
	token_type: Type.Literal('bearer'),
});

export function toTokenResponse(token: AccessToken): Static<typeof TokenResponseSchema> {
	return { access_token: token.accessToken, token_type: token.tokenType };
}

// ─── Links ──────────────────────────────────────────────────────────────────

export const LinkResponseSchema = Type.Object({
	id: Type.String(),
	title: Type.String(),
	url: Type.String(),
	description: NullableString,
	is_active: Type.Boolean(),
	display_order: Type.Integer(),
	icon: NullableString,
	click_count: Type.Integer(),
	created_at: Type.String({ format: 'date-time' }),
	updated_at: NullableDateTime,
	user_id: Type.String(),
});

export type LinkResponse = Static<typeof LinkResponseSchema>;

export function toLinkResponse(link: Link): LinkResponse {
	return {
		id: link.id,
		title: link.title,
		url: link.url,
		description: link.description,
		is_active: link.isActive,
		display_order: link.displayOrder,
		icon: link.icon,
		click_count: link.clickCount,
		created_at: link.createdAt.toISOString(),
		updated_at: link.updatedAt?.toISOString() ?? null,
		user_id: link.userId,
	};
}

// ─── Analytics ──────────────────────────────────────────────────────────────

const DailyStatsSchema = Type.Object({
	date: Type.String(),
	clicks: Type.Integer(),
});

export const AnalyticsResponseSchema = Type.Object({
	total_clicks: Type.Integer(),
	unique_visitors: Type.Integer(),
	daily_stats: Type.Array(DailyStatsSchema),
	top_links: Type.Array(
		Type.Object({
			link_id: Type.String(),
			title: Type.String(),
			clicks: Type.Integer(),
			percentage: Type.Number(),
		}),
	),
	device_stats: Type.Array(
		Type.Object({
			device_type: Type.String(),
			count: Type.Integer(),
			percentage: Type.Number(),
		}),
	),
	growth_percentage: Type.Number(),
});

export type AnalyticsResponse = Static<typeof AnalyticsResponseSchema>;

function toDailyStats(stats: readonly DailyStats[]): Array<Static<typeof DailyStatsSchema>> {
	return stats.map((day) => ({ date: day.date, clicks: day.clicks }));
}

export function toAnalyticsResponse(summary: AnalyticsSummary): AnalyticsResponse {
	return {
		total_clicks: summary.totalClicks,
		unique_visitors: summary.uniqueVisitors,
		daily_stats: toDailyStats(summary.dailyStats),
		top_links: summary.topLinks.map((link) => ({
			link_id: link.linkId,
			title: link.title,
			clicks: link.clicks,
			percentage: link.percentage,
		})),
		device_stats: summary.deviceStats.map((device) => ({
			device_type: device.deviceType,
			count: device.count,
			percentage: device.percentage,
		})),
		growth_percentage: summary.growthPercentage,
	};
}

export const GeographicResponseSchema = Type.Object({
	total_countries: Type.Integer(),
	top_countries: Type.Array(
		Type.Object({
			country_code: Type.String(),
			country_name: Type.String(),
			clicks: Type.Integer(),
			percentage: Type.Number(),
			unique_visitors: Type.Integer(),
		}),
	),
	city_breakdown: Type.Array(
		Type.Object({
			city: Type.String(),
			country_code: Type.String(),
			country_name: Type.String(),
			clicks: Type.Integer(),
			percentage: Type.Number(),
		}),
	),
	geographic_trends: Type.Array(DailyStatsSchema),
});

export type GeographicResponse = Static<typeof GeographicResponseSchema>;

export function toGeographicResponse(summary: GeographicSummary): GeographicResponse {
	return {
		total_countries: summary.totalCountries,
		top_countries: summary.topCountries.map((country) => ({
			country_code: country.countryCode,
			country_name: country.countryName,
			clicks: country.clicks,
			percentage: country.percentage,
			unique_visitors: country.uniqueVisitors,
		})),
		city_breakdown: summary.cityBreakdown.map((city) => ({
			city: city.city,
			country_code: city.countryCode,
			country_name: city.countryName,
			clicks: city.clicks,
			percentage: city.percentage,
		})),
		geographic_trends: toDailyStats(summary.geographicTrends),
	};
}

export const GeoLookupResponseSchema = Type.Object({
	ip: Type.String(),
	country: NullableString,
});

export function toGeoLookupResponse(lookup: GeoLookup): Static<typeof GeoLookupResponseSchema> {
	return { ip: lookup.ip, country: lookup.country };
}

// ─── Admin ──────────────────────────────────────────────────────────────────

export const WeeklyAnalyticsResponseSchema = Type.Object({
	message: Type.String(),
	result: Type.Object({
		sent: Type.Integer(),
		errors: Type.Integer(),
	}),
});

export function toWeeklyAnalyticsResponse(
	result: WeeklyAnalyticsResult,
): Static<typeof WeeklyAnalyticsResponseSchema> {
	return {
		message: 'Weekly analytics emails triggered successfully',
		result: { sent: result.sent, errors: result.errors },
	};
}

export const EmailStatsResponseSchema = Type.Object({
	total_sent: Type.Integer(),
	total_failed: Type.Integer(),
	success_rate: Type.Number(),
	last_sent: NullableDateTime,
});

export function toEmailStatsResponse(stats: EmailStats): Static<typeof EmailStatsResponseSchema> {
	return {
		total_sent: stats.totalSent,
		total_failed: stats.totalFailed,
		success_rate: stats.successRate,
		last_sent: stats.lastSent?.toISOString() ?? null,
	};
}
