/**
 * Analytics Service
 *
 * Read-side queries over a user's click events. The database does the
 * counting; the summaries are shaped from its counts.
 */

import type { ClickEventRepository, LinkRepository } from '../../infrastructure/persistence/index.js';
import type { GeoIpResolver } from '../../infrastructure/client-info/index.js';

import {
	analyticsWindow,
	previousWindowStart,
	summarizeClicks,
	summarizeGeography,
	EMPTY_ANALYTICS,
	EMPTY_GEOGRAPHIC,
	type AnalyticsSummary,
	type GeographicSummary,
} from './aggregate.js';
import { countryName } from './country-names.js';

export const ANALYTICS_MIN_DAYS = 1;
export const ANALYTICS_MAX_DAYS = 365;
export const ANALYTICS_DEFAULT_DAYS = 30;

export interface AnalyticsServiceDeps {
	readonly linkRepository: LinkRepository;
	readonly clickEventRepository: ClickEventRepository;
	readonly geoIp: GeoIpResolver;
}

export interface GeoLookup {
	readonly ip: string;
	readonly country: string | null;
}

export interface AnalyticsService {
	getAnalytics(userId: string, days: number, now?: Date): Promise<AnalyticsSummary>;
	getGeographic(userId: string, days: number, now?: Date): Promise<GeographicSummary>;
	lookupCountry(ip: string): GeoLookup;
}

export function createAnalyticsService(deps: AnalyticsServiceDeps): AnalyticsService {
	const { linkRepository, clickEventRepository, geoIp } = deps;

	return {
		async getAnalytics(userId, days, now = new Date()) {
			const links = await linkRepository.findByUser(userId);
			if (links.length === 0) return EMPTY_ANALYTICS;

			const window = analyticsWindow(days, now);
			const linkIds = links.map((link) => link.id);
			const current = { linkIds, since: window.start };

			const [totals, previous, daily, byLink, byDevice] = await Promise.all([
				clickEventRepository.countClicks(current),
				clickEventRepository.countClicks({ linkIds, since: previousWindowStart(window), before: window.start }),
				clickEventRepository.countByDay({ ...current, until: window.end }),
				clickEventRepository.countByLink(current),
				clickEventRepository.countByDevice(current),
			]);
			return summarizeClicks(links, { totals, previousClicks: previous.clicks, daily, byLink, byDevice });
		},

		async getGeographic(userId, days, now = new Date()) {
			const links = await linkRepository.findByUser(userId);
			if (links.length === 0) return EMPTY_GEOGRAPHIC;

			const window = analyticsWindow(days, now);
			const located = { linkIds: links.map((link) => link.id), since: window.start, located: true };

			const [byCountry, trends] = await Promise.all([
				clickEventRepository.countByCountry(located),
				clickEventRepository.countByDay({ ...located, until: window.end }),
			]);
			return summarizeGeography(byCountry, trends, countryName);
		},

		lookupCountry(ip) {
			return { ip, country: geoIp.countryOf(ip) };
		},
	};
}
