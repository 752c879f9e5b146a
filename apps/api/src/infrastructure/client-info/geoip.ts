/**
 * GeoIP Resolver
 *
 * Country lookup against a MaxMind country database (GeoLite2-Country).
 * Without the database every lookup answers null.
 */

import maxmind, { type CountryResponse } from 'maxmind';
import type { Logger } from '@biotap/logging';

export interface GeoIpResolver {
	/** ISO 3166-1 alpha-2 code, or null */
	countryOf(ip: string): string | null;
}

export const nullGeoIpResolver: GeoIpResolver = {
	countryOf: () => null,
};

/**
 * Open the database at `path`. A missing or unreadable file gives the null
 * resolver and a warning.
 */
export async function openGeoIpResolver(path: string, logger: Logger): Promise<GeoIpResolver> {
	const log = logger.child({ component: 'geoip' });

	try {
		const reader = await maxmind.open<CountryResponse>(path);
		log.info({ path }, 'GeoIP database loaded');

		return {
			countryOf(ip: string): string | null {
				if (!maxmind.validate(ip)) return null;
				return reader.get(ip)?.country?.iso_code ?? null;
			},
		};
	} catch (error) {
		log.warn({ path, err: error }, 'GeoIP database unavailable, countries will not be resolved');
		return nullGeoIpResolver;
	}
}
