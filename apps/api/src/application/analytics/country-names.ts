import { readFileSync } from 'node:fs';

const COUNTRY_NAMES_FILE = new URL('../../../data/country-names.json', import.meta.url);

let cached: ReadonlyMap<string, string> | null = null;

function loadCountryNames(): ReadonlyMap<string, string> {
	const parsed: unknown = JSON.parse(readFileSync(COUNTRY_NAMES_FILE, 'utf8'));
	const names = new Map<string, string>();
	if (typeof parsed === 'object' && parsed !== null) {
		for (const [code, name] of Object.entries(parsed)) {
			if (typeof name === 'string') names.set(code, name);
		}
	}
	return names;
}

/**
 * English name for an ISO alpha-2 code; unknown codes come back unchanged.
 */
export function countryName(code: string): string {
	cached ??= loadCountryNames();
	return cached.get(code) ?? code;
}
