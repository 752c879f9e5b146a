/**
 * User Agent Parsing
 */

import Bowser from 'bowser';
import type { DeviceType } from '../../domain/index.js';

export interface UserAgentInfo {
	readonly deviceType: DeviceType;
	readonly browser: string;
}

const UNKNOWN: UserAgentInfo = { deviceType: 'unknown', browser: 'unknown' };

function toDeviceType(platformType: string | undefined): DeviceType {
	switch (platformType) {
		case 'mobile':
			return 'mobile';
		case 'tablet':
			return 'tablet';
		case 'desktop':
			return 'desktop';
		default:
			return 'unknown';
	}
}

/**
 * Device class and browser name; both 'unknown' when they cannot be told.
 */
export function parseUserAgent(userAgent: string | null | undefined): UserAgentInfo {
	if (!userAgent) return UNKNOWN;

	const parsed = Bowser.parse(userAgent);
	return {
		deviceType: toDeviceType(parsed.platform.type),
		browser: parsed.browser.name || 'unknown',
	};
}
