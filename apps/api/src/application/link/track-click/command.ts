/**
 * Track Click Command
 */

import type { Command } from '@biotap/application';
import type { DeviceType } from '../../../domain/index.js';

/**
 * What is known about the visitor behind a redirect.
 */
export interface VisitorDetails {
	readonly ipAddress: string | null;
	readonly userAgent: string | null;
	readonly referer: string | null;
	readonly country: string | null;
	readonly deviceType: DeviceType | null;
	readonly browser: string | null;
}

export interface TrackClickCommand extends Command {
	readonly linkId: string;
	/** Present for redirects, which also record a click event */
	readonly visitor: VisitorDetails | null;
}
