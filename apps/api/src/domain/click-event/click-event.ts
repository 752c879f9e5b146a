/**
 * Click Event Entity
 *
 * One recorded visit through a link's redirect, with what could be learned
 * about the visitor.
 */

import { generate, typeOf } from '@biotap/tsid';
import type { Aggregate } from '@biotap/domain-core';

export const DEVICE_TYPES = ['mobile', 'tablet', 'desktop', 'unknown'] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];

export interface ClickEvent {
	/** Typed ID ("clk_...") */
	readonly id: string;
	readonly linkId: string;
	readonly clickedAt: Date;
	readonly ipAddress: string | null;
	readonly userAgent: string | null;
	readonly referer: string | null;
	/** ISO 3166-1 alpha-2 code */
	readonly country: string | null;
	readonly deviceType: DeviceType | null;
	readonly browser: string | null;
}

export const CLICK_IP_MAX_LENGTH = 45;
export const CLICK_USER_AGENT_MAX_LENGTH = 500;
export const CLICK_REFERER_MAX_LENGTH = 500;
export const CLICK_BROWSER_MAX_LENGTH = 50;

export interface CreateClickEventInput {
	readonly linkId: string;
	readonly ipAddress?: string | null | undefined;
	readonly userAgent?: string | null | undefined;
	readonly referer?: string | null | undefined;
	readonly country?: string | null | undefined;
	readonly deviceType?: DeviceType | null | undefined;
	readonly browser?: string | null | undefined;
	readonly clickedAt?: Date | undefined;
}

function truncate(value: string | null | undefined, maxLength: number): string | null {
	if (value === null || value === undefined) return null;
	return value.length > maxLength ? value.slice(0, maxLength) : value;
}

/**
 * Create a click event. Free-text header values are cut to their column
 * lengths.
 */
export function createClickEvent(input: CreateClickEventInput): ClickEvent {
	return {
		id: generate('CLICK_EVENT'),
		linkId: input.linkId,
		clickedAt: input.clickedAt ?? new Date(),
		ipAddress: truncate(input.ipAddress, CLICK_IP_MAX_LENGTH),
		userAgent: truncate(input.userAgent, CLICK_USER_AGENT_MAX_LENGTH),
		referer: truncate(input.referer, CLICK_REFERER_MAX_LENGTH),
		country: input.country ?? null,
		deviceType: input.deviceType ?? null,
		browser: truncate(input.browser, CLICK_BROWSER_MAX_LENGTH),
	};
}

export function isDeviceType(value: string): value is DeviceType {
	return DEVICE_TYPES.some((type) => type === value);
}

export function isClickEvent(aggregate: Aggregate): aggregate is ClickEvent {
	return typeOf(aggregate.id) === 'CLICK_EVENT';
}
