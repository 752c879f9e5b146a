/**
 * Typed IDs: a three letter entity prefix, an underscore and a TSID,
 * e.g. "lnk_0HZXEQ5Y8JY5Z".
 */

import { generateRaw } from './tsid.js';

export const EntityType = {
	USER: 'usr',
	LINK: 'lnk',
	CLICK_EVENT: 'clk',
	PASSWORD_RESET_TOKEN: 'rst',
	EMAIL_LOG: 'eml',
	EVENT: 'evn',
	AUDIT_LOG: 'aud',
} as const;

export type EntityTypeKey = keyof typeof EntityType;

const TYPE_BY_PREFIX = new Map<string, EntityTypeKey>();
for (const key of Object.keys(EntityType)) {
	if (isEntityTypeKey(key)) TYPE_BY_PREFIX.set(EntityType[key], key);
}

function isEntityTypeKey(key: string): key is EntityTypeKey {
	return Object.hasOwn(EntityType, key);
}

export function generate(type: EntityTypeKey): string {
	return `${EntityType[type]}_${generateRaw()}`;
}

/**
 * Entity type named by the prefix, or null when there is none. The TSID part
 * is not checked.
 */
export function typeOf(id: string): EntityTypeKey | null {
	const separator = id.indexOf('_');
	return separator === -1 ? null : (TYPE_BY_PREFIX.get(id.slice(0, separator)) ?? null);
}
