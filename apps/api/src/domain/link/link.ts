/**
 * Link Entity
 *
 * A titled URL on a user's public profile. Links are shown ordered by
 * display order, newest first within the same order.
 */

import { generate, typeOf } from '@biotap/tsid';
import type { Aggregate } from '@biotap/domain-core';

export interface Link {
	/** Typed ID ("lnk_...") */
	readonly id: string;
	/** Owning user */
	readonly userId: string;
	readonly title: string;
	readonly url: string;
	readonly description: string | null;
	readonly isActive: boolean;
	readonly displayOrder: number;
	readonly icon: string | null;
	/** Incremented on every tracked click */
	readonly clickCount: number;
	readonly createdAt: Date;
	readonly updatedAt: Date | null;
}

export const LINK_TITLE_MAX_LENGTH = 100;
export const LINK_URL_MAX_LENGTH = 2000;
export const LINK_DESCRIPTION_MAX_LENGTH = 500;
export const LINK_ICON_MAX_LENGTH = 50;

export interface CreateLinkInput {
	readonly userId: string;
	readonly title: string;
	readonly url: string;
	readonly description?: string | null | undefined;
	readonly isActive?: boolean | undefined;
	readonly displayOrder?: number | undefined;
	readonly icon?: string | null | undefined;
}

export function createLink(input: CreateLinkInput): Link {
	return {
		id: generate('LINK'),
		userId: input.userId,
		title: input.title,
		url: input.url,
		description: input.description ?? null,
		isActive: input.isActive ?? true,
		displayOrder: input.displayOrder ?? 0,
		icon: input.icon ?? null,
		clickCount: 0,
		createdAt: new Date(),
		updatedAt: null,
	};
}

/**
 * Display order ascending, then newest first.
 */
export function compareLinks(a: Link, b: Link): number {
	if (a.displayOrder !== b.displayOrder) {
		return a.displayOrder - b.displayOrder;
	}
	return b.createdAt.getTime() - a.createdAt.getTime();
}

export function isLink(aggregate: Aggregate): aggregate is Link {
	return typeOf(aggregate.id) === 'LINK';
}
