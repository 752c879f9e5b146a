/**
 * Link Events
 *
 * Events emitted when links change or are clicked.
 */

import { BaseDomainEvent, DomainEvent, type DomainEventBase, type ExecutionContext } from '@biotap/domain-core';

function linkEvent(eventType: string, linkId: string): DomainEventBase {
	return { eventType, aggregateType: 'Link', aggregateId: linkId };
}

// -----------------------------------------------------------------------------
// LinkCreated
// -----------------------------------------------------------------------------

export interface LinkCreatedData {
	readonly linkId: string;
	readonly userId: string;
	readonly title: string;
	readonly url: string;
	readonly [key: string]: unknown;
}

export class LinkCreated extends BaseDomainEvent<LinkCreatedData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('link', 'created');

	constructor(ctx: ExecutionContext, data: LinkCreatedData) {
		super(linkEvent(LinkCreated.EVENT_TYPE, data.linkId), ctx, data);
	}
}

// -----------------------------------------------------------------------------
// LinkUpdated
// -----------------------------------------------------------------------------

export interface LinkUpdatedData {
	readonly linkId: string;
	readonly userId: string;
	readonly changedFields: readonly string[];
	readonly [key: string]: unknown;
}

export class LinkUpdated extends BaseDomainEvent<LinkUpdatedData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('link', 'updated');

	constructor(ctx: ExecutionContext, data: LinkUpdatedData) {
		super(linkEvent(LinkUpdated.EVENT_TYPE, data.linkId), ctx, data);
	}
}

// -----------------------------------------------------------------------------
// LinkDeleted
// -----------------------------------------------------------------------------

export interface LinkDeletedData {
	readonly linkId: string;
	readonly userId: string;
	readonly [key: string]: unknown;
}

export class LinkDeleted extends BaseDomainEvent<LinkDeletedData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('link', 'deleted');

	constructor(ctx: ExecutionContext, data: LinkDeletedData) {
		super(linkEvent(LinkDeleted.EVENT_TYPE, data.linkId), ctx, data);
	}
}

// -----------------------------------------------------------------------------
// LinkClicked
// -----------------------------------------------------------------------------

export interface LinkClickedData {
	readonly linkId: string;
	/** Set when the click was recorded with visitor details */
	readonly clickEventId: string | null;
	readonly [key: string]: unknown;
}

export class LinkClicked extends BaseDomainEvent<LinkClickedData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('link', 'clicked');

	constructor(ctx: ExecutionContext, data: LinkClickedData) {
		super(linkEvent(LinkClicked.EVENT_TYPE, data.linkId), ctx, data);
	}
}
