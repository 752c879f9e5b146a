/**
 * Domain Events
 *
 * Facts about what happened, named in the past tense (`LinkCreated`, not
 * `CreateLink`). Each event belongs to one aggregate and is written to the
 * events table in the transaction that made the change.
 */

import { generate } from '@biotap/tsid';
import type { ExecutionContext } from './execution-context.js';

export interface DomainEvent {
	/** Typed ID of this event ("evn_...") */
	readonly eventId: string;

	/** "{aggregate}.{action}", e.g. "link.created" */
	readonly eventType: string;

	/** Aggregate name as shown in audit logs, e.g. "Link" */
	readonly aggregateType: string;
	readonly aggregateId: string;

	readonly time: Date;
	readonly executionId: string;
	readonly correlationId: string;
	readonly causationId: string | null;
	readonly principalId: string;

	toDataJson(): string;
}

/** What a concrete event supplies; the rest comes from the execution context. */
export interface DomainEventBase {
	readonly eventType: string;
	readonly aggregateType: string;
	readonly aggregateId: string;
}

export interface DomainEventMetadata {
	eventId: string;
	executionId: string;
	correlationId: string;
	causationId: string | null;
	principalId: string;
	time: Date;
}

const EVENT_TYPE_PART = /^[a-z][a-z0-9-]*$/;

export const DomainEvent = {
	metadataFrom(ctx: ExecutionContext): DomainEventMetadata {
		return {
			eventId: generate('EVENT'),
			executionId: ctx.executionId,
			correlationId: ctx.correlationId,
			causationId: ctx.causationId,
			principalId: ctx.principalId,
			time: new Date(),
		};
	},

	/**
	 * Event type code. Both parts are lower-case kebab words.
	 */
	eventType(aggregate: string, action: string): string {
		if (!EVENT_TYPE_PART.test(aggregate) || !EVENT_TYPE_PART.test(action)) {
			throw new Error(`Invalid event type: ${aggregate}.${action}`);
		}
		return `${aggregate}.${action}`;
	},
};

/**
 * Base class for concrete events.
 *
 * @example
 * ```typescript
 * class LinkCreated extends BaseDomainEvent<LinkCreatedData> {
 *     static readonly EVENT_TYPE = DomainEvent.eventType('link', 'created');
 *
 *     constructor(ctx: ExecutionContext, data: LinkCreatedData) {
 *         super({ eventType: LinkCreated.EVENT_TYPE, aggregateType: 'Link', aggregateId: data.linkId }, ctx, data);
 *     }
 * }
 * ```
 */
export abstract class BaseDomainEvent<TData extends Record<string, unknown>> implements DomainEvent {
	readonly eventId: string;
	readonly eventType: string;
	readonly aggregateType: string;
	readonly aggregateId: string;
	readonly time: Date;
	readonly executionId: string;
	readonly correlationId: string;
	readonly causationId: string | null;
	readonly principalId: string;

	protected readonly data: TData;

	constructor(base: DomainEventBase, ctx: ExecutionContext, data: TData) {
		const metadata = DomainEvent.metadataFrom(ctx);

		this.eventId = metadata.eventId;
		this.eventType = base.eventType;
		this.aggregateType = base.aggregateType;
		this.aggregateId = base.aggregateId;
		this.time = metadata.time;
		this.executionId = metadata.executionId;
		this.correlationId = metadata.correlationId;
		this.causationId = metadata.causationId;
		this.principalId = metadata.principalId;
		this.data = data;
	}

	toDataJson(): string {
		return JSON.stringify(this.data);
	}

	getData(): TData {
		return this.data;
	}
}
