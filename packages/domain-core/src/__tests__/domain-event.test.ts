import { describe, it, expect } from 'vitest';
import { DomainEvent, BaseDomainEvent } from '../domain-event.js';
import type { ExecutionContext } from '../execution-context.js';

const ctx: ExecutionContext = {
	executionId: 'exec-123',
	correlationId: 'corr-456',
	causationId: 'cause-789',
	principalId: 'usr_0HZXEQ5Y8JY5Z',
	initiatedAt: new Date(),
};

interface LinkRenamedData {
	readonly linkId: string;
	readonly title: string;
	readonly [key: string]: unknown;
}

class LinkRenamed extends BaseDomainEvent<LinkRenamedData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('link', 'renamed');

	constructor(context: ExecutionContext, data: LinkRenamedData) {
		super({ eventType: LinkRenamed.EVENT_TYPE, aggregateType: 'Link', aggregateId: data.linkId }, context, data);
	}
}

describe('DomainEvent helpers', () => {
	it('should copy metadata from the execution context', () => {
		const metadata = DomainEvent.metadataFrom(ctx);

		expect(metadata.eventId).toMatch(/^evn_[0-9A-HJKMNP-TV-Z]{13}$/);
		expect(metadata.executionId).toBe('exec-123');
		expect(metadata.correlationId).toBe('corr-456');
		expect(metadata.causationId).toBe('cause-789');
		expect(metadata.principalId).toBe('usr_0HZXEQ5Y8JY5Z');
	});

	it('should join aggregate and action into the event type', () => {
		expect(DomainEvent.eventType('link', 'created')).toBe('link.created');
		expect(DomainEvent.eventType('user', 'password-reset-requested')).toBe('user.password-reset-requested');
	});

	it('should reject malformed event type parts', () => {
		expect(() => DomainEvent.eventType('Link', 'created')).toThrow('Invalid event type: Link.created');
		expect(() => DomainEvent.eventType('link', 'was.created')).toThrow('Invalid event type: link.was.created');
	});
});

describe('BaseDomainEvent', () => {
	it('should combine base fields, context metadata and data', () => {
		const event = new LinkRenamed(ctx, { linkId: 'lnk_1', title: 'Portfolio' });

		expect(event.eventType).toBe('link.renamed');
		expect(event.aggregateType).toBe('Link');
		expect(event.aggregateId).toBe('lnk_1');
		expect(event.correlationId).toBe('corr-456');
		expect(event.principalId).toBe('usr_0HZXEQ5Y8JY5Z');
		expect(event.getData()).toEqual({ linkId: 'lnk_1', title: 'Portfolio' });
		expect(event.toDataJson()).toBe('{"linkId":"lnk_1","title":"Portfolio"}');
	});
});
