import { describe, it, expect, vi } from 'vitest';
import type { Aggregate } from '@biotap/domain-core';
import { typeOf } from '@biotap/tsid';
import postgres from 'postgres';
import { drizzle } from 'drizzle-orm/postgres-js';
import { createAggregateRegistry, createAggregateHandler } from '../aggregate-registry.js';
import type { TransactionContext } from '../transaction.js';

interface Note extends Aggregate {
	readonly text: string;
}

function isNote(aggregate: Aggregate): aggregate is Note {
	return typeOf(aggregate.id) === 'LINK' && 'text' in aggregate;
}

describe('AggregateRegistry', () => {
	it('should dispatch by typed ID prefix', async () => {
		const registry = createAggregateRegistry();
		const persist = vi.fn().mockResolvedValue(undefined);
		const remove = vi.fn().mockResolvedValue(undefined);
		registry.register(createAggregateHandler('LINK', isNote, { persist, delete: remove }));

		const note: Note = { id: 'lnk_0HZXEQ5Y8JY5Z', text: 'hello' };
		await registry.persist(note);
		await registry.delete(note);

		expect(persist).toHaveBeenCalledWith(note, undefined);
		expect(remove).toHaveBeenCalledWith(note, undefined);
	});

	it('should pass the transaction context through', async () => {
		const registry = createAggregateRegistry();
		const persist = vi.fn().mockResolvedValue(undefined);
		registry.register(createAggregateHandler('LINK', isNote, { persist, delete: vi.fn() }));

		// postgres.js connects lazily, so no query means no connection
		const tx: TransactionContext = { db: drizzle(postgres('postgres://localhost:5432/biotap_test')) };
		const note: Note = { id: 'lnk_0HZXEQ5Y8JY5Z', text: 'x' };
		await registry.persist(note, tx);

		expect(persist.mock.calls[0]?.[1]).toBe(tx);
	});

	it('should throw for an unregistered type', async () => {
		const registry = createAggregateRegistry();

		await expect(registry.persist({ id: 'usr_0HZXEQ5Y8JY5Z' })).rejects.toThrow(
			'No handler registered for aggregate type: USER',
		);
	});

	it('should throw for an id without a known prefix', async () => {
		const registry = createAggregateRegistry();

		await expect(registry.persist({ id: 'plain-id' })).rejects.toThrow(
			'No handler registered for aggregate type: plain-id',
		);
	});

	it('should reject an aggregate its handler does not accept', async () => {
		const registry = createAggregateRegistry();
		registry.register(createAggregateHandler('LINK', isNote, { persist: vi.fn(), delete: vi.fn() }));

		await expect(registry.persist({ id: 'lnk_0HZXEQ5Y8JY5Z' })).rejects.toThrow(
			'Aggregate lnk_0HZXEQ5Y8JY5Z is not a LINK',
		);
	});

	it('should refuse a second handler for the same type', () => {
		const registry = createAggregateRegistry();
		const handler = createAggregateHandler('LINK', isNote, { persist: vi.fn(), delete: vi.fn() });
		registry.register(handler);

		expect(registry.has('LINK')).toBe(true);
		expect(() => registry.register(handler)).toThrow('Handler already registered for aggregate type: LINK');
	});
});
