/**
 * Aggregate Registry
 *
 * Dispatches persist and delete operations to the repository of an
 * aggregate's type. The type is read from the typed ID prefix
 * (`lnk_…` → LINK), so aggregates can stay plain objects.
 */

import type { Aggregate } from '@biotap/domain-core';
import { typeOf, type EntityTypeKey } from '@biotap/tsid';
import type { TransactionContext } from './transaction.js';

/**
 * Handler for persisting and deleting one aggregate type.
 */
export interface AggregateHandler<T extends Aggregate> {
	readonly type: EntityTypeKey;
	/** Narrow an aggregate routed to this handler */
	accepts(aggregate: Aggregate): aggregate is T;
	persist(aggregate: T, tx?: TransactionContext): Promise<unknown>;
	delete(aggregate: T, tx?: TransactionContext): Promise<unknown>;
}

export interface AggregateRegistry {
	/**
	 * @throws Error if a handler for the type is already registered
	 */
	register<T extends Aggregate>(handler: AggregateHandler<T>): void;

	/**
	 * @throws Error if no handler is registered for the aggregate's type
	 */
	persist(aggregate: Aggregate, tx?: TransactionContext): Promise<void>;

	/**
	 * @throws Error if no handler is registered for the aggregate's type
	 */
	delete(aggregate: Aggregate, tx?: TransactionContext): Promise<void>;

	has(type: EntityTypeKey): boolean;
}

interface Dispatch {
	persist(aggregate: Aggregate, tx?: TransactionContext): Promise<unknown>;
	delete(aggregate: Aggregate, tx?: TransactionContext): Promise<unknown>;
}

export function createAggregateRegistry(): AggregateRegistry {
	const handlers = new Map<EntityTypeKey, Dispatch>();

	function resolve(aggregate: Aggregate): Dispatch {
		const type = typeOf(aggregate.id);
		const handler = type ? handlers.get(type) : undefined;

		if (!handler) {
			throw new Error(
				`No handler registered for aggregate type: ${type ?? aggregate.id}. ` +
					`Registered types: ${Array.from(handlers.keys()).join(', ')}`,
			);
		}
		return handler;
	}

	return {
		register<T extends Aggregate>(handler: AggregateHandler<T>): void {
			if (handlers.has(handler.type)) {
				throw new Error(`Handler already registered for aggregate type: ${handler.type}`);
			}

			function narrow(aggregate: Aggregate): T {
				if (!handler.accepts(aggregate)) {
					throw new Error(`Aggregate ${aggregate.id} is not a ${handler.type}`);
				}
				return aggregate;
			}

			handlers.set(handler.type, {
				persist: (aggregate, tx) => handler.persist(narrow(aggregate), tx),
				delete: (aggregate, tx) => handler.delete(narrow(aggregate), tx),
			});
		},

		async persist(aggregate: Aggregate, tx?: TransactionContext): Promise<void> {
			await resolve(aggregate).persist(aggregate, tx);
		},

		async delete(aggregate: Aggregate, tx?: TransactionContext): Promise<void> {
			await resolve(aggregate).delete(aggregate, tx);
		},

		has(type: EntityTypeKey): boolean {
			return handlers.has(type);
		},
	};
}

/**
 * Create an aggregate handler from a repository.
 *
 * @example
 * ```typescript
 * registry.register(createAggregateHandler('LINK', isLink, linkRepository));
 * ```
 */
export function createAggregateHandler<T extends Aggregate>(
	type: EntityTypeKey,
	accepts: (aggregate: Aggregate) => aggregate is T,
	repository: {
		persist(entity: T, tx?: TransactionContext): Promise<unknown>;
		delete(entity: T, tx?: TransactionContext): Promise<unknown>;
	},
): AggregateHandler<T> {
	return {
		type,
		accepts,
		persist: (aggregate, tx) => repository.persist(aggregate, tx),
		delete: (aggregate, tx) => repository.delete(aggregate, tx),
	};
}
