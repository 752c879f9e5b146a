/**
 * Unit of Work
 *
 * Commits an aggregate change, its domain event and an audit log entry in
 * one transaction. It is the only holder of the Result success token, so a
 * use case can only report success by committing.
 *
 * ```typescript
 * const link = createLink({ ... });
 * const event = new LinkCreated(ctx, { linkId: link.id, ... });
 * return unitOfWork.commit(link, event, command);
 * ```
 */

import type { DomainEvent } from './domain-event.js';
import type { Result } from './result.js';
import type { UseCaseError } from './errors.js';

/**
 * Anything persisted through a UnitOfWork. The typed ID prefix identifies
 * the aggregate type.
 */
export interface Aggregate {
	readonly id: string;
}

/**
 * A change written through the store's own scope (a transaction, for
 * Postgres) rather than through an aggregate's repository, such as an
 * increment or a conditional update. Returning an error rolls the commit
 * back and makes that error the result.
 */
export type UnitOfWorkStep<TScope> = (scope: TScope) => Promise<UseCaseError | null>;

export interface UnitOfWork<TScope = unknown> {
	/**
	 * Persist (insert or update) the aggregate, write the event and the audit
	 * log. Rolls back everything if a step fails.
	 */
	commit<T extends DomainEvent>(aggregate: Aggregate, event: T, command: unknown): Promise<Result<T>>;

	/**
	 * Delete the aggregate, write the event and the audit log.
	 */
	commitDelete<T extends DomainEvent>(aggregate: Aggregate, event: T, command: unknown): Promise<Result<T>>;

	/**
	 * Persist several aggregates with a single event, e.g. a link and the
	 * click event recorded against it.
	 */
	commitAll<T extends DomainEvent>(aggregates: readonly Aggregate[], event: T, command: unknown): Promise<Result<T>>;

	/**
	 * Run `step` inside the commit, then write the event and the audit log.
	 */
	commitStep<T extends DomainEvent>(step: UnitOfWorkStep<TScope>, event: T, command: unknown): Promise<Result<T>>;
}

export { RESULT_SUCCESS_TOKEN, type ResultSuccessToken } from './result.js';
