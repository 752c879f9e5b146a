/**
 * Drizzle Transactional Unit of Work
 *
 * UnitOfWork implementation that commits entity changes, domain events and
 * audit logs in one DrizzleORM transaction.
 *
 * This is the ONLY way to create successful Results, so every state change
 * leaves an event and an audit log behind.
 */

import {
	type UnitOfWork,
	type Aggregate,
	type DomainEvent,
	Result,
	RESULT_SUCCESS_TOKEN,
	UseCaseError,
} from '@biotap/domain-core';
import { generate } from '@biotap/tsid';
import type { AggregateRegistry } from './aggregate-registry.js';
import type { Db, TransactionContext, TransactionManager } from './transaction.js';
import { events, type NewEvent } from './schema/events.js';
import { auditLogs, type NewAuditLog } from './schema/audit-logs.js';

/**
 * Unit of work whose steps receive the open transaction, or nothing when
 * there is none.
 */
export type TransactionalUnitOfWork = UnitOfWork<TransactionContext | undefined>;

/** Carries a step's error out of the transaction so it rolls back */
class StepRejected extends Error {
	constructor(readonly failure: UseCaseError) {
		super(failure.message);
		this.name = 'StepRejected';
	}
}

export interface DrizzleUnitOfWorkConfig {
	readonly transactionManager: TransactionManager;
	/** Registry for dispatching aggregate persistence */
	readonly aggregateRegistry: AggregateRegistry;
}

/**
 * Create a Drizzle-based Unit of Work.
 *
 * @example
 * ```typescript
 * const unitOfWork = createDrizzleUnitOfWork({
 *     transactionManager: createTransactionManager(database.db),
 *     aggregateRegistry: registry,
 * });
 *
 * // In a use case:
 * const event = new LinkCreated(ctx, { linkId: link.id, ... });
 * return unitOfWork.commit(link, event, command);
 * ```
 */
export function createDrizzleUnitOfWork(config: DrizzleUnitOfWorkConfig): TransactionalUnitOfWork {
	const { transactionManager, aggregateRegistry } = config;

	async function run<T extends DomainEvent>(
		failureCode: string,
		event: T,
		command: unknown,
		apply: (tx: TransactionContext) => Promise<UseCaseError | null>,
	): Promise<Result<T>> {
		try {
			return await transactionManager.inTransaction(async (tx) => {
				const rejection = await apply(tx);
				if (rejection) {
					throw new StepRejected(rejection);
				}
				await createEventRecord(tx.db, event);
				await createAuditLogRecord(tx.db, event, command);

				// Only UnitOfWork can do this
				return Result.success(RESULT_SUCCESS_TOKEN, event);
			});
		} catch (error) {
			if (error instanceof StepRejected) {
				return Result.failure(error.failure);
			}
			return Result.failure(
				UseCaseError.businessRule(
					failureCode,
					error instanceof Error ? error.message : 'Unknown error during commit',
					{ cause: error instanceof Error ? error.name : 'Unknown' },
				),
			);
		}
	}

	return {
		commit(aggregate, event, command) {
			return run('COMMIT_FAILED', event, command, async (tx) => {
				await aggregateRegistry.persist(aggregate, tx);
				return null;
			});
		},

		commitDelete(aggregate, event, command) {
			return run('DELETE_FAILED', event, command, async (tx) => {
				await aggregateRegistry.delete(aggregate, tx);
				return null;
			});
		},

		commitAll(aggregates, event, command) {
			return run('COMMIT_ALL_FAILED', event, command, async (tx) => {
				for (const aggregate of aggregates) {
					await aggregateRegistry.persist(aggregate, tx);
				}
				return null;
			});
		},

		commitStep(step, event, command) {
			return run('COMMIT_FAILED', event, command, step);
		},
	};
}

async function createEventRecord(db: Db, event: DomainEvent): Promise<void> {
	await db.insert(events).values(toEventRecord(event));
}

async function createAuditLogRecord(db: Db, event: DomainEvent, command: unknown): Promise<void> {
	await db.insert(auditLogs).values(toAuditLogRecord(event, command));
}

export function toEventRecord(event: DomainEvent): NewEvent {
	const data: unknown = JSON.parse(event.toDataJson());

	return {
		id: event.eventId,
		type: event.eventType,
		aggregateType: event.aggregateType,
		aggregateId: event.aggregateId,
		data,
		principalId: event.principalId,
		executionId: event.executionId,
		correlationId: event.correlationId,
		causationId: event.causationId,
		occurredAt: event.time,
	};
}

export function toAuditLogRecord(event: DomainEvent, command: unknown): NewAuditLog {
	return {
		id: generate('AUDIT_LOG'),
		entityType: event.aggregateType,
		entityId: event.aggregateId,
		operation: getOperationName(command),
		operationJson: command === null || command === undefined ? null : redactCommand(command),
		principalId: event.principalId,
		correlationId: event.correlationId,
		performedAt: event.time,
	};
}

const SENSITIVE_KEY = /password|token|secret/i;

/**
 * Copy a command into JSON-safe form with credentials masked.
 */
export function redactCommand(value: unknown): unknown {
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		return value.map(redactCommand);
	}
	if (typeof value === 'object' && value !== null) {
		return Object.fromEntries(
			Object.entries(value)
				.filter(([, v]) => v !== undefined)
				.map(([key, v]) => [key, SENSITIVE_KEY.test(key) ? '[REDACTED]' : redactCommand(v)]),
		);
	}
	if (typeof value === 'bigint') {
		return value.toString();
	}
	if (typeof value === 'function' || typeof value === 'symbol') {
		return null;
	}
	return value;
}

/**
 * Operation name recorded in the audit log: the command's `_type`.
 */
export function getOperationName(command: unknown): string {
	if (typeof command === 'object' && command !== null && '_type' in command && typeof command._type === 'string') {
		return command._type;
	}
	return 'Unknown';
}

export interface DirectUnitOfWorkConfig {
	readonly aggregateRegistry: AggregateRegistry;
	/** Called after each successful commit */
	readonly onCommit?: ((event: DomainEvent, command: unknown) => void) | undefined;
}

/**
 * Unit of Work without a transaction: aggregates go straight to the
 * registered repositories and nothing else is written. For tests against
 * in-memory repositories.
 */
export function createDirectUnitOfWork(config: DirectUnitOfWorkConfig): TransactionalUnitOfWork {
	const { aggregateRegistry, onCommit } = config;

	async function run<T extends DomainEvent>(
		failureCode: string,
		event: T,
		command: unknown,
		apply: () => Promise<UseCaseError | null>,
	): Promise<Result<T>> {
		try {
			const rejection = await apply();
			if (rejection) {
				return Result.failure(rejection);
			}
		} catch (error) {
			return Result.failure(
				UseCaseError.businessRule(failureCode, error instanceof Error ? error.message : 'Unknown error'),
			);
		}
		onCommit?.(event, command);
		return Result.success(RESULT_SUCCESS_TOKEN, event);
	}

	return {
		commit(aggregate: Aggregate, event, command) {
			return run('COMMIT_FAILED', event, command, async () => {
				await aggregateRegistry.persist(aggregate);
				return null;
			});
		},

		commitDelete(aggregate: Aggregate, event, command) {
			return run('DELETE_FAILED', event, command, async () => {
				await aggregateRegistry.delete(aggregate);
				return null;
			});
		},

		commitAll(aggregates, event, command) {
			return run('COMMIT_ALL_FAILED', event, command, async () => {
				for (const aggregate of aggregates) {
					await aggregateRegistry.persist(aggregate);
				}
				return null;
			});
		},

		commitStep(step, event, command) {
			return run('COMMIT_FAILED', event, command, () => step(undefined));
		},
	};
}
