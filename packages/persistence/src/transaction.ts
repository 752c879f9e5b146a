/**
 * Transaction Management
 *
 * Transaction context and utilities for atomic database operations.
 * Uses postgres.js transactions with DrizzleORM.
 */

import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';

/**
 * A drizzle handle over postgres.js: either the pooled database or an open
 * transaction.
 */
export type Db = PgDatabase<PostgresJsQueryResultHKT>;

/**
 * Transaction context passed to repository operations.
 */
export interface TransactionContext {
	/** DrizzleORM database scoped to this transaction */
	readonly db: Db;
}

export interface TransactionManager {
	/**
	 * Run `fn` in a transaction. Commits when it resolves; rolls back and
	 * rethrows when it throws.
	 */
	inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T>;

	/** Database for non-transactional queries */
	readonly db: Db;
}

export function createTransactionManager(db: Db): TransactionManager {
	return {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
			return db.transaction(async (tx) => fn({ db: tx }));
		},
	};
}

/**
 * The transaction's database when there is one, otherwise the default.
 */
export function resolveDb(defaultDb: Db, tx?: TransactionContext): Db {
	return tx?.db ?? defaultDb;
}
