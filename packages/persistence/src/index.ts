/**
 * @biotap/persistence
 *
 * Postgres through drizzle: the connection, transactions, and the unit of
 * work that writes an aggregate together with its event and audit log row.
 * The direct unit of work skips the database tables and serves tests.
 *
 * @example
 * ```typescript
 * const database = createDatabase({ url: env.DATABASE_URL });
 * const transactionManager = createTransactionManager(database.db);
 *
 * const aggregateRegistry = createAggregateRegistry();
 * aggregateRegistry.register(createAggregateHandler('USER', isUser, userRepository));
 *
 * const unitOfWork = createDrizzleUnitOfWork({ transactionManager, aggregateRegistry });
 * const result = await unitOfWork.commit(user, userRegistered, command);
 * ```
 */

// Database connection
export { createDatabase, type Database, type DatabaseConfig } from './connection.js';

// Transaction management
export {
	createTransactionManager,
	resolveDb,
	type Db,
	type TransactionContext,
	type TransactionManager,
} from './transaction.js';

// Aggregate registry
export {
	createAggregateRegistry,
	createAggregateHandler,
	type AggregateRegistry,
	type AggregateHandler,
} from './aggregate-registry.js';

// Unit of Work
export {
	createDrizzleUnitOfWork,
	createDirectUnitOfWork,
	type TransactionalUnitOfWork,
	type DrizzleUnitOfWorkConfig,
	type DirectUnitOfWorkConfig,
} from './unit-of-work.js';

// Schema definitions
export {
	tsidColumn,
	timestampColumn,
	baseEntityColumns,
	events,
	type EventRecord,
	auditLogs,
	type AuditLogRecord,
} from './schema/index.js';
