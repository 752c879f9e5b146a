/**
 * Events Schema
 *
 * Append-only log of domain events. A row is written in the transaction
 * that made the change, so the log never runs ahead of the data.
 */

import { pgTable, varchar, jsonb, index } from 'drizzle-orm/pg-core';
import { tsidColumn, timestampColumn } from './common.js';

export const events = pgTable(
	'events',
	{
		id: tsidColumn('id').primaryKey(),
		type: varchar('type', { length: 100 }).notNull(),

		aggregateType: varchar('aggregate_type', { length: 50 }).notNull(),
		aggregateId: tsidColumn('aggregate_id').notNull(),

		data: jsonb('data'),

		principalId: varchar('principal_id', { length: 50 }).notNull(),
		executionId: varchar('execution_id', { length: 50 }).notNull(),
		correlationId: varchar('correlation_id', { length: 100 }).notNull(),
		causationId: varchar('causation_id', { length: 100 }),

		occurredAt: timestampColumn('occurred_at').notNull(),
	},
	(table) => [
		index('idx_events_aggregate').on(table.aggregateType, table.aggregateId),
		index('idx_events_type').on(table.type),
		index('idx_events_occurred').on(table.occurredAt),
		index('idx_events_correlation').on(table.correlationId),
	],
);

export type EventRecord = typeof events.$inferSelect;

export type NewEvent = typeof events.$inferInsert;
