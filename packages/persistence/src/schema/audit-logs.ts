/**
 * Audit Logs Schema
 *
 * Who did what: one row per committed command, keyed by the aggregate it
 * touched. Credentials in the command are masked before they get here.
 */

import { pgTable, varchar, jsonb, index } from 'drizzle-orm/pg-core';
import { tsidColumn, timestampColumn } from './common.js';

export const auditLogs = pgTable(
	'audit_logs',
	{
		id: tsidColumn('id').primaryKey(),

		entityType: varchar('entity_type', { length: 50 }).notNull(),
		entityId: tsidColumn('entity_id').notNull(),

		operation: varchar('operation', { length: 100 }).notNull(),
		operationJson: jsonb('operation_json'),

		// User ID, "SYSTEM" for scheduled jobs, "anonymous" for public endpoints
		principalId: varchar('principal_id', { length: 50 }).notNull(),
		correlationId: varchar('correlation_id', { length: 100 }).notNull(),

		performedAt: timestampColumn('performed_at').notNull().defaultNow(),
	},
	(table) => [
		index('idx_audit_logs_entity').on(table.entityType, table.entityId),
		index('idx_audit_logs_principal').on(table.principalId),
		index('idx_audit_logs_performed').on(table.performedAt),
	],
);

export type AuditLogRecord = typeof auditLogs.$inferSelect;

export type NewAuditLog = typeof auditLogs.$inferInsert;
