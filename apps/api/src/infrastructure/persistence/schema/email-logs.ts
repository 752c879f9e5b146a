/**
 * Email Logs Database Schema
 */

import { pgTable, varchar, boolean, text, index } from 'drizzle-orm/pg-core';
import { tsidColumn, timestampColumn } from '@biotap/persistence';
import { users } from './users.js';

export const emailLogs = pgTable(
	'email_logs',
	{
		id: tsidColumn('id').primaryKey(),
		userId: tsidColumn('user_id')
			.notNull()
			.references(() => users.id, { onDelete: 'cascade' }),
		emailType: varchar('email_type', { length: 30 }).notNull(),
		recipientEmail: varchar('recipient_email', { length: 255 }).notNull(),
		subject: varchar('subject', { length: 255 }).notNull(),
		sentAt: timestampColumn('sent_at').notNull().defaultNow(),
		success: boolean('success').notNull().default(true),
		errorMessage: text('error_message'),
		analyticsPeriodStart: timestampColumn('analytics_period_start'),
		analyticsPeriodEnd: timestampColumn('analytics_period_end'),
	},
	(table) => [
		index('email_logs_recipient_idx').on(table.recipientEmail),
		index('email_logs_type_sent_idx').on(table.emailType, table.sentAt),
	],
);

export type EmailLogRecord = typeof emailLogs.$inferSelect;
export type NewEmailLogRecord = typeof emailLogs.$inferInsert;
