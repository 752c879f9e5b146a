/**
 * Password Reset Tokens Database Schema
 */

import { pgTable, varchar, boolean, index } from 'drizzle-orm/pg-core';
import { tsidColumn, timestampColumn } from '@biotap/persistence';
import { users } from './users.js';

export const passwordResetTokens = pgTable(
	'password_reset_tokens',
	{
		id: tsidColumn('id').primaryKey(),
		userId: tsidColumn('user_id')
			.notNull()
			.references(() => users.id, { onDelete: 'cascade' }),
		tokenHash: varchar('token_hash', { length: 64 }).notNull(),
		createdAt: timestampColumn('created_at').notNull().defaultNow(),
		expiresAt: timestampColumn('expires_at').notNull(),
		isUsed: boolean('is_used').notNull().default(false),
	},
	(table) => [index('password_reset_tokens_hash_idx').on(table.tokenHash)],
);

export type PasswordResetTokenRecord = typeof passwordResetTokens.$inferSelect;
export type NewPasswordResetTokenRecord = typeof passwordResetTokens.$inferInsert;
