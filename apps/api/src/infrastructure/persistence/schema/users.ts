/**
 * Users Database Schema
 */

import { pgTable, varchar, boolean, index } from 'drizzle-orm/pg-core';
import { baseEntityColumns } from '@biotap/persistence';

export const users = pgTable(
	'users',
	{
		...baseEntityColumns,
		username: varchar('username', { length: 50 }).notNull().unique(),
		email: varchar('email', { length: 255 }).notNull().unique(),
		fullName: varchar('full_name', { length: 100 }),
		isActive: boolean('is_active').notNull().default(true),
		passwordHash: varchar('password_hash', { length: 255 }).notNull(),
	},
	(table) => [index('users_active_idx').on(table.isActive)],
);

export type UserRecord = typeof users.$inferSelect;
export type NewUserRecord = typeof users.$inferInsert;
