/**
 * Links Database Schema
 */

import { pgTable, varchar, boolean, integer, index } from 'drizzle-orm/pg-core';
import { baseEntityColumns, tsidColumn } from '@biotap/persistence';
import { users } from './users.js';

export const links = pgTable(
	'links',
	{
		...baseEntityColumns,
		userId: tsidColumn('user_id')
			.notNull()
			.references(() => users.id, { onDelete: 'cascade' }),
		title: varchar('title', { length: 100 }).notNull(),
		url: varchar('url', { length: 2000 }).notNull(),
		description: varchar('description', { length: 500 }),
		isActive: boolean('is_active').notNull().default(true),
		displayOrder: integer('display_order').notNull().default(0),
		icon: varchar('icon', { length: 50 }),
		clickCount: integer('click_count').notNull().default(0),
	},
	(table) => [
		index('links_user_order_idx').on(table.userId, table.displayOrder),
		index('links_title_idx').on(table.title),
	],
);

export type LinkRecord = typeof links.$inferSelect;
export type NewLinkRecord = typeof links.$inferInsert;
