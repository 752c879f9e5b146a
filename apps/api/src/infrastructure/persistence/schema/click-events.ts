/**
 * Click Events Database Schema
 */

import { pgTable, varchar, index } from 'drizzle-orm/pg-core';
import { tsidColumn, timestampColumn } from '@biotap/persistence';
import { links } from './links.js';

export const clickEvents = pgTable(
	'click_events',
	{
		id: tsidColumn('id').primaryKey(),
		linkId: tsidColumn('link_id')
			.notNull()
			.references(() => links.id, { onDelete: 'cascade' }),
		clickedAt: timestampColumn('clicked_at').notNull().defaultNow(),
		ipAddress: varchar('ip_address', { length: 45 }),
		userAgent: varchar('user_agent', { length: 500 }),
		referer: varchar('referer', { length: 500 }),
		country: varchar('country', { length: 2 }),
		deviceType: varchar('device_type', { length: 20 }),
		browser: varchar('browser', { length: 50 }),
	},
	(table) => [index('click_events_link_time_idx').on(table.linkId, table.clickedAt)],
);

export type ClickEventRecord = typeof clickEvents.$inferSelect;
export type NewClickEventRecord = typeof clickEvents.$inferInsert;
