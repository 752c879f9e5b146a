/**
 * Column helpers shared by every table.
 */

import { varchar, timestamp } from 'drizzle-orm/pg-core';

/** Typed ID such as "lnk_0HZXEQ5Y8JY5Z": 3 + 1 + 13 characters */
export const tsidColumn = (name: string) => varchar(name, { length: 17 });

/** timestamptz, read as a Date */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

/**
 * Columns shared by mutable entities. `updated_at` stays null until the
 * first update.
 */
export const baseEntityColumns = {
	id: tsidColumn('id').primaryKey(),
	createdAt: timestampColumn('created_at').notNull().defaultNow(),
	updatedAt: timestampColumn('updated_at'),
};
