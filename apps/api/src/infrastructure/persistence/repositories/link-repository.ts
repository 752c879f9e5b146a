/**
 * Link Repository
 *
 * Data access for Link entities.
 */

import { and, asc, desc, eq, sql } from 'drizzle-orm';
import { resolveDb, type Db, type TransactionContext } from '@biotap/persistence';

import { links, type LinkRecord, type NewLinkRecord } from '../schema/index.js';
import type { Link } from '../../../domain/index.js';

export interface LinkPage {
	readonly skip?: number | undefined;
	readonly limit?: number | undefined;
}

export interface LinkRepository {
	findById(id: string, tx?: TransactionContext): Promise<Link | undefined>;
	/** All of a user's links in display order */
	findByUser(userId: string, page?: LinkPage, tx?: TransactionContext): Promise<Link[]>;
	/** Active links only, in display order */
	findActiveByUser(userId: string, tx?: TransactionContext): Promise<Link[]>;
	exists(id: string, tx?: TransactionContext): Promise<boolean>;
	/**
	 * Add one click to an active link in a single statement. Resolves to the
	 * new count, or undefined when the link is gone or inactive.
	 */
	incrementClickCount(id: string, tx?: TransactionContext): Promise<number | undefined>;
	/** Writes everything but the click count, which only increments */
	persist(entity: Link, tx?: TransactionContext): Promise<Link>;
	delete(entity: Link, tx?: TransactionContext): Promise<boolean>;
}

export function createLinkRepository(defaultDb: Db): LinkRepository {
	const db = (tx?: TransactionContext): Db => resolveDb(defaultDb, tx);

	return {
		async findById(id, tx) {
			const [record] = await db(tx).select().from(links).where(eq(links.id, id)).limit(1);
			return record ? recordToLink(record) : undefined;
		},

		async findByUser(userId, page = {}, tx) {
			const query = db(tx)
				.select()
				.from(links)
				.where(eq(links.userId, userId))
				.orderBy(asc(links.displayOrder), desc(links.createdAt))
				.offset(page.skip ?? 0)
				.$dynamic();

			const records = page.limit === undefined ? await query : await query.limit(page.limit);
			return records.map(recordToLink);
		},

		async findActiveByUser(userId, tx) {
			const records = await db(tx)
				.select()
				.from(links)
				.where(and(eq(links.userId, userId), eq(links.isActive, true)))
				.orderBy(asc(links.displayOrder), desc(links.createdAt));
			return records.map(recordToLink);
		},

		async exists(id, tx) {
			const [result] = await db(tx)
				.select({ count: sql<number>`count(*)` })
				.from(links)
				.where(eq(links.id, id));
			return Number(result?.count ?? 0) > 0;
		},

		async incrementClickCount(id, tx) {
			const [result] = await db(tx)
				.update(links)
				.set({ clickCount: sql`${links.clickCount} + 1` })
				.where(and(eq(links.id, id), eq(links.isActive, true)))
				.returning({ clickCount: links.clickCount });
			return result?.clickCount;
		},

		async persist(entity, tx) {
			if (await this.exists(entity.id, tx)) {
				await db(tx)
					.update(links)
					.set({
						title: entity.title,
						url: entity.url,
						description: entity.description,
						isActive: entity.isActive,
						displayOrder: entity.displayOrder,
						icon: entity.icon,
						updatedAt: entity.updatedAt,
					})
					.where(eq(links.id, entity.id));
			} else {
				await db(tx).insert(links).values(linkToRecord(entity));
			}
			return entity;
		},

		async delete(entity, tx) {
			const deleted = await db(tx).delete(links).where(eq(links.id, entity.id)).returning({ id: links.id });
			return deleted.length > 0;
		},
	};
}

function linkToRecord(link: Link): NewLinkRecord {
	return {
		id: link.id,
		userId: link.userId,
		title: link.title,
		url: link.url,
		description: link.description,
		isActive: link.isActive,
		displayOrder: link.displayOrder,
		icon: link.icon,
		clickCount: link.clickCount,
		createdAt: link.createdAt,
		updatedAt: link.updatedAt,
	};
}

function recordToLink(record: LinkRecord): Link {
	return {
		id: record.id,
		userId: record.userId,
		title: record.title,
		url: record.url,
		description: record.description,
		isActive: record.isActive,
		displayOrder: record.displayOrder,
		icon: record.icon,
		clickCount: record.clickCount,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
	};
}
