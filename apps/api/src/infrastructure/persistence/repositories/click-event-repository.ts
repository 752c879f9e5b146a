/**
 * Click Event Repository
 *
 * Click events are written together with their link. Analytics reads them
 * back only as counts grouped in the database.
 */

import { and, count, countDistinct, eq, gte, inArray, isNotNull, lt, lte, sql, type SQL } from 'drizzle-orm';
import { resolveDb, type Db, type TransactionContext } from '@biotap/persistence';

import { clickEvents } from '../schema/index.js';
import { isDeviceType, type ClickEvent, type DeviceType } from '../../../domain/index.js';

/**
 * Which clicks to count: those on `linkIds` from `since` on.
 */
export interface ClickQuery {
	readonly linkIds: readonly string[];
	readonly since: Date;
	/** Inclusive upper bound */
	readonly until?: Date | undefined;
	/** Exclusive upper bound */
	readonly before?: Date | undefined;
	/** Only clicks with a resolved country */
	readonly located?: boolean | undefined;
}

export interface ClickTotals {
	readonly clicks: number;
	/** Distinct non-null IP addresses */
	readonly uniqueVisitors: number;
}

export interface DayCount {
	/** UTC date, YYYY-MM-DD */
	readonly date: string;
	readonly clicks: number;
}

export interface LinkClickCount {
	readonly linkId: string;
	readonly clicks: number;
}

export interface DeviceClickCount {
	readonly deviceType: DeviceType;
	readonly clicks: number;
}

export interface CountryClickCount {
	readonly country: string;
	readonly clicks: number;
	readonly uniqueVisitors: number;
}

export interface ClickEventRepository {
	countClicks(query: ClickQuery, tx?: TransactionContext): Promise<ClickTotals>;
	/** Oldest date first; days without clicks are left out */
	countByDay(query: ClickQuery, tx?: TransactionContext): Promise<DayCount[]>;
	/** Links without clicks are left out */
	countByLink(query: ClickQuery, tx?: TransactionContext): Promise<LinkClickCount[]>;
	/** Clicks with a known device type */
	countByDevice(query: ClickQuery, tx?: TransactionContext): Promise<DeviceClickCount[]>;
	/** Clicks with a resolved country */
	countByCountry(query: ClickQuery, tx?: TransactionContext): Promise<CountryClickCount[]>;
	persist(entity: ClickEvent, tx?: TransactionContext): Promise<ClickEvent>;
	delete(entity: ClickEvent, tx?: TransactionContext): Promise<boolean>;
}

const NO_CLICKS: ClickTotals = Object.freeze({ clicks: 0, uniqueVisitors: 0 });

const clickDay = sql<string>`to_char(${clickEvents.clickedAt} at time zone 'UTC', 'YYYY-MM-DD')`;

function matching(query: ClickQuery): SQL | undefined {
	return and(
		inArray(clickEvents.linkId, [...query.linkIds]),
		gte(clickEvents.clickedAt, query.since),
		query.until ? lte(clickEvents.clickedAt, query.until) : undefined,
		query.before ? lt(clickEvents.clickedAt, query.before) : undefined,
		query.located ? isNotNull(clickEvents.country) : undefined,
	);
}

export function createClickEventRepository(defaultDb: Db): ClickEventRepository {
	const db = (tx?: TransactionContext): Db => resolveDb(defaultDb, tx);

	return {
		async countClicks(query, tx) {
			if (query.linkIds.length === 0) return NO_CLICKS;

			const [totals] = await db(tx)
				.select({ clicks: count(), uniqueVisitors: countDistinct(clickEvents.ipAddress) })
				.from(clickEvents)
				.where(matching(query));
			return totals ?? NO_CLICKS;
		},

		async countByDay(query, tx) {
			if (query.linkIds.length === 0) return [];

			return db(tx)
				.select({ date: clickDay, clicks: count() })
				.from(clickEvents)
				.where(matching(query))
				.groupBy(clickDay)
				.orderBy(clickDay);
		},

		async countByLink(query, tx) {
			if (query.linkIds.length === 0) return [];

			return db(tx)
				.select({ linkId: clickEvents.linkId, clicks: count() })
				.from(clickEvents)
				.where(matching(query))
				.groupBy(clickEvents.linkId);
		},

		async countByDevice(query, tx) {
			if (query.linkIds.length === 0) return [];

			const rows = await db(tx)
				.select({ deviceType: clickEvents.deviceType, clicks: count() })
				.from(clickEvents)
				.where(and(matching(query), isNotNull(clickEvents.deviceType)))
				.groupBy(clickEvents.deviceType);

			return rows.flatMap(({ deviceType, clicks }) =>
				deviceType !== null && isDeviceType(deviceType) ? [{ deviceType, clicks }] : [],
			);
		},

		async countByCountry(query, tx) {
			if (query.linkIds.length === 0) return [];

			const rows = await db(tx)
				.select({
					country: clickEvents.country,
					clicks: count(),
					uniqueVisitors: countDistinct(clickEvents.ipAddress),
				})
				.from(clickEvents)
				.where(and(matching(query), isNotNull(clickEvents.country)))
				.groupBy(clickEvents.country);

			return rows.flatMap(({ country, clicks, uniqueVisitors }) =>
				country === null ? [] : [{ country, clicks, uniqueVisitors }],
			);
		},

		async persist(entity, tx) {
			// Click events are immutable once recorded
			await db(tx).insert(clickEvents).values(entity).onConflictDoNothing();
			return entity;
		},

		async delete(entity, tx) {
			const deleted = await db(tx)
				.delete(clickEvents)
				.where(eq(clickEvents.id, entity.id))
				.returning({ id: clickEvents.id });
			return deleted.length > 0;
		},
	};
}
