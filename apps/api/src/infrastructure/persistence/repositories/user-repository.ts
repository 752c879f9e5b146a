/**
 * User Repository
 *
 * Data access for User entities. Deleting a user cascades to their links,
 * click events, reset tokens and email logs through foreign keys.
 */

import { eq, sql, type SQL } from 'drizzle-orm';
import { resolveDb, type Db, type TransactionContext } from '@biotap/persistence';

import { users, type UserRecord, type NewUserRecord } from '../schema/index.js';
import type { User } from '../../../domain/index.js';

export interface UserRepository {
	findById(id: string, tx?: TransactionContext): Promise<User | undefined>;
	findByUsername(username: string, tx?: TransactionContext): Promise<User | undefined>;
	findByEmail(email: string, tx?: TransactionContext): Promise<User | undefined>;
	findActive(tx?: TransactionContext): Promise<User[]>;
	exists(id: string, tx?: TransactionContext): Promise<boolean>;
	persist(entity: User, tx?: TransactionContext): Promise<User>;
	delete(entity: User, tx?: TransactionContext): Promise<boolean>;
}

export function createUserRepository(defaultDb: Db): UserRepository {
	const db = (tx?: TransactionContext): Db => resolveDb(defaultDb, tx);

	async function findOne(where: SQL, tx?: TransactionContext): Promise<User | undefined> {
		const [record] = await db(tx).select().from(users).where(where).limit(1);
		return record ? recordToUser(record) : undefined;
	}

	return {
		findById(id, tx) {
			return findOne(eq(users.id, id), tx);
		},

		findByUsername(username, tx) {
			return findOne(eq(users.username, username), tx);
		},

		findByEmail(email, tx) {
			return findOne(eq(users.email, email), tx);
		},

		async findActive(tx) {
			const records = await db(tx).select().from(users).where(eq(users.isActive, true)).orderBy(users.id);
			return records.map(recordToUser);
		},

		async exists(id, tx) {
			const [result] = await db(tx)
				.select({ count: sql<number>`count(*)` })
				.from(users)
				.where(eq(users.id, id));
			return Number(result?.count ?? 0) > 0;
		},

		async persist(entity, tx) {
			if (await this.exists(entity.id, tx)) {
				await db(tx)
					.update(users)
					.set({
						username: entity.username,
						email: entity.email,
						fullName: entity.fullName,
						isActive: entity.isActive,
						passwordHash: entity.passwordHash,
						updatedAt: entity.updatedAt,
					})
					.where(eq(users.id, entity.id));
			} else {
				await db(tx).insert(users).values(userToRecord(entity));
			}
			return entity;
		},

		async delete(entity, tx) {
			const deleted = await db(tx).delete(users).where(eq(users.id, entity.id)).returning({ id: users.id });
			return deleted.length > 0;
		},
	};
}

function userToRecord(user: User): NewUserRecord {
	return {
		id: user.id,
		username: user.username,
		email: user.email,
		fullName: user.fullName,
		isActive: user.isActive,
		passwordHash: user.passwordHash,
		createdAt: user.createdAt,
		updatedAt: user.updatedAt,
	};
}

function recordToUser(record: UserRecord): User {
	return {
		id: record.id,
		username: record.username,
		email: record.email,
		fullName: record.fullName,
		isActive: record.isActive,
		passwordHash: record.passwordHash,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
	};
}
