/**
 * Password Reset Token Repository
 */

import { and, eq, gt } from 'drizzle-orm';
import { resolveDb, type Db, type TransactionContext } from '@biotap/persistence';

import { passwordResetTokens, type PasswordResetTokenRecord } from '../schema/index.js';
import type { PasswordResetToken } from '../../../domain/index.js';

export interface PasswordResetTokenRepository {
	findByTokenHash(tokenHash: string, tx?: TransactionContext): Promise<PasswordResetToken | undefined>;
	/**
	 * Mark the token used if it is still unused and unexpired at `now`.
	 * False when another redemption got there first.
	 */
	claim(id: string, now: Date, tx?: TransactionContext): Promise<boolean>;
	/** Inserts a new token; a stored token only changes through claim */
	persist(entity: PasswordResetToken, tx?: TransactionContext): Promise<PasswordResetToken>;
	delete(entity: PasswordResetToken, tx?: TransactionContext): Promise<boolean>;
}

export function createPasswordResetTokenRepository(defaultDb: Db): PasswordResetTokenRepository {
	const db = (tx?: TransactionContext): Db => resolveDb(defaultDb, tx);

	return {
		async findByTokenHash(tokenHash, tx) {
			const [record] = await db(tx)
				.select()
				.from(passwordResetTokens)
				.where(eq(passwordResetTokens.tokenHash, tokenHash))
				.limit(1);
			return record ? recordToToken(record) : undefined;
		},

		async claim(id, now, tx) {
			const claimed = await db(tx)
				.update(passwordResetTokens)
				.set({ isUsed: true })
				.where(
					and(
						eq(passwordResetTokens.id, id),
						eq(passwordResetTokens.isUsed, false),
						gt(passwordResetTokens.expiresAt, now),
					),
				)
				.returning({ id: passwordResetTokens.id });
			return claimed.length > 0;
		},

		async persist(entity, tx) {
			await db(tx).insert(passwordResetTokens).values(entity).onConflictDoNothing();
			return entity;
		},

		async delete(entity, tx) {
			const deleted = await db(tx)
				.delete(passwordResetTokens)
				.where(eq(passwordResetTokens.id, entity.id))
				.returning({ id: passwordResetTokens.id });
			return deleted.length > 0;
		},
	};
}

function recordToToken(record: PasswordResetTokenRecord): PasswordResetToken {
	return {
		id: record.id,
		userId: record.userId,
		tokenHash: record.tokenHash,
		createdAt: record.createdAt,
		expiresAt: record.expiresAt,
		isUsed: record.isUsed,
	};
}
