/**
 * Password Reset Token Entity
 *
 * Only the SHA-256 hash of the emailed token is kept. A token can be used
 * once and only before it expires.
 */

import { generate, typeOf } from '@biotap/tsid';
import type { Aggregate } from '@biotap/domain-core';

export interface PasswordResetToken {
	/** Typed ID ("rst_...") */
	readonly id: string;
	readonly userId: string;
	/** Hex SHA-256 of the token sent by email */
	readonly tokenHash: string;
	readonly createdAt: Date;
	readonly expiresAt: Date;
	readonly isUsed: boolean;
}

export interface CreatePasswordResetTokenInput {
	readonly userId: string;
	readonly tokenHash: string;
	readonly expireMinutes: number;
	readonly now?: Date | undefined;
}

export function createPasswordResetToken(input: CreatePasswordResetTokenInput): PasswordResetToken {
	const createdAt = input.now ?? new Date();
	return {
		id: generate('PASSWORD_RESET_TOKEN'),
		userId: input.userId,
		tokenHash: input.tokenHash,
		createdAt,
		expiresAt: new Date(createdAt.getTime() + input.expireMinutes * 60_000),
		isUsed: false,
	};
}

/**
 * Unused and not yet expired.
 */
export function isRedeemable(token: PasswordResetToken, now: Date = new Date()): boolean {
	return !token.isUsed && token.expiresAt.getTime() > now.getTime();
}

export function isPasswordResetToken(aggregate: Aggregate): aggregate is PasswordResetToken {
	return typeOf(aggregate.id) === 'PASSWORD_RESET_TOKEN';
}
