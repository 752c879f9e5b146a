/**
 * User Entity
 *
 * An account that owns links. Usernames and emails are unique.
 */

import { generate, typeOf } from '@biotap/tsid';
import type { Aggregate } from '@biotap/domain-core';

export interface User {
	/** Typed ID ("usr_...") */
	readonly id: string;
	readonly username: string;
	readonly email: string;
	readonly fullName: string | null;
	readonly isActive: boolean;
	/** Argon2id PHC string */
	readonly passwordHash: string;
	readonly createdAt: Date;
	readonly updatedAt: Date | null;
}

export const USERNAME_MIN_LENGTH = 3;
export const USERNAME_MAX_LENGTH = 50;
export const FULL_NAME_MAX_LENGTH = 100;

export interface CreateUserInput {
	readonly username: string;
	readonly email: string;
	readonly fullName?: string | null | undefined;
	readonly passwordHash: string;
}

/**
 * Create a new, active user.
 */
export function createUser(input: CreateUserInput): User {
	return {
		id: generate('USER'),
		username: input.username,
		email: input.email,
		fullName: input.fullName ?? null,
		isActive: true,
		passwordHash: input.passwordHash,
		createdAt: new Date(),
		updatedAt: null,
	};
}

export function isUser(aggregate: Aggregate): aggregate is User {
	return typeOf(aggregate.id) === 'USER';
}
