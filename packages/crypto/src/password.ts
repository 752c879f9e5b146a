/**
 * Argon2id Password Hashing Service
 *
 * Default parameters follow the OWASP recommendation for Argon2id:
 * - Memory cost: 65536 KiB (64 MiB)
 * - Time cost: 3 iterations
 * - Parallelism: 4 threads
 * - Hash length: 32 bytes
 *
 * Output format: PHC string
 * $argon2id$v=19$m=65536,t=3,p=4$<salt>$<hash>
 */

import argon2 from 'argon2';
import { Result, ok, err, ResultAsync, errAsync } from 'neverthrow';

export interface PasswordHashingOptions {
	memoryCost: number;
	timeCost: number;
	parallelism: number;
	hashLength: number;
}

export const DEFAULT_HASHING_OPTIONS: PasswordHashingOptions = {
	memoryCost: 65536,
	timeCost: 3,
	parallelism: 4,
	hashLength: 32,
};

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 100;

export type PasswordError =
	| { type: 'validation'; code: 'PASSWORD_TOO_SHORT' | 'PASSWORD_TOO_LONG'; field: string; message: string }
	| { type: 'hashing_failed'; message: string; cause?: Error | undefined };

/**
 * Argon2id Password Hashing Service
 */
export class PasswordService {
	private readonly options: PasswordHashingOptions;

	constructor(options: Partial<PasswordHashingOptions> = {}) {
		this.options = { ...DEFAULT_HASHING_OPTIONS, ...options };
	}

	/**
	 * Hash a password using Argon2id.
	 *
	 * @returns PHC format hash string
	 */
	hash(password: string): ResultAsync<string, PasswordError> {
		return ResultAsync.fromPromise(argon2.hash(password, { ...this.options, type: argon2.argon2id }), (e) => ({
			type: 'hashing_failed' as const,
			message: `Password hashing failed: ${e instanceof Error ? e.message : String(e)}`,
			cause: e instanceof Error ? e : undefined,
		}));
	}

	/**
	 * Verify a password against a stored hash. A malformed hash never matches.
	 */
	async verify(password: string, hash: string): Promise<boolean> {
		try {
			return await argon2.verify(hash, password);
		} catch {
			return false;
		}
	}

	/**
	 * Check if a hash was produced with other parameters than the current ones.
	 */
	needsRehash(hash: string): boolean {
		try {
			return argon2.needsRehash(hash, this.options);
		} catch {
			return true;
		}
	}

	/**
	 * Passwords must be 8-100 characters long.
	 */
	validateComplexity(password: string, field = 'password'): Result<void, PasswordError> {
		if (password.length < PASSWORD_MIN_LENGTH) {
			return err({
				type: 'validation',
				code: 'PASSWORD_TOO_SHORT',
				field,
				message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters`,
			});
		}

		if (password.length > PASSWORD_MAX_LENGTH) {
			return err({
				type: 'validation',
				code: 'PASSWORD_TOO_LONG',
				field,
				message: `Password must be at most ${PASSWORD_MAX_LENGTH} characters`,
			});
		}

		return ok(undefined);
	}

	/**
	 * Validate length and hash the password if valid.
	 */
	validateAndHash(password: string, field = 'password'): ResultAsync<string, PasswordError> {
		const validationResult = this.validateComplexity(password, field);
		if (validationResult.isErr()) {
			return errAsync(validationResult.error);
		}
		return this.hash(password);
	}
}
