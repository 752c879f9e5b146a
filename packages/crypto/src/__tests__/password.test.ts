import { describe, it, expect } from 'vitest';
import { PasswordService } from '../password.js';

describe('PasswordService', () => {
	// Cheap parameters keep the suite fast
	const service = new PasswordService({ memoryCost: 1024, timeCost: 2, parallelism: 1 });

	describe('hash and verify', () => {
		it('should hash and verify a password', async () => {
			const password = 'correct horse';
			const hashResult = await service.hash(password);

			expect(hashResult.isOk()).toBe(true);
			const hash = hashResult._unsafeUnwrap();

			expect(hash).toMatch(/^\$argon2id\$v=19\$m=1024,t=2,p=1\$/);
			expect(await service.verify(password, hash)).toBe(true);
		});

		it('should reject wrong password', async () => {
			const hash = (await service.hash('correct horse'))._unsafeUnwrap();
			expect(await service.verify('wrong horse', hash)).toBe(false);
		});

		it('should produce different hashes for same password', async () => {
			const hash1 = (await service.hash('same-password'))._unsafeUnwrap();
			const hash2 = (await service.hash('same-password'))._unsafeUnwrap();
			expect(hash1).not.toBe(hash2);
		});

		it('should return false for a malformed hash', async () => {
			expect(await service.verify('anything', 'not-a-hash')).toBe(false);
		});
	});

	describe('needsRehash', () => {
		it('should flag hashes made with other parameters', async () => {
			const hash = (await service.hash('rehash-me'))._unsafeUnwrap();
			const stronger = new PasswordService({ memoryCost: 2048, timeCost: 2, parallelism: 1 });

			expect(service.needsRehash(hash)).toBe(false);
			expect(stronger.needsRehash(hash)).toBe(true);
		});
	});

	describe('validateComplexity', () => {
		it('should accept 8 and 100 character passwords', () => {
			expect(service.validateComplexity('a'.repeat(8)).isOk()).toBe(true);
			expect(service.validateComplexity('a'.repeat(100)).isOk()).toBe(true);
		});

		it('should reject a password that is too short', () => {
			const error = service.validateComplexity('short', 'new_password')._unsafeUnwrapErr();
			expect(error).toEqual({
				type: 'validation',
				code: 'PASSWORD_TOO_SHORT',
				field: 'new_password',
				message: 'Password must be at least 8 characters',
			});
		});

		it('should reject a password that is too long', () => {
			const error = service.validateComplexity('a'.repeat(101))._unsafeUnwrapErr();
			expect(error.type).toBe('validation');
			expect(error.message).toBe('Password must be at most 100 characters');
		});
	});

	describe('validateAndHash', () => {
		it('should not hash an invalid password', async () => {
			const result = await service.validateAndHash('short');
			expect(result.isErr()).toBe(true);
			expect(result._unsafeUnwrapErr().type).toBe('validation');
		});

		it('should hash a valid password', async () => {
			const result = await service.validateAndHash('long enough');
			expect(result._unsafeUnwrap()).toMatch(/^\$argon2id\$/);
		});
	});
});
