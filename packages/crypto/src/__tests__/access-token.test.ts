import { describe, it, expect } from 'vitest';
import * as jose from 'jose';
import { createAccessTokenService, isAccessTokenAlgorithm } from '../access-token.js';

const secret = 'test-secret';

describe('createAccessTokenService', () => {
	it('should issue a token that verifies', async () => {
		const service = createAccessTokenService({ secret, expireMinutes: 30 });
		const before = Math.floor(Date.now() / 1000);

		const token = await service.issue('usr_0HZXEQ5Y8JY5Z', 'alice');
		const claims = await service.verify(token);

		expect(claims?.sub).toBe('usr_0HZXEQ5Y8JY5Z');
		expect(claims?.username).toBe('alice');
		expect(claims?.exp).toBeGreaterThanOrEqual(before + 30 * 60);
		expect(claims?.exp).toBeLessThanOrEqual(before + 30 * 60 + 5);
	});

	it('should use the configured algorithm', async () => {
		const service = createAccessTokenService({ secret, algorithm: 'HS512' });
		const token = await service.issue('usr_1', 'bob');

		expect(jose.decodeProtectedHeader(token).alg).toBe('HS512');
	});

	it('should reject a token signed with another key', async () => {
		const other = createAccessTokenService({ secret: 'other-secret' });
		const service = createAccessTokenService({ secret });

		expect(await service.verify(await other.issue('usr_1', 'bob'))).toBeNull();
	});

	it('should reject a token signed with another algorithm', async () => {
		const hs384 = createAccessTokenService({ secret, algorithm: 'HS384' });
		const hs256 = createAccessTokenService({ secret, algorithm: 'HS256' });

		expect(await hs256.verify(await hs384.issue('usr_1', 'bob'))).toBeNull();
	});

	it('should reject an expired token', async () => {
		const key = new TextEncoder().encode(secret);
		const expired = await new jose.SignJWT({ username: 'bob' })
			.setProtectedHeader({ alg: 'HS256' })
			.setSubject('usr_1')
			.setExpirationTime(Math.floor(Date.now() / 1000) - 60)
			.sign(key);

		expect(await createAccessTokenService({ secret }).verify(expired)).toBeNull();
	});

	it('should reject a token without a username claim', async () => {
		const key = new TextEncoder().encode(secret);
		const token = await new jose.SignJWT({})
			.setProtectedHeader({ alg: 'HS256' })
			.setSubject('usr_1')
			.setExpirationTime('5m')
			.sign(key);

		expect(await createAccessTokenService({ secret }).verify(token)).toBeNull();
	});

	it('should reject garbage', async () => {
		expect(await createAccessTokenService({ secret }).verify('not.a.jwt')).toBeNull();
	});
});

describe('isAccessTokenAlgorithm', () => {
	it('should accept HMAC algorithms only', () => {
		expect(isAccessTokenAlgorithm('HS384')).toBe(true);
		expect(isAccessTokenAlgorithm('RS256')).toBe(false);
	});
});
