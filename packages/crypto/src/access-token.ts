/**
 * Access Token Service
 *
 * Issues and verifies HMAC-signed JWT access tokens with `jose`.
 * The subject is the user ID; the username travels as a claim.
 */

import * as jose from 'jose';

export const ACCESS_TOKEN_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type AccessTokenAlgorithm = (typeof ACCESS_TOKEN_ALGORITHMS)[number];

export interface AccessTokenServiceConfig {
	/** HMAC key */
	secret: string;
	/** Default: HS256 */
	algorithm?: AccessTokenAlgorithm | undefined;
	/** Token lifetime in minutes (default: 30) */
	expireMinutes?: number | undefined;
}

export interface AccessTokenClaims {
	/** User ID */
	readonly sub: string;
	readonly username: string;
	/** Expiry, seconds since epoch */
	readonly exp: number;
}

export interface AccessTokenService {
	issue(userId: string, username: string): Promise<string>;
	/**
	 * Returns the claims of a valid token, or null when the token is malformed,
	 * tampered with, signed with another algorithm, or expired.
	 */
	verify(token: string): Promise<AccessTokenClaims | null>;
}

export function isAccessTokenAlgorithm(value: string): value is AccessTokenAlgorithm {
	return ACCESS_TOKEN_ALGORITHMS.some((alg) => alg === value);
}

export function createAccessTokenService(config: AccessTokenServiceConfig): AccessTokenService {
	const { algorithm = 'HS256', expireMinutes = 30 } = config;
	const key = new TextEncoder().encode(config.secret);

	return {
		async issue(userId: string, username: string): Promise<string> {
			return new jose.SignJWT({ username })
				.setProtectedHeader({ alg: algorithm, typ: 'JWT' })
				.setSubject(userId)
				.setIssuedAt()
				.setExpirationTime(`${expireMinutes}m`)
				.sign(key);
		},

		async verify(token: string): Promise<AccessTokenClaims | null> {
			try {
				const { payload } = await jose.jwtVerify(token, key, { algorithms: [algorithm] });
				if (
					typeof payload.sub !== 'string' ||
					typeof payload['username'] !== 'string' ||
					typeof payload.exp !== 'number'
				) {
					return null;
				}
				return { sub: payload.sub, username: payload['username'], exp: payload.exp };
			} catch {
				return null;
			}
		},
	};
}
