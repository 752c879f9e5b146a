/**
 * @biotap/crypto
 *
 * Cryptographic services for BioTap:
 * - Argon2id password hashing
 * - HMAC JWT access tokens
 * - Opaque reset tokens and their hashes
 */

// Password hashing
export {
	PasswordService,
	DEFAULT_HASHING_OPTIONS,
	PASSWORD_MIN_LENGTH,
	PASSWORD_MAX_LENGTH,
	type PasswordHashingOptions,
	type PasswordError,
} from './password.js';

// Access tokens
export {
	createAccessTokenService,
	isAccessTokenAlgorithm,
	ACCESS_TOKEN_ALGORITHMS,
	type AccessTokenService,
	type AccessTokenServiceConfig,
	type AccessTokenAlgorithm,
	type AccessTokenClaims,
} from './access-token.js';

// Opaque tokens
export { generateSecureToken, hashToken } from './tokens.js';
