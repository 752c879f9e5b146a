/**
 * Opaque tokens for emailed links (password reset).
 *
 * Only the SHA-256 hash of a token is stored, so a leaked table cannot be
 * used to reset passwords.
 */

import { createHash, randomBytes } from 'node:crypto';

/**
 * URL-safe random token, 32 bytes of entropy (43 characters).
 */
export function generateSecureToken(bytes = 32): string {
	return randomBytes(bytes).toString('base64url');
}

/**
 * Hex SHA-256 of a token, as stored in the database.
 */
export function hashToken(token: string): string {
	return createHash('sha256').update(token, 'utf8').digest('hex');
}
