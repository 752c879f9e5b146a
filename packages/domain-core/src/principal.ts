/**
 * Who an operation runs as. Requests with a valid bearer token run as that
 * user; scheduled jobs run as the system principal.
 */

export type PrincipalType = 'USER' | 'SYSTEM';

export interface PrincipalInfo {
	/** User ID, or SYSTEM */
	readonly id: string;
	readonly type: PrincipalType;
	/** Username, or "System" */
	readonly name: string;
}

export const SYSTEM_PRINCIPAL: PrincipalInfo = { id: 'SYSTEM', type: 'SYSTEM', name: 'System' };

export function userPrincipal(userId: string, username: string): PrincipalInfo {
	return { id: userId, type: 'USER', name: username };
}
