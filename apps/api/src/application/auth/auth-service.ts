/**
 * Auth Service
 *
 * Password login and bearer token resolution. These are reads, so they do
 * not go through a use case or the unit of work.
 */

import { userPrincipal, type PrincipalInfo } from '@biotap/domain-core';
import type { AccessTokenService, PasswordService } from '@biotap/crypto';

import type { UserRepository } from '../../infrastructure/persistence/index.js';
import type { User } from '../../domain/index.js';

export interface AuthServiceDeps {
	readonly userRepository: UserRepository;
	readonly passwordService: PasswordService;
	readonly accessTokens: AccessTokenService;
}

export interface AccessToken {
	readonly accessToken: string;
	readonly tokenType: 'bearer';
}

export type CurrentUserResolution =
	| { readonly status: 'active'; readonly user: User }
	| { readonly status: 'inactive'; readonly user: User }
	| { readonly status: 'unknown' };

export interface AuthService {
	/**
	 * Token for valid credentials of an active user. Unknown users, inactive
	 * users and wrong passwords all give null.
	 */
	login(username: string, password: string): Promise<AccessToken | null>;
	/** Principal named by a valid token, without touching the database */
	authenticate(token: string): Promise<PrincipalInfo | null>;
	resolveCurrentUser(userId: string): Promise<CurrentUserResolution>;
}

export function createAuthService(deps: AuthServiceDeps): AuthService {
	const { userRepository, passwordService, accessTokens } = deps;

	return {
		async login(username, password) {
			const user = await userRepository.findByUsername(username);
			if (!user || !user.isActive) {
				return null;
			}
			if (!(await passwordService.verify(password, user.passwordHash))) {
				return null;
			}

			return {
				accessToken: await accessTokens.issue(user.id, user.username),
				tokenType: 'bearer',
			};
		},

		async authenticate(token) {
			const claims = await accessTokens.verify(token);
			return claims ? userPrincipal(claims.sub, claims.username) : null;
		},

		async resolveCurrentUser(userId) {
			const user = await userRepository.findById(userId);
			if (!user) {
				return { status: 'unknown' };
			}
			return user.isActive ? { status: 'active', user } : { status: 'inactive', user };
		},
	};
}
