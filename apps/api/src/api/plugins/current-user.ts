/**
 * Current User
 *
 * Loads the account behind an authenticated request. The authentication
 * plugin has already checked the token; this resolves its subject to an active user.
 */

import type { FastifyPluginAsync, FastifyRequest, preHandlerHookHandler } from 'fastify';
import fp from 'fastify-plugin';
import { errorBody, principalIdOf, requireAuthHook } from '@biotap/http';

import type { AuthService } from '../../application/auth/index.js';
import type { User } from '../../domain/index.js';

export const CREDENTIALS_MESSAGE = 'Could not validate credentials';

declare module 'fastify' {
	interface FastifyRequest {
		/** Set by loadCurrentUser() on authenticated routes */
		currentUser: User | null;
	}
}

const currentUserPluginAsync: FastifyPluginAsync = async (fastify) => {
	fastify.decorateRequest('currentUser', null);
};

export const currentUserPlugin = fp(currentUserPluginAsync, {
	name: 'biotap-current-user',
	fastify: '5.x',
});

/**
 * preHandler that resolves the principal to an active user. Unknown users
 * get 401, inactive ones 400.
 */
export function loadCurrentUser(authService: AuthService): preHandlerHookHandler {
	return async (request, reply) => {
		const principalId = principalIdOf(request);
		const resolution = principalId ? await authService.resolveCurrentUser(principalId) : { status: 'unknown' as const };

		switch (resolution.status) {
			case 'active':
				request.currentUser = resolution.user;
				return;
			case 'inactive':
				return reply.status(400).send(errorBody('INACTIVE_USER', 'Inactive user'));
			case 'unknown':
				reply.header('www-authenticate', 'Bearer');
				return reply.status(401).send(errorBody('UNAUTHORIZED', CREDENTIALS_MESSAGE));
		}
	};
}

/**
 * preHandlers for routes that need an active, logged in user.
 */
export function authenticate(authService: AuthService): preHandlerHookHandler[] {
	return [requireAuthHook({ message: CREDENTIALS_MESSAGE, challenge: 'Bearer' }), loadCurrentUser(authService)];
}

/**
 * The user loaded for this request.
 *
 * @throws Error when the route did not run loadCurrentUser()
 */
export function requireCurrentUser(request: FastifyRequest): User {
	if (!request.currentUser) {
		throw new Error('Current user not loaded for this route');
	}
	return request.currentUser;
}
