/**
 * Authentication Plugin
 *
 * Resolves `Authorization: Bearer <token>` to a principal on every request.
 * A missing or invalid token leaves the request anonymous; routes that need
 * a user add `requireAuthHook()`.
 */

import type { FastifyPluginAsync, FastifyRequest, preHandlerHookHandler } from 'fastify';
import fp from 'fastify-plugin';
import type { TokenValidator } from '../types.js';
import { errorBody } from '../response.js';

const BEARER = /^bearer\s+(\S+)\s*$/i;

/**
 * Token from an Authorization header; the scheme is case-insensitive.
 */
export function extractBearerToken(header: string | undefined): string | null {
	return BEARER.exec(header ?? '')?.[1] ?? null;
}

export interface AuthenticationPluginOptions {
	readonly validateToken: TokenValidator;
}

const authenticationPluginAsync: FastifyPluginAsync<AuthenticationPluginOptions> = async (fastify, { validateToken }) => {
	fastify.decorateRequest('principal', null);

	fastify.addHook('onRequest', async (request) => {
		const token = extractBearerToken(request.headers.authorization);
		request.principal = token ? await validateToken(token) : null;
	});
};

export const authenticationPlugin = fp(authenticationPluginAsync, {
	name: '@biotap/authentication',
	fastify: '5.x',
});

export function principalIdOf(request: FastifyRequest): string | null {
	return request.principal?.id ?? null;
}

export interface RequireAuthOptions {
	/** Default: 'Authentication required' */
	readonly message?: string;
	/** Sent as WWW-Authenticate with the 401 */
	readonly challenge?: string;
}

/**
 * preHandler answering 401 for anonymous requests.
 */
export function requireAuthHook(options: RequireAuthOptions = {}): preHandlerHookHandler {
	const { message = 'Authentication required', challenge } = options;

	return async (request, reply) => {
		if (request.principal) return;
		if (challenge) reply.header('www-authenticate', challenge);
		return reply.status(401).send(errorBody('UNAUTHORIZED', message));
	};
}
