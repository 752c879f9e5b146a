/**
 * Rate Limiting
 *
 * Fixed one-minute windows per client IP, kept in memory with
 * rate-limiter-flexible. The client is the socket's peer address;
 * forwarding headers are ignored here since any caller can set them. A route sets its own limit with
 * `config: { rateLimit: n }`; every other route gets the default.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { errorBody } from '@biotap/http';

const WINDOW_SECONDS = 60;

declare module 'fastify' {
	interface FastifyContextConfig {
		/** Requests per minute per client IP */
		rateLimit?: number;
	}
}

export interface RateLimitPluginOptions {
	/** Requests per minute for routes without their own limit */
	readonly defaultLimit: number;
}

const rateLimitPluginAsync: FastifyPluginAsync<RateLimitPluginOptions> = async (fastify, opts) => {
	const limiters = new Map<number, RateLimiterMemory>();

	function limiterFor(points: number): RateLimiterMemory {
		let limiter = limiters.get(points);
		if (!limiter) {
			limiter = new RateLimiterMemory({ points, duration: WINDOW_SECONDS, keyPrefix: `rl${points}` });
			limiters.set(points, limiter);
		}
		return limiter;
	}

	fastify.addHook('onRequest', async (request, reply) => {
		const limit = request.routeOptions.config.rateLimit ?? opts.defaultLimit;
		const route = request.routeOptions.url ?? '*';
		const ip = request.socket.remoteAddress ?? 'unknown';

		try {
			await limiterFor(limit).consume(`${request.method} ${route}|${ip}`);
		} catch (rejection) {
			if (!(rejection instanceof RateLimiterRes)) {
				throw rejection;
			}

			request.log.warn({ ip, route, limit }, 'Rate limit exceeded');
			return reply
				.status(429)
				.header('retry-after', String(Math.max(1, Math.ceil(rejection.msBeforeNext / 1000))))
				.send(errorBody('RATE_LIMITED', `Rate limit exceeded: ${limit} per 1 minute`));
		}
	});
};

export const rateLimitPlugin = fp(rateLimitPluginAsync, {
	name: 'biotap-rate-limit',
	fastify: '5.x',
});
