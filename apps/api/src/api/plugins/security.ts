/**
 * Production Hardening
 *
 * Security response headers and Host header checks.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { errorBody } from '@biotap/http';

export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
	'strict-transport-security': 'max-age=31536000; includeSubDomains',
	'x-content-type-options': 'nosniff',
	'x-frame-options': 'DENY',
	'x-xss-protection': '1; mode=block',
	'referrer-policy': 'strict-origin-when-cross-origin',
	'content-security-policy': "default-src 'self'; script-src 'self' 'unsafe-inline'; style-src 'self' 'unsafe-inline';",
};

const securityHeadersPluginAsync: FastifyPluginAsync = async (fastify) => {
	fastify.addHook('onSend', async (_request, reply, payload) => {
		reply.headers(SECURITY_HEADERS);
		return payload;
	});
};

export const securityHeadersPlugin = fp(securityHeadersPluginAsync, {
	name: 'biotap-security-headers',
	fastify: '5.x',
});

export interface TrustedHostOptions {
	/** Host names without port; "*" allows any */
	readonly allowedHosts: readonly string[];
}

/**
 * Host name of a Host header, without the port. Bracketed IPv6 literals
 * keep their brackets.
 */
export function hostWithoutPort(host: string): string {
	if (host.startsWith('[')) {
		const end = host.indexOf(']');
		return end === -1 ? host : host.slice(0, end + 1);
	}
	const colon = host.indexOf(':');
	return colon === -1 ? host : host.slice(0, colon);
}

const trustedHostPluginAsync: FastifyPluginAsync<TrustedHostOptions> = async (fastify, opts) => {
	const allowed = new Set(opts.allowedHosts.map((host) => host.toLowerCase()));
	if (allowed.has('*')) return;

	fastify.addHook('onRequest', async (request, reply) => {
		const host = hostWithoutPort(request.headers.host ?? '').toLowerCase();
		if (!allowed.has(host)) {
			return reply.status(400).send(errorBody('INVALID_HOST', 'Invalid host header'));
		}
	});
};

export const trustedHostPlugin = fp(trustedHostPluginAsync, {
	name: 'biotap-trusted-host',
	fastify: '5.x',
});

const requestLoggingPluginAsync: FastifyPluginAsync = async (fastify) => {
	fastify.addHook('onResponse', async (request, reply) => {
		request.log.info(
			{
				method: request.method,
				path: request.url.split('?')[0] ?? request.url,
				statusCode: reply.statusCode,
				responseTimeMs: Math.round(reply.elapsedTime * 100) / 100,
			},
			'request completed',
		);
	});
};

/**
 * One info line per response.
 */
export const requestLoggingPlugin = fp(requestLoggingPluginAsync, {
	name: 'biotap-request-logging',
	fastify: '5.x',
});
