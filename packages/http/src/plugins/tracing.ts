/**
 * Tracing Plugin
 *
 * Reads the correlation and causation IDs a caller sent, generating a
 * correlation ID when there is none, and echoes it as X-Correlation-ID.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { generateRaw } from '@biotap/tsid';

const CORRELATION_HEADERS = ['x-correlation-id', 'x-request-id'] as const;

function firstHeader(value: string | string[] | undefined): string | null {
	const first = Array.isArray(value) ? value[0] : value;
	return first ? first : null;
}

const tracingPluginAsync: FastifyPluginAsync = async (fastify) => {
	fastify.decorateRequest('tracing', null, []);

	fastify.addHook('onRequest', async (request, reply) => {
		let correlationId: string | null = null;
		for (const header of CORRELATION_HEADERS) {
			correlationId ??= firstHeader(request.headers[header]);
		}
		correlationId ??= `trace-${generateRaw()}`;

		request.tracing = {
			correlationId,
			causationId: firstHeader(request.headers['x-causation-id']),
		};
		reply.header('x-correlation-id', correlationId);
	});
};

export const tracingPlugin = fp(tracingPluginAsync, {
	name: '@biotap/tracing',
	fastify: '5.x',
});
