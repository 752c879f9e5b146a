/**
 * Execution Context Plugin
 *
 * Gives each request the ExecutionContext its use cases run under. Needs
 * the tracing and authentication plugins registered first.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { ExecutionContext } from '@biotap/domain-core';

/** Principal ID recorded for anonymous requests, such as registration */
export const ANONYMOUS_PRINCIPAL = 'anonymous';

const executionContextPluginAsync: FastifyPluginAsync = async (fastify) => {
	fastify.decorateRequest('executionContext', null, []);

	fastify.addHook('onRequest', async (request) => {
		request.executionContext = ExecutionContext.fromTracingContext(
			request.tracing,
			request.principal?.id ?? ANONYMOUS_PRINCIPAL,
		);
	});
};

export const executionContextPlugin = fp(executionContextPluginAsync, {
	name: '@biotap/execution-context',
	fastify: '5.x',
	dependencies: ['@biotap/tracing', '@biotap/authentication'],
});
