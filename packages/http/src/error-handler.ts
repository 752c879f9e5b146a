/**
 * Error Handler
 *
 * Global error handler plugin. Maps thrown errors to the standard error
 * body; anything unrecognised becomes a logged 500.
 */

import type { FastifyPluginAsync, FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import type { ErrorResponse } from './types.js';
import { errorBody } from './response.js';

export interface ErrorHandlerConfig {
	/** Whether to include stack traces in 500 responses (default: false) */
	readonly includeStack?: boolean;
	/** Consulted in order before the generic handling */
	readonly mappers?: ErrorMapper[];
}

export interface ErrorMapper {
	canHandle: (error: FastifyError) => boolean;
	toResponse: (error: FastifyError) => { status: number; body: ErrorResponse };
}

/**
 * @example
 * ```typescript
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 * ```
 */
const errorHandlerPluginAsync: FastifyPluginAsync<ErrorHandlerConfig> = async (fastify, opts) => {
	const { includeStack = false, mappers = [] } = opts;

	fastify.setErrorHandler<FastifyError>((error, request, reply) => {
		const log = request.log;
		const correlationId = request.tracing?.correlationId;

		for (const mapper of mappers) {
			if (mapper.canHandle(error)) {
				const { status, body } = mapper.toResponse(error);

				if (status >= 500) {
					log.error({ error: error.name, message: error.message, status, correlationId }, 'Mapped error');
				}

				return reply.status(status).send(body);
			}
		}

		const statusCode = error.statusCode ?? 500;

		if (statusCode < 500) {
			return reply.status(statusCode).send(errorBody(`HTTP_${statusCode}`, error.message || 'An error occurred'));
		}

		log.error(
			{ error: error.name, message: error.message, stack: error.stack, correlationId },
			'Unhandled error',
		);

		return reply
			.status(500)
			.send(
				errorBody(
					'INTERNAL_ERROR',
					'An unexpected error occurred',
					includeStack && error.stack ? { stack: error.stack } : undefined,
				),
			);
	});
};

export const errorHandlerPlugin = fp(errorHandlerPluginAsync, {
	name: '@biotap/error-handler',
	fastify: '5.x',
});

function commonErrorMappers(): ErrorMapper[] {
	return [
		// Schema validation errors from Fastify's AJV integration
		{
			canHandle: (e) => e.code === 'FST_ERR_VALIDATION' || Array.isArray(e.validation),
			toResponse: (e) => ({
				status: 400,
				body: errorBody(
					'VALIDATION_ERROR',
					e.message || 'Request validation failed',
					e.validation ? { errors: e.validation } : undefined,
				),
			}),
		},
		// Body parse errors
		{
			canHandle: (e) => e instanceof SyntaxError || e.code === 'FST_ERR_CTP_EMPTY_JSON_BODY',
			toResponse: () => ({
				status: 400,
				body: errorBody('INVALID_JSON', 'Invalid JSON in request body'),
			}),
		},
	];
}

export function createStandardErrorHandlerOptions(): ErrorHandlerConfig {
	return {
		mappers: commonErrorMappers(),
	};
}
