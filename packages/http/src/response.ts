/**
 * Response Utilities
 *
 * Map Result values and use case errors to HTTP responses.
 */

import type { FastifyReply } from 'fastify';
import { Result, UseCaseError } from '@biotap/domain-core';
import type { ErrorResponse } from './types.js';

/**
 * Build the standard error body.
 */
export function errorBody(code: string, message: string, details?: Record<string, unknown>): ErrorResponse {
	return {
		code,
		message,
		detail: message,
		...(details && Object.keys(details).length > 0 ? { details } : {}),
	};
}

/**
 * HTTP status code for a use case error.
 */
export function getErrorStatus(error: UseCaseError): number {
	return UseCaseError.httpStatus(error);
}

function toErrorResponse(error: UseCaseError): ErrorResponse {
	return errorBody(error.code, error.message, error.details);
}

export interface SendResultOptions<T, R> {
	/** Status code for success (default: 200) */
	successStatus?: number;
	/** Transform success value before sending */
	transform?: (value: T) => R;
}

/**
 * Send a Result as an HTTP response.
 *
 * @example
 * ```typescript
 * fastify.post('/links', async (request, reply) => {
 *     const result = await createLinkUseCase.execute(command, request.executionContext);
 *     return sendResult(reply, result, {
 *         successStatus: 201,
 *         transform: (event) => toLinkResponse(event.getData().link),
 *     });
 * });
 * ```
 */
export function sendResult<T, R = T>(
	reply: FastifyReply,
	result: Result<T>,
	options: SendResultOptions<T, R> = {},
): FastifyReply {
	const { successStatus = 200, transform } = options;

	if (Result.isSuccess(result)) {
		const value = transform ? transform(result.value) : result.value;
		return reply.status(successStatus).send(value);
	}

	return sendError(reply, result.error);
}

/**
 * Send a use case error with its mapped status.
 */
export function sendError(reply: FastifyReply, error: UseCaseError): FastifyReply {
	return reply.status(getErrorStatus(error)).send(toErrorResponse(error));
}

export function noContent(reply: FastifyReply): FastifyReply {
	return reply.status(204).send();
}

export function jsonError(
	reply: FastifyReply,
	status: number,
	code: string,
	message: string,
	details?: Record<string, unknown>,
): FastifyReply {
	return reply.status(status).send(errorBody(code, message, details));
}
