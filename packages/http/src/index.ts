/**
 * @biotap/http
 *
 * HTTP layer utilities on Fastify:
 * - Plugins for tracing, bearer authentication and execution context
 * - Result to HTTP response mapping
 * - TypeBox schema helpers for validation and OpenAPI
 * - Pino logger options for Fastify
 *
 * @example
 * ```typescript
 * const fastify = Fastify({
 *     logger: createFastifyLoggerOptions({ level: 'info', serviceName: 'biotap-api' }),
 *     genReqId: generateRequestId,
 * });
 *
 * await fastify.register(tracingPlugin);
 * await fastify.register(authenticationPlugin, { validateToken });
 * await fastify.register(executionContextPlugin);
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 *
 * fastify.post('/links', { preHandler: requireAuthHook() }, async (request, reply) => {
 *     const result = await createLinkUseCase.execute(command, request.executionContext);
 *     return sendResult(reply, result, { successStatus: 201 });
 * });
 * ```
 */

// Types
export { type RequestTracing, type TokenValidator, type ErrorResponse, type FastifyRequest, type FastifyReply } from './types.js';

// Plugins
export {
	tracingPlugin,
	authenticationPlugin,
	principalIdOf,
	requireAuthHook,
	type AuthenticationPluginOptions,
	type RequireAuthOptions,
	executionContextPlugin,
	ANONYMOUS_PRINCIPAL,
} from './plugins/index.js';

// Logging
export { createFastifyLoggerOptions, generateRequestId, type LoggingConfig } from './logging.js';

// Response utilities
export {
	errorBody,
	getErrorStatus,
	sendResult,
	sendError,
	noContent,
	jsonError,
	type SendResultOptions,
} from './response.js';

// Error handler
export {
	errorHandlerPlugin,
	createStandardErrorHandlerOptions,
	type ErrorHandlerConfig,
	type ErrorMapper,
} from './error-handler.js';

// TypeBox / OpenAPI
export {
	CommonSchemas,
	ErrorResponseSchema,
	type ErrorResponseType,
	OpenAPIResponses,
	Type,
	type Static,
} from './openapi.js';
