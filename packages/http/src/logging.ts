/**
 * Fastify Logging
 *
 * Fastify uses pino natively; these options match the loggers built by
 * @biotap/logging and keep request logs to the fields worth reading.
 */

import type { FastifyRequest, FastifyReply, FastifyServerOptions } from 'fastify';
import { createLoggerOptions, PRETTY_TRANSPORT, type LoggerConfig } from '@biotap/logging';
import { generateRaw } from '@biotap/tsid';

export type LoggingConfig = Omit<LoggerConfig, 'destination'>;

/**
 * Logger options for `Fastify({ logger })`.
 *
 * @example
 * ```typescript
 * const fastify = Fastify({
 *     logger: createFastifyLoggerOptions({ level: 'info', serviceName: 'biotap-api' }),
 *     genReqId: generateRequestId,
 * });
 * ```
 */
export function createFastifyLoggerOptions(config: LoggingConfig): FastifyServerOptions['logger'] {
	return {
		...createLoggerOptions(config),
		serializers: {
			req: (request: FastifyRequest) => ({
				method: request.method,
				url: request.url,
				remoteAddress: request.ip,
			}),
			res: (reply: Pick<FastifyReply, 'statusCode'>) => ({
				statusCode: reply.statusCode,
			}),
		},
		...(config.pretty ? { transport: PRETTY_TRANSPORT } : {}),
	};
}

/**
 * Request ID generator for Fastify's `genReqId`.
 */
export function generateRequestId(): string {
	return `req-${generateRaw()}`;
}
