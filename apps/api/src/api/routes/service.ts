/**
 * Service API
 *
 * Root banner and health checks.
 */

import type { FastifyInstance } from 'fastify';
import { jsonError, Type } from '@biotap/http';

export const API_VERSION = '1.0.0';

const RootResponseSchema = Type.Object({
	message: Type.String(),
	version: Type.String(),
	docs: Type.String(),
	status: Type.String(),
});

const HealthResponseSchema = Type.Object({
	status: Type.String(),
	app: Type.String(),
	environment: Type.String(),
});

const ApiHealthResponseSchema = Type.Object({
	status: Type.String(),
	database: Type.String(),
	environment: Type.String(),
	timestamp: Type.Number(),
});

export interface ServiceRoutesDeps {
	readonly appName: string;
	readonly debug: boolean;
	/** Rejects when the database cannot be reached */
	readonly pingDatabase: () => Promise<void>;
}

export async function registerServiceRoutes(fastify: FastifyInstance, deps: ServiceRoutesDeps): Promise<void> {
	const { appName, debug, pingDatabase } = deps;
	const environment = debug ? 'development' : 'production';

	fastify.get(
		'/',
		{
			config: { rateLimit: 30 },
			schema: { tags: ['service'], response: { 200: RootResponseSchema } },
		},
		async () => ({
			message: `Welcome to ${appName} API`,
			version: API_VERSION,
			docs: debug ? '/docs' : 'Not available in production',
			status: 'healthy',
		}),
	);

	// For load balancers; does not touch the database
	fastify.get(
		'/health',
		{ schema: { tags: ['service'], response: { 200: HealthResponseSchema } } },
		async () => ({ status: 'healthy', app: appName, environment }),
	);

	fastify.get(
		'/api/health',
		{ schema: { tags: ['service'], response: { 200: ApiHealthResponseSchema } } },
		async (request, reply) => {
			try {
				await pingDatabase();
			} catch (error) {
				const reason = error instanceof Error ? error.message : String(error);
				request.log.error({ err: error }, 'Health check failed');
				return jsonError(reply, 503, 'SERVICE_UNHEALTHY', `Service unhealthy: ${reason}`);
			}

			return {
				status: 'healthy',
				database: 'connected',
				environment,
				timestamp: Date.now() / 1000,
			};
		},
	);
}
