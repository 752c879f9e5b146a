/**
 * Application Assembly
 *
 * Builds the Fastify instance with its plugins and routes. Everything with
 * state (database, mailer, GeoIP) comes in through AppDeps, so tests can
 * build the same app over in-memory stand-ins.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import {
	tracingPlugin,
	authenticationPlugin,
	executionContextPlugin,
	errorHandlerPlugin,
	createStandardErrorHandlerOptions,
	createFastifyLoggerOptions,
	generateRequestId,
} from '@biotap/http';

import type { AppEnv } from './env.js';
import {
	currentUserPlugin,
	rateLimitPlugin,
	requestLoggingPlugin,
	securityHeadersPlugin,
	trustedHostPlugin,
} from './api/plugins/index.js';
import {
	registerAdminRoutes,
	registerAnalyticsRoutes,
	registerAuthRoutes,
	registerLinkRoutes,
	registerServiceRoutes,
	registerUserRoutes,
	API_VERSION,
	type AdminRoutesDeps,
	type AnalyticsRoutesDeps,
	type AuthRoutesDeps,
	type LinkRoutesDeps,
	type UserRoutesDeps,
} from './api/routes/index.js';

export type AppDeps = AuthRoutesDeps &
	UserRoutesDeps &
	LinkRoutesDeps &
	AnalyticsRoutesDeps &
	AdminRoutesDeps & {
		readonly env: AppEnv;
		readonly pingDatabase: () => Promise<void>;
		/** Overrides the pino options built from the environment; false silences logging */
		readonly logger?: FastifyServerOptions['logger'];
	};

const CORS_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'];

export async function createApp(deps: AppDeps): Promise<FastifyInstance> {
	const { env } = deps;

	const fastify = Fastify({
		logger:
			deps.logger ??
			createFastifyLoggerOptions({
				serviceName: 'biotap-api',
				level: env.LOG_LEVEL,
				pretty: env.DEBUG,
			}),
		genReqId: generateRequestId,
		// request.ip reads X-Forwarded-For for logs; rate limits use the socket
		trustProxy: true,
	});

	// ─── Plugins ────────────────────────────────────────────────────────────

	if (env.DEBUG) {
		await fastify.register(swagger, {
			openapi: {
				openapi: '3.1.0',
				info: {
					title: `${env.APP_NAME} API`,
					description: 'Link in bio backend: accounts, links, click tracking and analytics',
					version: API_VERSION,
				},
				components: {
					securitySchemes: {
						bearerAuth: {
							type: 'http',
							scheme: 'bearer',
							bearerFormat: 'JWT',
						},
					},
				},
			},
		});

		await fastify.register(swaggerUi, {
			routePrefix: '/docs',
			uiConfig: {
				docExpansion: 'list',
				deepLinking: true,
			},
		});
	}

	await fastify.register(cors, {
		origin: [...env.corsOrigins],
		credentials: true,
		methods: CORS_METHODS,
	});
	await fastify.register(formbody);

	if (env.isProduction) {
		await fastify.register(securityHeadersPlugin);
	}
	if (!env.DEBUG) {
		await fastify.register(trustedHostPlugin, { allowedHosts: env.allowedHosts });
		await fastify.register(requestLoggingPlugin);
	}

	await fastify.register(rateLimitPlugin, { defaultLimit: env.RATE_LIMIT_PER_MINUTE });

	// Correlation IDs
	await fastify.register(tracingPlugin);

	// Bearer tokens are checked here; the user row is loaded per route
	await fastify.register(authenticationPlugin, {
		validateToken: (token) => deps.authService.authenticate(token),
	});

	await fastify.register(executionContextPlugin);
	await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
	await fastify.register(currentUserPlugin);

	// ─── Routes ─────────────────────────────────────────────────────────────

	await registerServiceRoutes(fastify, {
		appName: env.APP_NAME,
		debug: env.DEBUG,
		pingDatabase: deps.pingDatabase,
	});
	await registerAuthRoutes(fastify, deps);
	await registerUserRoutes(fastify, deps);
	await registerLinkRoutes(fastify, deps);
	await registerAnalyticsRoutes(fastify, deps);
	await registerAdminRoutes(fastify, deps);

	return fastify;
}
