/**
 * Admin API
 *
 * Manual trigger and statistics for the weekly analytics emails.
 */

import type { FastifyInstance, preHandlerHookHandler } from 'fastify';
import { OpenAPIResponses, Type, errorBody, type Static } from '@biotap/http';

import type { WeeklyAnalyticsJob } from '../../application/email/index.js';
import type { AuthService } from '../../application/auth/index.js';
import type { AppEnv } from '../../env.js';
import { authenticate, requireCurrentUser } from '../plugins/index.js';
import {
	EmailStatsResponseSchema,
	WeeklyAnalyticsResponseSchema,
	toEmailStatsResponse,
	toWeeklyAnalyticsResponse,
} from '../responses.js';

const EmailStatsQuery = Type.Object({
	days: Type.Integer({ minimum: 1, maximum: 365, default: 30 }),
});

type EmailStatsQueryType = Static<typeof EmailStatsQuery>;

export interface AdminRoutesDeps {
	readonly env: Pick<AppEnv, 'adminUsernames'>;
	readonly authService: AuthService;
	readonly weeklyAnalyticsJob: WeeklyAnalyticsJob;
}

/**
 * preHandler that lets only the configured admin usernames through.
 */
function requireAdmin(adminUsernames: readonly string[]): preHandlerHookHandler {
	return async (request, reply) => {
		if (!adminUsernames.includes(requireCurrentUser(request).username)) {
			return reply.status(403).send(errorBody('FORBIDDEN', 'Not authorized to run admin tasks'));
		}
	};
}

export async function registerAdminRoutes(fastify: FastifyInstance, deps: AdminRoutesDeps): Promise<void> {
	const { env, authService, weeklyAnalyticsJob } = deps;
	const preHandler = [...authenticate(authService), requireAdmin(env.adminUsernames)];

	// POST /admin/send-weekly-analytics
	fastify.post(
		'/admin/send-weekly-analytics',
		{
			preHandler,
			schema: {
				tags: ['admin'],
				security: [{ bearerAuth: [] }],
				response: { 200: WeeklyAnalyticsResponseSchema, ...OpenAPIResponses.errors(401, 403) },
			},
		},
		async () => toWeeklyAnalyticsResponse(await weeklyAnalyticsJob.sendWeeklyAnalyticsEmails()),
	);

	// GET /admin/email-stats
	fastify.get<{ Querystring: EmailStatsQueryType }>(
		'/admin/email-stats',
		{
			preHandler,
			schema: {
				tags: ['admin'],
				security: [{ bearerAuth: [] }],
				querystring: EmailStatsQuery,
				response: { 200: EmailStatsResponseSchema, ...OpenAPIResponses.errors(400, 401, 403) },
			},
		},
		async (request) => toEmailStatsResponse(await weeklyAnalyticsJob.emailStats(request.query.days)),
	);
}
