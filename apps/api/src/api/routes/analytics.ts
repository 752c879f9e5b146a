/**
 * Analytics API
 */

import type { FastifyInstance } from 'fastify';
import { OpenAPIResponses, Type, type Static } from '@biotap/http';

import {
	ANALYTICS_DEFAULT_DAYS,
	ANALYTICS_MAX_DAYS,
	ANALYTICS_MIN_DAYS,
	type AnalyticsService,
} from '../../application/analytics/index.js';
import type { AuthService } from '../../application/auth/index.js';
import { authenticate, requireCurrentUser } from '../plugins/index.js';
import {
	AnalyticsResponseSchema,
	GeoLookupResponseSchema,
	GeographicResponseSchema,
	toAnalyticsResponse,
	toGeoLookupResponse,
	toGeographicResponse,
} from '../responses.js';

const DaysQuery = Type.Object({
	days: Type.Integer({
		minimum: ANALYTICS_MIN_DAYS,
		maximum: ANALYTICS_MAX_DAYS,
		default: ANALYTICS_DEFAULT_DAYS,
	}),
});

const GeoLookupQuery = Type.Object({
	ip: Type.String({ description: 'IP address to look up' }),
});

type DaysQueryType = Static<typeof DaysQuery>;
type GeoLookupQueryType = Static<typeof GeoLookupQuery>;

export interface AnalyticsRoutesDeps {
	readonly authService: AuthService;
	readonly analyticsService: AnalyticsService;
}

export async function registerAnalyticsRoutes(fastify: FastifyInstance, deps: AnalyticsRoutesDeps): Promise<void> {
	const { authService, analyticsService } = deps;
	const preHandler = authenticate(authService);

	// GET /analytics
	fastify.get<{ Querystring: DaysQueryType }>(
		'/analytics',
		{
			preHandler,
			schema: {
				tags: ['analytics'],
				security: [{ bearerAuth: [] }],
				querystring: DaysQuery,
				response: { 200: AnalyticsResponseSchema, ...OpenAPIResponses.errors(400, 401) },
			},
		},
		async (request) => {
			const summary = await analyticsService.getAnalytics(requireCurrentUser(request).id, request.query.days);
			return toAnalyticsResponse(summary);
		},
	);

	// GET /analytics/geographic
	fastify.get<{ Querystring: DaysQueryType }>(
		'/analytics/geographic',
		{
			preHandler,
			schema: {
				tags: ['analytics'],
				security: [{ bearerAuth: [] }],
				querystring: DaysQuery,
				response: { 200: GeographicResponseSchema, ...OpenAPIResponses.errors(400, 401) },
			},
		},
		async (request) => {
			const summary = await analyticsService.getGeographic(requireCurrentUser(request).id, request.query.days);
			return toGeographicResponse(summary);
		},
	);

	// GET /analytics/test-geo - public, for checking the GeoIP database
	fastify.get<{ Querystring: GeoLookupQueryType }>(
		'/analytics/test-geo',
		{
			schema: {
				tags: ['analytics'],
				querystring: GeoLookupQuery,
				response: { 200: GeoLookupResponseSchema, ...OpenAPIResponses.errors(400) },
			},
		},
		async (request) => toGeoLookupResponse(analyticsService.lookupCountry(request.query.ip)),
	);
}
