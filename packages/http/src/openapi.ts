/**
 * OpenAPI Integration
 *
 * TypeBox schemas shared by routes. TypeBox emits JSON Schema directly, so
 * Fastify validates and serialises with it and @fastify/swagger documents it.
 */

import { Type, type Static } from '@sinclair/typebox';

export const CommonSchemas = {
	/**
	 * Typed ID - entity prefix + underscore + TSID (e.g., "lnk_0HZXEQ5Y8JY5Z").
	 */
	TypedId: Type.String({
		pattern: '^[a-z]{3}_[0-9A-HJKMNP-TV-Z]{13}$',
		description: 'Typed ID (prefix_TSID format)',
	}),

	DateTime: Type.String({
		format: 'date-time',
		description: 'ISO 8601 datetime',
	}),

	/** Plain success message */
	Message: Type.Object({
		message: Type.String(),
	}),

	/** `?skip=0&limit=100` */
	OffsetPagination: Type.Object({
		skip: Type.Integer({ minimum: 0, default: 0 }),
		limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
	}),
};

export const ErrorResponseSchema = Type.Object({
	code: Type.String({ description: 'Machine-readable error code' }),
	message: Type.String({ description: 'Human-readable error message' }),
	detail: Type.String({ description: 'Same as message' }),
	details: Type.Optional(Type.Record(Type.String(), Type.Unknown(), { description: 'Additional error details' })),
});

export type ErrorResponseType = Static<typeof ErrorResponseSchema>;

/**
 * Fastify `response` entries for common error statuses.
 *
 * @example
 * ```typescript
 * schema: {
 *     response: { 200: LinkSchema, ...OpenAPIResponses.errors(401, 403, 404) },
 * }
 * ```
 */
export const OpenAPIResponses = {
	errors(...statuses: number[]): Record<number, typeof ErrorResponseSchema> {
		return Object.fromEntries(statuses.map((status) => [status, ErrorResponseSchema]));
	},
};

export { Type, type Static };
