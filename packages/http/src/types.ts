/**
 * Request decorations added by the plugins, and the error body every route
 * answers with.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { PrincipalInfo, ExecutionContext } from '@biotap/domain-core';

export interface RequestTracing {
	/** X-Correlation-ID, else X-Request-ID, else generated */
	readonly correlationId: string;
	/** X-Causation-ID when sent */
	readonly causationId: string | null;
}

/** Resolves a bearer token to its principal; null when it is not valid */
export type TokenValidator = (token: string) => Promise<PrincipalInfo | null>;

export interface ErrorResponse {
	readonly code: string;
	readonly message: string;
	/** Same text as `message` */
	readonly detail: string;
	readonly details?: Record<string, unknown>;
}

declare module 'fastify' {
	interface FastifyRequest {
		tracing: RequestTracing;
		/** Null for anonymous requests */
		principal: PrincipalInfo | null;
		executionContext: ExecutionContext;
	}
}

export type { FastifyRequest, FastifyReply };
