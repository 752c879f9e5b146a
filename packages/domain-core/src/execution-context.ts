/**
 * Execution Context
 *
 * Carries tracing and principal information for a single use case execution.
 * Domain events copy their metadata from it.
 */

import { generateRaw } from '@biotap/tsid';
import { TracingContext } from './tracing-context.js';
import { SYSTEM_PRINCIPAL } from './principal.js';

export interface ExecutionContext {
	/** Unique ID for this execution */
	readonly executionId: string;
	/** Shared by everything one request or job sets off */
	readonly correlationId: string;
	/** ID of the event that caused this execution, if any */
	readonly causationId: string | null;
	/** Principal performing the action */
	readonly principalId: string;
	readonly initiatedAt: Date;
}

function generateExecutionId(): string {
	return `exec-${generateRaw()}`;
}

export const ExecutionContext = {
	/**
	 * Create a context for the given principal. Picks up correlation and
	 * causation IDs from the active TracingContext when there is one.
	 */
	create(principalId: string): ExecutionContext {
		const tracingCtx = TracingContext.current();
		if (tracingCtx) {
			return ExecutionContext.fromTracingContext(tracingCtx, principalId);
		}

		const executionId = generateExecutionId();
		return {
			executionId,
			correlationId: executionId,
			causationId: null,
			principalId,
			initiatedAt: new Date(),
		};
	},

	fromTracingContext(
		tracingContext: { correlationId: string | null; causationId: string | null },
		principalId: string,
	): ExecutionContext {
		const executionId = generateExecutionId();
		return {
			executionId,
			correlationId: tracingContext.correlationId ?? executionId,
			causationId: tracingContext.causationId,
			principalId,
			initiatedAt: new Date(),
		};
	},

	/**
	 * Context for scheduled jobs. Inside a TracingContext the job's
	 * correlation ID carries over.
	 */
	system(): ExecutionContext {
		return ExecutionContext.create(SYSTEM_PRINCIPAL.id);
	},
};
