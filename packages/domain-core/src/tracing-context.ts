/**
 * Tracing Context
 *
 * Correlation and causation IDs for work that runs outside a request, such
 * as scheduled jobs. Held on AsyncLocalStorage; ExecutionContext.create()
 * picks them up. HTTP requests carry theirs on `request.tracing` instead.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export interface TracingContextData {
	readonly correlationId: string | null;
	readonly causationId: string | null;
}

const storage = new AsyncLocalStorage<TracingContextData>();

export const TracingContext = {
	current(): TracingContextData | null {
		return storage.getStore() ?? null;
	},

	runWithContext<T>(correlationId: string | null, causationId: string | null, fn: () => T): T {
		return storage.run({ correlationId, causationId }, fn);
	},
};
