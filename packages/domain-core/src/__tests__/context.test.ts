import { describe, it, expect } from 'vitest';
import { TracingContext } from '../tracing-context.js';
import { ExecutionContext } from '../execution-context.js';
import { SYSTEM_PRINCIPAL, userPrincipal } from '../principal.js';

describe('TracingContext', () => {
	it('should expose the active IDs inside runWithContext', () => {
		TracingContext.runWithContext('corr-1', 'cause-1', () => {
			expect(TracingContext.current()).toEqual({ correlationId: 'corr-1', causationId: 'cause-1' });
		});
		expect(TracingContext.current()).toBeNull();
	});

	it('should keep the context across awaits', async () => {
		const seen = await TracingContext.runWithContext('job-1', null, async () => {
			await new Promise((resolve) => setTimeout(resolve, 1));
			return TracingContext.current()?.correlationId;
		});

		expect(seen).toBe('job-1');
	});
});

describe('ExecutionContext', () => {
	it('should start a new correlation outside a tracing context', () => {
		const ctx = ExecutionContext.create('usr_1');

		expect(ctx.executionId).toMatch(/^exec-/);
		expect(ctx.correlationId).toBe(ctx.executionId);
		expect(ctx.causationId).toBeNull();
		expect(ctx.principalId).toBe('usr_1');
	});

	it('should start a new correlation when the tracing context has none', () => {
		TracingContext.runWithContext(null, null, () => {
			const ctx = ExecutionContext.create('usr_3');
			expect(ctx.correlationId).toBe(ctx.executionId);
		});
	});

	it('should adopt the tracing context IDs', () => {
		TracingContext.runWithContext('corr-2', 'cause-2', () => {
			const ctx = ExecutionContext.create('usr_2');
			expect(ctx.correlationId).toBe('corr-2');
			expect(ctx.causationId).toBe('cause-2');
		});
	});

	it('should run jobs as the system principal under their correlation', () => {
		TracingContext.runWithContext('job-1', null, () => {
			const ctx = ExecutionContext.system();
			expect(ctx.principalId).toBe(SYSTEM_PRINCIPAL.id);
			expect(ctx.correlationId).toBe('job-1');
		});
	});
});

describe('principals', () => {
	it('should describe a user by id and username', () => {
		expect(userPrincipal('usr_1', 'alice')).toEqual({ id: 'usr_1', type: 'USER', name: 'alice' });
	});
});
