import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { userPrincipal } from '@biotap/domain-core';
import { tracingPlugin } from '../plugins/tracing.js';
import { authenticationPlugin, extractBearerToken, requireAuthHook } from '../plugins/authentication.js';
import { executionContextPlugin } from '../plugins/execution-context.js';

async function buildApp(): Promise<FastifyInstance> {
	const app = Fastify({ logger: false });
	await app.register(tracingPlugin);
	await app.register(authenticationPlugin, {
		validateToken: async (token) => (token === 'test-token' ? userPrincipal('usr_0HZXEQ5Y8JY5Z', 'alice') : null),
	});
	await app.register(executionContextPlugin);

	app.get('/context', async (request) => ({
		tracing: request.tracing,
		principal: request.principal,
		principalId: request.executionContext.principalId,
		correlationId: request.executionContext.correlationId,
	}));
	app.get('/private', { preHandler: requireAuthHook() }, async () => ({ ok: true }));
	app.get(
		'/challenged',
		{ preHandler: requireAuthHook({ message: 'Could not validate credentials', challenge: 'Bearer' }) },
		async () => ({ ok: true }),
	);

	await app.ready();
	return app;
}

describe('request context plugins', () => {
	let app: FastifyInstance;

	afterEach(async () => {
		await app.close();
	});

	describe('tracing', () => {
		it('should generate a correlation ID and echo it', async () => {
			app = await buildApp();
			const res = await app.inject({ method: 'GET', url: '/context' });
			const body = res.json();

			expect(body.tracing.correlationId).toMatch(/^trace-/);
			expect(body.tracing.causationId).toBeNull();
			expect(res.headers['x-correlation-id']).toBe(body.tracing.correlationId);
			expect(body.correlationId).toBe(body.tracing.correlationId);
		});

		it('should prefer X-Correlation-ID over X-Request-ID', async () => {
			app = await buildApp();

			const both = await app.inject({
				method: 'GET',
				url: '/context',
				headers: { 'X-Correlation-ID': 'corr-1', 'X-Request-ID': 'req-1' },
			});
			const requestOnly = await app.inject({ method: 'GET', url: '/context', headers: { 'X-Request-ID': 'req-2' } });

			expect(both.json().tracing.correlationId).toBe('corr-1');
			expect(requestOnly.json().tracing.correlationId).toBe('req-2');
		});

		it('should read the causation ID', async () => {
			app = await buildApp();
			const res = await app.inject({ method: 'GET', url: '/context', headers: { 'X-Causation-ID': 'cause-1' } });

			expect(res.json().tracing.causationId).toBe('cause-1');
		});
	});

	describe('authentication', () => {
		it('should resolve a valid bearer token to its principal', async () => {
			app = await buildApp();
			const res = await app.inject({
				method: 'GET',
				url: '/context',
				headers: { authorization: 'Bearer test-token' },
			});

			expect(res.json().principal).toEqual({ id: 'usr_0HZXEQ5Y8JY5Z', type: 'USER', name: 'alice' });
			expect(res.json().principalId).toBe('usr_0HZXEQ5Y8JY5Z');
		});

		it('should leave requests with a bad token anonymous', async () => {
			app = await buildApp();
			const res = await app.inject({ method: 'GET', url: '/context', headers: { authorization: 'Bearer nope' } });

			expect(res.json().principal).toBeNull();
			expect(res.json().principalId).toBe('anonymous');
		});

		it('should reject anonymous requests on protected routes', async () => {
			app = await buildApp();
			const res = await app.inject({ method: 'GET', url: '/private' });

			expect(res.statusCode).toBe(401);
			expect(res.json()).toEqual({
				code: 'UNAUTHORIZED',
				message: 'Authentication required',
				detail: 'Authentication required',
			});
		});

		it('should send the challenge header when configured', async () => {
			app = await buildApp();
			const res = await app.inject({ method: 'GET', url: '/challenged' });

			expect(res.statusCode).toBe(401);
			expect(res.headers['www-authenticate']).toBe('Bearer');
			expect(res.json().message).toBe('Could not validate credentials');
		});

		it('should let authenticated requests through', async () => {
			app = await buildApp();
			const res = await app.inject({
				method: 'GET',
				url: '/private',
				headers: { authorization: 'bearer test-token' },
			});

			expect(res.statusCode).toBe(200);
			expect(res.json()).toEqual({ ok: true });
		});
	});
});

describe('extractBearerToken', () => {
	it('should parse the header', () => {
		expect(extractBearerToken('Bearer abc')).toBe('abc');
		expect(extractBearerToken('BEARER  abc ')).toBe('abc');
		expect(extractBearerToken('Basic abc')).toBeNull();
		expect(extractBearerToken('Bearer ')).toBeNull();
		expect(extractBearerToken(undefined)).toBeNull();
	});
});
