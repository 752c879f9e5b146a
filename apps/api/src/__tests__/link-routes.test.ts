import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { buildTestApp, registerAndLogin, type TestApp } from './support/test-app.js';

const IPHONE_SAFARI =
	'Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1';

describe('link routes', () => {
	let t: TestApp;
	let alice: { userId: string; authorization: string };

	async function createLink(payload: Record<string, unknown>, authorization = alice.authorization) {
		const res = await t.app.inject({ method: 'POST', url: '/links', headers: { authorization }, payload });
		if (res.statusCode !== 201) throw new Error(`create failed: ${res.statusCode} ${res.body}`);
		const id: unknown = res.json().id;
		if (typeof id !== 'string') throw new Error('create returned no id');
		return id;
	}

	beforeEach(async () => {
		t = await buildTestApp({ geoIp: { countryOf: (ip) => (ip === '203.0.113.9' ? 'DE' : null) } });
		alice = await registerAndLogin(t.app, 'alice');
	});

	afterEach(async () => {
		await t.app.close();
	});

	describe('owner CRUD', () => {
		it('should create a link with defaults', async () => {
			const res = await t.app.inject({
				method: 'POST',
				url: '/links',
				headers: { authorization: alice.authorization },
				payload: { title: 'Blog', url: 'https://blog.example.test' },
			});

			expect(res.statusCode).toBe(201);
			expect(res.json()).toMatchObject({
				title: 'Blog',
				url: 'https://blog.example.test',
				description: null,
				is_active: true,
				display_order: 0,
				icon: null,
				click_count: 0,
				updated_at: null,
				user_id: alice.userId,
			});
		});

		it('should require authentication', async () => {
			const res = await t.app.inject({
				method: 'POST',
				url: '/links',
				payload: { title: 'Blog', url: 'https://blog.example.test' },
			});

			expect(res.statusCode).toBe(401);
		});

		it('should reject a non-http URL and an empty title', async () => {
			const badUrl = await t.app.inject({
				method: 'POST',
				url: '/links',
				headers: { authorization: alice.authorization },
				payload: { title: 'Files', url: 'ftp://files.example.test' },
			});
			const noTitle = await t.app.inject({
				method: 'POST',
				url: '/links',
				headers: { authorization: alice.authorization },
				payload: { title: '', url: 'https://blog.example.test' },
			});

			expect(badUrl.statusCode).toBe(400);
			expect(badUrl.json().code).toBe('INVALID_URL');
			expect(noTitle.statusCode).toBe(400);
			expect(noTitle.json().code).toBe('TITLE_REQUIRED');
		});

		it('should list links by display order and page through them', async () => {
			await createLink({ title: 'Third', url: 'https://c.example.test', display_order: 3 });
			await createLink({ title: 'First', url: 'https://a.example.test', display_order: 1 });
			await createLink({ title: 'Second', url: 'https://b.example.test', display_order: 2 });

			const all = await t.app.inject({ method: 'GET', url: '/links', headers: { authorization: alice.authorization } });
			const page = await t.app.inject({
				method: 'GET',
				url: '/links?skip=1&limit=1',
				headers: { authorization: alice.authorization },
			});
			const mine = await t.app.inject({
				method: 'GET',
				url: '/users/me/links',
				headers: { authorization: alice.authorization },
			});

			const titles = (res: typeof all): unknown[] => res.json().map((link: { title: string }) => link.title);
			expect(titles(all)).toEqual(['First', 'Second', 'Third']);
			expect(titles(page)).toEqual(['Second']);
			expect(titles(mine)).toEqual(['First', 'Second', 'Third']);
		});

		it('should reject a limit outside 1-1000', async () => {
			const res = await t.app.inject({
				method: 'GET',
				url: '/links?limit=0',
				headers: { authorization: alice.authorization },
			});

			expect(res.statusCode).toBe(400);
		});

		it('should update only the supplied fields', async () => {
			const id = await createLink({ title: 'Blog', url: 'https://blog.example.test', description: 'Posts' });

			const res = await t.app.inject({
				method: 'PATCH',
				url: `/links/${id}`,
				headers: { authorization: alice.authorization },
				payload: { title: 'My Blog', icon: 'pen' },
			});

			expect(res.statusCode).toBe(200);
			const body = res.json();
			expect(body).toMatchObject({
				title: 'My Blog',
				url: 'https://blog.example.test',
				description: 'Posts',
				icon: 'pen',
			});
			expect(body.updated_at).not.toBeNull();
		});

		it('should delete a link and its clicks', async () => {
			const id = await createLink({ title: 'Blog', url: 'https://blog.example.test' });
			await t.app.inject({ method: 'GET', url: `/links/${id}/redirect` });

			const deleted = await t.app.inject({
				method: 'DELETE',
				url: `/links/${id}`,
				headers: { authorization: alice.authorization },
			});
			const after = await t.app.inject({
				method: 'GET',
				url: `/links/${id}`,
				headers: { authorization: alice.authorization },
			});

			expect(deleted.statusCode).toBe(204);
			expect(after.statusCode).toBe(404);
			expect(t.repos.store.clickEvents.size).toBe(0);
		});
	});

	describe('ownership', () => {
		it('should answer 404 for an unknown link', async () => {
			const res = await t.app.inject({
				method: 'GET',
				url: '/links/lnk_0000000000000',
				headers: { authorization: alice.authorization },
			});

			expect(res.statusCode).toBe(404);
			expect(res.json()).toMatchObject({ code: 'LINK_NOT_FOUND', detail: 'Link not found' });
		});

		it("should answer 403 naming the action on another user's link", async () => {
			const id = await createLink({ title: 'Blog', url: 'https://blog.example.test' });
			const bob = await registerAndLogin(t.app, 'bob');
			const headers = { authorization: bob.authorization };

			const read = await t.app.inject({ method: 'GET', url: `/links/${id}`, headers });
			const update = await t.app.inject({ method: 'PATCH', url: `/links/${id}`, headers, payload: { title: 'Mine' } });
			const remove = await t.app.inject({ method: 'DELETE', url: `/links/${id}`, headers });

			expect([read.statusCode, update.statusCode, remove.statusCode]).toEqual([403, 403, 403]);
			expect(read.json().detail).toBe('Not authorized to access this link');
			expect(update.json().detail).toBe('Not authorized to update this link');
			expect(remove.json().detail).toBe('Not authorized to delete this link');
			expect(t.repos.store.links.get(id)?.title).toBe('Blog');
		});
	});

	describe('public endpoints', () => {
		it('should count a click without recording a click event', async () => {
			const id = await createLink({ title: 'Blog', url: 'https://blog.example.test' });

			const res = await t.app.inject({ method: 'POST', url: `/links/${id}/click` });

			expect(res.statusCode).toBe(200);
			expect(res.json().click_count).toBe(1);
			expect(t.repos.store.clickEvents.size).toBe(0);
		});

		it('should count every one of concurrent clicks', async () => {
			const id = await createLink({ title: 'Blog', url: 'https://blog.example.test' });

			const clicks = await Promise.all(
				Array.from({ length: 10 }, () => t.app.inject({ method: 'POST', url: `/links/${id}/click` })),
			);
			const res = await t.app.inject({
				method: 'GET',
				url: `/links/${id}`,
				headers: { authorization: alice.authorization },
			});

			expect(clicks.map((click) => click.statusCode)).toEqual(Array.from({ length: 10 }, () => 200));
			expect(res.json().click_count).toBe(10);
		});

		it('should keep an owner edit made while clicks come in', async () => {
			const id = await createLink({ title: 'Blog', url: 'https://blog.example.test' });

			const [, update] = await Promise.all([
				t.app.inject({ method: 'POST', url: `/links/${id}/click` }),
				t.app.inject({
					method: 'PATCH',
					url: `/links/${id}`,
					headers: { authorization: alice.authorization },
					payload: { title: 'Renamed' },
				}),
				t.app.inject({ method: 'POST', url: `/links/${id}/click` }),
			]);

			expect(update.statusCode).toBe(200);
			expect(t.repos.store.links.get(id)).toMatchObject({ title: 'Renamed', clickCount: 2 });
		});

		it('should refuse clicks on inactive and unknown links', async () => {
			const id = await createLink({ title: 'Old', url: 'https://old.example.test', is_active: false });

			const inactive = await t.app.inject({ method: 'POST', url: `/links/${id}/click` });
			const unknown = await t.app.inject({ method: 'GET', url: '/links/lnk_0000000000000/redirect' });

			expect(inactive.statusCode).toBe(404);
			expect(inactive.json().detail).toBe('Link is not active');
			expect(unknown.statusCode).toBe(404);
			expect(unknown.json().detail).toBe('Link not found');
		});

		it('should redirect and record the visitor', async () => {
			const id = await createLink({ title: 'Blog', url: 'https://blog.example.test/post' });

			const res = await t.app.inject({
				method: 'GET',
				url: `/links/${id}/redirect`,
				headers: {
					'x-forwarded-for': '203.0.113.9, 10.0.0.1',
					'user-agent': IPHONE_SAFARI,
					referer: 'https://social.example.test/profile',
				},
			});

			expect(res.statusCode).toBe(302);
			expect(res.headers.location).toBe('https://blog.example.test/post');
			expect(t.repos.store.links.get(id)?.clickCount).toBe(1);

			const [click] = [...t.repos.store.clickEvents.values()];
			expect(click).toMatchObject({
				linkId: id,
				ipAddress: '203.0.113.9',
				userAgent: IPHONE_SAFARI,
				referer: 'https://social.example.test/profile',
				country: 'DE',
				deviceType: 'mobile',
				browser: 'Safari',
			});
		});

		it('should list only active links of an active user', async () => {
			await createLink({ title: 'Shown', url: 'https://a.example.test' });
			await createLink({ title: 'Hidden', url: 'https://b.example.test', is_active: false });

			const res = await t.app.inject({ method: 'GET', url: '/links/public/alice' });
			const missing = await t.app.inject({ method: 'GET', url: '/links/public/nobody' });

			expect(res.statusCode).toBe(200);
			expect(res.json().map((link: { title: string }) => link.title)).toEqual(['Shown']);
			expect(missing.statusCode).toBe(404);
			expect(missing.json().detail).toBe('User not found');
		});

		it('should rate limit the public profile at 30 per minute', async () => {
			const statuses: number[] = [];
			for (let i = 0; i < 31; i++) {
				const res = await t.app.inject({ method: 'GET', url: '/links/public/nobody' });
				statuses.push(res.statusCode);
			}

			const limited = await t.app.inject({ method: 'GET', url: '/links/public/nobody' });

			expect(statuses.slice(0, 30).every((status) => status === 404)).toBe(true);
			expect(statuses[30]).toBe(429);
			expect(limited.json()).toMatchObject({
				code: 'RATE_LIMITED',
				detail: 'Rate limit exceeded: 30 per 1 minute',
			});
			expect(Number(limited.headers['retry-after'])).toBeGreaterThanOrEqual(1);
		});
	});
});
