import { describe, it, expect } from 'vitest';

import { getClientIp, parseUserAgent, FALLBACK_CLIENT_IP } from '../infrastructure/client-info/index.js';

describe('getClientIp', () => {
	it('should take the first forwarded address', () => {
		expect(getClientIp({ 'x-forwarded-for': '203.0.113.7, 10.0.0.1', 'x-real-ip': '198.51.100.2' }, '10.0.0.9')).toBe(
			'203.0.113.7',
		);
	});

	it('should fall through the proxy headers in order', () => {
		expect(getClientIp({ 'x-real-ip': '198.51.100.2', 'cf-connecting-ip': '192.0.2.4' }, '10.0.0.9')).toBe(
			'198.51.100.2',
		);
		expect(getClientIp({ 'cf-connecting-ip': '192.0.2.4' }, '10.0.0.9')).toBe('192.0.2.4');
		expect(getClientIp({ 'x-forwarded-for': '  ' }, '10.0.0.9')).toBe('10.0.0.9');
	});

	it('should read the first value of a repeated header', () => {
		expect(getClientIp({ 'x-real-ip': ['198.51.100.2', '198.51.100.3'] }, undefined)).toBe('198.51.100.2');
	});

	it('should substitute loopback and missing addresses', () => {
		expect(getClientIp({}, '127.0.0.1')).toBe(FALLBACK_CLIENT_IP);
		expect(getClientIp({}, '::1')).toBe(FALLBACK_CLIENT_IP);
		expect(getClientIp({}, undefined)).toBe('8.8.8.8');
	});
});

describe('parseUserAgent', () => {
	it('should classify a desktop browser', () => {
		const info = parseUserAgent(
			'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
		);

		expect(info).toEqual({ deviceType: 'desktop', browser: 'Chrome' });
	});

	it('should classify a tablet', () => {
		const info = parseUserAgent(
			'Mozilla/5.0 (iPad; CPU OS 16_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.0 Mobile/15E148 Safari/604.1',
		);

		expect(info).toEqual({ deviceType: 'tablet', browser: 'Safari' });
	});

	it('should report unknown without a user agent', () => {
		expect(parseUserAgent(null)).toEqual({ deviceType: 'unknown', browser: 'unknown' });
		expect(parseUserAgent('')).toEqual({ deviceType: 'unknown', browser: 'unknown' });
	});
});
