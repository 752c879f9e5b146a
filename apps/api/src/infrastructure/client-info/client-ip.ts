/**
 * Client IP
 *
 * The visitor's address as seen through proxies and load balancers.
 */

/** Stand-in for loopback callers, so local clicks still resolve a country */
export const FALLBACK_CLIENT_IP = '8.8.8.8';

const LOOPBACK_ADDRESSES = new Set(['127.0.0.1', '::1', '::ffff:127.0.0.1']);

type HeaderValue = string | string[] | undefined;

function firstHeader(value: HeaderValue): string | undefined {
	const raw = Array.isArray(value) ? value[0] : value;
	const trimmed = raw?.trim();
	return trimmed ? trimmed : undefined;
}

/**
 * First X-Forwarded-For entry, then X-Real-IP, then CF-Connecting-IP,
 * then the socket address.
 */
export function getClientIp(headers: Record<string, HeaderValue>, remoteAddress: string | undefined): string {
	const forwarded = firstHeader(headers['x-forwarded-for']);
	if (forwarded) {
		const first = forwarded.split(',')[0]?.trim();
		if (first) return first;
	}

	const realIp = firstHeader(headers['x-real-ip']);
	if (realIp) return realIp;

	const cloudflareIp = firstHeader(headers['cf-connecting-ip']);
	if (cloudflareIp) return cloudflareIp;

	if (!remoteAddress || LOOPBACK_ADDRESSES.has(remoteAddress)) {
		return FALLBACK_CLIENT_IP;
	}
	return remoteAddress;
}
