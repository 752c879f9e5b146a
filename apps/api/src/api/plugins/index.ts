export {
	currentUserPlugin,
	authenticate,
	loadCurrentUser,
	requireCurrentUser,
	CREDENTIALS_MESSAGE,
} from './current-user.js';
export { rateLimitPlugin, type RateLimitPluginOptions } from './rate-limit.js';
export {
	securityHeadersPlugin,
	trustedHostPlugin,
	requestLoggingPlugin,
	hostWithoutPort,
	SECURITY_HEADERS,
	type TrustedHostOptions,
} from './security.js';
