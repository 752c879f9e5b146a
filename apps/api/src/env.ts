/**
 * Environment Configuration
 *
 * Loads and validates environment variables for the API service.
 */

import { parseEnv, z, CommonEnvSchemas } from '@biotap/config';
import { ACCESS_TOKEN_ALGORITHMS } from '@biotap/crypto';

const envSchema = z.object({
	// Server
	PORT: CommonEnvSchemas.port,
	HOST: z.string().default('0.0.0.0'),
	LOG_LEVEL: CommonEnvSchemas.logLevel,

	// Database
	DATABASE_URL: z.string().min(1),

	// JWT
	SECRET_KEY: z.string().min(1),
	ALGORITHM: z.enum(ACCESS_TOKEN_ALGORITHMS).default('HS256'),
	ACCESS_TOKEN_EXPIRE_MINUTES: CommonEnvSchemas.positiveInt.prefault('30'),

	// App
	APP_NAME: z.string().default('BioTap'),
	DEBUG: CommonEnvSchemas.boolean,
	ENVIRONMENT: z.string().default('development'),

	// Email
	RESEND_API_KEY: z.string().default(''),
	FROM_EMAIL: z.string().default('onboarding@resend.dev'),
	FRONTEND_URL: z.string().default('http://localhost:3000'),
	SEND_WELCOME_EMAILS: CommonEnvSchemas.boolean.prefault('true'),
	SEND_ANALYTICS_EMAILS: CommonEnvSchemas.boolean.prefault('true'),

	// Password reset
	PASSWORD_RESET_EXPIRE_MINUTES: CommonEnvSchemas.positiveInt.prefault('30'),

	// HTTP
	CORS_ORIGINS: CommonEnvSchemas.stringArray.prefault('http://localhost:3000,http://localhost:5173'),
	ALLOWED_HOSTS: CommonEnvSchemas.stringArray.prefault('localhost,127.0.0.1'),
	RATE_LIMIT_PER_MINUTE: CommonEnvSchemas.positiveInt.prefault('60'),

	// Admin
	ADMIN_USERNAMES: CommonEnvSchemas.stringArray.prefault(''),

	// GeoIP
	GEOIP_DATABASE_PATH: z.string().default('./GeoLite2-Country.mmdb'),
});

export type RawEnv = z.infer<typeof envSchema>;

export interface AppEnv extends RawEnv {
	/** Production unless DEBUG is on, or explicitly ENVIRONMENT=production */
	readonly isProduction: boolean;
	readonly corsOrigins: readonly string[];
	readonly allowedHosts: readonly string[];
	/** Users allowed on the admin routes */
	readonly adminUsernames: readonly string[];
}

/**
 * Parse an environment map. Used directly by tests; the service goes
 * through getEnv().
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): AppEnv {
	const env = parseEnv(envSchema, source);
	return Object.freeze({
		...env,
		isProduction: env.ENVIRONMENT === 'production' || !env.DEBUG,
		corsOrigins: env.CORS_ORIGINS,
		allowedHosts: env.ALLOWED_HOSTS,
		adminUsernames: env.ADMIN_USERNAMES,
	});
}

let cachedEnv: AppEnv | null = null;

export function getEnv(): AppEnv {
	if (!cachedEnv) {
		cachedEnv = loadEnv();
	}
	return cachedEnv;
}
