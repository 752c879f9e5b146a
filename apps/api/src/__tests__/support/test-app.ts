/**
 * The full API over in-memory repositories, for inject() tests.
 */

import type { FastifyInstance } from 'fastify';
import { PasswordService, createAccessTokenService } from '@biotap/crypto';

import { createApp } from '../../app.js';
import { loadEnv, type AppEnv } from '../../env.js';
import {
	createChangePasswordUseCase,
	createConfirmPasswordResetUseCase,
	createDeleteAccountUseCase,
	createRegisterUserUseCase,
	createRequestPasswordResetUseCase,
	createUpdateProfileUseCase,
} from '../../application/user/index.js';
import {
	createCreateLinkUseCase,
	createDeleteLinkUseCase,
	createLinkQueries,
	createTrackClickUseCase,
	createUpdateLinkUseCase,
} from '../../application/link/index.js';
import { createAuthService } from '../../application/auth/index.js';
import { createAnalyticsService } from '../../application/analytics/index.js';
import { createWeeklyAnalyticsJob } from '../../application/email/index.js';
import { EmailService } from '../../infrastructure/mail/index.js';
import type { GeoIpResolver } from '../../infrastructure/client-info/index.js';
import { RecordingMailer, createInMemoryRepositories, silentLogger, type InMemoryRepositories } from './in-memory.js';

export const TEST_ENV: Record<string, string> = {
	DATABASE_URL: 'postgres://localhost:5432/biotap_test',
	SECRET_KEY: 'test-secret',
	APP_NAME: 'BioTap',
	FRONTEND_URL: 'https://app.example.test',
	FROM_EMAIL: 'noreply@example.test',
	DEBUG: 'false',
	ENVIRONMENT: 'test',
	ALLOWED_HOSTS: 'localhost,api.example.test',
};

/** Cheap argon2 settings so tests stay fast */
export const testPasswordService = new PasswordService({ memoryCost: 1024, timeCost: 2, parallelism: 1 });

export interface TestApp {
	readonly app: FastifyInstance;
	readonly repos: InMemoryRepositories;
	readonly mailer: RecordingMailer;
	readonly env: AppEnv;
	/** Marks the database unreachable for /api/health */
	setDatabaseDown(reason: string | null): void;
}

export interface TestAppOptions {
	readonly env?: Record<string, string>;
	readonly geoIp?: GeoIpResolver;
}

export async function buildTestApp(options: TestAppOptions = {}): Promise<TestApp> {
	const env = loadEnv({ ...TEST_ENV, ...options.env });
	const repos = createInMemoryRepositories();
	const { userRepository, linkRepository, clickEventRepository, passwordResetTokenRepository, emailLogRepository, unitOfWork } =
		repos;
	const mailer = new RecordingMailer();
	const geoIp: GeoIpResolver = options.geoIp ?? { countryOf: () => null };
	let databaseDown: string | null = null;

	const passwordService = testPasswordService;
	const authService = createAuthService({
		userRepository,
		passwordService,
		accessTokens: createAccessTokenService({ secret: env.SECRET_KEY, expireMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES }),
	});
	const analyticsService = createAnalyticsService({ linkRepository, clickEventRepository, geoIp });
	const emailService = new EmailService(
		{
			appName: env.APP_NAME,
			fromEmail: env.FROM_EMAIL,
			frontendUrl: env.FRONTEND_URL,
			sendWelcomeEmails: env.SEND_WELCOME_EMAILS,
			sendAnalyticsEmails: env.SEND_ANALYTICS_EMAILS,
			passwordResetExpireMinutes: env.PASSWORD_RESET_EXPIRE_MINUTES,
		},
		mailer,
		emailLogRepository,
		silentLogger,
	);

	const app = await createApp({
		env,
		logger: false,
		pingDatabase: async () => {
			if (databaseDown !== null) throw new Error(databaseDown);
		},
		userRepository,
		linkRepository,
		authService,
		emailService,
		analyticsService,
		geoIp,
		weeklyAnalyticsJob: createWeeklyAnalyticsJob({
			userRepository,
			emailLogRepository,
			analyticsService,
			emailService,
			logger: silentLogger,
		}),
		linkQueries: createLinkQueries({ linkRepository, userRepository }),
		registerUserUseCase: createRegisterUserUseCase({ userRepository, passwordService, unitOfWork }),
		requestPasswordResetUseCase: createRequestPasswordResetUseCase({
			userRepository,
			unitOfWork,
			expireMinutes: env.PASSWORD_RESET_EXPIRE_MINUTES,
		}),
		confirmPasswordResetUseCase: createConfirmPasswordResetUseCase({
			userRepository,
			passwordResetTokenRepository,
			passwordService,
			unitOfWork,
		}),
		updateProfileUseCase: createUpdateProfileUseCase({ userRepository, unitOfWork }),
		changePasswordUseCase: createChangePasswordUseCase({ userRepository, passwordService, unitOfWork }),
		deleteAccountUseCase: createDeleteAccountUseCase({ userRepository, unitOfWork }),
		createLinkUseCase: createCreateLinkUseCase({ unitOfWork }),
		updateLinkUseCase: createUpdateLinkUseCase({ linkRepository, unitOfWork }),
		deleteLinkUseCase: createDeleteLinkUseCase({ linkRepository, unitOfWork }),
		trackClickUseCase: createTrackClickUseCase({ linkRepository, clickEventRepository, unitOfWork }),
	});
	await app.ready();

	return {
		app,
		repos,
		mailer,
		env,
		setDatabaseDown(reason) {
			databaseDown = reason;
		},
	};
}

/**
 * Register a user through the API and log in, returning the bearer header.
 */
export async function registerAndLogin(
	app: FastifyInstance,
	username: string,
	password: string = 'password123',
): Promise<{ userId: string; authorization: string }> {
	const registered = await app.inject({
		method: 'POST',
		url: '/auth/register',
		payload: { username, email: `${username}@example.test`, password },
	});
	if (registered.statusCode !== 201) {
		throw new Error(`register failed: ${registered.statusCode} ${registered.body}`);
	}

	const login = await app.inject({
		method: 'POST',
		url: '/auth/login-json',
		payload: { username, password },
	});
	const token: unknown = login.json().access_token;
	if (typeof token !== 'string') {
		throw new Error(`login failed: ${login.statusCode} ${login.body}`);
	}

	const userId: unknown = registered.json().id;
	if (typeof userId !== 'string') throw new Error('register returned no id');
	return { userId, authorization: `Bearer ${token}` };
}
