/**
 * BioTap API Service
 *
 * Entry point: wires the database, repositories, use cases and services,
 * then starts the HTTP server and the weekly email scheduler.
 */

import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { createLogger } from '@biotap/logging';
import {
	createDatabase,
	createTransactionManager,
	createAggregateRegistry,
	createAggregateHandler,
	createDrizzleUnitOfWork,
} from '@biotap/persistence';
import { PasswordService, createAccessTokenService } from '@biotap/crypto';

import { getEnv } from './env.js';
import { createApp } from './app.js';
import { isClickEvent, isLink, isPasswordResetToken, isUser } from './domain/index.js';
import {
	createClickEventRepository,
	createEmailLogRepository,
	createLinkRepository,
	createPasswordResetTokenRepository,
	createUserRepository,
} from './infrastructure/persistence/index.js';
import {
	createChangePasswordUseCase,
	createConfirmPasswordResetUseCase,
	createDeleteAccountUseCase,
	createRegisterUserUseCase,
	createRequestPasswordResetUseCase,
	createUpdateProfileUseCase,
} from './application/user/index.js';
import {
	createCreateLinkUseCase,
	createDeleteLinkUseCase,
	createLinkQueries,
	createTrackClickUseCase,
	createUpdateLinkUseCase,
} from './application/link/index.js';
import { createAuthService } from './application/auth/index.js';
import { createAnalyticsService } from './application/analytics/index.js';
import { createWeeklyAnalyticsJob } from './application/email/index.js';
import { EmailService, createMailer } from './infrastructure/mail/index.js';
import { openGeoIpResolver } from './infrastructure/client-info/index.js';
import { createScheduler, nextHourlyRun, nextWeeklyRun } from './infrastructure/scheduler/index.js';

/**
 * Start the API service.
 *
 * @returns The Fastify instance, listening
 */
export async function startApi(): Promise<FastifyInstance> {
	const env = getEnv();
	const logger = createLogger({ serviceName: 'biotap-api', level: env.LOG_LEVEL, pretty: env.DEBUG });

	logger.info({ environment: env.ENVIRONMENT, debug: env.DEBUG }, `Starting ${env.APP_NAME} API`);

	// Database
	const database = createDatabase({ url: env.DATABASE_URL, logger: env.DEBUG ? logger : undefined });
	const transactionManager = createTransactionManager(database.db);

	// Repositories
	const userRepository = createUserRepository(database.db);
	const linkRepository = createLinkRepository(database.db);
	const clickEventRepository = createClickEventRepository(database.db);
	const passwordResetTokenRepository = createPasswordResetTokenRepository(database.db);
	const emailLogRepository = createEmailLogRepository(database.db);

	const aggregateRegistry = createAggregateRegistry();
	aggregateRegistry.register(createAggregateHandler('USER', isUser, userRepository));
	aggregateRegistry.register(createAggregateHandler('LINK', isLink, linkRepository));
	aggregateRegistry.register(createAggregateHandler('CLICK_EVENT', isClickEvent, clickEventRepository));
	aggregateRegistry.register(
		createAggregateHandler('PASSWORD_RESET_TOKEN', isPasswordResetToken, passwordResetTokenRepository),
	);

	const unitOfWork = createDrizzleUnitOfWork({ transactionManager, aggregateRegistry });

	// Services
	const passwordService = new PasswordService();
	const accessTokens = createAccessTokenService({
		secret: env.SECRET_KEY,
		algorithm: env.ALGORITHM,
		expireMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES,
	});
	const authService = createAuthService({ userRepository, passwordService, accessTokens });
	const geoIp = await openGeoIpResolver(env.GEOIP_DATABASE_PATH, logger);
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
		createMailer(env.RESEND_API_KEY, logger),
		emailLogRepository,
		logger,
	);
	const weeklyAnalyticsJob = createWeeklyAnalyticsJob({
		userRepository,
		emailLogRepository,
		analyticsService,
		emailService,
		logger,
	});

	const fastify = await createApp({
		env,
		pingDatabase: () => database.ping(),
		userRepository,
		linkRepository,
		authService,
		emailService,
		analyticsService,
		weeklyAnalyticsJob,
		geoIp,
		linkQueries: createLinkQueries({ linkRepository, userRepository }),

		// User use cases
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

		// Link use cases
		createLinkUseCase: createCreateLinkUseCase({ unitOfWork }),
		updateLinkUseCase: createUpdateLinkUseCase({ linkRepository, unitOfWork }),
		deleteLinkUseCase: createDeleteLinkUseCase({ linkRepository, unitOfWork }),
		trackClickUseCase: createTrackClickUseCase({ linkRepository, clickEventRepository, unitOfWork }),
	});

	// Weekly summaries, plus an hourly line showing the scheduler is alive
	const scheduler = createScheduler(
		[
			{
				id: 'weekly_analytics',
				name: 'Send weekly analytics emails',
				next: nextWeeklyRun,
				run: async (ctx) => {
					const result = await weeklyAnalyticsJob.sendWeeklyAnalyticsEmails();
					logger.info({ ...result, correlationId: ctx.correlationId }, 'Weekly analytics job finished');
				},
			},
			{
				id: 'health_check',
				name: 'Scheduler health check',
				next: nextHourlyRun,
				run: async (ctx) => {
					logger.info({ correlationId: ctx.correlationId }, 'Scheduler health check: running');
				},
			},
		],
		logger,
	);

	if (!env.DEBUG) {
		scheduler.start();
	}

	let shuttingDown = false;
	const shutdown = async (signal: string): Promise<void> => {
		if (shuttingDown) return;
		shuttingDown = true;
		logger.info({ signal }, 'Shutting down');

		scheduler.stop();
		try {
			await fastify.close();
			await database.close();
			process.exit(0);
		} catch (error) {
			logger.error({ err: error }, 'Error during shutdown');
			process.exit(1);
		}
	};
	process.once('SIGINT', (signal) => void shutdown(signal));
	process.once('SIGTERM', (signal) => void shutdown(signal));

	await fastify.listen({ port: env.PORT, host: env.HOST });
	logger.info({ port: env.PORT, host: env.HOST, docs: env.DEBUG ? '/docs' : null }, 'API listening');

	return fastify;
}

// Run when executed directly, not when imported
const self = resolve(fileURLToPath(import.meta.url));
const entry = process.argv[1] ? resolve(process.argv[1]) : '';
if (self === entry) {
	startApi().catch((err: unknown) => {
		console.error('Failed to start API:', err);
		process.exit(1);
	});
}
