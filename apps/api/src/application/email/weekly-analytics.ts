/**
 * Weekly Analytics Emails
 *
 * Mails each active user a summary of the past seven days. A user already
 * mailed for the period, or without any clicks, is skipped.
 */

import type { Logger } from '@biotap/logging';

import type { EmailLogRepository, UserRepository } from '../../infrastructure/persistence/index.js';
import type { EmailService } from '../../infrastructure/mail/index.js';
import type { AnalyticsService } from '../analytics/index.js';
import { analyticsWindow } from '../analytics/index.js';

const SUMMARY_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface WeeklyAnalyticsResult {
	readonly sent: number;
	readonly errors: number;
}

export interface EmailStats {
	readonly totalSent: number;
	readonly totalFailed: number;
	/** Percentage of successful sends, 0 when nothing was sent */
	readonly successRate: number;
	readonly lastSent: Date | null;
}

export interface WeeklyAnalyticsDeps {
	readonly userRepository: UserRepository;
	readonly emailLogRepository: EmailLogRepository;
	readonly analyticsService: AnalyticsService;
	readonly emailService: EmailService;
	readonly logger: Logger;
}

export interface WeeklyAnalyticsJob {
	sendWeeklyAnalyticsEmails(now?: Date): Promise<WeeklyAnalyticsResult>;
	emailStats(days: number, now?: Date): Promise<EmailStats>;
}

export function createWeeklyAnalyticsJob(deps: WeeklyAnalyticsDeps): WeeklyAnalyticsJob {
	const { userRepository, emailLogRepository, analyticsService, emailService } = deps;
	const logger = deps.logger.child({ component: 'weekly-analytics' });

	return {
		async sendWeeklyAnalyticsEmails(now = new Date()) {
			const period = analyticsWindow(SUMMARY_DAYS, now);
			logger.info({ periodStart: period.start, periodEnd: period.end }, 'Starting weekly analytics email job');

			const users = await userRepository.findActive();
			let sent = 0;
			let errors = 0;

			for (const user of users) {
				try {
					if (await emailLogRepository.hasAnalyticsSummarySince(user.id, period.start)) {
						logger.debug({ userId: user.id }, 'Already sent for this period');
						continue;
					}

					const summary = await analyticsService.getAnalytics(user.id, SUMMARY_DAYS, now);
					if (summary.totalClicks === 0) {
						logger.debug({ userId: user.id }, 'No activity this week');
						continue;
					}

					const result = await emailService.sendAnalyticsSummary(
						{ userId: user.id, email: user.email, username: user.username },
						summary,
						{ start: period.start, end: period.end },
					);

					if (result.success) {
						sent += 1;
					} else {
						logger.warn({ userId: user.id, error: result.error }, 'Weekly analytics email failed');
						errors += 1;
					}
				} catch (err) {
					logger.error({ err, userId: user.id }, 'Failed to send weekly analytics email');
					errors += 1;
				}
			}

			logger.info({ sent, errors }, 'Weekly analytics email job completed');
			return { sent, errors };
		},

		async emailStats(days, now = new Date()) {
			const since = new Date(now.getTime() - days * DAY_MS);
			const logs = await emailLogRepository.findByTypeSince('analytics_summary', since);

			const successful = logs.filter((log) => log.success);
			const totalSent = successful.length;
			const totalFailed = logs.length - totalSent;
			const lastSent = successful.reduce<Date | null>(
				(latest, log) => (latest === null || log.sentAt > latest ? log.sentAt : latest),
				null,
			);

			return {
				totalSent,
				totalFailed,
				successRate: logs.length > 0 ? (totalSent / logs.length) * 100 : 0,
				lastSent,
			};
		},
	};
}
