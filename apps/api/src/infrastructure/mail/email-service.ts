import type { Logger } from '@biotap/logging';

import { createEmailLog, type EmailType } from '../../domain/index.js';
import type { EmailLogRepository } from '../persistence/index.js';
import type { Mailer } from './mailer.js';
import {
	analyticsSummaryEmail,
	passwordResetEmail,
	welcomeEmail,
	type Branding,
	type RenderedEmail,
	type SummaryFigures,
} from './templates.js';

/**
 * Email service configuration
 */
export interface EmailServiceConfig {
	appName: string;
	fromEmail: string;
	frontendUrl: string;
	sendWelcomeEmails: boolean;
	sendAnalyticsEmails: boolean;
	passwordResetExpireMinutes: number;
}

export interface EmailRecipient {
	readonly userId: string;
	readonly email: string;
	readonly username: string;
}

export interface AnalyticsPeriod {
	readonly start: Date;
	readonly end: Date;
}

export type EmailSendResult =
	| { readonly success: true; readonly messageId: string }
	| { readonly success: true; readonly skipped: true; readonly message: string }
	| { readonly success: false; readonly error: string };

/**
 * Sends BioTap's emails and records every attempt in the email log.
 * Delivery failures are reported in the result, never thrown.
 */
export class EmailService {
	private readonly config: EmailServiceConfig;
	private readonly mailer: Mailer;
	private readonly emailLogRepository: EmailLogRepository;
	private readonly logger: Logger;

	constructor(config: EmailServiceConfig, mailer: Mailer, emailLogRepository: EmailLogRepository, logger: Logger) {
		this.config = config;
		this.mailer = mailer;
		this.emailLogRepository = emailLogRepository;
		this.logger = logger.child({ component: 'email' });
	}

	private get branding(): Branding {
		return { appName: this.config.appName, frontendUrl: this.config.frontendUrl };
	}

	async sendWelcomeEmail(recipient: EmailRecipient): Promise<EmailSendResult> {
		if (!this.config.sendWelcomeEmails) {
			return { success: true, skipped: true, message: 'Welcome emails disabled' };
		}

		const email = welcomeEmail(this.branding, recipient.email, recipient.username);
		return this.send(recipient, 'welcome', email);
	}

	async sendPasswordResetEmail(recipient: EmailRecipient, resetToken: string): Promise<EmailSendResult> {
		const email = passwordResetEmail(
			this.branding,
			recipient.email,
			recipient.username,
			resetToken,
			this.config.passwordResetExpireMinutes,
		);
		return this.send(recipient, 'password_reset', email);
	}

	async sendAnalyticsSummary(
		recipient: EmailRecipient,
		figures: SummaryFigures,
		period: AnalyticsPeriod,
	): Promise<EmailSendResult> {
		if (!this.config.sendAnalyticsEmails) {
			return { success: true, skipped: true, message: 'Analytics emails disabled' };
		}

		const email = analyticsSummaryEmail(this.branding, recipient.email, recipient.username, figures);
		return this.send(recipient, 'analytics_summary', email, period);
	}

	private async send(
		recipient: EmailRecipient,
		emailType: EmailType,
		email: RenderedEmail,
		period?: AnalyticsPeriod,
	): Promise<EmailSendResult> {
		let result: EmailSendResult;

		try {
			const messageId = await this.mailer.send({
				from: this.config.fromEmail,
				to: recipient.email,
				subject: email.subject,
				html: email.html,
			});
			this.logger.info({ emailType, userId: recipient.userId }, 'Email sent');
			result = { success: true, messageId };
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.logger.error({ err: error, emailType, userId: recipient.userId }, 'Failed to send email');
			result = { success: false, error: message };
		}

		await this.record(recipient, emailType, email.subject, result, period);
		return result;
	}

	private async record(
		recipient: EmailRecipient,
		emailType: EmailType,
		subject: string,
		result: EmailSendResult,
		period: AnalyticsPeriod | undefined,
	): Promise<void> {
		try {
			await this.emailLogRepository.insert(
				createEmailLog({
					userId: recipient.userId,
					emailType,
					recipientEmail: recipient.email,
					subject,
					success: result.success,
					errorMessage: result.success ? null : result.error,
					analyticsPeriod: period,
				}),
			);
		} catch (error) {
			this.logger.error({ err: error, emailType, userId: recipient.userId }, 'Failed to write email log');
		}
	}
}
