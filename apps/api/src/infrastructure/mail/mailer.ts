/**
 * Mailer
 *
 * Outgoing mail over SMTP with nodemailer. Production mail goes through the
 * Resend SMTP relay; without an API key messages are rendered and logged
 * but not delivered.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { Logger } from '@biotap/logging';

export interface MailMessage {
	readonly from: string;
	readonly to: string;
	readonly subject: string;
	readonly html: string;
}

export interface Mailer {
	/** Resolves with the transport's message id; rejects when delivery fails */
	send(message: MailMessage): Promise<string>;
}

export interface SmtpConfig {
	host: string;
	port: number;
	secure: boolean;
	auth?: { user: string; pass: string } | undefined;
}

export const RESEND_SMTP_HOST = 'smtp.resend.com';

export function resendSmtpConfig(apiKey: string): SmtpConfig {
	return {
		host: RESEND_SMTP_HOST,
		port: 465,
		secure: true,
		auth: { user: 'resend', pass: apiKey },
	};
}

/**
 * Mailer over an existing nodemailer transporter.
 */
export function createTransportMailer(transporter: Transporter, logger: Logger): Mailer {
	const log = logger.child({ component: 'mailer' });

	return {
		async send(message) {
			const info = await transporter.sendMail(message);
			const messageId = typeof info.messageId === 'string' ? info.messageId : '';
			log.debug({ to: message.to, subject: message.subject, messageId }, 'Mail handed to transport');
			return messageId;
		},
	};
}

/**
 * Resend SMTP mailer, or a JSON transport that only logs when no API key is
 * configured.
 */
export function createMailer(resendApiKey: string, logger: Logger): Mailer {
	if (!resendApiKey) {
		logger.warn({ component: 'mailer' }, 'RESEND_API_KEY not set, mail will be logged only');
		return createTransportMailer(nodemailer.createTransport({ jsonTransport: true }), logger);
	}

	const smtp = resendSmtpConfig(resendApiKey);
	logger.info({ component: 'mailer', host: smtp.host, port: smtp.port }, 'Mail transporter initialized');
	return createTransportMailer(nodemailer.createTransport(smtp), logger);
}
