/**
 * Mail Infrastructure
 *
 * nodemailer transport, templates and the email service.
 */

export {
	createMailer,
	createTransportMailer,
	resendSmtpConfig,
	RESEND_SMTP_HOST,
	type Mailer,
	type MailMessage,
	type SmtpConfig,
} from './mailer.js';

export {
	EmailService,
	type EmailServiceConfig,
	type EmailRecipient,
	type AnalyticsPeriod,
	type EmailSendResult,
} from './email-service.js';

export {
	escapeHtml,
	welcomeEmail,
	passwordResetEmail,
	analyticsSummaryEmail,
	type Branding,
	type RenderedEmail,
	type SummaryFigures,
	type SummaryLink,
} from './templates.js';
