/**
 * Database Schema
 *
 * Tables of the BioTap service. The events and audit_logs tables live in
 * @biotap/persistence.
 */

export { users, type UserRecord, type NewUserRecord } from './users.js';
export { links, type LinkRecord, type NewLinkRecord } from './links.js';
export { clickEvents, type ClickEventRecord, type NewClickEventRecord } from './click-events.js';
export {
	passwordResetTokens,
	type PasswordResetTokenRecord,
	type NewPasswordResetTokenRecord,
} from './password-reset-tokens.js';
export { emailLogs, type EmailLogRecord, type NewEmailLogRecord } from './email-logs.js';
