export {
	type EmailLog,
	type EmailType,
	type CreateEmailLogInput,
	EMAIL_TYPES,
	createEmailLog,
	isEmailType,
} from './email-log.js';
