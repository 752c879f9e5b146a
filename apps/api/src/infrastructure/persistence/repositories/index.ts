/**
 * Repositories
 */

export { type UserRepository, createUserRepository } from './user-repository.js';
export { type LinkRepository, type LinkPage, createLinkRepository } from './link-repository.js';
export {
	type ClickEventRepository,
	type ClickQuery,
	type ClickTotals,
	type DayCount,
	type LinkClickCount,
	type DeviceClickCount,
	type CountryClickCount,
	createClickEventRepository,
} from './click-event-repository.js';
export {
	type PasswordResetTokenRepository,
	createPasswordResetTokenRepository,
} from './password-reset-token-repository.js';
export { type EmailLogRepository, createEmailLogRepository } from './email-log-repository.js';
