export {
	type PasswordResetToken,
	type CreatePasswordResetTokenInput,
	createPasswordResetToken,
	isRedeemable,
	isPasswordResetToken,
} from './password-reset-token.js';
