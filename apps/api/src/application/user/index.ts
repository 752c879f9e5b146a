/**
 * User Application Layer
 *
 * Use cases for accounts and credentials.
 */

// Register User
export {
	type RegisterUserCommand,
	createRegisterUserUseCase,
	type RegisterUserUseCaseDeps,
} from './register-user/index.js';

// Password Reset
export {
	type RequestPasswordResetCommand,
	createRequestPasswordResetUseCase,
	type RequestPasswordResetUseCaseDeps,
} from './request-password-reset/index.js';
export {
	type ConfirmPasswordResetCommand,
	createConfirmPasswordResetUseCase,
	type ConfirmPasswordResetUseCaseDeps,
} from './confirm-password-reset/index.js';

// Update Profile
export {
	type UpdateProfileCommand,
	createUpdateProfileUseCase,
	type UpdateProfileUseCaseDeps,
} from './update-profile/index.js';

// Change Password
export {
	type ChangePasswordCommand,
	createChangePasswordUseCase,
	type ChangePasswordUseCaseDeps,
} from './change-password/index.js';

// Delete Account
export {
	type DeleteAccountCommand,
	createDeleteAccountUseCase,
	type DeleteAccountUseCaseDeps,
} from './delete-account/index.js';

export { passwordFailure } from './password-errors.js';
