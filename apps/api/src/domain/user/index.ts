/**
 * User
 *
 * Exports for the user entity.
 */

export {
	type User,
	type CreateUserInput,
	createUser,
	isUser,
	USERNAME_MIN_LENGTH,
	USERNAME_MAX_LENGTH,
	FULL_NAME_MAX_LENGTH,
} from './user.js';

export {
	type UserRegisteredData,
	UserRegistered,
	type UserUpdatedData,
	UserUpdated,
	type UserPasswordChangedData,
	UserPasswordChanged,
	type UserPasswordResetRequestedData,
	UserPasswordResetRequested,
	type UserPasswordResetData,
	UserPasswordReset,
	type UserDeletedData,
	UserDeleted,
} from './events.js';
