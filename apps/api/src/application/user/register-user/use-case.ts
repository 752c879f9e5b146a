/**
 * Register User Use Case
 *
 * Creates a new, active account. The welcome email is sent by the caller
 * once the registration has been committed.
 */

import type { UseCase } from '@biotap/application';
import {
	validateAll,
	validateEmail,
	validateMaxLength,
	validateMinLength,
	Result,
	ExecutionContext,
	UseCaseError,
} from '@biotap/application';
import type { UnitOfWork } from '@biotap/domain-core';
import type { PasswordService } from '@biotap/crypto';

import type { UserRepository } from '../../../infrastructure/persistence/index.js';
import {
	createUser,
	UserRegistered,
	FULL_NAME_MAX_LENGTH,
	USERNAME_MAX_LENGTH,
	USERNAME_MIN_LENGTH,
} from '../../../domain/index.js';
import { passwordFailure } from '../password-errors.js';

import type { RegisterUserCommand } from './command.js';

export interface RegisterUserUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly passwordService: PasswordService;
	readonly unitOfWork: UnitOfWork;
}

export function createRegisterUserUseCase(deps: RegisterUserUseCaseDeps): UseCase<RegisterUserCommand, UserRegistered> {
	const { userRepository, passwordService, unitOfWork } = deps;

	return {
		async execute(command: RegisterUserCommand, context: ExecutionContext): Promise<Result<UserRegistered>> {
			const inputResult = validateAll(
				() => validateMinLength(command.username, USERNAME_MIN_LENGTH, 'username', 'USERNAME_TOO_SHORT'),
				() => validateMaxLength(command.username, USERNAME_MAX_LENGTH, 'username', 'USERNAME_TOO_LONG'),
				() => validateEmail(command.email),
				() => validateMaxLength(command.fullName ?? '', FULL_NAME_MAX_LENGTH, 'full_name', 'FULL_NAME_TOO_LONG'),
			);
			if (Result.isFailure(inputResult)) {
				return inputResult;
			}

			// Username is checked before email
			if (await userRepository.findByUsername(command.username)) {
				return Result.failure(UseCaseError.validation('USERNAME_TAKEN', 'Username already registered'));
			}
			if (await userRepository.findByEmail(command.email)) {
				return Result.failure(UseCaseError.validation('EMAIL_TAKEN', 'Email already registered'));
			}

			const hashResult = await passwordService.validateAndHash(command.password);
			if (hashResult.isErr()) {
				return Result.failure(passwordFailure(hashResult.error));
			}

			const user = createUser({
				username: command.username,
				email: command.email,
				fullName: command.fullName,
				passwordHash: hashResult.value,
			});

			const event = new UserRegistered(context, {
				userId: user.id,
				username: user.username,
				email: user.email,
			});

			return unitOfWork.commit(user, event, command);
		},
	};
}
