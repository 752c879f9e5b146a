/**
 * Change Password Use Case
 *
 * Requires the current password before setting a new one.
 */

import type { UseCase } from '@biotap/application';
import { validateRequired, Result, ExecutionContext, UseCaseError } from '@biotap/application';
import type { UnitOfWork } from '@biotap/domain-core';
import type { PasswordService } from '@biotap/crypto';

import type { UserRepository } from '../../../infrastructure/persistence/index.js';
import { UserPasswordChanged } from '../../../domain/index.js';
import { passwordFailure } from '../password-errors.js';

import type { ChangePasswordCommand } from './command.js';

export interface ChangePasswordUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly passwordService: PasswordService;
	readonly unitOfWork: UnitOfWork;
}

export function createChangePasswordUseCase(
	deps: ChangePasswordUseCaseDeps,
): UseCase<ChangePasswordCommand, UserPasswordChanged> {
	const { userRepository, passwordService, unitOfWork } = deps;

	return {
		async execute(command: ChangePasswordCommand, context: ExecutionContext): Promise<Result<UserPasswordChanged>> {
			const currentResult = validateRequired(command.currentPassword, 'current_password', 'CURRENT_PASSWORD_REQUIRED');
			if (Result.isFailure(currentResult)) {
				return currentResult;
			}

			const complexity = passwordService.validateComplexity(command.newPassword, 'new_password');
			if (complexity.isErr()) {
				return Result.failure(passwordFailure(complexity.error));
			}

			const user = await userRepository.findById(command.userId);
			if (!user) {
				return Result.failure(UseCaseError.notFound('USER_NOT_FOUND', 'User not found'));
			}

			if (!(await passwordService.verify(command.currentPassword, user.passwordHash))) {
				return Result.failure(UseCaseError.validation('INCORRECT_PASSWORD', 'Current password is incorrect'));
			}

			const hashResult = await passwordService.hash(command.newPassword);
			if (hashResult.isErr()) {
				return Result.failure(passwordFailure(hashResult.error));
			}

			const updated = { ...user, passwordHash: hashResult.value, updatedAt: new Date() };
			const event = new UserPasswordChanged(context, { userId: user.id });

			return unitOfWork.commit(updated, event, command);
		},
	};
}
