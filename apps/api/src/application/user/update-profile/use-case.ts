/**
 * Update Profile Use Case
 */

import type { UseCase } from '@biotap/application';
import { validateEmail, validateMaxLength, Result, ExecutionContext, UseCaseError } from '@biotap/application';
import type { UnitOfWork } from '@biotap/domain-core';

import type { UserRepository } from '../../../infrastructure/persistence/index.js';
import { UserUpdated, FULL_NAME_MAX_LENGTH, type User } from '../../../domain/index.js';

import type { UpdateProfileCommand } from './command.js';

export interface UpdateProfileUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createUpdateProfileUseCase(deps: UpdateProfileUseCaseDeps): UseCase<UpdateProfileCommand, UserUpdated> {
	const { userRepository, unitOfWork } = deps;

	return {
		async execute(command: UpdateProfileCommand, context: ExecutionContext): Promise<Result<UserUpdated>> {
			const user = await userRepository.findById(command.userId);
			if (!user) {
				return Result.failure(UseCaseError.notFound('USER_NOT_FOUND', 'User not found'));
			}

			if (command.email !== undefined) {
				const emailResult = validateEmail(command.email);
				if (Result.isFailure(emailResult)) {
					return emailResult;
				}

				const owner = await userRepository.findByEmail(command.email);
				if (owner && owner.id !== user.id) {
					return Result.failure(UseCaseError.validation('EMAIL_TAKEN', 'Email already registered'));
				}
			}

			if (command.fullName !== undefined && command.fullName !== null) {
				const nameResult = validateMaxLength(command.fullName, FULL_NAME_MAX_LENGTH, 'full_name', 'FULL_NAME_TOO_LONG');
				if (Result.isFailure(nameResult)) {
					return nameResult;
				}
			}

			const changedFields: string[] = [];
			let updated: User = { ...user, updatedAt: new Date() };
			if (command.email !== undefined) {
				updated = { ...updated, email: command.email };
				changedFields.push('email');
			}
			if (command.fullName !== undefined) {
				updated = { ...updated, fullName: command.fullName };
				changedFields.push('fullName');
			}
			if (command.isActive !== undefined) {
				updated = { ...updated, isActive: command.isActive };
				changedFields.push('isActive');
			}

			const event = new UserUpdated(context, { userId: user.id, changedFields });

			return unitOfWork.commit(updated, event, command);
		},
	};
}
