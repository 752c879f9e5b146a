/**
 * Delete Account Use Case
 *
 * Removes the user. Links, click events, reset tokens and email logs go
 * with it through the foreign key cascades.
 */

import type { UseCase } from '@biotap/application';
import { Result, ExecutionContext, UseCaseError } from '@biotap/application';
import type { UnitOfWork } from '@biotap/domain-core';

import type { UserRepository } from '../../../infrastructure/persistence/index.js';
import { UserDeleted } from '../../../domain/index.js';

import type { DeleteAccountCommand } from './command.js';

export interface DeleteAccountUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createDeleteAccountUseCase(deps: DeleteAccountUseCaseDeps): UseCase<DeleteAccountCommand, UserDeleted> {
	const { userRepository, unitOfWork } = deps;

	return {
		async execute(command: DeleteAccountCommand, context: ExecutionContext): Promise<Result<UserDeleted>> {
			const user = await userRepository.findById(command.userId);
			if (!user) {
				return Result.failure(UseCaseError.notFound('USER_NOT_FOUND', 'User not found'));
			}

			const event = new UserDeleted(context, { userId: user.id, username: user.username });

			return unitOfWork.commitDelete(user, event, command);
		},
	};
}
