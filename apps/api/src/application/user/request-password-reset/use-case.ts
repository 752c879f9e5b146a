/**
 * Request Password Reset Use Case
 *
 * Stores a single-use reset token for the account with the given email.
 * An unknown email is reported as not found; the HTTP layer hides that
 * from the caller.
 */

import type { UseCase } from '@biotap/application';
import { validateEmail, validateRequired, Result, ExecutionContext, UseCaseError } from '@biotap/application';
import type { UnitOfWork } from '@biotap/domain-core';
import { hashToken } from '@biotap/crypto';

import type { UserRepository } from '../../../infrastructure/persistence/index.js';
import { createPasswordResetToken, UserPasswordResetRequested } from '../../../domain/index.js';

import type { RequestPasswordResetCommand } from './command.js';

export interface RequestPasswordResetUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly unitOfWork: UnitOfWork;
	readonly expireMinutes: number;
}

export function createRequestPasswordResetUseCase(
	deps: RequestPasswordResetUseCaseDeps,
): UseCase<RequestPasswordResetCommand, UserPasswordResetRequested> {
	const { userRepository, unitOfWork, expireMinutes } = deps;

	return {
		async execute(
			command: RequestPasswordResetCommand,
			context: ExecutionContext,
		): Promise<Result<UserPasswordResetRequested>> {
			const emailResult = validateEmail(command.email);
			if (Result.isFailure(emailResult)) {
				return emailResult;
			}

			const tokenResult = validateRequired(command.resetToken, 'resetToken', 'RESET_TOKEN_REQUIRED');
			if (Result.isFailure(tokenResult)) {
				return tokenResult;
			}

			const user = await userRepository.findByEmail(command.email);
			if (!user) {
				return Result.failure(UseCaseError.notFound('USER_NOT_FOUND', 'User not found'));
			}

			const resetToken = createPasswordResetToken({
				userId: user.id,
				tokenHash: hashToken(command.resetToken),
				expireMinutes,
			});

			const event = new UserPasswordResetRequested(context, {
				userId: user.id,
				resetTokenId: resetToken.id,
				expiresAt: resetToken.expiresAt.toISOString(),
			});

			return unitOfWork.commit(resetToken, event, command);
		},
	};
}
