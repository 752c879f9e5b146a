/**
 * Confirm Password Reset Use Case
 *
 * Redeems a reset token: claims it and sets the new password in one commit.
 * Only one of two concurrent redemptions can claim the token.
 */

import type { UseCase } from '@biotap/application';
import { Result, ExecutionContext, UseCaseError } from '@biotap/application';
import type { TransactionalUnitOfWork } from '@biotap/persistence';
import { hashToken, type PasswordService } from '@biotap/crypto';

import type {
	PasswordResetTokenRepository,
	UserRepository,
} from '../../../infrastructure/persistence/index.js';
import { isRedeemable, UserPasswordReset } from '../../../domain/index.js';
import { passwordFailure } from '../password-errors.js';

import type { ConfirmPasswordResetCommand } from './command.js';

export interface ConfirmPasswordResetUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly passwordResetTokenRepository: PasswordResetTokenRepository;
	readonly passwordService: PasswordService;
	readonly unitOfWork: TransactionalUnitOfWork;
}

function invalidResetToken(): UseCaseError {
	return UseCaseError.validation('INVALID_RESET_TOKEN', 'Invalid or expired reset token');
}

export function createConfirmPasswordResetUseCase(
	deps: ConfirmPasswordResetUseCaseDeps,
): UseCase<ConfirmPasswordResetCommand, UserPasswordReset> {
	const { userRepository, passwordResetTokenRepository, passwordService, unitOfWork } = deps;

	return {
		async execute(command: ConfirmPasswordResetCommand, context: ExecutionContext): Promise<Result<UserPasswordReset>> {
			const complexity = passwordService.validateComplexity(command.newPassword, 'new_password');
			if (complexity.isErr()) {
				return Result.failure(passwordFailure(complexity.error));
			}

			const resetToken = await passwordResetTokenRepository.findByTokenHash(hashToken(command.token));
			if (!resetToken || !isRedeemable(resetToken)) {
				return Result.failure(invalidResetToken());
			}

			const user = await userRepository.findById(resetToken.userId);
			if (!user) {
				return Result.failure(UseCaseError.notFound('USER_NOT_FOUND', 'User not found'));
			}

			const hashResult = await passwordService.hash(command.newPassword);
			if (hashResult.isErr()) {
				return Result.failure(passwordFailure(hashResult.error));
			}

			const now = new Date();
			const updatedUser = { ...user, passwordHash: hashResult.value, updatedAt: now };

			const event = new UserPasswordReset(context, {
				userId: user.id,
				resetTokenId: resetToken.id,
			});

			return unitOfWork.commitStep(
				async (tx) => {
					if (!(await passwordResetTokenRepository.claim(resetToken.id, now, tx))) {
						return invalidResetToken();
					}
					await userRepository.persist(updatedUser, tx);
					return null;
				},
				event,
				command,
			);
		},
	};
}
