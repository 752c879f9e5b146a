/**
 * Confirm Password Reset Command
 */

import type { Command } from '@biotap/application';

export interface ConfirmPasswordResetCommand extends Command {
	/** Token from the reset email */
	readonly token: string;
	readonly newPassword: string;
}
