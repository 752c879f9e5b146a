/**
 * Change Password Command
 */

import type { Command } from '@biotap/application';

export interface ChangePasswordCommand extends Command {
	readonly userId: string;
	readonly currentPassword: string;
	readonly newPassword: string;
}
