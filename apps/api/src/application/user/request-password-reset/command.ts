/**
 * Request Password Reset Command
 */

import type { Command } from '@biotap/application';

export interface RequestPasswordResetCommand extends Command {
	readonly email: string;
	/** Raw token to be emailed; only its hash is stored */
	readonly resetToken: string;
}
