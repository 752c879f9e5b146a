/**
 * Delete Account Command
 */

import type { Command } from '@biotap/application';

export interface DeleteAccountCommand extends Command {
	readonly userId: string;
}
