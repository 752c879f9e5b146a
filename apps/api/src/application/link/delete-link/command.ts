/**
 * Delete Link Command
 */

import type { Command } from '@biotap/application';

export interface DeleteLinkCommand extends Command {
	readonly linkId: string;
	readonly userId: string;
}
