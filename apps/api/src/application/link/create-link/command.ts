/**
 * Create Link Command
 */

import type { Command } from '@biotap/application';

export interface CreateLinkCommand extends Command {
	readonly userId: string;
	readonly title: string;
	readonly url: string;
	readonly description: string | null;
	readonly isActive: boolean;
	readonly displayOrder: number;
	readonly icon: string | null;
}
