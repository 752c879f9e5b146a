/**
 * Update Link Command
 *
 * Only the fields that are set are applied. `null` clears description
 * or icon.
 */

import type { Command } from '@biotap/application';

export interface UpdateLinkCommand extends Command {
	readonly linkId: string;
	/** User making the change; must own the link */
	readonly userId: string;
	readonly title?: string | undefined;
	readonly url?: string | undefined;
	readonly description?: string | null | undefined;
	readonly isActive?: boolean | undefined;
	readonly displayOrder?: number | undefined;
	readonly icon?: string | null | undefined;
}
