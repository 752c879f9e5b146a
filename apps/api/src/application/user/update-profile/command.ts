/**
 * Update Profile Command
 *
 * Fields left undefined are not changed; a null fullName clears it.
 */

import type { Command } from '@biotap/application';

export interface UpdateProfileCommand extends Command {
	readonly userId: string;
	readonly email?: string | undefined;
	readonly fullName?: string | null | undefined;
	readonly isActive?: boolean | undefined;
}
