/**
 * Register User Command
 */

import type { Command } from '@biotap/application';

export interface RegisterUserCommand extends Command {
	readonly username: string;
	readonly email: string;
	/** Plain text, hashed by the use case */
	readonly password: string;
	readonly fullName: string | null;
}
