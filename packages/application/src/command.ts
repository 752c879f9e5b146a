/**
 * Command Types
 *
 * Commands are the immutable input of write operations, named in the
 * imperative (CreateLink, ChangePassword). They carry no validation logic;
 * use cases validate them. The audit log records the command under its
 * `_type`.
 *
 * @example
 * ```typescript
 * interface UpdateLinkCommand extends Command {
 *     readonly linkId: string;
 *     readonly title?: string;              // undefined = no change
 *     readonly description?: string | null; // null = clear
 * }
 * ```
 */

export interface Command {
	/** Operation name used in audit logs */
	readonly _type?: string;
}

/**
 * Build a command with an explicit operation name.
 *
 * @example
 * ```typescript
 * const command = createCommand('DeleteLink', { linkId });
 * // command._type === 'DeleteLink'
 * ```
 */
export function createCommand<T extends Record<string, unknown>>(type: string, data: T): Command & T {
	return { _type: type, ...data };
}
