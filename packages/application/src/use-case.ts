/**
 * UseCase Interface
 *
 * A use case performs one business operation:
 * - takes a command and an execution context
 * - validates input and checks business rules
 * - creates or modifies aggregates
 * - returns the resulting domain event, committed through the UnitOfWork
 *
 * @example
 * ```typescript
 * export function createCreateLinkUseCase(deps: CreateLinkUseCaseDeps): UseCase<CreateLinkCommand, LinkCreated> {
 *     return {
 *         async execute(command, context) {
 *             const titleResult = validateRequired(command.title, 'title', 'TITLE_REQUIRED');
 *             if (Result.isFailure(titleResult)) return titleResult;
 *
 *             const link = createLink({ ... });
 *             const event = new LinkCreated(context, { linkId: link.id, ... });
 *             return deps.unitOfWork.commit(link, event, command);
 *         },
 *     };
 * }
 * ```
 */

import type { Result, DomainEvent, ExecutionContext } from '@biotap/domain-core';
import type { Command } from './command.js';

/**
 * @typeParam TCommand - input data
 * @typeParam TEvent - domain event returned on success
 */
export interface UseCase<TCommand extends Command, TEvent extends DomainEvent> {
	execute(command: TCommand, context: ExecutionContext): Promise<Result<TEvent>>;
}
