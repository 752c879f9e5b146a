/**
 * @biotap/application
 *
 * Application layer patterns: commands, use cases and input validation.
 */

export { type Command, createCommand } from './command.js';

export { type UseCase } from './use-case.js';

export {
	validateRequired,
	validateMaxLength,
	validateMinLength,
	validateEmail,
	validateHttpUrl,
	validateAll,
} from './validation.js';

// Re-exported for convenience in use case modules
export {
	Result,
	isSuccess,
	isFailure,
	type Success,
	type Failure,
	UseCaseError,
	ExecutionContext,
	type DomainEvent,
	type UnitOfWork,
} from '@biotap/domain-core';
