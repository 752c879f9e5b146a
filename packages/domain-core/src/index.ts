/**
 * @biotap/domain-core
 *
 * Core domain building blocks: Result, UseCaseError, execution and tracing
 * contexts, domain events and the UnitOfWork contract.
 */

export { UseCaseError, type UseCaseErrorType } from './errors.js';

export {
	Result,
	isSuccess,
	isFailure,
	type Success,
	type Failure,
	// For UnitOfWork implementations only
	RESULT_SUCCESS_TOKEN,
	type ResultSuccessToken,
} from './result.js';

export { TracingContext, type TracingContextData } from './tracing-context.js';

export { ExecutionContext } from './execution-context.js';

export { SYSTEM_PRINCIPAL, userPrincipal, type PrincipalInfo, type PrincipalType } from './principal.js';

export { DomainEvent, BaseDomainEvent, type DomainEventBase, type DomainEventMetadata } from './domain-event.js';

export { type UnitOfWork, type UnitOfWorkStep, type Aggregate } from './unit-of-work.js';
