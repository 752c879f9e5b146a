/**
 * Use Case Results
 *
 * What every use case returns: the committed event, or a UseCaseError the
 * HTTP layer turns into a status code. `success()` wants a token only the
 * unit of work (and input validation) holds, so a use case cannot report
 * success without having written its event and audit log.
 *
 * ```typescript
 * if (link.userId !== command.userId) {
 *     return Result.failure(UseCaseError.forbidden('LINK_FORBIDDEN', 'Not enough permissions'));
 * }
 * return unitOfWork.commit(updated, event, command);
 * ```
 */

import type { UseCaseError } from './errors.js';

/**
 * Authorises Result.success(). Only UnitOfWork implementations use it.
 *
 * @internal
 */
export const RESULT_SUCCESS_TOKEN: unique symbol = Symbol('RESULT_SUCCESS_TOKEN');

/** @internal */
export type ResultSuccessToken = typeof RESULT_SUCCESS_TOKEN;

export interface Success<T> {
	readonly _tag: 'success';
	readonly value: T;
}

// T is carried so a Failure can stand in for any Result<T>.
export interface Failure<T> {
	readonly _tag: 'failure';
	readonly error: UseCaseError;
}

export type Result<T> = Success<T> | Failure<T>;

export function isSuccess<T>(result: Result<T>): result is Success<T> {
	return result._tag === 'success';
}

export function isFailure<T>(result: Result<T>): result is Failure<T> {
	return result._tag === 'failure';
}

export const Result = {
	/**
	 * Create a successful result. Requires the success token.
	 *
	 * @throws Error if the token is wrong
	 * @internal
	 */
	success<T>(token: ResultSuccessToken, value: T): Success<T> {
		if (token !== RESULT_SUCCESS_TOKEN) {
			throw new Error('Result.success() is restricted. Use UnitOfWork.commit() to create successful results.');
		}
		return { _tag: 'success', value };
	},

	/**
	 * Create a failed result. Any code may do this.
	 */
	failure<T>(error: UseCaseError): Failure<T> {
		return { _tag: 'failure', error };
	},

	isSuccess,

	isFailure,

	/**
	 * @throws Error if the result is a failure
	 */
	unwrap<T>(result: Result<T>): T {
		if (isSuccess(result)) {
			return result.value;
		}
		throw new Error(`Cannot unwrap failure result: ${result.error.code} - ${result.error.message}`);
	},
};
