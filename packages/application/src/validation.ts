/**
 * Input checks for use cases. Each returns a Result, so a failed check is
 * returned from the use case as it stands.
 *
 * @example
 * ```typescript
 * const title = validateRequired(command.title, 'title', 'TITLE_REQUIRED');
 * if (Result.isFailure(title)) return title;
 * ```
 */

import { Result, UseCaseError } from '@biotap/domain-core';

type Details = Record<string, unknown>;

function invalid(code: string, message: string, details: Details): Result<never> {
	return Result.failure(UseCaseError.validation(code, message, details));
}

// Nothing has changed yet when input is checked, so a pass needs no commit.
function valid<T>(value: T): Result<T> {
	return { _tag: 'success', value };
}

/**
 * Fails on null, undefined and blank strings.
 */
export function validateRequired<T>(
	value: T | null | undefined,
	field: string,
	code: string,
	message: string = `${field} is required`,
): Result<NonNullable<T>> {
	if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
		return invalid(code, message, { field });
	}
	return valid(value);
}

export function validateMaxLength(value: string, maxLength: number, field: string, code: string): Result<string> {
	return value.length > maxLength
		? invalid(code, `${field} must be ${maxLength} characters or less`, { field, length: value.length, maxLength })
		: valid(value);
}

export function validateMinLength(value: string, minLength: number, field: string, code: string): Result<string> {
	return value.length < minLength
		? invalid(code, `${field} must be at least ${minLength} characters`, { field, length: value.length, minLength })
		: valid(value);
}

// Shape only: something@something.tld
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function validateEmail(email: string, field: string = 'email', code: string = 'INVALID_EMAIL'): Result<string> {
	return EMAIL_PATTERN.test(email) ? valid(email) : invalid(code, 'Invalid email format', { field, email });
}

/**
 * Absolute http or https URL with a host.
 */
export function validateHttpUrl(value: string, field: string = 'url', code: string = 'INVALID_URL'): Result<string> {
	let parsed: URL;
	try {
		parsed = new URL(value);
	} catch {
		return invalid(code, 'Invalid URL format', { field, url: value });
	}
	if ((parsed.protocol !== 'http:' && parsed.protocol !== 'https:') || parsed.hostname === '') {
		return invalid(code, 'URL must use http or https', { field, url: value });
	}
	return valid(value);
}

/**
 * Runs the checks in order and stops at the first failure.
 *
 * @example
 * ```typescript
 * const checked = validateAll(
 *     () => validateMinLength(command.username, 3, 'username', 'USERNAME_TOO_SHORT'),
 *     () => validateEmail(command.email),
 * );
 * if (Result.isFailure(checked)) return checked;
 * ```
 */
export function validateAll(...checks: Array<() => Result<unknown>>): Result<void> {
	for (const check of checks) {
		const result = check();
		if (Result.isFailure(result)) return Result.failure(result.error);
	}
	return valid(undefined);
}
