import { describe, it, expect } from 'vitest';
import { Result } from '@biotap/domain-core';
import {
	validateRequired,
	validateMaxLength,
	validateMinLength,
	validateEmail,
	validateHttpUrl,
	validateAll,
} from '../validation.js';

function errorOf(result: Result<unknown>) {
	return Result.isFailure(result) ? result.error : null;
}

describe('validateRequired', () => {
	it('should pass non-empty values through', () => {
		expect(Result.unwrap(validateRequired('hello', 'title', 'TITLE_REQUIRED'))).toBe('hello');
		expect(Result.unwrap(validateRequired(0, 'displayOrder', 'ORDER_REQUIRED'))).toBe(0);
	});

	it.each([null, undefined, '', '   '])('should reject %j', (value) => {
		expect(errorOf(validateRequired(value, 'title', 'TITLE_REQUIRED'))).toEqual({
			type: 'validation',
			code: 'TITLE_REQUIRED',
			message: 'title is required',
			details: { field: 'title' },
		});
	});

	it('should use a custom message', () => {
		expect(errorOf(validateRequired('', 'token', 'TOKEN_REQUIRED', 'Token missing'))?.message).toBe('Token missing');
	});
});

describe('length checks', () => {
	it('should enforce maximum length', () => {
		expect(Result.isSuccess(validateMaxLength('abc', 3, 'icon', 'ICON_TOO_LONG'))).toBe(true);
		expect(errorOf(validateMaxLength('abcd', 3, 'icon', 'ICON_TOO_LONG'))).toEqual({
			type: 'validation',
			code: 'ICON_TOO_LONG',
			message: 'icon must be 3 characters or less',
			details: { field: 'icon', length: 4, maxLength: 3 },
		});
	});

	it('should enforce minimum length', () => {
		expect(Result.isSuccess(validateMinLength('abc', 3, 'username', 'USERNAME_TOO_SHORT'))).toBe(true);
		expect(errorOf(validateMinLength('ab', 3, 'username', 'USERNAME_TOO_SHORT'))?.message).toBe(
			'username must be at least 3 characters',
		);
	});
});

describe('validateEmail', () => {
	it('should accept a normal address', () => {
		expect(Result.isSuccess(validateEmail('alice@example.com'))).toBe(true);
	});

	it.each(['alice', 'alice@', 'alice@example', 'a b@example.com'])('should reject %s', (email) => {
		expect(errorOf(validateEmail(email))?.code).toBe('INVALID_EMAIL');
	});
});

describe('validateHttpUrl', () => {
	it.each(['https://example.com', 'http://localhost:3000/path?q=1'])('should accept %s', (url) => {
		expect(Result.isSuccess(validateHttpUrl(url))).toBe(true);
	});

	it('should reject unparseable URLs', () => {
		expect(errorOf(validateHttpUrl('not a url'))?.message).toBe('Invalid URL format');
	});

	it('should reject non-http schemes', () => {
		expect(errorOf(validateHttpUrl('ftp://example.com'))?.message).toBe('URL must use http or https');
		expect(errorOf(validateHttpUrl('javascript:alert(1)'))?.code).toBe('INVALID_URL');
	});
});

describe('validateAll', () => {
	it('should return the first failure and skip the rest', () => {
		let thirdRan = false;
		const result = validateAll(
			() => validateMinLength('alice', 3, 'username', 'USERNAME_TOO_SHORT'),
			() => validateEmail('nope'),
			() => {
				thirdRan = true;
				return validateEmail('also-nope');
			},
		);

		expect(errorOf(result)?.code).toBe('INVALID_EMAIL');
		expect(thirdRan).toBe(false);
	});

	it('should succeed when every check passes', () => {
		expect(Result.isSuccess(validateAll(() => validateEmail('a@b.co')))).toBe(true);
	});
});
