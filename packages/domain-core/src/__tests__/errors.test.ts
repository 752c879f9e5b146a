import { describe, it, expect } from 'vitest';
import { UseCaseError } from '../errors.js';

describe('UseCaseError', () => {
	it('should build errors with empty details by default', () => {
		expect(UseCaseError.validation('INVALID_URL', 'URL must start with http:// or https://')).toEqual({
			type: 'validation',
			code: 'INVALID_URL',
			message: 'URL must start with http:// or https://',
			details: {},
		});
		expect(UseCaseError.forbidden('LINK_FORBIDDEN', 'forbidden', { linkId: 'lnk_1' }).details).toEqual({
			linkId: 'lnk_1',
		});
	});

	it.each([
		[UseCaseError.validation('A', 'a'), 400],
		[UseCaseError.unauthorized('A', 'a'), 401],
		[UseCaseError.forbidden('A', 'a'), 403],
		[UseCaseError.notFound('A', 'a'), 404],
		[UseCaseError.businessRule('A', 'a'), 409],
	])('should map %o to HTTP %i', (error, status) => {
		expect(UseCaseError.httpStatus(error)).toBe(status);
	});
});
