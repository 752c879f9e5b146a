import { UseCaseError } from '@biotap/application';
import type { PasswordError } from '@biotap/crypto';

/**
 * Map a password service error onto the use case error the API reports.
 */
export function passwordFailure(error: PasswordError): UseCaseError {
	if (error.type === 'validation') {
		return UseCaseError.validation(error.code, error.message, { field: error.field });
	}
	return UseCaseError.businessRule('HASH_FAILED', error.message);
}
