/**
 * Use Case Errors
 *
 * The expected ways a use case can fail. Each kind has a fixed HTTP status,
 * so routes never pick one themselves.
 */

const STATUS_BY_TYPE = {
	validation: 400,
	unauthorized: 401,
	forbidden: 403,
	not_found: 404,
	business_rule: 409,
} as const;

export type UseCaseErrorType = keyof typeof STATUS_BY_TYPE;

export interface UseCaseError<TType extends UseCaseErrorType = UseCaseErrorType> {
	readonly type: TType;
	/** Machine-readable, e.g. LINK_NOT_FOUND */
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

type ErrorFactory<TType extends UseCaseErrorType> = (
	code: string,
	message: string,
	details?: Record<string, unknown>,
) => UseCaseError<TType>;

function factory<TType extends UseCaseErrorType>(type: TType): ErrorFactory<TType> {
	return (code, message, details = {}) => ({ type, code, message, details });
}

export const UseCaseError = {
	/** Bad input, e.g. `validation('INVALID_URL', 'URL must start with http:// or https://')` */
	validation: factory('validation'),
	unauthorized: factory('unauthorized'),
	/** Authenticated, but the entity belongs to someone else */
	forbidden: factory('forbidden'),
	notFound: factory('not_found'),
	/** Conflicts with existing state, e.g. a taken username */
	businessRule: factory('business_rule'),

	httpStatus(error: UseCaseError): number {
		return STATUS_BY_TYPE[error.type];
	},
};
