import {
	validateAll,
	validateHttpUrl,
	validateMaxLength,
	validateMinLength,
	type Result,
} from '@biotap/application';

import {
	LINK_DESCRIPTION_MAX_LENGTH,
	LINK_ICON_MAX_LENGTH,
	LINK_TITLE_MAX_LENGTH,
	LINK_URL_MAX_LENGTH,
} from '../../domain/index.js';

export interface LinkFields {
	readonly title?: string | undefined;
	readonly url?: string | undefined;
	readonly description?: string | null | undefined;
	readonly icon?: string | null | undefined;
}

/**
 * Validate the supplied link fields; absent ones are skipped.
 */
export function validateLinkFields(fields: LinkFields): Result<void> {
	const { title, url, description, icon } = fields;

	return validateAll(
		() => (title === undefined ? ok() : validateMinLength(title, 1, 'title', 'TITLE_REQUIRED')),
		() => (title === undefined ? ok() : validateMaxLength(title, LINK_TITLE_MAX_LENGTH, 'title', 'TITLE_TOO_LONG')),
		() => (url === undefined ? ok() : validateMaxLength(url, LINK_URL_MAX_LENGTH, 'url', 'URL_TOO_LONG')),
		() => (url === undefined ? ok() : validateHttpUrl(url)),
		() =>
			description === undefined || description === null
				? ok()
				: validateMaxLength(description, LINK_DESCRIPTION_MAX_LENGTH, 'description', 'DESCRIPTION_TOO_LONG'),
		() =>
			icon === undefined || icon === null ? ok() : validateMaxLength(icon, LINK_ICON_MAX_LENGTH, 'icon', 'ICON_TOO_LONG'),
	);
}

function ok(): Result<void> {
	return validateAll();
}
