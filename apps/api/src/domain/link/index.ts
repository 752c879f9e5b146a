/**
 * Link
 *
 * Exports for the link entity.
 */

export {
	type Link,
	type CreateLinkInput,
	createLink,
	compareLinks,
	isLink,
	LINK_TITLE_MAX_LENGTH,
	LINK_URL_MAX_LENGTH,
	LINK_DESCRIPTION_MAX_LENGTH,
	LINK_ICON_MAX_LENGTH,
} from './link.js';

export {
	type LinkCreatedData,
	LinkCreated,
	type LinkUpdatedData,
	LinkUpdated,
	type LinkDeletedData,
	LinkDeleted,
	type LinkClickedData,
	LinkClicked,
} from './events.js';
