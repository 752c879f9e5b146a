/**
 * Link Application Layer
 *
 * Use cases and queries for links and click tracking.
 */

// Create Link
export { type CreateLinkCommand, createCreateLinkUseCase, type CreateLinkUseCaseDeps } from './create-link/index.js';

// Update Link
export { type UpdateLinkCommand, createUpdateLinkUseCase, type UpdateLinkUseCaseDeps } from './update-link/index.js';

// Delete Link
export { type DeleteLinkCommand, createDeleteLinkUseCase, type DeleteLinkUseCaseDeps } from './delete-link/index.js';

// Track Click
export {
	type TrackClickCommand,
	type VisitorDetails,
	createTrackClickUseCase,
	type TrackClickUseCaseDeps,
} from './track-click/index.js';

// Queries
export { createLinkQueries, type LinkQueries, type LinkQueriesDeps, type PublicLinksLookup } from './link-queries.js';
export { findOwnedLink, type LinkAction, type OwnedLinkLookup } from './ownership.js';
export { validateLinkFields, type LinkFields } from './link-validation.js';
