import { Result, UseCaseError, type Failure } from '@biotap/application';

import type { LinkRepository } from '../../infrastructure/persistence/index.js';
import type { Link } from '../../domain/index.js';

export type LinkAction = 'access' | 'update' | 'delete';

export type OwnedLinkLookup = { readonly link: Link } | { readonly failure: Failure<never> };

/**
 * Load a link and check that `userId` owns it.
 */
export async function findOwnedLink(
	linkRepository: LinkRepository,
	linkId: string,
	userId: string,
	action: LinkAction,
): Promise<OwnedLinkLookup> {
	const link = await linkRepository.findById(linkId);
	if (!link) {
		return { failure: Result.failure(UseCaseError.notFound('LINK_NOT_FOUND', 'Link not found', { linkId })) };
	}
	if (link.userId !== userId) {
		return {
			failure: Result.failure(
				UseCaseError.forbidden('LINK_FORBIDDEN', `Not authorized to ${action} this link`, { linkId }),
			),
		};
	}
	return { link };
}
