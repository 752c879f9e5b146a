/**
 * Link Queries
 *
 * Read operations on links. Writes go through the link use cases.
 */

import { Result, UseCaseError, type Failure } from '@biotap/application';

import type { LinkRepository, LinkPage, UserRepository } from '../../infrastructure/persistence/index.js';
import type { Link } from '../../domain/index.js';
import { findOwnedLink, type OwnedLinkLookup } from './ownership.js';

export interface LinkQueriesDeps {
	readonly linkRepository: LinkRepository;
	readonly userRepository: UserRepository;
}

export type PublicLinksLookup = { readonly links: Link[] } | { readonly failure: Failure<never> };

export interface LinkQueries {
	/** The user's own links, in display order */
	listOwn(userId: string, page?: LinkPage): Promise<Link[]>;
	/** One of the user's own links */
	getOwn(linkId: string, userId: string): Promise<OwnedLinkLookup>;
	/** Active links of an active user, by username */
	listPublic(username: string): Promise<PublicLinksLookup>;
}

export function createLinkQueries(deps: LinkQueriesDeps): LinkQueries {
	const { linkRepository, userRepository } = deps;

	return {
		listOwn(userId, page) {
			return linkRepository.findByUser(userId, page);
		},

		getOwn(linkId, userId) {
			return findOwnedLink(linkRepository, linkId, userId, 'access');
		},

		async listPublic(username) {
			const user = await userRepository.findByUsername(username);
			if (!user || !user.isActive) {
				return { failure: Result.failure(UseCaseError.notFound('USER_NOT_FOUND', 'User not found', { username })) };
			}
			return { links: await linkRepository.findActiveByUser(user.id) };
		},
	};
}
