/**
 * Delete Link Use Case
 *
 * Deleting a link also removes its click events.
 */

import type { UseCase } from '@biotap/application';
import { Result, ExecutionContext } from '@biotap/application';
import type { UnitOfWork } from '@biotap/domain-core';

import type { LinkRepository } from '../../../infrastructure/persistence/index.js';
import { LinkDeleted } from '../../../domain/index.js';
import { findOwnedLink } from '../ownership.js';

import type { DeleteLinkCommand } from './command.js';

export interface DeleteLinkUseCaseDeps {
	readonly linkRepository: LinkRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createDeleteLinkUseCase(deps: DeleteLinkUseCaseDeps): UseCase<DeleteLinkCommand, LinkDeleted> {
	const { linkRepository, unitOfWork } = deps;

	return {
		async execute(command: DeleteLinkCommand, context: ExecutionContext): Promise<Result<LinkDeleted>> {
			const lookup = await findOwnedLink(linkRepository, command.linkId, command.userId, 'delete');
			if ('failure' in lookup) {
				return lookup.failure;
			}

			const event = new LinkDeleted(context, { linkId: lookup.link.id, userId: lookup.link.userId });

			return unitOfWork.commitDelete(lookup.link, event, command);
		},
	};
}
