/**
 * Update Link Use Case
 */

import type { UseCase } from '@biotap/application';
import { Result, ExecutionContext } from '@biotap/application';
import type { UnitOfWork } from '@biotap/domain-core';

import type { LinkRepository } from '../../../infrastructure/persistence/index.js';
import { LinkUpdated, type Link } from '../../../domain/index.js';
import { validateLinkFields } from '../link-validation.js';
import { findOwnedLink } from '../ownership.js';

import type { UpdateLinkCommand } from './command.js';

export interface UpdateLinkUseCaseDeps {
	readonly linkRepository: LinkRepository;
	readonly unitOfWork: UnitOfWork;
}

const UPDATABLE_FIELDS = ['title', 'url', 'description', 'isActive', 'displayOrder', 'icon'] as const;

export function createUpdateLinkUseCase(deps: UpdateLinkUseCaseDeps): UseCase<UpdateLinkCommand, LinkUpdated> {
	const { linkRepository, unitOfWork } = deps;

	return {
		async execute(command: UpdateLinkCommand, context: ExecutionContext): Promise<Result<LinkUpdated>> {
			const lookup = await findOwnedLink(linkRepository, command.linkId, command.userId, 'update');
			if ('failure' in lookup) {
				return lookup.failure;
			}

			const fieldsResult = validateLinkFields(command);
			if (Result.isFailure(fieldsResult)) {
				return fieldsResult;
			}

			const { link } = lookup;
			const updated: Link = {
				...link,
				title: command.title ?? link.title,
				url: command.url ?? link.url,
				description: command.description === undefined ? link.description : command.description,
				isActive: command.isActive ?? link.isActive,
				displayOrder: command.displayOrder ?? link.displayOrder,
				icon: command.icon === undefined ? link.icon : command.icon,
				updatedAt: new Date(),
			};

			const event = new LinkUpdated(context, {
				linkId: link.id,
				userId: link.userId,
				changedFields: UPDATABLE_FIELDS.filter((field) => command[field] !== undefined),
			});

			return unitOfWork.commit(updated, event, command);
		},
	};
}
