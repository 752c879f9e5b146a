/**
 * Create Link Use Case
 */

import type { UseCase } from '@biotap/application';
import { Result, ExecutionContext } from '@biotap/application';
import type { UnitOfWork } from '@biotap/domain-core';

import { createLink, LinkCreated } from '../../../domain/index.js';
import { validateLinkFields } from '../link-validation.js';

import type { CreateLinkCommand } from './command.js';

export interface CreateLinkUseCaseDeps {
	readonly unitOfWork: UnitOfWork;
}

export function createCreateLinkUseCase(deps: CreateLinkUseCaseDeps): UseCase<CreateLinkCommand, LinkCreated> {
	const { unitOfWork } = deps;

	return {
		async execute(command: CreateLinkCommand, context: ExecutionContext): Promise<Result<LinkCreated>> {
			const fieldsResult = validateLinkFields(command);
			if (Result.isFailure(fieldsResult)) {
				return fieldsResult;
			}

			const link = createLink({
				userId: command.userId,
				title: command.title,
				url: command.url,
				description: command.description,
				isActive: command.isActive,
				displayOrder: command.displayOrder,
				icon: command.icon,
			});

			const event = new LinkCreated(context, {
				linkId: link.id,
				userId: link.userId,
				title: link.title,
				url: link.url,
			});

			return unitOfWork.commit(link, event, command);
		},
	};
}
