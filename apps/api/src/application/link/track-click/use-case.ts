/**
 * Track Click Use Case
 *
 * Counts a click on an active link. With visitor details it also records a
 * click event for analytics, in the same commit.
 */

import type { UseCase } from '@biotap/application';
import { Result, ExecutionContext, UseCaseError } from '@biotap/application';
import type { TransactionalUnitOfWork } from '@biotap/persistence';

import type { ClickEventRepository, LinkRepository } from '../../../infrastructure/persistence/index.js';
import { createClickEvent, LinkClicked } from '../../../domain/index.js';

import type { TrackClickCommand } from './command.js';

export interface TrackClickUseCaseDeps {
	readonly linkRepository: LinkRepository;
	readonly clickEventRepository: ClickEventRepository;
	readonly unitOfWork: TransactionalUnitOfWork;
}

function linkNotActive(linkId: string): UseCaseError {
	return UseCaseError.notFound('LINK_NOT_ACTIVE', 'Link is not active', { linkId });
}

export function createTrackClickUseCase(deps: TrackClickUseCaseDeps): UseCase<TrackClickCommand, LinkClicked> {
	const { linkRepository, clickEventRepository, unitOfWork } = deps;

	return {
		async execute(command: TrackClickCommand, context: ExecutionContext): Promise<Result<LinkClicked>> {
			const link = await linkRepository.findById(command.linkId);
			if (!link) {
				return Result.failure(UseCaseError.notFound('LINK_NOT_FOUND', 'Link not found', { linkId: command.linkId }));
			}
			if (!link.isActive) {
				return Result.failure(linkNotActive(link.id));
			}

			const clickEvent =
				command.visitor === null
					? null
					: createClickEvent({ linkId: link.id, clickedAt: new Date(), ...command.visitor });
			const event = new LinkClicked(context, {
				linkId: link.id,
				clickEventId: clickEvent?.id ?? null,
			});

			return unitOfWork.commitStep(
				async (tx) => {
					// The link may have been deactivated since it was read
					const clickCount = await linkRepository.incrementClickCount(link.id, tx);
					if (clickCount === undefined) {
						return linkNotActive(link.id);
					}
					if (clickEvent) {
						await clickEventRepository.persist(clickEvent, tx);
					}
					return null;
				},
				event,
				command,
			);
		},
	};
}
