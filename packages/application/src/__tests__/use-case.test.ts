import { describe, it, expect } from 'vitest';
import {
	Result,
	UseCaseError,
	ExecutionContext,
	BaseDomainEvent,
	DomainEvent,
	RESULT_SUCCESS_TOKEN,
	type UnitOfWork,
	type Aggregate,
} from '@biotap/domain-core';
import type { UseCase } from '../use-case.js';
import { createCommand, type Command } from '../command.js';
import { validateRequired } from '../validation.js';

interface RenameCommand extends Command {
	readonly id: string;
	readonly name: string;
}

interface RenamedData {
	readonly id: string;
	readonly name: string;
	readonly [key: string]: unknown;
}

class Renamed extends BaseDomainEvent<RenamedData> {
	constructor(ctx: ExecutionContext, data: RenamedData) {
		super(
			{ eventType: DomainEvent.eventType('thing', 'renamed'), aggregateType: 'Thing', aggregateId: data.id },
			ctx,
			data,
		);
	}
}

function recordingUnitOfWork(committed: Aggregate[]): UnitOfWork {
	return {
		async commit(aggregate, event) {
			committed.push(aggregate);
			return Result.success(RESULT_SUCCESS_TOKEN, event);
		},
		async commitDelete(_aggregate, event) {
			return Result.success(RESULT_SUCCESS_TOKEN, event);
		},
		async commitAll(aggregates, event) {
			committed.push(...aggregates);
			return Result.success(RESULT_SUCCESS_TOKEN, event);
		},
		async commitStep(step, event) {
			const rejection = await step(undefined);
			return rejection ? Result.failure(rejection) : Result.success(RESULT_SUCCESS_TOKEN, event);
		},
	};
}

function createRenameUseCase(unitOfWork: UnitOfWork): UseCase<RenameCommand, Renamed> {
	return {
		async execute(command, context) {
			const nameResult = validateRequired(command.name, 'name', 'NAME_REQUIRED');
			if (Result.isFailure(nameResult)) {
				return nameResult;
			}
			if (command.id === 'missing') {
				return Result.failure(UseCaseError.notFound('THING_NOT_FOUND', 'Thing not found'));
			}
			const event = new Renamed(context, { id: command.id, name: nameResult.value });
			return unitOfWork.commit({ id: command.id }, event, command);
		},
	};
}

describe('UseCase', () => {
	const context = ExecutionContext.create('usr_1');

	it('should return the committed event on success', async () => {
		const committed: Aggregate[] = [];
		const useCase = createRenameUseCase(recordingUnitOfWork(committed));

		const result = await useCase.execute(createCommand('Rename', { id: 'thing-1', name: 'New' }), context);

		expect(Result.isSuccess(result)).toBe(true);
		if (Result.isSuccess(result)) {
			expect(result.value.getData()).toEqual({ id: 'thing-1', name: 'New' });
			expect(result.value.principalId).toBe('usr_1');
		}
		expect(committed).toEqual([{ id: 'thing-1' }]);
	});

	it('should short-circuit on validation failure without committing', async () => {
		const committed: Aggregate[] = [];
		const useCase = createRenameUseCase(recordingUnitOfWork(committed));

		const result = await useCase.execute({ id: 'thing-1', name: ' ' }, context);

		expect(Result.isFailure(result) && result.error.code).toBe('NAME_REQUIRED');
		expect(committed).toEqual([]);
	});

	it('should surface business failures', async () => {
		const useCase = createRenameUseCase(recordingUnitOfWork([]));
		const result = await useCase.execute({ id: 'missing', name: 'x' }, context);
		expect(Result.isFailure(result) && UseCaseError.httpStatus(result.error)).toBe(404);
	});
});

describe('createCommand', () => {
	it('should tag the command with its operation name', () => {
		expect(createCommand('DeleteLink', { linkId: 'lnk_1' })).toEqual({ _type: 'DeleteLink', linkId: 'lnk_1' });
	});
});
