/**
 * User Events
 *
 * Events emitted when a user account changes.
 */

import { BaseDomainEvent, DomainEvent, type DomainEventBase, type ExecutionContext } from '@biotap/domain-core';

function userEvent(eventType: string, userId: string): DomainEventBase {
	return { eventType, aggregateType: 'User', aggregateId: userId };
}

// -----------------------------------------------------------------------------
// UserRegistered
// -----------------------------------------------------------------------------

export interface UserRegisteredData {
	readonly userId: string;
	readonly username: string;
	readonly email: string;
	readonly [key: string]: unknown;
}

export class UserRegistered extends BaseDomainEvent<UserRegisteredData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('user', 'registered');

	constructor(ctx: ExecutionContext, data: UserRegisteredData) {
		super(userEvent(UserRegistered.EVENT_TYPE, data.userId), ctx, data);
	}
}

// -----------------------------------------------------------------------------
// UserUpdated
// -----------------------------------------------------------------------------

export interface UserUpdatedData {
	readonly userId: string;
	/** Names of the fields that were supplied */
	readonly changedFields: readonly string[];
	readonly [key: string]: unknown;
}

export class UserUpdated extends BaseDomainEvent<UserUpdatedData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('user', 'updated');

	constructor(ctx: ExecutionContext, data: UserUpdatedData) {
		super(userEvent(UserUpdated.EVENT_TYPE, data.userId), ctx, data);
	}
}

// -----------------------------------------------------------------------------
// UserPasswordChanged
// -----------------------------------------------------------------------------

export interface UserPasswordChangedData {
	readonly userId: string;
	readonly [key: string]: unknown;
}

export class UserPasswordChanged extends BaseDomainEvent<UserPasswordChangedData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('user', 'password-changed');

	constructor(ctx: ExecutionContext, data: UserPasswordChangedData) {
		super(userEvent(UserPasswordChanged.EVENT_TYPE, data.userId), ctx, data);
	}
}

// -----------------------------------------------------------------------------
// UserPasswordResetRequested
// -----------------------------------------------------------------------------

export interface UserPasswordResetRequestedData {
	readonly userId: string;
	readonly resetTokenId: string;
	readonly expiresAt: string;
	readonly [key: string]: unknown;
}

export class UserPasswordResetRequested extends BaseDomainEvent<UserPasswordResetRequestedData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('user', 'password-reset-requested');

	constructor(ctx: ExecutionContext, data: UserPasswordResetRequestedData) {
		super(userEvent(UserPasswordResetRequested.EVENT_TYPE, data.userId), ctx, data);
	}
}

// -----------------------------------------------------------------------------
// UserPasswordReset
// -----------------------------------------------------------------------------

export interface UserPasswordResetData {
	readonly userId: string;
	readonly resetTokenId: string;
	readonly [key: string]: unknown;
}

export class UserPasswordReset extends BaseDomainEvent<UserPasswordResetData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('user', 'password-reset');

	constructor(ctx: ExecutionContext, data: UserPasswordResetData) {
		super(userEvent(UserPasswordReset.EVENT_TYPE, data.userId), ctx, data);
	}
}

// -----------------------------------------------------------------------------
// UserDeleted
// -----------------------------------------------------------------------------

export interface UserDeletedData {
	readonly userId: string;
	readonly username: string;
	readonly [key: string]: unknown;
}

export class UserDeleted extends BaseDomainEvent<UserDeletedData> {
	static readonly EVENT_TYPE = DomainEvent.eventType('user', 'deleted');

	constructor(ctx: ExecutionContext, data: UserDeletedData) {
		super(userEvent(UserDeleted.EVENT_TYPE, data.userId), ctx, data);
	}
}
