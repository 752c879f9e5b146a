/**
 * Users API
 *
 * The authenticated user's own account.
 */

import type { FastifyInstance } from 'fastify';
import {
	CommonSchemas,
	OpenAPIResponses,
	noContent,
	sendError,
	sendResult,
	Type,
	type Static,
} from '@biotap/http';
import { Result, createCommand, type UseCase } from '@biotap/application';

import type {
	ChangePasswordCommand,
	DeleteAccountCommand,
	UpdateProfileCommand,
} from '../../application/user/index.js';
import type { LinkQueries } from '../../application/link/index.js';
import type { AuthService } from '../../application/auth/index.js';
import type { UserDeleted, UserPasswordChanged, UserUpdated } from '../../domain/index.js';
import type { UserRepository } from '../../infrastructure/persistence/index.js';
import { authenticate, requireCurrentUser } from '../plugins/index.js';
import { LinkResponseSchema, UserResponseSchema, toLinkResponse, toUserResponse } from '../responses.js';

const UpdateProfileSchema = Type.Object({
	email: Type.Optional(Type.String()),
	full_name: Type.Optional(Type.Union([Type.String(), Type.Null()])),
	is_active: Type.Optional(Type.Boolean()),
});

const ChangePasswordSchema = Type.Object({
	current_password: Type.String(),
	new_password: Type.String(),
});

type UpdateProfileBody = Static<typeof UpdateProfileSchema>;
type ChangePasswordBody = Static<typeof ChangePasswordSchema>;

export interface UserRoutesDeps {
	readonly authService: AuthService;
	readonly userRepository: UserRepository;
	readonly linkQueries: LinkQueries;
	readonly updateProfileUseCase: UseCase<UpdateProfileCommand, UserUpdated>;
	readonly changePasswordUseCase: UseCase<ChangePasswordCommand, UserPasswordChanged>;
	readonly deleteAccountUseCase: UseCase<DeleteAccountCommand, UserDeleted>;
}

export async function registerUserRoutes(fastify: FastifyInstance, deps: UserRoutesDeps): Promise<void> {
	const { authService, userRepository, linkQueries, updateProfileUseCase, changePasswordUseCase, deleteAccountUseCase } =
		deps;
	const preHandler = authenticate(authService);

	// GET /users/me
	fastify.get(
		'/users/me',
		{
			preHandler,
			schema: {
				tags: ['users'],
				security: [{ bearerAuth: [] }],
				response: { 200: UserResponseSchema, ...OpenAPIResponses.errors(401) },
			},
		},
		async (request) => toUserResponse(requireCurrentUser(request)),
	);

	// PATCH /users/me
	fastify.patch<{ Body: UpdateProfileBody }>(
		'/users/me',
		{
			preHandler,
			schema: {
				tags: ['users'],
				security: [{ bearerAuth: [] }],
				body: UpdateProfileSchema,
				response: { 200: UserResponseSchema, ...OpenAPIResponses.errors(400, 401) },
			},
		},
		async (request, reply) => {
			const user = requireCurrentUser(request);
			const { body } = request;
			const command: UpdateProfileCommand = createCommand('UpdateProfile', {
				userId: user.id,
				email: body.email,
				fullName: body.full_name,
				isActive: body.is_active,
			});

			const result = await updateProfileUseCase.execute(command, request.executionContext);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const updated = await userRepository.findById(user.id);
			return toUserResponse(updated ?? user);
		},
	);

	// DELETE /users/me
	fastify.delete(
		'/users/me',
		{
			preHandler,
			schema: {
				tags: ['users'],
				security: [{ bearerAuth: [] }],
				response: { 204: Type.Null(), ...OpenAPIResponses.errors(401) },
			},
		},
		async (request, reply) => {
			const command: DeleteAccountCommand = createCommand('DeleteAccount', {
				userId: requireCurrentUser(request).id,
			});

			const result = await deleteAccountUseCase.execute(command, request.executionContext);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}
			return noContent(reply);
		},
	);

	// POST /users/change-password
	fastify.post<{ Body: ChangePasswordBody }>(
		'/users/change-password',
		{
			preHandler,
			schema: {
				tags: ['users'],
				security: [{ bearerAuth: [] }],
				body: ChangePasswordSchema,
				response: { 200: CommonSchemas.Message, ...OpenAPIResponses.errors(400, 401) },
			},
		},
		async (request, reply) => {
			const command: ChangePasswordCommand = createCommand('ChangePassword', {
				userId: requireCurrentUser(request).id,
				currentPassword: request.body.current_password,
				newPassword: request.body.new_password,
			});

			const result = await changePasswordUseCase.execute(command, request.executionContext);
			return sendResult(reply, result, { transform: () => ({ message: 'Password changed successfully' }) });
		},
	);

	// GET /users/me/links
	fastify.get(
		'/users/me/links',
		{
			preHandler,
			schema: {
				tags: ['users'],
				security: [{ bearerAuth: [] }],
				response: { 200: Type.Array(LinkResponseSchema), ...OpenAPIResponses.errors(401) },
			},
		},
		async (request) => {
			const links = await linkQueries.listOwn(requireCurrentUser(request).id);
			return links.map(toLinkResponse);
		},
	);
}
