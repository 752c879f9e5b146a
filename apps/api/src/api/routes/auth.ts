/**
 * Auth API
 *
 * Registration, login and password reset.
 */

import type { FastifyInstance } from 'fastify';
import {
	CommonSchemas,
	OpenAPIResponses,
	jsonError,
	sendError,
	sendResult,
	Type,
	type Static,
} from '@biotap/http';
import { Result, createCommand, type UseCase } from '@biotap/application';
import { generateSecureToken } from '@biotap/crypto';

import type {
	ConfirmPasswordResetCommand,
	RegisterUserCommand,
	RequestPasswordResetCommand,
} from '../../application/user/index.js';
import type { AuthService } from '../../application/auth/index.js';
import type { UserPasswordReset, UserPasswordResetRequested, UserRegistered } from '../../domain/index.js';
import type { UserRepository } from '../../infrastructure/persistence/index.js';
import type { EmailService } from '../../infrastructure/mail/index.js';
import { TokenResponseSchema, UserResponseSchema, toTokenResponse, toUserResponse } from '../responses.js';

export const RESET_REQUESTED_MESSAGE = 'If the email exists, a reset link has been sent';
export const INVALID_LOGIN_MESSAGE = 'Incorrect username or password';

// ─── Request Schemas ────────────────────────────────────────────────────────

const RegisterSchema = Type.Object({
	username: Type.String(),
	email: Type.String(),
	password: Type.String(),
	full_name: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

const LoginSchema = Type.Object({
	username: Type.String(),
	password: Type.String(),
});

const ResetRequestSchema = Type.Object({
	email: Type.String(),
});

const ResetConfirmSchema = Type.Object({
	token: Type.String(),
	new_password: Type.String(),
});

type RegisterBody = Static<typeof RegisterSchema>;
type LoginBody = Static<typeof LoginSchema>;
type ResetRequestBody = Static<typeof ResetRequestSchema>;
type ResetConfirmBody = Static<typeof ResetConfirmSchema>;

// ─── Dependencies ───────────────────────────────────────────────────────────

export interface AuthRoutesDeps {
	readonly userRepository: UserRepository;
	readonly authService: AuthService;
	readonly emailService: EmailService;
	readonly registerUserUseCase: UseCase<RegisterUserCommand, UserRegistered>;
	readonly requestPasswordResetUseCase: UseCase<RequestPasswordResetCommand, UserPasswordResetRequested>;
	readonly confirmPasswordResetUseCase: UseCase<ConfirmPasswordResetCommand, UserPasswordReset>;
}

// ─── Route Registration ─────────────────────────────────────────────────────

export async function registerAuthRoutes(fastify: FastifyInstance, deps: AuthRoutesDeps): Promise<void> {
	const {
		userRepository,
		authService,
		emailService,
		registerUserUseCase,
		requestPasswordResetUseCase,
		confirmPasswordResetUseCase,
	} = deps;

	async function login(username: string, password: string) {
		const token = await authService.login(username, password);
		return token ? toTokenResponse(token) : null;
	}

	// POST /auth/register
	fastify.post<{ Body: RegisterBody }>(
		'/auth/register',
		{
			config: { rateLimit: 5 },
			schema: {
				tags: ['authentication'],
				body: RegisterSchema,
				response: { 201: UserResponseSchema, ...OpenAPIResponses.errors(400) },
			},
		},
		async (request, reply) => {
			const { body } = request;
			const command: RegisterUserCommand = createCommand('RegisterUser', {
				username: body.username,
				email: body.email,
				password: body.password,
				fullName: body.full_name ?? null,
			});

			const result = await registerUserUseCase.execute(command, request.executionContext);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const user = await userRepository.findById(result.value.getData().userId);
			if (!user) {
				return jsonError(reply, 500, 'INTERNAL_ERROR', 'Registered user could not be loaded');
			}

			// Mail failures are logged by the email service and never fail registration
			await emailService.sendWelcomeEmail({ userId: user.id, email: user.email, username: user.username });

			return reply.status(201).send(toUserResponse(user));
		},
	);

	// POST /auth/login - OAuth2 password form
	fastify.post<{ Body: LoginBody }>(
		'/auth/login',
		{
			config: { rateLimit: 10 },
			schema: {
				tags: ['authentication'],
				consumes: ['application/x-www-form-urlencoded'],
				body: LoginSchema,
				response: { 200: TokenResponseSchema, ...OpenAPIResponses.errors(401) },
			},
		},
		async (request, reply) => {
			const token = await login(request.body.username, request.body.password);
			if (!token) {
				reply.header('www-authenticate', 'Bearer');
				return jsonError(reply, 401, 'UNAUTHORIZED', INVALID_LOGIN_MESSAGE);
			}
			return token;
		},
	);

	// POST /auth/login-json
	fastify.post<{ Body: LoginBody }>(
		'/auth/login-json',
		{
			config: { rateLimit: 10 },
			schema: {
				tags: ['authentication'],
				body: LoginSchema,
				response: { 200: TokenResponseSchema, ...OpenAPIResponses.errors(401) },
			},
		},
		async (request, reply) => {
			const token = await login(request.body.username, request.body.password);
			if (!token) {
				reply.header('www-authenticate', 'Bearer');
				return jsonError(reply, 401, 'UNAUTHORIZED', INVALID_LOGIN_MESSAGE);
			}
			return token;
		},
	);

	// POST /auth/password-reset/request
	fastify.post<{ Body: ResetRequestBody }>(
		'/auth/password-reset/request',
		{
			config: { rateLimit: 3 },
			schema: {
				tags: ['authentication'],
				body: ResetRequestSchema,
				response: { 200: CommonSchemas.Message, ...OpenAPIResponses.errors(400) },
			},
		},
		async (request, reply) => {
			const resetToken = generateSecureToken();
			const command: RequestPasswordResetCommand = createCommand('RequestPasswordReset', {
				email: request.body.email,
				resetToken,
			});

			const result = await requestPasswordResetUseCase.execute(command, request.executionContext);

			if (Result.isSuccess(result)) {
				const user = await userRepository.findById(result.value.getData().userId);
				if (user) {
					await emailService.sendPasswordResetEmail(
						{ userId: user.id, email: user.email, username: user.username },
						resetToken,
					);
				}
			} else if (result.error.type !== 'not_found') {
				return sendError(reply, result.error);
			}

			// Same answer whether or not the email is registered
			return { message: RESET_REQUESTED_MESSAGE };
		},
	);

	// POST /auth/password-reset/confirm
	fastify.post<{ Body: ResetConfirmBody }>(
		'/auth/password-reset/confirm',
		{
			config: { rateLimit: 5 },
			schema: {
				tags: ['authentication'],
				body: ResetConfirmSchema,
				response: { 200: CommonSchemas.Message, ...OpenAPIResponses.errors(400, 404) },
			},
		},
		async (request, reply) => {
			const command: ConfirmPasswordResetCommand = createCommand('ConfirmPasswordReset', {
				token: request.body.token,
				newPassword: request.body.new_password,
			});

			const result = await confirmPasswordResetUseCase.execute(command, request.executionContext);
			return sendResult(reply, result, { transform: () => ({ message: 'Password reset successfully' }) });
		},
	);
}
