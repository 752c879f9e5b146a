/**
 * Links API
 *
 * Link management for the owner, plus the public click, redirect and
 * profile endpoints.
 */

import type { FastifyInstance } from 'fastify';
import {
	CommonSchemas,
	OpenAPIResponses,
	noContent,
	jsonError,
	sendError,
	Type,
	type Static,
} from '@biotap/http';
import { Result, createCommand, type UseCase } from '@biotap/application';

import type {
	CreateLinkCommand,
	DeleteLinkCommand,
	LinkQueries,
	TrackClickCommand,
	UpdateLinkCommand,
	VisitorDetails,
} from '../../application/link/index.js';
import type { AuthService } from '../../application/auth/index.js';
import type { LinkClicked, LinkCreated, LinkDeleted, LinkUpdated } from '../../domain/index.js';
import type { LinkRepository } from '../../infrastructure/persistence/index.js';
import { getClientIp, parseUserAgent, type GeoIpResolver } from '../../infrastructure/client-info/index.js';
import { authenticate, requireCurrentUser } from '../plugins/index.js';
import { LinkResponseSchema, toLinkResponse } from '../responses.js';

// ─── Request Schemas ────────────────────────────────────────────────────────

const NullableString = Type.Union([Type.String(), Type.Null()]);

const CreateLinkSchema = Type.Object({
	title: Type.String(),
	url: Type.String(),
	description: Type.Optional(NullableString),
	is_active: Type.Optional(Type.Boolean()),
	display_order: Type.Optional(Type.Integer()),
	icon: Type.Optional(NullableString),
});

const UpdateLinkSchema = Type.Object({
	title: Type.Optional(Type.String()),
	url: Type.Optional(Type.String()),
	description: Type.Optional(NullableString),
	is_active: Type.Optional(Type.Boolean()),
	display_order: Type.Optional(Type.Integer()),
	icon: Type.Optional(NullableString),
});

const LinkIdParam = Type.Object({
	id: Type.String(),
});

const UsernameParam = Type.Object({
	username: Type.String(),
});

type CreateLinkBody = Static<typeof CreateLinkSchema>;
type UpdateLinkBody = Static<typeof UpdateLinkSchema>;
type LinkIdParams = Static<typeof LinkIdParam>;
type UsernameParams = Static<typeof UsernameParam>;
type PaginationQuery = Static<typeof CommonSchemas.OffsetPagination>;

// ─── Dependencies ───────────────────────────────────────────────────────────

export interface LinkRoutesDeps {
	readonly authService: AuthService;
	readonly linkRepository: LinkRepository;
	readonly linkQueries: LinkQueries;
	readonly geoIp: GeoIpResolver;
	readonly createLinkUseCase: UseCase<CreateLinkCommand, LinkCreated>;
	readonly updateLinkUseCase: UseCase<UpdateLinkCommand, LinkUpdated>;
	readonly deleteLinkUseCase: UseCase<DeleteLinkCommand, LinkDeleted>;
	readonly trackClickUseCase: UseCase<TrackClickCommand, LinkClicked>;
}

// ─── Route Registration ─────────────────────────────────────────────────────

export async function registerLinkRoutes(fastify: FastifyInstance, deps: LinkRoutesDeps): Promise<void> {
	const {
		authService,
		linkRepository,
		linkQueries,
		geoIp,
		createLinkUseCase,
		updateLinkUseCase,
		deleteLinkUseCase,
		trackClickUseCase,
	} = deps;
	const preHandler = authenticate(authService);

	// Re-read after a write so the response shows what was stored
	async function storedLink(linkId: string) {
		const link = await linkRepository.findById(linkId);
		return link ? toLinkResponse(link) : null;
	}

	// POST /links
	fastify.post<{ Body: CreateLinkBody }>(
		'/links',
		{
			preHandler,
			schema: {
				tags: ['links'],
				security: [{ bearerAuth: [] }],
				body: CreateLinkSchema,
				response: { 201: LinkResponseSchema, ...OpenAPIResponses.errors(400, 401) },
			},
		},
		async (request, reply) => {
			const { body } = request;
			const command: CreateLinkCommand = createCommand('CreateLink', {
				userId: requireCurrentUser(request).id,
				title: body.title,
				url: body.url,
				description: body.description ?? null,
				isActive: body.is_active ?? true,
				displayOrder: body.display_order ?? 0,
				icon: body.icon ?? null,
			});

			const result = await createLinkUseCase.execute(command, request.executionContext);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const link = await storedLink(result.value.getData().linkId);
			if (!link) {
				return jsonError(reply, 500, 'INTERNAL_ERROR', 'Created link could not be loaded');
			}
			return reply.status(201).send(link);
		},
	);

	// GET /links
	fastify.get<{ Querystring: PaginationQuery }>(
		'/links',
		{
			preHandler,
			schema: {
				tags: ['links'],
				security: [{ bearerAuth: [] }],
				querystring: CommonSchemas.OffsetPagination,
				response: { 200: Type.Array(LinkResponseSchema), ...OpenAPIResponses.errors(400, 401) },
			},
		},
		async (request) => {
			const { skip, limit } = request.query;
			const links = await linkQueries.listOwn(requireCurrentUser(request).id, { skip, limit });
			return links.map(toLinkResponse);
		},
	);

	// GET /links/public/:username
	fastify.get<{ Params: UsernameParams }>(
		'/links/public/:username',
		{
			config: { rateLimit: 30 },
			schema: {
				tags: ['links'],
				params: UsernameParam,
				response: { 200: Type.Array(LinkResponseSchema), ...OpenAPIResponses.errors(404) },
			},
		},
		async (request, reply) => {
			const lookup = await linkQueries.listPublic(request.params.username);
			if ('failure' in lookup) {
				return sendError(reply, lookup.failure.error);
			}
			return lookup.links.map(toLinkResponse);
		},
	);

	// GET /links/:id
	fastify.get<{ Params: LinkIdParams }>(
		'/links/:id',
		{
			preHandler,
			schema: {
				tags: ['links'],
				security: [{ bearerAuth: [] }],
				params: LinkIdParam,
				response: { 200: LinkResponseSchema, ...OpenAPIResponses.errors(401, 403, 404) },
			},
		},
		async (request, reply) => {
			const lookup = await linkQueries.getOwn(request.params.id, requireCurrentUser(request).id);
			if ('failure' in lookup) {
				return sendError(reply, lookup.failure.error);
			}
			return toLinkResponse(lookup.link);
		},
	);

	// PATCH /links/:id
	fastify.patch<{ Params: LinkIdParams; Body: UpdateLinkBody }>(
		'/links/:id',
		{
			preHandler,
			schema: {
				tags: ['links'],
				security: [{ bearerAuth: [] }],
				params: LinkIdParam,
				body: UpdateLinkSchema,
				response: { 200: LinkResponseSchema, ...OpenAPIResponses.errors(400, 401, 403, 404) },
			},
		},
		async (request, reply) => {
			const { body } = request;
			const command: UpdateLinkCommand = createCommand('UpdateLink', {
				linkId: request.params.id,
				userId: requireCurrentUser(request).id,
				title: body.title,
				url: body.url,
				description: body.description,
				isActive: body.is_active,
				displayOrder: body.display_order,
				icon: body.icon,
			});

			const result = await updateLinkUseCase.execute(command, request.executionContext);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const link = await storedLink(request.params.id);
			return link ?? jsonError(reply, 404, 'LINK_NOT_FOUND', 'Link not found');
		},
	);

	// DELETE /links/:id
	fastify.delete<{ Params: LinkIdParams }>(
		'/links/:id',
		{
			preHandler,
			schema: {
				tags: ['links'],
				security: [{ bearerAuth: [] }],
				params: LinkIdParam,
				response: { 204: Type.Null(), ...OpenAPIResponses.errors(401, 403, 404) },
			},
		},
		async (request, reply) => {
			const command: DeleteLinkCommand = createCommand('DeleteLink', {
				linkId: request.params.id,
				userId: requireCurrentUser(request).id,
			});

			const result = await deleteLinkUseCase.execute(command, request.executionContext);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}
			return noContent(reply);
		},
	);

	// POST /links/:id/click
	fastify.post<{ Params: LinkIdParams }>(
		'/links/:id/click',
		{
			config: { rateLimit: 100 },
			schema: {
				tags: ['links'],
				params: LinkIdParam,
				response: { 200: LinkResponseSchema, ...OpenAPIResponses.errors(404) },
			},
		},
		async (request, reply) => {
			const command: TrackClickCommand = createCommand('TrackClick', {
				linkId: request.params.id,
				visitor: null,
			});

			const result = await trackClickUseCase.execute(command, request.executionContext);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const link = await storedLink(request.params.id);
			return link ?? jsonError(reply, 404, 'LINK_NOT_FOUND', 'Link not found');
		},
	);

	// GET /links/:id/redirect
	fastify.get<{ Params: LinkIdParams }>(
		'/links/:id/redirect',
		{
			config: { rateLimit: 100 },
			schema: {
				tags: ['links'],
				params: LinkIdParam,
				response: OpenAPIResponses.errors(404),
			},
		},
		async (request, reply) => {
			const ipAddress = getClientIp(request.headers, request.socket.remoteAddress);
			const userAgent = request.headers['user-agent'] ?? null;
			const { deviceType, browser } = parseUserAgent(userAgent);
			const visitor: VisitorDetails = {
				ipAddress,
				userAgent,
				referer: request.headers.referer ?? null,
				country: geoIp.countryOf(ipAddress),
				deviceType,
				browser,
			};

			const command: TrackClickCommand = createCommand('TrackClick', {
				linkId: request.params.id,
				visitor,
			});

			const result = await trackClickUseCase.execute(command, request.executionContext);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const link = await linkRepository.findById(request.params.id);
			if (!link) {
				return jsonError(reply, 404, 'LINK_NOT_FOUND', 'Link not found');
			}
			return reply.redirect(link.url, 302);
		},
	);
}
