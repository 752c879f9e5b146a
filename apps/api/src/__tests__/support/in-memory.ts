/**
 * In-memory repositories and a recording mailer for tests. Deleting a user
 * removes their rows the way the database foreign keys do.
 */

import pino from 'pino';
import type { Logger } from '@biotap/logging';
import {
	createAggregateRegistry,
	createAggregateHandler,
	createDirectUnitOfWork,
	type TransactionalUnitOfWork,
} from '@biotap/persistence';

import {
	compareLinks,
	isClickEvent,
	isLink,
	isPasswordResetToken,
	isRedeemable,
	isUser,
	type ClickEvent,
	type EmailLog,
	type Link,
	type PasswordResetToken,
	type User,
} from '../../domain/index.js';
import type {
	ClickEventRepository,
	ClickQuery,
	EmailLogRepository,
	LinkRepository,
	PasswordResetTokenRepository,
	UserRepository,
} from '../../infrastructure/persistence/index.js';
import type { MailMessage, Mailer } from '../../infrastructure/mail/index.js';

export const silentLogger: Logger = pino({ level: 'silent' });

export class InMemoryStore {
	readonly users = new Map<string, User>();
	readonly links = new Map<string, Link>();
	readonly clickEvents = new Map<string, ClickEvent>();
	readonly resetTokens = new Map<string, PasswordResetToken>();
	readonly emailLogs: EmailLog[] = [];

	deleteUser(userId: string): void {
		this.users.delete(userId);
		for (const link of [...this.links.values()]) {
			if (link.userId === userId) this.deleteLink(link.id);
		}
		for (const token of [...this.resetTokens.values()]) {
			if (token.userId === userId) this.resetTokens.delete(token.id);
		}
		for (let i = this.emailLogs.length - 1; i >= 0; i--) {
			if (this.emailLogs[i]?.userId === userId) this.emailLogs.splice(i, 1);
		}
	}

	deleteLink(linkId: string): void {
		this.links.delete(linkId);
		for (const click of [...this.clickEvents.values()]) {
			if (click.linkId === linkId) this.clickEvents.delete(click.id);
		}
	}
}

export function createInMemoryUserRepository(store: InMemoryStore): UserRepository {
	const values = () => [...store.users.values()];

	return {
		async findById(id) {
			return store.users.get(id);
		},
		async findByUsername(username) {
			return values().find((user) => user.username === username);
		},
		async findByEmail(email) {
			return values().find((user) => user.email === email);
		},
		async findActive() {
			return values()
				.filter((user) => user.isActive)
				.sort((a, b) => a.id.localeCompare(b.id));
		},
		async exists(id) {
			return store.users.has(id);
		},
		async persist(entity) {
			store.users.set(entity.id, entity);
			return entity;
		},
		async delete(entity) {
			const existed = store.users.has(entity.id);
			store.deleteUser(entity.id);
			return existed;
		},
	};
}

export function createInMemoryLinkRepository(store: InMemoryStore): LinkRepository {
	const ofUser = (userId: string) =>
		[...store.links.values()].filter((link) => link.userId === userId).sort(compareLinks);

	return {
		async findById(id) {
			return store.links.get(id);
		},
		async findByUser(userId, page = {}) {
			const skip = page.skip ?? 0;
			const links = ofUser(userId).slice(skip);
			return page.limit === undefined ? links : links.slice(0, page.limit);
		},
		async findActiveByUser(userId) {
			return ofUser(userId).filter((link) => link.isActive);
		},
		async exists(id) {
			return store.links.has(id);
		},
		async incrementClickCount(id) {
			const link = store.links.get(id);
			if (!link?.isActive) return undefined;
			const clickCount = link.clickCount + 1;
			store.links.set(id, { ...link, clickCount });
			return clickCount;
		},
		async persist(entity) {
			const stored = store.links.get(entity.id);
			store.links.set(entity.id, { ...entity, clickCount: stored?.clickCount ?? entity.clickCount });
			return entity;
		},
		async delete(entity) {
			const existed = store.links.has(entity.id);
			store.deleteLink(entity.id);
			return existed;
		},
	};
}

function matchesClickQuery(click: ClickEvent, query: ClickQuery): boolean {
	const at = click.clickedAt.getTime();
	return (
		query.linkIds.includes(click.linkId) &&
		at >= query.since.getTime() &&
		(query.until === undefined || at <= query.until.getTime()) &&
		(query.before === undefined || at < query.before.getTime()) &&
		(!query.located || click.country !== null)
	);
}

/** Clicks and distinct non-null IPs per key, in first-seen order */
function tally<K>(clicks: readonly ClickEvent[], keyOf: (click: ClickEvent) => K | null) {
	const groups = new Map<K, { clicks: number; ips: Set<string> }>();
	for (const click of clicks) {
		const key = keyOf(click);
		if (key === null) continue;
		const group = groups.get(key) ?? { clicks: 0, ips: new Set<string>() };
		group.clicks += 1;
		if (click.ipAddress !== null) group.ips.add(click.ipAddress);
		groups.set(key, group);
	}
	return [...groups.entries()].map(([key, group]) => ({ key, clicks: group.clicks, uniqueVisitors: group.ips.size }));
}

export function createInMemoryClickEventRepository(store: InMemoryStore): ClickEventRepository {
	const select = (query: ClickQuery) =>
		[...store.clickEvents.values()].filter((click) => matchesClickQuery(click, query));

	return {
		async countClicks(query) {
			const [all] = tally(select(query), () => 'all');
			return { clicks: all?.clicks ?? 0, uniqueVisitors: all?.uniqueVisitors ?? 0 };
		},
		async countByDay(query) {
			return tally(select(query), (click) => click.clickedAt.toISOString().slice(0, 10))
				.map(({ key, clicks }) => ({ date: key, clicks }))
				.sort((a, b) => a.date.localeCompare(b.date));
		},
		async countByLink(query) {
			return tally(select(query), (click) => click.linkId).map(({ key, clicks }) => ({ linkId: key, clicks }));
		},
		async countByDevice(query) {
			return tally(select(query), (click) => click.deviceType).map(({ key, clicks }) => ({ deviceType: key, clicks }));
		},
		async countByCountry(query) {
			return tally(select(query), (click) => click.country).map(({ key, clicks, uniqueVisitors }) => ({
				country: key,
				clicks,
				uniqueVisitors,
			}));
		},
		async persist(entity) {
			if (!store.clickEvents.has(entity.id)) store.clickEvents.set(entity.id, entity);
			return entity;
		},
		async delete(entity) {
			return store.clickEvents.delete(entity.id);
		},
	};
}

export function createInMemoryPasswordResetTokenRepository(store: InMemoryStore): PasswordResetTokenRepository {
	return {
		async findByTokenHash(tokenHash) {
			return [...store.resetTokens.values()].find((token) => token.tokenHash === tokenHash);
		},
		async claim(id, now) {
			const token = store.resetTokens.get(id);
			if (!token || !isRedeemable(token, now)) return false;
			store.resetTokens.set(id, { ...token, isUsed: true });
			return true;
		},
		async persist(entity) {
			if (!store.resetTokens.has(entity.id)) store.resetTokens.set(entity.id, entity);
			return entity;
		},
		async delete(entity) {
			return store.resetTokens.delete(entity.id);
		},
	};
}

export function createInMemoryEmailLogRepository(store: InMemoryStore): EmailLogRepository {
	return {
		async insert(entity) {
			store.emailLogs.push(entity);
			return entity;
		},
		async findByTypeSince(emailType, since) {
			return store.emailLogs
				.filter((log) => log.emailType === emailType && log.sentAt.getTime() >= since.getTime())
				.sort((a, b) => b.sentAt.getTime() - a.sentAt.getTime());
		},
		async hasAnalyticsSummarySince(userId, periodStart) {
			return store.emailLogs.some(
				(log) =>
					log.userId === userId &&
					log.emailType === 'analytics_summary' &&
					log.success &&
					log.analyticsPeriodStart !== null &&
					log.analyticsPeriodStart.getTime() >= periodStart.getTime(),
			);
		},
	};
}

export interface InMemoryRepositories {
	readonly store: InMemoryStore;
	readonly userRepository: UserRepository;
	readonly linkRepository: LinkRepository;
	readonly clickEventRepository: ClickEventRepository;
	readonly passwordResetTokenRepository: PasswordResetTokenRepository;
	readonly emailLogRepository: EmailLogRepository;
	readonly unitOfWork: TransactionalUnitOfWork;
}

export function createInMemoryRepositories(store: InMemoryStore = new InMemoryStore()): InMemoryRepositories {
	const userRepository = createInMemoryUserRepository(store);
	const linkRepository = createInMemoryLinkRepository(store);
	const clickEventRepository = createInMemoryClickEventRepository(store);
	const passwordResetTokenRepository = createInMemoryPasswordResetTokenRepository(store);
	const emailLogRepository = createInMemoryEmailLogRepository(store);

	const aggregateRegistry = createAggregateRegistry();
	aggregateRegistry.register(createAggregateHandler('USER', isUser, userRepository));
	aggregateRegistry.register(createAggregateHandler('LINK', isLink, linkRepository));
	aggregateRegistry.register(createAggregateHandler('CLICK_EVENT', isClickEvent, clickEventRepository));
	aggregateRegistry.register(
		createAggregateHandler('PASSWORD_RESET_TOKEN', isPasswordResetToken, passwordResetTokenRepository),
	);

	return {
		store,
		userRepository,
		linkRepository,
		clickEventRepository,
		passwordResetTokenRepository,
		emailLogRepository,
		unitOfWork: createDirectUnitOfWork({ aggregateRegistry }),
	};
}

/**
 * Mailer that keeps what it was given. Set `failure` to make sends reject.
 */
export class RecordingMailer implements Mailer {
	readonly sent: MailMessage[] = [];
	failure: Error | null = null;

	async send(message: MailMessage): Promise<string> {
		if (this.failure) throw this.failure;
		this.sent.push(message);
		return `msg-${this.sent.length}`;
	}
}
