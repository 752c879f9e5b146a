/**
 * Email Log Repository
 *
 * Email logs are written directly after each send attempt, outside any use
 * case transaction.
 */

import { and, desc, eq, gte } from 'drizzle-orm';
import { resolveDb, type Db, type TransactionContext } from '@biotap/persistence';

import { emailLogs, type EmailLogRecord } from '../schema/index.js';
import { isEmailType, type EmailLog, type EmailType } from '../../../domain/index.js';

export interface EmailLogRepository {
	insert(entity: EmailLog, tx?: TransactionContext): Promise<EmailLog>;
	/** Logs of one type sent at or after `since`, newest first */
	findByTypeSince(emailType: EmailType, since: Date, tx?: TransactionContext): Promise<EmailLog[]>;
	/** Whether a successful analytics summary covering `periodStart` or later exists */
	hasAnalyticsSummarySince(userId: string, periodStart: Date, tx?: TransactionContext): Promise<boolean>;
}

export function createEmailLogRepository(defaultDb: Db): EmailLogRepository {
	const db = (tx?: TransactionContext): Db => resolveDb(defaultDb, tx);

	return {
		async insert(entity, tx) {
			await db(tx).insert(emailLogs).values(entity);
			return entity;
		},

		async findByTypeSince(emailType, since, tx) {
			const records = await db(tx)
				.select()
				.from(emailLogs)
				.where(and(eq(emailLogs.emailType, emailType), gte(emailLogs.sentAt, since)))
				.orderBy(desc(emailLogs.sentAt));
			return records.flatMap((record) => {
				const log = recordToEmailLog(record);
				return log ? [log] : [];
			});
		},

		async hasAnalyticsSummarySince(userId, periodStart, tx) {
			const [record] = await db(tx)
				.select({ id: emailLogs.id })
				.from(emailLogs)
				.where(
					and(
						eq(emailLogs.userId, userId),
						eq(emailLogs.emailType, 'analytics_summary'),
						eq(emailLogs.success, true),
						gte(emailLogs.analyticsPeriodStart, periodStart),
					),
				)
				.limit(1);
			return record !== undefined;
		},
	};
}

function recordToEmailLog(record: EmailLogRecord): EmailLog | null {
	if (!isEmailType(record.emailType)) return null;

	return {
		id: record.id,
		userId: record.userId,
		emailType: record.emailType,
		recipientEmail: record.recipientEmail,
		subject: record.subject,
		sentAt: record.sentAt,
		success: record.success,
		errorMessage: record.errorMessage,
		analyticsPeriodStart: record.analyticsPeriodStart,
		analyticsPeriodEnd: record.analyticsPeriodEnd,
	};
}
