/**
 * Email Log Entity
 *
 * A record of every attempt to mail a known user, successful or not.
 * Analytics summaries also carry the period they cover, which keeps the
 * weekly job from mailing the same period twice.
 */

import { generate } from '@biotap/tsid';

export const EMAIL_TYPES = ['welcome', 'password_reset', 'analytics_summary'] as const;

export type EmailType = (typeof EMAIL_TYPES)[number];

export interface EmailLog {
	/** Typed ID ("eml_...") */
	readonly id: string;
	readonly userId: string;
	readonly emailType: EmailType;
	readonly recipientEmail: string;
	readonly subject: string;
	readonly sentAt: Date;
	readonly success: boolean;
	readonly errorMessage: string | null;
	readonly analyticsPeriodStart: Date | null;
	readonly analyticsPeriodEnd: Date | null;
}

export interface CreateEmailLogInput {
	readonly userId: string;
	readonly emailType: EmailType;
	readonly recipientEmail: string;
	readonly subject: string;
	readonly success: boolean;
	readonly errorMessage?: string | null | undefined;
	readonly analyticsPeriod?: { readonly start: Date; readonly end: Date } | undefined;
	readonly sentAt?: Date | undefined;
}

export function createEmailLog(input: CreateEmailLogInput): EmailLog {
	return {
		id: generate('EMAIL_LOG'),
		userId: input.userId,
		emailType: input.emailType,
		recipientEmail: input.recipientEmail,
		subject: input.subject,
		sentAt: input.sentAt ?? new Date(),
		success: input.success,
		errorMessage: input.errorMessage ?? null,
		analyticsPeriodStart: input.analyticsPeriod?.start ?? null,
		analyticsPeriodEnd: input.analyticsPeriod?.end ?? null,
	};
}

export function isEmailType(value: string): value is EmailType {
	return EMAIL_TYPES.some((type) => type === value);
}
