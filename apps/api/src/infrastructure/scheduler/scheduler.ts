/**
 * Background Scheduler
 *
 * Timer-driven jobs: the weekly analytics emails every Monday at 09:00 UTC
 * and an hourly health log on the hour. Each job runs as the system
 * principal under its own correlation id; failures are logged and the
 * schedule carries on.
 */

import { ExecutionContext, TracingContext } from '@biotap/domain-core';
import { generateRaw } from '@biotap/tsid';
import type { Logger } from '@biotap/logging';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const MONDAY = 1;
const WEEKLY_HOUR_UTC = 9;

export interface ScheduledJob {
	readonly id: string;
	readonly name: string;
	/** Next run strictly after `from` */
	next(from: Date): Date;
	run(ctx: ExecutionContext): Promise<void>;
}

export interface Scheduler {
	start(): void;
	stop(): void;
	isRunning(): boolean;
}

/**
 * Next Monday 09:00 UTC strictly after `from`.
 */
export function nextWeeklyRun(from: Date): Date {
	const candidate = new Date(
		Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate(), WEEKLY_HOUR_UTC, 0, 0, 0),
	);
	const daysUntilMonday = (MONDAY - candidate.getUTCDay() + 7) % 7;
	candidate.setTime(candidate.getTime() + daysUntilMonday * DAY_MS);

	if (candidate.getTime() <= from.getTime()) {
		candidate.setTime(candidate.getTime() + 7 * DAY_MS);
	}
	return candidate;
}

/**
 * Start of the next full hour strictly after `from`.
 */
export function nextHourlyRun(from: Date): Date {
	return new Date((Math.floor(from.getTime() / HOUR_MS) + 1) * HOUR_MS);
}

export function createScheduler(jobs: readonly ScheduledJob[], logger: Logger): Scheduler {
	const log = logger.child({ component: 'scheduler' });
	const timers = new Map<string, NodeJS.Timeout>();
	let running = false;

	async function execute(job: ScheduledJob): Promise<void> {
		const correlationId = `job-${generateRaw()}`;
		try {
			await TracingContext.runWithContext(correlationId, null, () => job.run(ExecutionContext.system()));
		} catch (err) {
			log.error({ err, jobId: job.id }, 'Scheduled job failed');
		}
	}

	function schedule(job: ScheduledJob): void {
		if (!running) return;

		const now = new Date();
		const nextRun = job.next(now);
		const timer = setTimeout(() => {
			timers.delete(job.id);
			execute(job)
				.catch((err: unknown) => {
					log.error({ err, jobId: job.id }, 'Unhandled error in scheduled job');
				})
				.finally(() => schedule(job));
		}, nextRun.getTime() - now.getTime());
		timer.unref();

		timers.set(job.id, timer);
		log.debug({ jobId: job.id, nextRun }, 'Job scheduled');
	}

	return {
		start() {
			if (running) return;
			running = true;
			for (const job of jobs) {
				schedule(job);
			}
			log.info({ jobs: jobs.map((job) => job.id) }, 'Background scheduler started');
		},

		stop() {
			running = false;
			for (const timer of timers.values()) {
				clearTimeout(timer);
			}
			timers.clear();
			log.info('Background scheduler stopped');
		},

		isRunning() {
			return running;
		},
	};
}
