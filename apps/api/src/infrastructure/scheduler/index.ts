export {
	createScheduler,
	nextWeeklyRun,
	nextHourlyRun,
	type Scheduler,
	type ScheduledJob,
} from './scheduler.js';
