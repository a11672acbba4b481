export {
	type Cadence,
	Frequency,
	type JobDescription,
	type ScheduleTask,
	type TimeOfDay,
	WEEKDAYS,
	type Weekday,
} from "./types.js";
export {
	type RawTask,
	loadScheduleFile,
	parseSchedule,
	scheduleFileSchema,
	taskToIntent,
} from "./schedule-config.js";
export { nextRunAt } from "./next-run.js";
export { type JobRunner, Scheduler, type SchedulerDeps } from "./scheduler.js";
