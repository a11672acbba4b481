/**
 * Scheduler — fires registered tasks when they fall due.
 *
 * Polls every second while any `seconds` task exists, otherwise every
 * minute. A failing job is logged and rescheduled; it never stops the
 * others. `once` jobs are dropped after their first run.
 */

import type { Logger } from "../lib/logger/index.js";
import { classifyError } from "../shared/errors.js";
import type { Clock, Sleeper } from "../shared/time.js";
import { Duration, SystemClock, sleep } from "../shared/time.js";
import { nextRunAt } from "./next-run.js";
import { Frequency, type JobDescription, type ScheduleTask } from "./types.js";

export type JobRunner = (task: ScheduleTask) => Promise<void>;

export interface SchedulerDeps {
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly sleep?: Sleeper;
}

interface Job {
	readonly id: number;
	readonly task: ScheduleTask;
	readonly run: JobRunner;
	nextRunMs: number;
}

const FAST_POLL_MS = Duration.seconds(1);
const SLOW_POLL_MS = Duration.minutes(1);

export class Scheduler {
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly sleep: Sleeper;
	private readonly jobs: Job[] = [];
	private nextId = 1;

	constructor(deps: SchedulerDeps) {
		this.logger = deps.logger;
		this.clock = deps.clock ?? SystemClock;
		this.sleep = deps.sleep ?? sleep;
	}

	/** Returns the job id. */
	register(task: ScheduleTask, run: JobRunner): number {
		const job: Job = {
			id: this.nextId++,
			task,
			run,
			nextRunMs: nextRunAt(task.cadence, this.clock.now()),
		};
		this.jobs.push(job);
		this.logger.info(
			{
				jobId: job.id,
				frequency: task.cadence.frequency,
				pair: task.order.pair,
				quoteAmount: String(task.order.quoteAmount),
				nextRun: new Date(job.nextRunMs).toISOString(),
			},
			"Schedule set",
		);
		return job.id;
	}

	get size(): number {
		return this.jobs.length;
	}

	pollIntervalMs(): number {
		return this.jobs.some((j) => j.task.cadence.frequency === Frequency.Seconds)
			? FAST_POLL_MS
			: SLOW_POLL_MS;
	}

	/** Run every job that is due, oldest first. Returns how many ran. */
	async runPending(): Promise<number> {
		const now = this.clock.now();
		const due = this.jobs
			.filter((j) => j.nextRunMs <= now)
			.sort((a, b) => a.nextRunMs - b.nextRunMs);

		for (const job of due) {
			await this.runJob(job);
		}
		return due.length;
	}

	describe(): JobDescription[] {
		return this.jobs.map((job) => ({
			id: job.id,
			frequency: job.task.cadence.frequency,
			pair: job.task.order.pair,
			quoteAmount: String(job.task.order.quoteAmount),
			nextRun: new Date(job.nextRunMs).toISOString(),
		}));
	}

	/** Poll until `signal` aborts. */
	async start(signal: AbortSignal): Promise<void> {
		const pollMs = this.pollIntervalMs();
		this.logger.info({ jobs: this.jobs.length, pollMs }, "Scheduler started");
		while (!signal.aborted) {
			await this.runPending();
			await this.sleep(pollMs, signal);
		}
		this.logger.info("Scheduler stopped");
	}

	private async runJob(job: Job): Promise<void> {
		const log = this.logger.child({ jobId: job.id, pair: job.task.order.pair });
		log.info({ frequency: job.task.cadence.frequency }, "Running scheduled order");
		try {
			await job.run(job.task);
		} catch (error) {
			log.error({ error: classifyError(error).toJSON() }, "Scheduled order failed");
		}

		if (job.task.cadence.frequency === Frequency.Once) {
			this.jobs.splice(this.jobs.indexOf(job), 1);
			log.info("One-off schedule executed and removed");
			return;
		}
		job.nextRunMs = nextRunAt(job.task.cadence, this.clock.now());
	}
}
