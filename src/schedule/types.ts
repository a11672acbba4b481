/**
 * Scheduling types — recurring DCA purchases read from a schedule file.
 */

import type { OrderIntentInput } from "../order/order-intent.js";

export const Frequency = {
	Seconds: "seconds",
	Hourly: "hourly",
	Daily: "daily",
	Weekly: "weekly",
	Monthly: "monthly",
	Once: "once",
} as const;

export type Frequency = (typeof Frequency)[keyof typeof Frequency];

export const WEEKDAYS = [
	"sunday",
	"monday",
	"tuesday",
	"wednesday",
	"thursday",
	"friday",
	"saturday",
] as const;

/** Index matches `Date#getDay()`. */
export type Weekday = (typeof WEEKDAYS)[number];

/** Local wall-clock time of day. */
export interface TimeOfDay {
	readonly hour: number;
	readonly minute: number;
}

/** When a task fires. Each variant carries only the fields it needs. */
export type Cadence =
	| { readonly frequency: typeof Frequency.Seconds; readonly seconds: number }
	| { readonly frequency: typeof Frequency.Hourly }
	| { readonly frequency: typeof Frequency.Daily; readonly at: TimeOfDay }
	| {
			readonly frequency: typeof Frequency.Weekly;
			readonly at: TimeOfDay;
			readonly day: Weekday;
	  }
	| {
			readonly frequency: typeof Frequency.Monthly;
			readonly at: TimeOfDay;
			readonly dayOfMonth: number;
	  }
	| { readonly frequency: typeof Frequency.Once; readonly at: TimeOfDay };

export interface ScheduleTask {
	readonly cadence: Cadence;
	/** Input handed to `ExecutionEngine.createOrder` each time the task fires. */
	readonly order: OrderIntentInput;
}

export interface JobDescription {
	readonly id: number;
	readonly frequency: Frequency;
	readonly pair: string;
	readonly quoteAmount: string;
	/** ISO timestamp */
	readonly nextRun: string;
}
