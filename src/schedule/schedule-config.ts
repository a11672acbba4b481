/**
 * Schedule file parsing. The file is a JSON array of tasks in the
 * snake_case shape DCA bots have long used, e.g.
 *
 * ```json
 * [{ "frequency": "weekly", "day_of_week": "monday", "time": "09:30",
 *    "currency_pair": "BTC-USDC", "quote_currency_amount": 25 }]
 * ```
 */

import { readFile } from "node:fs/promises";
import { type ValidationError, decimalInput, validate, z } from "../lib/validation/index.js";
import type { OrderIntentInput } from "../order/order-intent.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError, type TradingError } from "../shared/errors.js";
import { type Result, err } from "../shared/result.js";
import { Duration } from "../shared/time.js";
import { type Cadence, Frequency, type ScheduleTask, type TimeOfDay, WEEKDAYS } from "./types.js";

const timeOfDay = z
	.string()
	.trim()
	.transform((value, ctx): TimeOfDay => {
		const match = /^([01]?\d|2[0-3]):([0-5]\d)$/.exec(value);
		if (!match) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be HH:MM" });
			return z.NEVER;
		}
		return { hour: Number(match[1]), minute: Number(match[2]) };
	});

/** Fraction of the market price, e.g. 0.999 for 0.1 % below. */
const marketFraction = decimalInput.refine(
	(v) => {
		const x = Decimal.from(v);
		return x.isPositive() && x.lte(Decimal.from(1));
	},
	{ message: "must be above 0 and at most 1" },
);

const positiveAmount = decimalInput.refine((v) => Decimal.from(v).isPositive(), {
	message: "must be greater than zero",
});

const orderFields = z.object({
	currency_pair: z.string().trim().min(1),
	quote_currency_amount: positiveAmount,
	order_type: z.enum(["limit", "market"]).optional(),
	limit_price_pct: marketFraction.optional(),
	limit_price: decimalInput.optional(),
	post_only: z.boolean().optional(),
	order_timeout_hours: z.number().positive().optional(),
	reprice_interval_minutes: z.number().nonnegative().optional(),
	reprice_duration_minutes: z.number().positive().optional(),
	disable_fallback: z.boolean().optional(),
});

const taskSchema = z.discriminatedUnion("frequency", [
	orderFields.extend({
		frequency: z.literal(Frequency.Seconds),
		seconds: z.number().int().positive(),
	}),
	orderFields.extend({ frequency: z.literal(Frequency.Hourly) }),
	orderFields.extend({ frequency: z.literal(Frequency.Daily), time: timeOfDay }),
	orderFields.extend({
		frequency: z.literal(Frequency.Weekly),
		time: timeOfDay,
		day_of_week: z
			.string()
			.trim()
			.toLowerCase()
			.pipe(
				z.enum(WEEKDAYS, { errorMap: () => ({ message: "must be a day name such as monday" }) }),
			),
	}),
	orderFields.extend({
		frequency: z.literal(Frequency.Monthly),
		time: timeOfDay,
		day_of_month: z.number().int().min(1).max(31),
	}),
	// A fixed client order id only makes sense for an order placed once.
	orderFields.extend({
		frequency: z.literal(Frequency.Once),
		time: timeOfDay,
		client_order_id: z.string().trim().min(1).optional(),
	}),
]);

/** One validated entry of the schedule file. */
export type RawTask = z.infer<typeof taskSchema>;

export const scheduleFileSchema = z
	.array(taskSchema)
	.min(1, "schedule has no tasks")
	.transform((tasks) => tasks.map(toScheduleTask));

export function parseSchedule(data: unknown): Result<ScheduleTask[], ValidationError> {
	return validate(scheduleFileSchema, data, "Invalid schedule file");
}

/**
 * Read and validate a schedule file.
 * Fails with ConfigError when the file is unreadable or not JSON.
 */
export async function loadScheduleFile(
	path: string,
): Promise<Result<ScheduleTask[], TradingError>> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (error) {
		return err(new ConfigError(`Cannot read schedule file ${path}`, { cause: error }));
	}

	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (error) {
		return err(new ConfigError(`Schedule file ${path} is not valid JSON`, { cause: error }));
	}
	return parseSchedule(data);
}

function toScheduleTask(raw: RawTask): ScheduleTask {
	return { cadence: cadenceOf(raw), order: taskToIntent(raw) };
}

function cadenceOf(raw: RawTask): Cadence {
	switch (raw.frequency) {
		case Frequency.Seconds:
			return { frequency: raw.frequency, seconds: raw.seconds };
		case Frequency.Hourly:
			return { frequency: raw.frequency };
		case Frequency.Daily:
		case Frequency.Once:
			return { frequency: raw.frequency, at: raw.time };
		case Frequency.Weekly:
			return { frequency: raw.frequency, at: raw.time, day: raw.day_of_week };
		case Frequency.Monthly:
			return { frequency: raw.frequency, at: raw.time, dayOfMonth: raw.day_of_month };
	}
}

/** Map a task's order fields onto `createOrder` input. */
export function taskToIntent(raw: RawTask): OrderIntentInput {
	const clientOrderId = raw.frequency === Frequency.Once ? raw.client_order_id : undefined;
	return {
		pair: raw.currency_pair,
		quoteAmount: raw.quote_currency_amount,
		...(raw.order_type !== undefined && { orderType: raw.order_type }),
		...(raw.limit_price_pct !== undefined && {
			limitPricePct: Decimal.from(1)
				.sub(Decimal.from(raw.limit_price_pct))
				.mul(Decimal.from(100))
				.toString(),
		}),
		...(raw.limit_price !== undefined && { limitPrice: raw.limit_price }),
		...(raw.post_only !== undefined && { postOnly: raw.post_only }),
		...(raw.order_timeout_hours !== undefined && {
			orderTimeoutMs: Math.round(Duration.hours(raw.order_timeout_hours)),
		}),
		...(raw.reprice_interval_minutes !== undefined && {
			repriceIntervalMs: Math.round(Duration.minutes(raw.reprice_interval_minutes)),
		}),
		...(raw.reprice_duration_minutes !== undefined && {
			repriceDurationMs: Math.round(Duration.minutes(raw.reprice_duration_minutes)),
		}),
		...(raw.disable_fallback !== undefined && { disableFallback: raw.disable_fallback }),
		...(clientOrderId !== undefined && { clientOrderId }),
	};
}
