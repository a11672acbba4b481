/**
 * OrderIntent parsing — validates caller input and applies defaults.
 *
 * Defaults: limit order, 0.1 % below market, post-only, 24 h budget, no
 * repricing, fallback enabled.
 */

import { type ValidationError, decimalInput, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { type __brand, clientOrderId, productId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import { Duration } from "../shared/time.js";
import type { LimitPricing } from "../sizing/types.js";
import { type OrderIntent, OrderType } from "./types.js";

export const DEFAULT_LIMIT_PRICE_PCT = "0.1";
export const DEFAULT_ORDER_TIMEOUT_MS = Duration.hours(24);

const pairSchema = z
	.string()
	.trim()
	.min(1, "pair is required")
	.transform((pair, ctx) => {
		try {
			return productId(pair);
		} catch (error) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: error instanceof Error ? error.message : String(error),
			});
			return z.NEVER;
		}
	});

const positiveDecimal = decimalInput.refine((v) => Decimal.from(v).isPositive(), {
	message: "must be greater than zero",
});

const percentBelow = decimalInput.refine(
	(v) => {
		const pct = Decimal.from(v);
		return !pct.isNegative() && pct.lt(Decimal.from(100));
	},
	{ message: "must be at least 0 and below 100" },
);

const durationMs = z.number().int().finite();

export const orderIntentSchema = z.object({
	pair: pairSchema,
	quoteAmount: positiveDecimal,
	orderType: z.enum([OrderType.Limit, OrderType.Market]).default(OrderType.Limit),
	limitPricePct: percentBelow.optional(),
	limitPrice: positiveDecimal.optional(),
	postOnly: z.boolean().default(true),
	orderTimeoutMs: durationMs.positive().default(DEFAULT_ORDER_TIMEOUT_MS),
	repriceIntervalMs: durationMs.nonnegative().default(0),
	repriceDurationMs: durationMs.positive().optional(),
	disableFallback: z.boolean().default(false),
	clientOrderId: z.string().trim().min(1).optional(),
});

/** Raw shape accepted by `parseOrderIntent` and `ExecutionEngine.createOrder`. */
export type OrderIntentInput = z.input<typeof orderIntentSchema>;

/**
 * Validate an order request. An absolute `limitPrice` wins over
 * `limitPricePct`.
 */
export function parseOrderIntent(input: unknown): Result<OrderIntent, ValidationError> {
	const parsed = validate(orderIntentSchema, input, "Invalid order intent");
	if (!parsed.ok) return parsed;
	const raw = parsed.value;

	const pricing: LimitPricing =
		raw.limitPrice !== undefined
			? { kind: "absolute", price: Decimal.from(raw.limitPrice) }
			: {
					kind: "percent_below",
					pct: Decimal.from(raw.limitPricePct ?? DEFAULT_LIMIT_PRICE_PCT),
				};

	const repriceDurationMs = Math.min(
		raw.repriceDurationMs ?? raw.orderTimeoutMs,
		raw.orderTimeoutMs,
	);

	return ok(
		Object.freeze({
			productId: raw.pair,
			quoteAmount: Decimal.from(raw.quoteAmount),
			orderType: raw.orderType,
			pricing,
			postOnly: raw.postOnly,
			orderTimeoutMs: raw.orderTimeoutMs,
			repriceIntervalMs: raw.repriceIntervalMs,
			repriceDurationMs,
			disableFallback: raw.disableFallback,
			clientOrderId: raw.clientOrderId !== undefined ? clientOrderId(raw.clientOrderId) : null,
		}),
	);
}
