/**
 * Sizing types — venue-legal prices and quantities for one submission.
 */

import type { Decimal } from "../shared/decimal.js";

/** Places used when the venue publishes no quote increment. */
export const DEFAULT_QUOTE_PRECISION = 2;
/** Places used when the venue publishes no base or price increment. */
export const DEFAULT_BASE_PRECISION = 8;

/** How the limit price is derived from the market price. */
export type LimitPricing =
	| { readonly kind: "percent_below"; readonly pct: Decimal }
	| { readonly kind: "absolute"; readonly price: Decimal };

export interface LimitPrice {
	/** Quantized down to the price increment. */
	readonly price: Decimal;
	/**
	 * Percent above market when an absolute price overshoots the warning
	 * threshold, otherwise null. Never a rejection.
	 */
	readonly overshootPct: Decimal | null;
}

export interface LimitOrderSize {
	readonly limitPrice: Decimal;
	/** Quantized down to the base increment. */
	readonly baseSize: Decimal;
	/** baseSize × limitPrice; never above the requested notional. */
	readonly notional: Decimal;
}

export interface Precision {
	readonly quote: number;
	readonly base: number;
}
