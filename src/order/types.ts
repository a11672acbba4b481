/**
 * Order domain types.
 */

import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { ClientOrderId, ProductId, VenueOrderId } from "../shared/identifiers.js";
import type { LimitPricing } from "../sizing/types.js";
import type { OrderSide } from "../venue/types.js";

// ── Order type ──────────────────────────────────────────────────────

export const OrderType = {
	Limit: "limit",
	Market: "market",
} as const;

/** OrderType type: Limit | Market */
export type OrderType = (typeof OrderType)[keyof typeof OrderType];

// ── Intent ──────────────────────────────────────────────────────────

/** A validated buy request. Immutable once parsed. */
export interface OrderIntent {
	readonly productId: ProductId;
	/** Quote currency to spend. */
	readonly quoteAmount: Decimal;
	readonly orderType: OrderType;
	readonly pricing: LimitPricing;
	readonly postOnly: boolean;
	/** Overall time budget for the campaign. */
	readonly orderTimeoutMs: number;
	/** 0 disables repricing. */
	readonly repriceIntervalMs: number;
	/** Never longer than `orderTimeoutMs`. */
	readonly repriceDurationMs: number;
	readonly disableFallback: boolean;
	/** Used for the first submission only. */
	readonly clientOrderId: ClientOrderId | null;
}

// ── Result ──────────────────────────────────────────────────────────

/** Outcome of the initial submission; later campaign activity is not reflected here. */
export interface CreateOrderResult {
	readonly success: boolean;
	readonly orderId: VenueOrderId | null;
	readonly productId: ProductId | null;
	readonly side: OrderSide;
	readonly clientOrderId: ClientOrderId | null;
	readonly error: TradingError | null;
}
