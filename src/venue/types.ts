/**
 * Venue port — the capability set the engine needs from a trading venue.
 *
 * Adapters normalize every response into these canonical values at the
 * boundary; nothing past this interface branches on a venue's wire shape.
 */

import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { ClientOrderId, ProductId, VenueOrderId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

// ── Enums ───────────────────────────────────────────────────────────

export const OrderSide = {
	Buy: "BUY",
} as const;

/** Only buys are placed; the type stays a union so adapters can pass it through. */
export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

export const TimeInForce = {
	GoodTillCancel: "gtc",
	GoodTillDate: "gtd",
} as const;

export type TimeInForce = (typeof TimeInForce)[keyof typeof TimeInForce];

export const OrderStatus = {
	Pending: "pending",
	Open: "open",
	CancelQueued: "cancel_queued",
	Filled: "filled",
	Cancelled: "cancelled",
	Expired: "expired",
	Rejected: "rejected",
	Failed: "failed",
	Unknown: "unknown",
} as const;

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

/** Statuses after which the venue will not change an order's fills. */
export const DEFAULT_TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>([
	OrderStatus.Filled,
	OrderStatus.Cancelled,
	OrderStatus.Expired,
	OrderStatus.Rejected,
	OrderStatus.Failed,
]);

/** Venue failure reason for a post-only limit that would have matched. */
export const POST_ONLY_CROSS_REASON = "INVALID_LIMIT_PRICE_POST_ONLY";

// ── Values ──────────────────────────────────────────────────────────

/** Snapshot of a product's trading rules and last price. Never cached. */
export interface ProductInfo {
	readonly productId: ProductId;
	readonly price: Decimal;
	readonly priceIncrement: Decimal | null;
	readonly baseIncrement: Decimal | null;
	readonly quoteIncrement: Decimal | null;
	readonly quoteMinSize: Decimal | null;
	readonly baseMinSize: Decimal | null;
}

/** Identifies one submitted order. Replaced, never mutated, on each reprice. */
export interface OrderHandle {
	readonly orderId: VenueOrderId;
	readonly clientOrderId: ClientOrderId;
	readonly productId: ProductId;
	readonly side: OrderSide;
}

/** Point-in-time read of an order's progress. */
export interface OrderState {
	readonly orderId: VenueOrderId;
	readonly status: OrderStatus;
	/** Quote notional filled so far. */
	readonly filledNotional: Decimal;
	/** Base quantity filled so far. */
	readonly filledSize: Decimal;
	readonly avgFillPrice: Decimal | null;
}

export interface Balance {
	readonly currency: string;
	readonly available: Decimal;
}

// ── Requests ────────────────────────────────────────────────────────

export interface LimitOrderRequest {
	readonly clientOrderId: ClientOrderId;
	readonly productId: ProductId;
	readonly side: OrderSide;
	readonly baseSize: Decimal;
	readonly limitPrice: Decimal;
	readonly postOnly: boolean;
	readonly timeInForce: TimeInForce;
	/** Required for GTD, ignored for GTC. */
	readonly expiresAtMs?: number | undefined;
}

export interface MarketOrderRequest {
	readonly clientOrderId: ClientOrderId;
	readonly productId: ProductId;
	readonly side: OrderSide;
	readonly quoteSize: Decimal;
}

// ── Port ────────────────────────────────────────────────────────────

export interface Venue {
	/** Fails with MarketDataError when the price is missing or non-positive. */
	getProduct(productId: ProductId): Promise<Result<ProductInfo, TradingError>>;
	/** Rejections come back as OrderRejectedError carrying the venue's reason. */
	submitLimitOrder(req: LimitOrderRequest): Promise<Result<OrderHandle, TradingError>>;
	submitMarketOrder(req: MarketOrderRequest): Promise<Result<OrderHandle, TradingError>>;
	/** Best effort; the order may already be terminal. */
	cancelOrder(orderId: VenueOrderId): Promise<Result<void, TradingError>>;
	getOrder(orderId: VenueOrderId): Promise<Result<OrderState, TradingError>>;
	listBalances(): Promise<Result<readonly Balance[], TradingError>>;
}
