/**
 * PaperVenue — in-process venue for paper trading and tests.
 *
 * Limit orders rest until `fill()` is called; market orders fill at the
 * current price. Post-only buys at or above the price are rejected the way
 * Coinbase rejects them, client order ids are deduplicated, GTD orders
 * expire on the clock, and failures can be scripted per call type.
 */

import { Decimal } from "../shared/decimal.js";
import {
	MarketDataError,
	NetworkError,
	OrderNotFoundError,
	OrderRejectedError,
	type TradingError,
} from "../shared/errors.js";
import {
	type ClientOrderId,
	type ProductId,
	type VenueOrderId,
	idToString,
	venueOrderId,
} from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import {
	type Balance,
	type LimitOrderRequest,
	type MarketOrderRequest,
	type OrderHandle,
	OrderSide,
	type OrderState,
	OrderStatus,
	POST_ONLY_CROSS_REASON,
	type ProductInfo,
	TimeInForce,
	type Venue,
} from "./types.js";

/** Product definition with decimal strings, as a venue would publish it. */
export interface PaperProduct {
	readonly price: string;
	readonly priceIncrement?: string;
	readonly baseIncrement?: string;
	readonly quoteIncrement?: string;
	readonly quoteMinSize?: string;
	readonly baseMinSize?: string;
}

export interface PaperVenueConfig {
	readonly clock?: Clock;
	readonly products?: Readonly<Record<string, PaperProduct>>;
	readonly balances?: Readonly<Record<string, string>>;
	/** Reads that report `cancel_queued` after a cancel before it settles. Default 0. */
	readonly cancelSettleReads?: number;
}

export type PaperCall =
	| { readonly type: "getProduct"; readonly productId: ProductId }
	| {
			readonly type: "submitLimit";
			readonly request: LimitOrderRequest;
			readonly accepted: boolean;
	  }
	| {
			readonly type: "submitMarket";
			readonly request: MarketOrderRequest;
			readonly accepted: boolean;
	  }
	| { readonly type: "cancel"; readonly orderId: VenueOrderId }
	| { readonly type: "getOrder"; readonly orderId: VenueOrderId }
	| { readonly type: "listBalances" };

interface PaperOrder {
	readonly handle: OrderHandle;
	readonly kind: "limit" | "market";
	readonly limitPrice: Decimal | null;
	readonly baseSize: Decimal | null;
	readonly expiresAtMs: number | null;
	status: OrderStatus;
	filledNotional: Decimal;
	filledSize: Decimal;
	cancelReadsLeft: number;
}

interface ScriptedRejection {
	readonly venueCode: string;
	readonly message: string;
}

const BASE_PRECISION = 8;

export class PaperVenue implements Venue {
	private readonly clock: Clock;
	private readonly cancelSettleReads: number;
	private readonly products = new Map<string, PaperProduct>();
	private readonly balances = new Map<string, Decimal>();
	private readonly orders = new Map<string, PaperOrder>();
	private readonly byClientId = new Map<string, VenueOrderId>();
	private readonly callLog: PaperCall[] = [];
	private readonly limitRejections: ScriptedRejection[] = [];
	private readonly marketRejections: ScriptedRejection[] = [];
	private productFailures = 0;
	private readFailures = 0;
	private cancelFailures = 0;
	private gtdRejected = false;
	private orderCounter = 0;

	constructor(config: PaperVenueConfig = {}) {
		this.clock = config.clock ?? SystemClock;
		this.cancelSettleReads = config.cancelSettleReads ?? 0;
		for (const [id, product] of Object.entries(config.products ?? {})) {
			this.products.set(id, product);
		}
		for (const [currency, amount] of Object.entries(config.balances ?? {})) {
			this.balances.set(currency, Decimal.from(amount));
		}
	}

	// ── Scripting ───────────────────────────────────────────────────

	setProduct(id: string, product: PaperProduct): void {
		this.products.set(id, product);
	}

	setPrice(id: string, price: string): void {
		const product = this.products.get(id);
		if (!product) throw new Error(`PaperVenue: unknown product ${id}`);
		this.products.set(id, { ...product, price });
	}

	/** Reject the next limit submissions, one scripted reason each. */
	rejectNextLimit(venueCode: string, times = 1, message = "order rejected"): void {
		for (let i = 0; i < times; i++) this.limitRejections.push({ venueCode, message });
	}

	rejectNextMarket(venueCode: string, times = 1, message = "order rejected"): void {
		for (let i = 0; i < times; i++) this.marketRejections.push({ venueCode, message });
	}

	/** Refuse every good-till-date limit order until called with `false`. */
	rejectGoodTillDate(rejected = true): void {
		this.gtdRejected = rejected;
	}

	failNextProductLookups(times = 1): void {
		this.productFailures += times;
	}

	failNextOrderReads(times = 1): void {
		this.readFailures += times;
	}

	failNextCancels(times = 1): void {
		this.cancelFailures += times;
	}

	/**
	 * Fill `quoteAmount` of a resting limit order at its limit price.
	 * Completes the order once the whole base size is filled.
	 */
	fill(orderId: VenueOrderId | string, quoteAmount: string): void {
		const order = this.orders.get(idToString(venueOrderId(orderId)));
		if (!order || order.kind !== "limit" || !order.limitPrice || !order.baseSize) {
			throw new Error(`PaperVenue: no resting limit order ${orderId}`);
		}
		if (order.status !== OrderStatus.Open) {
			throw new Error(`PaperVenue: order ${orderId} is ${order.status}`);
		}
		const remainingSize = order.baseSize.sub(order.filledSize);
		const size = Decimal.min(
			Decimal.from(quoteAmount).div(order.limitPrice).truncate(BASE_PRECISION),
			remainingSize,
		);
		order.filledSize = order.filledSize.add(size);
		order.filledNotional = order.filledNotional.add(size.mul(order.limitPrice));
		if (order.filledSize.gte(order.baseSize)) {
			order.status = OrderStatus.Filled;
		}
	}

	/** Fill whatever is left of a resting limit order. */
	fillCompletely(orderId: VenueOrderId | string): void {
		const order = this.orders.get(idToString(venueOrderId(orderId)));
		if (!order?.limitPrice || !order.baseSize) {
			throw new Error(`PaperVenue: no resting limit order ${orderId}`);
		}
		const remainingNotional = order.baseSize.sub(order.filledSize).mul(order.limitPrice);
		this.fill(orderId, remainingNotional.toString());
	}

	// ── Inspection ──────────────────────────────────────────────────

	calls(): readonly PaperCall[] {
		return [...this.callLog];
	}

	/** Accepted and rejected limit submissions, in order. */
	limitSubmissions(): Array<{ readonly request: LimitOrderRequest; readonly accepted: boolean }> {
		return this.callLog.flatMap((c) =>
			c.type === "submitLimit" ? [{ request: c.request, accepted: c.accepted }] : [],
		);
	}

	marketSubmissions(): Array<{ readonly request: MarketOrderRequest; readonly accepted: boolean }> {
		return this.callLog.flatMap((c) =>
			c.type === "submitMarket" ? [{ request: c.request, accepted: c.accepted }] : [],
		);
	}

	orderIds(): VenueOrderId[] {
		return [...this.orders.values()].map((o) => o.handle.orderId);
	}

	// ── Venue ───────────────────────────────────────────────────────

	async getProduct(productId: ProductId): Promise<Result<ProductInfo, TradingError>> {
		this.callLog.push({ type: "getProduct", productId });
		if (this.productFailures > 0) {
			this.productFailures--;
			return err(new NetworkError("paper product lookup failed", { productId }));
		}
		const product = this.products.get(idToString(productId));
		if (!product) {
			return err(new MarketDataError(`Unknown product ${productId}`, { productId }));
		}
		const price = Decimal.from(product.price);
		if (!price.isPositive()) {
			return err(new MarketDataError(`Product ${productId} has no usable price`, { productId }));
		}
		return ok({
			productId,
			price,
			priceIncrement: Decimal.tryFrom(product.priceIncrement),
			baseIncrement: Decimal.tryFrom(product.baseIncrement),
			quoteIncrement: Decimal.tryFrom(product.quoteIncrement),
			quoteMinSize: Decimal.tryFrom(product.quoteMinSize),
			baseMinSize: Decimal.tryFrom(product.baseMinSize),
		});
	}

	async submitLimitOrder(req: LimitOrderRequest): Promise<Result<OrderHandle, TradingError>> {
		const rejection = this.limitRejection(req);
		this.callLog.push({ type: "submitLimit", request: req, accepted: rejection === null });
		if (rejection) {
			return err(
				new OrderRejectedError(rejection.message, {
					venueCode: rejection.venueCode,
					clientOrderId: req.clientOrderId,
				}),
			);
		}
		const existing = this.dedupe(req.clientOrderId);
		if (existing) return ok(existing);

		const handle = this.newHandle(req.clientOrderId, req.productId);
		this.orders.set(idToString(handle.orderId), {
			handle,
			kind: "limit",
			limitPrice: req.limitPrice,
			baseSize: req.baseSize,
			expiresAtMs:
				req.timeInForce === TimeInForce.GoodTillDate ? (req.expiresAtMs ?? null) : null,
			status: OrderStatus.Open,
			filledNotional: Decimal.zero(),
			filledSize: Decimal.zero(),
			cancelReadsLeft: 0,
		});
		return ok(handle);
	}

	async submitMarketOrder(req: MarketOrderRequest): Promise<Result<OrderHandle, TradingError>> {
		const product = this.products.get(idToString(req.productId));
		const rejection: ScriptedRejection | null =
			this.marketRejections.shift() ??
			(product ? null : { venueCode: "UNKNOWN_PRODUCT", message: `unknown ${req.productId}` });
		this.callLog.push({ type: "submitMarket", request: req, accepted: rejection === null });
		if (rejection) {
			return err(
				new OrderRejectedError(rejection.message, {
					venueCode: rejection.venueCode,
					clientOrderId: req.clientOrderId,
				}),
			);
		}
		if (!product) {
			return err(new MarketDataError(`Unknown product ${req.productId}`));
		}
		const existing = this.dedupe(req.clientOrderId);
		if (existing) return ok(existing);

		const price = Decimal.from(product.price);
		const handle = this.newHandle(req.clientOrderId, req.productId);
		this.orders.set(idToString(handle.orderId), {
			handle,
			kind: "market",
			limitPrice: null,
			baseSize: null,
			expiresAtMs: null,
			status: OrderStatus.Filled,
			filledNotional: req.quoteSize,
			filledSize: req.quoteSize.div(price).truncate(BASE_PRECISION),
			cancelReadsLeft: 0,
		});
		return ok(handle);
	}

	async cancelOrder(orderId: VenueOrderId): Promise<Result<void, TradingError>> {
		this.callLog.push({ type: "cancel", orderId });
		if (this.cancelFailures > 0) {
			this.cancelFailures--;
			return err(new NetworkError("paper cancel failed", { orderId }));
		}
		const order = this.orders.get(idToString(orderId));
		if (!order) {
			return err(new OrderNotFoundError(`Unknown order ${orderId}`, { orderId }));
		}
		this.expireIfDue(order);
		if (order.status === OrderStatus.Open) {
			order.status = OrderStatus.CancelQueued;
			order.cancelReadsLeft = this.cancelSettleReads;
			if (order.cancelReadsLeft === 0) order.status = OrderStatus.Cancelled;
		}
		return ok(undefined);
	}

	async getOrder(orderId: VenueOrderId): Promise<Result<OrderState, TradingError>> {
		this.callLog.push({ type: "getOrder", orderId });
		if (this.readFailures > 0) {
			this.readFailures--;
			return err(new NetworkError("paper order read failed", { orderId }));
		}
		const order = this.orders.get(idToString(orderId));
		if (!order) {
			return err(new OrderNotFoundError(`Unknown order ${orderId}`, { orderId }));
		}
		this.expireIfDue(order);
		if (order.status === OrderStatus.CancelQueued) {
			if (order.cancelReadsLeft > 0) {
				order.cancelReadsLeft--;
			} else {
				order.status = OrderStatus.Cancelled;
			}
		}
		return ok({
			orderId: order.handle.orderId,
			status: order.status,
			filledNotional: order.filledNotional,
			filledSize: order.filledSize,
			avgFillPrice: order.filledSize.isPositive()
				? order.filledNotional.div(order.filledSize)
				: null,
		});
	}

	async listBalances(): Promise<Result<readonly Balance[], TradingError>> {
		this.callLog.push({ type: "listBalances" });
		return ok(
			[...this.balances.entries()].map(([currency, available]) => ({ currency, available })),
		);
	}

	// ── Internals ───────────────────────────────────────────────────

	private limitRejection(req: LimitOrderRequest): ScriptedRejection | null {
		const scripted = this.limitRejections.shift();
		if (scripted) return scripted;
		const product = this.products.get(idToString(req.productId));
		if (!product) {
			return { venueCode: "UNKNOWN_PRODUCT", message: `unknown ${req.productId}` };
		}
		if (req.timeInForce === TimeInForce.GoodTillDate && this.gtdRejected) {
			return { venueCode: "UNSUPPORTED_ORDER_CONFIGURATION", message: "gtd not accepted" };
		}
		if (req.postOnly && req.limitPrice.gte(Decimal.from(product.price))) {
			return { venueCode: POST_ONLY_CROSS_REASON, message: "post only order would cross" };
		}
		return null;
	}

	private dedupe(coid: ClientOrderId): OrderHandle | null {
		const existingId = this.byClientId.get(idToString(coid));
		if (!existingId) return null;
		return this.orders.get(idToString(existingId))?.handle ?? null;
	}

	private newHandle(coid: ClientOrderId, productId: ProductId): OrderHandle {
		this.orderCounter++;
		const orderId = venueOrderId(`paper-${this.orderCounter}`);
		this.byClientId.set(idToString(coid), orderId);
		return { orderId, clientOrderId: coid, productId, side: OrderSide.Buy };
	}

	private expireIfDue(order: PaperOrder): void {
		if (
			order.status === OrderStatus.Open &&
			order.expiresAtMs !== null &&
			this.clock.now() >= order.expiresAtMs
		) {
			order.status = OrderStatus.Expired;
		}
	}
}
