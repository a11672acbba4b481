/**
 * CoinbaseVenue — Venue over the Advanced Trade REST client.
 *
 * Builds order configurations from canonical requests and normalizes every
 * response before it leaves the adapter.
 */

import type { CoinbaseClient } from "../lib/coinbase/client.js";
import type { OrderConfiguration } from "../lib/coinbase/types.js";
import { Decimal } from "../shared/decimal.js";
import {
	MarketDataError,
	OrderNotFoundError,
	OrderRejectedError,
	type TradingError,
} from "../shared/errors.js";
import {
	type ProductId,
	type VenueOrderId,
	idToString,
	venueOrderId,
} from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { normalizeOrderState, normalizeProduct } from "./normalize.js";
import {
	type Balance,
	type LimitOrderRequest,
	type MarketOrderRequest,
	type OrderHandle,
	type OrderState,
	type ProductInfo,
	TimeInForce,
	type Venue,
} from "./types.js";

export class CoinbaseVenue implements Venue {
	private readonly client: CoinbaseClient;

	constructor(client: CoinbaseClient) {
		this.client = client;
	}

	async getProduct(productId: ProductId): Promise<Result<ProductInfo, TradingError>> {
		const raw = await this.client.getProduct(idToString(productId));
		if (!raw.ok) {
			if (raw.error instanceof OrderNotFoundError) {
				return err(
					new MarketDataError(`Unknown product ${productId}`, { productId, cause: raw.error }),
				);
			}
			return raw;
		}
		return normalizeProduct(productId, raw.value);
	}

	async submitLimitOrder(req: LimitOrderRequest): Promise<Result<OrderHandle, TradingError>> {
		const configuration = limitConfiguration(req);
		if (!configuration.ok) return configuration;
		return this.place(req, configuration.value);
	}

	async submitMarketOrder(req: MarketOrderRequest): Promise<Result<OrderHandle, TradingError>> {
		return this.place(req, { market_market_ioc: { quote_size: req.quoteSize.toString() } });
	}

	async cancelOrder(orderId: VenueOrderId): Promise<Result<void, TradingError>> {
		const response = await this.client.cancelOrders([idToString(orderId)]);
		if (!response.ok) return response;
		const result = response.value.find((r) => r.order_id === idToString(orderId));
		if (result && !result.success) {
			const reason = result.failure_reason ?? "UNKNOWN_CANCEL_FAILURE_REASON";
			return err(
				new OrderRejectedError(`Cancel refused: ${reason}`, { venueCode: reason, orderId }),
			);
		}
		return ok(undefined);
	}

	async getOrder(orderId: VenueOrderId): Promise<Result<OrderState, TradingError>> {
		const raw = await this.client.getOrder(idToString(orderId));
		if (!raw.ok) return raw;
		return ok(normalizeOrderState(orderId, raw.value));
	}

	async listBalances(): Promise<Result<readonly Balance[], TradingError>> {
		const accounts = await this.client.listAccounts();
		if (!accounts.ok) return accounts;
		return ok(
			accounts.value.map((a) => ({
				currency: a.currency,
				available: Decimal.tryFrom(a.available_balance.value) ?? Decimal.zero(),
			})),
		);
	}

	private async place(
		req: LimitOrderRequest | MarketOrderRequest,
		configuration: OrderConfiguration,
	): Promise<Result<OrderHandle, TradingError>> {
		const placed = await this.client.createOrder({
			client_order_id: idToString(req.clientOrderId),
			product_id: idToString(req.productId),
			side: req.side,
			order_configuration: configuration,
		});
		if (!placed.ok) return placed;
		return ok({
			orderId: venueOrderId(placed.value),
			clientOrderId: req.clientOrderId,
			productId: req.productId,
			side: req.side,
		});
	}
}

function limitConfiguration(req: LimitOrderRequest): Result<OrderConfiguration, TradingError> {
	const base_size = req.baseSize.toString();
	const limit_price = req.limitPrice.toString();
	const post_only = req.postOnly;
	if (req.timeInForce === TimeInForce.GoodTillCancel) {
		return ok({ limit_limit_gtc: { base_size, limit_price, post_only } });
	}
	if (req.expiresAtMs === undefined) {
		return err(
			new OrderRejectedError("Good-till-date order needs an expiry", {
				venueCode: "INVALID_END_TIME",
				clientOrderId: req.clientOrderId,
			}),
		);
	}
	const end_time = new Date(req.expiresAtMs).toISOString();
	return ok({ limit_limit_gtd: { base_size, limit_price, end_time, post_only } });
}
