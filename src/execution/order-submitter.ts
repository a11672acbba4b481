/**
 * OrderSubmitter — places one logical order with the documented retries.
 *
 * Limit orders try good-till-date first when an expiry is given and fall
 * back once to good-till-cancel if the venue refuses it for any reason
 * other than a post-only cross. A post-only cross nudges the price down
 * one tick and retries once. Every attempt draws a fresh key.
 */

import type { Logger } from "../lib/logger/index.js";
import type { ClientOrderIdIssuer } from "../order/client-order-ids.js";
import type { Decimal } from "../shared/decimal.js";
import { OrderRejectedError, type TradingError } from "../shared/errors.js";
import type { ProductId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { priceTick } from "../sizing/quantize.js";
import type { Precision } from "../sizing/types.js";
import {
	type OrderHandle,
	OrderSide,
	POST_ONLY_CROSS_REASON,
	type ProductInfo,
	TimeInForce,
	type Venue,
} from "../venue/types.js";

export interface LimitSubmission {
	readonly product: ProductInfo;
	readonly baseSize: Decimal;
	readonly limitPrice: Decimal;
	readonly postOnly: boolean;
	/** Null submits good-till-cancel directly. */
	readonly expiresAtMs: number | null;
}

export interface SubmittedLimitOrder {
	readonly handle: OrderHandle;
	/** The price the venue accepted, after any nudge. */
	readonly limitPrice: Decimal;
	readonly baseSize: Decimal;
	readonly timeInForce: TimeInForce;
	readonly attempts: number;
}

/** True when the venue refused a post-only order because it would have matched. */
export function isPostOnlyCross(error: TradingError): boolean {
	if (!(error instanceof OrderRejectedError)) return false;
	if (error.venueCode?.includes(POST_ONLY_CROSS_REASON)) return true;
	return /post[\s_-]?only/i.test(error.message) && /cross|match|taker/i.test(error.message);
}

export class OrderSubmitter {
	private readonly venue: Venue;
	private readonly logger: Logger;
	private readonly precision: Precision;

	constructor(venue: Venue, logger: Logger, precision: Precision) {
		this.venue = venue;
		this.logger = logger;
		this.precision = precision;
	}

	async submitLimit(
		submission: LimitSubmission,
		keys: ClientOrderIdIssuer,
	): Promise<Result<SubmittedLimitOrder, TradingError>> {
		const { product, baseSize, postOnly, expiresAtMs } = submission;
		let limitPrice = submission.limitPrice;
		let timeInForce: TimeInForce =
			expiresAtMs !== null ? TimeInForce.GoodTillDate : TimeInForce.GoodTillCancel;
		let nudged = false;
		let attempts = 0;

		for (;;) {
			attempts++;
			const clientOrderId = keys.next();
			const placed = await this.venue.submitLimitOrder({
				clientOrderId,
				productId: product.productId,
				side: OrderSide.Buy,
				baseSize,
				limitPrice,
				postOnly,
				timeInForce,
				...(timeInForce === TimeInForce.GoodTillDate &&
					expiresAtMs !== null && { expiresAtMs }),
			});

			if (placed.ok) {
				this.logger.info(
					{
						orderId: placed.value.orderId,
						clientOrderId,
						limitPrice: limitPrice.toString(),
						baseSize: baseSize.toString(),
						timeInForce,
						attempts,
					},
					"Limit order placed",
				);
				return ok({ handle: placed.value, limitPrice, baseSize, timeInForce, attempts });
			}

			const error = placed.error;
			if (postOnly && isPostOnlyCross(error)) {
				if (nudged) {
					this.logger.warn(
						{ clientOrderId, limitPrice: limitPrice.toString() },
						"Post-only order crossed again after nudge",
					);
					return err(error);
				}
				const nudgedPrice = limitPrice.sub(priceTick(product, this.precision));
				if (!nudgedPrice.isPositive()) return err(error);
				this.logger.warn(
					{ clientOrderId, from: limitPrice.toString(), to: nudgedPrice.toString() },
					"Post-only order would cross; nudging one tick",
				);
				limitPrice = nudgedPrice;
				nudged = true;
				continue;
			}

			if (timeInForce === TimeInForce.GoodTillDate) {
				this.logger.warn(
					{ clientOrderId, error: error.toJSON() },
					"Good-till-date order refused; retrying as good-till-cancel",
				);
				timeInForce = TimeInForce.GoodTillCancel;
				continue;
			}

			this.logger.warn({ clientOrderId, error: error.toJSON() }, "Limit order refused");
			return err(error);
		}
	}

	async submitMarket(
		productId: ProductId,
		quoteSize: Decimal,
		keys: ClientOrderIdIssuer,
	): Promise<Result<OrderHandle, TradingError>> {
		const clientOrderId = keys.next();
		const placed = await this.venue.submitMarketOrder({
			clientOrderId,
			productId,
			side: OrderSide.Buy,
			quoteSize,
		});
		if (!placed.ok) {
			this.logger.warn(
				{ clientOrderId, quoteSize: quoteSize.toString(), error: placed.error.toJSON() },
				"Market order refused",
			);
			return placed;
		}
		this.logger.info(
			{ orderId: placed.value.orderId, clientOrderId, quoteSize: quoteSize.toString() },
			"Market order placed",
		);
		return placed;
	}
}
