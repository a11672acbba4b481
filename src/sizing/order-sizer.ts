/**
 * Order sizing — limit price, base size and minimum checks.
 *
 * Checks run on quantized values: lot truncation can push a notional that
 * was above the minimum below it.
 */

import { Decimal } from "../shared/decimal.js";
import { BelowMinimumError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { ProductInfo } from "../venue/types.js";
import { DEFAULT_PRECISION, quantizeBase, quantizePrice, quantizeQuote } from "./quantize.js";
import type { LimitOrderSize, LimitPrice, LimitPricing, Precision } from "./types.js";

const HUNDRED = Decimal.from(100);

/**
 * Limit price for a buy. Percent pricing discounts the market price;
 * absolute pricing is taken as given but flagged when it exceeds market
 * by more than `warnAbovePct`.
 */
export function computeLimitPrice(
	product: ProductInfo,
	pricing: LimitPricing,
	warnAbovePct: Decimal,
	precision: Precision = DEFAULT_PRECISION,
): LimitPrice {
	if (pricing.kind === "percent_below") {
		const factor = Decimal.from(1).sub(pricing.pct.div(HUNDRED));
		const price = quantizePrice(product.price.mul(factor), product, precision);
		return { price, overshootPct: null };
	}

	const price = quantizePrice(pricing.price, product, precision);
	const abovePct = price.sub(product.price).div(product.price).mul(HUNDRED);
	return { price, overshootPct: abovePct.gt(warnAbovePct) ? abovePct : null };
}

/**
 * Base size for spending `quoteNotional` at `limitPrice`.
 * @returns BelowMinimumError when the quantized size or notional is under the venue minimums
 */
export function sizeLimitOrder(
	product: ProductInfo,
	quoteNotional: Decimal,
	limitPrice: Decimal,
	precision: Precision = DEFAULT_PRECISION,
): Result<LimitOrderSize, BelowMinimumError> {
	const context = {
		productId: product.productId,
		quoteNotional: quoteNotional.toString(),
		limitPrice: limitPrice.toString(),
	};
	if (!limitPrice.isPositive()) {
		return err(new BelowMinimumError("Limit price quantized to zero", context));
	}

	const baseSize = quantizeBase(quoteNotional.div(limitPrice), product, precision);
	if (!baseSize.isPositive()) {
		return err(new BelowMinimumError("Base size quantized to zero", context));
	}
	if (product.baseMinSize && baseSize.lt(product.baseMinSize)) {
		return err(
			new BelowMinimumError(
				`Base size ${baseSize.toString()} is below the minimum ${product.baseMinSize.toString()}`,
				{ ...context, baseSize: baseSize.toString() },
			),
		);
	}

	const notional = baseSize.mul(limitPrice);
	if (product.quoteMinSize && notional.lt(product.quoteMinSize)) {
		return err(
			new BelowMinimumError(
				`Notional ${notional.toString()} is below the minimum ${product.quoteMinSize.toString()}`,
				{ ...context, baseSize: baseSize.toString(), notional: notional.toString() },
			),
		);
	}

	return ok({ limitPrice, baseSize, notional });
}

/**
 * Quote size for a market buy, truncated to the quote increment.
 * @returns BelowMinimumError when nothing or less than the minimum notional remains
 */
export function sizeMarketOrder(
	product: ProductInfo,
	quoteNotional: Decimal,
	precision: Precision = DEFAULT_PRECISION,
): Result<Decimal, BelowMinimumError> {
	const quoteSize = quantizeQuote(quoteNotional, product, precision);
	const context = { productId: product.productId, quoteSize: quoteSize.toString() };
	if (!quoteSize.isPositive()) {
		return err(new BelowMinimumError("Quote size quantized to zero", context));
	}
	if (product.quoteMinSize && quoteSize.lt(product.quoteMinSize)) {
		return err(
			new BelowMinimumError(
				`Quote size ${quoteSize.toString()} is below the minimum ${product.quoteMinSize.toString()}`,
				context,
			),
		);
	}
	return ok(quoteSize);
}
