/**
 * Quantization — truncate values onto venue increments.
 *
 * Never rounds up: a rounded-up price can cross the book and a rounded-up
 * size overspends the budget.
 */

import { Decimal } from "../shared/decimal.js";
import type { ProductInfo } from "../venue/types.js";
import { DEFAULT_BASE_PRECISION, DEFAULT_QUOTE_PRECISION, type Precision } from "./types.js";

export const DEFAULT_PRECISION: Precision = {
	quote: DEFAULT_QUOTE_PRECISION,
	base: DEFAULT_BASE_PRECISION,
};

/**
 * Truncate `value` toward zero onto `increment`, or to `fallbackPlaces`
 * decimal places when the increment is missing or not positive.
 */
export function quantize(
	value: Decimal,
	increment: Decimal | null,
	fallbackPlaces: number,
): Decimal {
	if (increment?.isPositive()) {
		return value.floorToStep(increment);
	}
	return value.truncate(fallbackPlaces);
}

export function quantizePrice(
	value: Decimal,
	product: ProductInfo,
	precision: Precision = DEFAULT_PRECISION,
): Decimal {
	return quantize(value, product.priceIncrement, precision.quote);
}

export function quantizeBase(
	value: Decimal,
	product: ProductInfo,
	precision: Precision = DEFAULT_PRECISION,
): Decimal {
	return quantize(value, product.baseIncrement, precision.base);
}

export function quantizeQuote(
	value: Decimal,
	product: ProductInfo,
	precision: Precision = DEFAULT_PRECISION,
): Decimal {
	return quantize(value, product.quoteIncrement, precision.quote);
}

/** One price increment, or the smallest unit at the quote precision. */
export function priceTick(product: ProductInfo, precision: Precision = DEFAULT_PRECISION): Decimal {
	if (product.priceIncrement?.isPositive()) return product.priceIncrement;
	return Decimal.from(`1e-${precision.quote}`);
}
