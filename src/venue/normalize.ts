/**
 * Boundary normalization of raw venue payloads.
 *
 * Product and order responses may arrive bare or wrapped (`{ order: {...} }`),
 * with numbers as strings or numbers, and with fill fields missing while an
 * order is young. Everything is folded into ProductInfo / OrderState here.
 */

import { validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { MarketDataError } from "../shared/errors.js";
import type { ProductId, VenueOrderId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { OrderStatus, type OrderState, type ProductInfo } from "./types.js";

const numeric = z.union([z.string(), z.number()]).nullish();

const rawProductSchema = z.object({
	price: numeric,
	price_increment: numeric,
	base_increment: numeric,
	quote_increment: numeric,
	quote_min_size: numeric,
	base_min_size: numeric,
});

const rawOrderSchema = z.object({
	status: z.string().nullish(),
	filled_value: numeric,
	filled_size: numeric,
	average_filled_price: numeric,
});

const STATUS_MAP: Readonly<Record<string, OrderStatus>> = {
	PENDING: OrderStatus.Pending,
	QUEUED: OrderStatus.Pending,
	OPEN: OrderStatus.Open,
	CANCEL_QUEUED: OrderStatus.CancelQueued,
	FILLED: OrderStatus.Filled,
	CANCELLED: OrderStatus.Cancelled,
	CANCELED: OrderStatus.Cancelled,
	EXPIRED: OrderStatus.Expired,
	REJECTED: OrderStatus.Rejected,
	FAILED: OrderStatus.Failed,
};

function unwrapEnvelope(raw: unknown, key: string): unknown {
	if (typeof raw === "object" && raw !== null && key in raw) {
		const inner: unknown = Reflect.get(raw, key);
		if (typeof inner === "object" && inner !== null) return inner;
	}
	return raw;
}

/** Positive decimal or null; zero and garbage count as "not provided". */
function positiveOrNull(value: string | number | null | undefined): Decimal | null {
	const parsed = Decimal.tryFrom(value);
	return parsed?.isPositive() ? parsed : null;
}

export function normalizeStatus(raw: string | null | undefined): OrderStatus {
	if (!raw) return OrderStatus.Unknown;
	return STATUS_MAP[raw.trim().toUpperCase()] ?? OrderStatus.Unknown;
}

/** @returns MarketDataError for an unreadable payload or a non-positive price */
export function normalizeProduct(
	productId: ProductId,
	raw: unknown,
): Result<ProductInfo, MarketDataError> {
	const parsed = validate(rawProductSchema, unwrapEnvelope(raw, "product"));
	if (!parsed.ok) {
		return err(
			new MarketDataError(`Unreadable product payload for ${productId}`, {
				productId,
				issues: parsed.error.summary(),
			}),
		);
	}
	const price = positiveOrNull(parsed.value.price);
	if (!price) {
		return err(
			new MarketDataError(`Product ${productId} has no usable price`, {
				productId,
				price: parsed.value.price ?? null,
			}),
		);
	}
	return ok({
		productId,
		price,
		priceIncrement: positiveOrNull(parsed.value.price_increment),
		baseIncrement: positiveOrNull(parsed.value.base_increment),
		quoteIncrement: positiveOrNull(parsed.value.quote_increment),
		quoteMinSize: positiveOrNull(parsed.value.quote_min_size),
		baseMinSize: positiveOrNull(parsed.value.base_min_size),
	});
}

/**
 * Never fails on missing fill fields: absent notional is derived from
 * size × average price when both exist, otherwise zero.
 */
export function normalizeOrderState(orderId: VenueOrderId, raw: unknown): OrderState {
	const parsed = rawOrderSchema.safeParse(unwrapEnvelope(raw, "order"));
	const fields: z.infer<typeof rawOrderSchema> = parsed.success ? parsed.data : {};

	const filledSize = Decimal.tryFrom(fields.filled_size) ?? Decimal.zero();
	const avgFillPrice = positiveOrNull(fields.average_filled_price);
	const reportedNotional = Decimal.tryFrom(fields.filled_value);

	let filledNotional = Decimal.zero();
	if (reportedNotional?.isPositive()) {
		filledNotional = reportedNotional;
	} else if (filledSize.isPositive() && avgFillPrice) {
		filledNotional = filledSize.mul(avgFillPrice);
	}

	return {
		orderId,
		status: normalizeStatus(fields.status),
		filledNotional,
		filledSize: filledSize.isNegative() ? Decimal.zero() : filledSize,
		avgFillPrice,
	};
}
