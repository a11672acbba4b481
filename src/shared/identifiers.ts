/**
 * Branded identifiers — keep venue order ids, client order ids and product
 * ids from being swapped at call sites.
 */

export declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Venue product identifier in BASE-QUOTE form, e.g. "BTC-USDC". */
export type ProductId = Brand<string, "ProductId">;
/** Idempotency key sent with every submission; the venue deduplicates on it. */
export type ClientOrderId = Brand<string, "ClientOrderId">;
/** Order id assigned by the venue on successful placement. */
export type VenueOrderId = Brand<string, "VenueOrderId">;

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

export function clientOrderId(value: string): ClientOrderId {
	return createBrandedId(value, "ClientOrderId");
}

export function venueOrderId(value: string): VenueOrderId {
	return createBrandedId(value, "VenueOrderId");
}

/**
 * Accepts "BTC/USDC" or "BTC-USDC" (any case) and returns "BTC-USDC".
 * @throws Error when the pair has no separator or an empty side
 */
export function productId(pair: string): ProductId {
	const normalized = pair.trim().toUpperCase().replace("/", "-");
	const parts = normalized.split("-");
	if (parts.length !== 2 || parts.some((p) => p.length === 0)) {
		throw new Error(`ProductId must look like BASE-QUOTE or BASE/QUOTE, got "${pair}"`);
	}
	return createBrandedId(normalized, "ProductId");
}

export function idToString(id: ProductId | ClientOrderId | VenueOrderId): string {
	return id as string;
}
