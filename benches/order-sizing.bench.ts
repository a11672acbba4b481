import { bench, describe } from "vitest";
import { Decimal } from "../src/shared/decimal.js";
import { productId } from "../src/shared/identifiers.js";
import { computeLimitPrice, sizeLimitOrder, sizeMarketOrder } from "../src/sizing/order-sizer.js";
import type { ProductInfo } from "../src/venue/types.js";

describe("order sizing", () => {
	const product: ProductInfo = {
		productId: productId("BTC-USDC"),
		price: Decimal.from("64321.87"),
		priceIncrement: Decimal.from("0.01"),
		baseIncrement: Decimal.from("0.00000001"),
		quoteIncrement: Decimal.from("0.01"),
		quoteMinSize: Decimal.from("1"),
		baseMinSize: Decimal.from("0.00000001"),
	};
	const pricing = { kind: "percent_below", pct: Decimal.from("0.1") } as const;
	const warnAbovePct = Decimal.from("1");
	const notional = Decimal.from("123.45");

	bench("limit price + size 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			const { price } = computeLimitPrice(product, pricing, warnAbovePct);
			sizeLimitOrder(product, notional, price);
		}
	});

	bench("market size 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			sizeMarketOrder(product, notional);
		}
	});
});
