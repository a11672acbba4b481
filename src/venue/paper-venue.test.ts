import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { OrderRejectedError } from "../shared/errors.js";
import { clientOrderId, productId, venueOrderId } from "../shared/identifiers.js";
import { FakeClock } from "../shared/time.js";
import { PaperVenue } from "./paper-venue.js";
import {
	type LimitOrderRequest,
	OrderStatus,
	POST_ONLY_CROSS_REASON,
	TimeInForce,
} from "./types.js";

const BTC = productId("BTC-USDC");

function venue(clock = new FakeClock(0), cancelSettleReads = 0): PaperVenue {
	return new PaperVenue({
		clock,
		cancelSettleReads,
		products: {
			"BTC-USDC": {
				price: "50000",
				priceIncrement: "0.01",
				baseIncrement: "0.00000001",
				quoteIncrement: "0.01",
				quoteMinSize: "1",
			},
		},
		balances: { USDC: "250" },
	});
}

function limit(overrides: Partial<LimitOrderRequest> = {}): LimitOrderRequest {
	return {
		clientOrderId: clientOrderId("coid-1"),
		productId: BTC,
		side: "BUY",
		baseSize: Decimal.from("0.002"),
		limitPrice: Decimal.from("49995"),
		postOnly: true,
		timeInForce: TimeInForce.GoodTillCancel,
		...overrides,
	};
}

describe("PaperVenue", () => {
	it("returns product rules as decimals", async () => {
		const result = await venue().getProduct(BTC);
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.price.toString()).toBe("50000");
		expect(result.value.quoteMinSize?.toString()).toBe("1");
		expect(result.value.baseMinSize).toBeNull();
	});

	it("fails product lookup for unknown products and scripted failures", async () => {
		const v = venue();
		expect((await v.getProduct(productId("ETH-USDC"))).ok).toBe(false);
		v.failNextProductLookups();
		expect((await v.getProduct(BTC)).ok).toBe(false);
		expect((await v.getProduct(BTC)).ok).toBe(true);
	});

	it("rests a limit order until filled", async () => {
		const v = venue();
		const placed = await v.submitLimitOrder(limit());
		if (!placed.ok) throw placed.error;

		const open = await v.getOrder(placed.value.orderId);
		expect(open.ok && open.value.status).toBe(OrderStatus.Open);

		v.fill(placed.value.orderId, "49.995");
		const partial = await v.getOrder(placed.value.orderId);
		if (!partial.ok) throw partial.error;
		expect(partial.value.status).toBe(OrderStatus.Open);
		expect(partial.value.filledSize.toString()).toBe("0.001");
		expect(partial.value.filledNotional.toString()).toBe("49.995");
		expect(partial.value.avgFillPrice?.toString()).toBe("49995");

		v.fillCompletely(placed.value.orderId);
		const done = await v.getOrder(placed.value.orderId);
		expect(done.ok && done.value.status).toBe(OrderStatus.Filled);
		expect(done.ok && done.value.filledNotional.toString()).toBe("99.99");
	});

	it("rejects a post-only buy at or above the price", async () => {
		const v = venue();
		const result = await v.submitLimitOrder(limit({ limitPrice: Decimal.from("50000") }));
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toBeInstanceOf(OrderRejectedError);
		expect(result.error instanceof OrderRejectedError && result.error.venueCode).toBe(
			POST_ONLY_CROSS_REASON,
		);
		expect(v.limitSubmissions()).toHaveLength(1);
		expect(v.limitSubmissions()[0]?.accepted).toBe(false);
	});

	it("accepts a crossing price when post-only is off", async () => {
		const result = await venue().submitLimitOrder(
			limit({ limitPrice: Decimal.from("50001"), postOnly: false }),
		);
		expect(result.ok).toBe(true);
	});

	it("deduplicates on client order id", async () => {
		const v = venue();
		const first = await v.submitLimitOrder(limit());
		const second = await v.submitLimitOrder(limit());
		if (!first.ok || !second.ok) throw new Error("submission failed");
		expect(second.value.orderId).toBe(first.value.orderId);
		expect(v.orderIds()).toHaveLength(1);
	});

	it("replays scripted limit rejections before normal checks", async () => {
		const v = venue();
		v.rejectNextLimit("INSUFFICIENT_FUND", 2);
		expect((await v.submitLimitOrder(limit())).ok).toBe(false);
		expect((await v.submitLimitOrder(limit({ clientOrderId: clientOrderId("b") }))).ok).toBe(
			false,
		);
		expect((await v.submitLimitOrder(limit({ clientOrderId: clientOrderId("c") }))).ok).toBe(
			true,
		);
	});

	it("refuses good-till-date orders when told to", async () => {
		const v = venue();
		v.rejectGoodTillDate();
		const gtd = await v.submitLimitOrder(
			limit({ timeInForce: TimeInForce.GoodTillDate, expiresAtMs: 60_000 }),
		);
		expect(gtd.ok).toBe(false);
		const gtc = await v.submitLimitOrder(limit({ clientOrderId: clientOrderId("coid-2") }));
		expect(gtc.ok).toBe(true);
	});

	it("expires a good-till-date order once the clock passes its end time", async () => {
		const clock = new FakeClock(0);
		const v = venue(clock);
		const placed = await v.submitLimitOrder(
			limit({ timeInForce: TimeInForce.GoodTillDate, expiresAtMs: 60_000 }),
		);
		if (!placed.ok) throw placed.error;
		clock.advance(59_999);
		expect((await v.getOrder(placed.value.orderId)).ok).toBe(true);
		const before = await v.getOrder(placed.value.orderId);
		expect(before.ok && before.value.status).toBe(OrderStatus.Open);
		clock.advance(1);
		const after = await v.getOrder(placed.value.orderId);
		expect(after.ok && after.value.status).toBe(OrderStatus.Expired);
	});

	it("settles a cancel immediately by default", async () => {
		const v = venue();
		const placed = await v.submitLimitOrder(limit());
		if (!placed.ok) throw placed.error;
		await v.cancelOrder(placed.value.orderId);
		const state = await v.getOrder(placed.value.orderId);
		expect(state.ok && state.value.status).toBe(OrderStatus.Cancelled);
	});

	it("reports cancel_queued for the configured number of reads", async () => {
		const v = venue(new FakeClock(0), 2);
		const placed = await v.submitLimitOrder(limit());
		if (!placed.ok) throw placed.error;
		await v.cancelOrder(placed.value.orderId);

		const statuses: string[] = [];
		for (let i = 0; i < 3; i++) {
			const read = await v.getOrder(placed.value.orderId);
			if (read.ok) statuses.push(read.value.status);
		}
		expect(statuses).toEqual([
			OrderStatus.CancelQueued,
			OrderStatus.CancelQueued,
			OrderStatus.Cancelled,
		]);
	});

	it("leaves a filled order filled when cancelled", async () => {
		const v = venue();
		const placed = await v.submitLimitOrder(limit());
		if (!placed.ok) throw placed.error;
		v.fillCompletely(placed.value.orderId);
		await v.cancelOrder(placed.value.orderId);
		const state = await v.getOrder(placed.value.orderId);
		expect(state.ok && state.value.status).toBe(OrderStatus.Filled);
	});

	it("fills market orders immediately at the current price", async () => {
		const v = venue();
		v.setPrice("BTC-USDC", "40000");
		const placed = await v.submitMarketOrder({
			clientOrderId: clientOrderId("m-1"),
			productId: BTC,
			side: "BUY",
			quoteSize: Decimal.from("20"),
		});
		if (!placed.ok) throw placed.error;
		const state = await v.getOrder(placed.value.orderId);
		if (!state.ok) throw state.error;
		expect(state.value.status).toBe(OrderStatus.Filled);
		expect(state.value.filledSize.toString()).toBe("0.0005");
		expect(state.value.filledNotional.toString()).toBe("20");
		expect(v.marketSubmissions()).toHaveLength(1);
	});

	it("fails reads and cancels on request", async () => {
		const v = venue();
		const placed = await v.submitLimitOrder(limit());
		if (!placed.ok) throw placed.error;
		v.failNextOrderReads();
		v.failNextCancels();
		expect((await v.getOrder(placed.value.orderId)).ok).toBe(false);
		expect((await v.cancelOrder(placed.value.orderId)).ok).toBe(false);
		expect((await v.getOrder(venueOrderId("missing"))).ok).toBe(false);
	});

	it("lists configured balances", async () => {
		const result = await venue().listBalances();
		if (!result.ok) throw result.error;
		expect(result.value.map((b) => [b.currency, b.available.toString()])).toEqual([
			["USDC", "250"],
		]);
	});
});
