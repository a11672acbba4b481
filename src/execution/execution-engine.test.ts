import { describe, expect, it } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import {
	BelowMinimumError,
	MarketDataError,
	OrderRejectedError,
	type TradingError,
} from "../shared/errors.js";
import type { ProductId, VenueOrderId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { sleep } from "../shared/time.js";
import { PaperVenue } from "../venue/paper-venue.js";
import { type OrderState, OrderSide, type ProductInfo, TimeInForce } from "../venue/types.js";
import { ExecutionEngine } from "./execution-engine.js";
import {
	BTC_USDC,
	START_MS,
	type TestHarness,
	createHarness,
	sequentialIds,
} from "./execution-test-helpers.js";
import {
	type CampaignFailedEvent,
	type CampaignOutcome,
	type CampaignStartedEvent,
	CampaignEndReason,
	FallbackDecision,
	type OrderSubmittedEvent,
} from "./types.js";

const DAY_MS = 86_400_000;

function engineFor(
	harness: TestHarness,
	overrides: { venue?: PaperVenue; realSleep?: boolean } = {},
): ExecutionEngine {
	return new ExecutionEngine({
		venue: overrides.venue ?? harness.venue,
		logger: silentLogger(),
		clock: harness.time.clock,
		sleep: overrides.realSleep ? sleep : harness.time.sleep,
		newClientOrderId: sequentialIds(),
		config: harness.config,
	});
}

interface Recorded {
	readonly started: CampaignStartedEvent[];
	readonly submitted: OrderSubmittedEvent[];
	readonly finished: CampaignOutcome[];
	readonly failed: CampaignFailedEvent[];
}

function recordEvents(engine: ExecutionEngine): Recorded {
	const recorded: Recorded = { started: [], submitted: [], finished: [], failed: [] };
	engine.events
		.on("campaignStarted", (e) => recorded.started.push(e))
		.on("orderSubmitted", (e) => recorded.submitted.push(e))
		.on("campaignFinished", (o) => recorded.finished.push(o))
		.on("campaignFailed", (e) => recorded.failed.push(e));
	return recorded;
}

describe("ExecutionEngine.createOrder", () => {
	it("places a post-only limit order just under the market", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);

		const result = await engine.createOrder({
			pair: "btc/usdc",
			quoteAmount: "100",
			limitPricePct: "0.01",
		});

		expect(result).toEqual({
			success: true,
			orderId: "paper-1",
			productId: "BTC-USDC",
			side: OrderSide.Buy,
			clientOrderId: "coid-1",
			error: null,
		});
		const order = harness.venue.limitSubmissions()[0]?.request;
		if (!order) throw new Error("no limit submission");
		expect(order.limitPrice.toString()).toBe("49995");
		expect(order.baseSize.toString()).toBe("0.0020002");
		expect(order.baseSize.mul(order.limitPrice).toString()).toBe("99.999999");
		expect(order.postOnly).toBe(true);
		expect(order.timeInForce).toBe(TimeInForce.GoodTillDate);
		expect(order.expiresAtMs).toBe(START_MS + DAY_MS);
		await engine.whenIdle();
	});

	it("returns validation failures without calling the venue", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);

		const result = await engine.createOrder({ pair: "BTCUSDC", quoteAmount: "-1" });

		expect(result.success).toBe(false);
		expect(result.orderId).toBeNull();
		expect(result.productId).toBeNull();
		expect(result.error).toBeInstanceOf(ValidationError);
		expect(harness.venue.calls()).toEqual([]);
	});

	it("fails on an unknown product before any submission", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);

		const result = await engine.createOrder({ pair: "ETH-USDC", quoteAmount: "100" });

		expect(result.success).toBe(false);
		expect(result.productId).toBe("ETH-USDC");
		expect(result.error).toBeInstanceOf(MarketDataError);
		expect(harness.venue.limitSubmissions()).toEqual([]);
	});

	it("fails below the venue minimums before any submission", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);

		const result = await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "0.5" });

		expect(result.error).toBeInstanceOf(BelowMinimumError);
		expect(harness.venue.limitSubmissions()).toEqual([]);
	});

	it("returns a rejected submission and starts no campaign", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		const seen = recordEvents(engine);
		harness.venue.rejectNextLimit("INSUFFICIENT_FUND", 2);

		const result = await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "100" });

		expect(result.success).toBe(false);
		expect(result.error).toBeInstanceOf(OrderRejectedError);
		expect(seen.started).toEqual([]);
		expect(engine.activeCampaigns()).toEqual([]);
	});

	it("uses the caller's client order id for the first submission only", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		harness.venue.rejectGoodTillDate();

		const result = await engine.createOrder({
			pair: "BTC-USDC",
			quoteAmount: "100",
			clientOrderId: "dca-2024-01-01",
			disableFallback: true,
		});

		expect(harness.venue.limitSubmissions().map((s) => s.request.clientOrderId)).toEqual([
			"dca-2024-01-01",
			"coid-1",
		]);
		expect(result.clientOrderId).toBe("coid-1");
	});

	it("places a market order for the truncated quote amount with no campaign", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		const seen = recordEvents(engine);

		const result = await engine.createOrder({
			pair: "BTC-USDC",
			quoteAmount: "20.129",
			orderType: "market",
		});

		expect(result.success).toBe(true);
		expect(harness.venue.marketSubmissions()[0]?.request.quoteSize.toString()).toBe("20.12");
		expect(harness.venue.limitSubmissions()).toEqual([]);
		expect(seen.submitted.map((e) => e.quoteSize?.toString())).toEqual(["20.12"]);
		expect(seen.started).toEqual([]);
		expect(engine.activeCampaigns()).toEqual([]);
	});

	it("leaves the order resting when neither repricing nor fallback is enabled", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		const seen = recordEvents(engine);

		const result = await engine.createOrder({
			pair: "BTC-USDC",
			quoteAmount: "100",
			disableFallback: true,
		});

		expect(result.success).toBe(true);
		expect(seen.started).toEqual([]);
		expect(engine.activeCampaigns()).toEqual([]);
		expect(harness.venue.calls().filter((c) => c.type === "cancel")).toEqual([]);
	});

	it("starts no reprice loop when fallback is disabled", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		const seen = recordEvents(engine);

		const result = await engine.createOrder({
			pair: "BTC-USDC",
			quoteAmount: "100",
			repriceIntervalMs: 60_000,
			disableFallback: true,
		});
		await engine.whenIdle();

		expect(result.success).toBe(true);
		expect(seen.started).toEqual([]);
		expect(harness.venue.limitSubmissions()).toHaveLength(1);
		expect(harness.venue.marketSubmissions()).toEqual([]);
		expect(harness.venue.calls().filter((c) => c.type === "cancel")).toEqual([]);
	});

	it("runs one campaign when a client order id is submitted twice", async () => {
		const harness = createHarness();
		const engine = engineFor(harness, { realSleep: true });
		const seen = recordEvents(engine);
		const input = { pair: "BTC-USDC", quoteAmount: "100", clientOrderId: "dup-1" };

		const first = await engine.createOrder(input);
		const second = await engine.createOrder(input);

		expect(second.orderId).toBe(first.orderId);
		expect(seen.started).toHaveLength(1);
		expect(engine.activeCampaigns()).toEqual(["dup-1"]);

		await engine.shutdown();

		expect(harness.venue.marketSubmissions()).toEqual([]);
		expect(engine.activeCampaigns()).toEqual([]);
	});

	it("returns a classified failure when the venue throws", async () => {
		class ThrowingVenue extends PaperVenue {
			override async getProduct(_id: ProductId): Promise<Result<ProductInfo, TradingError>> {
				throw new Error("connect ECONNREFUSED 127.0.0.1:443");
			}
		}
		const harness = createHarness();
		const engine = engineFor(harness, { venue: new ThrowingVenue() });

		const result = await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "100" });

		expect(result.success).toBe(false);
		expect(result.error?.code).toBe("NETWORK_ERROR");
	});
});

describe("ExecutionEngine campaigns", () => {
	it("runs the plain fallback over the whole budget", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		const seen = recordEvents(engine);
		harness.time.at(60_000, () => harness.venue.fill("paper-1", "49.95"));

		await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "100" });
		await engine.whenIdle();

		expect(seen.started.map((e) => e.mode)).toEqual(["fallback"]);
		expect(harness.time.elapsed()).toBe(DAY_MS);
		expect(seen.finished).toHaveLength(1);
		expect(seen.finished[0]?.reason).toBe(CampaignEndReason.BudgetExhausted);
		expect(seen.finished[0]?.fallback).toBe(FallbackDecision.Placed);
		expect(seen.finished[0]?.fallbackQuoteSize?.toString()).toBe("50.05");
		expect(engine.activeCampaigns()).toEqual([]);
	});

	it("runs the reprice loop with the first expiry capped at one interval", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		const seen = recordEvents(engine);

		await engine.createOrder({
			pair: "BTC-USDC",
			quoteAmount: "100",
			repriceIntervalMs: 60_000,
			orderTimeoutMs: 180_000,
		});
		await engine.whenIdle();

		expect(seen.started[0]?.mode).toBe("reprice");
		expect(seen.started[0]?.deadlineMs).toBe(START_MS + 180_000);
		const expiries = harness.venue.limitSubmissions().map((s) => s.request.expiresAtMs);
		expect(expiries).toEqual([START_MS + 60_000, START_MS + 120_000, START_MS + 180_000]);
		expect(seen.finished[0]?.reason).toBe(CampaignEndReason.BudgetExhausted);
		expect(seen.finished[0]?.orderIds).toEqual(["paper-1", "paper-2", "paper-3"]);
		expect(seen.finished[0]?.fallbackOrderId).toBe("paper-4");
	});

	it("aborts a campaign on request without placing a fallback", async () => {
		const harness = createHarness();
		const engine = engineFor(harness, { realSleep: true });
		const seen = recordEvents(engine);

		const result = await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "100" });
		expect(engine.activeCampaigns()).toEqual(["coid-1"]);

		expect(engine.cancelCampaign("coid-1")).toBe(true);
		await engine.whenIdle();

		expect(seen.finished[0]?.reason).toBe(CampaignEndReason.Aborted);
		expect(harness.venue.marketSubmissions()).toEqual([]);
		expect(harness.venue.calls()).toContainEqual({ type: "cancel", orderId: result.orderId });
		expect(engine.activeCampaigns()).toEqual([]);
		expect(engine.cancelCampaign("coid-1")).toBe(false);
	});

	it("shuts down every running campaign", async () => {
		const harness = createHarness();
		const engine = engineFor(harness, { realSleep: true });
		const seen = recordEvents(engine);

		await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "100" });
		await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "50", limitPrice: "45000" });
		expect(engine.activeCampaigns()).toHaveLength(2);

		await engine.shutdown();

		expect(seen.finished.map((o) => o.reason)).toEqual([
			CampaignEndReason.Aborted,
			CampaignEndReason.Aborted,
		]);
		expect(engine.activeCampaigns()).toEqual([]);
	});

	it("keeps running when an event listener throws", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		const seen = recordEvents(engine);
		engine.events.on("orderSubmitted", () => {
			throw new Error("listener bug");
		});

		const result = await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "100" });
		await engine.whenIdle();

		expect(result.success).toBe(true);
		expect(seen.finished).toHaveLength(1);
	});

	it("reports a campaign that throws as failed", async () => {
		class BrokenReads extends PaperVenue {
			override async getOrder(_id: VenueOrderId): Promise<Result<OrderState, TradingError>> {
				throw new Error("unexpected payload");
			}
		}
		const harness = createHarness();
		const venue = new BrokenReads({
			clock: harness.time.clock,
			products: { "BTC-USDC": BTC_USDC },
		});
		const engine = engineFor(harness, { venue });
		const seen = recordEvents(engine);

		await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "100" });
		await engine.whenIdle();

		expect(seen.failed).toHaveLength(1);
		expect(seen.failed[0]?.campaignId).toBe("coid-1");
		expect(seen.failed[0]?.error.code).toBe("SYSTEM_ERROR");
		expect(engine.activeCampaigns()).toEqual([]);
	});

	it("issues a distinct client order id for every submission of a campaign", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		harness.venue.rejectGoodTillDate();

		await engine.createOrder({
			pair: "BTC-USDC",
			quoteAmount: "100",
			repriceIntervalMs: 60_000,
			orderTimeoutMs: 300_000,
		});
		await engine.whenIdle();

		const keys = [
			...harness.venue.limitSubmissions().map((s) => s.request.clientOrderId),
			...harness.venue.marketSubmissions().map((s) => s.request.clientOrderId),
		];
		expect(keys.length).toBeGreaterThan(2);
		expect(new Set(keys).size).toBe(keys.length);
		expect(harness.venue.orderIds().length).toBeGreaterThan(1);
		expect(harness.venue.limitSubmissions().every((s) => s.request.postOnly)).toBe(true);
	});

	it("finishes as filled without a fallback when the first order fills", async () => {
		const harness = createHarness();
		const engine = engineFor(harness);
		const seen = recordEvents(engine);
		harness.time.at(1_000, () => harness.venue.fillCompletely("paper-1"));

		await engine.createOrder({ pair: "BTC-USDC", quoteAmount: "100", limitPrice: "40000" });
		await engine.whenIdle();

		expect(seen.finished[0]?.reason).toBe(CampaignEndReason.Filled);
		expect(seen.finished[0]?.fallback).toBe(FallbackDecision.NotRun);
		expect(seen.finished[0]?.remainingNotional.isZero()).toBe(true);
		expect(harness.venue.marketSubmissions()).toEqual([]);
	});
});
