import { describe, expect, it } from "vitest";
import {
	BTC_USDC,
	type TestHarness,
	createHarness,
	intentOf,
	startCampaign,
} from "./execution-test-helpers.js";
import { runPlainFallback } from "./fallback-worker.js";
import {
	CampaignEndReason,
	FallbackDecision,
	type FallbackPlacedEvent,
	type FallbackSkippedEvent,
} from "./types.js";

const FIRST = { baseSize: "0.0025", limitPrice: "40000" };
const BUDGET_MS = 300_000;

async function plainCampaign(harness: TestHarness) {
	const intent = intentOf({ limitPrice: "40000", orderTimeoutMs: BUDGET_MS });
	return startCampaign(harness, intent, FIRST);
}

describe("runPlainFallback", () => {
	it("buys the unfilled remainder at market when the budget ends", async () => {
		const harness = createHarness();
		const { run, first } = await plainCampaign(harness);
		const placed: FallbackPlacedEvent[] = [];
		harness.events.on("fallbackPlaced", (e) => placed.push(e));
		harness.time.at(100_000, () => harness.venue.fill(first.orderId, "75"));

		const outcome = await runPlainFallback(harness.ctx, run);

		expect(harness.time.elapsed()).toBe(BUDGET_MS);
		expect(outcome.reason).toBe(CampaignEndReason.BudgetExhausted);
		expect(outcome.fallback).toBe(FallbackDecision.Placed);
		expect(outcome.remainingNotional.toString()).toBe("25");
		expect(outcome.fallbackOrderId).toBe("paper-2");
		const [market] = harness.venue.marketSubmissions();
		expect(market?.request.quoteSize.toString()).toBe("25");
		expect(placed.map((e) => e.quoteSize.toString())).toEqual(["25"]);
		expect(harness.venue.calls()).toContainEqual({ type: "cancel", orderId: first.orderId });
	});

	it("truncates the remainder to the quote increment", async () => {
		const harness = createHarness();
		const { run, first } = await plainCampaign(harness);
		// 0.00083332 BTC at 40000 fills 33.3328
		harness.time.at(1_000, () => harness.venue.fill(first.orderId, "33.333"));

		const outcome = await runPlainFallback(harness.ctx, run);

		expect(outcome.remainingNotional.toString()).toBe("66.6672");
		expect(outcome.fallbackQuoteSize?.toString()).toBe("66.66");
	});

	it("skips a remainder below the minimum notional", async () => {
		const harness = createHarness({ product: { ...BTC_USDC, quoteMinSize: "30" } });
		const { run, first } = await plainCampaign(harness);
		const skipped: FallbackSkippedEvent[] = [];
		harness.events.on("fallbackSkipped", (e) => skipped.push(e));
		harness.time.at(1_000, () => harness.venue.fill(first.orderId, "75"));

		const outcome = await runPlainFallback(harness.ctx, run);

		expect(outcome.fallback).toBe(FallbackDecision.Skipped);
		expect(outcome.fallbackOrderId).toBeNull();
		expect(harness.venue.marketSubmissions()).toHaveLength(0);
		expect(skipped).toHaveLength(1);
		expect(skipped[0]?.remainingNotional.toString()).toBe("25");
		expect(skipped[0]?.error?.code).toBe("BELOW_MINIMUM");
	});

	it("skips when the product lookup fails", async () => {
		const harness = createHarness();
		const { run } = await plainCampaign(harness);
		harness.venue.failNextProductLookups(1);

		const outcome = await runPlainFallback(harness.ctx, run);

		expect(outcome.fallback).toBe(FallbackDecision.Skipped);
		expect(harness.venue.marketSubmissions()).toHaveLength(0);
	});

	it("skips when the venue rejects the market order", async () => {
		const harness = createHarness();
		const { run } = await plainCampaign(harness);
		harness.venue.rejectNextMarket("INSUFFICIENT_FUND");

		const outcome = await runPlainFallback(harness.ctx, run);

		expect(outcome.fallback).toBe(FallbackDecision.Skipped);
		expect(harness.venue.marketSubmissions()).toEqual([
			expect.objectContaining({ accepted: false }),
		]);
	});

	it("reports filled and places nothing when the order filled in time", async () => {
		const harness = createHarness();
		const { run, first } = await plainCampaign(harness);
		harness.time.at(100_000, () => harness.venue.fillCompletely(first.orderId));

		const outcome = await runPlainFallback(harness.ctx, run);

		expect(outcome.reason).toBe(CampaignEndReason.Filled);
		expect(outcome.fallback).toBe(FallbackDecision.NotRun);
		expect(outcome.remainingNotional.isZero()).toBe(true);
		expect(harness.venue.marketSubmissions()).toHaveLength(0);
	});

	it("still falls back after a failed cancel once the wait is capped", async () => {
		const harness = createHarness();
		const { run } = await plainCampaign(harness);
		harness.venue.failNextCancels(1);

		const outcome = await runPlainFallback(harness.ctx, run);

		expect(harness.time.elapsed()).toBe(BUDGET_MS + 12_000);
		expect(outcome.fallback).toBe(FallbackDecision.Placed);
	});

	it("cancels and exits without a market order when aborted", async () => {
		const harness = createHarness();
		const { run, first, abort } = await plainCampaign(harness);
		harness.time.at(BUDGET_MS, abort);

		const outcome = await runPlainFallback(harness.ctx, run);

		expect(outcome.reason).toBe(CampaignEndReason.Aborted);
		expect(outcome.fallback).toBe(FallbackDecision.NotRun);
		expect(harness.venue.marketSubmissions()).toHaveLength(0);
		expect(harness.venue.calls()).toContainEqual({ type: "cancel", orderId: first.orderId });
	});
});
