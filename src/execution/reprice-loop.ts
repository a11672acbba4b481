/**
 * Reprice loop — keeps a fresh maker order resting until the budget runs out.
 *
 * Each cycle settles the current order (cancel, then wait for a terminal
 * status), recomputes the remainder from authoritative fills and places a
 * new limit order at the current price. The loop ends on a full fill, the
 * reprice deadline, the iteration cap, a remainder under the limit-order
 * minimums, or abort; the remainder then goes to the fallback worker.
 */

import type { VenueOrderId } from "../shared/identifiers.js";
import { computeLimitPrice, sizeLimitOrder } from "../sizing/order-sizer.js";
import { type CampaignContext, type CampaignRun, settleCurrentOrder } from "./campaign-context.js";
import { RepricePhase } from "./campaign-state.js";
import { finishCampaign } from "./fallback-worker.js";
import { CampaignEndReason, type CampaignOutcome } from "./types.js";

type CycleResult = "placed" | "abandoned" | "below_minimum" | "out_of_time";

/**
 * Passive rest before the first reprice: at least the minimum rest (but
 * never more than one interval), otherwise one interval or the time left.
 */
export function initialRestMs(intervalMs: number, timeLeftMs: number, minRestMs: number): number {
	const floor = Math.min(minRestMs, intervalMs);
	return Math.max(floor, Math.min(intervalMs, Math.max(0, timeLeftMs)));
}

export async function runRepriceLoop(
	ctx: CampaignContext,
	run: CampaignRun,
): Promise<CampaignOutcome> {
	const { state, intent, signal } = run;
	const rest = initialRestMs(
		intent.repriceIntervalMs,
		state.deadlineMs - ctx.clock.now(),
		ctx.config.minInitialRestMs,
	);
	ctx.logger.debug({ restMs: rest }, "Resting first order");
	await ctx.sleep(rest, signal);

	const reason = await repriceUntilDone(ctx, run);
	ctx.logger.info({ reason, ...state.snapshot() }, "Repricing ended");
	return finishCampaign(ctx, run, reason);
}

async function repriceUntilDone(
	ctx: CampaignContext,
	run: CampaignRun,
): Promise<CampaignEndReason> {
	const { state, intent, signal } = run;
	const timeLeft = (): number => state.deadlineMs - ctx.clock.now();

	for (;;) {
		if (signal.aborted) return CampaignEndReason.Aborted;
		if (timeLeft() <= 0) return CampaignEndReason.BudgetExhausted;
		if (state.iteration >= ctx.config.maxRepriceIterations) {
			ctx.logger.warn({ iterations: state.iteration }, "Reprice iteration cap reached");
			return CampaignEndReason.IterationCap;
		}
		const iteration = state.nextIteration();
		const previousOrderId = state.current.orderId;

		state.enter(RepricePhase.Cancelling);
		await settleCurrentOrder(ctx, run);
		if (signal.aborted) return CampaignEndReason.Aborted;
		if (state.isExhausted()) return CampaignEndReason.Filled;
		// a slow cancel can outlast the deadline
		if (timeLeft() <= 0) return CampaignEndReason.BudgetExhausted;

		state.enter(RepricePhase.Repricing);
		const cycle = await repriceOnce(ctx, run, iteration, previousOrderId);
		if (cycle === "below_minimum") return CampaignEndReason.BelowMinimum;
		if (cycle === "out_of_time") return CampaignEndReason.BudgetExhausted;
		if (cycle === "placed") state.enter(RepricePhase.Active);

		await ctx.sleep(Math.min(intent.repriceIntervalMs, Math.max(0, timeLeft())), signal);
	}
}

async function repriceOnce(
	ctx: CampaignContext,
	run: CampaignRun,
	iteration: number,
	previousOrderId: VenueOrderId,
): Promise<CycleResult> {
	const { state, intent } = run;

	const product = await ctx.venue.getProduct(state.productId);
	if (!product.ok) {
		ctx.logger.warn(
			{ iteration, error: product.error.toJSON() },
			"Product refresh failed; abandoning cycle",
		);
		return "abandoned";
	}

	const remaining = state.remainingNotional();
	const price = computeLimitPrice(
		product.value,
		intent.pricing,
		ctx.config.absolutePriceWarnPct,
		ctx.config.precision,
	);
	if (price.overshootPct) {
		ctx.logger.warn(
			{ limitPrice: price.price.toString(), abovePct: price.overshootPct.toString() },
			"Absolute limit price is well above market",
		);
	}

	const size = sizeLimitOrder(product.value, remaining, price.price, ctx.config.precision);
	if (!size.ok) {
		ctx.logger.info(
			{ iteration, remainingNotional: remaining.toString(), error: size.error.toJSON() },
			"Remainder below limit-order minimums",
		);
		return "below_minimum";
	}

	const now = ctx.clock.now();
	const budgetLeft = state.budgetEndMs - now;
	if (budgetLeft <= 0) {
		ctx.logger.info({ iteration }, "Time budget spent before resubmission");
		return "out_of_time";
	}
	const expiresAtMs = now + Math.min(intent.repriceIntervalMs, budgetLeft);
	const placed = await ctx.submitter.submitLimit(
		{
			product: product.value,
			baseSize: size.value.baseSize,
			limitPrice: size.value.limitPrice,
			postOnly: intent.postOnly,
			expiresAtMs,
		},
		run.keys,
	);
	if (!placed.ok) {
		ctx.logger.warn(
			{ iteration, error: placed.error.toJSON() },
			"Resubmission failed; abandoning cycle",
		);
		return "abandoned";
	}

	const { handle } = placed.value;
	state.adopt(handle);
	ctx.emit("orderSubmitted", {
		campaignId: state.campaignId,
		handle,
		timeInForce: placed.value.timeInForce,
		limitPrice: placed.value.limitPrice,
		baseSize: placed.value.baseSize,
		quoteSize: null,
	});
	ctx.emit("orderRepriced", {
		campaignId: state.campaignId,
		iteration,
		previousOrderId,
		handle,
		limitPrice: placed.value.limitPrice,
		remainingNotional: remaining,
	});
	ctx.logger.info(
		{
			iteration,
			orderId: handle.orderId,
			limitPrice: placed.value.limitPrice.toString(),
			remainingNotional: remaining.toString(),
		},
		"Order repriced",
	);
	return "placed";
}
