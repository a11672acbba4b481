/**
 * Fallback-to-market worker and campaign wrap-up.
 *
 * Once limit orders stop working, the remainder is bought with one market
 * order if it still clears the venue's minimum notional after truncation.
 * A remainder under the minimum is accepted, not retried.
 */

import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { VenueOrderId } from "../shared/identifiers.js";
import { sizeMarketOrder } from "../sizing/order-sizer.js";
import {
	type CampaignContext,
	type CampaignRun,
	cancelQuietly,
	settleCurrentOrder,
} from "./campaign-context.js";
import { RepricePhase } from "./campaign-state.js";
import { CampaignEndReason, type CampaignOutcome, FallbackDecision } from "./types.js";

export interface FallbackResult {
	readonly decision: FallbackDecision;
	readonly orderId: VenueOrderId | null;
	readonly quoteSize: Decimal | null;
}

const NOT_RUN: FallbackResult = {
	decision: FallbackDecision.NotRun,
	orderId: null,
	quoteSize: null,
};

/**
 * Settle the current order, then buy what is left at market.
 * Returns `not_run` when nothing is left or the run was aborted.
 */
export async function runFallback(ctx: CampaignContext, run: CampaignRun): Promise<FallbackResult> {
	const { state } = run;
	await settleCurrentOrder(ctx, run);

	const remaining = state.remainingNotional();
	if (!remaining.isPositive() || run.signal.aborted) return NOT_RUN;

	const skip = (error: TradingError): FallbackResult => {
		ctx.logger.warn(
			{ remainingNotional: remaining.toString(), error: error.toJSON() },
			"Fallback market order skipped",
		);
		ctx.emit("fallbackSkipped", {
			campaignId: state.campaignId,
			remainingNotional: remaining,
			error,
		});
		return { decision: FallbackDecision.Skipped, orderId: null, quoteSize: null };
	};

	const product = await ctx.venue.getProduct(state.productId);
	if (!product.ok) {
		ctx.logger.error({ error: product.error.toJSON() }, "Product lookup failed before fallback");
		return skip(product.error);
	}

	const quoteSize = sizeMarketOrder(product.value, remaining, ctx.config.precision);
	if (!quoteSize.ok) return skip(quoteSize.error);

	const placed = await ctx.submitter.submitMarket(state.productId, quoteSize.value, run.keys);
	if (!placed.ok) return skip(placed.error);

	ctx.emit("orderSubmitted", {
		campaignId: state.campaignId,
		handle: placed.value,
		timeInForce: null,
		limitPrice: null,
		baseSize: null,
		quoteSize: quoteSize.value,
	});
	ctx.emit("fallbackPlaced", {
		campaignId: state.campaignId,
		handle: placed.value,
		quoteSize: quoteSize.value,
	});
	return {
		decision: FallbackDecision.Placed,
		orderId: placed.value.orderId,
		quoteSize: quoteSize.value,
	};
}

/**
 * Close out a campaign after its limit phase ended with `reason`: cancel on
 * abort, otherwise run the fallback.
 */
export async function finishCampaign(
	ctx: CampaignContext,
	run: CampaignRun,
	reason: CampaignEndReason,
): Promise<CampaignOutcome> {
	const { state } = run;
	state.enter(RepricePhase.Done);

	if (reason === CampaignEndReason.Aborted || run.signal.aborted) {
		await cancelQuietly(ctx, state.current.orderId);
		return outcome(run, CampaignEndReason.Aborted, NOT_RUN);
	}
	if (reason === CampaignEndReason.Filled) {
		return outcome(run, reason, NOT_RUN);
	}

	const fallback = await runFallback(ctx, run);
	if (fallback.decision === FallbackDecision.NotRun) {
		const finalReason = run.signal.aborted ? CampaignEndReason.Aborted : CampaignEndReason.Filled;
		return outcome(run, finalReason, fallback);
	}
	return outcome(run, reason, fallback);
}

/** Plain fallback: let the first order rest for the whole budget, then settle it. */
export async function runPlainFallback(
	ctx: CampaignContext,
	run: CampaignRun,
): Promise<CampaignOutcome> {
	await ctx.sleep(Math.max(0, run.state.budgetEndMs - ctx.clock.now()), run.signal);
	if (run.signal.aborted) {
		return finishCampaign(ctx, run, CampaignEndReason.Aborted);
	}
	return finishCampaign(ctx, run, CampaignEndReason.BudgetExhausted);
}

function outcome(
	run: CampaignRun,
	reason: CampaignEndReason,
	fallback: FallbackResult,
): CampaignOutcome {
	const { state } = run;
	return {
		campaignId: state.campaignId,
		productId: state.productId,
		reason,
		fallback: fallback.decision,
		originalNotional: state.originalNotional,
		remainingNotional: state.remainingNotional(),
		orderIds: state.orderIds(),
		fallbackOrderId: fallback.orderId,
		fallbackQuoteSize: fallback.quoteSize,
	};
}
