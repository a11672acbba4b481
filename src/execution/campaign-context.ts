/**
 * Collaborators and per-run inputs shared by the background workers.
 */

import type { Logger } from "../lib/logger/index.js";
import type { ClientOrderIdIssuer } from "../order/client-order-ids.js";
import type { OrderIntent } from "../order/types.js";
import type { VenueOrderId } from "../shared/identifiers.js";
import type { Clock, Sleeper } from "../shared/time.js";
import type { Venue } from "../venue/types.js";
import type { CampaignState } from "./campaign-state.js";
import type { OrderSubmitter } from "./order-submitter.js";
import type { StatusPoller } from "./status-poller.js";
import type { EmitFn, EngineConfig } from "./types.js";

export interface CampaignContext {
	readonly venue: Venue;
	/** Bound to the campaign id and product. */
	readonly logger: Logger;
	readonly clock: Clock;
	readonly sleep: Sleeper;
	readonly config: EngineConfig;
	readonly submitter: OrderSubmitter;
	readonly poller: StatusPoller;
	readonly emit: EmitFn;
}

export interface CampaignRun {
	readonly state: CampaignState;
	readonly intent: OrderIntent;
	readonly keys: ClientOrderIdIssuer;
	readonly signal: AbortSignal;
}

/** Best effort: a failed cancel is logged and the caller carries on. */
export async function cancelQuietly(ctx: CampaignContext, orderId: VenueOrderId): Promise<void> {
	const cancelled = await ctx.venue.cancelOrder(orderId);
	if (!cancelled.ok) {
		ctx.logger.warn({ orderId, error: cancelled.error.toJSON() }, "Cancel failed");
	}
}

/**
 * Bring the current order to rest: read it, cancel it if it is still
 * working, wait for a terminal status and record the fill.
 */
export async function settleCurrentOrder(ctx: CampaignContext, run: CampaignRun): Promise<void> {
	const orderId = run.state.current.orderId;
	const read = await ctx.poller.read(orderId);
	if (read.ok) {
		run.state.observe(read.value);
		if (ctx.poller.isTerminal(read.value.status)) return;
	}

	await cancelQuietly(ctx, orderId);
	const wait = await ctx.poller.waitForTerminal(orderId, run.signal);
	if (wait.kind !== "unread") {
		run.state.observe(wait.state);
	}
}
