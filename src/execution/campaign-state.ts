/**
 * CampaignState — the mutable context one background task owns.
 *
 * Remaining notional is never accumulated locally: each order's filled
 * notional is overwritten with the latest authoritative read and the
 * remainder is recomputed from the sum.
 */

import { Decimal } from "../shared/decimal.js";
import {
	type ClientOrderId,
	type ProductId,
	type VenueOrderId,
	idToString,
} from "../shared/identifiers.js";
import type { OrderHandle, OrderState } from "../venue/types.js";

export const RepricePhase = {
	Active: "active",
	Cancelling: "cancelling",
	Repricing: "repricing",
	Done: "done",
} as const;

export type RepricePhase = (typeof RepricePhase)[keyof typeof RepricePhase];

export interface CampaignSnapshot {
	readonly campaignId: ClientOrderId;
	readonly phase: RepricePhase;
	readonly iteration: number;
	readonly originalNotional: string;
	readonly filledNotional: string;
	readonly remainingNotional: string;
	readonly currentOrderId: VenueOrderId;
}

export class CampaignState {
	readonly campaignId: ClientOrderId;
	readonly productId: ProductId;
	readonly originalNotional: Decimal;
	/** End of the reprice budget. */
	readonly deadlineMs: number;
	/** End of the overall time budget; GTD expiries never pass it. */
	readonly budgetEndMs: number;

	private readonly fills = new Map<string, Decimal>();
	private readonly handles: OrderHandle[] = [];
	private currentHandle: OrderHandle;
	private currentPhase: RepricePhase = RepricePhase.Active;
	private iterations = 0;

	constructor(params: {
		readonly first: OrderHandle;
		readonly originalNotional: Decimal;
		readonly deadlineMs: number;
		readonly budgetEndMs: number;
	}) {
		this.campaignId = params.first.clientOrderId;
		this.productId = params.first.productId;
		this.originalNotional = params.originalNotional;
		this.deadlineMs = params.deadlineMs;
		this.budgetEndMs = params.budgetEndMs;
		this.currentHandle = params.first;
		this.track(params.first);
	}

	get current(): OrderHandle {
		return this.currentHandle;
	}

	get phase(): RepricePhase {
		return this.currentPhase;
	}

	get iteration(): number {
		return this.iterations;
	}

	/** Supersede the current order with a newly placed one. */
	adopt(handle: OrderHandle): void {
		this.currentHandle = handle;
		this.track(handle);
	}

	enter(phase: RepricePhase): void {
		this.currentPhase = phase;
	}

	nextIteration(): number {
		this.iterations++;
		return this.iterations;
	}

	/** Record an authoritative read. Reads for unknown orders are ignored. */
	observe(state: OrderState): void {
		const key = idToString(state.orderId);
		if (!this.fills.has(key)) return;
		this.fills.set(key, state.filledNotional);
	}

	filledNotional(): Decimal {
		return Decimal.sum(this.fills.values());
	}

	remainingNotional(): Decimal {
		return this.originalNotional.sub(this.filledNotional());
	}

	isExhausted(): boolean {
		return !this.remainingNotional().isPositive();
	}

	orderIds(): VenueOrderId[] {
		return this.handles.map((h) => h.orderId);
	}

	snapshot(): CampaignSnapshot {
		return {
			campaignId: this.campaignId,
			phase: this.currentPhase,
			iteration: this.iterations,
			originalNotional: this.originalNotional.toString(),
			filledNotional: this.filledNotional().toString(),
			remainingNotional: this.remainingNotional().toString(),
			currentOrderId: this.currentHandle.orderId,
		};
	}

	private track(handle: OrderHandle): void {
		const key = idToString(handle.orderId);
		if (this.fills.has(key)) return;
		this.handles.push(handle);
		this.fills.set(key, Decimal.zero());
	}
}
