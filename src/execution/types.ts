/**
 * Execution bounded context — engine configuration, campaign outcomes and
 * events.
 */

import type { Logger } from "../lib/logger/index.js";
import type { ClientOrderIdFactory } from "../order/client-order-ids.js";
import { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { ClientOrderId, ProductId, VenueOrderId } from "../shared/identifiers.js";
import type { Clock, Sleeper } from "../shared/time.js";
import { DEFAULT_PRECISION } from "../sizing/quantize.js";
import type { Precision } from "../sizing/types.js";
import {
	DEFAULT_TERMINAL_STATUSES,
	type OrderHandle,
	type OrderStatus,
	type TimeInForce,
	type Venue,
} from "../venue/types.js";

// ── Configuration ───────────────────────────────────────────────────

/** Engine-wide constants, fixed at construction. */
export interface EngineConfig {
	/** Statuses after which an order's fills are final. */
	readonly terminalStatuses: ReadonlySet<OrderStatus>;
	/** Delay between status reads while waiting for a cancel to settle. */
	readonly statusPollIntervalMs: number;
	/** Longest wait for a terminal status before using the last read. */
	readonly terminalWaitCapMs: number;
	/** Shortest passive rest for the first order before the first reprice. */
	readonly minInitialRestMs: number;
	/** Safety bound on reprice cycles per campaign. */
	readonly maxRepriceIterations: number;
	/** Absolute limit prices this far above market (in percent) are logged. */
	readonly absolutePriceWarnPct: Decimal;
	/** Places used when the venue publishes no increment. */
	readonly precision: Precision;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	terminalStatuses: DEFAULT_TERMINAL_STATUSES,
	statusPollIntervalMs: 500,
	terminalWaitCapMs: 12_000,
	minInitialRestMs: 30_000,
	maxRepriceIterations: 500,
	absolutePriceWarnPct: Decimal.from(5),
	precision: DEFAULT_PRECISION,
};

export interface ExecutionEngineDeps {
	readonly venue: Venue;
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly sleep?: Sleeper;
	readonly newClientOrderId?: ClientOrderIdFactory;
	readonly config?: Partial<EngineConfig>;
}

// ── Outcomes ────────────────────────────────────────────────────────

/** Why a campaign stopped working its limit orders. */
export const CampaignEndReason = {
	Filled: "filled",
	BudgetExhausted: "budget_exhausted",
	IterationCap: "iteration_cap",
	BelowMinimum: "below_minimum",
	Aborted: "aborted",
} as const;

export type CampaignEndReason = (typeof CampaignEndReason)[keyof typeof CampaignEndReason];

/** What happened to the unfilled remainder afterwards. */
export const FallbackDecision = {
	Placed: "placed",
	Skipped: "skipped",
	NotRun: "not_run",
} as const;

export type FallbackDecision = (typeof FallbackDecision)[keyof typeof FallbackDecision];

export interface CampaignOutcome {
	readonly campaignId: ClientOrderId;
	readonly productId: ProductId;
	readonly reason: CampaignEndReason;
	readonly fallback: FallbackDecision;
	readonly originalNotional: Decimal;
	/** Unfilled notional before any market fallback. */
	readonly remainingNotional: Decimal;
	/** Every limit order issued, in order. */
	readonly orderIds: readonly VenueOrderId[];
	readonly fallbackOrderId: VenueOrderId | null;
	readonly fallbackQuoteSize: Decimal | null;
}

// ── Events ──────────────────────────────────────────────────────────

export interface OrderSubmittedEvent {
	readonly campaignId: ClientOrderId;
	readonly handle: OrderHandle;
	/** Null for market orders. */
	readonly timeInForce: TimeInForce | null;
	readonly limitPrice: Decimal | null;
	readonly baseSize: Decimal | null;
	readonly quoteSize: Decimal | null;
}

export interface CampaignStartedEvent {
	readonly campaignId: ClientOrderId;
	readonly productId: ProductId;
	readonly mode: "reprice" | "fallback";
	readonly originalNotional: Decimal;
	readonly deadlineMs: number;
}

export interface OrderRepricedEvent {
	readonly campaignId: ClientOrderId;
	readonly iteration: number;
	readonly previousOrderId: VenueOrderId | null;
	readonly handle: OrderHandle;
	readonly limitPrice: Decimal;
	readonly remainingNotional: Decimal;
}

export interface FallbackPlacedEvent {
	readonly campaignId: ClientOrderId;
	readonly handle: OrderHandle;
	readonly quoteSize: Decimal;
}

export interface FallbackSkippedEvent {
	readonly campaignId: ClientOrderId;
	readonly remainingNotional: Decimal;
	readonly error: TradingError | null;
}

export interface CampaignFailedEvent {
	readonly campaignId: ClientOrderId;
	readonly error: TradingError;
}

/** Declared with `type` so it satisfies EventMap. */
export type ExecutionEvents = {
	orderSubmitted: (event: OrderSubmittedEvent) => void;
	campaignStarted: (event: CampaignStartedEvent) => void;
	orderRepriced: (event: OrderRepricedEvent) => void;
	fallbackPlaced: (event: FallbackPlacedEvent) => void;
	fallbackSkipped: (event: FallbackSkippedEvent) => void;
	campaignFinished: (outcome: CampaignOutcome) => void;
	campaignFailed: (event: CampaignFailedEvent) => void;
};

/** Emits without letting a listener's exception reach the caller. */
export type EmitFn = <K extends keyof ExecutionEvents>(
	event: K,
	...args: Parameters<ExecutionEvents[K]>
) => void;
