export { ExecutionEngine } from "./execution-engine.js";
export {
	type CampaignOutcome,
	CampaignEndReason,
	type CampaignFailedEvent,
	type CampaignStartedEvent,
	DEFAULT_ENGINE_CONFIG,
	type EngineConfig,
	type ExecutionEngineDeps,
	type ExecutionEvents,
	FallbackDecision,
	type FallbackPlacedEvent,
	type FallbackSkippedEvent,
	type OrderRepricedEvent,
	type OrderSubmittedEvent,
} from "./types.js";
export { OrderSubmitter, isPostOnlyCross } from "./order-submitter.js";
export type { LimitSubmission, SubmittedLimitOrder } from "./order-submitter.js";
export { StatusPoller } from "./status-poller.js";
export type { TerminalWait } from "./status-poller.js";
export { CampaignState, RepricePhase } from "./campaign-state.js";
export type { CampaignSnapshot } from "./campaign-state.js";
export { initialRestMs } from "./reprice-loop.js";
