// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type ProductId,
	type ClientOrderId,
	type VenueOrderId,
	productId,
	clientOrderId,
	venueOrderId,
	idToString,
	type Result,
	ok,
	err,
	Decimal,
	type Clock,
	type Sleeper,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	fakeSleeper,
	type AppConfig,
	DEFAULT_APP_CONFIG,
	configFromEnv,
	ErrorCategory,
	TradingError,
	NetworkError,
	TimeoutError,
	RateLimitError,
	AuthError,
	MarketDataError,
	BelowMinimumError,
	OrderRejectedError,
	OrderNotFoundError,
	ConfigError,
	SystemError,
	classifyError,
	errorFromStatus,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { type EventMap, TypedEmitter } from "./lib/events/index.js";
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";
export {
	COINBASE_PRIVATE_LIMIT,
	type RateLimiterConfig,
	TokenBucketRateLimiter,
} from "./lib/http/index.js";
export {
	COINBASE_API_HOST,
	CoinbaseClient,
	type CoinbaseClientConfig,
	type FetchFn,
} from "./lib/coinbase/index.js";

// ── Auth ─────────────────────────────────────────────────────────────
export { type CdpKey, Credentials, createCredentials } from "./auth/index.js";

// ── Venue ────────────────────────────────────────────────────────────
export {
	type Balance,
	type LimitOrderRequest,
	type MarketOrderRequest,
	type OrderHandle,
	type OrderState,
	type ProductInfo,
	type Venue,
	DEFAULT_TERMINAL_STATUSES,
	OrderSide,
	OrderStatus,
	POST_ONLY_CROSS_REASON,
	TimeInForce,
	CoinbaseVenue,
	type PaperCall,
	type PaperProduct,
	type PaperVenueConfig,
	PaperVenue,
} from "./venue/index.js";

// ── Sizing ───────────────────────────────────────────────────────────
export {
	type LimitOrderSize,
	type LimitPrice,
	type LimitPricing,
	type Precision,
	DEFAULT_PRECISION,
	priceTick,
	quantize,
	quantizeBase,
	quantizePrice,
	quantizeQuote,
	computeLimitPrice,
	sizeLimitOrder,
	sizeMarketOrder,
} from "./sizing/index.js";

// ── Orders ───────────────────────────────────────────────────────────
export {
	type CreateOrderResult,
	type OrderIntent,
	type OrderIntentInput,
	OrderType,
	DEFAULT_LIMIT_PRICE_PCT,
	DEFAULT_ORDER_TIMEOUT_MS,
	parseOrderIntent,
	type ClientOrderIdFactory,
	ClientOrderIdIssuer,
	randomClientOrderId,
} from "./order/index.js";

// ── Execution ────────────────────────────────────────────────────────
export {
	ExecutionEngine,
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
	CampaignState,
	RepricePhase,
	type CampaignSnapshot,
} from "./execution/index.js";

// ── Scheduling ───────────────────────────────────────────────────────
export {
	type Cadence,
	Frequency,
	type JobDescription,
	type ScheduleTask,
	type TimeOfDay,
	type Weekday,
	loadScheduleFile,
	parseSchedule,
	nextRunAt,
	type JobRunner,
	Scheduler,
	type SchedulerDeps,
} from "./schedule/index.js";
