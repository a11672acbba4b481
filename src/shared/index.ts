export {
	type ProductId,
	type ClientOrderId,
	type VenueOrderId,
	productId,
	clientOrderId,
	venueOrderId,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
} from "./result.js";

export {
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
} from "./errors.js";

export { Decimal } from "./decimal.js";
export {
	type Clock,
	type Sleeper,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	fakeSleeper,
} from "./time.js";
export { type AppConfig, DEFAULT_APP_CONFIG, configFromEnv } from "./config.js";
