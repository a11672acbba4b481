/**
 * TradingError hierarchy — structured classification of everything that can
 * go wrong between an order intent and the venue.
 *
 * The category decides what the caller does next: retryable errors may be
 * tried again by transport code, non-retryable ones end the current step,
 * fatal ones stop the process at startup.
 */

export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

interface TradingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & TradingErrorOptions;

/** Base error for the engine and its venue adapters. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

function splitCause(context: ErrorContext): {
	cause: unknown;
	rest: Record<string, unknown>;
} {
	const { cause, ...rest } = context;
	return { cause, rest };
}

// ── Transport errors ─────────────────────────────────────────────────

export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, rest);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** HTTP 429 from the venue; `retryAfterMs` comes from the response when present. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;
	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), retryAfterMs: this.retryAfterMs };
	}
}

export class AuthError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, rest);
		this.name = "AuthError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Domain errors ────────────────────────────────────────────────────

/** Product lookup failed or returned a price the engine cannot size against. */
export class MarketDataError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "MARKET_DATA_ERROR", ErrorCategory.NonRetryable, rest);
		this.name = "MarketDataError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Quantized size or notional falls under the venue's minimums. */
export class BelowMinimumError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(
			message,
			"BELOW_MINIMUM",
			ErrorCategory.NonRetryable,
			rest,
			"Raise the quote amount or pick a pair with lower minimums",
		);
		this.name = "BelowMinimumError";
		if (cause !== undefined) this.cause = cause;
	}
}

/**
 * The venue refused an order. `venueCode` carries the venue's own failure
 * reason (e.g. INVALID_LIMIT_PRICE_POST_ONLY) when it reported one.
 */
export class OrderRejectedError extends TradingError {
	readonly venueCode: string | undefined;
	constructor(message: string, context: ErrorContext & { venueCode?: string } = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "ORDER_REJECTED", ErrorCategory.NonRetryable, rest);
		this.name = "OrderRejectedError";
		this.venueCode = context.venueCode;
		if (cause !== undefined) this.cause = cause;
	}
}

export class OrderNotFoundError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "ORDER_NOT_FOUND", ErrorCategory.NonRetryable, rest);
		this.name = "OrderNotFoundError";
		if (cause !== undefined) this.cause = cause;
	}
}

export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification ───────────────────────────────────────────────────

function readStatus(value: unknown): number | undefined {
	if (!(value instanceof TradingError)) return undefined;
	const status = value.context["status"];
	return typeof status === "number" && status >= 400 ? status : undefined;
}

function errnoCode(error: Error): string | undefined {
	const code: unknown = (error as NodeJS.ErrnoException).code;
	return typeof code === "string" ? code : undefined;
}

/** Map any thrown value onto the TradingError taxonomy. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (!(error instanceof Error)) {
		return new SystemError(String(error), { cause: error });
	}

	const msg = error.message.toLowerCase();
	const code = errnoCode(error);
	const status = readStatus(error.cause);

	if (status === 429 || code === "429") {
		return new RateLimitError(error.message, 1000, { cause: error });
	}
	if (status === 401 || status === 403) {
		return new AuthError(error.message, { cause: error });
	}
	if (error.name === "TimeoutError" || error.name === "AbortError" || code === "ETIMEDOUT") {
		return new TimeoutError(error.message, { cause: error });
	}
	if (code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "ECONNRESET") {
		return new NetworkError(error.message, { cause: error });
	}
	if (msg.includes("timeout") || msg.includes("timed out")) {
		return new TimeoutError(error.message, { cause: error });
	}
	if (msg.includes("econnrefused") || msg.includes("enotfound") || msg.includes("fetch failed")) {
		return new NetworkError(error.message, { cause: error });
	}
	if (msg.includes("rate limit")) {
		return new RateLimitError(error.message, 1000, { cause: error });
	}
	return new SystemError(error.message, { cause: error });
}

/** Classify an HTTP error status from the venue. */
export function errorFromStatus(
	status: number,
	message: string,
	context: Record<string, unknown> = {},
	retryAfterMs = 1000,
): TradingError {
	const ctx = { ...context, status };
	if (status === 429) return new RateLimitError(message, retryAfterMs, ctx);
	if (status === 401 || status === 403) return new AuthError(message, ctx);
	if (status === 404) return new OrderNotFoundError(message, ctx);
	if (status >= 500) return new NetworkError(message, ctx);
	return new SystemError(message, ctx);
}
