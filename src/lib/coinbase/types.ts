/**
 * Coinbase Advanced Trade wire-format types — adapter-internal mapping to
 * the REST v3 brokerage API.
 *
 * Request bodies are plain interfaces; response bodies are zod schemas,
 * parsed loosely so unknown fields pass through. Domain code should never
 * use these directly.
 */

import type { Credentials } from "../../auth/credentials.js";
import type { Clock } from "../../shared/time.js";
import type { TokenBucketRateLimiter } from "../http/rate-limiter.js";
import { z } from "../validation/index.js";

export const COINBASE_API_HOST = "api.coinbase.com";
export const BROKERAGE_PATH = "/api/v3/brokerage";

/** Subset of `fetch` the client calls; tests pass a stand-in. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface CoinbaseClientConfig {
	readonly credentials: Credentials;
	/** Default "api.coinbase.com". Also the host signed into each JWT. */
	readonly host?: string;
	readonly fetch?: FetchFn;
	/** Per-request timeout. Default 10 s. */
	readonly timeoutMs?: number;
	readonly rateLimiter?: TokenBucketRateLimiter;
	readonly clock?: Clock;
	readonly nonce?: () => string;
}

// ── Requests ────────────────────────────────────────────────────────

export interface LimitGtcConfiguration {
	readonly limit_limit_gtc: {
		readonly base_size: string;
		readonly limit_price: string;
		readonly post_only: boolean;
	};
}

export interface LimitGtdConfiguration {
	readonly limit_limit_gtd: {
		readonly base_size: string;
		readonly limit_price: string;
		/** RFC 3339 timestamp */
		readonly end_time: string;
		readonly post_only: boolean;
	};
}

export interface MarketIocConfiguration {
	readonly market_market_ioc: {
		readonly quote_size: string;
	};
}

export type OrderConfiguration =
	| LimitGtcConfiguration
	| LimitGtdConfiguration
	| MarketIocConfiguration;

export interface CreateOrderBody {
	readonly client_order_id: string;
	readonly product_id: string;
	readonly side: "BUY" | "SELL";
	readonly order_configuration: OrderConfiguration;
}

// ── Responses ───────────────────────────────────────────────────────

export const createOrderResponseSchema = z
	.object({
		success: z.boolean(),
		success_response: z
			.object({
				order_id: z.string(),
				product_id: z.string().optional(),
				client_order_id: z.string().optional(),
			})
			.passthrough()
			.optional(),
		error_response: z
			.object({
				error: z.string().optional(),
				message: z.string().optional(),
				error_details: z.string().optional(),
				preview_failure_reason: z.string().optional(),
				new_order_failure_reason: z.string().optional(),
			})
			.passthrough()
			.optional(),
		failure_reason: z.string().optional(),
	})
	.passthrough();

export type CreateOrderResponse = z.infer<typeof createOrderResponseSchema>;

export const batchCancelResponseSchema = z.object({
	results: z.array(
		z
			.object({
				success: z.boolean(),
				failure_reason: z.string().optional(),
				order_id: z.string(),
			})
			.passthrough(),
	),
});

export type BatchCancelResult = z.infer<typeof batchCancelResponseSchema>["results"][number];

export const accountsPageSchema = z.object({
	accounts: z.array(
		z
			.object({
				currency: z.string(),
				available_balance: z.object({ value: z.string(), currency: z.string() }),
			})
			.passthrough(),
	),
	has_next: z.boolean().optional(),
	cursor: z.string().optional(),
});

export type CoinbaseAccount = z.infer<typeof accountsPageSchema>["accounts"][number];

/** Error body on non-2xx responses. */
export const errorBodySchema = z
	.object({
		error: z.string().optional(),
		message: z.string().optional(),
		error_details: z.string().optional(),
	})
	.passthrough();
