/**
 * CoinbaseClient — signed REST calls to Advanced Trade, behind Result
 * error handling.
 *
 * Every request takes a rate-limit token, carries a fresh ES256 JWT and
 * aborts after the configured timeout. Non-2xx responses are classified
 * by status; order refusals become OrderRejectedError with the venue's
 * failure reason.
 */

import type { Credentials } from "../../auth/credentials.js";
import { buildRequestJwt, createNonce } from "../../auth/jwt.js";
import {
	OrderRejectedError,
	type TradingError,
	classifyError,
	errorFromStatus,
} from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type { Clock } from "../../shared/time.js";
import { SystemClock } from "../../shared/time.js";
import { COINBASE_PRIVATE_LIMIT, TokenBucketRateLimiter } from "../http/rate-limiter.js";
import { validate, type z } from "../validation/index.js";
import {
	BROKERAGE_PATH,
	type BatchCancelResult,
	COINBASE_API_HOST,
	type CoinbaseAccount,
	type CoinbaseClientConfig,
	type CreateOrderBody,
	type FetchFn,
	accountsPageSchema,
	batchCancelResponseSchema,
	createOrderResponseSchema,
	errorBodySchema,
} from "./types.js";

type HttpMethod = "GET" | "POST";

const DEFAULT_TIMEOUT_MS = 10_000;
const ACCOUNTS_PAGE_LIMIT = 250;
const MAX_ACCOUNT_PAGES = 20;

interface RequestOptions {
	readonly body?: unknown;
	readonly query?: URLSearchParams;
}

export class CoinbaseClient {
	private readonly credentials: Credentials;
	private readonly host: string;
	private readonly fetchFn: FetchFn;
	private readonly timeoutMs: number;
	private readonly rateLimiter: TokenBucketRateLimiter;
	private readonly clock: Clock;
	private readonly nonce: () => string;

	constructor(config: CoinbaseClientConfig) {
		this.credentials = config.credentials;
		this.host = config.host ?? COINBASE_API_HOST;
		this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
		this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.clock = config.clock ?? SystemClock;
		this.rateLimiter =
			config.rateLimiter ??
			new TokenBucketRateLimiter({ ...COINBASE_PRIVATE_LIMIT, clock: this.clock });
		this.nonce = config.nonce ?? createNonce;
	}

	/** Raw product payload; callers normalize it. */
	async getProduct(productId: string): Promise<Result<unknown, TradingError>> {
		return this.request("GET", `/products/${encodeURIComponent(productId)}`);
	}

	/** Raw historical order payload; callers normalize it. */
	async getOrder(orderId: string): Promise<Result<unknown, TradingError>> {
		return this.request("GET", `/orders/historical/${encodeURIComponent(orderId)}`);
	}

	/**
	 * Places an order.
	 * @returns the venue's order id, or OrderRejectedError carrying the failure reason
	 */
	async createOrder(body: CreateOrderBody): Promise<Result<string, TradingError>> {
		const response = await this.request("POST", "/orders", { body });
		if (!response.ok) {
			return err(asRejection(response.error, body.client_order_id));
		}

		const parsed = validate(createOrderResponseSchema, response.value, "Unreadable order response");
		if (!parsed.ok) return parsed;

		const { success, success_response, error_response, failure_reason } = parsed.value;
		if (success && success_response) {
			return ok(success_response.order_id);
		}
		const venueCode =
			error_response?.error ??
			error_response?.new_order_failure_reason ??
			error_response?.preview_failure_reason ??
			failure_reason ??
			"UNKNOWN_FAILURE_REASON";
		const detail = error_response?.error_details ?? error_response?.message ?? venueCode;
		return err(
			new OrderRejectedError(`Order rejected: ${detail}`, {
				venueCode,
				clientOrderId: body.client_order_id,
			}),
		);
	}

	async cancelOrders(
		orderIds: readonly string[],
	): Promise<Result<readonly BatchCancelResult[], TradingError>> {
		const response = await this.request("POST", "/orders/batch_cancel", {
			body: { order_ids: orderIds },
		});
		if (!response.ok) return response;
		const parsed = validate(
			batchCancelResponseSchema,
			response.value,
			"Unreadable cancel response",
		);
		return parsed.ok ? ok(parsed.value.results) : parsed;
	}

	/** Follows the cursor until the last page. */
	async listAccounts(): Promise<Result<readonly CoinbaseAccount[], TradingError>> {
		const accounts: CoinbaseAccount[] = [];
		let cursor: string | undefined;
		for (let page = 0; page < MAX_ACCOUNT_PAGES; page++) {
			const query = new URLSearchParams({ limit: String(ACCOUNTS_PAGE_LIMIT) });
			if (cursor) query.set("cursor", cursor);

			const response = await this.request("GET", "/accounts", { query });
			if (!response.ok) return response;
			const parsed = validate(accountsPageSchema, response.value, "Unreadable accounts page");
			if (!parsed.ok) return parsed;

			accounts.push(...parsed.value.accounts);
			if (!parsed.value.has_next || !parsed.value.cursor) break;
			cursor = parsed.value.cursor;
		}
		return ok(accounts);
	}

	// ── Transport ───────────────────────────────────────────────────

	private async request(
		method: HttpMethod,
		path: string,
		options: RequestOptions = {},
	): Promise<Result<unknown, TradingError>> {
		const token = await this.rateLimiter.acquire();
		if (!token.ok) return err(token.error);

		const fullPath = `${BROKERAGE_PATH}${path}`;
		const query = options.query?.toString();
		const url = `https://${this.host}${fullPath}${query ? `?${query}` : ""}`;

		let response: Response;
		let text: string;
		try {
			const jwt = buildRequestJwt(this.credentials, {
				method,
				host: this.host,
				path: fullPath,
				nowSec: Math.floor(this.clock.now() / 1000),
				nonce: this.nonce(),
			});
			response = await this.fetchFn(url, {
				method,
				headers: {
					Authorization: `Bearer ${jwt}`,
					"Content-Type": "application/json",
				},
				...(options.body !== undefined && { body: JSON.stringify(options.body) }),
				signal: AbortSignal.timeout(this.timeoutMs),
			});
			text = await response.text();
		} catch (error) {
			return err(classifyError(error));
		}

		const payload = parseJson(text);
		if (!response.ok) {
			return err(httpError(response, method, fullPath, payload));
		}
		return ok(payload);
	}
}

function parseJson(text: string): unknown {
	if (text.length === 0) return null;
	try {
		const parsed: unknown = JSON.parse(text);
		return parsed;
	} catch {
		return text;
	}
}

function httpError(
	response: Response,
	method: HttpMethod,
	path: string,
	payload: unknown,
): TradingError {
	const body = errorBodySchema.safeParse(payload);
	const fields: z.infer<typeof errorBodySchema> = body.success ? body.data : {};
	const reason = fields.error_details ?? fields.message ?? `HTTP ${response.status}`;
	const retryAfterSec = Number(response.headers.get("retry-after"));
	const retryAfterMs =
		Number.isFinite(retryAfterSec) && retryAfterSec > 0 ? retryAfterSec * 1000 : 1000;
	return errorFromStatus(
		response.status,
		`${method} ${path} failed: ${reason}`,
		{ path, ...(fields.error !== undefined && { venueCode: fields.error }) },
		retryAfterMs,
	);
}

/** A 4xx refusal of an order body is a rejection, not a transport fault. */
function asRejection(error: TradingError, clientOrderId: string): TradingError {
	const status = error.context["status"];
	const venueCode = error.context["venueCode"];
	if (
		typeof status === "number" &&
		status >= 400 &&
		status < 500 &&
		status !== 401 &&
		status !== 403 &&
		status !== 429
	) {
		return new OrderRejectedError(error.message, {
			venueCode: typeof venueCode === "string" ? venueCode : `HTTP_${status}`,
			clientOrderId,
			status,
		});
	}
	return error;
}
