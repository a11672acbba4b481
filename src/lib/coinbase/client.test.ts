import { generateKeyPairSync } from "node:crypto";
import { describe, expect, it, vi } from "vitest";
import { createCredentials } from "../../auth/credentials.js";
import {
	AuthError,
	NetworkError,
	OrderRejectedError,
	RateLimitError,
	TimeoutError,
} from "../../shared/errors.js";
import { FakeClock } from "../../shared/time.js";
import { TokenBucketRateLimiter } from "../http/rate-limiter.js";
import { ValidationError } from "../validation/index.js";
import { CoinbaseClient } from "./client.js";
import type { CreateOrderBody, FetchFn } from "./types.js";

const { privateKey } = generateKeyPairSync("ec", { namedCurve: "P-256" });
const credentials = createCredentials({
	keyName: "organizations/test/apiKeys/test-key",
	privateKey: privateKey.export({ format: "pem", type: "sec1" }).toString(),
});

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
	return new Response(JSON.stringify(body), { status, headers });
}

function client(fetchFn: FetchFn, clock = new FakeClock(1_700_000_000_000)): CoinbaseClient {
	return new CoinbaseClient({
		credentials,
		fetch: fetchFn,
		clock,
		nonce: () => "test-nonce",
		rateLimiter: new TokenBucketRateLimiter({ capacity: 100, refillRate: 100, clock }),
	});
}

const ORDER_BODY: CreateOrderBody = {
	client_order_id: "coid-1",
	product_id: "BTC-USDC",
	side: "BUY",
	order_configuration: {
		limit_limit_gtc: { base_size: "0.0020002", limit_price: "49995", post_only: true },
	},
};

function headerOf(init: RequestInit | undefined, name: string): string | undefined {
	const headers = init?.headers;
	if (!headers || headers instanceof Headers || Array.isArray(headers)) return undefined;
	const value = headers[name];
	return typeof value === "string" ? value : undefined;
}

describe("CoinbaseClient", () => {
	describe("request signing", () => {
		it("sends a bearer JWT bound to the method and path", async () => {
			const fetchFn = vi.fn<FetchFn>().mockResolvedValue(json({ price: "1" }));
			await client(fetchFn).getProduct("BTC-USDC");

			const [url, init] = fetchFn.mock.calls[0] ?? [];
			expect(url).toBe("https://api.coinbase.com/api/v3/brokerage/products/BTC-USDC");
			expect(init?.method).toBe("GET");

			const auth = headerOf(init, "Authorization") ?? "";
			expect(auth.startsWith("Bearer ")).toBe(true);
			const payload: unknown = JSON.parse(
				Buffer.from(auth.slice(7).split(".")[1] ?? "", "base64url").toString("utf8"),
			);
			expect(payload).toMatchObject({
				sub: "organizations/test/apiKeys/test-key",
				nbf: 1_700_000_000,
				uri: "GET api.coinbase.com/api/v3/brokerage/products/BTC-USDC",
			});
		});

		it("serializes the body on POST", async () => {
			const fetchFn = vi
				.fn<FetchFn>()
				.mockResolvedValue(json({ success: true, success_response: { order_id: "ord-1" } }));
			await client(fetchFn).createOrder(ORDER_BODY);
			const init = fetchFn.mock.calls[0]?.[1];
			expect(init?.method).toBe("POST");
			expect(typeof init?.body === "string" ? JSON.parse(init.body) : null).toEqual(ORDER_BODY);
		});
	});

	describe("createOrder", () => {
		it("returns the venue order id on success", async () => {
			const fetchFn = vi
				.fn<FetchFn>()
				.mockResolvedValue(json({ success: true, success_response: { order_id: "ord-1" } }));
			const result = await client(fetchFn).createOrder(ORDER_BODY);
			expect(result).toEqual({ ok: true, value: "ord-1" });
		});

		it("maps success=false onto OrderRejectedError with the failure reason", async () => {
			const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
				json({
					success: false,
					error_response: {
						error: "INVALID_LIMIT_PRICE_POST_ONLY",
						message: "Invalid limit price for post only order",
						preview_failure_reason: "PREVIEW_INVALID_LIMIT_PRICE_POST_ONLY",
					},
				}),
			);
			const result = await client(fetchFn).createOrder(ORDER_BODY);
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error).toBeInstanceOf(OrderRejectedError);
			expect(result.error instanceof OrderRejectedError && result.error.venueCode).toBe(
				"INVALID_LIMIT_PRICE_POST_ONLY",
			);
			expect(result.error.message).toBe(
				"Order rejected: Invalid limit price for post only order",
			);
		});

		it("treats a 400 on order placement as a rejection", async () => {
			const fetchFn = vi
				.fn<FetchFn>()
				.mockResolvedValue(
					json({ error: "INVALID_ARGUMENT", message: "end_time is in the past" }, 400),
				);
			const result = await client(fetchFn).createOrder(ORDER_BODY);
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error).toBeInstanceOf(OrderRejectedError);
			expect(result.error instanceof OrderRejectedError && result.error.venueCode).toBe(
				"INVALID_ARGUMENT",
			);
		});

		it("rejects an unreadable response body", async () => {
			const fetchFn = vi.fn<FetchFn>().mockResolvedValue(json({ nope: true }));
			const result = await client(fetchFn).createOrder(ORDER_BODY);
			expect(!result.ok && result.error).toBeInstanceOf(ValidationError);
		});
	});

	describe("error classification", () => {
		it("maps 401 to AuthError", async () => {
			const fetchFn = vi.fn<FetchFn>().mockResolvedValue(json({ message: "unauthorized" }, 401));
			const result = await client(fetchFn).getOrder("ord-1");
			expect(!result.ok && result.error).toBeInstanceOf(AuthError);
		});

		it("maps 429 to RateLimitError honouring Retry-After", async () => {
			const fetchFn = vi
				.fn<FetchFn>()
				.mockResolvedValue(json({ message: "slow down" }, 429, { "Retry-After": "3" }));
			const result = await client(fetchFn).getOrder("ord-1");
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error).toBeInstanceOf(RateLimitError);
			expect(result.error instanceof RateLimitError && result.error.retryAfterMs).toBe(3000);
		});

		it("maps 5xx to NetworkError", async () => {
			const fetchFn = vi
				.fn<FetchFn>()
				.mockResolvedValue(new Response("bad gateway", { status: 502 }));
			const result = await client(fetchFn).getProduct("BTC-USDC");
			expect(!result.ok && result.error).toBeInstanceOf(NetworkError);
		});

		it("classifies a thrown timeout", async () => {
			const timeout = new Error("The operation was aborted due to timeout");
			timeout.name = "TimeoutError";
			const fetchFn = vi.fn<FetchFn>().mockRejectedValue(timeout);
			const result = await client(fetchFn).getProduct("BTC-USDC");
			expect(!result.ok && result.error).toBeInstanceOf(TimeoutError);
		});
	});

	describe("cancelOrders", () => {
		it("returns per-order results", async () => {
			const fetchFn = vi
				.fn<FetchFn>()
				.mockResolvedValue(
					json({
						results: [{ success: false, failure_reason: "UNKNOWN_CANCEL_ORDER", order_id: "x" }],
					}),
				);
			const result = await client(fetchFn).cancelOrders(["x"]);
			expect(result.ok && result.value[0]?.failure_reason).toBe("UNKNOWN_CANCEL_ORDER");
		});
	});

	describe("listAccounts", () => {
		it("follows the cursor across pages", async () => {
			const fetchFn = vi
				.fn<FetchFn>()
				.mockResolvedValueOnce(
					json({
						accounts: [{ currency: "USDC", available_balance: { value: "10", currency: "USDC" } }],
						has_next: true,
						cursor: "page-2",
					}),
				)
				.mockResolvedValueOnce(
					json({
						accounts: [{ currency: "BTC", available_balance: { value: "0.1", currency: "BTC" } }],
						has_next: false,
						cursor: "",
					}),
				);
			const result = await client(fetchFn).listAccounts();
			expect(result.ok && result.value.map((a) => a.currency)).toEqual(["USDC", "BTC"]);
			expect(fetchFn.mock.calls[1]?.[0]).toBe(
				"https://api.coinbase.com/api/v3/brokerage/accounts?limit=250&cursor=page-2",
			);
		});
	});
});
