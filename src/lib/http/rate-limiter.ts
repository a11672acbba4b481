import { ConfigError, RateLimitError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type { Clock, Sleeper } from "../../shared/time.js";
import { SystemClock, sleep } from "../../shared/time.js";

export interface RateLimiterConfig {
	readonly capacity: number;
	/** Tokens added per second. */
	readonly refillRate: number;
	readonly clock?: Clock;
	readonly sleep?: Sleeper;
}

/** Coinbase Advanced Trade private REST endpoints: 30 requests per second. */
export const COINBASE_PRIVATE_LIMIT = { capacity: 30, refillRate: 30 } as const;

/**
 * Token-bucket rate limiter with injectable clock and sleep.
 *
 * Tokens accumulate at `refillRate` per second up to `capacity`. `acquire()`
 * suspends until a token is available or the wait budget runs out.
 */
export class TokenBucketRateLimiter {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private readonly sleep: Sleeper;
	private tokens: number;
	private lastRefillMs: number;

	constructor(config: RateLimiterConfig) {
		if (config.capacity < 1) {
			throw new ConfigError("capacity must be >= 1", { capacity: config.capacity });
		}
		if (config.refillRate <= 0) {
			throw new ConfigError("refillRate must be > 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = config.clock ?? SystemClock;
		this.sleep = config.sleep ?? sleep;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	/** Takes a token if one is available right now. */
	tryAcquire(): boolean {
		this.refill();
		if (this.tokens >= 1) {
			this.tokens -= 1;
			return true;
		}
		return false;
	}

	/** Milliseconds until the next token; 0 when one is available. */
	timeUntilNextTokenMs(): number {
		this.refill();
		if (this.tokens >= 1) return 0;
		return Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
	}

	/**
	 * Waits for a token.
	 * @param maxWaitMs - give up after this long with a RateLimitError
	 */
	async acquire(maxWaitMs = 30_000, signal?: AbortSignal): Promise<Result<void, RateLimitError>> {
		const startMs = this.clock.now();
		while (!this.tryAcquire()) {
			const waited = this.clock.now() - startMs;
			if (waited >= maxWaitMs || signal?.aborted) {
				return err(
					new RateLimitError(
						"Timed out waiting for a rate limit token",
						this.timeUntilNextTokenMs(),
						{ waitedMs: waited },
					),
				);
			}
			await this.sleep(Math.min(this.timeUntilNextTokenMs(), maxWaitMs - waited), signal);
		}
		return ok(undefined);
	}

	availableTokens(): number {
		this.refill();
		return Math.floor(this.tokens);
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedMs = now - this.lastRefillMs;
		if (elapsedMs <= 0) return;
		this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs / 1000) * this.refillRate);
		this.lastRefillMs = now;
	}
}
