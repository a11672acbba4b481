import { describe, expect, it } from "vitest";
import { ConfigError, RateLimitError } from "../../shared/errors.js";
import { FakeClock, fakeSleeper } from "../../shared/time.js";
import { TokenBucketRateLimiter } from "./rate-limiter.js";

function limiter(capacity: number, refillRate: number) {
	const clock = new FakeClock(0);
	const bucket = new TokenBucketRateLimiter({
		capacity,
		refillRate,
		clock,
		sleep: fakeSleeper(clock),
	});
	return { clock, bucket };
}

describe("TokenBucketRateLimiter", () => {
	it("starts full and drains one token per acquisition", () => {
		const { bucket } = limiter(2, 1);
		expect(bucket.tryAcquire()).toBe(true);
		expect(bucket.tryAcquire()).toBe(true);
		expect(bucket.tryAcquire()).toBe(false);
	});

	it("refills over time up to capacity", () => {
		const { clock, bucket } = limiter(2, 4);
		bucket.tryAcquire();
		bucket.tryAcquire();
		expect(bucket.timeUntilNextTokenMs()).toBe(250);
		clock.advance(250);
		expect(bucket.availableTokens()).toBe(1);
		clock.advance(10_000);
		expect(bucket.availableTokens()).toBe(2);
	});

	it("acquire waits for the next token", async () => {
		const { clock, bucket } = limiter(1, 10);
		bucket.tryAcquire();
		const result = await bucket.acquire();
		expect(result.ok).toBe(true);
		expect(clock.now()).toBe(100);
	});

	it("acquire gives up after the wait budget", async () => {
		const { clock, bucket } = limiter(1, 0.5);
		bucket.tryAcquire();
		const result = await bucket.acquire(1_000);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toBeInstanceOf(RateLimitError);
		expect(clock.now()).toBe(1_000);
	});

	it("rejects invalid configuration", () => {
		expect(() => new TokenBucketRateLimiter({ capacity: 0, refillRate: 1 })).toThrow(ConfigError);
		expect(() => new TokenBucketRateLimiter({ capacity: 1, refillRate: 0 })).toThrow(ConfigError);
	});
});
