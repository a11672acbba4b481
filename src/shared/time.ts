/**
 * Time utilities — injectable clock and sleep for deterministic testing.
 *
 * Campaign code reads time through Clock.now() and suspends through a
 * Sleeper, so tests shrink multi-hour budgets to zero real time.
 */

/** Injectable time source; engine code never calls `Date.now()` directly. */
export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Sleeping ─────────────────────────────────────────────────────────

/**
 * Suspends for `ms`. Resolves early (never rejects) when `signal` aborts;
 * callers check `signal.aborted` afterwards.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = (ms, signal) => {
	if (ms <= 0 || signal?.aborted) return Promise.resolve();
	return new Promise((resolve) => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
};

/** Sleeper that advances a FakeClock instead of waiting. */
export function fakeSleeper(clock: FakeClock): Sleeper {
	return async (ms, signal) => {
		if (signal?.aborted) return;
		if (ms > 0) clock.advance(ms);
	};
}

// ── Duration helpers ─────────────────────────────────────────────────

export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;
