/**
 * Shared test helpers for the execution tests: a paper venue on a fake
 * clock and a sleeper that fires scripted venue activity as time passes.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { type ClientOrderIdFactory, ClientOrderIdIssuer } from "../order/client-order-ids.js";
import { type OrderIntentInput, parseOrderIntent } from "../order/order-intent.js";
import type { OrderIntent } from "../order/types.js";
import { Decimal } from "../shared/decimal.js";
import { FakeClock, type Sleeper } from "../shared/time.js";
import { type PaperProduct, PaperVenue } from "../venue/paper-venue.js";
import type { OrderHandle, ProductInfo } from "../venue/types.js";
import type { CampaignContext, CampaignRun } from "./campaign-context.js";
import { CampaignState } from "./campaign-state.js";
import { OrderSubmitter } from "./order-submitter.js";
import { StatusPoller } from "./status-poller.js";
import {
	DEFAULT_ENGINE_CONFIG,
	type EmitFn,
	type EngineConfig,
	type ExecutionEvents,
} from "./types.js";

export const START_MS = 1_700_000_000_000;

export const BTC_USDC: PaperProduct = {
	price: "50000",
	priceIncrement: "0.01",
	baseIncrement: "0.00000001",
	quoteIncrement: "0.01",
	quoteMinSize: "1",
	baseMinSize: "0.00000001",
};

/**
 * FakeClock whose sleeper runs the actions scheduled at or before the new
 * time, so fills and price moves land between campaign steps.
 */
export class ScriptedTime {
	readonly clock = new FakeClock(START_MS);
	readonly sleeps: number[] = [];
	private readonly actions: Array<{ readonly atMs: number; readonly run: () => void }> = [];

	/** Run `action` once the clock reaches START_MS + offsetMs. */
	at(offsetMs: number, action: () => void): this {
		this.actions.push({ atMs: START_MS + offsetMs, run: action });
		this.actions.sort((a, b) => a.atMs - b.atMs);
		return this;
	}

	elapsed(): number {
		return this.clock.now() - START_MS;
	}

	readonly sleep: Sleeper = async (ms, signal) => {
		if (signal?.aborted) return;
		this.sleeps.push(ms);
		if (ms > 0) this.clock.advance(ms);
		while (this.actions.length > 0) {
			const next = this.actions[0];
			if (!next || next.atMs > this.clock.now()) break;
			this.actions.shift();
			next.run();
		}
	};
}

export function sequentialIds(prefix = "coid"): ClientOrderIdFactory {
	let n = 0;
	return () => {
		n++;
		return `${prefix}-${n}`;
	};
}

export function intentOf(input: Partial<OrderIntentInput> = {}): OrderIntent {
	const parsed = parseOrderIntent({ pair: "BTC-USDC", quoteAmount: "100", ...input });
	if (!parsed.ok) throw parsed.error;
	return parsed.value;
}

export interface TestHarness {
	readonly time: ScriptedTime;
	readonly venue: PaperVenue;
	readonly config: EngineConfig;
	readonly events: TypedEmitter<ExecutionEvents>;
	readonly ctx: CampaignContext;
}

export function createHarness(
	options: {
		readonly config?: Partial<EngineConfig>;
		readonly cancelSettleReads?: number;
		readonly product?: PaperProduct;
	} = {},
): TestHarness {
	const time = new ScriptedTime();
	const venue = new PaperVenue({
		clock: time.clock,
		products: { "BTC-USDC": options.product ?? BTC_USDC },
		...(options.cancelSettleReads !== undefined && {
			cancelSettleReads: options.cancelSettleReads,
		}),
	});
	const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
	const logger = silentLogger();
	const events = new TypedEmitter<ExecutionEvents>();
	const emit: EmitFn = (event, ...args) => {
		events.emit(event, ...args);
	};

	return {
		time,
		venue,
		config,
		events,
		ctx: {
			venue,
			logger,
			clock: time.clock,
			sleep: time.sleep,
			config,
			submitter: new OrderSubmitter(venue, logger, config.precision),
			poller: new StatusPoller(venue, logger, time.clock, time.sleep, config),
			emit,
		},
	};
}

/**
 * Place the first limit order directly on the paper venue and build the
 * run a background task would receive for it.
 */
export async function startCampaign(
	harness: TestHarness,
	intent: OrderIntent,
	first: { readonly baseSize: string; readonly limitPrice: string },
	keys: ClientOrderIdIssuer = new ClientOrderIdIssuer(sequentialIds()),
): Promise<{ readonly run: CampaignRun; readonly first: OrderHandle; readonly abort: () => void }> {
	const placed = await harness.ctx.submitter.submitLimit(
		{
			product: await productOf(harness),
			baseSize: Decimal.from(first.baseSize),
			limitPrice: Decimal.from(first.limitPrice),
			postOnly: intent.postOnly,
			expiresAtMs: null,
		},
		keys,
	);
	if (!placed.ok) throw placed.error;

	const now = harness.time.clock.now();
	const controller = new AbortController();
	const state = new CampaignState({
		first: placed.value.handle,
		originalNotional: intent.quoteAmount,
		deadlineMs:
			now + (intent.repriceIntervalMs > 0 ? intent.repriceDurationMs : intent.orderTimeoutMs),
		budgetEndMs: now + intent.orderTimeoutMs,
	});
	return {
		run: { state, intent, keys, signal: controller.signal },
		first: placed.value.handle,
		abort: () => controller.abort(),
	};
}

export async function productOf(harness: TestHarness): Promise<ProductInfo> {
	const product = await harness.venue.getProduct(intentOf().productId);
	if (!product.ok) throw product.error;
	return product.value;
}
