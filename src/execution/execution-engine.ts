/**
 * ExecutionEngine — the public `createOrder` operation.
 *
 * Validates the intent, prices and sizes the first order, submits it and,
 * for limit orders, hands the campaign to exactly one background task:
 * the reprice loop when an interval is set, otherwise the plain fallback.
 * Disabling fallback launches neither and leaves the order resting until
 * it expires. The returned result reflects only the first submission.
 *
 * @example
 * ```ts
 * const engine = new ExecutionEngine({ venue, logger });
 * const result = await engine.createOrder({ pair: "BTC/USDC", quoteAmount: "100" });
 * ```
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import {
	type ClientOrderIdFactory,
	ClientOrderIdIssuer,
	randomClientOrderId,
} from "../order/client-order-ids.js";
import { parseOrderIntent } from "../order/order-intent.js";
import { type CreateOrderResult, type OrderIntent, OrderType } from "../order/types.js";
import { type TradingError, classifyError } from "../shared/errors.js";
import { type ClientOrderId, type ProductId, idToString } from "../shared/identifiers.js";
import type { Clock, Sleeper } from "../shared/time.js";
import { SystemClock, sleep } from "../shared/time.js";
import { computeLimitPrice, sizeLimitOrder, sizeMarketOrder } from "../sizing/order-sizer.js";
import { OrderSide, type ProductInfo, type Venue } from "../venue/types.js";
import type { CampaignContext, CampaignRun } from "./campaign-context.js";
import { CampaignState } from "./campaign-state.js";
import { runPlainFallback } from "./fallback-worker.js";
import { OrderSubmitter } from "./order-submitter.js";
import { runRepriceLoop } from "./reprice-loop.js";
import { StatusPoller } from "./status-poller.js";
import {
	type CampaignOutcome,
	DEFAULT_ENGINE_CONFIG,
	type EmitFn,
	type EngineConfig,
	type ExecutionEngineDeps,
	type ExecutionEvents,
} from "./types.js";

interface RunningCampaign {
	readonly controller: AbortController;
	readonly task: Promise<CampaignOutcome | null>;
}

export class ExecutionEngine {
	readonly events = new TypedEmitter<ExecutionEvents>();

	private readonly venue: Venue;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly sleep: Sleeper;
	private readonly newClientOrderId: ClientOrderIdFactory;
	private readonly config: EngineConfig;
	private readonly campaigns = new Map<string, RunningCampaign>();

	constructor(deps: ExecutionEngineDeps) {
		this.venue = deps.venue;
		this.logger = deps.logger;
		this.clock = deps.clock ?? SystemClock;
		this.sleep = deps.sleep ?? sleep;
		this.newClientOrderId = deps.newClientOrderId ?? randomClientOrderId;
		this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
	}

	/**
	 * Place the first order of a campaign. Never throws: input, metadata,
	 * sizing and submission failures come back with `success: false`.
	 */
	async createOrder(input: unknown): Promise<CreateOrderResult> {
		const parsed = parseOrderIntent(input);
		if (!parsed.ok) {
			this.logger.warn({ issues: parsed.error.summary() }, "Order intent rejected");
			return failure(null, null, parsed.error);
		}
		const intent = parsed.value;
		const log = this.logger.child({ productId: intent.productId });

		try {
			return await this.placeFirstOrder(intent, log);
		} catch (error) {
			const classified = classifyError(error);
			log.error({ error: classified.toJSON() }, "Order creation failed unexpectedly");
			return failure(intent.productId, intent.clientOrderId, classified);
		}
	}

	/** Abort one running campaign. Returns false if it is not running. */
	cancelCampaign(campaignId: string): boolean {
		const running = this.campaigns.get(campaignId);
		if (!running) return false;
		running.controller.abort();
		return true;
	}

	activeCampaigns(): string[] {
		return [...this.campaigns.keys()];
	}

	/** Resolves once every background task has finished, including ones started meanwhile. */
	async whenIdle(): Promise<void> {
		while (this.campaigns.size > 0) {
			await Promise.all([...this.campaigns.values()].map((c) => c.task));
		}
	}

	/** Abort every campaign and wait for them to wind down. */
	async shutdown(): Promise<void> {
		for (const running of this.campaigns.values()) {
			running.controller.abort();
		}
		await this.whenIdle();
	}

	// ── First submission ────────────────────────────────────────────

	private async placeFirstOrder(intent: OrderIntent, log: Logger): Promise<CreateOrderResult> {
		const keys = new ClientOrderIdIssuer(this.newClientOrderId, intent.clientOrderId);

		const product = await this.venue.getProduct(intent.productId);
		if (!product.ok) {
			log.warn({ error: product.error.toJSON() }, "Product lookup failed");
			return failure(intent.productId, intent.clientOrderId, product.error);
		}

		if (intent.orderType === OrderType.Market) {
			return this.placeMarketOrder(intent, product.value, keys, log);
		}
		return this.placeLimitOrder(intent, product.value, keys, log);
	}

	private async placeMarketOrder(
		intent: OrderIntent,
		product: ProductInfo,
		keys: ClientOrderIdIssuer,
		log: Logger,
	): Promise<CreateOrderResult> {
		const quoteSize = sizeMarketOrder(product, intent.quoteAmount, this.config.precision);
		if (!quoteSize.ok) {
			log.warn({ error: quoteSize.error.toJSON() }, "Market order below minimum");
			return failure(intent.productId, intent.clientOrderId, quoteSize.error);
		}

		const submitter = new OrderSubmitter(this.venue, log, this.config.precision);
		const placed = await submitter.submitMarket(intent.productId, quoteSize.value, keys);
		if (!placed.ok) {
			return failure(intent.productId, intent.clientOrderId, placed.error);
		}
		this.emit("orderSubmitted", {
			campaignId: placed.value.clientOrderId,
			handle: placed.value,
			timeInForce: null,
			limitPrice: null,
			baseSize: null,
			quoteSize: quoteSize.value,
		});
		return success(placed.value.orderId, intent.productId, placed.value.clientOrderId);
	}

	private async placeLimitOrder(
		intent: OrderIntent,
		product: ProductInfo,
		keys: ClientOrderIdIssuer,
		log: Logger,
	): Promise<CreateOrderResult> {
		const price = computeLimitPrice(
			product,
			intent.pricing,
			this.config.absolutePriceWarnPct,
			this.config.precision,
		);
		if (price.overshootPct) {
			log.warn(
				{
					limitPrice: price.price.toString(),
					marketPrice: product.price.toString(),
					abovePct: price.overshootPct.toString(),
				},
				"Absolute limit price is well above market",
			);
		}

		const size = sizeLimitOrder(product, intent.quoteAmount, price.price, this.config.precision);
		if (!size.ok) {
			log.warn({ error: size.error.toJSON() }, "Limit order below minimum");
			return failure(intent.productId, intent.clientOrderId, size.error);
		}

		const startedAt = this.clock.now();
		const repricing = intent.repriceIntervalMs > 0 && !intent.disableFallback;
		const firstExpiryMs = repricing
			? Math.min(intent.repriceIntervalMs, intent.orderTimeoutMs)
			: intent.orderTimeoutMs;

		const submitter = new OrderSubmitter(this.venue, log, this.config.precision);
		const placed = await submitter.submitLimit(
			{
				product,
				baseSize: size.value.baseSize,
				limitPrice: size.value.limitPrice,
				postOnly: intent.postOnly,
				expiresAtMs: startedAt + firstExpiryMs,
			},
			keys,
		);
		if (!placed.ok) {
			return failure(intent.productId, intent.clientOrderId, placed.error);
		}

		const { handle } = placed.value;
		this.emit("orderSubmitted", {
			campaignId: handle.clientOrderId,
			handle,
			timeInForce: placed.value.timeInForce,
			limitPrice: placed.value.limitPrice,
			baseSize: placed.value.baseSize,
			quoteSize: null,
		});

		if (intent.disableFallback) {
			log.info({ orderId: handle.orderId }, "Fallback disabled; order left resting");
		} else if (this.campaigns.has(idToString(handle.clientOrderId))) {
			log.warn(
				{ orderId: handle.orderId },
				"Campaign already running for this client order id",
			);
		} else {
			const state = new CampaignState({
				first: handle,
				originalNotional: intent.quoteAmount,
				deadlineMs: startedAt + (repricing ? intent.repriceDurationMs : intent.orderTimeoutMs),
				budgetEndMs: startedAt + intent.orderTimeoutMs,
			});
			this.launch(state, intent, keys, repricing ? "reprice" : "fallback");
		}

		return success(handle.orderId, intent.productId, handle.clientOrderId);
	}

	// ── Background campaigns ────────────────────────────────────────

	private launch(
		state: CampaignState,
		intent: OrderIntent,
		keys: ClientOrderIdIssuer,
		mode: "reprice" | "fallback",
	): void {
		const campaignId = idToString(state.campaignId);
		const controller = new AbortController();
		const logger = this.logger.child({ campaignId, productId: state.productId });
		const ctx: CampaignContext = {
			venue: this.venue,
			logger,
			clock: this.clock,
			sleep: this.sleep,
			config: this.config,
			submitter: new OrderSubmitter(this.venue, logger, this.config.precision),
			poller: new StatusPoller(this.venue, logger, this.clock, this.sleep, this.config),
			emit: this.emit,
		};
		const run: CampaignRun = { state, intent, keys, signal: controller.signal };

		logger.info(
			{ mode, originalNotional: state.originalNotional.toString(), deadlineMs: state.deadlineMs },
			"Campaign started",
		);
		this.emit("campaignStarted", {
			campaignId: state.campaignId,
			productId: state.productId,
			mode,
			originalNotional: state.originalNotional,
			deadlineMs: state.deadlineMs,
		});

		const work = mode === "reprice" ? runRepriceLoop(ctx, run) : runPlainFallback(ctx, run);
		const task = work
			.then(
				(outcome): CampaignOutcome => {
					logger.info(
						{
							reason: outcome.reason,
							fallback: outcome.fallback,
							remainingNotional: outcome.remainingNotional.toString(),
							orders: outcome.orderIds.length,
						},
						"Campaign finished",
					);
					this.emit("campaignFinished", outcome);
					return outcome;
				},
				(error: unknown): null => {
					const classified = classifyError(error);
					logger.error({ error: classified.toJSON() }, "Campaign failed");
					this.emit("campaignFailed", { campaignId: state.campaignId, error: classified });
					return null;
				},
			)
			.finally(() => {
				this.campaigns.delete(campaignId);
			});
		this.campaigns.set(campaignId, { controller, task });
	}

	private readonly emit: EmitFn = (event, ...args) => {
		try {
			this.events.emit(event, ...args);
		} catch (error) {
			this.logger.error({ event, error: classifyError(error).toJSON() }, "Event listener threw");
		}
	};
}

function success(
	orderId: CreateOrderResult["orderId"],
	productId: ProductId,
	clientOrderId: ClientOrderId,
): CreateOrderResult {
	return { success: true, orderId, productId, side: OrderSide.Buy, clientOrderId, error: null };
}

function failure(
	productId: ProductId | null,
	clientOrderId: ClientOrderId | null,
	error: TradingError,
): CreateOrderResult {
	return { success: false, orderId: null, productId, side: OrderSide.Buy, clientOrderId, error };
}
