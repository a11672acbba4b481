/**
 * StatusPoller — order reads and the bounded wait for a terminal status.
 */

import type { Logger } from "../lib/logger/index.js";
import type { TradingError } from "../shared/errors.js";
import type { VenueOrderId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { Clock, Sleeper } from "../shared/time.js";
import type { OrderState, OrderStatus, Venue } from "../venue/types.js";
import type { EngineConfig } from "./types.js";

/**
 * `settled`: a terminal status was read. `unsettled`: the cap passed and
 * `state` is the last read. `unread`: no read succeeded at all.
 */
export type TerminalWait =
	| { readonly kind: "settled"; readonly state: OrderState }
	| { readonly kind: "unsettled"; readonly state: OrderState }
	| { readonly kind: "unread"; readonly error: TradingError | null };

export class StatusPoller {
	private readonly venue: Venue;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly sleep: Sleeper;
	private readonly config: EngineConfig;

	constructor(venue: Venue, logger: Logger, clock: Clock, sleep: Sleeper, config: EngineConfig) {
		this.venue = venue;
		this.logger = logger;
		this.clock = clock;
		this.sleep = sleep;
		this.config = config;
	}

	isTerminal(status: OrderStatus): boolean {
		return this.config.terminalStatuses.has(status);
	}

	async read(orderId: VenueOrderId): Promise<Result<OrderState, TradingError>> {
		const state = await this.venue.getOrder(orderId);
		if (state.ok) {
			this.logger.debug(
				{
					orderId,
					status: state.value.status,
					filledNotional: state.value.filledNotional.toString(),
				},
				"Order read",
			);
		} else {
			this.logger.warn({ orderId, error: state.error.toJSON() }, "Order read failed");
		}
		return state;
	}

	/**
	 * Poll until a terminal status or `terminalWaitCapMs`. Returns early
	 * when `signal` aborts.
	 */
	async waitForTerminal(orderId: VenueOrderId, signal?: AbortSignal): Promise<TerminalWait> {
		const deadline = this.clock.now() + this.config.terminalWaitCapMs;
		let last: OrderState | null = null;
		let lastError: TradingError | null = null;

		for (;;) {
			const read = await this.read(orderId);
			if (read.ok) {
				if (this.isTerminal(read.value.status)) {
					return { kind: "settled", state: read.value };
				}
				last = read.value;
			} else {
				lastError = read.error;
			}

			const left = deadline - this.clock.now();
			if (left <= 0 || signal?.aborted) break;
			await this.sleep(Math.min(this.config.statusPollIntervalMs, left), signal);
		}

		if (last) {
			this.logger.warn(
				{ orderId, status: last.status, waitedMs: this.config.terminalWaitCapMs },
				"Order did not settle; using last observed fill",
			);
			return { kind: "unsettled", state: last };
		}
		return { kind: "unread", error: lastError };
	}
}
