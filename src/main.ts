#!/usr/bin/env node
/**
 * maker-dca CLI — runs the schedule file against Coinbase, or against the
 * in-process paper venue when DCA_PAPER_MODE=true. Settings come from the
 * environment, topped up from `./.env`.
 */

import { createCredentials } from "./auth/index.js";
import { ExecutionEngine } from "./execution/index.js";
import { CoinbaseClient } from "./lib/coinbase/index.js";
import { type Logger, createLogger } from "./lib/logger/index.js";
import { type ScheduleTask, Scheduler, loadScheduleFile } from "./schedule/index.js";
import { type AppConfig, configFromEnv, withEnvFile } from "./shared/config.js";
import { classifyError } from "./shared/errors.js";
import { idToString, productId } from "./shared/identifiers.js";
import { CoinbaseVenue, PaperVenue, type Venue } from "./venue/index.js";

/** Paper products start at this price; fills only happen when scripted. */
const PAPER_PRICE = "100";

function buildVenue(config: AppConfig, tasks: readonly ScheduleTask[]): Venue {
	if (config.coinbase && !config.paperMode) {
		const client = new CoinbaseClient({
			credentials: createCredentials(config.coinbase),
			timeoutMs: config.requestTimeoutMs,
		});
		return new CoinbaseVenue(client);
	}
	const venue = new PaperVenue();
	for (const task of tasks) {
		venue.setProduct(idToString(productId(task.order.pair)), { price: PAPER_PRICE });
	}
	return venue;
}

async function checkBalances(venue: Venue, logger: Logger): Promise<void> {
	const balances = await venue.listBalances();
	if (!balances.ok) throw balances.error;
	logger.info(
		{ balances: balances.value.map((b) => `${b.available.toString()} ${b.currency}`) },
		"Credentials verified",
	);
}

async function main(): Promise<void> {
	const config = configFromEnv(withEnvFile(".env"));
	const logger = createLogger({ level: config.logLevel });

	const schedule = await loadScheduleFile(config.scheduleFile);
	if (!schedule.ok) throw schedule.error;

	const venue = buildVenue(config, schedule.value);
	await checkBalances(venue, logger);

	const engine = new ExecutionEngine({ venue, logger });
	const scheduler = new Scheduler({ logger });
	for (const task of schedule.value) {
		scheduler.register(task, async (t) => {
			const result = await engine.createOrder(t.order);
			if (!result.success) {
				logger.warn(
					{ pair: t.order.pair, error: result.error?.toJSON() },
					"Scheduled order not placed",
				);
			}
		});
	}
	logger.info({ jobs: scheduler.describe() }, "Schedule loaded");

	const controller = new AbortController();
	const stop = (signal: NodeJS.Signals): void => {
		logger.info({ signal }, "Shutting down");
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	await scheduler.start(controller.signal);
	await engine.shutdown();
}

main().catch((error: unknown) => {
	const failure = classifyError(error);
	console.error(JSON.stringify(failure.toJSON()));
	process.exitCode = 1;
});
