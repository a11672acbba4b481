/**
 * Paper DCA Example
 *
 * One maker-first purchase against the in-process paper venue:
 * - Posts a post-only limit 0.1 % under market with a 6 s budget
 * - Reprices every 2 s; half the first order fills along the way
 * - Whatever is left when the budget ends is bought at market
 */

import { Duration, ExecutionEngine, PaperVenue, createLogger, idToString } from "../src/index.js";

const venue = new PaperVenue({
	products: {
		"BTC-USDC": {
			price: "50000",
			priceIncrement: "0.01",
			baseIncrement: "0.00000001",
			quoteIncrement: "0.01",
			quoteMinSize: "1",
		},
	},
	balances: { USDC: "1000" },
});

const engine = new ExecutionEngine({ venue, logger: createLogger({ level: "warn" }) });

engine.events
	.on("orderSubmitted", (e) => {
		console.log(`Submitted ${idToString(e.handle.orderId)} at ${e.limitPrice?.toString()}`);
		if (idToString(e.handle.orderId) === "paper-1") {
			setTimeout(() => venue.fill("paper-1", "50"), Duration.seconds(1));
		}
	})
	.on("orderRepriced", (e) => {
		console.log(`Repriced #${e.iteration}, ${e.remainingNotional.toString()} USDC left`);
	})
	.on("fallbackPlaced", (e) => {
		console.log(`Market fallback for ${e.quoteSize.toString()} USDC`);
	})
	.on("campaignFinished", (outcome) => {
		console.log(`Done: ${outcome.reason}, fallback ${outcome.fallback}`);
	});

async function run() {
	const result = await engine.createOrder({
		pair: "BTC-USDC",
		quoteAmount: "100",
		orderTimeoutMs: Duration.seconds(6),
		repriceIntervalMs: Duration.seconds(2),
	});
	if (!result.success) {
		console.error("Order failed:", result.error?.message);
		return;
	}
	await engine.whenIdle();
}

run().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});
