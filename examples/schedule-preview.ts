/**
 * Schedule Preview Example
 *
 * Loads schedule.example.json and prints when each task fires next,
 * without touching any venue.
 */

import { fileURLToPath } from "node:url";
import { Scheduler, createLogger, loadScheduleFile } from "../src/index.js";

async function preview() {
	const path = fileURLToPath(new URL("../schedule.example.json", import.meta.url));
	const schedule = await loadScheduleFile(path);
	if (!schedule.ok) {
		console.error(schedule.error.message);
		process.exit(1);
	}

	const scheduler = new Scheduler({ logger: createLogger({ level: "warn" }) });
	for (const task of schedule.value) {
		scheduler.register(task, async () => {});
	}

	for (const job of scheduler.describe()) {
		console.log(`#${job.id} ${job.frequency} ${job.quoteAmount} ${job.pair} → ${job.nextRun}`);
	}
}

preview().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});
