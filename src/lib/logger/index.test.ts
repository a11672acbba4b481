import { describe, expect, it } from "vitest";
import { createLogger, silentLogger } from "./index.js";

function capture(level: "debug" | "info" | "warn" = "info") {
	const lines: string[] = [];
	const logger = createLogger({
		level,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	const records = (): Array<Record<string, unknown>> =>
		lines.map((l): Record<string, unknown> => JSON.parse(l));
	return { logger, records };
}

describe("Logger", () => {
	it("writes structured records with the message and fields", () => {
		const { logger, records } = capture();
		logger.info({ orderId: "o-1", quoteSize: "25" }, "Market order placed");

		const [record] = records();
		expect(record?.["msg"]).toBe("Market order placed");
		expect(record?.["orderId"]).toBe("o-1");
		expect(record?.["quoteSize"]).toBe("25");
		expect(record?.["level"]).toBe(30);
	});

	it("accepts a bare message", () => {
		const { logger, records } = capture();
		logger.warn("GTD rejected");
		expect(records()[0]?.["msg"]).toBe("GTD rejected");
	});

	it("filters by level", () => {
		const { logger, records } = capture("warn");
		logger.info("hidden");
		logger.debug("hidden");
		logger.error("shown");
		expect(records().map((r) => r["msg"])).toEqual(["shown"]);
	});

	it("binds child fields to every record", () => {
		const { logger, records } = capture();
		logger.child({ campaignId: "c-1" }).child({ productId: "BTC-USDC" }).info("cycle");
		const [record] = records();
		expect(record?.["campaignId"]).toBe("c-1");
		expect(record?.["productId"]).toBe("BTC-USDC");
	});

	it("replaces opaque credentials", () => {
		const { logger, records } = capture();
		const credential = { __opaque: true, toJSON: () => "sealed" };
		logger.info({ credentials: credential }, "startup");
		expect(records()[0]?.["credentials"]).toBe("[REDACTED]");
	});

	it("redacts private keys by path", () => {
		const { logger, records } = capture();
		logger.info({ privateKey: "test-secret", coinbase: { privateKey: "test-secret" } }, "config");
		const [record] = records();
		expect(record?.["privateKey"]).toBe("[REDACTED]");
		expect(record?.["coinbase"]).toEqual({ privateKey: "[REDACTED]" });
	});

	it("silentLogger accepts calls without output", () => {
		const logger = silentLogger();
		expect(() => logger.child({ a: 1 }).error({ b: 2 }, "nothing")).not.toThrow();
	});
});
