import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type TestEvents = {
	submitted: (orderId: string, attempt: number) => void;
	finished: () => void;
};

describe("TypedEmitter", () => {
	it("passes arguments to registered handlers", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("submitted", handler);
		const delivered = emitter.emit("submitted", "o-1", 2);

		expect(delivered).toBe(true);
		expect(handler).toHaveBeenCalledWith("o-1", 2);
	});

	it("off() removes a handler and once() fires a single time", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const removed = vi.fn();
		const single = vi.fn();

		emitter.on("finished", removed).off("finished", removed);
		emitter.once("finished", single);
		emitter.emit("finished");
		emitter.emit("finished");

		expect(removed).not.toHaveBeenCalled();
		expect(single).toHaveBeenCalledTimes(1);
	});

	it("counts and clears listeners", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("finished", () => {});
		emitter.on("finished", () => {});
		expect(emitter.listenerCount("finished")).toBe(2);

		emitter.removeAllListeners();
		expect(emitter.listenerCount("finished")).toBe(0);
		expect(emitter.emit("finished")).toBe(false);
	});
});
