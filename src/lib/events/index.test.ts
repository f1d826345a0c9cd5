import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type FeedEvents = {
	candle: (bar: { close: number }) => void;
	error: (err: Error) => void;
	closed: () => void;
};

describe("TypedEmitter", () => {
	it("delivers arguments to registered handlers", () => {
		const emitter = new TypedEmitter<FeedEvents>();
		const handler = vi.fn();
		emitter.on("candle", handler);
		expect(emitter.emit("candle", { close: 105 })).toBe(true);
		expect(handler).toHaveBeenCalledWith({ close: 105 });
	});

	it("emit returns false without listeners", () => {
		expect(new TypedEmitter<FeedEvents>().emit("closed")).toBe(false);
	});

	it("off removes a handler and once fires a single time", () => {
		const emitter = new TypedEmitter<FeedEvents>();
		const removed = vi.fn();
		const single = vi.fn();
		emitter.on("closed", removed).off("closed", removed);
		emitter.once("closed", single);
		emitter.emit("closed");
		emitter.emit("closed");
		expect(removed).not.toHaveBeenCalled();
		expect(single).toHaveBeenCalledTimes(1);
	});

	it("counts and clears listeners", () => {
		const emitter = new TypedEmitter<FeedEvents>();
		emitter.on("error", () => {});
		emitter.on("error", () => {});
		emitter.on("closed", () => {});
		expect(emitter.listenerCount("error")).toBe(2);
		emitter.removeAllListeners("error");
		expect(emitter.listenerCount("error")).toBe(0);
		expect(emitter.listenerCount("closed")).toBe(1);
		emitter.removeAllListeners();
		expect(emitter.listenerCount("closed")).toBe(0);
	});
});
