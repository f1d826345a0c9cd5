import { describe, expect, it } from "vitest";
import { MemoryTradeStore } from "../persistence/memory-store.js";
import { Decimal } from "../shared/decimal.js";
import { FakeClock } from "../shared/time.js";
import { pruneHistory } from "./prune.js";

const bar = (timestamp: string) => ({
	timestamp,
	open: Decimal.one(),
	high: Decimal.one(),
	low: Decimal.one(),
	close: Decimal.one(),
	volume: Decimal.zero(),
});

const signal = { timestamp: "t", action: "open", symbol: "BTC", side: "long", price: Decimal.one() };

describe("pruneHistory", () => {
	it("drops records older than the retention window", async () => {
		const clock = new FakeClock(Date.parse("2024-01-01T00:00:00Z"));
		const store = new MemoryTradeStore({ clock });
		await store.insertSignal(signal);
		clock.set(Date.parse("2024-03-01T00:00:00Z"));
		const recent = await store.insertSignal(signal);
		await store.insertBar(bar("2024-01-15T00:00:00.000Z"));
		await store.insertBar(bar("2024-02-25T00:00:00.000Z"));

		const report = await pruneHistory(store, 30, clock);

		expect(report).toEqual({ cutoff: new Date("2024-01-31T00:00:00Z"), signals: 1, bars: 1 });
		expect(await store.fetchPendingSignals()).toEqual([recent]);
		expect((await store.latestBar())?.timestamp).toBe("2024-02-25T00:00:00.000Z");
		expect((await store.nextBarAfter(null))?.timestamp).toBe("2024-02-25T00:00:00.000Z");
	});

	it("rejects a non-positive retention", async () => {
		const store = new MemoryTradeStore();
		await expect(pruneHistory(store, 0, new FakeClock(0))).rejects.toThrow(RangeError);
	});
});
