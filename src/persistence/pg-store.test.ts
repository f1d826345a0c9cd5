import { describe, expect, it } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { type PgPool, PgTradeStore, SCHEMA_SQL } from "./pg-store.js";
import { SignalStatus } from "./types.js";

interface Call {
	readonly text: string;
	readonly values: unknown[] | undefined;
}

type Reply = { rows: unknown[]; rowCount: number | null };

/** Records statements and answers them from a queue. */
function fakePool(replies: Reply[] = []) {
	const calls: Call[] = [];
	let ended = false;
	const pool: PgPool = {
		async query(text, values) {
			calls.push({ text, values });
			return replies.shift() ?? { rows: [], rowCount: 0 };
		},
		async end() {
			ended = true;
		},
	};
	return { pool, calls, isEnded: () => ended };
}

const signalRow = {
	id: 7,
	timestamp: "2024-03-01T11:00:00.000Z",
	action: "open",
	symbol: "BTC",
	side: "long",
	price: 50000.5,
	leverage: 5,
	executed: 0,
	created_at: new Date("2024-03-01T11:00:05Z"),
};

describe("PgTradeStore", () => {
	it("creates both tables", async () => {
		const { pool, calls } = fakePool();
		await new PgTradeStore({ pool, logger: silentLogger() }).ensureSchema();
		expect(calls.map((c) => c.text)).toEqual([...SCHEMA_SQL]);
		expect(calls[2]?.text).toContain("timestamp TIMESTAMPTZ NOT NULL UNIQUE");
	});

	it("inserts a signal and maps the returned row", async () => {
		const { pool, calls } = fakePool([{ rows: [signalRow], rowCount: 1 }]);
		const store = new PgTradeStore({ pool, logger: silentLogger() });
		const record = await store.insertSignal({
			timestamp: signalRow.timestamp,
			action: "open",
			symbol: "BTC",
			side: "long",
			price: Decimal.from("50000.5"),
			leverage: 5,
		});
		expect(calls[0]?.values).toEqual(["2024-03-01T11:00:00.000Z", "open", "BTC", "long", "50000.5", 5]);
		expect(record.price.toString()).toBe("50000.5");
		expect(record.status).toBe(SignalStatus.Pending);
		expect(record.createdAt.toISOString()).toBe("2024-03-01T11:00:05.000Z");
	});

	it("marks status only from pending", async () => {
		const { pool, calls } = fakePool([
			{ rows: [{ id: 7 }], rowCount: 1 },
			{ rows: [], rowCount: 0 },
		]);
		const store = new PgTradeStore({ pool, logger: silentLogger() });
		expect(await store.markSignalStatus(7, SignalStatus.Failed)).toBe(true);
		expect(await store.markSignalStatus(7, SignalStatus.Executed)).toBe(false);
		expect(calls[0]?.text).toBe("UPDATE trade_signals SET executed = $2 WHERE id = $1 AND executed = 0 RETURNING id");
		expect(calls[0]?.values).toEqual([7, 2]);
	});

	it("passes the creation filter and defaults a null leverage", async () => {
		const { pool, calls } = fakePool([{ rows: [{ ...signalRow, leverage: null, executed: "0" }], rowCount: 1 }]);
		const store = new PgTradeStore({ pool, logger: silentLogger() });
		const since = new Date("2024-03-01T00:00:00Z");
		const [pending] = await store.fetchPendingSignals({ createdSince: since });
		expect(calls[0]?.values).toEqual([0, since]);
		expect(pending?.leverage).toBe(1);
	});

	it("rejects a malformed row", async () => {
		const { pool } = fakePool([{ rows: [{ ...signalRow, price: "abc" }], rowCount: 1 }]);
		const store = new PgTradeStore({ pool, logger: silentLogger() });
		await expect(store.getSignal(7)).rejects.toBeInstanceOf(ValidationError);
	});

	it("leaves unreadable rows out of the pending list", async () => {
		const { pool } = fakePool([
			{
				rows: [
					{ ...signalRow, id: 1, price: Number.NaN },
					{ ...signalRow, id: 2, leverage: Number.POSITIVE_INFINITY },
					{ ...signalRow, id: 3 },
				],
				rowCount: 3,
			},
		]);
		const store = new PgTradeStore({ pool, logger: silentLogger() });
		const pending = await store.fetchPendingSignals();
		expect(pending.map((s) => s.id)).toEqual([3]);
	});

	it("treats a conflicting bar insert as a no-op", async () => {
		const { pool, calls } = fakePool([{ rows: [], rowCount: 0 }]);
		const store = new PgTradeStore({ pool, logger: silentLogger() });
		const inserted = await store.insertBar({
			timestamp: "2024-03-01T11:00:00.000Z",
			open: Decimal.from("100"),
			high: Decimal.from("105"),
			low: Decimal.from("95"),
			close: Decimal.from("95"),
			volume: Decimal.from("1.5"),
		});
		expect(inserted).toBe(false);
		expect(calls[0]?.text).toContain("ON CONFLICT (timestamp) DO NOTHING");
	});

	it("returns bars with ISO timestamps", async () => {
		const { pool, calls } = fakePool([
			{
				rows: [
					{ id: 3, timestamp: new Date("2024-03-01T12:00:00Z"), open: 1, high: 2, low: 0.5, close: 1.5, volume: 10 },
				],
				rowCount: 1,
			},
		]);
		const store = new PgTradeStore({ pool, logger: silentLogger() });
		const next = await store.nextBarAfter(2);
		expect(calls[0]?.values).toEqual([2]);
		expect(next?.timestamp).toBe("2024-03-01T12:00:00.000Z");
		expect(next?.low.toString()).toBe("0.5");
	});

	it("reports pruned and consumed counts and ends the pool", async () => {
		const { pool, isEnded } = fakePool([
			{ rows: [], rowCount: 4 },
			{ rows: [], rowCount: 2 },
			{ rows: [], rowCount: null },
		]);
		const store = new PgTradeStore({ pool, logger: silentLogger() });
		expect(await store.pruneBarsBefore(new Date(0))).toBe(4);
		expect(await store.pruneSignalsBefore(new Date(0))).toBe(2);
		expect(await store.consumePendingOpenSignals("BTC")).toBe(0);
		await store.close();
		expect(isEnded()).toBe(true);
	});
});
