/**
 * MemoryTradeStore: in-process signal and bar store for tests and paper runs.
 * Not persisted across restarts.
 */

import { type Clock, SystemClock } from "../shared/time.js";
import {
	type BarRecord,
	type NewBar,
	type NewSignal,
	type PendingSignalQuery,
	type SignalRecord,
	SignalStatus,
	type TerminalStatus,
	type TradeStore,
} from "./types.js";

export interface MemoryTradeStoreConfig {
	readonly clock?: Clock;
}

export class MemoryTradeStore implements TradeStore {
	private readonly clock: Clock;
	private readonly signals: SignalRecord[] = [];
	private readonly bars: BarRecord[] = [];
	private nextSignalId = 1;
	private nextBarId = 1;

	constructor(config?: MemoryTradeStoreConfig) {
		this.clock = config?.clock ?? SystemClock;
	}

	async insertSignal(signal: NewSignal): Promise<SignalRecord> {
		const record: SignalRecord = {
			id: this.nextSignalId++,
			timestamp: signal.timestamp,
			action: signal.action,
			symbol: signal.symbol,
			side: signal.side,
			price: signal.price,
			leverage: signal.leverage ?? 1,
			status: SignalStatus.Pending,
			createdAt: new Date(this.clock.now()),
		};
		this.signals.push(record);
		return record;
	}

	async fetchPendingSignals(query?: PendingSignalQuery): Promise<SignalRecord[]> {
		const since = query?.createdSince?.getTime() ?? Number.NEGATIVE_INFINITY;
		return this.signals.filter((s) => s.status === SignalStatus.Pending && s.createdAt.getTime() >= since);
	}

	async getSignal(id: number): Promise<SignalRecord | null> {
		return this.signals.find((s) => s.id === id) ?? null;
	}

	async markSignalStatus(id: number, status: TerminalStatus): Promise<boolean> {
		const index = this.signals.findIndex((s) => s.id === id);
		const current = this.signals[index];
		if (current === undefined || current.status !== SignalStatus.Pending) {
			return false;
		}
		this.signals[index] = { ...current, status };
		return true;
	}

	async hasPendingOpenSignal(symbol: string): Promise<boolean> {
		return this.signals.some(
			(s) => s.action === "open" && s.symbol === symbol && s.status === SignalStatus.Pending,
		);
	}

	async consumePendingOpenSignals(symbol: string): Promise<number> {
		let count = 0;
		for (const [i, s] of this.signals.entries()) {
			if (s.action === "open" && s.symbol === symbol && s.status === SignalStatus.Pending) {
				this.signals[i] = { ...s, status: SignalStatus.Executed };
				count++;
			}
		}
		return count;
	}

	async latestOpenSignal(symbol: string): Promise<SignalRecord | null> {
		const opens = this.signals.filter((s) => s.action === "open" && s.symbol === symbol);
		return opens[opens.length - 1] ?? null;
	}

	async pruneSignalsBefore(cutoff: Date): Promise<number> {
		return removeWhere(this.signals, (s) => s.createdAt.getTime() < cutoff.getTime());
	}

	async insertBar(bar: NewBar): Promise<boolean> {
		if (this.bars.some((b) => b.timestamp === bar.timestamp)) {
			return false;
		}
		this.bars.push({ ...bar, id: this.nextBarId++ });
		return true;
	}

	async nextBarAfter(lastId: number | null): Promise<BarRecord | null> {
		return this.bars.find((b) => lastId === null || b.id > lastId) ?? null;
	}

	async latestBar(): Promise<BarRecord | null> {
		return this.bars[this.bars.length - 1] ?? null;
	}

	// Bars with an unparsable timestamp are kept.
	async pruneBarsBefore(cutoff: Date): Promise<number> {
		return removeWhere(this.bars, (b) => Date.parse(b.timestamp) < cutoff.getTime());
	}

	async close(): Promise<void> {}
}

function removeWhere<T>(items: T[], predicate: (item: T) => boolean): number {
	const kept = items.filter((item) => !predicate(item));
	const removed = items.length - kept.length;
	items.splice(0, items.length, ...kept);
	return removed;
}
