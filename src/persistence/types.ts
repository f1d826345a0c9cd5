/**
 * Signal and bar storage.
 *
 * Signals behave like a queue: the decision process appends, the executor
 * takes pending entries in id order and settles each one exactly once.
 * Bars are keyed by their window end timestamp; a second insert for the
 * same window is a no-op.
 */

import type { Decimal } from "../shared/decimal.js";

export const SignalStatus = {
	Pending: 0,
	Executed: 1,
	Failed: 2,
} as const;

export type SignalStatus = (typeof SignalStatus)[keyof typeof SignalStatus];

/** The two terminal states a pending signal may move to. */
export type TerminalStatus = typeof SignalStatus.Executed | typeof SignalStatus.Failed;

export function isTerminalStatus(status: SignalStatus): status is TerminalStatus {
	return status !== SignalStatus.Pending;
}

export interface NewSignal {
	/** ISO-8601 timestamp of the bar that produced the signal. */
	readonly timestamp: string;
	readonly action: string;
	readonly symbol: string;
	readonly side: string;
	readonly price: Decimal;
	readonly leverage?: number;
}

/**
 * A stored signal. `action` and `side` stay raw strings: rows written by
 * other tools are narrowed by the executor, not rejected on read.
 */
export interface SignalRecord {
	readonly id: number;
	readonly timestamp: string;
	readonly action: string;
	readonly symbol: string;
	readonly side: string;
	readonly price: Decimal;
	readonly leverage: number;
	readonly status: SignalStatus;
	readonly createdAt: Date;
}

export interface NewBar {
	/** ISO-8601 window end. */
	readonly timestamp: string;
	readonly open: Decimal;
	readonly high: Decimal;
	readonly low: Decimal;
	readonly close: Decimal;
	readonly volume: Decimal;
}

export interface BarRecord extends NewBar {
	readonly id: number;
}

export interface PendingSignalQuery {
	/** Only signals created at or after this instant. */
	readonly createdSince?: Date;
}

export interface SignalStore {
	insertSignal(signal: NewSignal): Promise<SignalRecord>;
	/** Pending signals, ascending by id. Rows that cannot be read are logged and left out. */
	fetchPendingSignals(query?: PendingSignalQuery): Promise<SignalRecord[]>;
	getSignal(id: number): Promise<SignalRecord | null>;
	/** Settles a pending signal. Resolves false when it was not pending. */
	markSignalStatus(id: number, status: TerminalStatus): Promise<boolean>;
	hasPendingOpenSignal(symbol: string): Promise<boolean>;
	/** Marks every pending open signal for `symbol` executed; resolves the count. */
	consumePendingOpenSignals(symbol: string): Promise<number>;
	/** Most recent open signal for `symbol`, whatever its status. */
	latestOpenSignal(symbol: string): Promise<SignalRecord | null>;
	pruneSignalsBefore(cutoff: Date): Promise<number>;
}

export interface BarStore {
	/** Resolves false when a bar with the same timestamp already exists. */
	insertBar(bar: NewBar): Promise<boolean>;
	/** First bar with an id greater than `lastId`; the first bar when null. */
	nextBarAfter(lastId: number | null): Promise<BarRecord | null>;
	latestBar(): Promise<BarRecord | null>;
	/** Deletes bars whose window ended before `cutoff`. */
	pruneBarsBefore(cutoff: Date): Promise<number>;
}

export interface TradeStore extends SignalStore, BarStore {
	close(): Promise<void>;
}
