import type { Logger } from "../lib/logger/index.js";
import type { BarStore, SignalStore } from "../persistence/types.js";
import { type Clock, Duration } from "../shared/time.js";

export interface PruneReport {
	readonly cutoff: Date;
	readonly signals: number;
	readonly bars: number;
}

/**
 * Deletes signals and bars older than `retentionDays`. Signals are cut on
 * their creation time, bars on their window end.
 */
export async function pruneHistory(
	store: SignalStore & BarStore,
	retentionDays: number,
	clock: Clock,
	logger?: Logger,
): Promise<PruneReport> {
	if (!Number.isFinite(retentionDays) || retentionDays <= 0) {
		throw new RangeError(`retentionDays must be positive, got ${retentionDays}`);
	}
	const cutoff = new Date(clock.now() - Duration.days(retentionDays));
	const signals = await store.pruneSignalsBefore(cutoff);
	const bars = await store.pruneBarsBefore(cutoff);
	logger?.info({ cutoff: cutoff.toISOString(), signals, bars }, "history pruned");
	return { cutoff, signals, bars };
}
