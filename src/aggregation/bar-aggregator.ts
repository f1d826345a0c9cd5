/**
 * BarAggregator: folds fine candles into coarse bars of a fixed window.
 *
 * A window covers `[floor(T / W) · W, + W)` for the first fine bar's close
 * time T and is keyed by its end. Later fine bars closing at or before the
 * end are folded in; one closing exactly at the end completes the window.
 * A fine bar closing past the end flushes the running window and seeds the
 * next one with its own open price.
 */

import type { Logger } from "../lib/logger/index.js";
import type { NewBar } from "../persistence/types.js";
import { Decimal } from "../shared/decimal.js";
import type { FineBar } from "./types.js";

interface RunningBar {
	readonly endMs: number;
	readonly open: Decimal;
	high: Decimal;
	low: Decimal;
	close: Decimal;
	volume: Decimal;
}

export interface BarAggregatorConfig {
	readonly windowMs: number;
	readonly logger: Logger;
}

export function isValidFineBar(bar: FineBar): boolean {
	return (
		Number.isFinite(bar.closeTimeMs) &&
		bar.high.gte(bar.low) &&
		!bar.volume.isNegative() &&
		!bar.low.isNegative()
	);
}

export class BarAggregator {
	private readonly windowMs: number;
	private readonly logger: Logger;
	private running: RunningBar | null = null;

	constructor(config: BarAggregatorConfig) {
		if (!Number.isInteger(config.windowMs) || config.windowMs <= 0) {
			throw new RangeError(`windowMs must be a positive integer, got ${config.windowMs}`);
		}
		this.windowMs = config.windowMs;
		this.logger = config.logger.child({ component: "bar-aggregator" });
	}

	/** Folds `fine` in; returns the coarse bar it completed, if any. */
	push(fine: FineBar): NewBar | null {
		if (!isValidFineBar(fine)) {
			this.logger.warn({ closeTimeMs: fine.closeTimeMs }, "invalid fine bar skipped");
			return null;
		}

		const current = this.running;
		if (current === null) {
			this.running = this.seed(fine);
			return null;
		}
		if (fine.closeTimeMs <= current.endMs) {
			fold(current, fine);
			if (fine.closeTimeMs < current.endMs) return null;
			this.running = null;
			return toBar(current);
		}
		this.running = this.seed(fine);
		return toBar(current);
	}

	/** The window being built, for inspection. */
	peek(): NewBar | null {
		return this.running === null ? null : toBar(this.running);
	}

	private seed(fine: FineBar): RunningBar {
		const startMs = Math.floor(fine.closeTimeMs / this.windowMs) * this.windowMs;
		const bar: RunningBar = {
			endMs: startMs + this.windowMs,
			open: fine.open,
			high: fine.open,
			low: fine.open,
			close: fine.open,
			volume: Decimal.zero(),
		};
		fold(bar, fine);
		return bar;
	}
}

function fold(bar: RunningBar, fine: FineBar): void {
	bar.high = Decimal.max(bar.high, fine.high);
	bar.low = Decimal.min(bar.low, fine.low);
	bar.close = fine.close;
	bar.volume = bar.volume.add(fine.volume);
}

function toBar(bar: RunningBar): NewBar {
	return {
		timestamp: new Date(bar.endMs).toISOString(),
		open: bar.open,
		high: bar.high,
		low: bar.low,
		close: bar.close,
		volume: bar.volume,
	};
}
