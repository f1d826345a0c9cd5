/**
 * DecisionProcess: reads each new coarse bar once and turns the IBS rule
 * into signals.
 *
 * Flat, with no open signal already pending and IBS below the threshold:
 * write a long `open` signal sized by the leverage curve. In a trade for at
 * least one window: write a `close` signal and consume the pending opens.
 * Either way the executor runs straight after the write.
 *
 * Trade state is held in memory; `reconcile()` rebuilds it from the live
 * position and the signal history after a restart.
 */

import type { RunSummary } from "../execution/types.js";
import type { ExchangeGateway } from "../gateway/types.js";
import { positionSize } from "../gateway/types.js";
import type { Logger } from "../lib/logger/index.js";
import type { BarRecord, BarStore, SignalStore } from "../persistence/types.js";
import type { TradingError } from "../shared/errors.js";
import { PositionSide } from "../shared/position-side.js";
import { type Result, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { calculateIbs, determineLeverage } from "./ibs.js";

/** What the decision process needs from the executor. */
export interface SignalRunner {
	runOnce(): Promise<RunSummary>;
}

export interface DecisionConfig {
	readonly symbol: string;
	readonly entryThreshold: number;
	readonly leverageBase: number;
	readonly leverageExponent: number;
	/** Minimum time in a trade before it is closed. */
	readonly windowMs: number;
}

export interface DecisionProcessDeps {
	readonly store: SignalStore & BarStore;
	readonly gateway: ExchangeGateway;
	readonly executor: SignalRunner;
	readonly logger: Logger;
	readonly clock?: Clock;
}

export type TradeState = { readonly kind: "flat" } | { readonly kind: "in_trade"; readonly entryTimeMs: number };

export class DecisionProcess {
	private readonly store: SignalStore & BarStore;
	private readonly gateway: ExchangeGateway;
	private readonly executor: SignalRunner;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly config: DecisionConfig;
	private trade: TradeState = { kind: "flat" };
	private lastBarId: number | null = null;

	constructor(deps: DecisionProcessDeps, config: DecisionConfig) {
		this.store = deps.store;
		this.gateway = deps.gateway;
		this.executor = deps.executor;
		this.logger = deps.logger.child({ component: "decision", symbol: config.symbol });
		this.clock = deps.clock ?? SystemClock;
		this.config = config;
	}

	get state(): TradeState {
		return this.trade;
	}

	get cursor(): number | null {
		return this.lastBarId;
	}

	/**
	 * Rebuilds trade state from the exchange and the stores: a non-zero
	 * position means in a trade since the latest open signal, and only bars
	 * stored from now on are considered.
	 */
	async reconcile(): Promise<Result<TradeState, TradingError>> {
		const account = await this.gateway.getAccountState();
		if (!account.ok) return account;

		const position = positionSize(account.value, this.config.symbol);
		if (position.isZero()) {
			this.trade = { kind: "flat" };
		} else {
			const latestOpen = await this.store.latestOpenSignal(this.config.symbol);
			const signalTime = latestOpen === null ? Number.NaN : Date.parse(latestOpen.timestamp);
			const entryTimeMs = Number.isFinite(signalTime) ? signalTime : this.clock.now();
			this.trade = { kind: "in_trade", entryTimeMs };
		}

		const latestBar = await this.store.latestBar();
		this.lastBarId = latestBar?.id ?? null;
		this.logger.info(
			{ state: this.trade.kind, position: position.toString(), cursor: this.lastBarId },
			"decision state reconciled",
		);
		return ok(this.trade);
	}

	/** Handles the next unseen bar. Resolves false when there is none. */
	async pollOnce(): Promise<boolean> {
		const bar = await this.store.nextBarAfter(this.lastBarId);
		if (bar === null) return false;
		this.lastBarId = bar.id;
		try {
			await this.process(bar);
		} catch (error) {
			this.logger.error({ err: error, barId: bar.id }, "bar processing failed");
		}
		return true;
	}

	private async process(bar: BarRecord): Promise<void> {
		const timeMs = Date.parse(bar.timestamp);
		if (!Number.isFinite(timeMs)) {
			this.logger.warn({ barId: bar.id, timestamp: bar.timestamp }, "bar with unparsable timestamp skipped");
			return;
		}
		if (bar.high.lt(bar.low)) {
			this.logger.warn({ barId: bar.id }, "bar with high below low skipped");
			return;
		}

		const ibs = calculateIbs(bar);
		this.logger.info({ barId: bar.id, timestamp: bar.timestamp, ibs }, "bar evaluated");

		if (this.trade.kind === "flat") {
			await this.maybeOpen(bar, ibs, timeMs);
		} else if (timeMs - this.trade.entryTimeMs >= this.config.windowMs) {
			await this.close(bar);
		}
	}

	private async maybeOpen(bar: BarRecord, ibs: number, timeMs: number): Promise<void> {
		const { symbol } = this.config;
		if (await this.store.hasPendingOpenSignal(symbol)) {
			this.logger.info("open signal already pending, no new entry");
			return;
		}
		if (ibs >= this.config.entryThreshold) return;

		const leverage = determineLeverage(ibs, this.config.leverageBase, this.config.leverageExponent);
		const signal = await this.store.insertSignal({
			timestamp: bar.timestamp,
			action: "open",
			symbol,
			side: PositionSide.Long,
			price: bar.close,
			leverage,
		});
		this.trade = { kind: "in_trade", entryTimeMs: timeMs };
		this.logger.info({ signalId: signal.id, ibs, leverage }, "open signal written");
		await this.execute();
	}

	private async close(bar: BarRecord): Promise<void> {
		const { symbol } = this.config;
		const signal = await this.store.insertSignal({
			timestamp: bar.timestamp,
			action: "close",
			symbol,
			side: PositionSide.Long,
			price: bar.close,
		});
		const consumed = await this.store.consumePendingOpenSignals(symbol);
		this.trade = { kind: "flat" };
		this.logger.info({ signalId: signal.id, consumed }, "close signal written");
		await this.execute();
	}

	private async execute(): Promise<void> {
		try {
			const summary = await this.executor.runOnce();
			this.logger.info({ ...summary }, "executor pass finished");
		} catch (error) {
			this.logger.error({ err: error }, "executor pass failed");
		}
	}
}
