/**
 * SignalExecutor: drains pending signals in id order and settles each one.
 *
 * A pass handles one signal at a time. Concurrent `runOnce` calls queue
 * behind the pass in flight. Every signal is re-read before it is handled so
 * a signal settled elsewhere is never acted on twice. A throw while handling
 * one signal leaves it pending and the pass moves on.
 */

import type { ExchangeGateway } from "../gateway/types.js";
import { positionSize } from "../gateway/types.js";
import type { Logger } from "../lib/logger/index.js";
import { type SignalRecord, SignalStatus, type SignalStore, type TerminalStatus } from "../persistence/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { Cloid } from "../shared/identifiers.js";
import { isBuy, isPositionSide, oppositeSide, type PositionSide, sideOfPosition } from "../shared/position-side.js";
import { type Clock, type Sleep, SystemClock, sleep as realSleep } from "../shared/time.js";
import { chaseOrder } from "./chase.js";
import { computeOpenSize, roundPrice, roundSize } from "./sizing.js";
import { type ChaseConfig, type ChaseOutcome, type RunSummary, isChaseSuccess } from "./types.js";

export interface SignalExecutorConfig {
	readonly store: SignalStore;
	readonly gateway: ExchangeGateway;
	readonly logger: Logger;
	readonly chase: ChaseConfig;
	/** Fraction of the computed open size actually ordered. */
	readonly bufferFactor: number;
	/** Ignore pending signals older than this; 0 disables the filter. */
	readonly signalMaxAgeMs?: number;
	readonly clock?: Clock;
	readonly sleep?: Sleep;
	readonly newCloid?: () => Cloid;
}

type Outcome = { readonly status: TerminalStatus; readonly reason: string };
type Settlement = Outcome | { readonly status: "leave_pending" };
type Summary = { executed: number[]; failed: number[]; skipped: number[] };

const executed = (reason: string): Outcome => ({ status: SignalStatus.Executed, reason });
const failed = (reason: string): Outcome => ({ status: SignalStatus.Failed, reason });

function describeOutcome(outcome: ChaseOutcome): string {
	switch (outcome.kind) {
		case "filled":
			return `filled via ${outcome.via}`;
		case "filled_fallback":
			return "filled (position fallback)";
		case "resting_exhausted":
			return "resting after re-quote budget";
		case "failed":
			return outcome.detail === undefined ? outcome.reason : `${outcome.reason}: ${outcome.detail}`;
	}
}

export class SignalExecutor {
	private readonly store: SignalStore;
	private readonly gateway: ExchangeGateway;
	private readonly logger: Logger;
	private readonly chase: ChaseConfig;
	private readonly bufferFactor: number;
	private readonly signalMaxAgeMs: number;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private readonly newCloid: (() => Cloid) | undefined;
	private queue: Promise<unknown> = Promise.resolve();
	/** Signals handled whose status write has not succeeded yet. */
	private readonly unrecorded = new Map<number, Outcome>();

	constructor(config: SignalExecutorConfig) {
		this.store = config.store;
		this.gateway = config.gateway;
		this.logger = config.logger.child({ component: "signal-executor" });
		this.chase = config.chase;
		this.bufferFactor = config.bufferFactor;
		this.signalMaxAgeMs = config.signalMaxAgeMs ?? 0;
		this.clock = config.clock ?? SystemClock;
		this.sleep = config.sleep ?? realSleep;
		this.newCloid = config.newCloid;
	}

	/** Processes every pending signal once. Rejects only when the pending list cannot be read. */
	runOnce(): Promise<RunSummary> {
		const run = this.queue.then(() => this.pass());
		this.queue = run.catch(() => undefined);
		return run;
	}

	private async pass(): Promise<RunSummary> {
		const createdSince =
			this.signalMaxAgeMs > 0 ? { createdSince: new Date(this.clock.now() - this.signalMaxAgeMs) } : undefined;
		const pending = await this.store.fetchPendingSignals(createdSince);
		const summary: Summary = { executed: [], failed: [], skipped: [] };

		for (const { id } of pending) {
			const log = this.logger.child({ signalId: id });
			const settled = this.unrecorded.get(id);
			if (settled !== undefined) {
				// already acted on; only the status write is retried
				await this.record(id, settled, log, summary);
				continue;
			}
			try {
				const signal = await this.store.getSignal(id);
				if (signal === null || signal.status !== SignalStatus.Pending) {
					log.debug("signal no longer pending");
					summary.skipped.push(id);
					continue;
				}

				const settlement = await this.handle(signal, log);
				if (settlement.status === "leave_pending") {
					summary.skipped.push(id);
					continue;
				}
				this.unrecorded.set(id, settlement);
				await this.record(id, settlement, log, summary);
			} catch (error) {
				log.error({ err: error }, "signal handling threw, left pending");
				summary.skipped.push(id);
			}
		}
		return summary;
	}

	private async record(id: number, outcome: Outcome, log: Logger, summary: Summary): Promise<void> {
		let marked: boolean;
		try {
			marked = await this.store.markSignalStatus(id, outcome.status);
		} catch (error) {
			log.error({ err: error, reason: outcome.reason }, "status write failed, retried next pass");
			summary.skipped.push(id);
			return;
		}
		this.unrecorded.delete(id);
		if (!marked) {
			log.warn("signal was settled concurrently");
			summary.skipped.push(id);
			return;
		}
		const label = outcome.status === SignalStatus.Executed ? "executed" : "failed";
		summary[label].push(id);
		log.info({ reason: outcome.reason }, `signal ${label}`);
	}

	private async handle(signal: SignalRecord, log: Logger): Promise<Settlement> {
		if (!isPositionSide(signal.side)) {
			log.error({ side: signal.side }, "unrecognised signal side");
			return { status: "leave_pending" };
		}
		switch (signal.action) {
			case "open":
				return this.open(signal, signal.side, log);
			case "close":
				return this.close(signal, log);
			default:
				log.error({ action: signal.action }, "unrecognised signal action");
				return { status: "leave_pending" };
		}
	}

	private async open(signal: SignalRecord, side: PositionSide, log: Logger): Promise<Settlement> {
		const { gateway } = this;
		if (!Number.isFinite(signal.leverage)) {
			log.error({ leverage: signal.leverage }, "signal leverage is not a number");
			return { status: "leave_pending" };
		}
		const leverage = Math.max(1, Math.trunc(signal.leverage));

		const leverageSet = await gateway.setLeverage(signal.symbol, leverage);
		if (!leverageSet.ok) {
			log.warn({ err: leverageSet.error, leverage }, "set leverage failed, continuing");
		}

		const account = await gateway.getAccountState();
		if (!account.ok) return failed(`account unavailable: ${account.error.message}`);
		const mid = await gateway.getMidPrice(signal.symbol);
		if (!mid.ok) return failed(`mid unavailable: ${mid.error.message}`);
		const szDecimals = await gateway.getSizePrecision(signal.symbol);
		if (!szDecimals.ok) return failed(`size precision unavailable: ${szDecimals.error.message}`);

		const size = computeOpenSize(account.value.withdrawable, leverage, mid.value, this.bufferFactor, szDecimals.value);
		if (!size.isPositive()) {
			log.warn({ withdrawable: account.value.withdrawable.toString() }, "insufficient margin");
			return failed("insufficient margin");
		}

		const price = roundPrice(mid.value, this.chase.priceDecimals);
		const outcome = await this.runChase(log, signal.symbol, isBuy(side), size, price, false);
		return isChaseSuccess(outcome) ? executed(describeOutcome(outcome)) : failed(describeOutcome(outcome));
	}

	private async close(signal: SignalRecord, log: Logger): Promise<Settlement> {
		const { gateway } = this;
		const account = await gateway.getAccountState();
		if (!account.ok) return failed(`account unavailable: ${account.error.message}`);

		const position = positionSize(account.value, signal.symbol);
		const held = sideOfPosition(position);
		if (held === null) {
			log.info("no position to close");
			return executed("already flat");
		}

		const szDecimals = await gateway.getSizePrecision(signal.symbol);
		if (!szDecimals.ok) return failed(`size precision unavailable: ${szDecimals.error.message}`);
		const size = roundSize(position.abs(), szDecimals.value);
		if (!size.isPositive()) {
			return failed(`position ${position.toString()} is below size precision`);
		}

		const mid = await gateway.getMidPrice(signal.symbol);
		if (!mid.ok) return failed(`mid unavailable: ${mid.error.message}`);

		const price = roundPrice(mid.value, this.chase.priceDecimals);
		const outcome = await this.runChase(log, signal.symbol, isBuy(oppositeSide(held)), size, price, true);
		return isChaseSuccess(outcome) ? executed(describeOutcome(outcome)) : failed(describeOutcome(outcome));
	}

	private runChase(log: Logger, symbol: string, buy: boolean, size: Decimal, price: Decimal, reduceOnly: boolean) {
		return chaseOrder(
			{
				gateway: this.gateway,
				logger: log,
				sleep: this.sleep,
				...(this.newCloid !== undefined && { newCloid: this.newCloid }),
			},
			{ symbol, isBuy: buy, size, price, reduceOnly },
			this.chase,
		);
	}
}
