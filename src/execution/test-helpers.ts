/**
 * Shared fakes for execution tests: a gateway whose answers are queued per
 * operation, falling back to a default once a queue is empty.
 */

import type {
	AccountState,
	ExchangeGateway,
	Fill,
	LimitOrderRequest,
	OpenOrder,
	OrderAck,
	OrderRef,
	OrderStatus,
} from "../gateway/types.js";
import { silentLogger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { NetworkError, type TradingError } from "../shared/errors.js";
import { cloid } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import type { ChaseConfig } from "./types.js";

type Reply<T> = Result<T, TradingError>;

export class Script<T> {
	private readonly pending: Reply<T>[] = [];
	private fallback: Reply<T>;

	constructor(fallback: Reply<T>) {
		this.fallback = fallback;
	}

	enqueue(...replies: Reply<T>[]): this {
		this.pending.push(...replies);
		return this;
	}

	always(reply: Reply<T>): this {
		this.fallback = reply;
		return this;
	}

	next(): Reply<T> {
		return this.pending.shift() ?? this.fallback;
	}
}

export const TEST_CLOID = cloid("0x000000000000000000000000000000aa");

export const networkDown = (): Reply<never> => err(new NetworkError("connection reset"));

export function account(position: string | null, withdrawable = "1000"): AccountState {
	return {
		withdrawable: Decimal.from(withdrawable),
		positions: position === null ? [] : [{ symbol: "BTC", size: Decimal.from(position) }],
	};
}

export function fill(overrides: Partial<Fill> = {}): Fill {
	return {
		oid: 1,
		cloid: TEST_CLOID,
		symbol: "BTC",
		price: Decimal.from("50000"),
		size: Decimal.from("0.01"),
		isBuy: true,
		timeMs: 0,
		...overrides,
	};
}

export function openOrder(overrides: Partial<OpenOrder> = {}): OpenOrder {
	return {
		oid: 1,
		cloid: TEST_CLOID,
		symbol: "BTC",
		price: Decimal.from("50000"),
		size: Decimal.from("0.01"),
		isBuy: true,
		...overrides,
	};
}

export class ScriptedGateway implements ExchangeGateway {
	readonly mid = new Script<Decimal>(ok(Decimal.from("50000")));
	readonly account = new Script<AccountState>(ok(account(null)));
	readonly precision = new Script<number>(ok(3));
	readonly leverage = new Script<void>(ok(undefined));
	readonly place = new Script<OrderAck>(ok({ kind: "resting", oid: 1 }));
	readonly modify = new Script<OrderAck>(ok({ kind: "resting", oid: 1 }));
	readonly status = new Script<OrderStatus>(ok({ kind: "resting", oid: 1, price: Decimal.from("50000") }));
	readonly openOrders = new Script<readonly OpenOrder[]>(ok([]));
	readonly fills = new Script<readonly Fill[]>(ok([]));

	readonly placed: LimitOrderRequest[] = [];
	readonly modified: Array<{ ref: OrderRef; request: LimitOrderRequest }> = [];
	readonly statusQueries: OrderRef[] = [];
	readonly leverageCalls: Array<{ symbol: string; leverage: number }> = [];

	async getMidPrice(): Promise<Reply<Decimal>> {
		return this.mid.next();
	}

	async getAccountState(): Promise<Reply<AccountState>> {
		return this.account.next();
	}

	async getSizePrecision(): Promise<Reply<number>> {
		return this.precision.next();
	}

	async setLeverage(symbol: string, leverage: number): Promise<Reply<void>> {
		this.leverageCalls.push({ symbol, leverage });
		return this.leverage.next();
	}

	async placeLimitOrder(request: LimitOrderRequest): Promise<Reply<OrderAck>> {
		this.placed.push(request);
		return this.place.next();
	}

	async modifyOrder(ref: OrderRef, request: LimitOrderRequest): Promise<Reply<OrderAck>> {
		this.modified.push({ ref, request });
		return this.modify.next();
	}

	async getOrderStatus(ref: OrderRef): Promise<Reply<OrderStatus>> {
		this.statusQueries.push(ref);
		return this.status.next();
	}

	async listOpenOrders(): Promise<Reply<readonly OpenOrder[]>> {
		return this.openOrders.next();
	}

	async listRecentFills(): Promise<Reply<readonly Fill[]>> {
		return this.fills.next();
	}
}

export const TEST_CHASE: ChaseConfig = {
	maxRequotes: 2,
	requoteIntervalMs: 1_000,
	fillTolerance: 0.1,
	priceDecimals: 0,
};

export function chaseDeps(gateway: ExchangeGateway) {
	const clock = new FakeClock(0);
	return { clock, deps: { gateway, logger: silentLogger(), sleep: clock.sleep, newCloid: () => TEST_CLOID } };
}
