/**
 * PaperGateway: simulated exchange for paper trading.
 *
 * Mid prices and size precision come from a real market-data source; orders,
 * the position and margin live in memory. A limit order fills at its own
 * price as soon as it crosses the current mid (a buy at or above the mid, a
 * sell at or below it), either on placement, on modification or when its
 * status is queried.
 */

import type { Logger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { DataError, type TradingError } from "../shared/errors.js";
import type { Cloid } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type {
	AccountState,
	ExchangeGateway,
	Fill,
	LimitOrderRequest,
	MarketData,
	OpenOrder,
	OrderAck,
	OrderRef,
	OrderStatus,
} from "./types.js";

type Call<T> = Promise<Result<T, TradingError>>;

export interface PaperGatewayConfig {
	readonly market: MarketData;
	readonly margin: Decimal;
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly maxFillHistory?: number;
}

interface PaperOrder {
	readonly oid: number;
	readonly cloid: Cloid | null;
	readonly symbol: string;
	readonly isBuy: boolean;
	readonly reduceOnly: boolean;
	price: Decimal;
	size: Decimal;
	state: "resting" | "filled";
}

interface PaperPosition {
	size: Decimal;
	entryPrice: Decimal;
}

function crosses(order: PaperOrder, mid: Decimal): boolean {
	return order.isBuy ? order.price.gte(mid) : order.price.lte(mid);
}

export class PaperGateway implements ExchangeGateway {
	private readonly market: MarketData;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly maxFillHistory: number;
	private margin: Decimal;
	private nextOid = 1;
	private readonly orders = new Map<number, PaperOrder>();
	private readonly positions = new Map<string, PaperPosition>();
	private readonly leverage = new Map<string, number>();
	private readonly fills: Fill[] = [];

	constructor(config: PaperGatewayConfig) {
		this.market = config.market;
		this.margin = config.margin;
		this.logger = config.logger.child({ component: "paper-gateway" });
		this.clock = config.clock ?? SystemClock;
		this.maxFillHistory = config.maxFillHistory ?? 1_000;
	}

	getMidPrice(symbol: string): Call<Decimal> {
		return this.market.getMidPrice(symbol);
	}

	getSizePrecision(symbol: string): Call<number> {
		return this.market.getSizePrecision(symbol);
	}

	async getAccountState(): Call<AccountState> {
		let used = Decimal.zero();
		for (const [symbol, position] of this.positions) {
			const leverage = Decimal.from(this.leverage.get(symbol) ?? 1);
			used = used.add(position.size.abs().mul(position.entryPrice).div(leverage));
		}
		const withdrawable = Decimal.max(Decimal.zero(), this.margin.sub(used));
		const positions = [...this.positions].map(([symbol, p]) => ({ symbol, size: p.size }));
		return ok({ withdrawable, positions });
	}

	async setLeverage(symbol: string, leverage: number): Call<void> {
		if (!Number.isInteger(leverage) || leverage < 1) {
			return err(new DataError("Leverage must be a positive integer", { symbol, leverage }));
		}
		this.leverage.set(symbol, leverage);
		return ok(undefined);
	}

	async placeLimitOrder(request: LimitOrderRequest): Call<OrderAck> {
		if (!request.size.isPositive() || !request.price.isPositive()) {
			return ok({ kind: "rejected", reason: "Size and price must be positive" });
		}
		if (request.cloid !== undefined && this.findByCloid(request.cloid) !== undefined) {
			return ok({ kind: "rejected", reason: "Duplicate cloid" });
		}
		const size = this.clipReduceOnly(request.symbol, request.isBuy, request.reduceOnly, request.size);
		if (size === null) {
			return ok({ kind: "rejected", reason: "Reduce only order would increase position" });
		}

		const order: PaperOrder = {
			oid: this.nextOid++,
			cloid: request.cloid ?? null,
			symbol: request.symbol,
			isBuy: request.isBuy,
			reduceOnly: request.reduceOnly,
			price: request.price,
			size,
			state: "resting",
		};
		this.orders.set(order.oid, order);
		this.logger.info({ oid: order.oid, price: order.price.toString(), size: size.toString() }, "paper order placed");
		return this.matchAndAck(order);
	}

	async modifyOrder(ref: OrderRef, request: LimitOrderRequest): Call<OrderAck> {
		const order = this.find(ref);
		if (order === undefined || order.state !== "resting") {
			return ok({ kind: "rejected", reason: "Cannot modify a filled or unknown order" });
		}
		order.price = request.price;
		order.size = request.size;
		return this.matchAndAck(order);
	}

	async getOrderStatus(ref: OrderRef): Call<OrderStatus> {
		const order = this.find(ref);
		if (order === undefined) {
			return ok({ kind: "unknown" });
		}
		if (order.state === "resting") {
			const matched = await this.tryMatch(order);
			if (!matched.ok) return matched;
		}
		return order.state === "filled"
			? ok({ kind: "filled", oid: order.oid })
			: ok({ kind: "resting", oid: order.oid, price: order.price });
	}

	async listOpenOrders(): Call<readonly OpenOrder[]> {
		const open: OpenOrder[] = [];
		for (const order of this.orders.values()) {
			if (order.state !== "resting") continue;
			open.push({
				oid: order.oid,
				cloid: order.cloid,
				symbol: order.symbol,
				price: order.price,
				size: order.size,
				isBuy: order.isBuy,
			});
		}
		return ok(open);
	}

	async listRecentFills(): Call<readonly Fill[]> {
		return ok([...this.fills]);
	}

	// ── Matching ─────────────────────────────────────────────────────

	private async matchAndAck(order: PaperOrder): Call<OrderAck> {
		const matched = await this.tryMatch(order);
		if (!matched.ok) return matched;
		return ok(
			order.state === "filled"
				? { kind: "filled", oid: order.oid, totalSize: order.size, avgPrice: order.price }
				: { kind: "resting", oid: order.oid },
		);
	}

	private async tryMatch(order: PaperOrder): Call<void> {
		const mid = await this.market.getMidPrice(order.symbol);
		if (!mid.ok) return mid;
		if (crosses(order, mid.value)) {
			this.fill(order);
		}
		return ok(undefined);
	}

	private fill(order: PaperOrder): void {
		order.state = "filled";
		const signed = order.isBuy ? order.size : order.size.neg();
		const current = this.positions.get(order.symbol);

		if (current === undefined || current.size.isZero()) {
			this.positions.set(order.symbol, { size: signed, entryPrice: order.price });
		} else if (current.size.isPositive() === signed.isPositive()) {
			const total = current.size.add(signed);
			const notional = current.size.abs().mul(current.entryPrice).add(order.size.mul(order.price));
			this.positions.set(order.symbol, { size: total, entryPrice: notional.div(total.abs()) });
		} else {
			const closed = Decimal.min(current.size.abs(), order.size);
			const direction = current.size.isPositive() ? Decimal.one() : Decimal.one().neg();
			this.margin = this.margin.add(order.price.sub(current.entryPrice).mul(closed).mul(direction));
			const remaining = current.size.add(signed);
			if (remaining.isZero()) {
				this.positions.delete(order.symbol);
			} else if (remaining.isPositive() === current.size.isPositive()) {
				this.positions.set(order.symbol, { size: remaining, entryPrice: current.entryPrice });
			} else {
				this.positions.set(order.symbol, { size: remaining, entryPrice: order.price });
			}
		}

		this.fills.push({
			oid: order.oid,
			cloid: order.cloid,
			symbol: order.symbol,
			price: order.price,
			size: order.size,
			isBuy: order.isBuy,
			timeMs: this.clock.now(),
		});
		if (this.fills.length > this.maxFillHistory) {
			this.fills.shift();
		}
		this.logger.info({ oid: order.oid, price: order.price.toString(), size: order.size.toString() }, "paper order filled");
	}

	// ── Lookup ───────────────────────────────────────────────────────

	/** Size a reduce-only order may take, or null when it would not reduce anything. */
	private clipReduceOnly(symbol: string, isBuy: boolean, reduceOnly: boolean, size: Decimal): Decimal | null {
		if (!reduceOnly) return size;
		const position = this.positions.get(symbol)?.size ?? Decimal.zero();
		const reduces = isBuy ? position.isNegative() : position.isPositive();
		return reduces ? Decimal.min(size, position.abs()) : null;
	}

	private find(ref: OrderRef): PaperOrder | undefined {
		return ref.kind === "oid" ? this.orders.get(ref.oid) : this.findByCloid(ref.cloid);
	}

	private findByCloid(cloid: Cloid): PaperOrder | undefined {
		for (const order of this.orders.values()) {
			if (order.cloid === cloid) return order;
		}
		return undefined;
	}
}
