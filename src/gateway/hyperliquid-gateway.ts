import type {
	ExchangeResponse,
	HyperliquidClient,
	OrderStatusEntry,
	UserFill,
	WireOpenOrder,
} from "../lib/hyperliquid/index.js";
import { orderToWire } from "../lib/hyperliquid/index.js";
import type { Logger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { DataError, OrderRejectedError, type TradingError, classifyError } from "../shared/errors.js";
import { type Cloid, type WalletAddress, cloid } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { HyperliquidMarketData, parseDecimal } from "./hyperliquid-market-data.js";
import type {
	AccountState,
	ExchangeGateway,
	Fill,
	LimitOrderRequest,
	OpenOrder,
	OrderAck,
	OrderRef,
	OrderStatus,
	Position,
} from "./types.js";

export interface HyperliquidGatewayConfig {
	readonly client: HyperliquidClient;
	/** Account whose margin, positions, orders and fills are read. */
	readonly account: WalletAddress;
	readonly logger: Logger;
	readonly clock?: Clock;
	/** How long instrument metadata is reused before it is fetched again. */
	readonly metaTtlMs?: number;
}

type Call<T> = Promise<Result<T, TradingError>>;

function toCloid(raw: string | null | undefined): Cloid | null {
	if (raw === null || raw === undefined) return null;
	try {
		return cloid(raw);
	} catch {
		return null;
	}
}

/** Exchange order state string to the engine's coarse status. */
export function classifyOrderState(oid: number, state: string, limitPx: string): OrderStatus {
	if (state === "open" || state === "triggered") {
		const price = Decimal.tryFrom(limitPx);
		return price === null ? { kind: "unknown" } : { kind: "resting", oid, price };
	}
	if (state === "filled") {
		return { kind: "filled", oid };
	}
	const lowered = state.toLowerCase();
	if (lowered.includes("canceled") || lowered.includes("rejected")) {
		return { kind: "canceled", oid, reason: state };
	}
	return { kind: "unknown" };
}

/** First status of an /exchange reply as an OrderAck; an "err" envelope is an error. */
export function ackFromResponse(response: ExchangeResponse): Result<OrderAck, TradingError> {
	if (response.status === "err") {
		return err(new OrderRejectedError(response.response));
	}
	const first: OrderStatusEntry | undefined = response.response.data?.statuses[0];
	if (first === undefined || first === "success") {
		return ok({ kind: "accepted" });
	}
	if ("resting" in first) {
		return ok({ kind: "resting", oid: first.resting.oid });
	}
	if ("filled" in first) {
		const totalSize = Decimal.tryFrom(first.filled.totalSz);
		const avgPrice = Decimal.tryFrom(first.filled.avgPx);
		if (totalSize === null || avgPrice === null) {
			return err(new DataError("Unparsable fill in order acknowledgement", { filled: first.filled }));
		}
		return ok({ kind: "filled", oid: first.filled.oid, totalSize, avgPrice });
	}
	return ok({ kind: "rejected", reason: first.error });
}

/**
 * ExchangeGateway over the Hyperliquid REST API, bound to one account.
 * Market data reads go through HyperliquidMarketData.
 */
export class HyperliquidGateway implements ExchangeGateway {
	private readonly client: HyperliquidClient;
	private readonly account: WalletAddress;
	private readonly logger: Logger;
	private readonly market: HyperliquidMarketData;

	constructor(config: HyperliquidGatewayConfig) {
		this.client = config.client;
		this.account = config.account;
		this.logger = config.logger.child({ component: "hyperliquid-gateway" });
		this.market = new HyperliquidMarketData({
			client: config.client,
			...(config.clock !== undefined && { clock: config.clock }),
			...(config.metaTtlMs !== undefined && { metaTtlMs: config.metaTtlMs }),
		});
	}

	getMidPrice(symbol: string): Call<Decimal> {
		return this.market.getMidPrice(symbol);
	}

	async getAccountState(): Call<AccountState> {
		const state = await this.client.clearinghouseState(this.account);
		if (!state.ok) return state;

		const withdrawable = parseDecimal(state.value.withdrawable, "withdrawable");
		if (!withdrawable.ok) return withdrawable;

		const positions: Position[] = [];
		for (const { position } of state.value.assetPositions) {
			const size = parseDecimal(position.szi, "szi");
			if (!size.ok) return size;
			positions.push({ symbol: position.coin, size: size.value });
		}
		return ok({ withdrawable: withdrawable.value, positions });
	}

	getSizePrecision(symbol: string): Call<number> {
		return this.market.getSizePrecision(symbol);
	}

	async setLeverage(symbol: string, leverage: number): Call<void> {
		const asset = await this.market.assetInfo(symbol);
		if (!asset.ok) return asset;
		const response = await this.client.updateLeverage(asset.value.index, leverage, true);
		if (!response.ok) return response;
		if (response.value.status === "err") {
			return err(new OrderRejectedError(response.value.response, { symbol, leverage }));
		}
		this.logger.debug({ symbol, leverage }, "leverage updated");
		return ok(undefined);
	}

	async placeLimitOrder(request: LimitOrderRequest): Call<OrderAck> {
		const asset = await this.market.assetInfo(request.symbol);
		if (!asset.ok) return asset;
		let wire: ReturnType<typeof orderToWire>;
		try {
			wire = this.toWire(asset.value.index, request);
		} catch (e) {
			return err(classifyError(e));
		}
		const response = await this.client.placeOrders([wire]);
		return response.ok ? ackFromResponse(response.value) : response;
	}

	async modifyOrder(ref: OrderRef, request: LimitOrderRequest): Call<OrderAck> {
		const asset = await this.market.assetInfo(request.symbol);
		if (!asset.ok) return asset;
		let wire: ReturnType<typeof orderToWire>;
		try {
			wire = this.toWire(asset.value.index, request);
		} catch (e) {
			return err(classifyError(e));
		}
		const response = await this.client.modifyOrder(ref.kind === "oid" ? ref.oid : ref.cloid, wire);
		return response.ok ? ackFromResponse(response.value) : response;
	}

	async getOrderStatus(ref: OrderRef): Call<OrderStatus> {
		const response = await this.client.orderStatus(this.account, ref.kind === "oid" ? ref.oid : ref.cloid);
		if (!response.ok) return response;
		if (response.value.status === "unknownOid") {
			return ok({ kind: "unknown" });
		}
		const { order, status } = response.value.order;
		return ok(classifyOrderState(order.oid, status, order.limitPx));
	}

	async listOpenOrders(): Call<readonly OpenOrder[]> {
		const response = await this.client.openOrders(this.account);
		if (!response.ok) return response;
		const orders: OpenOrder[] = [];
		for (const wire of response.value) {
			const parsed = this.openOrderFromWire(wire);
			if (!parsed.ok) return parsed;
			orders.push(parsed.value);
		}
		return ok(orders);
	}

	async listRecentFills(): Call<readonly Fill[]> {
		const response = await this.client.userFills(this.account);
		if (!response.ok) return response;
		const fills: Fill[] = [];
		for (const wire of response.value) {
			const parsed = this.fillFromWire(wire);
			if (!parsed.ok) return parsed;
			fills.push(parsed.value);
		}
		return ok(fills);
	}

	// ── Helpers ──────────────────────────────────────────────────────

	private toWire(asset: number, request: LimitOrderRequest) {
		return orderToWire({
			asset,
			isBuy: request.isBuy,
			price: request.price,
			size: request.size,
			reduceOnly: request.reduceOnly,
			...(request.cloid !== undefined && { cloid: request.cloid }),
		});
	}

	private openOrderFromWire(wire: WireOpenOrder): Result<OpenOrder, DataError> {
		const price = parseDecimal(wire.limitPx, "limitPx");
		if (!price.ok) return price;
		const size = parseDecimal(wire.sz, "sz");
		if (!size.ok) return size;
		return ok({
			oid: wire.oid,
			cloid: toCloid(wire.cloid),
			symbol: wire.coin,
			price: price.value,
			size: size.value,
			isBuy: wire.side === "B",
		});
	}

	private fillFromWire(wire: UserFill): Result<Fill, DataError> {
		const price = parseDecimal(wire.px, "px");
		if (!price.ok) return price;
		const size = parseDecimal(wire.sz, "sz");
		if (!size.ok) return size;
		return ok({
			oid: wire.oid,
			cloid: toCloid(wire.cloid),
			symbol: wire.coin,
			price: price.value,
			size: size.value,
			isBuy: wire.side === "B",
			timeMs: wire.time,
		});
	}
}
