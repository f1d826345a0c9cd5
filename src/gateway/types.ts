/**
 * Exchange gateway: everything the execution engine may ask of the venue.
 *
 * Every operation resolves to a Result. Transport failures, rejections and
 * malformed payloads arrive as TradingErrors; the engine never sees a throw.
 */

import { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { Cloid } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

export interface Position {
	readonly symbol: string;
	/** Positive long, negative short. */
	readonly size: Decimal;
}

export interface AccountState {
	readonly withdrawable: Decimal;
	readonly positions: readonly Position[];
}

/** Either identifier the exchange accepts for an order. */
export type OrderRef = { readonly kind: "oid"; readonly oid: number } | { readonly kind: "cloid"; readonly cloid: Cloid };

export interface LimitOrderRequest {
	readonly symbol: string;
	readonly isBuy: boolean;
	readonly size: Decimal;
	readonly price: Decimal;
	readonly reduceOnly: boolean;
	readonly cloid?: Cloid;
}

/** Immediate answer to a placement or modification. */
export type OrderAck =
	| { readonly kind: "resting"; readonly oid: number }
	| { readonly kind: "filled"; readonly oid: number; readonly totalSize: Decimal; readonly avgPrice: Decimal }
	/** Acknowledged without an order state, e.g. a modify answered with "success". */
	| { readonly kind: "accepted" }
	| { readonly kind: "rejected"; readonly reason: string };

export type OrderStatus =
	| { readonly kind: "resting"; readonly oid: number; readonly price: Decimal }
	| { readonly kind: "filled"; readonly oid: number }
	| { readonly kind: "canceled"; readonly oid: number; readonly reason: string }
	| { readonly kind: "unknown" };

export interface Fill {
	readonly oid: number;
	readonly cloid: Cloid | null;
	readonly symbol: string;
	readonly price: Decimal;
	readonly size: Decimal;
	readonly isBuy: boolean;
	readonly timeMs: number;
}

export interface OpenOrder {
	readonly oid: number;
	readonly cloid: Cloid | null;
	readonly symbol: string;
	readonly price: Decimal;
	readonly size: Decimal;
	readonly isBuy: boolean;
}

type Call<T> = Promise<Result<T, TradingError>>;

/** Read-only market data: enough to price and size an order. */
export interface MarketData {
	getMidPrice(symbol: string): Call<Decimal>;
	/** Number of decimals allowed in an order size. */
	getSizePrecision(symbol: string): Call<number>;
}

export interface ExchangeGateway extends MarketData {
	/** Margin and positions of the account the gateway was built for. */
	getAccountState(): Call<AccountState>;
	/** Cross-margin leverage for the instrument. */
	setLeverage(symbol: string, leverage: number): Call<void>;
	placeLimitOrder(request: LimitOrderRequest): Call<OrderAck>;
	modifyOrder(ref: OrderRef, request: LimitOrderRequest): Call<OrderAck>;
	getOrderStatus(ref: OrderRef): Call<OrderStatus>;
	listOpenOrders(): Call<readonly OpenOrder[]>;
	listRecentFills(): Call<readonly Fill[]>;
}

export function oidRef(oid: number): OrderRef {
	return { kind: "oid", oid };
}

export function cloidRef(cloid: Cloid): OrderRef {
	return { kind: "cloid", cloid };
}

/** Signed size held in `symbol`, zero when there is no entry. */
export function positionSize(state: AccountState, symbol: string): Decimal {
	return state.positions.find((p) => p.symbol === symbol)?.size ?? Decimal.zero();
}
