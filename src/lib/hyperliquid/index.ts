export { HyperliquidClient } from "./client.js";
export type { FetchLike, HyperliquidClientConfig } from "./client.js";
export { actionHash, signL1Action } from "./signing.js";
export { decimalToWire, orderToWire } from "./wire.js";
export type { WireOrderParams } from "./wire.js";
export type {
	ClearinghouseState,
	ExchangeAction,
	ExchangeResponse,
	Meta,
	OrderStatusEntry,
	OrderStatusResponse,
	OrderWire,
	Tif,
	UserFill,
	WireOpenOrder,
} from "./types.js";
