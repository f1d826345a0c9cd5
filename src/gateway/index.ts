export type {
	AccountState,
	ExchangeGateway,
	Fill,
	LimitOrderRequest,
	MarketData,
	OpenOrder,
	OrderAck,
	OrderRef,
	OrderStatus,
	Position,
} from "./types.js";
export { cloidRef, oidRef, positionSize } from "./types.js";
export { HyperliquidGateway, ackFromResponse, classifyOrderState } from "./hyperliquid-gateway.js";
export type { HyperliquidGatewayConfig } from "./hyperliquid-gateway.js";
export { PaperGateway } from "./paper-gateway.js";
export type { PaperGatewayConfig } from "./paper-gateway.js";
export { HyperliquidMarketData } from "./hyperliquid-market-data.js";
export type { AssetInfo, HyperliquidMarketDataConfig } from "./hyperliquid-market-data.js";
