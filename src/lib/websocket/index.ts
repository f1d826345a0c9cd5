export type {
	Unsubscribe,
	WsConfig,
	WsState,
	WsMessageHandler,
	WsCloseHandler,
	WsErrorHandler,
} from "./types.js";
export { WsClient } from "./client.js";
export { DEFAULT_RECONNECTION, ReconnectionPolicy } from "./reconnection.js";
export type { ReconnectionConfig } from "./reconnection.js";
