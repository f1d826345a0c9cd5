export interface WsConfig {
	/** ws:// or wss:// URL. */
	readonly url: string;
	readonly pingIntervalMs: number;
	/** Terminate the socket when no pong or message arrives within this window after a ping. */
	readonly pongTimeoutMs: number;
	/**
	 * Application-level keepalive text sent instead of a protocol ping frame.
	 * Any inbound message then counts as the pong.
	 */
	readonly heartbeat?: string;
}

export type WsState = "connecting" | "open" | "closing" | "closed";

export type WsMessageHandler = (data: string) => void;

export type WsCloseHandler = (code: number, reason: string) => void;

export type WsErrorHandler = (error: Error) => void;

/** Removes the handler it was returned for. */
export type Unsubscribe = () => void;
