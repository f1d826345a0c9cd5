import WebSocket from "ws";
import { NetworkError } from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	Unsubscribe,
	WsCloseHandler,
	WsConfig,
	WsErrorHandler,
	WsMessageHandler,
	WsState,
} from "./types.js";

function remove<T>(list: T[], item: T): void {
	const index = list.indexOf(item);
	if (index !== -1) list.splice(index, 1);
}

/**
 * ws client with keepalive. Send failures come back as Result; connection
 * failures reject `connect()`. A closed client can be connected again.
 */
export class WsClient {
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private readonly messageHandlers: WsMessageHandler[] = [];
	private readonly closeHandlers: WsCloseHandler[] = [];
	private readonly errorHandlers: WsErrorHandler[] = [];
	private pingTimer: ReturnType<typeof setInterval> | null = null;
	private pongTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(config: WsConfig) {
		this.config = config;
	}

	connect(): Promise<void> {
		if (this.state !== "closed") {
			return Promise.reject(new NetworkError("WebSocket is already connecting or open", { url: this.config.url }));
		}
		return new Promise<void>((resolve, reject) => {
			this.state = "connecting";
			const ws = new WebSocket(this.config.url);
			this.ws = ws;

			ws.on("open", () => {
				this.state = "open";
				this.startPing();
				resolve();
			});

			ws.on("message", (data) => {
				this.clearPongTimeout();
				const message = data.toString();
				for (const handler of [...this.messageHandlers]) {
					handler(message);
				}
			});

			ws.on("close", (code, reason) => {
				this.state = "closed";
				this.ws = null;
				this.clearTimers();
				for (const handler of [...this.closeHandlers]) {
					handler(code, reason.toString());
				}
			});

			ws.on("error", (error) => {
				for (const handler of [...this.errorHandlers]) {
					handler(error);
				}
				if (this.state === "connecting") {
					this.state = "closed";
					this.ws = null;
					this.clearTimers();
					reject(new NetworkError("WebSocket connection failed", { url: this.config.url, cause: error }));
				}
			});

			ws.on("pong", () => {
				this.clearPongTimeout();
			});
		});
	}

	send(data: string): Result<void, TradingError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new NetworkError("WebSocket is not connected", { url: this.config.url }));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(new NetworkError("WebSocket send failed", { url: this.config.url, cause: error }));
		}
	}

	close(): void {
		if (this.ws !== null) {
			this.state = "closing";
			this.clearTimers();
			this.ws.close();
		}
	}

	getState(): WsState {
		return this.state;
	}

	onMessage(handler: WsMessageHandler): Unsubscribe {
		this.messageHandlers.push(handler);
		return () => remove(this.messageHandlers, handler);
	}

	onClose(handler: WsCloseHandler): Unsubscribe {
		this.closeHandlers.push(handler);
		return () => remove(this.closeHandlers, handler);
	}

	onError(handler: WsErrorHandler): Unsubscribe {
		this.errorHandlers.push(handler);
		return () => remove(this.errorHandlers, handler);
	}

	private startPing(): void {
		this.pingTimer = setInterval(() => {
			const ws = this.ws;
			if (ws === null || this.state !== "open") return;
			if (this.config.heartbeat !== undefined) {
				ws.send(this.config.heartbeat);
			} else {
				ws.ping();
			}
			if (this.pongTimer === null) {
				this.pongTimer = setTimeout(() => {
					this.pongTimer = null;
					ws.terminate();
				}, this.config.pongTimeoutMs);
			}
		}, this.config.pingIntervalMs);
	}

	private clearTimers(): void {
		if (this.pingTimer !== null) {
			clearInterval(this.pingTimer);
			this.pingTimer = null;
		}
		this.clearPongTimeout();
	}

	private clearPongTimeout(): void {
		if (this.pongTimer !== null) {
			clearTimeout(this.pongTimer);
			this.pongTimer = null;
		}
	}
}
