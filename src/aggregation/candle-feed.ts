/**
 * CandleFeed: streams exchange candles for one symbol and emits each fine
 * bar once it is final.
 *
 * The exchange pushes repeated updates for the candle in progress. A candle
 * is final when an update for a later open time arrives; updates for an
 * older open time are ignored. The connection is re-established with
 * exponential backoff until `stop()`.
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { parseJson, validate, z } from "../lib/validation/index.js";
import {
	DEFAULT_RECONNECTION,
	type ReconnectionConfig,
	ReconnectionPolicy,
	WsClient,
	type WsConfig,
} from "../lib/websocket/index.js";
import { Decimal } from "../shared/decimal.js";
import { type Sleep, sleep as realSleep } from "../shared/time.js";
import type { FineBar } from "./types.js";

const decimalField = z.union([z.string(), z.number()]).transform((v, ctx) => {
	const value = Decimal.tryFrom(v);
	if (value === null) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a number" });
		return z.NEVER;
	}
	return value;
});

const envelopeSchema = z.object({ channel: z.string(), data: z.unknown() });

const candleSchema = z.object({
	t: z.number(),
	T: z.number(),
	s: z.string(),
	i: z.string(),
	o: decimalField,
	h: decimalField,
	l: decimalField,
	c: decimalField,
	v: decimalField,
});

export type CandleFeedEvents = {
	candle: (bar: FineBar) => void;
	connected: () => void;
	disconnected: (code: number, reason: string) => void;
};

export interface CandleFeedConfig {
	readonly url: string;
	readonly symbol: string;
	readonly interval: string;
	readonly logger: Logger;
	readonly reconnection?: ReconnectionConfig;
	readonly pingIntervalMs?: number;
	readonly pongTimeoutMs?: number;
	readonly sleep?: Sleep;
}

export class CandleFeed extends TypedEmitter<CandleFeedEvents> {
	private readonly symbol: string;
	private readonly interval: string;
	private readonly logger: Logger;
	private readonly client: WsClient;
	private readonly policy: ReconnectionPolicy;
	private readonly sleep: Sleep;
	private latest: FineBar | null = null;
	private stopped = true;
	private connecting: Promise<void> = Promise.resolve();

	constructor(config: CandleFeedConfig) {
		super();
		this.symbol = config.symbol;
		this.interval = config.interval;
		this.logger = config.logger.child({ component: "candle-feed", symbol: config.symbol });
		this.policy = new ReconnectionPolicy(config.reconnection ?? DEFAULT_RECONNECTION);
		this.sleep = config.sleep ?? realSleep;

		const wsConfig: WsConfig = {
			url: config.url,
			pingIntervalMs: config.pingIntervalMs ?? 30_000,
			pongTimeoutMs: config.pongTimeoutMs ?? 10_000,
			heartbeat: JSON.stringify({ method: "ping" }),
		};
		this.client = new WsClient(wsConfig);
		this.client.onMessage((text) => this.handleMessage(text));
		this.client.onError((error) => this.logger.warn({ err: error }, "socket error"));
		this.client.onClose((code, reason) => {
			this.emit("disconnected", code, reason);
			if (this.stopped) return;
			this.logger.warn({ code, reason }, "candle stream closed, reconnecting");
			this.connecting = this.connect(true);
		});
	}

	/** Connects and subscribes. Resolves once connected, or once reconnection gives up. */
	start(): Promise<void> {
		this.stopped = false;
		this.connecting = this.connect(false);
		return this.connecting;
	}

	async stop(): Promise<void> {
		this.stopped = true;
		this.client.close();
		await this.connecting;
	}

	/** Parses one stream message; malformed messages are logged and dropped. */
	handleMessage(text: string): void {
		const envelope = parseJson(envelopeSchema, text, "stream message");
		if (!envelope.ok) {
			this.logger.warn({ err: envelope.error }, "malformed stream message");
			return;
		}
		if (envelope.value.channel !== "candle") return;

		const candle = validate(candleSchema, envelope.value.data, "candle");
		if (!candle.ok) {
			this.logger.warn({ err: candle.error }, "malformed candle");
			return;
		}
		const c = candle.value;
		if (c.s !== this.symbol || c.i !== this.interval) return;

		const bar: FineBar = { openTimeMs: c.t, closeTimeMs: c.T, open: c.o, high: c.h, low: c.l, close: c.c, volume: c.v };
		const previous = this.latest;
		if (previous !== null && bar.openTimeMs < previous.openTimeMs) return;
		this.latest = bar;
		if (previous !== null && bar.openTimeMs > previous.openTimeMs) {
			this.emit("candle", previous);
		}
	}

	private async connect(afterDrop: boolean): Promise<void> {
		let wait = afterDrop;
		while (!this.stopped) {
			if (wait) {
				if (!this.policy.shouldRetry()) {
					this.logger.error({ attempts: this.policy.attempts }, "reconnection attempts exhausted");
					return;
				}
				await this.sleep(this.policy.nextDelay());
				if (this.stopped) return;
			}
			wait = true;
			try {
				await this.client.connect();
			} catch (error) {
				this.logger.warn({ err: error }, "candle stream connect failed");
				continue;
			}
			const subscribed = this.client.send(
				JSON.stringify({
					method: "subscribe",
					subscription: { type: "candle", coin: this.symbol, interval: this.interval },
				}),
			);
			if (!subscribed.ok) {
				// the socket dropped already; its close handler reconnects
				this.logger.warn({ err: subscribed.error }, "subscribe failed");
				return;
			}
			this.policy.reset();
			this.logger.info({ interval: this.interval }, "candle stream subscribed");
			this.emit("connected");
			return;
		}
	}
}
