/**
 * BarIngestor: candle feed → aggregator → bar store.
 *
 * Completed bars are written in the order they complete; a duplicate window
 * is logged and ignored, a failed write is logged and the stream continues.
 */

import type { Logger } from "../lib/logger/index.js";
import type { BarStore } from "../persistence/types.js";
import type { BarAggregator } from "./bar-aggregator.js";
import type { CandleFeed } from "./candle-feed.js";
import type { FineBar } from "./types.js";

export interface BarIngestorConfig {
	readonly feed: CandleFeed;
	readonly aggregator: BarAggregator;
	readonly store: BarStore;
	readonly logger: Logger;
}

export class BarIngestor {
	private readonly feed: CandleFeed;
	private readonly aggregator: BarAggregator;
	private readonly store: BarStore;
	private readonly logger: Logger;
	private writes: Promise<void> = Promise.resolve();
	private readonly onCandle = (bar: FineBar): void => {
		this.writes = this.writes.then(() => this.ingest(bar));
	};

	constructor(config: BarIngestorConfig) {
		this.feed = config.feed;
		this.aggregator = config.aggregator;
		this.store = config.store;
		this.logger = config.logger.child({ component: "bar-ingestor" });
		this.feed.on("candle", this.onCandle);
	}

	start(): Promise<void> {
		return this.feed.start();
	}

	async stop(): Promise<void> {
		await this.feed.stop();
		await this.writes;
	}

	/** Settles once every bar received so far has been written. */
	idle(): Promise<void> {
		return this.writes;
	}

	async ingest(fine: FineBar): Promise<void> {
		const bar = this.aggregator.push(fine);
		if (bar === null) return;
		try {
			const inserted = await this.store.insertBar(bar);
			if (inserted) {
				this.logger.info({ timestamp: bar.timestamp, close: bar.close.toString() }, "bar stored");
			} else {
				this.logger.warn({ timestamp: bar.timestamp }, "duplicate bar ignored");
			}
		} catch (error) {
			this.logger.error({ err: error, timestamp: bar.timestamp }, "bar write failed");
		}
	}
}
