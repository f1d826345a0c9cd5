export { BarAggregator, isValidFineBar } from "./bar-aggregator.js";
export type { BarAggregatorConfig } from "./bar-aggregator.js";
export { BarIngestor } from "./bar-ingestor.js";
export type { BarIngestorConfig } from "./bar-ingestor.js";
export { CandleFeed } from "./candle-feed.js";
export type { CandleFeedConfig, CandleFeedEvents } from "./candle-feed.js";
export type { FineBar } from "./types.js";
