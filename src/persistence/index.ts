export { MemoryTradeStore } from "./memory-store.js";
export type { MemoryTradeStoreConfig } from "./memory-store.js";
export { PgTradeStore, SCHEMA_SQL } from "./pg-store.js";
export type { PgPool, PgTradeStoreConfig, Queryable } from "./pg-store.js";
export { SignalStatus, isTerminalStatus } from "./types.js";
export type {
	BarRecord,
	BarStore,
	NewBar,
	NewSignal,
	PendingSignalQuery,
	SignalRecord,
	SignalStore,
	TerminalStatus,
	TradeStore,
} from "./types.js";
