// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Cloid,
	type WalletAddress,
	cloid,
	generateCloid,
	walletAddress,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	Decimal,
	PositionSide,
	isPositionSide,
	oppositeSide,
	type Clock,
	type Sleep,
	SystemClock,
	FakeClock,
	Duration,
	TradingError,
	ErrorCategory,
	NetworkError,
	OrderRejectedError,
	DataError,
	ConfigError,
	classifyError,
	isRetryable,
	type AppConfig,
	loadConfig,
} from "./shared/index.js";

// ── Exchange Gateway ─────────────────────────────────────────────────
export {
	type AccountState,
	type ExchangeGateway,
	type Fill,
	type LimitOrderRequest,
	type MarketData,
	type OpenOrder,
	type OrderAck,
	type OrderRef,
	type OrderStatus,
	cloidRef,
	oidRef,
	positionSize,
	HyperliquidGateway,
	HyperliquidMarketData,
	PaperGateway,
} from "./gateway/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type BarRecord,
	type BarStore,
	type NewBar,
	type NewSignal,
	type SignalRecord,
	type SignalStore,
	type TradeStore,
	SignalStatus,
	MemoryTradeStore,
	PgTradeStore,
} from "./persistence/index.js";

// ── Execution ────────────────────────────────────────────────────────
export {
	type ChaseConfig,
	type ChaseOutcome,
	type RunSummary,
	DEFAULT_CHASE_CONFIG,
	SignalExecutor,
	chaseOrder,
	computeOpenSize,
	detectFill,
} from "./execution/index.js";

// ── Bars & Decisions ─────────────────────────────────────────────────
export { type FineBar, BarAggregator, BarIngestor, CandleFeed } from "./aggregation/index.js";
export { type DecisionConfig, type TradeState, DecisionProcess, calculateIbs, determineLeverage } from "./decision/index.js";

// ── Runtime ──────────────────────────────────────────────────────────
export { PollLoop } from "./lifecycle/index.js";
export { pruneHistory } from "./maintenance/index.js";
export { type Runtime, type RuntimeOverrides, createRuntime } from "./bootstrap.js";
export { type Logger, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
