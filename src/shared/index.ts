export {
	type Cloid,
	type WalletAddress,
	cloid,
	generateCloid,
	walletAddress,
	isWalletAddress,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	TradingError,
	NetworkError,
	TimeoutError,
	RateLimitError,
	AuthError,
	OrderRejectedError,
	OrderNotFoundError,
	InsufficientMarginError,
	DataError,
	ConfigError,
	SystemError,
	classifyError,
	isTradingError,
	isRetryable,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { PositionSide, isPositionSide, oppositeSide, isBuy, sideOfPosition } from "./position-side.js";
export { type Clock, type Sleep, SystemClock, FakeClock, Duration, sleep } from "./time.js";
export {
	type AppConfig,
	type ExecutionConfig,
	type LiveCredentials,
	type Network,
	type NetworkEndpoints,
	type StrategyConfig,
	NETWORK_ENDPOINTS,
	loadConfig,
} from "./config.js";
