/**
 * Wires an AppConfig into runtime components: logger, trade store, exchange
 * gateway (live or paper), signal executor, decision process and bar
 * ingestor. Nothing connects until a component is used.
 */

import pg from "pg";
import { BarAggregator, BarIngestor, CandleFeed } from "./aggregation/index.js";
import { DecisionProcess } from "./decision/index.js";
import { SignalExecutor } from "./execution/index.js";
import { type ExchangeGateway, HyperliquidGateway, HyperliquidMarketData, PaperGateway } from "./gateway/index.js";
import { createSigner } from "./lib/ethereum/index.js";
import { TokenBucketRateLimiter } from "./lib/http/index.js";
import { type FetchLike, HyperliquidClient } from "./lib/hyperliquid/index.js";
import { type Logger, createLogger } from "./lib/logger/index.js";
import { PgTradeStore, type TradeStore } from "./persistence/index.js";
import type { AppConfig } from "./shared/config.js";
import { Decimal } from "./shared/decimal.js";
import { ConfigError } from "./shared/errors.js";
import { type Result, err, ok } from "./shared/result.js";
import { type Clock, Duration, SystemClock } from "./shared/time.js";

/** Hyperliquid allows bursts well above this; stay under it. */
const REST_BURST = 20;
const REST_REFILL_PER_SECOND = 10;

export interface Runtime {
	readonly config: AppConfig;
	readonly logger: Logger;
	readonly store: TradeStore;
	readonly gateway: ExchangeGateway;
	readonly executor: SignalExecutor;
	readonly decision: DecisionProcess;
	/** A fresh candle feed, aggregator and ingestor writing to `store`. */
	createIngestor(): BarIngestor;
	/** Creates the tables and indexes when the store is PostgreSQL. */
	migrate(): Promise<void>;
	close(): Promise<void>;
}

export interface RuntimeOverrides {
	readonly logger?: Logger;
	/** Used instead of a PostgreSQL store built from `databaseUrl`. */
	readonly store?: TradeStore;
	readonly fetch?: FetchLike;
	readonly clock?: Clock;
}

function buildGateway(
	config: AppConfig,
	client: HyperliquidClient,
	logger: Logger,
	clock: Clock,
): Result<ExchangeGateway, ConfigError> {
	if (config.paper.enabled) {
		const market = new HyperliquidMarketData({ client, clock });
		return ok(new PaperGateway({ market, margin: Decimal.from(config.paper.margin), logger, clock }));
	}
	if (config.credentials === null) {
		return err(new ConfigError("Live trading needs account credentials", { variables: ["ACCOUNT_ADDRESS"] }));
	}
	return ok(new HyperliquidGateway({ client, account: config.credentials.accountAddress, logger, clock }));
}

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Result<Runtime, ConfigError> {
	const clock = overrides.clock ?? SystemClock;
	const logger =
		overrides.logger ??
		createLogger({ level: config.logLevel, redactPaths: ["credentials.apiSecret", "databaseUrl"] });

	let store: TradeStore;
	let pgStore: PgTradeStore | null = null;
	if (overrides.store !== undefined) {
		store = overrides.store;
	} else if (config.databaseUrl === undefined) {
		return err(new ConfigError("DATABASE_URL is not set", { variables: ["DATABASE_URL"] }));
	} else {
		pgStore = new PgTradeStore({ pool: new pg.Pool({ connectionString: config.databaseUrl }), logger });
		store = pgStore;
	}

	const client = new HyperliquidClient({
		apiUrl: config.endpoints.apiUrl,
		isMainnet: config.network === "mainnet",
		signer: config.credentials === null ? undefined : createSigner(config.credentials.apiSecret),
		rateLimiter: new TokenBucketRateLimiter({ capacity: REST_BURST, refillRate: REST_REFILL_PER_SECOND, clock }),
		fetch: overrides.fetch,
		clock,
	});

	const gateway = buildGateway(config, client, logger, clock);
	if (!gateway.ok) return gateway;

	const { execution, strategy } = config;
	const executor = new SignalExecutor({
		store,
		gateway: gateway.value,
		logger,
		chase: {
			maxRequotes: execution.maxRequotes,
			requoteIntervalMs: execution.requoteIntervalMs,
			fillTolerance: execution.fillTolerance,
			priceDecimals: execution.priceDecimals,
		},
		bufferFactor: execution.bufferFactor,
		signalMaxAgeMs: Duration.minutes(execution.signalMaxAgeMinutes),
		clock,
	});

	const windowMs = Duration.minutes(strategy.windowMinutes);
	const decision = new DecisionProcess(
		{ store, gateway: gateway.value, executor, logger, clock },
		{
			symbol: config.symbol,
			entryThreshold: strategy.entryThreshold,
			leverageBase: strategy.leverageBase,
			leverageExponent: strategy.leverageExponent,
			windowMs,
		},
	);

	logger.info(
		{ network: config.network, symbol: config.symbol, paper: config.paper.enabled, store: pgStore ? "postgres" : "custom" },
		"runtime ready",
	);

	return ok({
		config,
		logger,
		store,
		gateway: gateway.value,
		executor,
		decision,
		createIngestor: () => {
			const feed = new CandleFeed({
				url: config.endpoints.wsUrl,
				symbol: config.symbol,
				interval: strategy.candleInterval,
				logger,
			});
			const aggregator = new BarAggregator({ windowMs, logger });
			return new BarIngestor({ feed, aggregator, store, logger });
		},
		migrate: async () => {
			await pgStore?.ensureSchema();
		},
		close: () => store.close(),
	});
}
