import type { HyperliquidClient, Meta } from "../lib/hyperliquid/index.js";
import { Decimal } from "../shared/decimal.js";
import { DataError, type TradingError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, Duration, SystemClock } from "../shared/time.js";
import type { MarketData } from "./types.js";

export interface HyperliquidMarketDataConfig {
	readonly client: HyperliquidClient;
	readonly clock?: Clock;
	/** How long instrument metadata is reused before it is fetched again. */
	readonly metaTtlMs?: number;
}

export interface AssetInfo {
	/** Position in the exchange universe; the asset id orders are sent with. */
	readonly index: number;
	readonly szDecimals: number;
}

type Call<T> = Promise<Result<T, TradingError>>;

export function parseDecimal(raw: string, field: string): Result<Decimal, DataError> {
	const value = Decimal.tryFrom(raw);
	return value === null ? err(new DataError(`Unparsable ${field}`, { field, raw })) : ok(value);
}

/**
 * Public Hyperliquid market data, needing no account. Instrument metadata is
 * memoised for `metaTtlMs`.
 */
export class HyperliquidMarketData implements MarketData {
	private readonly client: HyperliquidClient;
	private readonly clock: Clock;
	private readonly metaTtlMs: number;
	private metaCache: { readonly meta: Meta; readonly fetchedAtMs: number } | null = null;

	constructor(config: HyperliquidMarketDataConfig) {
		this.client = config.client;
		this.clock = config.clock ?? SystemClock;
		this.metaTtlMs = config.metaTtlMs ?? Duration.minutes(10);
	}

	async getMidPrice(symbol: string): Call<Decimal> {
		const mids = await this.client.allMids();
		if (!mids.ok) return mids;
		const raw = mids.value[symbol];
		if (raw === undefined) {
			return err(new DataError("No mid price for symbol", { symbol }));
		}
		return parseDecimal(raw, "mid");
	}

	async getSizePrecision(symbol: string): Call<number> {
		const asset = await this.assetInfo(symbol);
		return asset.ok ? ok(asset.value.szDecimals) : asset;
	}

	async assetInfo(symbol: string): Call<AssetInfo> {
		const meta = await this.loadMeta();
		if (!meta.ok) return meta;
		const index = meta.value.universe.findIndex((a) => a.name === symbol);
		const entry = meta.value.universe[index];
		if (entry === undefined) {
			return err(new DataError("Unknown symbol", { symbol }));
		}
		return ok({ index, szDecimals: entry.szDecimals });
	}

	private async loadMeta(): Call<Meta> {
		const now = this.clock.now();
		if (this.metaCache !== null && now - this.metaCache.fetchedAtMs < this.metaTtlMs) {
			return ok(this.metaCache.meta);
		}
		const meta = await this.client.meta();
		if (meta.ok) {
			this.metaCache = { meta: meta.value, fetchedAtMs: now };
		}
		return meta;
	}
}
