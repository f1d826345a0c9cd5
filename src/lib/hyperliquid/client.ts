import { AuthError, type TradingError, classifyError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import { type Clock, SystemClock } from "../../shared/time.js";
import type { EthSigner } from "../ethereum/index.js";
import type { TokenBucketRateLimiter } from "../http/index.js";
import { parseJson, type z } from "../validation/index.js";
import { signL1Action } from "./signing.js";
import {
	type BatchModifyAction,
	type ClearinghouseState,
	type ExchangeAction,
	type ExchangeResponse,
	type InfoRequest,
	type Meta,
	type OrderAction,
	type OrderStatusResponse,
	type OrderWire,
	type UpdateLeverageAction,
	type UserFill,
	type WireOpenOrder,
	allMidsSchema,
	clearinghouseStateSchema,
	exchangeResponseSchema,
	metaSchema,
	openOrdersSchema,
	orderStatusSchema,
	userFillsSchema,
} from "./types.js";

/** The slice of `fetch` the client uses. Tests pass an in-process fake. */
export type FetchLike = (
	url: string,
	init: { method: "POST"; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<{ readonly ok: boolean; readonly status: number; text(): Promise<string> }>;

export interface HyperliquidClientConfig {
	readonly apiUrl: string;
	readonly isMainnet: boolean;
	/** Needed only for /exchange calls. */
	readonly signer?: EthSigner;
	readonly rateLimiter?: TokenBucketRateLimiter;
	readonly timeoutMs?: number;
	readonly fetch?: FetchLike;
	readonly clock?: Clock;
}

type Call<T> = Promise<Result<T, TradingError>>;

/**
 * Typed access to the Hyperliquid REST API. Every call resolves to a Result:
 * transport failures, non-2xx statuses and malformed bodies are classified
 * into TradingErrors and never thrown.
 */
export class HyperliquidClient {
	private readonly apiUrl: string;
	private readonly isMainnet: boolean;
	private readonly signer: EthSigner | undefined;
	private readonly rateLimiter: TokenBucketRateLimiter | undefined;
	private readonly timeoutMs: number;
	private readonly fetchFn: FetchLike;
	private readonly clock: Clock;
	private lastNonce = 0;

	constructor(config: HyperliquidClientConfig) {
		this.apiUrl = config.apiUrl.replace(/\/+$/, "");
		this.isMainnet = config.isMainnet;
		this.signer = config.signer;
		this.rateLimiter = config.rateLimiter;
		this.timeoutMs = config.timeoutMs ?? 10_000;
		this.fetchFn = config.fetch ?? fetch;
		this.clock = config.clock ?? SystemClock;
	}

	// ── /info ────────────────────────────────────────────────────────

	allMids(): Call<Record<string, string>> {
		return this.info({ type: "allMids" }, allMidsSchema);
	}

	meta(): Call<Meta> {
		return this.info({ type: "meta" }, metaSchema);
	}

	clearinghouseState(user: string): Call<ClearinghouseState> {
		return this.info({ type: "clearinghouseState", user }, clearinghouseStateSchema);
	}

	/** Look an order up by exchange id (number) or client order id (hex string). */
	orderStatus(user: string, oid: number | string): Call<OrderStatusResponse> {
		return this.info({ type: "orderStatus", user, oid }, orderStatusSchema);
	}

	userFills(user: string): Call<UserFill[]> {
		return this.info({ type: "userFills", user }, userFillsSchema);
	}

	openOrders(user: string): Call<WireOpenOrder[]> {
		return this.info({ type: "openOrders", user }, openOrdersSchema);
	}

	// ── /exchange ────────────────────────────────────────────────────

	placeOrders(orders: readonly OrderWire[]): Call<ExchangeResponse> {
		const action: OrderAction = { type: "order", orders, grouping: "na" };
		return this.exchange(action);
	}

	modifyOrder(oid: number | string, order: OrderWire): Call<ExchangeResponse> {
		const action: BatchModifyAction = { type: "batchModify", modifies: [{ oid, order }] };
		return this.exchange(action);
	}

	updateLeverage(asset: number, leverage: number, isCross: boolean): Call<ExchangeResponse> {
		const action: UpdateLeverageAction = { type: "updateLeverage", asset, isCross, leverage };
		return this.exchange(action);
	}

	// ── Transport ────────────────────────────────────────────────────

	private info<S extends z.ZodTypeAny>(request: InfoRequest, schema: S): Call<z.output<S>> {
		return this.post("/info", request, schema, request.type);
	}

	private async exchange(action: ExchangeAction): Call<ExchangeResponse> {
		if (this.signer === undefined) {
			return err(new AuthError("No signer configured for exchange actions", { action: action.type }));
		}
		const nonce = this.nextNonce();
		let signature: Awaited<ReturnType<typeof signL1Action>>;
		try {
			signature = await signL1Action(this.signer, action, nonce, this.isMainnet);
		} catch (e) {
			return err(classifyError(e));
		}
		const body = { action, nonce, signature, vaultAddress: null };
		return this.post("/exchange", body, exchangeResponseSchema, action.type);
	}

	/** Millisecond timestamps, bumped when two actions land in the same millisecond. */
	private nextNonce(): number {
		this.lastNonce = Math.max(this.clock.now(), this.lastNonce + 1);
		return this.lastNonce;
	}

	private async post<S extends z.ZodTypeAny>(path: string, body: unknown, schema: S, label: string): Call<z.output<S>> {
		try {
			await this.rateLimiter?.acquire();
			const response = await this.fetchFn(`${this.apiUrl}${path}`, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify(body),
				signal: AbortSignal.timeout(this.timeoutMs),
			});
			const text = await response.text();
			if (!response.ok) {
				const failure = Object.assign(new Error(`HTTP ${response.status} from ${path} (${label}): ${text.slice(0, 200)}`), {
					status: response.status,
				});
				return err(classifyError(failure));
			}
			return parseJson(schema, text, label);
		} catch (e) {
			return err(classifyError(e));
		}
	}
}
