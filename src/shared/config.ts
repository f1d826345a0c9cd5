/**
 * Runtime configuration read from environment variables.
 *
 * `loadConfig` never throws: every problem is reported as a ConfigError that
 * names the offending variable. Paper mode needs no credentials; live mode
 * requires the account address and the API wallet key pair.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { type WalletAddress, isWalletAddress, walletAddress } from "./identifiers.js";
import { type Result, err, ok } from "./result.js";

export type Network = "mainnet" | "testnet";

export interface NetworkEndpoints {
	readonly apiUrl: string;
	readonly wsUrl: string;
}

export const NETWORK_ENDPOINTS: Readonly<Record<Network, NetworkEndpoints>> = {
	mainnet: { apiUrl: "https://api.hyperliquid.xyz", wsUrl: "wss://api.hyperliquid.xyz/ws" },
	testnet: { apiUrl: "https://api.hyperliquid-testnet.xyz", wsUrl: "wss://api.hyperliquid-testnet.xyz/ws" },
};

export interface LiveCredentials {
	/** Account whose margin and position are traded. */
	readonly accountAddress: WalletAddress;
	/** API wallet allowed to sign for the account. */
	readonly apiKey: WalletAddress;
	readonly apiSecret: string;
}

export interface StrategyConfig {
	readonly leverageBase: number;
	readonly leverageExponent: number;
	readonly entryThreshold: number;
	readonly windowMinutes: number;
	readonly candleInterval: string;
}

export interface ExecutionConfig {
	readonly maxRequotes: number;
	readonly requoteIntervalMs: number;
	readonly bufferFactor: number;
	readonly fillTolerance: number;
	readonly priceDecimals: number;
	/** Pending signals older than this are ignored; 0 disables the filter. */
	readonly signalMaxAgeMinutes: number;
}

export interface AppConfig {
	readonly network: Network;
	readonly endpoints: NetworkEndpoints;
	readonly credentials: LiveCredentials | null;
	readonly databaseUrl: string | undefined;
	readonly symbol: string;
	readonly strategy: StrategyConfig;
	readonly execution: ExecutionConfig;
	readonly decisionPollMs: number;
	readonly executionPollMs: number;
	readonly retentionDays: number;
	readonly paper: { readonly enabled: boolean; readonly margin: number };
	readonly logLevel: LogLevel;
}

// ── Variable parsers ─────────────────────────────────────────────────

function numberVar(fallback: number) {
	return z
		.string()
		.trim()
		.optional()
		.transform((raw, ctx) => {
			if (raw === undefined || raw === "") return fallback;
			const parsed = Number(raw);
			if (!Number.isFinite(parsed)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${raw}" is not a number` });
				return z.NEVER;
			}
			return parsed;
		});
}

const booleanVar = z
	.enum(["true", "false", "1", "0", ""])
	.optional()
	.transform((raw) => raw === "true" || raw === "1");

const optionalString = z
	.string()
	.trim()
	.optional()
	.transform((raw) => (raw === undefined || raw === "" ? undefined : raw));

const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

const envSchema = z
	.object({
		HYPERLIQUID_NETWORK: z.enum(["mainnet", "testnet"]).default("testnet"),
		HYPERLIQUID_API_URL: optionalString.pipe(z.string().url().optional()),
		WS_URL: optionalString.pipe(z.string().url().optional()),
		ACCOUNT_ADDRESS: optionalString,
		HYPERLIQUID_API_KEY: optionalString,
		HYPERLIQUID_API_SECRET: optionalString,
		DATABASE_URL: optionalString,
		SYMBOL: optionalString.transform((s) => s ?? "BTC"),
		LEVERAGE_BASE: numberVar(5).pipe(z.number().int().min(1)),
		LEVERAGE_EXPONENT: numberVar(7).pipe(z.number().positive()),
		ENTRY_IBS_THRESHOLD: numberVar(0.2).pipe(z.number().min(0).max(1)),
		WINDOW_MINUTES: numberVar(60).pipe(z.number().int().positive()),
		CANDLE_INTERVAL: optionalString.transform((s) => s ?? "1m"),
		MAX_REQUOTES: numberVar(5).pipe(z.number().int().min(0)),
		REQUOTE_INTERVAL_MS: numberVar(5_000).pipe(z.number().int().min(0)),
		SIZE_BUFFER_FACTOR: numberVar(0.98).pipe(z.number().gt(0).max(1)),
		FILL_TOLERANCE: numberVar(0.1).pipe(z.number().min(0).max(1)),
		PRICE_DECIMALS: numberVar(0).pipe(z.number().int().min(0).max(8)),
		DECISION_POLL_MS: numberVar(10_000).pipe(z.number().int().positive()),
		EXECUTION_POLL_MS: numberVar(5_000).pipe(z.number().int().positive()),
		SIGNAL_MAX_AGE_MINUTES: numberVar(0).pipe(z.number().min(0)),
		RETENTION_DAYS: numberVar(30).pipe(z.number().int().positive()),
		PAPER_MODE: booleanVar,
		PAPER_MARGIN: numberVar(10_000).pipe(z.number().positive()),
		LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
	})
	.superRefine((env, ctx) => {
		const addresses = ["ACCOUNT_ADDRESS", "HYPERLIQUID_API_KEY"] as const;
		for (const key of addresses) {
			const value = env[key];
			if (value === undefined) {
				if (!env.PAPER_MODE) {
					ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "required in live mode" });
				}
			} else if (!isWalletAddress(value)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "must be a 0x-prefixed 20-byte address" });
			}
		}
		const secret = env.HYPERLIQUID_API_SECRET;
		if (secret === undefined) {
			if (!env.PAPER_MODE) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["HYPERLIQUID_API_SECRET"],
					message: "required in live mode",
				});
			}
		} else if (!PRIVATE_KEY_PATTERN.test(secret)) {
			// the value itself is never echoed
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["HYPERLIQUID_API_SECRET"],
				message: "must be a 0x-prefixed 32-byte hex key",
			});
		}
	});

type ParsedEnv = z.output<typeof envSchema>;

function credentialsFrom(env: ParsedEnv): LiveCredentials | null {
	const { ACCOUNT_ADDRESS, HYPERLIQUID_API_KEY, HYPERLIQUID_API_SECRET } = env;
	if (ACCOUNT_ADDRESS === undefined || HYPERLIQUID_API_KEY === undefined || HYPERLIQUID_API_SECRET === undefined) {
		return null;
	}
	return {
		accountAddress: walletAddress(ACCOUNT_ADDRESS),
		apiKey: walletAddress(HYPERLIQUID_API_KEY),
		apiSecret: HYPERLIQUID_API_SECRET,
	};
}

/** Parse an environment map (usually `process.env` after dotenv) into an AppConfig. */
export function loadConfig(env: Readonly<Record<string, string | undefined>>): Result<AppConfig, ConfigError> {
	const parsed = validate(envSchema, env, "environment");
	if (!parsed.ok) {
		const variables = parsed.error.issues.map((i) => String(i.path[0] ?? "environment"));
		return err(new ConfigError(parsed.error.message, { variables, cause: parsed.error }));
	}
	const e = parsed.value;
	const defaults = NETWORK_ENDPOINTS[e.HYPERLIQUID_NETWORK];

	return ok({
		network: e.HYPERLIQUID_NETWORK,
		endpoints: {
			apiUrl: e.HYPERLIQUID_API_URL ?? defaults.apiUrl,
			wsUrl: e.WS_URL ?? defaults.wsUrl,
		},
		credentials: credentialsFrom(e),
		databaseUrl: e.DATABASE_URL,
		symbol: e.SYMBOL,
		strategy: {
			leverageBase: e.LEVERAGE_BASE,
			leverageExponent: e.LEVERAGE_EXPONENT,
			entryThreshold: e.ENTRY_IBS_THRESHOLD,
			windowMinutes: e.WINDOW_MINUTES,
			candleInterval: e.CANDLE_INTERVAL,
		},
		execution: {
			maxRequotes: e.MAX_REQUOTES,
			requoteIntervalMs: e.REQUOTE_INTERVAL_MS,
			bufferFactor: e.SIZE_BUFFER_FACTOR,
			fillTolerance: e.FILL_TOLERANCE,
			priceDecimals: e.PRICE_DECIMALS,
			signalMaxAgeMinutes: e.SIGNAL_MAX_AGE_MINUTES,
		},
		decisionPollMs: e.DECISION_POLL_MS,
		executionPollMs: e.EXECUTION_POLL_MS,
		retentionDays: e.RETENTION_DAYS,
		paper: { enabled: e.PAPER_MODE, margin: e.PAPER_MARGIN },
		logLevel: e.LOG_LEVEL,
	});
}
