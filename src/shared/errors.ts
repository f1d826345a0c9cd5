/**
 * TradingError hierarchy for the execution engine.
 *
 * The category decides what a caller may do next: a retryable failure leaves
 * the signal pending for the next pass, a non-retryable one is terminal for
 * the signal, a fatal one stops the process at bootstrap.
 */

export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

interface TradingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & TradingErrorOptions;

/** Base error for every gateway, store and configuration failure. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
		hint?: string,
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = rest;
		this.hint = hint;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Transient ────────────────────────────────────────────────────────

export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, context);
		this.name = "NetworkError";
	}
}

export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, context);
		this.name = "TimeoutError";
	}
}

/** HTTP 429 from the exchange; `retryAfterMs` is a hint, not a contract. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;
	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, context);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			retryAfterMs: this.retryAfterMs,
		};
	}
}

// ── Business / data ──────────────────────────────────────────────────

export class AuthError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "AuthError";
	}
}

/** The exchange refused a placement, modification or leverage change. */
export class OrderRejectedError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ORDER_REJECTED", ErrorCategory.NonRetryable, context);
		this.name = "OrderRejectedError";
	}
}

/** The exchange does not know the order reference. */
export class OrderNotFoundError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ORDER_NOT_FOUND", ErrorCategory.NonRetryable, context);
		this.name = "OrderNotFoundError";
	}
}

/** Withdrawable margin is too small to size a non-zero order. */
export class InsufficientMarginError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INSUFFICIENT_MARGIN", ErrorCategory.NonRetryable, context, "deposit margin or lower leverage");
		this.name = "InsufficientMarginError";
	}
}

/** A payload arrived but lacked a field we need (missing mid, unknown symbol). */
export class DataError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "DATA_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "DataError";
	}
}

export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification ───────────────────────────────────────────────────

function statusOf(value: unknown): number | undefined {
	if (typeof value !== "object" || value === null || !("status" in value)) return undefined;
	const status = value.status;
	return typeof status === "number" && status >= 400 ? status : undefined;
}

function codeOf(error: Error): string | undefined {
	if (!("code" in error)) return undefined;
	const code = error.code;
	return typeof code === "string" || typeof code === "number" ? String(code) : undefined;
}

/** HTTP status from the error itself, its context, or its direct cause. */
function getHttpStatus(error: Error): number | undefined {
	const own = statusOf(error);
	if (own !== undefined) return own;
	if ("context" in error) {
		const fromContext = statusOf(error.context);
		if (fromContext !== undefined) return fromContext;
	}
	return error.cause instanceof Error ? getHttpStatus(error.cause) : undefined;
}

/** Map any thrown value onto the hierarchy. TradingErrors pass through unchanged. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (!(error instanceof Error)) {
		return new SystemError(String(error), { cause: error });
	}

	// fetch with AbortSignal.timeout() rejects with a DOMException named TimeoutError
	if (error.name === "TimeoutError") {
		return new TimeoutError(error.message, { cause: error });
	}
	if (error.name === "AbortError") {
		return new NetworkError(error.message, { cause: error, aborted: true });
	}

	const status = getHttpStatus(error);
	const code = codeOf(error);
	if (status === 429 || code === "429") {
		return new RateLimitError(error.message, 1000, { cause: error, status: 429 });
	}
	if (status === 401 || status === 403) {
		return new AuthError(error.message, { cause: error, status });
	}
	if (status !== undefined && status >= 500) {
		return new NetworkError(error.message, { cause: error, status });
	}
	if (status !== undefined) {
		return new DataError(error.message, { cause: error, status });
	}

	if (code === "ETIMEDOUT" || code === "UND_ERR_CONNECT_TIMEOUT") {
		return new TimeoutError(error.message, { cause: error });
	}
	if (code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "ECONNRESET" || code === "EAI_AGAIN") {
		return new NetworkError(error.message, { cause: error });
	}

	const msg = error.message.toLowerCase();
	if (msg.includes("timeout") || msg.includes("timed out")) {
		return new TimeoutError(error.message, { cause: error });
	}
	if (msg.includes("fetch failed") || msg.includes("econnrefused") || msg.includes("socket hang up")) {
		return new NetworkError(error.message, { cause: error });
	}
	if (msg.includes("rate limit")) {
		return new RateLimitError(error.message, 1000, { cause: error });
	}
	return new SystemError(error.message, { cause: error });
}

export function isTradingError(e: unknown): e is TradingError {
	return e instanceof TradingError;
}

export function isRetryable(e: unknown): boolean {
	return e instanceof TradingError && e.isRetryable;
}
