import { describe, expect, it } from "vitest";
import {
	AuthError,
	ConfigError,
	DataError,
	ErrorCategory,
	InsufficientMarginError,
	NetworkError,
	OrderRejectedError,
	RateLimitError,
	SystemError,
	TimeoutError,
	type TradingError,
	classifyError,
	isRetryable,
	isTradingError,
} from "./errors.js";

describe("TradingError hierarchy", () => {
	const cases: Array<[string, TradingError, ErrorCategory]> = [
		["NetworkError", new NetworkError("conn refused"), ErrorCategory.Retryable],
		["TimeoutError", new TimeoutError("timed out"), ErrorCategory.Retryable],
		["RateLimitError", new RateLimitError("429", 1000), ErrorCategory.Retryable],
		["AuthError", new AuthError("invalid key"), ErrorCategory.NonRetryable],
		["OrderRejectedError", new OrderRejectedError("rejected"), ErrorCategory.NonRetryable],
		["InsufficientMarginError", new InsufficientMarginError("no margin"), ErrorCategory.NonRetryable],
		["DataError", new DataError("no mid"), ErrorCategory.NonRetryable],
		["ConfigError", new ConfigError("bad config"), ErrorCategory.Fatal],
		["SystemError", new SystemError("panic"), ErrorCategory.Fatal],
	];

	it.each(cases)("%s has the expected category", (_name, error, expected) => {
		expect(error.category).toBe(expected);
		expect(isTradingError(error)).toBe(true);
	});

	it("keeps context and strips the cause out of it", () => {
		const cause = new Error("root");
		const e = new OrderRejectedError("bad price", { price: "50000", cause });
		expect(e.code).toBe("ORDER_REJECTED");
		expect(e.context).toEqual({ price: "50000" });
		expect(e.cause).toBe(cause);
	});

	it("serialises to JSON with the retry flag", () => {
		const json = new RateLimitError("slow down", 250, { path: "/info" }).toJSON();
		expect(json).toEqual({
			name: "RateLimitError",
			message: "slow down",
			code: "RATE_LIMIT_ERROR",
			category: "retryable",
			retryable: true,
			context: { path: "/info" },
			retryAfterMs: 250,
		});
	});

	it("includes the hint when one is set", () => {
		const json = new InsufficientMarginError("zero size").toJSON();
		expect(json["hint"]).toBe("deposit margin or lower leverage");
	});
});

describe("classifyError", () => {
	it("passes TradingErrors through unchanged", () => {
		const original = new DataError("missing mid");
		expect(classifyError(original)).toBe(original);
	});

	it("maps a fetch timeout DOMException-style error to TimeoutError", () => {
		const e = new Error("The operation was aborted due to timeout");
		e.name = "TimeoutError";
		expect(classifyError(e)).toBeInstanceOf(TimeoutError);
	});

	it("maps an AbortError to a retryable NetworkError", () => {
		const e = new Error("This operation was aborted");
		e.name = "AbortError";
		const classified = classifyError(e);
		expect(classified).toBeInstanceOf(NetworkError);
		expect(classified.context).toEqual({ aborted: true });
	});

	it("maps HTTP statuses found on context", () => {
		const withStatus = (status: number) => Object.assign(new Error(`HTTP ${status}`), { context: { status } });
		expect(classifyError(withStatus(429))).toBeInstanceOf(RateLimitError);
		expect(classifyError(withStatus(401))).toBeInstanceOf(AuthError);
		expect(classifyError(withStatus(502))).toBeInstanceOf(NetworkError);
		expect(classifyError(withStatus(422))).toBeInstanceOf(DataError);
	});

	it("maps errno codes", () => {
		const withCode = (code: string) => Object.assign(new Error(code), { code });
		expect(classifyError(withCode("ECONNRESET"))).toBeInstanceOf(NetworkError);
		expect(classifyError(withCode("ETIMEDOUT"))).toBeInstanceOf(TimeoutError);
	});

	it("falls back on message heuristics, then SystemError", () => {
		expect(classifyError(new TypeError("fetch failed"))).toBeInstanceOf(NetworkError);
		expect(classifyError(new Error("request timed out"))).toBeInstanceOf(TimeoutError);
		expect(classifyError(new Error("something odd"))).toBeInstanceOf(SystemError);
		expect(classifyError("a string")).toBeInstanceOf(SystemError);
	});

	it("isRetryable reflects the classified category", () => {
		expect(isRetryable(classifyError(new Error("fetch failed")))).toBe(true);
		expect(isRetryable(new OrderRejectedError("no"))).toBe(false);
		expect(isRetryable(new Error("plain"))).toBe(false);
	});
});
