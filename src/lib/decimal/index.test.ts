import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	describe("factories", () => {
		it("creates from strings and numbers", () => {
			expect(LibDecimal.from("1.5").toString()).toBe("1.5");
			expect(LibDecimal.from(" 0.001 ").toString()).toBe("0.001");
			expect(LibDecimal.from(100).toString()).toBe("100");
			expect(LibDecimal.from(-42).toString()).toBe("-42");
		});

		it("rejects empty strings and non-finite numbers", () => {
			expect(() => LibDecimal.from("")).toThrow("empty string");
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid number");
			expect(() => LibDecimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid number");
		});

		it("tryFrom returns null on garbage", () => {
			expect(LibDecimal.tryFrom("abc")).toBeNull();
			expect(LibDecimal.tryFrom("")).toBeNull();
			expect(LibDecimal.tryFrom("12.5")?.toString()).toBe("12.5");
		});
	});

	describe("arithmetic", () => {
		it("has no binary float drift", () => {
			expect(LibDecimal.from("0.1").add(LibDecimal.from("0.2")).toString()).toBe("0.3");
			expect(LibDecimal.from("0.1").mul(LibDecimal.from("0.2")).toString()).toBe("0.02");
		});

		it("computes margin sizing exactly", () => {
			const size = LibDecimal.from(1000)
				.mul(LibDecimal.from(5))
				.div(LibDecimal.from(50000))
				.mul(LibDecimal.from("0.98"));
			expect(size.toString()).toBe("0.098");
		});

		it("refuses division by zero", () => {
			expect(() => LibDecimal.one().div(LibDecimal.zero())).toThrow("division by zero");
		});

		it("min, max, abs and neg", () => {
			const a = LibDecimal.from("-0.01");
			const b = LibDecimal.from("0.02");
			expect(LibDecimal.min(a, b)).toBe(a);
			expect(LibDecimal.max(a, b)).toBe(b);
			expect(a.abs().toString()).toBe("0.01");
			expect(b.neg().toString()).toBe("-0.02");
		});
	});

	describe("roundTo", () => {
		it("rounds half away from zero", () => {
			expect(LibDecimal.from("0.0985").roundTo(3).toString()).toBe("0.099");
			expect(LibDecimal.from("0.0984").roundTo(3).toString()).toBe("0.098");
			expect(LibDecimal.from("50000.5").roundTo(0).toString()).toBe("50001");
			expect(LibDecimal.from("-1.25").roundTo(1).toString()).toBe("-1.3");
		});

		it("rejects fractional or negative places", () => {
			expect(() => LibDecimal.one().roundTo(-1)).toThrow("non-negative integer");
			expect(() => LibDecimal.one().roundTo(1.5)).toThrow("non-negative integer");
		});
	});

	describe("comparison and conversion", () => {
		it("cmp returns a sign", () => {
			expect(LibDecimal.from(1).cmp(LibDecimal.from(2))).toBe(-1);
			expect(LibDecimal.from(2).cmp(LibDecimal.from("2.0"))).toBe(0);
			expect(LibDecimal.from(3).cmp(LibDecimal.from(2))).toBe(1);
		});

		it("sign predicates", () => {
			expect(LibDecimal.zero().isZero()).toBe(true);
			expect(LibDecimal.from("0.0001").isPositive()).toBe(true);
			expect(LibDecimal.from("-0.0001").isNegative()).toBe(true);
		});

		it("toString strips zeros, toFixed pads", () => {
			expect(LibDecimal.from("1.500").toString()).toBe("1.5");
			expect(LibDecimal.from("2").toFixed(3)).toBe("2.000");
			expect(LibDecimal.from("1.2345").toFixed(3)).toBe("1.235");
		});

		it("serialises to its string form in JSON", () => {
			expect(JSON.stringify({ px: LibDecimal.from("50000.10") })).toBe('{"px":"50000.1"}');
		});
	});
});
