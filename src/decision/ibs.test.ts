import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { calculateIbs, determineLeverage } from "./ibs.js";

const bar = (high: string, low: string, close: string) => ({
	high: Decimal.from(high),
	low: Decimal.from(low),
	close: Decimal.from(close),
});

describe("calculateIbs", () => {
	it.each([
		["110", "100", "100", 0],
		["110", "100", "110", 1],
		["110", "100", "102", 0.2],
		["105", "95", "95", 0],
	])("high %s low %s close %s -> %s", (high, low, close, expected) => {
		expect(calculateIbs(bar(high, low, close))).toBe(expected);
	});

	it("scores a bar without range 0.5", () => {
		expect(calculateIbs(bar("100", "100", "100"))).toBe(0.5);
	});

	it("clamps a close outside the range", () => {
		expect(calculateIbs(bar("110", "100", "120"))).toBe(1);
		expect(calculateIbs(bar("110", "100", "90"))).toBe(0);
	});
});

describe("determineLeverage", () => {
	it("uses the full base at the low of the bar", () => {
		expect(determineLeverage(0, 5, 7)).toBe(5);
	});

	it("decays with the exponent", () => {
		// 5 * 0.9^7 = 2.39
		expect(determineLeverage(0.1, 5, 7)).toBe(2);
		// 5 * 0.81^7 = 1.14
		expect(determineLeverage(0.19, 5, 7)).toBe(1);
	});

	it("never drops below 1", () => {
		expect(determineLeverage(1, 5, 7)).toBe(1);
	});
});
