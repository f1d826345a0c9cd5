import { Decimal } from "../shared/decimal.js";

export interface PriceRange {
	readonly high: Decimal;
	readonly low: Decimal;
	readonly close: Decimal;
}

/**
 * Internal bar strength: where the close sits within the bar's range,
 * `0` at the low and `1` at the high. A bar without range scores `0.5`.
 */
export function calculateIbs(bar: PriceRange): number {
	const range = bar.high.sub(bar.low);
	if (!range.isPositive()) return 0.5;
	const ibs = bar.close.sub(bar.low).div(range).toNumber();
	return Math.min(1, Math.max(0, ibs));
}

/**
 * Leverage for an entry at `ibs`: `base · (1 − ibs)^exponent`, kept within
 * `[1, base]` and rounded to a whole multiple.
 */
export function determineLeverage(ibs: number, base: number, exponent: number): number {
	const raw = base * (1 - ibs) ** exponent;
	return Math.round(Math.min(base, Math.max(1, raw)));
}
