import { Decimal } from "../shared/decimal.js";

/**
 * Order size for opening a position:
 * `withdrawable × leverage / mid × buffer`, rounded to `szDecimals`.
 */
export function computeOpenSize(
	withdrawable: Decimal,
	leverage: number,
	mid: Decimal,
	bufferFactor: number,
	szDecimals: number,
): Decimal {
	if (!mid.isPositive()) {
		return Decimal.zero();
	}
	const raw = withdrawable.mul(Decimal.from(leverage)).div(mid).mul(Decimal.from(bufferFactor));
	return roundSize(raw, szDecimals);
}

export function roundSize(size: Decimal, szDecimals: number): Decimal {
	return size.roundTo(szDecimals);
}

export function roundPrice(price: Decimal, priceDecimals: number): Decimal {
	return price.roundTo(priceDecimals);
}

/** Signed position after `size` fills on the given side. */
export function expectedPosition(before: Decimal, size: Decimal, isBuy: boolean): Decimal {
	return isBuy ? before.add(size) : before.sub(size);
}

/** Whether `actual` lies within `tolerance × size` of `expected`, inclusive. */
export function withinTolerance(actual: Decimal, expected: Decimal, size: Decimal, tolerance: number): boolean {
	const window = size.abs().mul(Decimal.from(tolerance));
	return actual.sub(expected).abs().lte(window);
}
