import type { Decimal } from "../shared/decimal.js";

/** One finished candle from the exchange stream, at the fine interval. */
export interface FineBar {
	readonly openTimeMs: number;
	readonly closeTimeMs: number;
	readonly open: Decimal;
	readonly high: Decimal;
	readonly low: Decimal;
	readonly close: Decimal;
	readonly volume: Decimal;
}
