import { DataError } from "../../shared/errors.js";
import { LibDecimal } from "../decimal/index.js";
import type { OrderWire, Tif } from "./types.js";

const WIRE_DECIMALS = 8;

/**
 * Number as the exchange expects it: at most 8 decimals, no trailing zeros,
 * no exponent.
 * @throws DataError when the value has more than 8 decimals
 */
export function decimalToWire(value: LibDecimal): string {
	const rounded = value.roundTo(WIRE_DECIMALS);
	if (!rounded.eq(value)) {
		throw new DataError("Value has more precision than the wire format allows", { value: value.toString() });
	}
	return rounded.isZero() ? "0" : rounded.toString();
}

export interface WireOrderParams {
	readonly asset: number;
	readonly isBuy: boolean;
	readonly price: LibDecimal;
	readonly size: LibDecimal;
	readonly reduceOnly: boolean;
	readonly tif?: Tif;
	readonly cloid?: string;
}

export function orderToWire(params: WireOrderParams): OrderWire {
	const base = {
		a: params.asset,
		b: params.isBuy,
		p: decimalToWire(params.price),
		s: decimalToWire(params.size),
		r: params.reduceOnly,
		t: { limit: { tif: params.tif ?? "Gtc" } },
	};
	return params.cloid === undefined ? base : { ...base, c: params.cloid };
}
