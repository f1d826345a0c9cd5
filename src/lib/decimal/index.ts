/**
 * LibDecimal: immutable wrapper around decimal.js-light.
 *
 * Prices, sizes and margin flow through this type so that rounding to the
 * exchange's precision is exact. Domain code reaches it through the
 * shared/decimal facade and never imports decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40, rounding: DecimalLight.ROUND_HALF_UP });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error on a non-finite number, an empty string or a non-numeric string
	 * @example LibDecimal.from("50000.5")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	/** Like `from`, but returns null instead of throwing. */
	static tryFrom(value: string | number): LibDecimal | null {
		try {
			return LibDecimal.from(value);
		} catch {
			return null;
		}
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new DecimalLight(1));
	}

	static min(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.lte(b) ? a : b;
	}

	static max(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.gte(b) ? a : b;
	}

	// ── Arithmetic ─────────────────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/** @throws Error when dividing by zero */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	/**
	 * Round half away from zero to `places` decimals.
	 * @example LibDecimal.from("0.0985").roundTo(3).toString() // "0.099"
	 */
	roundTo(places: number): LibDecimal {
		if (!Number.isInteger(places) || places < 0) {
			throw new Error(`LibDecimal.roundTo: places must be a non-negative integer, got ${places}`);
		}
		return new LibDecimal(this.raw.toDecimalPlaces(places, DecimalLight.ROUND_HALF_UP));
	}

	// ── Comparison ─────────────────────────────────────────────────

	cmp(other: LibDecimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		return c < 0 ? -1 : c > 0 ? 1 : 0;
	}

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation with trailing zeros removed.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/** Fixed-point string, rounded half-up. */
	toFixed(places: number): string {
		return this.raw.toFixed(places, DecimalLight.ROUND_HALF_UP);
	}

	/** Lossy. Only for display, logging and storage columns typed as double. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	toJSON(): string {
		return this.toString();
	}
}
