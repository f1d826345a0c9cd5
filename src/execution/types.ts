/**
 * Execution engine: outcomes of the chase loop and of a signal pass.
 */

import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";

export interface ChaseConfig {
	/** Price modifications allowed after placement. */
	readonly maxRequotes: number;
	/** Sleep before every status poll. */
	readonly requoteIntervalMs: number;
	/** Accepted deviation from the expected position, as a fraction of the order size. */
	readonly fillTolerance: number;
	readonly priceDecimals: number;
}

export const DEFAULT_CHASE_CONFIG: ChaseConfig = {
	maxRequotes: 5,
	requoteIntervalMs: 5_000,
	fillTolerance: 0.1,
	priceDecimals: 0,
};

export interface ChaseRequest {
	readonly symbol: string;
	readonly isBuy: boolean;
	readonly size: Decimal;
	/** Initial limit price, already rounded. */
	readonly price: Decimal;
	readonly reduceOnly: boolean;
}

/** Evidence a filled chase was confirmed by. */
export type FillEvidence = "ack" | "status" | "fills" | "modify";

export type ChaseFailure =
	| "position_unavailable"
	| "place_error"
	| "place_rejected"
	| "canceled"
	| "modify_error"
	| "modify_rejected"
	| "order_lost";

export type ChaseOutcome =
	| { readonly kind: "filled"; readonly via: FillEvidence; readonly oid: number | null }
	/** Fill inferred from the position moving to its expected size. */
	| { readonly kind: "filled_fallback"; readonly position: Decimal }
	/** Still on the book when the re-quote budget ran out. */
	| { readonly kind: "resting_exhausted"; readonly oid: number | null }
	| { readonly kind: "failed"; readonly reason: ChaseFailure; readonly error?: TradingError; readonly detail?: string };

export function isChaseSuccess(outcome: ChaseOutcome): boolean {
	return outcome.kind !== "failed";
}

export interface RunSummary {
	readonly executed: readonly number[];
	readonly failed: readonly number[];
	/** Signals left pending: no longer pending on re-read, unrecognised, or errored. */
	readonly skipped: readonly number[];
}
