/**
 * Layered fill detection for when the exchange cannot say what happened to
 * an order: recent fills first, then the account position, then the open
 * order list. Each layer that cannot be read is passed over.
 */

import type { ExchangeGateway, Fill, OpenOrder } from "../gateway/types.js";
import { positionSize } from "../gateway/types.js";
import type { Logger } from "../lib/logger/index.js";
import type { Decimal } from "../shared/decimal.js";
import type { Cloid } from "../shared/identifiers.js";
import { expectedPosition, withinTolerance } from "./sizing.js";

export interface TrackedOrder {
	readonly symbol: string;
	readonly cloid: Cloid;
	/** Exchange id once one has been reported. */
	readonly oid: number | null;
	readonly isBuy: boolean;
	readonly size: Decimal;
	/** Signed position read before the order was placed. */
	readonly positionBefore: Decimal;
}

export type FillEvidenceCheck =
	| { readonly kind: "fill_found"; readonly fill: Fill }
	| { readonly kind: "position_moved"; readonly position: Decimal }
	| { readonly kind: "still_open"; readonly order: OpenOrder }
	| { readonly kind: "no_evidence" };

export function matchesOrder(order: TrackedOrder, candidate: { oid: number; cloid: Cloid | null }): boolean {
	return candidate.cloid === order.cloid || (order.oid !== null && candidate.oid === order.oid);
}

export async function detectFill(
	gateway: ExchangeGateway,
	order: TrackedOrder,
	tolerance: number,
	logger: Logger,
): Promise<FillEvidenceCheck> {
	const fills = await gateway.listRecentFills();
	if (fills.ok) {
		const fill = fills.value.find((f) => f.symbol === order.symbol && matchesOrder(order, f));
		if (fill !== undefined) return { kind: "fill_found", fill };
	} else {
		logger.warn({ err: fills.error }, "recent fills unavailable");
	}

	const account = await gateway.getAccountState();
	if (account.ok) {
		const position = positionSize(account.value, order.symbol);
		const expected = expectedPosition(order.positionBefore, order.size, order.isBuy);
		if (withinTolerance(position, expected, order.size, tolerance)) {
			return { kind: "position_moved", position };
		}
	} else {
		logger.warn({ err: account.error }, "position unavailable for fill check");
	}

	const open = await gateway.listOpenOrders();
	if (open.ok) {
		const listed = open.value.find((o) => o.symbol === order.symbol && matchesOrder(order, o));
		if (listed !== undefined) return { kind: "still_open", order: listed };
	} else {
		logger.warn({ err: open.error }, "open orders unavailable");
	}

	return { kind: "no_evidence" };
}
