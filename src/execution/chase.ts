/**
 * Chase loop: place a GTC limit order at the mid and keep re-pricing it to
 * the current mid until it fills or the re-quote budget runs out.
 *
 *   placed ──ack filled──────────────────────────────▶ filled
 *     │ resting / accepted
 *     ▼
 *   sleep → status ─filled──────────────────────────▶ filled
 *     ▲       ├─canceled────────────────────────────▶ failed
 *     │       ├─error / unknown → detectFill ─fill──▶ filled / filled_fallback
 *     │       │                       └─nothing─────▶ failed (order_lost)
 *     │       ▼ resting
 *     └── modify to new mid (budget left)     budget spent ▶ resting_exhausted
 *
 * The order is addressed by its cloid throughout; the cloid survives
 * modification while the exchange may assign a new oid.
 */

import type { ExchangeGateway, LimitOrderRequest } from "../gateway/types.js";
import { cloidRef, positionSize } from "../gateway/types.js";
import type { Logger } from "../lib/logger/index.js";
import { type Cloid, generateCloid } from "../shared/identifiers.js";
import type { Sleep } from "../shared/time.js";
import { detectFill } from "./fill-detector.js";
import { roundPrice } from "./sizing.js";
import type { ChaseConfig, ChaseOutcome, ChaseRequest } from "./types.js";

export interface ChaseDeps {
	readonly gateway: ExchangeGateway;
	readonly logger: Logger;
	readonly sleep: Sleep;
	readonly newCloid?: () => Cloid;
}

export async function chaseOrder(deps: ChaseDeps, request: ChaseRequest, config: ChaseConfig): Promise<ChaseOutcome> {
	const { gateway } = deps;
	const account = await gateway.getAccountState();
	if (!account.ok) {
		deps.logger.error({ err: account.error }, "pre-trade position unavailable");
		return { kind: "failed", reason: "position_unavailable", error: account.error };
	}
	const positionBefore = positionSize(account.value, request.symbol);

	const cloid = (deps.newCloid ?? generateCloid)();
	const ref = cloidRef(cloid);
	const log = deps.logger.child({ cloid, symbol: request.symbol, isBuy: request.isBuy });
	const order = (price: LimitOrderRequest["price"]): LimitOrderRequest => ({
		symbol: request.symbol,
		isBuy: request.isBuy,
		size: request.size,
		price,
		reduceOnly: request.reduceOnly,
		cloid,
	});

	const placed = await gateway.placeLimitOrder(order(request.price));
	if (!placed.ok) {
		log.error({ err: placed.error }, "order placement failed");
		return { kind: "failed", reason: "place_error", error: placed.error };
	}
	log.info({ ack: placed.value.kind, price: request.price.toString(), size: request.size.toString() }, "order placed");

	let oid: number | null = null;
	switch (placed.value.kind) {
		case "filled":
			return { kind: "filled", via: "ack", oid: placed.value.oid };
		case "rejected":
			return { kind: "failed", reason: "place_rejected", detail: placed.value.reason };
		case "resting":
			oid = placed.value.oid;
			break;
		case "accepted":
			break;
	}

	let price = request.price;
	for (let attempt = 0; attempt <= config.maxRequotes; attempt++) {
		await deps.sleep(config.requoteIntervalMs);

		const status = await gateway.getOrderStatus(ref);
		if (status.ok && status.value.kind === "filled") {
			return { kind: "filled", via: "status", oid: status.value.oid };
		}
		if (status.ok && status.value.kind === "canceled") {
			log.warn({ oid: status.value.oid, reason: status.value.reason }, "order canceled externally");
			return { kind: "failed", reason: "canceled", detail: status.value.reason };
		}
		if (status.ok && status.value.kind === "resting") {
			oid = status.value.oid;
		} else {
			if (!status.ok) log.warn({ err: status.error }, "order status unavailable");
			const evidence = await detectFill(
				gateway,
				{ symbol: request.symbol, cloid, oid, isBuy: request.isBuy, size: request.size, positionBefore },
				config.fillTolerance,
				log,
			);
			switch (evidence.kind) {
				case "fill_found":
					return { kind: "filled", via: "fills", oid: evidence.fill.oid };
				case "position_moved":
					log.info({ position: evidence.position.toString() }, "fill inferred from position");
					return { kind: "filled_fallback", position: evidence.position };
				case "no_evidence":
					log.error("order lost: no fill, no position change, not open");
					return { kind: "failed", reason: "order_lost" };
				case "still_open":
					oid = evidence.order.oid;
					break;
			}
		}

		if (attempt === config.maxRequotes) break;

		const mid = await gateway.getMidPrice(request.symbol);
		if (!mid.ok) {
			log.warn({ err: mid.error }, "mid unavailable, re-quote skipped");
			continue;
		}
		const next = roundPrice(mid.value, config.priceDecimals);
		if (next.eq(price)) continue;

		const modified = await gateway.modifyOrder(ref, order(next));
		if (!modified.ok) {
			log.error({ err: modified.error }, "re-quote failed");
			return { kind: "failed", reason: "modify_error", error: modified.error };
		}
		log.info({ attempt: attempt + 1, from: price.toString(), to: next.toString() }, "order re-quoted");
		switch (modified.value.kind) {
			case "filled":
				return { kind: "filled", via: "modify", oid: modified.value.oid };
			case "rejected":
				return { kind: "failed", reason: "modify_rejected", detail: modified.value.reason };
			case "resting":
				oid = modified.value.oid;
				break;
			case "accepted":
				break;
		}
		price = next;
	}

	log.warn({ oid }, "re-quote budget exhausted, order left on the book");
	return { kind: "resting_exhausted", oid };
}
