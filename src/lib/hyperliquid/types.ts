/**
 * Hyperliquid REST wire shapes. Response schemas are zod so nothing untyped
 * leaves this directory; action types are plain interfaces because their key
 * order is part of the signed payload.
 */

import { z } from "../validation/index.js";

// ── /info responses ──────────────────────────────────────────────────

export const allMidsSchema = z.record(z.string());

export const metaSchema = z.object({
	universe: z.array(
		z.object({
			name: z.string(),
			szDecimals: z.number().int().min(0),
			maxLeverage: z.number().optional(),
			isDelisted: z.boolean().optional(),
		}),
	),
});
export type Meta = z.output<typeof metaSchema>;

export const clearinghouseStateSchema = z.object({
	withdrawable: z.string(),
	assetPositions: z.array(
		z.object({
			position: z.object({
				coin: z.string(),
				szi: z.string(),
				entryPx: z.string().nullish(),
			}),
		}),
	),
});
export type ClearinghouseState = z.output<typeof clearinghouseStateSchema>;

const wireOrderSchema = z.object({
	coin: z.string(),
	oid: z.number().int(),
	limitPx: z.string(),
	sz: z.string(),
	side: z.string(),
	cloid: z.string().nullish(),
});

export const orderStatusSchema = z.discriminatedUnion("status", [
	z.object({
		status: z.literal("order"),
		order: z.object({
			order: wireOrderSchema,
			status: z.string(),
		}),
	}),
	z.object({ status: z.literal("unknownOid") }),
]);
export type OrderStatusResponse = z.output<typeof orderStatusSchema>;

export const userFillsSchema = z.array(
	z.object({
		coin: z.string(),
		px: z.string(),
		sz: z.string(),
		side: z.string(),
		time: z.number(),
		oid: z.number().int(),
		cloid: z.string().nullish(),
	}),
);
export type UserFill = z.output<typeof userFillsSchema>[number];

export const openOrdersSchema = z.array(wireOrderSchema);
export type WireOpenOrder = z.output<typeof openOrdersSchema>[number];

// ── /exchange responses ──────────────────────────────────────────────

export const orderStatusEntrySchema = z.union([
	z.literal("success"),
	z.object({ resting: z.object({ oid: z.number().int(), cloid: z.string().nullish() }) }),
	z.object({ filled: z.object({ oid: z.number().int(), totalSz: z.string(), avgPx: z.string() }) }),
	z.object({ error: z.string() }),
]);
export type OrderStatusEntry = z.output<typeof orderStatusEntrySchema>;

export const exchangeResponseSchema = z.discriminatedUnion("status", [
	z.object({
		status: z.literal("ok"),
		response: z.object({
			type: z.string(),
			data: z.object({ statuses: z.array(orderStatusEntrySchema) }).optional(),
		}),
	}),
	z.object({ status: z.literal("err"), response: z.string() }),
]);
export type ExchangeResponse = z.output<typeof exchangeResponseSchema>;

// ── /exchange actions ────────────────────────────────────────────────

export type Tif = "Gtc" | "Alo" | "Ioc";

/** Single order on the wire. Field order is significant for the action hash. */
export interface OrderWire {
	readonly a: number;
	readonly b: boolean;
	readonly p: string;
	readonly s: string;
	readonly r: boolean;
	readonly t: { readonly limit: { readonly tif: Tif } };
	readonly c?: string;
}

export interface OrderAction {
	readonly type: "order";
	readonly orders: readonly OrderWire[];
	readonly grouping: "na";
}

export interface BatchModifyAction {
	readonly type: "batchModify";
	readonly modifies: readonly { readonly oid: number | string; readonly order: OrderWire }[];
}

export interface UpdateLeverageAction {
	readonly type: "updateLeverage";
	readonly asset: number;
	readonly isCross: boolean;
	readonly leverage: number;
}

export type ExchangeAction = OrderAction | BatchModifyAction | UpdateLeverageAction;

export interface SignedRequest {
	readonly action: ExchangeAction;
	readonly nonce: number;
	readonly signature: { readonly r: string; readonly s: string; readonly v: number };
	readonly vaultAddress: null;
}

/** Body of a POST /info request. */
export type InfoRequest =
	| { readonly type: "allMids" }
	| { readonly type: "meta" }
	| { readonly type: "clearinghouseState"; readonly user: string }
	| { readonly type: "orderStatus"; readonly user: string; readonly oid: number | string }
	| { readonly type: "userFills"; readonly user: string }
	| { readonly type: "openOrders"; readonly user: string };
