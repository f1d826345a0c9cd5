import { describe, expect, it } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { cloid } from "../shared/identifiers.js";
import { ok } from "../shared/result.js";
import { type TrackedOrder, detectFill, matchesOrder } from "./fill-detector.js";
import { ScriptedGateway, TEST_CLOID, account, fill, networkDown, openOrder } from "./test-helpers.js";

const OTHER = cloid("0x000000000000000000000000000000bb");

const tracked: TrackedOrder = {
	symbol: "BTC",
	cloid: TEST_CLOID,
	oid: 11,
	isBuy: true,
	size: Decimal.from("0.01"),
	positionBefore: Decimal.zero(),
};

const detect = (gateway: ScriptedGateway) => detectFill(gateway, tracked, 0.1, silentLogger());

describe("matchesOrder", () => {
	it("matches on cloid or on a known oid", () => {
		expect(matchesOrder(tracked, { oid: 99, cloid: TEST_CLOID })).toBe(true);
		expect(matchesOrder(tracked, { oid: 11, cloid: null })).toBe(true);
		expect(matchesOrder(tracked, { oid: 12, cloid: OTHER })).toBe(false);
		expect(matchesOrder({ ...tracked, oid: null }, { oid: 11, cloid: null })).toBe(false);
	});
});

describe("detectFill", () => {
	it("prefers a matching recent fill", async () => {
		const gateway = new ScriptedGateway();
		gateway.fills.always(ok([fill({ oid: 3, cloid: OTHER }), fill({ oid: 11, cloid: null })]));
		const result = await detect(gateway);
		expect(result.kind === "fill_found" && result.fill.oid).toBe(11);
	});

	it("ignores fills in other symbols", async () => {
		const gateway = new ScriptedGateway();
		gateway.fills.always(ok([fill({ symbol: "ETH" })]));
		expect((await detect(gateway)).kind).toBe("no_evidence");
	});

	it("falls back to the position when fills are unavailable", async () => {
		const gateway = new ScriptedGateway();
		gateway.fills.always(networkDown());
		gateway.account.always(ok(account("0.0098")));
		const result = await detect(gateway);
		expect(result.kind === "position_moved" && result.position.toString()).toBe("0.0098");
	});

	it("reports an order still on the book", async () => {
		const gateway = new ScriptedGateway();
		gateway.account.always(networkDown());
		gateway.openOrders.always(ok([openOrder({ oid: 11, cloid: null })]));
		expect((await detect(gateway)).kind).toBe("still_open");
	});

	it("finds nothing when every layer is silent", async () => {
		const gateway = new ScriptedGateway();
		gateway.openOrders.always(networkDown());
		expect(await detect(gateway)).toEqual({ kind: "no_evidence" });
	});
});
