import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { OrderRejectedError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import { chaseOrder } from "./chase.js";
import {
	ScriptedGateway,
	TEST_CHASE,
	TEST_CLOID,
	account,
	chaseDeps,
	fill,
	networkDown,
	openOrder,
} from "./test-helpers.js";
import type { ChaseRequest } from "./types.js";

const buyRequest: ChaseRequest = {
	symbol: "BTC",
	isBuy: true,
	size: Decimal.from("0.01"),
	price: Decimal.from("50000"),
	reduceOnly: false,
};

function setup() {
	const gateway = new ScriptedGateway();
	const { clock, deps } = chaseDeps(gateway);
	const run = (request: ChaseRequest = buyRequest) => chaseOrder(deps, request, TEST_CHASE);
	return { gateway, clock, run };
}

describe("chaseOrder placement", () => {
	it("ends on an immediate fill without polling", async () => {
		const { gateway, clock, run } = setup();
		gateway.place.enqueue(ok({ kind: "filled", oid: 5, totalSize: Decimal.from("0.01"), avgPrice: Decimal.from("50000") }));

		expect(await run()).toEqual({ kind: "filled", via: "ack", oid: 5 });
		expect(clock.sleepCalls).toEqual([]);
		expect(gateway.placed[0]).toMatchObject({ isBuy: true, reduceOnly: false, cloid: TEST_CLOID });
	});

	it("fails before placing when the position cannot be read", async () => {
		const { gateway, run } = setup();
		gateway.account.enqueue(networkDown());
		const outcome = await run();
		expect(outcome.kind === "failed" && outcome.reason).toBe("position_unavailable");
		expect(gateway.placed).toHaveLength(0);
	});

	it("fails on a placement error or rejection", async () => {
		const { gateway, run } = setup();
		gateway.place.enqueue(networkDown(), ok({ kind: "rejected", reason: "Insufficient margin to place order." }));

		const errored = await run();
		const rejected = await run();

		expect(errored.kind === "failed" && errored.reason).toBe("place_error");
		expect(rejected).toEqual({ kind: "failed", reason: "place_rejected", detail: "Insufficient margin to place order." });
	});
});

describe("chaseOrder resting loop", () => {
	it("confirms a fill from the status query", async () => {
		const { gateway, clock, run } = setup();
		gateway.status.enqueue(ok({ kind: "filled", oid: 1 }));

		expect(await run()).toEqual({ kind: "filled", via: "status", oid: 1 });
		expect(clock.sleepCalls).toEqual([1_000]);
		expect(gateway.statusQueries).toEqual([{ kind: "cloid", cloid: TEST_CLOID }]);
	});

	it("re-quotes to the rounded mid and tracks the new oid", async () => {
		const { gateway, run } = setup();
		gateway.mid.enqueue(ok(Decimal.from("50010.4")));
		gateway.modify.enqueue(ok({ kind: "resting", oid: 2 }));
		gateway.status.enqueue(ok({ kind: "resting", oid: 1, price: Decimal.from("50000") }), ok({ kind: "filled", oid: 2 }));

		expect(await run()).toEqual({ kind: "filled", via: "status", oid: 2 });
		expect(gateway.modified).toHaveLength(1);
		expect(gateway.modified[0]?.ref).toEqual({ kind: "cloid", cloid: TEST_CLOID });
		expect(gateway.modified[0]?.request.price.toString()).toBe("50010");
		expect(gateway.modified[0]?.request.cloid).toBe(TEST_CLOID);
	});

	it("skips the modify while the rounded mid is unchanged", async () => {
		const { gateway, clock, run } = setup();
		gateway.mid.always(ok(Decimal.from("50000.3")));

		expect(await run()).toEqual({ kind: "resting_exhausted", oid: 1 });
		expect(gateway.modified).toHaveLength(0);
		// maxRequotes + 1 polls
		expect(clock.sleepCalls).toEqual([1_000, 1_000, 1_000]);
	});

	it("skips a re-quote when the mid cannot be read", async () => {
		const { gateway, run } = setup();
		gateway.mid.enqueue(networkDown(), ok(Decimal.from("50100")));

		expect(await run()).toEqual({ kind: "resting_exhausted", oid: 1 });
		expect(gateway.modified.map((m) => m.request.price.toString())).toEqual(["50100"]);
	});

	it("ends on a fill reported by the modify acknowledgement", async () => {
		const { gateway, run } = setup();
		gateway.mid.enqueue(ok(Decimal.from("50100")));
		gateway.modify.enqueue(ok({ kind: "filled", oid: 7, totalSize: Decimal.from("0.01"), avgPrice: Decimal.from("50100") }));
		expect(await run()).toEqual({ kind: "filled", via: "modify", oid: 7 });
	});

	it("fails on a modify error or rejection", async () => {
		const { gateway, run } = setup();
		gateway.mid.always(ok(Decimal.from("50100")));
		gateway.modify.enqueue(
			err(new OrderRejectedError("Order was never placed")),
			ok({ kind: "rejected", reason: "Cannot modify canceled or filled order" }),
		);

		const errored = await run();
		const rejected = await run();

		expect(errored.kind === "failed" && errored.reason).toBe("modify_error");
		expect(rejected).toEqual({
			kind: "failed",
			reason: "modify_rejected",
			detail: "Cannot modify canceled or filled order",
		});
	});

	it("fails when the order is canceled externally", async () => {
		const { gateway, run } = setup();
		gateway.status.enqueue(ok({ kind: "canceled", oid: 1, reason: "marginCanceled" }));
		expect(await run()).toEqual({ kind: "failed", reason: "canceled", detail: "marginCanceled" });
	});
});

describe("chaseOrder fill fallback", () => {
	it("infers a fill from the position when status queries fail", async () => {
		const { gateway, run } = setup();
		gateway.status.always(networkDown());
		gateway.account.enqueue(ok(account("0")), ok(account("0.0098")));

		const outcome = await run();

		expect(outcome.kind).toBe("filled_fallback");
		if (outcome.kind === "filled_fallback") expect(outcome.position.toString()).toBe("0.0098");
	});

	it("infers a sell fill from a reduced position", async () => {
		const { gateway, run } = setup();
		gateway.status.always(ok({ kind: "unknown" }));
		gateway.account.enqueue(ok(account("0.01")), ok(account("0.0005")));

		const outcome = await run({ ...buyRequest, isBuy: false, reduceOnly: true });
		expect(outcome.kind).toBe("filled_fallback");
	});

	it("uses a matching recent fill", async () => {
		const { gateway, run } = setup();
		gateway.status.enqueue(ok({ kind: "unknown" }));
		gateway.fills.always(ok([fill({ oid: 9 })]));
		expect(await run()).toEqual({ kind: "filled", via: "fills", oid: 9 });
	});

	it("keeps chasing an order that is still listed as open", async () => {
		const { gateway, run } = setup();
		gateway.status.enqueue(ok({ kind: "unknown" }), ok({ kind: "filled", oid: 4 }));
		gateway.openOrders.enqueue(ok([openOrder({ oid: 4 })]));
		expect(await run()).toEqual({ kind: "filled", via: "status", oid: 4 });
	});

	it("reports the order lost when nothing shows a fill", async () => {
		const { gateway, run } = setup();
		gateway.status.always(ok({ kind: "unknown" }));
		expect(await run()).toEqual({ kind: "failed", reason: "order_lost" });
	});
});
