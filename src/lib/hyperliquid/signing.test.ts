import { recoverTypedDataAddress, serializeSignature } from "viem";
import { describe, expect, it } from "vitest";
import { createSigner, keccak256 } from "../ethereum/index.js";
import { actionHash, signL1Action } from "./signing.js";
import type { UpdateLeverageAction } from "./types.js";

const LEVERAGE_ACTION: UpdateLeverageAction = { type: "updateLeverage", asset: 0, isCross: true, leverage: 5 };
const NONCE = 1_700_000_000_000;

function ascii(text: string): number[] {
	return [...text].map((ch) => ch.charCodeAt(0));
}

describe("actionHash", () => {
	it("hashes msgpack(action) followed by the big-endian nonce and a zero byte", () => {
		const expected = new Uint8Array([
			0x84,
			0xa4,
			...ascii("type"),
			0xae,
			...ascii("updateLeverage"),
			0xa5,
			...ascii("asset"),
			0x00,
			0xa7,
			...ascii("isCross"),
			0xc3,
			0xa8,
			...ascii("leverage"),
			0x05,
			0x00,
			0x00,
			0x01,
			0x8b,
			0xcf,
			0xe5,
			0x68,
			0x00,
			0x00,
		]);
		expect(actionHash(LEVERAGE_ACTION, NONCE)).toBe(keccak256(expected));
	});

	it("changes with the nonce", () => {
		expect(actionHash(LEVERAGE_ACTION, NONCE)).not.toBe(actionHash(LEVERAGE_ACTION, NONCE + 1));
	});
});

describe("signL1Action", () => {
	const signer = createSigner(`0x${"11".repeat(32)}`);

	async function recover(isMainnet: boolean) {
		const parts = await signL1Action(signer, LEVERAGE_ACTION, NONCE, isMainnet);
		return recoverTypedDataAddress({
			domain: {
				name: "Exchange",
				version: "1",
				chainId: 1337,
				verifyingContract: "0x0000000000000000000000000000000000000000",
			},
			types: {
				Agent: [
					{ name: "source", type: "string" },
					{ name: "connectionId", type: "bytes32" },
				],
			},
			primaryType: "Agent",
			message: { source: isMainnet ? "a" : "b", connectionId: actionHash(LEVERAGE_ACTION, NONCE) },
			signature: serializeSignature({ r: parts.r, s: parts.s, v: BigInt(parts.v) }),
		});
	}

	it("signs the testnet phantom agent", async () => {
		expect((await recover(false)).toLowerCase()).toBe(signer.address.toLowerCase());
	});

	it("signs the mainnet phantom agent", async () => {
		expect((await recover(true)).toLowerCase()).toBe(signer.address.toLowerCase());
	});
});
