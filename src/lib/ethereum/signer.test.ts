import { recoverTypedDataAddress } from "viem";
import { describe, expect, it } from "vitest";
import { createSigner, keccak256, splitSignature } from "./signer.js";
import type { SignTypedDataParams } from "./types.js";

const TEST_PRIVATE_KEY = `0x${"11".repeat(32)}`;

const TYPED_DATA: SignTypedDataParams = {
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
	message: { source: "b", connectionId: `0x${"ab".repeat(32)}` },
};

describe("createSigner", () => {
	it("exposes a 20-byte address", () => {
		expect(createSigner(TEST_PRIVATE_KEY).address).toMatch(/^0x[0-9a-fA-F]{40}$/);
	});

	it("produces typed-data signatures that recover to the signer", async () => {
		const signer = createSigner(TEST_PRIVATE_KEY);
		const signature = await signer.signTypedData(TYPED_DATA);
		const recovered = await recoverTypedDataAddress({
			domain: TYPED_DATA.domain,
			types: TYPED_DATA.types,
			primaryType: TYPED_DATA.primaryType,
			message: TYPED_DATA.message,
			signature,
		});
		expect(recovered.toLowerCase()).toBe(signer.address.toLowerCase());
	});

	it("signs deterministically", async () => {
		const signer = createSigner(TEST_PRIVATE_KEY);
		expect(await signer.signTypedData(TYPED_DATA)).toBe(await signer.signTypedData(TYPED_DATA));
	});

	it("rejects malformed keys without echoing them", () => {
		expect(() => createSigner("test-secret")).toThrow("Invalid private key format");
		expect(() => createSigner("0xdead")).toThrow("Invalid private key format");
	});

	it("hides key material from string conversion", () => {
		const signer = createSigner(TEST_PRIVATE_KEY);
		expect(String(signer)).toBe("[EthSigner]");
		expect(JSON.stringify({ signer })).toBe('{"signer":"[EthSigner]"}');
	});
});

describe("splitSignature", () => {
	it("splits r, s and a 27/28 v", async () => {
		const signature = await createSigner(TEST_PRIVATE_KEY).signTypedData(TYPED_DATA);
		const parts = splitSignature(signature);
		expect(parts.r).toBe(`0x${signature.slice(2, 66)}`);
		expect(parts.s).toBe(`0x${signature.slice(66, 130)}`);
		expect([27, 28]).toContain(parts.v);
	});
});

describe("keccak256", () => {
	it("hashes the empty input to the known digest", () => {
		expect(keccak256(new Uint8Array())).toBe(
			"0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470",
		);
	});
});
