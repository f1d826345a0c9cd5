/**
 * L1 action signing.
 *
 * The action is msgpack-encoded, followed by the nonce as a big-endian u64
 * and a zero byte (no vault). Its keccak256 becomes the `connectionId` of a
 * phantom agent, which is signed as EIP-712 typed data.
 */

import { encode } from "@msgpack/msgpack";
import { type EthSigner, type Hex, type SignatureParts, keccak256, splitSignature } from "../ethereum/index.js";
import type { ExchangeAction } from "./types.js";

const AGENT_DOMAIN = {
	name: "Exchange",
	version: "1",
	chainId: 1337,
	verifyingContract: "0x0000000000000000000000000000000000000000",
} as const;

const AGENT_TYPES = {
	Agent: [
		{ name: "source", type: "string" },
		{ name: "connectionId", type: "bytes32" },
	],
};

export function actionHash(action: ExchangeAction, nonce: number): Hex {
	const packed = encode(action);
	const payload = new Uint8Array(packed.length + 9);
	payload.set(packed, 0);
	new DataView(payload.buffer).setBigUint64(packed.length, BigInt(nonce), false);
	payload[packed.length + 8] = 0;
	return keccak256(payload);
}

export async function signL1Action(
	signer: EthSigner,
	action: ExchangeAction,
	nonce: number,
	isMainnet: boolean,
): Promise<SignatureParts> {
	const signature = await signer.signTypedData({
		domain: AGENT_DOMAIN,
		types: AGENT_TYPES,
		primaryType: "Agent",
		message: { source: isMainnet ? "a" : "b", connectionId: actionHash(action, nonce) },
	});
	return splitSignature(signature);
}
