/**
 * viem behind the EthSigner interface. Domain code signs through this module
 * and never imports viem itself.
 */

import { isHex, keccak256 as viemKeccak256, parseSignature } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { walletAddress } from "../../shared/identifiers.js";
import type { EthSigner, Hex, SignTypedDataParams, SignatureParts } from "./types.js";

/**
 * @throws Error if the key is not 0x plus 64 hex characters. The message never echoes the key.
 */
export function createSigner(privateKey: string): EthSigner {
	if (!isHex(privateKey, { strict: true }) || privateKey.length !== 66) {
		throw new Error("Invalid private key format");
	}
	const account = privateKeyToAccount(privateKey);

	const signer: EthSigner = {
		address: walletAddress(account.address),

		async signTypedData(params: SignTypedDataParams): Promise<Hex> {
			return account.signTypedData({
				domain: params.domain,
				types: params.types,
				primaryType: params.primaryType,
				message: params.message,
			});
		},
	};

	Object.defineProperty(signer, "toString", { value: () => "[EthSigner]", enumerable: false });
	Object.defineProperty(signer, "toJSON", { value: () => "[EthSigner]", enumerable: false });

	return signer;
}

export function keccak256(bytes: Uint8Array): Hex {
	return viemKeccak256(bytes);
}

/** 65-byte hex signature into r, s and a 27/28 recovery byte. */
export function splitSignature(signature: Hex): SignatureParts {
	const { r, s, v, yParity } = parseSignature(signature);
	return { r, s, v: v !== undefined ? Number(v) : (yParity ?? 0) + 27 };
}
