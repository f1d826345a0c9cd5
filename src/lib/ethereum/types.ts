import type { WalletAddress } from "../../shared/identifiers.js";

export type Hex = `0x${string}`;

export interface TypedDataField {
	readonly name: string;
	readonly type: string;
}

/** EIP-712 payload. Field types are checked by viem at signing time. */
export interface SignTypedDataParams {
	readonly domain: {
		readonly name?: string;
		readonly version?: string;
		readonly chainId?: number;
		readonly verifyingContract?: Hex;
	};
	readonly types: Record<string, readonly TypedDataField[]>;
	readonly primaryType: string;
	readonly message: Record<string, unknown>;
}

/** ECDSA signature split the way exchange APIs expect it. */
export interface SignatureParts {
	readonly r: Hex;
	readonly s: Hex;
	readonly v: number;
}

export interface EthSigner {
	readonly address: WalletAddress;
	signTypedData(params: SignTypedDataParams): Promise<Hex>;
}
