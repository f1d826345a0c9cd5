/**
 * Branded identifiers. A Cloid cannot be passed where a wallet address is
 * expected even though both are 0x-prefixed hex strings.
 */
import { randomBytes } from "node:crypto";

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Client order id: `0x` followed by 32 hex characters (16 bytes). */
export type Cloid = Brand<string, "Cloid">;
/** 20-byte account or API wallet address. */
export type WalletAddress = Brand<string, "WalletAddress">;

const CLOID_PATTERN = /^0x[0-9a-f]{32}$/;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

function brand<B extends string>(value: string, label: B, pattern: RegExp): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	if (!pattern.test(trimmed)) {
		throw new Error(`${label} is malformed: ${trimmed}`);
	}
	return trimmed as Brand<string, B>;
}

/** @throws Error unless the value is `0x` + 32 lowercase hex characters */
export function cloid(value: string): Cloid {
	return brand(value.toLowerCase(), "Cloid", CLOID_PATTERN);
}

/** Fresh random client order id, one per placement. */
export function generateCloid(): Cloid {
	return cloid(`0x${randomBytes(16).toString("hex")}`);
}

export function walletAddress(value: string): WalletAddress {
	return brand(value, "WalletAddress", ADDRESS_PATTERN);
}

export function isWalletAddress(value: string): boolean {
	return ADDRESS_PATTERN.test(value.trim());
}

export function idToString(id: Cloid | WalletAddress): string {
	return id;
}
