import { describe, expect, it } from "vitest";
import { cloid, generateCloid, idToString, isWalletAddress, walletAddress } from "./identifiers.js";

describe("branded identifiers", () => {
	describe("cloid", () => {
		it("accepts 0x plus 32 hex characters and lowercases them", () => {
			const id = cloid("0x0123456789ABCDEF0123456789ABCDEF");
			expect(idToString(id)).toBe("0x0123456789abcdef0123456789abcdef");
		});

		it("rejects empty and malformed values", () => {
			expect(() => cloid("")).toThrow("Cloid cannot be empty");
			expect(() => cloid("0x1234")).toThrow("Cloid is malformed");
			expect(() => cloid("0123456789abcdef0123456789abcdef")).toThrow("malformed");
		});

		it("generateCloid produces distinct well-formed ids", () => {
			const a = generateCloid();
			const b = generateCloid();
			expect(a).toMatch(/^0x[0-9a-f]{32}$/);
			expect(a).not.toBe(b);
		});
	});

	describe("walletAddress", () => {
		const address = "0x000000000000000000000000000000000000dEaD";

		it("accepts a 20-byte hex address", () => {
			expect(idToString(walletAddress(address))).toBe(address);
			expect(isWalletAddress(address)).toBe(true);
		});

		it("rejects anything else", () => {
			expect(() => walletAddress("0xdead")).toThrow("WalletAddress is malformed");
			expect(isWalletAddress("not-an-address")).toBe(false);
		});
	});
});
