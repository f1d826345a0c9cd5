export type { EthSigner, Hex, SignatureParts, SignTypedDataParams, TypedDataField } from "./types.js";
export { createSigner, keccak256, splitSignature } from "./signer.js";
