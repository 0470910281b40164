/**
 * Shared fixtures for minting tests. Keys are placeholders.
 */

import type { Address, Hex } from "@mintsplit/types";
import type { SigningDomain } from "../src/types.js";

export const AUTHORITY_KEY: Hex = `0x${"11".repeat(32)}`;
export const OTHER_KEY: Hex = `0x${"22".repeat(32)}`;

export const DOMAIN: SigningDomain = {
  name: "LazyNFT-Voucher",
  version: "1",
  chainId: 31337,
  verifyingContract: "0x0000000000000000000000000000000000001234",
};

/** A digits-only address, unchanged by checksumming. */
export function addr(n: number): Address {
  return `0x${String(n).padStart(40, "0")}`;
}

const SECP256K1_N = 0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

/**
 * The high-s twin of a signature: s' = n - s with the recovery byte
 * flipped. Recovers to the same signer.
 */
export function toHighS(signature: Hex): Hex {
  const s = BigInt(`0x${signature.slice(66, 130)}`);
  const v = Number.parseInt(signature.slice(130, 132), 16);
  const flipped = v >= 27 ? (v === 27 ? 28 : 27) : v ^ 1;
  const highS = (SECP256K1_N - s).toString(16).padStart(64, "0");
  return `0x${signature.slice(2, 66)}${highS}${flipped.toString(16).padStart(2, "0")}`;
}
