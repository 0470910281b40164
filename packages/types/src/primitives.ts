/**
 * Primitive Types
 *
 * Value shapes shared by the minting and equity subsystems.
 *
 * Rules:
 * - Amounts are bigint in the smallest currency unit (never floats)
 * - Amounts cross JSON boundaries as decimal strings
 * - Addresses are 20-byte hex strings; comparison is case-insensitive
 */

/** A `0x`-prefixed hex string. */
export type Hex = `0x${string}`;

/** A 20-byte account address (`0x` + 40 hex digits). */
export type Address = `0x${string}`;

/** A decimal string encoding of a non-negative amount, e.g. "1000". */
export type AmountString = string;

/** The null address. Never a valid owner, signer or payee. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
