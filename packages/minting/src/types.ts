/**
 * @mintsplit/minting domain types.
 *
 * Voucher redemption ("lazy minting"): an issuer signs vouchers offline;
 * anyone holding a voucher can redeem it, paying at least its minimum
 * price, to have the asset issued to a chosen owner.
 */

import type { Address, Hex } from "@mintsplit/types";

// =============================================================================
// Signing domain
// =============================================================================

/**
 * EIP-712 domain a voucher signature is bound to. A signature made for one
 * domain never verifies under another.
 */
export interface SigningDomain {
  readonly name: string;
  readonly version: string;
  readonly chainId: number;
  readonly verifyingContract: Address;
}

// =============================================================================
// Voucher
// =============================================================================

/** The signed fields of a voucher. */
export interface VoucherPayload {
  readonly assetId: bigint;
  /** Minimum payment, in the smallest currency unit. */
  readonly minPrice: bigint;
  readonly metadataUri: string;
}

/** A voucher as submitted for redemption. */
export interface Voucher extends VoucherPayload {
  /** 65-byte ECDSA signature (r ‖ s ‖ v), hex encoded. */
  readonly signature: Hex;
}

/** Result of a successful redemption. */
export interface Redemption {
  readonly assetId: bigint;
  readonly owner: Address;
  readonly signer: Address;
  readonly metadataUri: string;
  readonly metadataHash: Hex;
  readonly payment: bigint;
  readonly redeemedAt: string;
}

// =============================================================================
// Errors
// =============================================================================

export type MintErrorCode =
  | "INVALID_REQUESTER"
  | "INVALID_VOUCHER"
  | "INVALID_SIGNATURE_FORMAT"
  | "UNAUTHORIZED_SIGNER"
  | "INSUFFICIENT_PAYMENT"
  | "DUPLICATE_METADATA";

export class MintError extends Error {
  public readonly code: MintErrorCode;
  constructor(code: MintErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MintError";
    this.code = code;
  }
}
