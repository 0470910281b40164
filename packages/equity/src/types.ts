/**
 * @mintsplit/equity domain types.
 *
 * Revenue held in one shared balance is split among payees by share
 * count. Each payee owns a fixed-size group of receiving addresses; only
 * one is enabled at a time and the pointer only moves forward.
 */

import type { Address } from "@mintsplit/types";

// =============================================================================
// Results
// =============================================================================

export interface RotationResult {
  readonly payeeIndex: number;
  readonly enabledIndex: number;
  readonly enabledAddress: Address;
}

export interface ReleaseResult {
  readonly payeeIndex: number;
  readonly to: Address;
  readonly amount: bigint;
}

export interface FundsReceipt {
  readonly from: Address;
  readonly amount: bigint;
  readonly balance: bigint;
  readonly receivedAt: string;
}

// =============================================================================
// Snapshots
// =============================================================================

export interface PayeeSnapshot {
  readonly index: number;
  readonly addresses: readonly Address[];
  readonly shares: bigint;
  readonly released: bigint;
  readonly releasable: bigint;
  readonly enabledIndex: number;
  readonly enabledAddress: Address;
}

export interface EquitySnapshot {
  readonly groupSize: number;
  readonly payeeCount: number;
  readonly totalShares: bigint;
  readonly totalReleased: bigint;
  readonly totalReceived: bigint;
  readonly balance: bigint;
  readonly payees: readonly PayeeSnapshot[];
}

// =============================================================================
// Errors
// =============================================================================

export type EquityErrorCode =
  // Construction
  | "LENGTH_MISMATCH"
  | "NO_PAYEES"
  | "BAD_ADDRESS_COUNT"
  | "ZERO_ADDRESS"
  | "INVALID_ADDRESS"
  | "INVALID_SHARES"
  | "INVALID_GROUP_SIZE"
  // Lookups
  | "BAD_PAYEE_INDEX"
  // Rotation
  | "ALL_ADDRESSES_USED"
  | "CALLER_NOT_PAYEE"
  | "SELF_ROTATION_FORBIDDEN"
  | "CALLER_ADDRESS_DISABLED"
  // Funds
  | "NOTHING_DUE"
  | "TRANSFER_REJECTED"
  | "INVALID_AMOUNT";

export class EquityError extends Error {
  public readonly code: EquityErrorCode;
  constructor(code: EquityErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EquityError";
    this.code = code;
  }
}
