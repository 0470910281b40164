/**
 * ShareRegistry — payees, their address groups and their shares.
 *
 * Fixed at construction. Payee indices are positions in the input list.
 * A reverse index maps every address to its (payee, slot); an address
 * listed twice resolves to its first occurrence.
 */

import { getAddress, isAddress, isAddressEqual } from "viem";
import { ZERO_ADDRESS } from "@mintsplit/types";
import type { Address } from "@mintsplit/types";
import { EquityError } from "./types.js";

export const DEFAULT_GROUP_SIZE = 3;

export interface ShareRegistryOptions {
  /** Addresses per payee. Default: 3, minimum: 2 */
  readonly groupSize?: number;
}

/** Where an address sits in the registry. */
export interface AddressSlot {
  readonly payeeIndex: number;
  readonly addressIndex: number;
}

export class ShareRegistry {
  private readonly _groups: readonly (readonly Address[])[];
  private readonly _shares: readonly bigint[];
  private readonly _totalShares: bigint;
  private readonly _groupSize: number;
  private readonly _slots: Map<string, AddressSlot> = new Map();

  /**
   * @throws EquityError INVALID_GROUP_SIZE | LENGTH_MISMATCH | NO_PAYEES |
   *   BAD_ADDRESS_COUNT | ZERO_ADDRESS | INVALID_ADDRESS | INVALID_SHARES
   */
  constructor(
    addressGroups: readonly (readonly string[])[],
    shares: readonly bigint[],
    options: ShareRegistryOptions = {},
  ) {
    const groupSize = options.groupSize ?? DEFAULT_GROUP_SIZE;
    if (!Number.isInteger(groupSize) || groupSize < 2) {
      throw new EquityError(
        "INVALID_GROUP_SIZE",
        `Group size must be an integer of at least 2, got ${String(groupSize)}`,
      );
    }

    if (addressGroups.length !== shares.length) {
      throw new EquityError(
        "LENGTH_MISMATCH",
        `Payees and shares length mismatch: ${String(addressGroups.length)} address groups, ${String(shares.length)} shares`,
      );
    }
    if (addressGroups.length === 0) {
      throw new EquityError("NO_PAYEES", "At least one payee is required");
    }

    addressGroups.forEach((group, i) => {
      if (group.length !== groupSize) {
        throw new EquityError(
          "BAD_ADDRESS_COUNT",
          `Payee ${String(i)} has ${String(group.length)} addresses, expected ${String(groupSize)}`,
        );
      }
    });

    const groups = addressGroups.map((group, i) =>
      group.map((address, j) => normalizeAddress(address, i, j)),
    );

    let total = 0n;
    shares.forEach((share, i) => {
      if (share <= 0n) {
        throw new EquityError(
          "INVALID_SHARES",
          `Payee ${String(i)} must hold a positive number of shares, got ${share.toString()}`,
        );
      }
      total += share;
    });

    groups.forEach((group, payeeIndex) => {
      group.forEach((address, addressIndex) => {
        const key = address.toLowerCase();
        if (!this._slots.has(key)) {
          this._slots.set(key, { payeeIndex, addressIndex });
        }
      });
    });

    this._groups = groups;
    this._shares = [...shares];
    this._totalShares = total;
    this._groupSize = groupSize;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  get payeeCount(): number {
    return this._groups.length;
  }

  get totalShares(): bigint {
    return this._totalShares;
  }

  get groupSize(): number {
    return this._groupSize;
  }

  sharesOf(payeeIndex: number): bigint {
    this.assertPayeeIndex(payeeIndex);
    return this._shares[payeeIndex] ?? 0n;
  }

  addressesOf(payeeIndex: number): readonly Address[] {
    return this.group(payeeIndex);
  }

  addressAt(payeeIndex: number, addressIndex: number): Address {
    const address = this.group(payeeIndex)[addressIndex];
    if (address === undefined) {
      throw new RangeError(
        `Address index ${String(addressIndex)} out of range for payee ${String(payeeIndex)}`,
      );
    }
    return address;
  }

  /** The first slot holding `address`, if any. Case-insensitive. */
  locate(address: string): AddressSlot | undefined {
    return this._slots.get(address.toLowerCase());
  }

  /**
   * @throws EquityError BAD_PAYEE_INDEX
   */
  assertPayeeIndex(payeeIndex: number): void {
    if (!Number.isInteger(payeeIndex) || payeeIndex < 0 || payeeIndex >= this._groups.length) {
      throw new EquityError("BAD_PAYEE_INDEX", `Bad payee index: ${String(payeeIndex)}`);
    }
  }

  private group(payeeIndex: number): readonly Address[] {
    this.assertPayeeIndex(payeeIndex);
    return this._groups[payeeIndex] ?? [];
  }
}

function normalizeAddress(address: string, payeeIndex: number, addressIndex: number): Address {
  if (address === "" || (isAddress(address, { strict: false }) && isAddressEqual(address, ZERO_ADDRESS))) {
    throw new EquityError(
      "ZERO_ADDRESS",
      `Payee ${String(payeeIndex)} address ${String(addressIndex)} is the zero address`,
    );
  }
  if (!isAddress(address, { strict: false })) {
    throw new EquityError(
      "INVALID_ADDRESS",
      `Payee ${String(payeeIndex)} address ${String(addressIndex)} is not an address: "${address}"`,
    );
  }
  return getAddress(address);
}
