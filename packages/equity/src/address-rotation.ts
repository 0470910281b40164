/**
 * AddressRotation — per-payee enabled-address pointer.
 *
 * Each payee starts with address 0 enabled. Another payee, calling from
 * its own enabled address, may move the pointer forward by one. Earlier
 * addresses are disabled for good: they receive nothing and can no
 * longer trigger rotations.
 */

import type { Address } from "@mintsplit/types";
import type { ShareRegistry } from "./share-registry.js";
import type { RotationResult } from "./types.js";
import { EquityError } from "./types.js";

export class AddressRotation {
  private readonly registry: ShareRegistry;
  private readonly _enabled: number[];

  constructor(registry: ShareRegistry) {
    this.registry = registry;
    this._enabled = Array.from({ length: registry.payeeCount }, () => 0);
  }

  enabledIndexOf(payeeIndex: number): number {
    this.registry.assertPayeeIndex(payeeIndex);
    return this._enabled[payeeIndex] ?? 0;
  }

  enabledAddressOf(payeeIndex: number): Address {
    return this.registry.addressAt(payeeIndex, this.enabledIndexOf(payeeIndex));
  }

  /**
   * Enable the next address of `payeeIndex` on behalf of `caller`.
   *
   * @throws EquityError BAD_PAYEE_INDEX | ALL_ADDRESSES_USED |
   *   CALLER_NOT_PAYEE | SELF_ROTATION_FORBIDDEN | CALLER_ADDRESS_DISABLED
   */
  advance(caller: string, payeeIndex: number): RotationResult {
    const current = this.enabledIndexOf(payeeIndex);
    if (current + 1 >= this.registry.groupSize) {
      throw new EquityError(
        "ALL_ADDRESSES_USED",
        `All addresses of payee ${String(payeeIndex)} already used`,
      );
    }

    const slot = this.registry.locate(caller);
    if (slot === undefined) {
      throw new EquityError("CALLER_NOT_PAYEE", `Caller ${caller} is not a payee address`);
    }
    if (slot.payeeIndex === payeeIndex) {
      throw new EquityError(
        "SELF_ROTATION_FORBIDDEN",
        `Payee ${String(payeeIndex)} cannot rotate its own addresses`,
      );
    }
    if (slot.addressIndex < this.enabledIndexOf(slot.payeeIndex)) {
      throw new EquityError(
        "CALLER_ADDRESS_DISABLED",
        `Caller payee address ${caller} is disabled`,
      );
    }

    const enabledIndex = current + 1;
    this._enabled[payeeIndex] = enabledIndex;
    return {
      payeeIndex,
      enabledIndex,
      enabledAddress: this.registry.addressAt(payeeIndex, enabledIndex),
    };
  }
}
