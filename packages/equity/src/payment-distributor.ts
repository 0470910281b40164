/**
 * PaymentDistributor — pays each payee its share of everything received.
 *
 * A payee's entitlement is computed against the all-time inflow
 * (held balance plus everything already paid out), so releases can happen
 * in any order and at any time:
 *
 *   owed = floor(totalReceived × shares / totalShares) − released
 *
 * Truncation leaves at most payeeCount − 1 units unpaid for good.
 */

import type { AddressRotation } from "./address-rotation.js";
import type { FundsVault } from "./funds-vault.js";
import type { PayoutTransport } from "./payout-transport.js";
import type { ShareRegistry } from "./share-registry.js";
import type { ReleaseResult } from "./types.js";
import { EquityError } from "./types.js";

export class PaymentDistributor {
  private readonly registry: ShareRegistry;
  private readonly rotation: AddressRotation;
  private readonly vault: FundsVault;
  private readonly transport: PayoutTransport;
  private readonly _released: bigint[];
  private _totalReleased = 0n;

  constructor(
    registry: ShareRegistry,
    rotation: AddressRotation,
    vault: FundsVault,
    transport: PayoutTransport,
  ) {
    this.registry = registry;
    this.rotation = rotation;
    this.vault = vault;
    this.transport = transport;
    this._released = Array.from({ length: registry.payeeCount }, () => 0n);
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  get totalReleased(): bigint {
    return this._totalReleased;
  }

  get totalReceived(): bigint {
    return this.vault.balance + this._totalReleased;
  }

  released(payeeIndex: number): bigint {
    this.registry.assertPayeeIndex(payeeIndex);
    return this._released[payeeIndex] ?? 0n;
  }

  /** Amount `release(payeeIndex)` would pay right now. */
  releasable(payeeIndex: number): bigint {
    const shares = this.registry.sharesOf(payeeIndex);
    const entitled = (this.totalReceived * shares) / this.registry.totalShares;
    return entitled - this.released(payeeIndex);
  }

  // ─── Release ────────────────────────────────────────────────────────

  /**
   * Pay `payeeIndex` everything it is owed at its enabled address.
   *
   * Accounting is updated before the transfer. If the transport rejects,
   * this call's changes are reverted and the call fails.
   *
   * @throws EquityError BAD_PAYEE_INDEX | INVALID_SHARES | NOTHING_DUE |
   *   TRANSFER_REJECTED
   */
  async release(payeeIndex: number): Promise<ReleaseResult> {
    if (this.registry.sharesOf(payeeIndex) <= 0n) {
      throw new EquityError("INVALID_SHARES", `Payee ${String(payeeIndex)} has no shares`);
    }

    const owed = this.releasable(payeeIndex);
    if (owed <= 0n) {
      throw new EquityError("NOTHING_DUE", `Payee ${String(payeeIndex)} is not due payment`);
    }

    const to = this.rotation.enabledAddressOf(payeeIndex);
    this.apply(payeeIndex, owed);

    try {
      await this.transport.send(to, owed);
    } catch (err) {
      this.revert(payeeIndex, owed);
      throw new EquityError(
        "TRANSFER_REJECTED",
        `Transfer of ${owed.toString()} to ${to} was rejected`,
        { cause: err },
      );
    }

    return { payeeIndex, to, amount: owed };
  }

  private apply(payeeIndex: number, amount: bigint): void {
    this.vault.debit(amount);
    this._released[payeeIndex] = this.released(payeeIndex) + amount;
    this._totalReleased += amount;
  }

  private revert(payeeIndex: number, amount: bigint): void {
    this._released[payeeIndex] = this.released(payeeIndex) - amount;
    this._totalReleased -= amount;
    this.vault.refund(amount);
  }
}

