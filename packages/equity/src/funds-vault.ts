/**
 * FundsVault — the single shared balance.
 *
 * Incoming transfers are always accepted. The only other movements are
 * debits for payouts and the refund of a debit whose transfer failed.
 */

import type { Address } from "@mintsplit/types";
import type { FundsReceipt } from "./types.js";
import { EquityError } from "./types.js";

export class FundsVault {
  private _balance = 0n;
  private _receiptCount = 0;

  get balance(): bigint {
    return this._balance;
  }

  get receiptCount(): number {
    return this._receiptCount;
  }

  /**
   * Accept an incoming transfer.
   *
   * @throws EquityError INVALID_AMOUNT if `amount` is not positive
   */
  receive(from: Address, amount: bigint): FundsReceipt {
    assertPositive(amount);
    this._balance += amount;
    this._receiptCount += 1;
    return {
      from,
      amount,
      balance: this._balance,
      receivedAt: new Date().toISOString(),
    };
  }

  /** @throws EquityError INVALID_AMOUNT if the balance does not cover `amount` */
  debit(amount: bigint): void {
    assertPositive(amount);
    if (amount > this._balance) {
      throw new EquityError(
        "INVALID_AMOUNT",
        `Cannot debit ${amount.toString()}: balance is ${this._balance.toString()}`,
      );
    }
    this._balance -= amount;
  }

  /** Return a debit. Not a receipt. */
  refund(amount: bigint): void {
    assertPositive(amount);
    this._balance += amount;
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new EquityError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
  }
}
