/**
 * Payout transports — how released funds leave the system.
 */

import type { Address } from "@mintsplit/types";

export interface PayoutTransport {
  /**
   * Deliver `amount` to `destination`. Rejects if the destination refuses
   * the transfer; nothing is delivered in that case.
   */
  send(destination: Address, amount: bigint): Promise<void>;
}

export type PayoutTransportErrorCode = "DESTINATION_REFUSED";

export class PayoutTransportError extends Error {
  public readonly code: PayoutTransportErrorCode;
  constructor(code: PayoutTransportErrorCode, message: string) {
    super(message);
    this.name = "PayoutTransportError";
    this.code = code;
  }
}

export interface PayoutRecord {
  readonly to: Address;
  readonly amount: bigint;
  readonly sentAt: string;
}

/**
 * Credits per-address totals in memory. Destinations can be told to
 * refuse transfers.
 */
export class InMemoryPayoutTransport implements PayoutTransport {
  private readonly _credited: Map<string, bigint> = new Map();
  private readonly _refused: Set<string> = new Set();
  private readonly _payouts: PayoutRecord[] = [];

  send(destination: Address, amount: bigint): Promise<void> {
    const key = destination.toLowerCase();
    if (this._refused.has(key)) {
      return Promise.reject(
        new PayoutTransportError("DESTINATION_REFUSED", `Destination ${destination} refused the transfer`),
      );
    }
    this._credited.set(key, (this._credited.get(key) ?? 0n) + amount);
    this._payouts.push({ to: destination, amount, sentAt: new Date().toISOString() });
    return Promise.resolve();
  }

  refuse(destination: string): void {
    this._refused.add(destination.toLowerCase());
  }

  accept(destination: string): void {
    this._refused.delete(destination.toLowerCase());
  }

  creditedTo(destination: string): bigint {
    return this._credited.get(destination.toLowerCase()) ?? 0n;
  }

  get payouts(): readonly PayoutRecord[] {
    return this._payouts;
  }
}
