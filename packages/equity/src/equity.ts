/**
 * Equity — top-level coordinator for revenue splitting.
 *
 * Composes:
 * - ShareRegistry: payees, address groups, shares
 * - AddressRotation: the enabled-address pointer per payee
 * - FundsVault: the shared balance
 * - PaymentDistributor: pull-based releases through a PayoutTransport
 *
 * Rotations and releases run one at a time through a SerialQueue.
 * Incoming funds are accepted synchronously and never wait: a receipt
 * can land while a release is awaiting its transfer, and that release's
 * rollback only reverts its own amounts.
 *
 * The synchronous getters read current state, including a release whose
 * transfer is still in flight. `settled()` queues a read behind every
 * pending rotation and release instead.
 */

import { SerialQueue } from "@mintsplit/types";
import type { Address } from "@mintsplit/types";
import { createEvent, MINTSPLIT_EVENTS } from "@mintsplit/event-store";
import type { EventStore } from "@mintsplit/event-store";
import { ShareRegistry } from "./share-registry.js";
import { AddressRotation } from "./address-rotation.js";
import { FundsVault } from "./funds-vault.js";
import { PaymentDistributor } from "./payment-distributor.js";
import { InMemoryPayoutTransport } from "./payout-transport.js";
import type { PayoutTransport } from "./payout-transport.js";
import type {
  EquitySnapshot,
  FundsReceipt,
  PayeeSnapshot,
  ReleaseResult,
  RotationResult,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface EquityOptions {
  /** Addresses per payee. Default: 3 */
  readonly groupSize?: number;
  /** Default: a fresh InMemoryPayoutTransport */
  readonly transport?: PayoutTransport;
  readonly eventStore?: EventStore;
  /** Default: "equity" */
  readonly streamId?: string;
}

const SYSTEM_ACTOR = "equity";

// =============================================================================
// Equity
// =============================================================================

export class Equity {
  private readonly registry: ShareRegistry;
  private readonly rotation: AddressRotation;
  private readonly vault: FundsVault;
  private readonly distributor: PaymentDistributor;
  private readonly eventStore: EventStore | undefined;
  private readonly streamId: string;
  private readonly queue = new SerialQueue();

  constructor(
    addressGroups: readonly (readonly string[])[],
    shares: readonly bigint[],
    options: EquityOptions = {},
  ) {
    this.registry = new ShareRegistry(
      addressGroups,
      shares,
      options.groupSize !== undefined ? { groupSize: options.groupSize } : {},
    );
    this.rotation = new AddressRotation(this.registry);
    this.vault = new FundsVault();
    this.distributor = new PaymentDistributor(
      this.registry,
      this.rotation,
      this.vault,
      options.transport ?? new InMemoryPayoutTransport(),
    );
    this.eventStore = options.eventStore;
    this.streamId = options.streamId ?? "equity";

    const added = Array.from({ length: this.registry.payeeCount }, (_, payeeIndex) =>
      createEvent(MINTSPLIT_EVENTS.PAYEE_ADDED, SYSTEM_ACTOR, {
        payeeIndex,
        addresses: [...this.registry.addressesOf(payeeIndex)],
        shares: this.registry.sharesOf(payeeIndex).toString(),
      }),
    );
    this.eventStore?.append(this.streamId, added);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Accept an incoming transfer. Always succeeds for a positive amount.
   */
  receive(from: Address, amount: bigint): FundsReceipt {
    const receipt = this.vault.receive(from, amount);
    this.eventStore?.append(this.streamId, [
      createEvent(
        MINTSPLIT_EVENTS.FUNDS_RECEIVED,
        from,
        { from, amount: amount.toString() },
        { timestamp: receipt.receivedAt },
      ),
    ]);
    return receipt;
  }

  /**
   * Disable `payeeIndex`'s current address and enable the next one, on
   * behalf of another payee's enabled address.
   */
  useNextAddress(caller: Address, payeeIndex: number): Promise<RotationResult> {
    return this.queue.run(() => {
      const result = this.rotation.advance(caller, payeeIndex);
      this.eventStore?.append(this.streamId, [
        createEvent(MINTSPLIT_EVENTS.ADDRESS_ROTATED, caller, {
          payeeIndex: result.payeeIndex,
          enabledIndex: result.enabledIndex,
          enabledAddress: result.enabledAddress,
        }),
      ]);
      return result;
    });
  }

  /**
   * Pay `payeeIndex` what it is owed at its enabled address.
   */
  release(payeeIndex: number): Promise<ReleaseResult> {
    return this.queue.run(async () => {
      const result = await this.distributor.release(payeeIndex);
      this.eventStore?.append(this.streamId, [
        createEvent(MINTSPLIT_EVENTS.PAYMENT_RELEASED, SYSTEM_ACTOR, {
          payeeIndex: result.payeeIndex,
          to: result.to,
          amount: result.amount.toString(),
        }),
      ]);
      return result;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `query` once every rotation and release submitted before it has
   * finished, so it never sees a release that may still be rolled back.
   */
  settled<T>(query: (equity: this) => T): Promise<T> {
    return this.queue.run(() => query(this));
  }

  get payeeCount(): number {
    return this.registry.payeeCount;
  }

  get groupSize(): number {
    return this.registry.groupSize;
  }

  get totalShares(): bigint {
    return this.registry.totalShares;
  }

  get totalReleased(): bigint {
    return this.distributor.totalReleased;
  }

  get totalReceived(): bigint {
    return this.distributor.totalReceived;
  }

  get balance(): bigint {
    return this.vault.balance;
  }

  sharesOf(payeeIndex: number): bigint {
    return this.registry.sharesOf(payeeIndex);
  }

  released(payeeIndex: number): bigint {
    return this.distributor.released(payeeIndex);
  }

  releasable(payeeIndex: number): bigint {
    return this.distributor.releasable(payeeIndex);
  }

  payeeAddresses(payeeIndex: number): readonly Address[] {
    return this.registry.addressesOf(payeeIndex);
  }

  payeeEnabledAddressIndex(payeeIndex: number): number {
    return this.rotation.enabledIndexOf(payeeIndex);
  }

  payeeEnabledAddress(payeeIndex: number): Address {
    return this.rotation.enabledAddressOf(payeeIndex);
  }

  /** Payee index owning `address`, if any. */
  payeeIndexOf(address: string): number | undefined {
    return this.registry.locate(address)?.payeeIndex;
  }

  payee(payeeIndex: number): PayeeSnapshot {
    return {
      index: payeeIndex,
      addresses: this.payeeAddresses(payeeIndex),
      shares: this.sharesOf(payeeIndex),
      released: this.released(payeeIndex),
      releasable: this.releasable(payeeIndex),
      enabledIndex: this.payeeEnabledAddressIndex(payeeIndex),
      enabledAddress: this.payeeEnabledAddress(payeeIndex),
    };
  }

  snapshot(): EquitySnapshot {
    return {
      groupSize: this.groupSize,
      payeeCount: this.payeeCount,
      totalShares: this.totalShares,
      totalReleased: this.totalReleased,
      totalReceived: this.totalReceived,
      balance: this.balance,
      payees: Array.from({ length: this.payeeCount }, (_, i) => this.payee(i)),
    };
  }
}
