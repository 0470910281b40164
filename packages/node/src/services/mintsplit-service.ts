/**
 * MintsplitService — Composition root for the minting and equity packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One shared event store records both subsystems.
 * Redemption proceeds are forwarded into the equity balance.
 */

import {
  FixedAuthority,
  InMemoryAssetRegistry,
  MintAuthority,
} from "@mintsplit/minting";
import type { AssetRecord, Redemption, SigningDomain, Voucher } from "@mintsplit/minting";
import { Equity, InMemoryPayoutTransport } from "@mintsplit/equity";
import type {
  EquitySnapshot,
  FundsReceipt,
  PayeeSnapshot,
  ReleaseResult,
  RotationResult,
} from "@mintsplit/equity";
import { InMemoryEventStore } from "@mintsplit/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@mintsplit/event-store";
import { SerialQueue } from "@mintsplit/types";
import type { Address, Hex } from "@mintsplit/types";
import { verifyRotationAttestation } from "./rotation-attestation.js";

// =============================================================================
// Configuration
// =============================================================================

export interface PayeeConfig {
  readonly addresses: readonly Address[];
  readonly shares: bigint;
}

export interface MintsplitServiceConfig {
  readonly mintDomain: SigningDomain;
  readonly mintAuthority: Address;
  readonly baseTokenUri?: string;
  readonly equityDomain: SigningDomain;
  readonly payees: readonly PayeeConfig[];
  readonly groupSize?: number;
}

export interface AssetView extends AssetRecord {
  readonly tokenUri: string;
}

// =============================================================================
// Service
// =============================================================================

export class MintsplitService {
  readonly eventStore: InMemoryEventStore;
  readonly registry: InMemoryAssetRegistry;
  readonly authority: FixedAuthority;
  readonly mint: MintAuthority;
  readonly transport: InMemoryPayoutTransport;
  readonly equity: Equity;

  private readonly equityDomain: SigningDomain;
  private readonly rotations = new SerialQueue();

  constructor(config: MintsplitServiceConfig) {
    this.eventStore = new InMemoryEventStore();
    this.transport = new InMemoryPayoutTransport();
    this.equity = new Equity(
      config.payees.map((p) => p.addresses),
      config.payees.map((p) => p.shares),
      {
        transport: this.transport,
        eventStore: this.eventStore,
        ...(config.groupSize !== undefined ? { groupSize: config.groupSize } : {}),
      },
    );

    this.registry = new InMemoryAssetRegistry(
      config.baseTokenUri !== undefined ? { baseUri: config.baseTokenUri } : {},
    );
    this.authority = new FixedAuthority(config.mintAuthority);
    this.mint = new MintAuthority({
      domain: config.mintDomain,
      authority: this.authority,
      registry: this.registry,
      proceeds: this.equity,
      eventStore: this.eventStore,
    });
    this.equityDomain = config.equityDomain;
  }

  // ─── Minting ───────────────────────────────────────────────────────

  mintDomain(): SigningDomain {
    return this.mint.domain();
  }

  redeem(requester: Address, voucher: Voucher, payment: bigint): Promise<Redemption> {
    return this.mint.redeemWithReceipt(requester, voucher, payment);
  }

  getAsset(assetId: bigint): AssetView | undefined {
    const record = this.registry.getAsset(assetId);
    if (record === undefined) return undefined;
    return { ...record, tokenUri: this.registry.tokenUri(assetId) };
  }

  // ─── Equity ────────────────────────────────────────────────────────

  /** Waits for any release or rotation in flight. */
  equitySnapshot(): Promise<EquitySnapshot> {
    return this.equity.settled((equity) => equity.snapshot());
  }

  /** Undefined for an index with no payee. Waits like `equitySnapshot`. */
  getPayee(payeeIndex: number): Promise<PayeeSnapshot | undefined> {
    return this.equity.settled((equity) =>
      Number.isInteger(payeeIndex) && payeeIndex >= 0 && payeeIndex < equity.payeeCount
        ? equity.payee(payeeIndex)
        : undefined,
    );
  }

  deposit(from: Address, amount: bigint): FundsReceipt {
    return this.equity.receive(from, amount);
  }

  release(payeeIndex: number): Promise<ReleaseResult> {
    return this.equity.release(payeeIndex);
  }

  /**
   * Rotate `payeeIndex` on behalf of `caller`, who proves control of its
   * address with a signed attestation over the target's current enabled
   * index.
   */
  rotate(payeeIndex: number, caller: Address, signature: Hex): Promise<RotationResult> {
    return this.rotations.run(async () => {
      const enabledIndex = this.equity.payeeEnabledAddressIndex(payeeIndex);
      await verifyRotationAttestation(
        this.equityDomain,
        { payeeIndex, enabledIndex },
        caller,
        signature,
      );
      return this.equity.useNextAddress(caller, payeeIndex);
    });
  }

  payoutsTo(address: Address): bigint {
    return this.transport.creditedTo(address);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
