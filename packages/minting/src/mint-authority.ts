/**
 * MintAuthority — signature-gated, replay-proof asset issuance.
 *
 * Redemption is single-shot: pending → issued | rejected. Checks run in a
 * fixed order and the first failure aborts before anything is written:
 *
 * 1. Requester and voucher fields are well formed
 * 2. The signature recovers (INVALID_SIGNATURE_FORMAT)
 * 3. The signer is the designated authority (UNAUTHORIZED_SIGNER)
 * 4. The attached payment covers the minimum price (INSUFFICIENT_PAYMENT)
 * 5. The metadata URI was never redeemed (DUPLICATE_METADATA)
 * 6. The registry issues the asset (DUPLICATE_ASSET_ID propagates as-is)
 *
 * Every redemption runs inside this instance's SerialQueue.
 */

import { getAddress, isAddress, isAddressEqual } from "viem";
import { SerialQueue, ZERO_ADDRESS } from "@mintsplit/types";
import type { Address } from "@mintsplit/types";
import { createEvent, MINTSPLIT_EVENTS } from "@mintsplit/event-store";
import type { EventStore } from "@mintsplit/event-store";
import type { AssetRegistry } from "./asset-registry.js";
import type { AuthoritySource } from "./authority.js";
import { VoucherLedger } from "./voucher-ledger.js";
import {
  isEncodableVoucher,
  metadataHash,
  recoverVoucherSigner,
} from "./typed-data.js";
import type { Redemption, SigningDomain, Voucher } from "./types.js";
import { MintError } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Receives the payment attached to each successful redemption.
 * `receive` is called with a positive amount and must not throw.
 */
export interface ProceedsSink {
  receive(sender: Address, amount: bigint): void;
}

export interface MintAuthorityOptions {
  readonly domain: SigningDomain;
  readonly authority: AuthoritySource;
  readonly registry: AssetRegistry;
  readonly ledger?: VoucherLedger;
  readonly proceeds?: ProceedsSink;
  readonly eventStore?: EventStore;
  /** Default: "minting" */
  readonly streamId?: string;
}

// =============================================================================
// Mint Authority
// =============================================================================

export class MintAuthority {
  private readonly _domain: SigningDomain;
  private readonly authority: AuthoritySource;
  private readonly registry: AssetRegistry;
  private readonly ledger: VoucherLedger;
  private readonly proceeds: ProceedsSink | undefined;
  private readonly eventStore: EventStore | undefined;
  private readonly streamId: string;
  private readonly queue = new SerialQueue();
  private _proceedsCollected = 0n;

  constructor(options: MintAuthorityOptions) {
    this._domain = { ...options.domain, verifyingContract: getAddress(options.domain.verifyingContract) };
    this.authority = options.authority;
    this.registry = options.registry;
    this.ledger = options.ledger ?? new VoucherLedger();
    this.proceeds = options.proceeds;
    this.eventStore = options.eventStore;
    this.streamId = options.streamId ?? "minting";
  }

  // ───────────────────────────────────────────────────────────────────────
  // Redemption
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Redeem a signed voucher, issuing the asset to `requester`.
   *
   * @returns The issued asset ID
   */
  redeem(requester: Address, voucher: Voucher, attachedPayment: bigint): Promise<bigint> {
    return this.queue.run(async () => {
      const redemption = await this.process(requester, voucher, attachedPayment);
      return redemption.assetId;
    });
  }

  /**
   * Same as `redeem`, returning the full redemption record.
   */
  redeemWithReceipt(
    requester: Address,
    voucher: Voucher,
    attachedPayment: bigint,
  ): Promise<Redemption> {
    return this.queue.run(() => this.process(requester, voucher, attachedPayment));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  domain(): SigningDomain {
    return this._domain;
  }

  designatedAuthority(): Address {
    return this.authority.designatedAuthority();
  }

  isRedeemed(metadataUri: string): boolean {
    return this.ledger.isUsed(metadataHash(metadataUri));
  }

  get redemptionCount(): number {
    return this.ledger.size;
  }

  /** Total of all payments attached to successful redemptions. */
  get proceedsCollected(): bigint {
    return this._proceedsCollected;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private async process(
    requester: Address,
    voucher: Voucher,
    attachedPayment: bigint,
  ): Promise<Redemption> {
    if (!isAddress(requester, { strict: false }) || isAddressEqual(requester, ZERO_ADDRESS)) {
      throw new MintError("INVALID_REQUESTER", `Invalid requester address: "${requester}"`);
    }
    if (!isEncodableVoucher(voucher) || attachedPayment < 0n) {
      throw new MintError("INVALID_VOUCHER", "Voucher amounts must be uint256 values");
    }

    const signer = await recoverVoucherSigner(this._domain, voucher);

    if (!isAddressEqual(signer, this.authority.designatedAuthority())) {
      throw new MintError(
        "UNAUTHORIZED_SIGNER",
        `Signer ${signer} is not allowed to issue vouchers`,
      );
    }

    if (attachedPayment < voucher.minPrice) {
      throw new MintError(
        "INSUFFICIENT_PAYMENT",
        `Insufficient funds to redeem: ${attachedPayment.toString()} < ${voucher.minPrice.toString()}`,
      );
    }

    const hash = metadataHash(voucher.metadataUri);
    this.ledger.assertUnused(hash);

    // ─── Commit ────────────────────────────────────────────────────
    const owner = getAddress(requester);
    this.registry.issue(owner, voucher.assetId);
    this.registry.bindMetadata(voucher.assetId, voucher.metadataUri);

    const redeemedAt = new Date().toISOString();
    this.ledger.markUsed(hash, redeemedAt);
    this._proceedsCollected += attachedPayment;

    const redemption: Redemption = {
      assetId: voucher.assetId,
      owner,
      signer,
      metadataUri: voucher.metadataUri,
      metadataHash: hash,
      payment: attachedPayment,
      redeemedAt,
    };

    if (attachedPayment > 0n) {
      this.proceeds?.receive(owner, attachedPayment);
    }

    this.eventStore?.append(this.streamId, [
      createEvent(MINTSPLIT_EVENTS.VOUCHER_REDEEMED, owner, {
        assetId: redemption.assetId.toString(),
        owner,
        signer,
        metadataUri: redemption.metadataUri,
        metadataHash: hash,
        payment: attachedPayment.toString(),
      }, { timestamp: redeemedAt }),
    ]);

    return redemption;
  }
}
