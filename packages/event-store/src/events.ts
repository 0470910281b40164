/**
 * @mintsplit/event-store — Domain event definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`.
 * Payload amounts are decimal strings; addresses are checksummed.
 */

import { randomUUID } from "node:crypto";
import type { AmountString, DomainEvent, EventSource } from "@mintsplit/types";

export const MINTSPLIT_EVENTS = {
  VOUCHER_REDEEMED: "minting.voucher.redeemed",
  PAYEE_ADDED: "equity.payee.added",
  ADDRESS_ROTATED: "equity.address.rotated",
  PAYMENT_RELEASED: "equity.payment.released",
  FUNDS_RECEIVED: "equity.funds.received",
} as const;

export type MintsplitEventType =
  (typeof MINTSPLIT_EVENTS)[keyof typeof MINTSPLIT_EVENTS];

// =============================================================================
// Minting
// =============================================================================

export type VoucherRedeemedPayload = {
  readonly assetId: string;
  readonly owner: string;
  readonly signer: string;
  readonly metadataUri: string;
  readonly metadataHash: string;
  readonly payment: AmountString;
};

// =============================================================================
// Equity
// =============================================================================

export type PayeeAddedPayload = {
  readonly payeeIndex: number;
  readonly addresses: readonly string[];
  readonly shares: AmountString;
};

export type AddressRotatedPayload = {
  readonly payeeIndex: number;
  readonly enabledIndex: number;
  readonly enabledAddress: string;
};

export type PaymentReleasedPayload = {
  readonly payeeIndex: number;
  readonly to: string;
  readonly amount: AmountString;
};

export type FundsReceivedPayload = {
  readonly from: string;
  readonly amount: AmountString;
};

export interface MintsplitPayloads {
  "minting.voucher.redeemed": VoucherRedeemedPayload;
  "equity.payee.added": PayeeAddedPayload;
  "equity.address.rotated": AddressRotatedPayload;
  "equity.payment.released": PaymentReleasedPayload;
  "equity.funds.received": FundsReceivedPayload;
}

const EVENT_SOURCE: Record<MintsplitEventType, EventSource> = {
  "minting.voucher.redeemed": "minting",
  "equity.payee.added": "equity",
  "equity.address.rotated": "equity",
  "equity.payment.released": "equity",
  "equity.funds.received": "equity",
};

// =============================================================================
// Factory
// =============================================================================

export interface CreateEventOptions {
  readonly timestamp?: string;
}

/**
 * Build a DomainEvent with fresh metadata. The source subsystem is
 * derived from the event type.
 */
export function createEvent<T extends MintsplitEventType>(
  type: T,
  actor: string,
  payload: MintsplitPayloads[T],
  options: CreateEventOptions = {},
): DomainEvent {
  const eventId = randomUUID();
  return {
    type,
    metadata: {
      eventId,
      timestamp: options.timestamp ?? new Date().toISOString(),
      actor,
      correlationId: eventId,
      source: EVENT_SOURCE[type],
    },
    payload: { ...payload },
  };
}
