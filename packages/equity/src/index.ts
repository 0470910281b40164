/**
 * @mintsplit/equity — Revenue splitting with address rotation.
 *
 * Provides:
 * - ShareRegistry: payees, address groups and shares
 * - AddressRotation: forward-only enabled-address pointer
 * - PaymentDistributor: proportional, pull-based releases
 * - FundsVault: the shared balance
 * - Payout transports
 * - Equity: the coordinator composing all of the above
 *
 * @packageDocumentation
 */

export type {
  RotationResult,
  ReleaseResult,
  FundsReceipt,
  PayeeSnapshot,
  EquitySnapshot,
  EquityErrorCode,
} from "./types.js";
export { EquityError } from "./types.js";

export type { ShareRegistryOptions, AddressSlot } from "./share-registry.js";
export { ShareRegistry, DEFAULT_GROUP_SIZE } from "./share-registry.js";

export { AddressRotation } from "./address-rotation.js";

export { FundsVault } from "./funds-vault.js";

export { PaymentDistributor } from "./payment-distributor.js";

export type {
  PayoutTransport,
  PayoutRecord,
  PayoutTransportErrorCode,
} from "./payout-transport.js";
export { InMemoryPayoutTransport, PayoutTransportError } from "./payout-transport.js";

export type { EquityOptions } from "./equity.js";
export { Equity } from "./equity.js";
