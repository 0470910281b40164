/**
 * @mintsplit/event-store — Append-only, hash-chained event log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and the node service
 * - Domain event definitions for minting and equity
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Domain events
export { MINTSPLIT_EVENTS, createEvent } from "./events.js";
export type {
  MintsplitEventType,
  MintsplitPayloads,
  CreateEventOptions,
  VoucherRedeemedPayload,
  PayeeAddedPayload,
  AddressRotatedPayload,
  PaymentReleasedPayload,
  FundsReceivedPayload,
} from "./events.js";
