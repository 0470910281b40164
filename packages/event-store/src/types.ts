/**
 * @mintsplit/event-store — Core types.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by hash
 */

import type { DomainEvent } from "@mintsplit/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 */
export interface StoredEvent {
  /** The domain event */
  readonly event: DomainEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, contiguous) */
  readonly version: number;

  /** Position across all streams (1-based, contiguous) */
  readonly globalPosition: number;

  /** When this event was persisted */
  readonly appendedAt: string;

  /** SHA-256 over the canonical event content plus `previousHash` */
  readonly hash: string;

  /** Hash of the event at `globalPosition - 1`, or GENESIS_HASH */
  readonly previousHash: string;
}

/** A stored event before it is linked into the hash chain. */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append Result / Read Options
// =============================================================================

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Only return events of this type */
  readonly type?: string;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are contiguous with no gaps
 * - Handlers see events in global order, after the append committed
 */
export interface EventStore {
  /**
   * Append one or more events to a stream. All or nothing.
   *
   * @throws EventStoreError if the stream ID or the batch is empty
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /** Events of one stream in version order (empty if the stream is unknown). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /** Receive every event appended from now on. */
  subscribeAll(handler: EventHandler): Subscription;

  /** Current version of a stream, 0 if it does not exist. */
  streamVersion(streamId: string): number;

  /** Position of the last event, 0 if the store is empty. */
  globalPosition(): number;

  /** Recompute and check the hash chain. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
