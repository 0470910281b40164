/**
 * @mintsplit/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for tests, the node service's
 * process-local log, and short-lived processes. All state is lost on exit.
 *
 * Subscriptions are dispatched synchronously after an append commits.
 */

import type { DomainEvent } from "@mintsplit/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _subscribers = new Set<EventHandler>();

  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const base: UnhashedStoredEvent = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      stored.push({ ...base, hash, previousHash });
      previousHash = hash;
    });

    // Commit
    const stream = this._streams.get(streamId) ?? [];
    stream.push(...stored);
    this._streams.set(streamId, stream);
    this._globalLog.push(...stored);
    this._lastHash = previousHash;

    this._dispatch(stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return stream.filter((e) => e.version >= fromVersion);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const type = options?.type;

    return this._globalLog.filter(
      (e) =>
        e.globalPosition >= fromPosition &&
        (type === undefined || e.event.type === type),
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const handler of this._subscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}
