/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed state change is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which subsystem)
 * - Events are emitted only after the operation that caused them committed
 * - No UPDATE, no DELETE — only new events
 */

/** Subsystems that emit events. */
export type EventSource = "minting" | "equity";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address (or "system") that caused this event */
  readonly actor: string;

  /** ID for grouping events emitted by one operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 *
 * Payloads must be JSON-safe: amounts are decimal strings, not bigint.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "equity.payment.released") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload */
  readonly payload: Readonly<Record<string, unknown>>;
}
