/**
 * @mintsplit/types — Shared types for the mintsplit stack.
 *
 * Used across all packages:
 * - Primitive value shapes (addresses, hex, amount strings)
 * - Event architecture
 * - SerialQueue, the per-instance serialization boundary
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Primitives
export type { Address, Hex, AmountString } from "./primitives.js";
export { ZERO_ADDRESS } from "./primitives.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Serialization boundary
export { SerialQueue } from "./serial-queue.js";
