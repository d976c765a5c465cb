/**
 * @tidewater/types — Shared primitives for the vault stack.
 *
 * - Financial primitives (Money, basis points)
 * - Chain references
 * - Domain events and the event sink contract
 * - Error classification (transient vs permanent)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Financial types
export type { Money, Currency, Bps } from "./financial.js";
export { BPS_DENOMINATOR } from "./financial.js";

// Chain types
export type { ChainId, ChainRef } from "./chain.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
  EventSeverity,
  EventSink,
} from "./event.js";

// Error classification
export type { ErrorCategory, ClassifiedError } from "./errors.js";
export { isClassifiedError, isTransientError } from "./errors.js";

// Runtime type guards
export {
  isRecord,
  isMoney,
  isBps,
  isChainRef,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
