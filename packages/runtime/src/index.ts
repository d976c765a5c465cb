/**
 * @tidewater/runtime — Async building blocks for the engine.
 */

// Retry
export {
  withRetry,
  computeDelay,
  sleep,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig } from "./retry.js";

// Time
export { systemClock, ManualClock, isoTime } from "./clock.js";
export type { Clock } from "./clock.js";

// Coordination
export { Mutex } from "./mutex.js";
export { CompletionQueue } from "./completion-queue.js";
export { TaskGroup } from "./task-group.js";
