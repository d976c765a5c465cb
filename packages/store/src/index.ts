/**
 * @tidewater/store — Durable key-value state with atomic commits.
 *
 * Every engine operation persists its full state delta as one commit.
 */

// Types
export type {
  JsonValue,
  StateOp,
  StateEntry,
  StateStore,
  CommitRecord,
  CommitResult,
  StoreIntegrityResult,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

// Implementations
export { InMemoryStateStore } from "./in-memory-store.js";
export { JsonlStateStore } from "./jsonl-store.js";
export type { JsonlStateStoreOptions } from "./jsonl-store.js";

// Hashing
export { GENESIS_HASH, computeCommitHash, verifyCommits, isJsonValue } from "./commit-log.js";
