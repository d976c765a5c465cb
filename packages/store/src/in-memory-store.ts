/**
 * @tidewater/store — In-memory StateStore.
 *
 * For tests and single-process runs without durability. Keeps the commit
 * journal so integrity checks behave like the file-backed store.
 */

import type {
  CommitRecord,
  CommitResult,
  JsonValue,
  StateEntry,
  StateOp,
  StateStore,
  StoreIntegrityResult,
} from "./types.js";
import { applyOps, buildCommit, GENESIS_HASH, validateOps, verifyCommits } from "./commit-log.js";

export class InMemoryStateStore implements StateStore {
  private readonly _state = new Map<string, JsonValue>();
  private readonly _commits: CommitRecord[] = [];

  commit(ops: readonly StateOp[]): CommitResult {
    validateOps(ops);

    const last = this._commits[this._commits.length - 1];
    const record = buildCommit(this._commits.length + 1, ops, last?.hash ?? GENESIS_HASH);

    applyOps(this._state, ops);
    this._commits.push(record);

    return { revision: record.revision, hash: record.hash, count: ops.length };
  }

  get(key: string): JsonValue | undefined {
    return this._state.get(key);
  }

  list(prefix: string): readonly StateEntry[] {
    return [...this._state.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => ({ key, value }));
  }

  get revision(): number {
    return this._commits.length;
  }

  verifyIntegrity(): StoreIntegrityResult {
    return verifyCommits(this._commits);
  }

  /** Commit history, oldest first */
  history(): readonly CommitRecord[] {
    return [...this._commits];
  }
}
