/**
 * @tidewater/store — Core types.
 *
 * A StateStore is a key-value ledger whose only write operation is an
 * atomic batch: every op of a commit becomes visible together, or none
 * does (in memory and after a crash).
 */

/**
 * Values a store can hold. Exactly what JSON can represent.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type StateOp =
  | { readonly op: "put"; readonly key: string; readonly value: JsonValue }
  | { readonly op: "delete"; readonly key: string };

export interface StateEntry {
  readonly key: string;
  readonly value: JsonValue;
}

/**
 * One persisted commit. The hash covers revision, time and ops, chained to
 * the previous commit's hash.
 */
export interface CommitRecord {
  readonly revision: number;
  readonly committedAt: string;
  readonly ops: readonly StateOp[];
  readonly previousHash: string;
  readonly hash: string;
}

export interface CommitResult {
  readonly revision: number;
  readonly hash: string;
  readonly count: number;
}

export interface StoreIntegrityResult {
  readonly valid: boolean;
  readonly revision: number;
  readonly errors: readonly string[];
}

export interface StateStore {
  /**
   * Apply a batch atomically. Keys may appear at most once per batch.
   */
  commit(ops: readonly StateOp[]): CommitResult;

  get(key: string): JsonValue | undefined;

  /**
   * Entries whose key starts with `prefix`, sorted by key.
   */
  list(prefix: string): readonly StateEntry[];

  /** Number of commits applied so far */
  readonly revision: number;

  /** Re-verify the commit hash chain */
  verifyIntegrity(): StoreIntegrityResult;
}

export type StoreErrorCode =
  | "EMPTY_COMMIT"
  | "INVALID_KEY"
  | "DUPLICATE_KEY"
  | "WRITE_FAILED"
  | "CORRUPT_JOURNAL";

export class StoreError extends Error {
  public readonly category = "storage" as const;

  constructor(
    public readonly code: StoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "StoreError";
  }

  /** A failed disk write may succeed later; everything else will not. */
  get transient(): boolean {
    return this.code === "WRITE_FAILED";
  }
}
