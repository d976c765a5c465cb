/**
 * @tidewater/store — File-based JSONL StateStore.
 *
 * Stores one commit per line in a `.jsonl` journal. The key-value state is
 * rebuilt by replaying the journal on construction.
 *
 * Crash safety:
 * - A commit is a single line written with one append + fsync
 * - A torn final line (partial write) is ignored on load and cut from the
 *   file, so a crash mid-commit leaves the previous state intact and the
 *   next commit starts on a clean line
 * - A corrupt line anywhere else, or a broken hash chain, refuses to load
 *
 * File format:
 * {"revision":1,"committedAt":"...","ops":[...],"previousHash":"genesis","hash":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
} from "node:fs";
import { dirname } from "node:path";
import type {
  CommitRecord,
  CommitResult,
  JsonValue,
  StateEntry,
  StateOp,
  StateStore,
  StoreIntegrityResult,
} from "./types.js";
import { StoreError } from "./types.js";
import {
  applyOps,
  buildCommit,
  computeCommitHash,
  GENESIS_HASH,
  isCommitRecord,
  validateOps,
  verifyCommits,
} from "./commit-log.js";

export interface JsonlStateStoreOptions {
  /** Path to the journal file */
  readonly filePath: string;
}

export class JsonlStateStore implements StateStore {
  private readonly _filePath: string;
  private readonly _state = new Map<string, JsonValue>();
  private readonly _commits: CommitRecord[] = [];
  private _skippedTornLine = false;
  /** The last record on disk has no trailing newline yet */
  private _openTail = false;

  /**
   * Open (or create) the journal. The parent directory is created if needed.
   */
  constructor(options: JsonlStateStoreOptions) {
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  // ─── Write ──────────────────────────────────────────────────────────

  commit(ops: readonly StateOp[]): CommitResult {
    validateOps(ops);

    const last = this._commits[this._commits.length - 1];
    const record = buildCommit(this._commits.length + 1, ops, last?.hash ?? GENESIS_HASH);

    const line = JSON.stringify(record) + "\n";
    this._writeAndSync(this._openTail ? "\n" + line : line);
    this._openTail = false;

    // Memory changes only after the line is durable
    applyOps(this._state, ops);
    this._commits.push(record);

    return { revision: record.revision, hash: record.hash, count: ops.length };
  }

  // ─── Read ───────────────────────────────────────────────────────────

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

  get filePath(): string {
    return this._filePath;
  }

  /** True when the last load ignored a partially written final line */
  get recoveredFromTornWrite(): boolean {
    return this._skippedTornLine;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const segments = readFileSync(this._filePath, "utf-8").split("\n");
    let lastIndex = segments.length - 1;
    while (lastIndex >= 0 && (segments[lastIndex] ?? "").trim().length === 0) {
      lastIndex--;
    }

    // Byte offset just past the last valid record
    let offset = 0;
    let goodEnd = 0;

    segments.forEach((raw, index) => {
      const terminated = index < segments.length - 1;
      offset += Buffer.byteLength(raw, "utf-8") + (terminated ? 1 : 0);

      const line = raw.trim();
      if (line.length === 0) {
        return;
      }

      const record = this._parseLine(line);
      if (record === undefined) {
        if (index === lastIndex) {
          this._skippedTornLine = true;
          return;
        }
        throw new StoreError(
          "CORRUPT_JOURNAL",
          `Journal ${this._filePath} line ${String(index + 1)} is unreadable`,
        );
      }

      const previousHash = this._commits[this._commits.length - 1]?.hash ?? GENESIS_HASH;
      const expected = computeCommitHash(
        record.revision,
        record.committedAt,
        record.ops,
        previousHash,
      );
      if (
        record.revision !== this._commits.length + 1 ||
        record.previousHash !== previousHash ||
        record.hash !== expected
      ) {
        throw new StoreError(
          "CORRUPT_JOURNAL",
          `Journal ${this._filePath} revision ${String(record.revision)} fails hash verification`,
        );
      }

      applyOps(this._state, record.ops);
      this._commits.push(record);
      goodEnd = offset;
      this._openTail = !terminated;
    });

    if (this._skippedTornLine) {
      this._truncate(goodEnd);
    }
  }

  private _truncate(length: number): void {
    try {
      truncateSync(this._filePath, length);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new StoreError("WRITE_FAILED", `Failed to cut torn journal tail: ${reason}`);
    }
  }

  private _parseLine(line: string): CommitRecord | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      return undefined;
    }
    return isCommitRecord(parsed) ? parsed : undefined;
  }

  private _writeAndSync(data: string): void {
    let fd: number | undefined;
    try {
      appendFileSync(this._filePath, data, "utf-8");
      fd = openSync(this._filePath, "r+");
      fsyncSync(fd);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new StoreError("WRITE_FAILED", `Failed to write journal: ${reason}`);
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }
  }
}
