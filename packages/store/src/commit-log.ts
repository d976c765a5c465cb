/**
 * @tidewater/store — Commit validation, application and hashing.
 *
 * Each commit is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to its predecessor:
 *
 *   commit[1].hash = sha256(canonicalize(body[1]) + "genesis")
 *   commit[n].hash = sha256(canonicalize(body[n]) + commit[n-1].hash)
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { isRecord } from "@tidewater/types";
import type { CommitRecord, JsonValue, StateOp, StoreIntegrityResult } from "./types.js";
import { StoreError } from "./types.js";

export const GENESIS_HASH = "genesis";

export function validateOps(ops: readonly StateOp[]): void {
  if (ops.length === 0) {
    throw new StoreError("EMPTY_COMMIT", "Cannot commit an empty batch");
  }

  const seen = new Set<string>();
  for (const op of ops) {
    if (op.key.length === 0) {
      throw new StoreError("INVALID_KEY", "Keys must be non-empty strings");
    }
    if (seen.has(op.key)) {
      throw new StoreError("DUPLICATE_KEY", `Key "${op.key}" appears twice in one commit`);
    }
    seen.add(op.key);
  }
}

export function applyOps(state: Map<string, JsonValue>, ops: readonly StateOp[]): void {
  for (const op of ops) {
    if (op.op === "put") {
      state.set(op.key, op.value);
    } else {
      state.delete(op.key);
    }
  }
}

export function computeCommitHash(
  revision: number,
  committedAt: string,
  ops: readonly StateOp[],
  previousHash: string,
): string {
  const content = canonicalize({ revision, committedAt, ops });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

export function buildCommit(
  revision: number,
  ops: readonly StateOp[],
  previousHash: string,
  committedAt: string = new Date().toISOString(),
): CommitRecord {
  return {
    revision,
    committedAt,
    ops,
    previousHash,
    hash: computeCommitHash(revision, committedAt, ops, previousHash),
  };
}

/**
 * Verify revisions are consecutive and every hash matches its content.
 */
export function verifyCommits(commits: readonly CommitRecord[]): StoreIntegrityResult {
  const errors: string[] = [];
  let previousHash = GENESIS_HASH;
  let revision = 0;

  for (const commit of commits) {
    if (commit.revision !== revision + 1) {
      errors.push(`Revision ${String(commit.revision)} follows ${String(revision)}`);
    }
    if (commit.previousHash !== previousHash) {
      errors.push(`Revision ${String(commit.revision)} does not link to its predecessor`);
    }
    const expected = computeCommitHash(
      commit.revision,
      commit.committedAt,
      commit.ops,
      commit.previousHash,
    );
    if (expected !== commit.hash) {
      errors.push(`Revision ${String(commit.revision)} hash mismatch`);
    }
    previousHash = commit.hash;
    revision = commit.revision;
  }

  return { valid: errors.length === 0, revision, errors };
}

// ─── Decoding ────────────────────────────────────────────────────────────

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "boolean":
    case "string":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isRecord(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function isStateOp(value: unknown): value is StateOp {
  if (!isRecord(value) || typeof value.key !== "string") return false;
  if (value.op === "delete") return true;
  return value.op === "put" && "value" in value && isJsonValue(value.value);
}

export function isCommitRecord(value: unknown): value is CommitRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.revision === "number" &&
    typeof value.committedAt === "string" &&
    typeof value.previousHash === "string" &&
    typeof value.hash === "string" &&
    Array.isArray(value.ops) &&
    value.ops.every(isStateOp)
  );
}
