/**
 * @tidewater/bridge — Transfer records in a StateStore.
 *
 * Key layout: `bridge/<namespace>/transfers/<transferId>`
 */

import { z } from "zod";
import type { JsonValue, StateStore } from "@tidewater/store";
import type { BridgeTransfer } from "./types.js";
import { BridgeError } from "./types.js";

const MoneySchema = z.object({
  amount: z.string(),
  currency: z.string(),
  decimals: z.number().int().min(0),
});

const TransferRecordSchema = z.object({
  id: z.string().min(1),
  sourceChainId: z.string(),
  destinationChainId: z.string(),
  amount: MoneySchema,
  fee: MoneySchema,
  state: z.enum(["initiated", "submitted", "pending_confirmation", "confirmed", "failed", "refunded"]),
  requiredConfirmations: z.number().int().min(0),
  confirmations: z.number().int().min(0),
  retryCount: z.number().int().min(0),
  terminal: z.boolean(),
  createdAt: z.string(),
  lastAttemptAt: z.string().nullable(),
  submittedAt: z.string().nullable(),
  confirmedAt: z.string().nullable(),
  nextAttemptAt: z.string().nullable(),
  failureReason: z
    .enum(["CAPACITY_OR_VALIDATION_REJECTED", "SUBMISSION_FAILED", "CONFIRMATION_TIMEOUT"])
    .nullable(),
  failureDetail: z.string().nullable(),
  handle: z.object({ id: z.string(), txHash: z.string().nullable() }).nullable(),
  memo: z.record(z.string()),
});

export function transferKeyPrefix(namespace: string): string {
  return `bridge/${namespace}/transfers/`;
}

export function transferKey(namespace: string, id: string): string {
  return transferKeyPrefix(namespace) + id;
}

/**
 * Absent optional fields are written as null so every record has the same keys.
 */
export function encodeTransfer(t: BridgeTransfer): JsonValue {
  return {
    id: t.id,
    sourceChainId: t.sourceChainId,
    destinationChainId: t.destinationChainId,
    amount: { amount: t.amount.amount, currency: t.amount.currency, decimals: t.amount.decimals },
    fee: { amount: t.fee.amount, currency: t.fee.currency, decimals: t.fee.decimals },
    state: t.state,
    requiredConfirmations: t.requiredConfirmations,
    confirmations: t.confirmations,
    retryCount: t.retryCount,
    terminal: t.terminal,
    createdAt: t.createdAt,
    lastAttemptAt: t.lastAttemptAt ?? null,
    submittedAt: t.submittedAt ?? null,
    confirmedAt: t.confirmedAt ?? null,
    nextAttemptAt: t.nextAttemptAt ?? null,
    failureReason: t.failureReason ?? null,
    failureDetail: t.failureDetail ?? null,
    handle: t.handle !== undefined ? { id: t.handle.id, txHash: t.handle.txHash ?? null } : null,
    memo: { ...t.memo },
  };
}

export function decodeTransfer(key: string, value: JsonValue): BridgeTransfer {
  const parsed = TransferRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw new BridgeError("CORRUPT_STATE", `Stored transfer at "${key}" is malformed`);
  }
  const r = parsed.data;
  return {
    id: r.id,
    sourceChainId: r.sourceChainId,
    destinationChainId: r.destinationChainId,
    amount: r.amount,
    fee: r.fee,
    state: r.state,
    requiredConfirmations: r.requiredConfirmations,
    confirmations: r.confirmations,
    retryCount: r.retryCount,
    terminal: r.terminal,
    createdAt: r.createdAt,
    memo: r.memo,
    ...(r.lastAttemptAt !== null ? { lastAttemptAt: r.lastAttemptAt } : {}),
    ...(r.submittedAt !== null ? { submittedAt: r.submittedAt } : {}),
    ...(r.confirmedAt !== null ? { confirmedAt: r.confirmedAt } : {}),
    ...(r.nextAttemptAt !== null ? { nextAttemptAt: r.nextAttemptAt } : {}),
    ...(r.failureReason !== null ? { failureReason: r.failureReason } : {}),
    ...(r.failureDetail !== null ? { failureDetail: r.failureDetail } : {}),
    ...(r.handle !== null
      ? {
          handle: {
            id: r.handle.id,
            ...(r.handle.txHash !== null ? { txHash: r.handle.txHash } : {}),
          },
        }
      : {}),
  };
}

export function loadTransfers(store: StateStore, namespace: string): BridgeTransfer[] {
  return store
    .list(transferKeyPrefix(namespace))
    .map((entry) => decodeTransfer(entry.key, entry.value));
}
