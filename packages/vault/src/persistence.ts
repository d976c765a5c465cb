/**
 * @tidewater/vault — Ledger state in a StateStore.
 *
 * Key layout:
 *   vault/<id>/state                 totals, deployed, in-transit, plan, metrics
 *   vault/<id>/positions/<owner>
 *   vault/<id>/withdrawals/<wid>
 *
 * Scaled amounts are stored as integer strings. Every operation writes
 * the state record plus the positions and withdrawals it replaced, in one
 * commit.
 */

import { z } from "zod";
import type { JsonValue, StateOp, StateStore } from "@tidewater/store";
import type { AllocationPlan } from "@tidewater/strategy";
import type {
  LedgerState,
  LegState,
  PositionState,
  TransitEntry,
  WithdrawalState,
} from "./state.js";
import { emptyState } from "./state.js";
import { VaultError } from "./errors.js";

const Scaled = z
  .string()
  .regex(/^-?\d+$/)
  .transform((v) => BigInt(v));

const PlanSchema = z.object({
  id: z.string(),
  issuedAt: z.string(),
  mode: z.enum(["normal", "emergency", "idle"]),
  weights: z.array(
    z.object({
      strategyId: z.string(),
      weightBps: z.number().int(),
      capBps: z.number().int(),
      score: z.number().nullable(),
      excludedBecause: z
        .enum([
          "INSUFFICIENT_HISTORY",
          "DISABLED",
          "NON_POSITIVE_SCORE",
          "BELOW_MIN_LIQUIDITY",
          "ZERO_CAP",
          "NOT_EXIT_CAPABLE",
          "EMERGENCY_SHUTDOWN",
        ])
        .nullable(),
    }),
  ),
  unallocatedBps: z.number().int(),
});

const TransitSchema = z.object({
  id: z.string(),
  amount: Scaled,
  purpose: z.enum(["deployment", "withdrawal", "return"]),
  stage: z.enum(["executing", "bridging", "deploying"]),
  strategyId: z.string(),
  transferId: z.string().nullable(),
  withdrawalId: z.string().nullable(),
});

const CoreSchema = z.object({
  status: z.enum(["active", "rebalancing", "emergency_shutdown"]),
  statusReason: z.string().nullable(),
  totalShares: Scaled,
  totalAssets: Scaled,
  cash: Scaled,
  accruedFees: Scaled,
  deployed: z.record(Scaled),
  inTransit: z.array(TransitSchema),
  lastHarvestEpoch: z.number().int().nullable(),
  plan: PlanSchema.nullable(),
  metrics: z.object({
    tvl: z.array(z.object({ at: z.number(), totalAssets: Scaled })),
    apy: z.array(z.object({ at: z.number(), apy: z.number() })),
    lifetimeYield: Scaled,
    lifetimeFeesCollected: Scaled,
  }),
});

const PositionSchema = z.object({
  owner: z.string(),
  shares: Scaled,
  depositedAt: z.number(),
  lockupReleaseAt: z.number().nullable(),
  pendingWithdrawalId: z.string().nullable(),
});

const WithdrawalSchema = z.object({
  id: z.string(),
  owner: z.string(),
  shares: Scaled,
  gross: Scaled,
  penalty: Scaled,
  net: Scaled,
  reserved: Scaled,
  requestedAt: z.number(),
  resolvedAt: z.number().nullable(),
  status: z.enum(["pending", "completed", "failed"]),
  failureReason: z.string().nullable(),
  legs: z.array(
    z.object({
      strategyId: z.string(),
      amount: Scaled,
      status: z.enum(["executing", "bridging", "completed", "failed"]),
      transferIds: z.array(z.string()),
      received: Scaled,
    }),
  ),
});

// =============================================================================
// Keys
// =============================================================================

export function vaultKeyPrefix(vaultId: string): string {
  return `vault/${vaultId}/`;
}

export function stateKey(vaultId: string): string {
  return `${vaultKeyPrefix(vaultId)}state`;
}

export function positionKey(vaultId: string, owner: string): string {
  return `${vaultKeyPrefix(vaultId)}positions/${owner}`;
}

export function withdrawalKey(vaultId: string, id: string): string {
  return `${vaultKeyPrefix(vaultId)}withdrawals/${id}`;
}

// =============================================================================
// Encode
// =============================================================================

function encodePlan(plan: AllocationPlan): JsonValue {
  return {
    id: plan.id,
    issuedAt: plan.issuedAt,
    mode: plan.mode,
    weights: plan.weights.map((w) => ({
      strategyId: w.strategyId,
      weightBps: w.weightBps,
      capBps: w.capBps,
      score: w.score,
      excludedBecause: w.excludedBecause ?? null,
    })),
    unallocatedBps: plan.unallocatedBps,
  };
}

function encodeTransit(e: TransitEntry): JsonValue {
  return {
    id: e.id,
    amount: String(e.amount),
    purpose: e.purpose,
    stage: e.stage,
    strategyId: e.strategyId,
    transferId: e.transferId ?? null,
    withdrawalId: e.withdrawalId ?? null,
  };
}

function encodeCore(s: LedgerState): JsonValue {
  const deployed: Record<string, string> = {};
  for (const [id, amount] of s.deployed) deployed[id] = String(amount);

  return {
    status: s.status,
    statusReason: s.statusReason ?? null,
    totalShares: String(s.totalShares),
    totalAssets: String(s.totalAssets),
    cash: String(s.cash),
    accruedFees: String(s.accruedFees),
    deployed,
    inTransit: [...s.inTransit.values()].map(encodeTransit),
    lastHarvestEpoch: s.lastHarvestEpoch,
    plan: s.plan !== null ? encodePlan(s.plan) : null,
    metrics: {
      tvl: s.metrics.tvl.map((t) => ({ at: t.at, totalAssets: String(t.totalAssets) })),
      apy: s.metrics.apy.map((a) => ({ at: a.at, apy: a.apy })),
      lifetimeYield: String(s.metrics.lifetimeYield),
      lifetimeFeesCollected: String(s.metrics.lifetimeFeesCollected),
    },
  };
}

function encodePosition(p: PositionState): JsonValue {
  return {
    owner: p.owner,
    shares: String(p.shares),
    depositedAt: p.depositedAt,
    lockupReleaseAt: p.lockupReleaseAt ?? null,
    pendingWithdrawalId: p.pendingWithdrawalId ?? null,
  };
}

function encodeWithdrawal(w: WithdrawalState): JsonValue {
  return {
    id: w.id,
    owner: w.owner,
    shares: String(w.shares),
    gross: String(w.gross),
    penalty: String(w.penalty),
    net: String(w.net),
    reserved: String(w.reserved),
    requestedAt: w.requestedAt,
    resolvedAt: w.resolvedAt ?? null,
    status: w.status,
    failureReason: w.failureReason ?? null,
    legs: w.legs.map((leg) => ({
      strategyId: leg.strategyId,
      amount: String(leg.amount),
      status: leg.status,
      transferIds: [...leg.transferIds],
      received: String(leg.received),
    })),
  };
}

/**
 * Ops that take the store from `prev` to `next`.
 */
export function diffOps(vaultId: string, prev: LedgerState, next: LedgerState): StateOp[] {
  const ops: StateOp[] = [{ op: "put", key: stateKey(vaultId), value: encodeCore(next) }];

  for (const [owner, p] of next.positions) {
    if (prev.positions.get(owner) !== p) {
      ops.push({ op: "put", key: positionKey(vaultId, owner), value: encodePosition(p) });
    }
  }
  for (const owner of prev.positions.keys()) {
    if (!next.positions.has(owner)) {
      ops.push({ op: "delete", key: positionKey(vaultId, owner) });
    }
  }
  for (const [id, w] of next.withdrawals) {
    if (prev.withdrawals.get(id) !== w) {
      ops.push({ op: "put", key: withdrawalKey(vaultId, id), value: encodeWithdrawal(w) });
    }
  }

  return ops;
}

// =============================================================================
// Decode
// =============================================================================

function corrupt(key: string): VaultError {
  return new VaultError("CORRUPT_STATE", `Stored vault record at "${key}" is malformed`, { key });
}

function decodePlan(plan: z.infer<typeof PlanSchema>): AllocationPlan {
  return Object.freeze({
    ...plan,
    weights: Object.freeze(
      plan.weights.map((w) =>
        Object.freeze({
          strategyId: w.strategyId,
          weightBps: w.weightBps,
          capBps: w.capBps,
          score: w.score,
          ...(w.excludedBecause !== null ? { excludedBecause: w.excludedBecause } : {}),
        }),
      ),
    ),
  });
}

/**
 * Rebuild a vault's state. Returns undefined when nothing was stored yet.
 */
export function loadLedgerState(store: StateStore, vaultId: string): LedgerState | undefined {
  const key = stateKey(vaultId);
  const raw = store.get(key);
  if (raw === undefined) return undefined;

  const parsed = CoreSchema.safeParse(raw);
  if (!parsed.success) throw corrupt(key);
  const core = parsed.data;

  const state = emptyState();
  state.status = core.status;
  if (core.statusReason !== null) state.statusReason = core.statusReason;
  state.totalShares = core.totalShares;
  state.totalAssets = core.totalAssets;
  state.cash = core.cash;
  state.accruedFees = core.accruedFees;
  state.deployed = new Map(Object.entries(core.deployed));
  state.lastHarvestEpoch = core.lastHarvestEpoch;
  state.plan = core.plan !== null ? decodePlan(core.plan) : null;
  state.metrics = core.metrics;

  for (const e of core.inTransit) {
    const entry: TransitEntry = {
      id: e.id,
      amount: e.amount,
      purpose: e.purpose,
      stage: e.stage,
      strategyId: e.strategyId,
      ...(e.transferId !== null ? { transferId: e.transferId } : {}),
      ...(e.withdrawalId !== null ? { withdrawalId: e.withdrawalId } : {}),
    };
    state.inTransit.set(entry.id, entry);
  }

  for (const entry of store.list(`${vaultKeyPrefix(vaultId)}positions/`)) {
    const p = PositionSchema.safeParse(entry.value);
    if (!p.success) throw corrupt(entry.key);
    const position: PositionState = {
      owner: p.data.owner,
      shares: p.data.shares,
      depositedAt: p.data.depositedAt,
      ...(p.data.lockupReleaseAt !== null ? { lockupReleaseAt: p.data.lockupReleaseAt } : {}),
      ...(p.data.pendingWithdrawalId !== null
        ? { pendingWithdrawalId: p.data.pendingWithdrawalId }
        : {}),
    };
    state.positions.set(position.owner, position);
  }

  for (const entry of store.list(`${vaultKeyPrefix(vaultId)}withdrawals/`)) {
    const w = WithdrawalSchema.safeParse(entry.value);
    if (!w.success) throw corrupt(entry.key);
    const legs: LegState[] = w.data.legs;
    const withdrawal: WithdrawalState = {
      id: w.data.id,
      owner: w.data.owner,
      shares: w.data.shares,
      gross: w.data.gross,
      penalty: w.data.penalty,
      net: w.data.net,
      reserved: w.data.reserved,
      requestedAt: w.data.requestedAt,
      status: w.data.status,
      legs,
      ...(w.data.resolvedAt !== null ? { resolvedAt: w.data.resolvedAt } : {}),
      ...(w.data.failureReason !== null ? { failureReason: w.data.failureReason } : {}),
    };
    state.withdrawals.set(withdrawal.id, withdrawal);
  }

  return state;
}
