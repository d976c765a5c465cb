/**
 * @tidewater/vault — Ledger state.
 *
 * Working representation in bigint. Every mutation clones the state into a
 * draft, edits the draft, checks it with `verifyState` and only then
 * replaces the live state. Entries of the maps (positions, withdrawals,
 * in-transit) are never edited in place: a change replaces the entry, which
 * lets persistence find what changed by identity.
 *
 * Core invariant:
 *   totalAssets = cash + Σ deployed + Σ inTransit
 */

import type { Money } from "@tidewater/types";
import type { AllocationPlan } from "@tidewater/strategy";
import { formatAmount, mulDiv, sumScaled, toMoney } from "@tidewater/money";
import type {
  ConsistencyReport,
  InTransitView,
  PendingWithdrawal,
  TransitPurpose,
  TransitStage,
  UnwindLegStatus,
  UserPosition,
  VaultAsset,
  VaultMetrics,
  VaultSnapshot,
  VaultStatus,
  WithdrawalStatus,
} from "./types.js";

export interface PositionState {
  readonly owner: string;
  readonly shares: bigint;
  readonly depositedAt: number;
  readonly lockupReleaseAt?: number;
  readonly pendingWithdrawalId?: string;
}

export interface LegState {
  readonly strategyId: string;
  readonly amount: bigint;
  readonly status: UnwindLegStatus;
  readonly transferIds: readonly string[];
  readonly received: bigint;
}

export interface WithdrawalState {
  readonly id: string;
  readonly owner: string;
  readonly shares: bigint;
  readonly gross: bigint;
  readonly penalty: bigint;
  readonly net: bigint;
  /** Cash set aside for this withdrawal so far */
  readonly reserved: bigint;
  readonly requestedAt: number;
  readonly resolvedAt?: number;
  readonly status: WithdrawalStatus;
  readonly failureReason?: string;
  readonly legs: readonly LegState[];
}

export interface TransitEntry {
  /** Idempotency key of the port call, or the bridge transfer id */
  readonly id: string;
  readonly amount: bigint;
  readonly purpose: TransitPurpose;
  readonly stage: TransitStage;
  readonly strategyId: string;
  readonly transferId?: string;
  readonly withdrawalId?: string;
}

export interface MetricsState {
  tvl: { readonly at: number; readonly totalAssets: bigint }[];
  apy: { readonly at: number; readonly apy: number }[];
  lifetimeYield: bigint;
  lifetimeFeesCollected: bigint;
}

export interface LedgerState {
  status: VaultStatus;
  statusReason?: string;
  totalShares: bigint;
  totalAssets: bigint;
  cash: bigint;
  accruedFees: bigint;
  deployed: Map<string, bigint>;
  inTransit: Map<string, TransitEntry>;
  positions: Map<string, PositionState>;
  withdrawals: Map<string, WithdrawalState>;
  lastHarvestEpoch: number | null;
  plan: AllocationPlan | null;
  metrics: MetricsState;
}

export function emptyState(): LedgerState {
  return {
    status: "active",
    totalShares: 0n,
    totalAssets: 0n,
    cash: 0n,
    accruedFees: 0n,
    deployed: new Map(),
    inTransit: new Map(),
    positions: new Map(),
    withdrawals: new Map(),
    lastHarvestEpoch: null,
    plan: null,
    metrics: { tvl: [], apy: [], lifetimeYield: 0n, lifetimeFeesCollected: 0n },
  };
}

export function cloneState(s: LedgerState): LedgerState {
  return {
    ...s,
    deployed: new Map(s.deployed),
    inTransit: new Map(s.inTransit),
    positions: new Map(s.positions),
    withdrawals: new Map(s.withdrawals),
    metrics: {
      tvl: [...s.metrics.tvl],
      apy: [...s.metrics.apy],
      lifetimeYield: s.metrics.lifetimeYield,
      lifetimeFeesCollected: s.metrics.lifetimeFeesCollected,
    },
  };
}

// ─── Derived amounts ─────────────────────────────────────────────────────

export function reservedCash(s: LedgerState): bigint {
  let total = 0n;
  for (const w of s.withdrawals.values()) {
    if (w.status === "pending") total += w.reserved;
  }
  return total;
}

export function availableCash(s: LedgerState): bigint {
  return s.cash - reservedCash(s);
}

export function deployedOf(s: LedgerState, strategyId: string): bigint {
  return s.deployed.get(strategyId) ?? 0n;
}

/**
 * Capital committed to a strategy: deployed plus deployments on the way.
 */
export function exposureOf(s: LedgerState, strategyId: string): bigint {
  let total = deployedOf(s, strategyId);
  for (const entry of s.inTransit.values()) {
    if (entry.purpose === "deployment" && entry.strategyId === strategyId) {
      total += entry.amount;
    }
  }
  return total;
}

export function findTransitByTransfer(s: LedgerState, transferId: string): TransitEntry | undefined {
  for (const entry of s.inTransit.values()) {
    if (entry.transferId === transferId) return entry;
  }
  return undefined;
}

// ─── Invariants ──────────────────────────────────────────────────────────

export function verifyState(s: LedgerState): ConsistencyReport {
  const violations: string[] = [];

  const deployed = sumScaled(s.deployed.values());
  const inTransit = sumScaled([...s.inTransit.values()].map((e) => e.amount));
  if (s.totalAssets !== s.cash + deployed + inTransit) {
    violations.push(
      `totalAssets ${String(s.totalAssets)} != cash ${String(s.cash)} + deployed ${String(deployed)} + inTransit ${String(inTransit)}`,
    );
  }

  const shares = sumScaled([...s.positions.values()].map((p) => p.shares));
  if (s.totalShares !== shares) {
    violations.push(`totalShares ${String(s.totalShares)} != Σ position shares ${String(shares)}`);
  }

  const reserved = reservedCash(s);
  if (reserved < 0n || reserved > s.cash) {
    violations.push(`reservedCash ${String(reserved)} outside [0, cash ${String(s.cash)}]`);
  }

  if (s.cash < 0n) violations.push(`cash is negative (${String(s.cash)})`);
  if (s.accruedFees < 0n) violations.push(`accruedFees is negative (${String(s.accruedFees)})`);
  for (const [id, amount] of s.deployed) {
    if (amount < 0n) violations.push(`deployed[${id}] is negative (${String(amount)})`);
  }
  for (const entry of s.inTransit.values()) {
    if (entry.amount < 0n) violations.push(`inTransit[${entry.id}] is negative`);
  }
  for (const p of s.positions.values()) {
    if (p.shares <= 0n) violations.push(`position ${p.owner} has ${String(p.shares)} shares`);
  }

  return { consistent: violations.length === 0, violations };
}

// ─── Views ───────────────────────────────────────────────────────────────

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

export function sharePrice(s: LedgerState, asset: VaultAsset): string {
  if (s.totalShares === 0n) return "1";
  const unit = 10n ** BigInt(asset.decimals);
  return formatAmount(mulDiv(s.totalAssets, unit, s.totalShares), asset.decimals);
}

export function valueOfShares(s: LedgerState, shares: bigint): bigint {
  if (s.totalShares === 0n) return 0n;
  return mulDiv(shares, s.totalAssets, s.totalShares);
}

export function toSnapshot(
  s: LedgerState,
  id: string,
  asset: VaultAsset,
  now: number,
): VaultSnapshot {
  const money = (v: bigint): Money => toMoney(v, asset.currency, asset.decimals);
  const deployed: Record<string, Money> = {};
  for (const [strategyId, amount] of [...s.deployed].sort(([a], [b]) => (a < b ? -1 : 1))) {
    deployed[strategyId] = money(amount);
  }

  return {
    id,
    status: s.status,
    ...(s.statusReason !== undefined ? { statusReason: s.statusReason } : {}),
    totalAssets: money(s.totalAssets),
    totalShares: money(s.totalShares),
    cash: money(s.cash),
    reservedCash: money(reservedCash(s)),
    accruedFees: money(s.accruedFees),
    deployed,
    inTransit: [...s.inTransit.values()].map((e) => toTransitView(e, asset)),
    sharePrice: sharePrice(s, asset),
    lastHarvestEpoch: s.lastHarvestEpoch,
    planId: s.plan?.id ?? null,
    takenAt: iso(now),
  };
}

export function toTransitView(e: TransitEntry, asset: VaultAsset): InTransitView {
  return {
    id: e.id,
    amount: toMoney(e.amount, asset.currency, asset.decimals),
    purpose: e.purpose,
    stage: e.stage,
    strategyId: e.strategyId,
    ...(e.transferId !== undefined ? { transferId: e.transferId } : {}),
    ...(e.withdrawalId !== undefined ? { withdrawalId: e.withdrawalId } : {}),
  };
}

export function toPositionView(s: LedgerState, p: PositionState, asset: VaultAsset): UserPosition {
  return {
    owner: p.owner,
    shares: toMoney(p.shares, asset.currency, asset.decimals),
    value: toMoney(valueOfShares(s, p.shares), asset.currency, asset.decimals),
    depositedAt: iso(p.depositedAt),
    ...(p.lockupReleaseAt !== undefined ? { lockupReleaseAt: iso(p.lockupReleaseAt) } : {}),
    ...(p.pendingWithdrawalId !== undefined ? { pendingWithdrawalId: p.pendingWithdrawalId } : {}),
  };
}

export function toWithdrawalView(w: WithdrawalState, asset: VaultAsset): PendingWithdrawal {
  const money = (v: bigint): Money => toMoney(v, asset.currency, asset.decimals);
  return {
    id: w.id,
    owner: w.owner,
    shares: money(w.shares),
    gross: money(w.gross),
    penalty: money(w.penalty),
    net: money(w.net),
    reserved: money(w.reserved),
    requestedAt: iso(w.requestedAt),
    ...(w.resolvedAt !== undefined ? { resolvedAt: iso(w.resolvedAt) } : {}),
    status: w.status,
    ...(w.failureReason !== undefined ? { failureReason: w.failureReason } : {}),
    legs: w.legs.map((leg) => ({
      strategyId: leg.strategyId,
      amount: money(leg.amount),
      status: leg.status,
      transferIds: [...leg.transferIds],
      received: money(leg.received),
    })),
  };
}

export function toMetricsView(s: LedgerState, asset: VaultAsset): VaultMetrics {
  return {
    tvlHistory: s.metrics.tvl.map((t) => ({
      at: iso(t.at),
      totalAssets: formatAmount(t.totalAssets, asset.decimals),
    })),
    apyHistory: s.metrics.apy.map((a) => ({ at: iso(a.at), apy: a.apy })),
    totalUsers: s.positions.size,
    lifetimeYield: toMoney(s.metrics.lifetimeYield, asset.currency, asset.decimals),
    lifetimeFeesCollected: toMoney(s.metrics.lifetimeFeesCollected, asset.currency, asset.decimals),
  };
}
