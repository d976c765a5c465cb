/**
 * @tidewater/strategy — Allocator.
 *
 * Turns ranked scores into an AllocationPlan:
 *
 * 1. Filter: scored, enabled, positive score, liquidity at or above the
 *    minimum, non-zero cap.
 * 2. Weight proportional to score, in whole basis points. The rounding
 *    remainder goes to the top-ranked strategy.
 * 3. Cascade in rank order: weight above a strategy's cap moves to the
 *    next-ranked strategy. Excess that falls off the end is offered again,
 *    in rank order, to strategies with headroom; the rest stays cash.
 *
 * Emergency shutdown replaces all of this with 100% to the lowest-risk
 * exit-capable strategy, or 100% cash when none qualifies.
 */

import { randomUUID } from "node:crypto";
import { BPS_DENOMINATOR } from "@tidewater/types";
import { bpsOf, toScaled } from "@tidewater/money";
import type {
  AllocationPlan,
  ExclusionReason,
  PlanMode,
  PlanWeight,
  ScoredStrategy,
  Strategy,
} from "./types.js";
import { CatalogError } from "./types.js";
import { compareScored } from "./risk-scorer.js";

export interface AllocatorConfig {
  /** Global per-strategy weight limit */
  readonly maxStrategyWeightBps: number;
  /** Largest position as a share of total assets */
  readonly maxPositionSizeBps: number;
  readonly minLiquidityUsd: number;
}

export const DEFAULT_ALLOCATOR_CONFIG: AllocatorConfig = {
  maxStrategyWeightBps: 4_000,
  maxPositionSizeBps: 5_000,
  minLiquidityUsd: 1_000_000,
};

export interface AllocationOptions {
  readonly emergencyShutdown?: boolean;
  /** Vault total assets, scaled to the ceiling's decimals. Enables liquidity-ceiling caps. */
  readonly totalAssets?: bigint;
  readonly planId?: string;
  readonly issuedAt?: string;
}

interface Candidate {
  readonly scored: ScoredStrategy;
  readonly score: number;
  readonly capBps: number;
}

function freezePlan(
  id: string,
  issuedAt: string,
  mode: PlanMode,
  weights: PlanWeight[],
  unallocatedBps: number,
): AllocationPlan {
  return Object.freeze({
    id,
    issuedAt,
    mode,
    weights: Object.freeze(weights.map((w) => Object.freeze(w))),
    unallocatedBps,
  });
}

function byId(a: PlanWeight, b: PlanWeight): number {
  return a.strategyId < b.strategyId ? -1 : a.strategyId > b.strategyId ? 1 : 0;
}

function scoreOf(scored: ScoredStrategy): number | null {
  return scored.result.ok ? scored.result.score : null;
}

export class Allocator {
  readonly config: AllocatorConfig;

  constructor(config: Partial<AllocatorConfig> = {}) {
    this.config = { ...DEFAULT_ALLOCATOR_CONFIG, ...config };

    for (const [name, value] of [
      ["maxStrategyWeightBps", this.config.maxStrategyWeightBps],
      ["maxPositionSizeBps", this.config.maxPositionSizeBps],
    ] as const) {
      if (!Number.isInteger(value) || value < 0 || value > BPS_DENOMINATOR) {
        throw new CatalogError("INVALID_CONFIG", `${name} must be an integer between 0 and 10000`);
      }
    }
    if (this.config.minLiquidityUsd < 0) {
      throw new CatalogError("INVALID_CONFIG", "minLiquidityUsd must not be negative");
    }
  }

  /**
   * Effective weight cap of a strategy in basis points.
   */
  capFor(strategy: Strategy, totalAssets?: bigint): number {
    let cap = Math.min(
      strategy.maxAllocationBps,
      this.config.maxStrategyWeightBps,
      this.config.maxPositionSizeBps,
    );
    if (totalAssets !== undefined && totalAssets > 0n) {
      const ceiling = toScaled(strategy.liquidityCeiling);
      cap = Math.min(cap, Math.min(BPS_DENOMINATOR, bpsOf(ceiling, totalAssets)));
    }
    return cap;
  }

  allocate(scored: readonly ScoredStrategy[], options: AllocationOptions = {}): AllocationPlan {
    const id = options.planId ?? randomUUID();
    const issuedAt = options.issuedAt ?? new Date().toISOString();

    if (options.emergencyShutdown === true) {
      return this._emergencyPlan(scored, id, issuedAt);
    }

    const candidates: Candidate[] = [];
    const excluded: PlanWeight[] = [];

    for (const entry of [...scored].sort(compareScored)) {
      const capBps = this.capFor(entry.strategy, options.totalAssets);
      const reason = this._exclusionReason(entry, capBps);
      if (reason !== undefined || !entry.result.ok) {
        excluded.push({
          strategyId: entry.strategy.id,
          weightBps: 0,
          capBps,
          score: scoreOf(entry),
          excludedBecause: reason ?? "INSUFFICIENT_HISTORY",
        });
        continue;
      }
      candidates.push({ scored: entry, score: entry.result.score, capBps });
    }

    excluded.sort(byId);

    if (candidates.length === 0) {
      return freezePlan(id, issuedAt, "idle", excluded, BPS_DENOMINATOR);
    }

    const weights = this._proportional(candidates);
    const unallocatedBps = this._cascade(weights, candidates.map((c) => c.capBps));

    const planned: PlanWeight[] = candidates.map((c, i) => ({
      strategyId: c.scored.strategy.id,
      weightBps: weights[i] ?? 0,
      capBps: c.capBps,
      score: c.score,
    }));

    return freezePlan(id, issuedAt, "normal", [...planned, ...excluded], unallocatedBps);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _exclusionReason(entry: ScoredStrategy, capBps: number): ExclusionReason | undefined {
    const { strategy, result } = entry;
    if (strategy.status === "disabled") return "DISABLED";
    if (!result.ok) return "INSUFFICIENT_HISTORY";
    if (strategy.liquidityUsd < this.config.minLiquidityUsd) return "BELOW_MIN_LIQUIDITY";
    if (result.score <= 0) return "NON_POSITIVE_SCORE";
    if (capBps <= 0) return "ZERO_CAP";
    return undefined;
  }

  private _proportional(candidates: readonly Candidate[]): number[] {
    const total = candidates.reduce((sum, c) => sum + c.score, 0);
    const weights = candidates.map((c) => Math.floor((c.score / total) * BPS_DENOMINATOR));
    const assigned = weights.reduce((sum, w) => sum + w, 0);
    weights[0] = (weights[0] ?? 0) + (BPS_DENOMINATOR - assigned);
    return weights;
  }

  /**
   * Clip to caps in rank order, pushing excess down the ranking.
   * Mutates `weights`; returns the basis points nobody could take.
   */
  private _cascade(weights: number[], caps: readonly number[]): number {
    let carry = 0;

    for (let i = 0; i < weights.length; i++) {
      const cap = caps[i] ?? 0;
      const weight = (weights[i] ?? 0) + carry;
      carry = Math.max(0, weight - cap);
      weights[i] = weight - carry;
    }

    for (let i = 0; i < weights.length && carry > 0; i++) {
      const room = (caps[i] ?? 0) - (weights[i] ?? 0);
      const take = Math.min(room, carry);
      weights[i] = (weights[i] ?? 0) + take;
      carry -= take;
    }

    return carry;
  }

  private _emergencyPlan(
    scored: readonly ScoredStrategy[],
    id: string,
    issuedAt: string,
  ): AllocationPlan {
    const volatilityOf = (s: ScoredStrategy): number =>
      s.result.ok ? s.result.volatility : Number.POSITIVE_INFINITY;

    const exitCapable = scored
      .filter(
        (s) =>
          s.strategy.status === "enabled" &&
          s.strategy.lockup.kind === "none" &&
          s.strategy.liquidityUsd >= this.config.minLiquidityUsd,
      )
      .sort((a, b) => {
        const va = volatilityOf(a);
        const vb = volatilityOf(b);
        if (va !== vb) return va < vb ? -1 : 1;
        return a.strategy.id < b.strategy.id ? -1 : a.strategy.id > b.strategy.id ? 1 : 0;
      });

    const target = exitCapable[0];
    const weights: PlanWeight[] = scored
      .map((s): PlanWeight => {
        const capBps = this.capFor(s.strategy);
        if (target !== undefined && s.strategy.id === target.strategy.id) {
          return { strategyId: s.strategy.id, weightBps: BPS_DENOMINATOR, capBps, score: scoreOf(s) };
        }
        return {
          strategyId: s.strategy.id,
          weightBps: 0,
          capBps,
          score: scoreOf(s),
          excludedBecause: exitCapable.includes(s) ? "EMERGENCY_SHUTDOWN" : "NOT_EXIT_CAPABLE",
        };
      })
      .sort((a, b) => b.weightBps - a.weightBps || byId(a, b));

    if (target === undefined) {
      return freezePlan(id, issuedAt, "idle", weights, BPS_DENOMINATOR);
    }
    return freezePlan(id, issuedAt, "emergency", weights, 0);
  }
}

/**
 * Weight of one strategy in a plan, 0 when absent.
 */
export function planWeightOf(plan: AllocationPlan, strategyId: string): number {
  return plan.weights.find((w) => w.strategyId === strategyId)?.weightBps ?? 0;
}
