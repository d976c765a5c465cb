/**
 * @tidewater/strategy — Core types.
 *
 * Strategies are yield sources the vault can deploy into. The catalog owns
 * their definitions and return history; scores and plans are derived.
 */

import type { Bps, ChainId, Money } from "@tidewater/types";

// =============================================================================
// Strategy
// =============================================================================

export type StrategyKind = "lending" | "swap" | "liquidity";

/**
 * Exit terms. A fixed lockup means early exit costs `earlyExitPenaltyBps`.
 */
export type LockupTerms =
  | { readonly kind: "none" }
  | {
      readonly kind: "fixed";
      readonly durationMs: number;
      readonly earlyExitPenaltyBps: Bps;
    };

export interface StrategyDefinition {
  readonly id: string;
  readonly name: string;
  readonly kind: StrategyKind;

  /** Execution environment holding this strategy's capital */
  readonly chainId: ChainId;

  readonly lockup: LockupTerms;

  /** Largest amount the strategy can absorb */
  readonly liquidityCeiling: Money;

  /** Reported pool liquidity in USD, compared against the allocator minimum */
  readonly liquidityUsd: number;

  /** Diversification cap for this strategy */
  readonly maxAllocationBps: Bps;
}

export type StrategyStatus = "enabled" | "disabled";

export interface ReturnSample {
  /** Period return as a fraction (0.001 = 0.1%) */
  readonly value: number;
  readonly recordedAt: string;
}

export interface Strategy extends StrategyDefinition {
  readonly status: StrategyStatus;
  readonly disabledReason?: string;

  /** Weight from the most recently adopted plan */
  readonly targetWeightBps: Bps;

  /** Deployed amount per vault id, as reported by each vault's ledger */
  readonly deployed: Readonly<Record<string, string>>;

  /** Trailing period returns, most recent last */
  readonly returns: readonly ReturnSample[];

  readonly registeredAt: string;
}

// =============================================================================
// Scoring
// =============================================================================

export type ScoreResult =
  | {
      readonly ok: true;
      readonly score: number;
      readonly mean: number;
      readonly volatility: number;
      readonly samples: number;
    }
  | {
      readonly ok: false;
      readonly reason: "INSUFFICIENT_HISTORY";
      readonly samples: number;
      readonly required: number;
    };

export interface ScoredStrategy {
  readonly strategy: Strategy;
  readonly result: ScoreResult;
}

// =============================================================================
// Allocation
// =============================================================================

export type PlanMode = "normal" | "emergency" | "idle";

export type ExclusionReason =
  | "INSUFFICIENT_HISTORY"
  | "DISABLED"
  | "NON_POSITIVE_SCORE"
  | "BELOW_MIN_LIQUIDITY"
  | "ZERO_CAP"
  | "NOT_EXIT_CAPABLE"
  | "EMERGENCY_SHUTDOWN";

export interface PlanWeight {
  readonly strategyId: string;
  readonly weightBps: Bps;
  readonly capBps: Bps;
  readonly score: number | null;
  readonly excludedBecause?: ExclusionReason;
}

/**
 * Immutable target split. Σ weightBps + unallocatedBps = 10 000.
 */
export interface AllocationPlan {
  readonly id: string;
  readonly issuedAt: string;
  readonly mode: PlanMode;

  /** Eligible strategies first in rank order, then excluded ones by id */
  readonly weights: readonly PlanWeight[];

  /** Share that stays as uninvested cash */
  readonly unallocatedBps: Bps;
}

// =============================================================================
// Errors
// =============================================================================

export type CatalogErrorCode =
  | "STRATEGY_EXISTS"
  | "STRATEGY_NOT_FOUND"
  | "INVALID_STRATEGY"
  | "INVALID_RETURN"
  | "INVALID_CONFIG";

export class CatalogError extends Error {
  public readonly category = "input" as const;
  public readonly transient = false;

  constructor(
    public readonly code: CatalogErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "CatalogError";
  }
}
