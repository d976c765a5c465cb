/**
 * @tidewater/strategy — RiskScorer.
 *
 * Sharpe-style score over a trailing window of period returns:
 *
 *   score = mean(r - riskFreeRate) / stddev(r) * sqrt(periodsPerYear)
 *
 * stddev is the sample standard deviation (n - 1). The same annualization
 * factor applies to every strategy, so scores are comparable.
 */

import type { ScoredStrategy, ScoreResult, Strategy } from "./types.js";
import { CatalogError } from "./types.js";

export interface RiskScorerConfig {
  /** Fewer samples than this → INSUFFICIENT_HISTORY. At least 2. */
  readonly minSamples: number;
  /** Only the most recent `windowSize` samples are scored */
  readonly windowSize: number;
  readonly periodsPerYear: number;
  /** Per-period risk-free return subtracted before averaging */
  readonly riskFreeRate: number;
  /** Scores are clamped to [-maxScore, maxScore]; zero volatility maps to ±maxScore */
  readonly maxScore: number;
}

export const DEFAULT_RISK_SCORER_CONFIG: RiskScorerConfig = {
  minSamples: 7,
  windowSize: 30,
  periodsPerYear: 365,
  riskFreeRate: 0,
  maxScore: 100,
};

export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function sampleStdDev(values: readonly number[]): number {
  const m = mean(values);
  let squares = 0;
  for (const v of values) squares += (v - m) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Ranking order: scored before unscored, then descending score, ascending
 * volatility, ascending id.
 */
export function compareScored(a: ScoredStrategy, b: ScoredStrategy): number {
  if (a.result.ok && b.result.ok) {
    if (a.result.score !== b.result.score) return b.result.score - a.result.score;
    if (a.result.volatility !== b.result.volatility) {
      return a.result.volatility - b.result.volatility;
    }
  } else if (a.result.ok !== b.result.ok) {
    return a.result.ok ? -1 : 1;
  }
  return a.strategy.id < b.strategy.id ? -1 : a.strategy.id > b.strategy.id ? 1 : 0;
}

export class RiskScorer {
  readonly config: RiskScorerConfig;

  constructor(config: Partial<RiskScorerConfig> = {}) {
    this.config = { ...DEFAULT_RISK_SCORER_CONFIG, ...config };

    if (!Number.isInteger(this.config.minSamples) || this.config.minSamples < 2) {
      throw new CatalogError("INVALID_CONFIG", "minSamples must be an integer of at least 2");
    }
    if (this.config.windowSize < this.config.minSamples) {
      throw new CatalogError("INVALID_CONFIG", "windowSize must be at least minSamples");
    }
    if (this.config.periodsPerYear <= 0 || this.config.maxScore <= 0) {
      throw new CatalogError("INVALID_CONFIG", "periodsPerYear and maxScore must be positive");
    }
  }

  /**
   * Score a return series (most recent last).
   */
  score(returns: readonly number[]): ScoreResult {
    const window = returns.slice(-this.config.windowSize);

    if (window.length < this.config.minSamples) {
      return {
        ok: false,
        reason: "INSUFFICIENT_HISTORY",
        samples: window.length,
        required: this.config.minSamples,
      };
    }

    const excessMean = mean(window.map((r) => r - this.config.riskFreeRate));
    const volatility = sampleStdDev(window);
    const { maxScore } = this.config;

    let score: number;
    if (volatility === 0) {
      score = excessMean > 0 ? maxScore : excessMean < 0 ? -maxScore : 0;
    } else {
      const raw = (excessMean / volatility) * Math.sqrt(this.config.periodsPerYear);
      score = Math.max(-maxScore, Math.min(maxScore, raw));
    }

    return { ok: true, score, mean: excessMean, volatility, samples: window.length };
  }

  scoreStrategy(strategy: Strategy): ScoredStrategy {
    return { strategy, result: this.score(strategy.returns.map((r) => r.value)) };
  }

  /**
   * Score every strategy and return them in ranking order.
   */
  scoreAll(strategies: readonly Strategy[]): ScoredStrategy[] {
    return strategies.map((s) => this.scoreStrategy(s)).sort(compareScored);
  }
}
