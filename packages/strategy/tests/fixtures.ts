/**
 * Shared builders for strategy tests.
 */

import type {
  ScoredStrategy,
  Strategy,
  StrategyDefinition,
} from "../src/types.js";

export function definition(
  id: string,
  overrides: Partial<StrategyDefinition> = {},
): StrategyDefinition {
  return {
    id,
    name: `Strategy ${id}`,
    kind: "lending",
    chainId: "eip155:1",
    lockup: { kind: "none" },
    liquidityCeiling: { amount: "1000000", currency: "USDC", decimals: 6 },
    liquidityUsd: 5_000_000,
    maxAllocationBps: 10_000,
    ...overrides,
  };
}

export function strategy(id: string, overrides: Partial<Strategy> = {}): Strategy {
  return {
    ...definition(id),
    status: "enabled",
    targetWeightBps: 0,
    deployed: {},
    returns: [],
    registeredAt: "2025-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function scored(s: Strategy, score: number, volatility = 0.01): ScoredStrategy {
  return {
    strategy: s,
    result: { ok: true, score, mean: score * volatility, volatility, samples: 30 },
  };
}

export function unscored(s: Strategy, samples = 2): ScoredStrategy {
  return {
    strategy: s,
    result: { ok: false, reason: "INSUFFICIENT_HISTORY", samples, required: 7 },
  };
}
