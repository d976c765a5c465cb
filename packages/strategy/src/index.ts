/**
 * @tidewater/strategy — Strategy catalog, risk scoring and allocation.
 *
 * Flow: StrategyCatalog (history) → RiskScorer (scores) → Allocator (plan).
 */

// Types
export type {
  StrategyKind,
  LockupTerms,
  StrategyDefinition,
  StrategyStatus,
  ReturnSample,
  Strategy,
  ScoreResult,
  ScoredStrategy,
  PlanMode,
  ExclusionReason,
  PlanWeight,
  AllocationPlan,
  CatalogErrorCode,
} from "./types.js";
export { CatalogError } from "./types.js";

// Catalog
export { StrategyCatalog, StrategyDefinitionSchema, CATALOG_KEY_PREFIX } from "./catalog.js";
export type { StrategyCatalogOptions } from "./catalog.js";

// Scoring
export {
  RiskScorer,
  DEFAULT_RISK_SCORER_CONFIG,
  compareScored,
  mean,
  sampleStdDev,
} from "./risk-scorer.js";
export type { RiskScorerConfig } from "./risk-scorer.js";

// Allocation
export { Allocator, DEFAULT_ALLOCATOR_CONFIG, planWeightOf } from "./allocator.js";
export type { AllocatorConfig, AllocationOptions } from "./allocator.js";
