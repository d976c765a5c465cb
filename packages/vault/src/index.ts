/**
 * @tidewater/vault — Yield vault ledger.
 *
 * Share accounting over a pool of capital spread across strategies:
 * - VaultLedger: deposits, withdrawals, harvests and rebalances
 * - RebalanceScheduler: periodic plan → drift → rebalance cycles
 * - HealthMonitor: event window and health grading
 *
 * Design rules:
 * - totalAssets = cash + Σ deployed + Σ in transit, checked on every mutation
 * - Strategy execution goes through the ExecutionPort capability only
 * - Every mutation is one StateStore commit
 */

// Ledger
export { VaultLedger } from "./vault-ledger.js";
export type { VaultLedgerOptions } from "./vault-ledger.js";

// Scheduling
export {
  RebalanceScheduler,
  DEFAULT_SCHEDULER_CONFIG,
  computeDrift,
} from "./rebalance-scheduler.js";
export type {
  SchedulerConfig,
  CycleStatus,
  CycleResult,
  RebalanceSchedulerOptions,
} from "./rebalance-scheduler.js";

// Health
export {
  HealthMonitor,
  HEALTH_WINDOW_SIZE,
  CRITICAL_ERROR_COUNT,
  WARNING_ERROR_COUNT,
} from "./health-monitor.js";
export type { HealthStatus, HealthInputs, HealthReport } from "./health-monitor.js";

// Execution capability
export type {
  ExecutionPort,
  ExecutionOptions,
  ExecutionReceipt,
  DeployReceipt,
  WithdrawReceipt,
  YieldReport,
} from "./ports.js";

// Errors
export { VaultError, ExecutionError } from "./errors.js";
export type { VaultErrorCode } from "./errors.js";

// Persistence
export { vaultKeyPrefix, stateKey, positionKey, withdrawalKey } from "./persistence.js";

// Types
export { DEFAULT_VAULT_CONFIG, METRICS_HISTORY_LIMIT } from "./types.js";
export type {
  VaultAsset,
  VaultConfig,
  VaultStatus,
  TransitPurpose,
  TransitStage,
  InTransitView,
  VaultSnapshot,
  UserPosition,
  WithdrawalStatus,
  UnwindLegStatus,
  UnwindLegView,
  PendingWithdrawal,
  VaultMetrics,
  DepositOptions,
  DepositReceipt,
  HarvestOutcome,
  HarvestResult,
  MoveDirection,
  MoveStatus,
  MoveResult,
  RebalanceResult,
  FeeReceipt,
  ConsistencyReport,
} from "./types.js";
