/**
 * @tidewater/vault — Types.
 *
 * Public views carry amounts as Money (decimal strings). The ledger keeps
 * bigint internally and converts at this boundary.
 */

import type { ChainId, Money } from "@tidewater/types";
import type { RetryConfig } from "@tidewater/runtime";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultAsset {
  readonly currency: string;
  readonly decimals: number;
}

export interface VaultConfig {
  readonly id: string;
  readonly asset: VaultAsset;
  /** Chain holding vault cash. Strategies elsewhere are reached by bridge. */
  readonly homeChainId: ChainId;

  readonly minDeposit: string;
  readonly maxDeposit: string;

  readonly performanceFeeBps: number;
  /** Charged on every withdrawal */
  readonly withdrawalFeeBps: number;
  /** Charged on withdrawals before the position's lockup release */
  readonly earlyWithdrawalPenaltyBps: number;
  readonly lockupMs: number;

  /** Receipt shortfall beyond this raises an alert */
  readonly maxSlippageBps: number;
  /** Halt when capital in disabled strategies exceeds this share of total assets */
  readonly emergencyShutdownThresholdBps: number;

  readonly harvestEpochMs: number;
  /** Idle cash at or above this triggers background deployment after a deposit */
  readonly deploymentThreshold: string;

  /** ExecutionPort retry policy */
  readonly retry: RetryConfig;
}

export const DEFAULT_VAULT_CONFIG: Omit<VaultConfig, "id" | "asset" | "homeChainId"> = {
  minDeposit: "0",
  maxDeposit: "1000000000",
  performanceFeeBps: 1_000,
  withdrawalFeeBps: 50,
  earlyWithdrawalPenaltyBps: 500,
  lockupMs: 7 * 24 * 60 * 60 * 1000,
  maxSlippageBps: 100,
  emergencyShutdownThresholdBps: 2_000,
  harvestEpochMs: 24 * 60 * 60 * 1000,
  deploymentThreshold: "1000",
  retry: { maxAttempts: 3, baseDelayMs: 1_000, maxDelayMs: 30_000, jitterMs: 200 },
};

// =============================================================================
// State
// =============================================================================

export type VaultStatus = "active" | "rebalancing" | "emergency_shutdown";

export type TransitPurpose = "deployment" | "withdrawal" | "return";

/**
 * - executing: an ExecutionPort call is running
 * - bridging: a bridge transfer carries the funds
 * - deploying: bridged funds arrived and are being deployed remotely
 */
export type TransitStage = "executing" | "bridging" | "deploying";

export interface InTransitView {
  readonly id: string;
  readonly amount: Money;
  readonly purpose: TransitPurpose;
  readonly stage: TransitStage;
  readonly strategyId: string;
  readonly transferId?: string;
  readonly withdrawalId?: string;
}

export interface VaultSnapshot {
  readonly id: string;
  readonly status: VaultStatus;
  readonly statusReason?: string;
  readonly totalAssets: Money;
  readonly totalShares: Money;
  readonly cash: Money;
  /** Cash earmarked for pending withdrawals */
  readonly reservedCash: Money;
  /** Fees and penalties held outside NAV */
  readonly accruedFees: Money;
  readonly deployed: Readonly<Record<string, Money>>;
  readonly inTransit: readonly InTransitView[];
  /** Total assets per share, as a decimal string; "1" while no shares exist */
  readonly sharePrice: string;
  readonly lastHarvestEpoch: number | null;
  readonly planId: string | null;
  readonly takenAt: string;
}

export interface UserPosition {
  readonly owner: string;
  readonly shares: Money;
  /** Current redemption value before fees */
  readonly value: Money;
  readonly depositedAt: string;
  readonly lockupReleaseAt?: string;
  readonly pendingWithdrawalId?: string;
}

export type WithdrawalStatus = "pending" | "completed" | "failed";

export type UnwindLegStatus = "executing" | "bridging" | "completed" | "failed";

export interface UnwindLegView {
  readonly strategyId: string;
  readonly amount: Money;
  readonly status: UnwindLegStatus;
  readonly transferIds: readonly string[];
  readonly received: Money;
}

export interface PendingWithdrawal {
  readonly id: string;
  readonly owner: string;
  readonly shares: Money;
  readonly gross: Money;
  readonly penalty: Money;
  /** Paid out (completed) or expected (pending) */
  readonly net: Money;
  readonly reserved: Money;
  readonly requestedAt: string;
  readonly resolvedAt?: string;
  readonly status: WithdrawalStatus;
  readonly failureReason?: string;
  readonly legs: readonly UnwindLegView[];
}

export interface VaultMetrics {
  readonly tvlHistory: readonly { readonly at: string; readonly totalAssets: string }[];
  /** Annualized net yield per harvest, as a fraction */
  readonly apyHistory: readonly { readonly at: string; readonly apy: number }[];
  readonly totalUsers: number;
  readonly lifetimeYield: Money;
  readonly lifetimeFeesCollected: Money;
}

export const METRICS_HISTORY_LIMIT = 30;

// =============================================================================
// Operation results
// =============================================================================

export interface DepositOptions {
  /** Longer lockup for this deposit; the configured lockup is the minimum */
  readonly lockupMs?: number;
}

export interface DepositReceipt {
  readonly owner: string;
  readonly amount: Money;
  readonly sharesMinted: Money;
  readonly position: UserPosition;
}

export type HarvestOutcome = "HARVESTED" | "ZERO_YIELD_AVAILABLE";

export interface HarvestResult {
  readonly outcome: HarvestOutcome;
  readonly epoch: number;
  readonly grossYield: Money;
  readonly performanceFee: Money;
  readonly netYield: Money;
  readonly perStrategy: readonly { readonly strategyId: string; readonly realizedYield: Money }[];
  /** Strategies whose harvest call failed after retries */
  readonly failed: readonly string[];
}

export type MoveDirection = "deploy" | "withdraw";

export type MoveStatus = "completed" | "bridging" | "failed" | "skipped";

export interface MoveResult {
  readonly strategyId: string;
  readonly direction: MoveDirection;
  readonly amount: Money;
  readonly status: MoveStatus;
  readonly detail?: string;
}

export interface RebalanceResult {
  readonly planId: string;
  readonly moves: readonly MoveResult[];
  /** A newer plan took over before every move was issued */
  readonly superseded: boolean;
  readonly status: VaultStatus;
}

export interface FeeReceipt {
  readonly amount: Money;
  readonly collectedAt: string;
}

export interface ConsistencyReport {
  readonly consistent: boolean;
  readonly violations: readonly string[];
}
