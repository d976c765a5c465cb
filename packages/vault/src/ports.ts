/**
 * @tidewater/vault — ExecutionPort.
 *
 * Capability interface the ledger moves funds through. One implementation
 * per protocol family; the ledger never sees call payloads.
 *
 * Every call may be slow or fail. Implementations reject with
 * ExecutionError and mark whether the failure is transient.
 */

import type { Money } from "@tidewater/types";

export interface ExecutionOptions {
  /**
   * Stable per move. A call repeated with the same key after a restart
   * must not move funds twice.
   */
  readonly idempotencyKey?: string;
}

export interface ExecutionReceipt {
  readonly strategyId: string;
  readonly requested: Money;
  /** Amount actually moved; may differ from `requested` by slippage */
  readonly moved: Money;
  readonly executedAt: string;
  readonly reference?: string;
}

export type DeployReceipt = ExecutionReceipt;
export type WithdrawReceipt = ExecutionReceipt;

export interface YieldReport {
  readonly strategyId: string;
  /** Realized since the previous harvest, paid to the vault */
  readonly realizedYield: Money;
  readonly reportedAt: string;
}

export interface ExecutionPort {
  deploy(strategyId: string, amount: Money, options?: ExecutionOptions): Promise<DeployReceipt>;
  withdraw(strategyId: string, amount: Money, options?: ExecutionOptions): Promise<WithdrawReceipt>;
  /** With a key, a repeated call returns the first report without paying again */
  harvest(strategyId: string, options?: ExecutionOptions): Promise<YieldReport>;
}
