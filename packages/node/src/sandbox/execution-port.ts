/**
 * SandboxExecutionPort — simulated strategy execution.
 *
 * Holds principal per strategy in memory. A harvest pays simple interest on
 * the current principal at the strategy's APY for the time since the last
 * harvest. Repeated calls with the same
 * idempotency key return the first receipt or report without moving funds
 * again.
 */

import type { Money } from "@tidewater/types";
import { formatAmount, mulDiv, parseAmount, toMoney } from "@tidewater/money";
import type { Clock } from "@tidewater/runtime";
import { isoTime, systemClock } from "@tidewater/runtime";
import type {
  ExecutionOptions,
  ExecutionPort,
  ExecutionReceipt,
  YieldReport,
} from "@tidewater/vault";
import { ExecutionError } from "@tidewater/vault";

const YEAR_MS = 365n * 24n * 60n * 60n * 1000n;

/** APY is applied with this many fractional digits */
const APY_SCALE = 1_000_000n;

interface Holding {
  principal: bigint;
  accruedSince: number;
  decimals: number;
  currency: string;
}

export interface SandboxExecutionPortOptions {
  /** Annual yield per strategy id, as a fraction */
  readonly apy: ReadonlyMap<string, number>;
  readonly clock?: Clock;
}

export class SandboxExecutionPort implements ExecutionPort {
  private readonly _apy: ReadonlyMap<string, number>;
  private readonly _clock: Clock;
  private readonly _holdings = new Map<string, Holding>();
  private readonly _receipts = new Map<string, ExecutionReceipt>();
  private readonly _reports = new Map<string, YieldReport>();

  constructor(options: SandboxExecutionPortOptions) {
    this._apy = options.apy;
    this._clock = options.clock ?? systemClock;
  }

  deploy(strategyId: string, amount: Money, options?: ExecutionOptions): Promise<ExecutionReceipt> {
    return this._once(options, () => {
      const holding = this._holding(strategyId, amount);
      this._settleInterest(holding);
      holding.principal += parseAmount(amount.amount, amount.decimals);
      return this._receipt(strategyId, amount);
    });
  }

  withdraw(strategyId: string, amount: Money, options?: ExecutionOptions): Promise<ExecutionReceipt> {
    return this._once(options, () => {
      const holding = this._holding(strategyId, amount);
      const value = parseAmount(amount.amount, amount.decimals);
      if (value > holding.principal) {
        throw new ExecutionError(
          `Strategy ${strategyId} holds ${formatAmount(holding.principal, holding.decimals)}, asked for ${amount.amount}`,
          false,
          strategyId,
        );
      }
      this._settleInterest(holding);
      holding.principal -= value;
      return this._receipt(strategyId, amount);
    });
  }

  harvest(strategyId: string, options?: ExecutionOptions): Promise<YieldReport> {
    if (!this._apy.has(strategyId)) {
      return Promise.reject(new ExecutionError(`Unknown strategy ${strategyId}`, false, strategyId));
    }
    const key = options?.idempotencyKey;
    const previous = key !== undefined ? this._reports.get(key) : undefined;
    if (previous !== undefined) return Promise.resolve(previous);

    const holding = this._holdings.get(strategyId);
    const accrued = holding === undefined ? 0n : this._interest(strategyId, holding);
    if (holding !== undefined) holding.accruedSince = this._clock.now();

    const report: YieldReport = {
      strategyId,
      realizedYield: toMoney(accrued, holding?.currency ?? "USDC", holding?.decimals ?? 6),
      reportedAt: isoTime(this._clock),
    };
    if (key !== undefined) this._reports.set(key, report);
    return Promise.resolve(report);
  }

  /** Principal currently held by a strategy */
  balanceOf(strategyId: string): bigint {
    return this._holdings.get(strategyId)?.principal ?? 0n;
  }

  /**
   * Set a strategy's principal, e.g. from a restored ledger after restart.
   */
  restore(strategyId: string, principal: Money): void {
    const holding = this._holding(strategyId, principal);
    holding.principal = parseAmount(principal.amount, principal.decimals);
    holding.accruedSince = this._clock.now();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _once(
    options: ExecutionOptions | undefined,
    run: () => ExecutionReceipt,
  ): Promise<ExecutionReceipt> {
    const key = options?.idempotencyKey;
    const previous = key !== undefined ? this._receipts.get(key) : undefined;
    if (previous !== undefined) return Promise.resolve(previous);

    try {
      const receipt = run();
      if (key !== undefined) this._receipts.set(key, receipt);
      return Promise.resolve(receipt);
    } catch (err: unknown) {
      return Promise.reject(err);
    }
  }

  private _holding(strategyId: string, amount: Money): Holding {
    if (!this._apy.has(strategyId)) {
      throw new ExecutionError(`Unknown strategy ${strategyId}`, false, strategyId);
    }
    let holding = this._holdings.get(strategyId);
    if (holding === undefined) {
      holding = {
        principal: 0n,
        accruedSince: this._clock.now(),
        decimals: amount.decimals,
        currency: amount.currency,
      };
      this._holdings.set(strategyId, holding);
    }
    return holding;
  }

  /** An empty holding starts accruing from its first deposit. */
  private _settleInterest(holding: Holding): void {
    if (holding.principal === 0n) holding.accruedSince = this._clock.now();
  }

  private _interest(strategyId: string, holding: Holding): bigint {
    const elapsed = BigInt(Math.max(0, this._clock.now() - holding.accruedSince));
    const apy = BigInt(Math.round((this._apy.get(strategyId) ?? 0) * Number(APY_SCALE)));
    return mulDiv(holding.principal, apy * elapsed, APY_SCALE * YEAR_MS);
  }

  private _receipt(strategyId: string, amount: Money): ExecutionReceipt {
    return { strategyId, requested: amount, moved: amount, executedAt: isoTime(this._clock) };
  }
}
