/**
 * @tidewater/vault — RebalanceScheduler.
 *
 * Each cycle: score the catalog, ask the Allocator for a plan, publish it to
 * the ledger, measure drift and rebalance when drift exceeds the tolerance.
 *
 * Rules:
 * - Cycles never overlap; a trigger during a cycle waits for it
 * - Drift is the largest |current weight − plan weight| over all strategies
 * - A cycle inside `minRebalanceIntervalMs` of the last rebalance is skipped
 * - While the vault is halted, plans are built in emergency mode
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSeverity, EventSink } from "@tidewater/types";
import { parseAmount } from "@tidewater/money";
import type { Clock } from "@tidewater/runtime";
import { Mutex, TaskGroup, isoTime, systemClock } from "@tidewater/runtime";
import type { AllocationPlan, Allocator, RiskScorer, StrategyCatalog } from "@tidewater/strategy";
import type { VaultLedger } from "./vault-ledger.js";

export interface SchedulerConfig {
  readonly intervalMs: number;
  readonly driftToleranceBps: number;
  readonly minRebalanceIntervalMs: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  intervalMs: 60 * 60 * 1000,
  driftToleranceBps: 200,
  minRebalanceIntervalMs: 15 * 60 * 1000,
};

export type CycleStatus = "skipped" | "rebalanced" | "failed";

export interface CycleResult {
  readonly status: CycleStatus;
  readonly reason: string;
  readonly driftBps: number;
  readonly planId: string | null;
  readonly at: string;
}

export interface RebalanceSchedulerOptions {
  readonly ledger: VaultLedger;
  readonly catalog: StrategyCatalog;
  readonly scorer: RiskScorer;
  readonly allocator: Allocator;
  readonly config?: Partial<SchedulerConfig>;
  readonly clock?: Clock;
  readonly onEvent?: EventSink;
}

/**
 * Largest weight difference in bps between current holdings and a plan.
 */
export function computeDrift(current: Readonly<Record<string, number>>, plan: AllocationPlan): number {
  const ids = new Set<string>(Object.keys(current));
  for (const w of plan.weights) ids.add(w.strategyId);

  let drift = 0;
  for (const id of ids) {
    const target = plan.weights.find((w) => w.strategyId === id)?.weightBps ?? 0;
    drift = Math.max(drift, Math.abs((current[id] ?? 0) - target));
  }
  return drift;
}

export class RebalanceScheduler {
  readonly config: SchedulerConfig;

  private readonly _ledger: VaultLedger;
  private readonly _catalog: StrategyCatalog;
  private readonly _scorer: RiskScorer;
  private readonly _allocator: Allocator;
  private readonly _clock: Clock;
  private readonly _onEvent: EventSink | undefined;
  private readonly _lock = new Mutex();
  private readonly _tasks: TaskGroup;
  private _timer: ReturnType<typeof setInterval> | undefined;
  private _lastRebalanceAt: number | undefined;
  private _lastCycle: CycleResult | undefined;

  constructor(options: RebalanceSchedulerOptions) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...options.config };
    this._ledger = options.ledger;
    this._catalog = options.catalog;
    this._scorer = options.scorer;
    this._allocator = options.allocator;
    this._clock = options.clock ?? systemClock;
    this._onEvent = options.onEvent;
    this._tasks = new TaskGroup((name, err) => {
      this._emit("scheduler.task.failed", "alert", {
        task: name,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  get running(): boolean {
    return this._timer !== undefined;
  }

  get lastCycle(): CycleResult | undefined {
    return this._lastCycle;
  }

  start(): void {
    if (this._timer !== undefined) return;
    this._timer = setInterval(() => {
      this._tasks.spawn("rebalance-cycle", async () => {
        await this.trigger("interval");
      });
    }, this.config.intervalMs);
  }

  /**
   * Stop the interval and wait for a running cycle to finish.
   */
  async stop(): Promise<void> {
    if (this._timer !== undefined) {
      clearInterval(this._timer);
      this._timer = undefined;
    }
    await this._tasks.whenIdle();
  }

  /**
   * Run one cycle now.
   */
  trigger(reason = "manual"): Promise<CycleResult> {
    return this._lock.runExclusive(() => this._cycle(reason));
  }

  private async _cycle(reason: string): Promise<CycleResult> {
    const snapshot = this._ledger.snapshot();
    const emergency = snapshot.status === "emergency_shutdown";

    let plan: AllocationPlan;
    try {
      const scored = this._scorer.scoreAll(this._catalog.list());
      plan = this._allocator.allocate(scored, {
        emergencyShutdown: emergency,
        totalAssets: parseAmount(snapshot.totalAssets.amount, snapshot.totalAssets.decimals),
        issuedAt: isoTime(this._clock),
      });
      await this._ledger.adoptPlan(plan);
    } catch (err: unknown) {
      return this._finish("failed", `planning failed: ${errorMessage(err)}`, 0, null);
    }

    const driftBps = computeDrift(this._ledger.currentWeights(), plan);
    if (driftBps <= this.config.driftToleranceBps) {
      return this._finish("skipped", `drift ${String(driftBps)} bps within tolerance`, driftBps, plan.id);
    }

    const now = this._clock.now();
    if (
      this._lastRebalanceAt !== undefined &&
      now - this._lastRebalanceAt < this.config.minRebalanceIntervalMs
    ) {
      return this._finish("skipped", "minimum rebalance interval not reached", driftBps, plan.id);
    }

    try {
      this._lastRebalanceAt = now;
      const result = await this._ledger.rebalance(plan);
      const failed = result.moves.filter((m) => m.status === "failed").length;
      return this._finish(
        failed > 0 ? "failed" : "rebalanced",
        failed > 0 ? `${String(failed)} move(s) failed (${reason})` : reason,
        driftBps,
        plan.id,
      );
    } catch (err: unknown) {
      return this._finish("failed", `rebalance failed: ${errorMessage(err)}`, driftBps, plan.id);
    }
  }

  private _finish(status: CycleStatus, reason: string, driftBps: number, planId: string | null): CycleResult {
    const result: CycleResult = { status, reason, driftBps, planId, at: isoTime(this._clock) };
    this._lastCycle = result;
    this._emit(`scheduler.cycle.${status}`, status === "failed" ? "warning" : "info", { ...result });
    return result;
  }

  private _emit(type: string, severity: EventSeverity, payload: Readonly<Record<string, unknown>>): void {
    if (this._onEvent === undefined) return;
    const event: DomainEvent = {
      type,
      severity,
      metadata: {
        eventId: randomUUID(),
        timestamp: isoTime(this._clock),
        actor: `scheduler:${this._ledger.id}`,
        correlationId: this._ledger.id,
        source: "scheduler",
      },
      payload: { vaultId: this._ledger.id, ...payload },
    };
    this._onEvent(event);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
