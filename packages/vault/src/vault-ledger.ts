/**
 * @tidewater/vault — VaultLedger.
 *
 * Per-user shares, lockups and total-assets accounting for one vault.
 * State machine: active ⇄ rebalancing, either → emergency_shutdown,
 * emergency_shutdown → active (administrative resume).
 *
 * Concurrency:
 * - One Mutex per vault. Every accounting mutation runs inside it; no
 *   ExecutionPort or bridge call is awaited while it is held
 * - Port calls run as tracked background tasks (TaskGroup) and apply their
 *   results under the lock when they return
 * - Bridge outcomes arrive on the coordinator's completion queue and are
 *   applied by `drainBridgeOutcomes`
 *
 * Every mutation clones the state, edits the clone, verifies the core
 * invariant and persists the whole delta in one StateStore commit before the
 * clone becomes live. A failed check halts the vault.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSeverity, EventSink, Money } from "@tidewater/types";
import { isTransientError } from "@tidewater/types";
import {
  applyBps,
  bpsOf,
  minScaled,
  mulDiv,
  parseAmount,
  sumScaled,
  toMoney,
} from "@tidewater/money";
import type { Clock } from "@tidewater/runtime";
import { Mutex, TaskGroup, isoTime, sleep, systemClock, withRetry } from "@tidewater/runtime";
import type { StateStore } from "@tidewater/store";
import type { AllocationPlan, Strategy, StrategyCatalog } from "@tidewater/strategy";
import type {
  BridgeCoordinator,
  BridgeOutcome,
  BridgeTransfer,
  PreparedTransfer,
  TransferRequest,
} from "@tidewater/bridge";
import type { ExecutionPort, ExecutionReceipt } from "./ports.js";
import { VaultError } from "./errors.js";
import type {
  ConsistencyReport,
  DepositOptions,
  DepositReceipt,
  FeeReceipt,
  HarvestResult,
  MoveDirection,
  MoveResult,
  PendingWithdrawal,
  RebalanceResult,
  TransitPurpose,
  UserPosition,
  VaultConfig,
  VaultMetrics,
  VaultSnapshot,
  VaultStatus,
} from "./types.js";
import { METRICS_HISTORY_LIMIT } from "./types.js";
import type { LedgerState, LegState, PositionState, TransitEntry, WithdrawalState } from "./state.js";
import {
  availableCash,
  cloneState,
  deployedOf,
  emptyState,
  exposureOf,
  findTransitByTransfer,
  reservedCash,
  toMetricsView,
  toPositionView,
  toSnapshot,
  toWithdrawalView,
  verifyState,
} from "./state.js";
import { diffOps, loadLedgerState } from "./persistence.js";

const YEAR_MS = 365 * 24 * 60 * 60 * 1000;

export interface VaultLedgerOptions {
  readonly config: VaultConfig;
  readonly catalog: StrategyCatalog;
  readonly port: ExecutionPort;
  /** Carries capital to and from strategies on other chains */
  readonly bridge: BridgeCoordinator;
  readonly store?: StateStore;
  readonly clock?: Clock;
  readonly onEvent?: EventSink;
  readonly idFactory?: () => string;
  /** Wait between ExecutionPort retries */
  readonly sleep?: (ms: number) => Promise<void>;
}

type DeployStart =
  | { readonly kind: "none" }
  | { readonly kind: "refused"; readonly amount: bigint; readonly detail: string }
  | { readonly kind: "bridging"; readonly amount: bigint; readonly transferIds: readonly string[] }
  | { readonly kind: "local"; readonly entry: TransitEntry };

interface PlannedMove {
  readonly strategyId: string;
  readonly amount: bigint;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sameAmounts(a: ReadonlyMap<string, bigint>, b: ReadonlyMap<string, bigint>): boolean {
  if (a.size !== b.size) return false;
  for (const [k, v] of a) {
    if (b.get(k) !== v) return false;
  }
  return true;
}

export class VaultLedger {
  readonly id: string;
  readonly config: VaultConfig;

  private _state: LedgerState;
  private readonly _lock = new Mutex();
  private readonly _tasks: TaskGroup;
  private readonly _waiters = new Map<string, Array<(w: PendingWithdrawal) => void>>();
  /** Withdrawals not yet announced as resolved */
  private readonly _unresolved = new Set<string>();
  private readonly _catalog: StrategyCatalog;
  private readonly _port: ExecutionPort;
  private readonly _bridge: BridgeCoordinator;
  private readonly _store: StateStore | undefined;
  private readonly _clock: Clock;
  private readonly _onEvent: EventSink | undefined;
  private readonly _idFactory: () => string;
  private readonly _sleep: (ms: number) => Promise<void>;
  /** Bumped by every rebalance and shutdown; older rebalances stop issuing moves */
  private _generation = 0;
  /** Epochs whose harvest is collecting yield right now */
  private readonly _harvesting = new Set<number>();
  /** Transfers initiated by the running draft, kept only if it commits */
  private _staged: PreparedTransfer[] = [];

  constructor(options: VaultLedgerOptions) {
    this.config = options.config;
    this.id = options.config.id;
    this._catalog = options.catalog;
    this._port = options.port;
    this._bridge = options.bridge;
    this._store = options.store;
    this._clock = options.clock ?? systemClock;
    this._onEvent = options.onEvent;
    this._idFactory = options.idFactory ?? randomUUID;
    this._sleep = options.sleep ?? sleep;
    this._tasks = new TaskGroup((name, err) => {
      this._emit("vault.task.failed", "alert", { task: name, error: errorMessage(err) });
    });

    const restored = this._store !== undefined ? loadLedgerState(this._store, this.id) : undefined;
    this._state = restored ?? emptyState();

    if (restored !== undefined) {
      for (const w of restored.withdrawals.values()) {
        if (w.status === "pending") this._unresolved.add(w.id);
      }
      const report = verifyState(restored);
      if (!report.consistent && restored.status !== "emergency_shutdown") {
        this._halt(restored, report.violations);
      }
    }
  }

  // ===========================================================================
  // Deposit
  // ===========================================================================

  async deposit(owner: string, amount: Money, options: DepositOptions = {}): Promise<DepositReceipt> {
    const value = this._parse(amount, "amount");
    if (value <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Deposit amount must be positive, got ${amount.amount}`);
    }
    const min = parseAmount(this.config.minDeposit, this.config.asset.decimals);
    const max = parseAmount(this.config.maxDeposit, this.config.asset.decimals);
    if (value < min || value > max) {
      throw new VaultError(
        "DEPOSIT_OUT_OF_RANGE",
        `Deposit of ${amount.amount} outside [${this.config.minDeposit}, ${this.config.maxDeposit}]`,
        { min: this.config.minDeposit, max: this.config.maxDeposit },
      );
    }

    const receipt = await this._lock.runExclusive(() =>
      this._mutate((d) => {
        if (d.status === "emergency_shutdown") {
          throw new VaultError("VAULT_HALTED", `Vault ${this.id} is in emergency shutdown`);
        }

        const minted =
          d.totalShares === 0n || d.totalAssets === 0n
            ? value
            : mulDiv(value, d.totalShares, d.totalAssets);
        if (minted === 0n) {
          throw new VaultError("INVALID_AMOUNT", `Deposit of ${amount.amount} is too small to mint a share`);
        }

        const now = this._clock.now();
        const existing = d.positions.get(owner);
        const lockupMs = Math.max(this.config.lockupMs, options.lockupMs ?? 0);
        const release =
          lockupMs > 0
            ? Math.max(now + lockupMs, existing?.lockupReleaseAt ?? 0)
            : existing?.lockupReleaseAt;

        const position: PositionState = {
          owner,
          shares: (existing?.shares ?? 0n) + minted,
          depositedAt: existing?.depositedAt ?? now,
          ...(release !== undefined ? { lockupReleaseAt: release } : {}),
          ...(existing?.pendingWithdrawalId !== undefined
            ? { pendingWithdrawalId: existing.pendingWithdrawalId }
            : {}),
        };

        d.positions.set(owner, position);
        d.totalShares += minted;
        d.cash += value;
        d.totalAssets += value;

        return {
          owner,
          amount: this._money(value),
          sharesMinted: this._money(minted),
          position: toPositionView(d, position, this.config.asset),
        };
      }),
    );

    this._emit("vault.deposit", "info", {
      owner,
      amount: receipt.amount.amount,
      sharesMinted: receipt.sharesMinted.amount,
    });
    this._maybeDeployIdle();
    return receipt;
  }

  // ===========================================================================
  // Withdraw
  // ===========================================================================

  /**
   * Redeem shares. Completes at once when free cash covers the payout;
   * otherwise unwinds the shortfall from strategies in the background and
   * returns the pending withdrawal (see `awaitWithdrawal`).
   */
  async withdraw(owner: string, shares: Money): Promise<PendingWithdrawal> {
    const amount = this._parse(shares, "shares");
    if (amount <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Shares to withdraw must be positive, got ${shares.amount}`);
    }

    const { withdrawal, legs } = await this._lock.runExclusive(() =>
      this._mutate((d) => {
        const position = d.positions.get(owner);
        if (position?.pendingWithdrawalId !== undefined) {
          throw new VaultError(
            "WITHDRAWAL_PENDING",
            `Owner ${owner} already has withdrawal ${position.pendingWithdrawalId} in flight`,
            { withdrawalId: position.pendingWithdrawalId },
          );
        }
        const balance = position?.shares ?? 0n;
        if (position === undefined || amount > balance) {
          throw new VaultError(
            "INSUFFICIENT_SHARES",
            `Owner ${owner} holds ${this._money(balance).amount} shares, requested ${shares.amount}`,
          );
        }

        const now = this._clock.now();
        const gross = mulDiv(amount, d.totalAssets, d.totalShares);
        const locked = position.lockupReleaseAt !== undefined && now < position.lockupReleaseAt;
        const penalty =
          (locked ? applyBps(gross, this.config.earlyWithdrawalPenaltyBps) : 0n) +
          applyBps(gross, this.config.withdrawalFeeBps);
        const id = this._idFactory();
        const available = availableCash(d);

        if (gross <= available) {
          d.cash -= gross;
          d.totalAssets -= gross;
          d.accruedFees += penalty;
          this._burn(d, position, amount);
          const done: WithdrawalState = {
            id,
            owner,
            shares: amount,
            gross,
            penalty,
            net: gross - penalty,
            reserved: 0n,
            requestedAt: now,
            resolvedAt: now,
            status: "completed",
            legs: [],
          };
          d.withdrawals.set(id, done);
          return { withdrawal: done, legs: [] };
        }

        const planned = this._planUnwind(d, gross - available);
        const entries: TransitEntry[] = planned.map((leg) =>
          this._beginWithdrawMove(d, leg, "withdrawal", `${id}/${leg.strategyId}`, id),
        );

        const pending: WithdrawalState = {
          id,
          owner,
          shares: amount,
          gross,
          penalty,
          net: gross - penalty,
          reserved: available,
          requestedAt: now,
          status: "pending",
          legs: planned.map(
            (leg): LegState => ({
              strategyId: leg.strategyId,
              amount: leg.amount,
              status: "executing",
              transferIds: [],
              received: 0n,
            }),
          ),
        };
        d.withdrawals.set(id, pending);
        d.positions.set(owner, { ...position, pendingWithdrawalId: id });
        return { withdrawal: pending, legs: entries };
      }),
    );

    const view = toWithdrawalView(withdrawal, this.config.asset);
    if (withdrawal.status === "completed") {
      this._emit("vault.withdrawal.completed", "info", {
        withdrawalId: view.id,
        owner,
        gross: view.gross.amount,
        penalty: view.penalty.amount,
        net: view.net.amount,
      });
    } else {
      this._unresolved.add(view.id);
      this._emit("vault.withdrawal.requested", "info", {
        withdrawalId: view.id,
        owner,
        gross: view.gross.amount,
        legs: legs.map((e) => e.strategyId),
      });
      for (const entry of legs) {
        this._tasks.spawn(`unwind:${entry.id}`, async () => {
          await this._runExecuting(entry, "withdraw");
        });
      }
    }
    return view;
  }

  /**
   * Resolves once the withdrawal is completed or failed.
   */
  awaitWithdrawal(id: string): Promise<PendingWithdrawal> {
    const w = this._state.withdrawals.get(id);
    if (w === undefined) {
      return Promise.reject(new VaultError("WITHDRAWAL_NOT_FOUND", `Withdrawal ${id} not found`));
    }
    if (w.status !== "pending") {
      return Promise.resolve(toWithdrawalView(w, this.config.asset));
    }
    return new Promise((resolve) => {
      const list = this._waiters.get(id) ?? [];
      list.push(resolve);
      this._waiters.set(id, list);
    });
  }

  // ===========================================================================
  // Harvest
  // ===========================================================================

  /**
   * Collect realized yield once per epoch. A repeated call inside the epoch
   * reports ZERO_YIELD_AVAILABLE and changes nothing. The epoch is marked in
   * the same commit that credits the yield; port calls carry a per-epoch key,
   * so a harvest interrupted by a restart repeats without paying twice.
   */
  async harvest(): Promise<HarvestResult> {
    const epoch = Math.floor(this._clock.now() / this.config.harvestEpochMs);

    const claimed = await this._lock.runExclusive(() => {
      if (this._state.lastHarvestEpoch === epoch || this._harvesting.has(epoch)) return undefined;
      this._harvesting.add(epoch);
      return [...this._state.deployed]
        .filter(([, amount]) => amount > 0n)
        .sort(([a], [b]) => (a < b ? -1 : 1))
        .map(([strategyId, deployed]) => ({ strategyId, deployed }));
    });

    if (claimed === undefined) {
      return this._harvestResult("ZERO_YIELD_AVAILABLE", epoch, 0n, 0n, [], []);
    }

    try {
      return await this._collectYield(epoch, claimed);
    } finally {
      this._harvesting.delete(epoch);
    }
  }

  private async _collectYield(
    epoch: number,
    claimed: readonly { strategyId: string; deployed: bigint }[],
  ): Promise<HarvestResult> {
    const reports: { strategyId: string; deployed: bigint; realized: bigint }[] = [];
    const failed: string[] = [];
    for (const { strategyId, deployed } of claimed) {
      const idempotencyKey = `${this.id}/harvest-${String(epoch)}/${strategyId}`;
      try {
        const report = await this._withRetry(() => this._port.harvest(strategyId, { idempotencyKey }));
        const realized = this._parse(report.realizedYield, "realizedYield");
        reports.push({ strategyId, deployed, realized: realized > 0n ? realized : 0n });
      } catch (err: unknown) {
        failed.push(strategyId);
        await this._lock.runExclusive(() => {
          this._disableStrategy(strategyId, `harvest failed: ${errorMessage(err)}`);
        });
      }
    }

    const gross = sumScaled(reports.map((r) => r.realized));
    const fee = applyBps(gross, this.config.performanceFeeBps);
    const net = gross - fee;

    await this._lock.runExclusive(() =>
      this._mutate((d) => {
        const now = this._clock.now();
        const base = d.totalAssets;
        d.lastHarvestEpoch = epoch;
        d.cash += net;
        d.totalAssets += net;
        d.accruedFees += fee;
        d.metrics.lifetimeYield += gross;
        d.metrics.tvl = [...d.metrics.tvl, { at: now, totalAssets: d.totalAssets }].slice(
          -METRICS_HISTORY_LIMIT,
        );
        const apy = base > 0n ? (Number(net) / Number(base)) * (YEAR_MS / this.config.harvestEpochMs) : 0;
        d.metrics.apy = [...d.metrics.apy, { at: now, apy }].slice(-METRICS_HISTORY_LIMIT);
      }),
    );

    for (const r of reports) {
      await this._catalog.recordReturn(r.strategyId, Number(r.realized) / Number(r.deployed));
    }

    const outcome = gross === 0n ? "ZERO_YIELD_AVAILABLE" : "HARVESTED";
    const result = this._harvestResult(
      outcome,
      epoch,
      gross,
      fee,
      reports.map((r) => ({ strategyId: r.strategyId, realized: r.realized })),
      failed,
    );
    this._emit("vault.harvest", "info", {
      epoch,
      outcome,
      grossYield: result.grossYield.amount,
      performanceFee: result.performanceFee.amount,
      failed,
    });
    return result;
  }

  // ===========================================================================
  // Plans and rebalancing
  // ===========================================================================

  /**
   * Make `plan` current without moving funds. Idle cash deploys against it.
   */
  adoptPlan(plan: AllocationPlan): Promise<void> {
    return this._lock.runExclusive(() => {
      this._mutate((d) => {
        d.plan = plan;
      });
      this._catalog.applyPlan(plan);
    });
  }

  /**
   * Converge deployed capital toward `plan`. Withdrawals from overweight
   * strategies run first, then deployments funded from free cash. A later
   * call supersedes this one: the move in flight finishes, no further moves
   * are issued.
   */
  async rebalance(plan: AllocationPlan): Promise<RebalanceResult> {
    const { generation, excess, deficits } = await this._lock.runExclusive(() => {
      const planned = this._mutate((d) => {
        if (d.status === "emergency_shutdown" && plan.mode === "normal") {
          throw new VaultError(
            "VAULT_HALTED",
            `Vault ${this.id} is in emergency shutdown; only exit plans may run`,
          );
        }
        if (d.status === "active") d.status = "rebalancing";
        d.plan = plan;
        return this._planRebalance(d, plan);
      });
      this._catalog.applyPlan(plan);
      return { generation: ++this._generation, ...planned };
    });

    this._emit("vault.rebalance.started", "info", {
      planId: plan.id,
      mode: plan.mode,
      withdrawals: excess.length,
      deployments: deficits.length,
    });

    const moves: MoveResult[] = [];
    let superseded = false;

    for (const move of excess) {
      if (generation !== this._generation) {
        superseded = true;
        break;
      }
      const result = await this._executeWithdrawMove(move);
      if (result !== undefined) moves.push(result);
    }
    if (!superseded) {
      for (const move of deficits) {
        if (generation !== this._generation) {
          superseded = true;
          break;
        }
        const result = await this._executeDeployMove(move.strategyId, move.amount);
        if (result !== undefined) moves.push(result);
      }
    }

    const status = await this._lock.runExclusive((): VaultStatus => {
      if (generation !== this._generation) {
        superseded = true;
      } else if (this._state.status === "rebalancing") {
        this._mutate((d) => {
          d.status = "active";
        });
      }
      return this._state.status;
    });

    this._emit(superseded ? "vault.rebalance.superseded" : "vault.rebalance.completed", "info", {
      planId: plan.id,
      moves: moves.length,
      failed: moves.filter((m) => m.status === "failed").length,
    });
    return { planId: plan.id, moves, superseded, status };
  }

  /**
   * Deploy free cash toward the current plan's targets without withdrawing.
   */
  async deployIdleCash(): Promise<MoveResult[]> {
    const targets = await this._lock.runExclusive(() => {
      const { plan, status } = this._state;
      if (plan === null || status !== "active") return [];
      return this._planRebalance(this._state, plan).deficits;
    });

    const moves: MoveResult[] = [];
    for (const move of targets) {
      const result = await this._executeDeployMove(move.strategyId, move.amount);
      if (result !== undefined) moves.push(result);
    }
    return moves;
  }

  // ===========================================================================
  // Bridge reconciliation
  // ===========================================================================

  /**
   * Apply queued bridge outcomes for this vault's transfers.
   * Returns how many were applied.
   */
  async drainBridgeOutcomes(): Promise<number> {
    const followUps: TransitEntry[] = [];
    const applied = await this._lock.runExclusive(() => {
      let count = 0;
      for (const outcome of this._bridge.outcomes.drain()) {
        if (this._applyOutcome(outcome, followUps)) count++;
      }
      return count;
    });

    for (const entry of followUps) {
      this._tasks.spawn(`deploy:${entry.id}`, async () => {
        await this._runExecuting(entry, "deploy");
      });
    }
    this._wakeResolved();
    return applied;
  }

  /**
   * Restart port calls that were running when the process stopped. Calls
   * repeat with their original idempotency keys.
   */
  resumeInFlight(): number {
    let count = 0;
    for (const entry of this._state.inTransit.values()) {
      if (entry.stage === "bridging") continue;
      const direction: MoveDirection = entry.purpose === "deployment" ? "deploy" : "withdraw";
      this._tasks.spawn(`resume:${entry.id}`, async () => {
        await this._runExecuting(entry, direction);
      });
      count++;
    }
    return count;
  }

  // ===========================================================================
  // Administration
  // ===========================================================================

  async triggerEmergencyShutdown(reason: string): Promise<VaultSnapshot> {
    await this._lock.runExclusive(() => {
      if (this._state.status === "emergency_shutdown") {
        throw new VaultError("INVALID_TRANSITION", `Vault ${this.id} is already in emergency shutdown`);
      }
      this._enterShutdown(reason);
    });
    return this.snapshot();
  }

  /**
   * Leave emergency shutdown. Refused while the books do not balance.
   */
  async resume(): Promise<VaultSnapshot> {
    await this._lock.runExclusive(() => {
      if (this._state.status !== "emergency_shutdown") {
        throw new VaultError(
          "INVALID_TRANSITION",
          `Vault ${this.id} is ${this._state.status}, not in emergency shutdown`,
        );
      }
      const report = verifyState(this._state);
      if (!report.consistent) {
        throw new VaultError("CONSISTENCY_VIOLATION", "Vault state is inconsistent; reconcile before resuming", {
          violations: report.violations,
        });
      }
      this._mutate((d) => {
        d.status = "active";
        delete d.statusReason;
      });
    });
    this._emit("vault.resumed", "info", {});
    return this.snapshot();
  }

  /**
   * Pay the fee accumulator out to the treasury.
   */
  async collectFees(): Promise<FeeReceipt> {
    const amount = await this._lock.runExclusive(() =>
      this._mutate((d) => {
        const collected = d.accruedFees;
        d.accruedFees = 0n;
        d.metrics.lifetimeFeesCollected += collected;
        return collected;
      }),
    );
    const receipt: FeeReceipt = { amount: this._money(amount), collectedAt: isoTime(this._clock) };
    this._emit("vault.fees.collected", "info", { amount: receipt.amount.amount });
    return receipt;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get status(): VaultStatus {
    return this._state.status;
  }

  snapshot(): VaultSnapshot {
    return toSnapshot(this._state, this.id, this.config.asset, this._clock.now());
  }

  position(owner: string): UserPosition | undefined {
    const p = this._state.positions.get(owner);
    return p !== undefined ? toPositionView(this._state, p, this.config.asset) : undefined;
  }

  positions(): UserPosition[] {
    const s = this._state;
    return [...s.positions.values()]
      .sort((a, b) => (a.owner < b.owner ? -1 : 1))
      .map((p) => toPositionView(s, p, this.config.asset));
  }

  withdrawal(id: string): PendingWithdrawal | undefined {
    const w = this._state.withdrawals.get(id);
    return w !== undefined ? toWithdrawalView(w, this.config.asset) : undefined;
  }

  withdrawals(owner?: string): PendingWithdrawal[] {
    return [...this._state.withdrawals.values()]
      .filter((w) => owner === undefined || w.owner === owner)
      .sort((a, b) => a.requestedAt - b.requestedAt)
      .map((w) => toWithdrawalView(w, this.config.asset));
  }

  currentPlan(): AllocationPlan | null {
    return this._state.plan;
  }

  /**
   * Weight of each strategy in bps of investable assets (total assets less
   * reserved cash). Strategies with no exposure are omitted.
   */
  currentWeights(): Record<string, number> {
    const s = this._state;
    const base = s.totalAssets - reservedCash(s);
    const ids = new Set<string>(s.deployed.keys());
    for (const e of s.inTransit.values()) {
      if (e.purpose === "deployment") ids.add(e.strategyId);
    }

    const weights: Record<string, number> = {};
    for (const id of [...ids].sort()) {
      const exposure = exposureOf(s, id);
      if (exposure > 0n) weights[id] = bpsOf(exposure, base);
    }
    return weights;
  }

  metrics(): VaultMetrics {
    return toMetricsView(this._state, this.config.asset);
  }

  verify(): ConsistencyReport {
    return verifyState(this._state);
  }

  /**
   * Resolves once no background task is running.
   */
  whenIdle(): Promise<void> {
    return this._tasks.whenIdle();
  }

  // ===========================================================================
  // Internal: state transitions
  // ===========================================================================

  /**
   * Run `fn` against a draft; verify, persist and swap. Caller holds the lock.
   */
  private _mutate<T>(fn: (draft: LedgerState) => T): T {
    const prev = this._state;
    const draft = cloneState(prev);
    this._staged = [];
    const result = fn(draft);
    const staged = this._staged.splice(0);

    const report = verifyState(draft);
    if (!report.consistent) {
      this._halt(prev, report.violations);
      throw new VaultError("CONSISTENCY_VIOLATION", `Vault ${this.id}: ${report.violations.join("; ")}`, {
        violations: report.violations,
      });
    }

    // Transfer records ride in the same commit as the entries that track them
    const transferOps = staged.flatMap((p) => p.ops);
    if (this._store !== undefined) {
      this._store.commit([...diffOps(this.id, prev, draft), ...transferOps]);
    } else if (transferOps.length > 0) {
      this._bridge.store?.commit(transferOps);
    }
    this._state = draft;
    for (const prepared of staged) {
      this._bridge.adopt(prepared);
    }

    if (!sameAmounts(prev.deployed, draft.deployed)) {
      const amounts = new Map<string, string>();
      for (const [id, amount] of draft.deployed) {
        if (amount > 0n) amounts.set(id, this._money(amount).amount);
      }
      this._catalog.reportDeployed(this.id, amounts);
    }
    return result;
  }

  private _halt(base: LedgerState, violations: readonly string[]): void {
    const halted = cloneState(base);
    halted.status = "emergency_shutdown";
    halted.statusReason = "consistency violation";
    this._generation++;
    this._store?.commit(diffOps(this.id, base, halted));
    this._state = halted;
    this._emit("vault.consistency_violation", "alert", { violations: [...violations] });
  }

  private _enterShutdown(reason: string): void {
    this._mutate((d) => {
      d.status = "emergency_shutdown";
      d.statusReason = reason;
    });
    this._generation++;
    this._emit("vault.emergency_shutdown", "alert", { reason });
  }

  private _burn(d: LedgerState, position: PositionState, shares: bigint): void {
    const { pendingWithdrawalId: _cleared, ...rest } = position;
    const remaining = position.shares - shares;
    if (remaining === 0n) {
      d.positions.delete(position.owner);
    } else {
      d.positions.set(position.owner, { ...rest, shares: remaining });
    }
    d.totalShares -= shares;
  }

  // ===========================================================================
  // Internal: planning
  // ===========================================================================

  /**
   * Split a cash shortfall across enabled strategies in proportion to what
   * each holds. Rounding dust goes to the largest holders.
   */
  private _planUnwind(d: LedgerState, shortfall: bigint): PlannedMove[] {
    const holders = [...d.deployed]
      .filter(([id, amount]) => amount > 0n && this._catalog.get(id)?.status === "enabled")
      .sort(([a, x], [b, y]) => (x !== y ? (y > x ? 1 : -1) : a < b ? -1 : 1));
    const total = sumScaled(holders.map(([, amount]) => amount));

    if (total < shortfall) {
      throw new VaultError(
        "INSUFFICIENT_LIQUIDITY",
        `Withdrawal needs ${this._money(shortfall).amount} from strategies; ${this._money(total).amount} can be unwound`,
        { shortfall: this._money(shortfall).amount, unwindable: this._money(total).amount },
      );
    }

    const legs = holders.map(([strategyId, amount]) => ({
      strategyId,
      held: amount,
      amount: mulDiv(shortfall, amount, total),
    }));
    let rest = shortfall - sumScaled(legs.map((l) => l.amount));
    for (const leg of legs) {
      if (rest === 0n) break;
      const take = minScaled(leg.held - leg.amount, rest);
      leg.amount += take;
      rest -= take;
    }

    return legs
      .filter((l) => l.amount > 0n)
      .map((l) => ({ strategyId: l.strategyId, amount: l.amount }));
  }

  /**
   * Targets = investable assets × weight. Excess is capped at what is
   * deployed (capital already in transit cannot be recalled).
   */
  private _planRebalance(
    d: LedgerState,
    plan: AllocationPlan,
  ): { excess: PlannedMove[]; deficits: PlannedMove[] } {
    const investable = d.totalAssets - reservedCash(d);
    const excess: PlannedMove[] = [];
    const deficits: PlannedMove[] = [];
    const seen = new Set<string>();

    for (const w of plan.weights) {
      seen.add(w.strategyId);
      const target = investable > 0n ? applyBps(investable, w.weightBps) : 0n;
      const current = exposureOf(d, w.strategyId);
      if (current > target) {
        const amount = minScaled(current - target, deployedOf(d, w.strategyId));
        if (amount > 0n) excess.push({ strategyId: w.strategyId, amount });
      } else if (target > current) {
        deficits.push({ strategyId: w.strategyId, amount: target - current });
      }
    }

    for (const id of [...d.deployed.keys()].sort()) {
      const held = deployedOf(d, id);
      if (!seen.has(id) && held > 0n) excess.push({ strategyId: id, amount: held });
    }

    return { excess, deficits };
  }

  // ===========================================================================
  // Internal: moves
  // ===========================================================================

  private _isRemote(strategyId: string): boolean {
    const strategy = this._catalog.get(strategyId);
    return strategy !== undefined && strategy.chainId !== this.config.homeChainId;
  }

  private _beginWithdrawMove(
    d: LedgerState,
    move: PlannedMove,
    purpose: TransitPurpose,
    id: string,
    withdrawalId?: string,
  ): TransitEntry {
    const entry: TransitEntry = {
      id,
      amount: move.amount,
      purpose,
      stage: "executing",
      strategyId: move.strategyId,
      ...(withdrawalId !== undefined ? { withdrawalId } : {}),
    };
    d.deployed.set(move.strategyId, deployedOf(d, move.strategyId) - move.amount);
    d.inTransit.set(entry.id, entry);
    return entry;
  }

  private async _executeWithdrawMove(move: PlannedMove): Promise<MoveResult | undefined> {
    const entry = await this._lock.runExclusive(() =>
      this._mutate((d) => {
        const amount = minScaled(move.amount, deployedOf(d, move.strategyId));
        if (amount <= 0n) return undefined;
        return this._beginWithdrawMove(
          d,
          { strategyId: move.strategyId, amount },
          "return",
          `return-${this._idFactory()}`,
        );
      }),
    );
    if (entry === undefined) return undefined;
    return this._runExecuting(entry, "withdraw");
  }

  /**
   * Deploy up to `wanted`, limited by free cash at the time of the move.
   */
  private async _executeDeployMove(strategyId: string, wanted: bigint): Promise<MoveResult | undefined> {
    const strategy = this._catalog.get(strategyId);
    if (strategy === undefined) {
      return this._skipped(strategyId, wanted, `unknown strategy ${strategyId}`);
    }
    if (strategy.status !== "enabled") {
      return this._skipped(strategyId, wanted, "strategy disabled");
    }

    const started = await this._lock.runExclusive((): DeployStart => {
      const amount = minScaled(wanted, availableCash(this._state));
      if (amount <= 0n) return { kind: "none" };
      if (this._isRemote(strategyId)) {
        const chunks = this._bridgeChunks(amount);
        if (chunks === undefined) return { kind: "refused", amount, detail: "below bridge minimum" };
        const transferIds = this._mutate((d) => this._beginRemoteDeploy(d, strategy, chunks));
        return { kind: "bridging", amount, transferIds };
      }
      const entry = this._mutate((d) => {
        const e: TransitEntry = {
          id: `deploy-${this._idFactory()}`,
          amount,
          purpose: "deployment",
          stage: "executing",
          strategyId,
        };
        d.cash -= amount;
        d.inTransit.set(e.id, e);
        return e;
      });
      return { kind: "local", entry };
    });

    switch (started.kind) {
      case "none":
        return this._skipped(strategyId, wanted, "no free cash");
      case "refused":
        return this._skipped(strategyId, started.amount, started.detail);
      case "bridging":
        return {
          strategyId,
          direction: "deploy",
          amount: this._money(started.amount),
          status: "bridging",
          detail: `transfers ${started.transferIds.join(", ")}`,
        };
      case "local":
        return this._runExecuting(started.entry, "deploy");
    }
  }

  private _beginRemoteDeploy(d: LedgerState, strategy: Strategy, chunks: readonly bigint[]): string[] {
    const ids: string[] = [];
    for (const chunk of chunks) {
      const transfer = this._stageTransfer({
        sourceChainId: this.config.homeChainId,
        destinationChainId: strategy.chainId,
        amount: this._money(chunk),
        memo: { vaultId: this.id, purpose: "deployment", strategyId: strategy.id },
      });
      d.cash -= chunk;
      d.inTransit.set(transfer.id, {
        id: transfer.id,
        amount: chunk,
        purpose: "deployment",
        stage: "bridging",
        strategyId: strategy.id,
        transferId: transfer.id,
      });
      ids.push(transfer.id);
    }
    return ids;
  }

  /** Inside `_mutate` only: the transfer exists once the draft commits */
  private _stageTransfer(request: TransferRequest): BridgeTransfer {
    const prepared = this._bridge.prepare(request);
    this._staged.push(prepared);
    return prepared.transfer;
  }

  /**
   * Split an amount into bridgeable transfers, or undefined when a piece
   * would fall below the bridge minimum.
   */
  private _bridgeChunks(amount: bigint): bigint[] | undefined {
    const { decimals } = this.config.asset;
    const max = parseAmount(this._bridge.config.maxTransferAmount, decimals);
    const min = parseAmount(this._bridge.config.minTransferAmount, decimals);
    const chunks: bigint[] = [];
    let rest = amount;
    while (rest > max) {
      chunks.push(max);
      rest -= max;
    }
    if (rest > 0n) chunks.push(rest);
    return chunks.every((c) => c >= min) ? chunks : undefined;
  }

  /**
   * Perform the port call behind an executing entry and settle it.
   */
  private async _runExecuting(entry: TransitEntry, direction: MoveDirection): Promise<MoveResult> {
    const amount = this._money(entry.amount);
    let moved: bigint;
    try {
      const receipt: ExecutionReceipt = await this._withRetry(() =>
        direction === "deploy"
          ? this._port.deploy(entry.strategyId, amount, { idempotencyKey: entry.id })
          : this._port.withdraw(entry.strategyId, amount, { idempotencyKey: entry.id }),
      );
      moved = this._parse(receipt.moved, "moved");
    } catch (err: unknown) {
      await this._lock.runExclusive(() => {
        this._failMove(entry, errorMessage(err));
      });
      this._wakeResolved();
      return {
        strategyId: entry.strategyId,
        direction,
        amount,
        status: "failed",
        detail: errorMessage(err),
      };
    }

    const result = await this._lock.runExclusive(() => this._settleMove(entry, moved, direction));
    this._wakeResolved();
    return result;
  }

  /**
   * Apply a successful port call. Caller holds the lock.
   */
  private _settleMove(entry: TransitEntry, moved: bigint, direction: MoveDirection): MoveResult {
    const base = {
      strategyId: entry.strategyId,
      direction,
      amount: this._money(entry.amount),
    };
    if (!this._state.inTransit.has(entry.id)) {
      return { ...base, status: "skipped", detail: "already settled" };
    }

    const remote = direction === "withdraw" && this._isRemote(entry.strategyId);
    const chunks = remote ? this._bridgeChunks(moved) : undefined;
    if (remote && chunks === undefined) {
      // Proceeds stay with the strategy on its chain.
      this._mutate((d) => {
        d.inTransit.delete(entry.id);
        d.deployed.set(entry.strategyId, deployedOf(d, entry.strategyId) + moved);
        d.totalAssets += moved - entry.amount;
        if (entry.withdrawalId !== undefined) {
          this._failWithdrawal(d, entry.withdrawalId, entry.strategyId, "proceeds below bridge minimum");
        }
      });
      return { ...base, status: "failed", detail: "proceeds below bridge minimum" };
    }

    const transferIds = this._mutate((d) => {
      d.inTransit.delete(entry.id);
      d.totalAssets += moved - entry.amount;

      if (direction === "deploy") {
        d.deployed.set(entry.strategyId, deployedOf(d, entry.strategyId) + moved);
        return [];
      }
      if (chunks !== undefined) {
        const ids = this._beginReturnBridge(d, entry, chunks);
        if (entry.withdrawalId !== undefined) {
          this._updateLeg(d, entry.withdrawalId, entry.strategyId, (leg) => ({
            ...leg,
            status: "bridging",
            transferIds: [...leg.transferIds, ...ids],
          }));
        }
        return ids;
      }

      d.cash += moved;
      if (entry.withdrawalId !== undefined) {
        this._creditWithdrawal(d, entry.withdrawalId, entry.strategyId, moved, true);
      }
      return [];
    });

    this._checkSlippage(entry, moved);
    if (transferIds.length > 0) {
      return { ...base, status: "bridging", detail: `transfers ${transferIds.join(", ")}` };
    }
    return { ...base, status: "completed" };
  }

  private _beginReturnBridge(d: LedgerState, entry: TransitEntry, chunks: readonly bigint[]): string[] {
    const strategy = this._catalog.require(entry.strategyId);
    const ids: string[] = [];
    for (const chunk of chunks) {
      const transfer = this._stageTransfer({
        sourceChainId: strategy.chainId,
        destinationChainId: this.config.homeChainId,
        amount: this._money(chunk),
        memo: {
          vaultId: this.id,
          purpose: entry.purpose,
          strategyId: entry.strategyId,
          ...(entry.withdrawalId !== undefined ? { withdrawalId: entry.withdrawalId } : {}),
        },
      });
      d.inTransit.set(transfer.id, {
        id: transfer.id,
        amount: chunk,
        purpose: entry.purpose,
        stage: "bridging",
        strategyId: entry.strategyId,
        transferId: transfer.id,
        ...(entry.withdrawalId !== undefined ? { withdrawalId: entry.withdrawalId } : {}),
      });
      ids.push(transfer.id);
    }
    return ids;
  }

  /**
   * A port call failed for good: funds go back where they came from and the
   * strategy is disabled. Caller holds the lock.
   */
  private _failMove(entry: TransitEntry, reason: string): void {
    if (!this._state.inTransit.has(entry.id)) return;

    this._mutate((d) => {
      d.inTransit.delete(entry.id);
      if (entry.purpose === "deployment" && entry.stage === "executing") {
        d.cash += entry.amount;
      } else {
        // Withdrawals never left the strategy; bridged deployments sit on its chain.
        d.deployed.set(entry.strategyId, deployedOf(d, entry.strategyId) + entry.amount);
      }
      if (entry.withdrawalId !== undefined) {
        this._failWithdrawal(d, entry.withdrawalId, entry.strategyId, reason);
      }
    });

    this._emit("vault.move.failed", "alert", {
      strategyId: entry.strategyId,
      purpose: entry.purpose,
      amount: this._money(entry.amount).amount,
      reason,
    });
    this._disableStrategy(entry.strategyId, reason);
  }

  /**
   * Disable a strategy and halt when disabled capital crosses the
   * threshold. Caller holds the lock.
   */
  private _disableStrategy(strategyId: string, reason: string): void {
    const strategy = this._catalog.get(strategyId);
    if (strategy !== undefined && strategy.status === "enabled") {
      this._catalog.disable(strategyId, reason);
      this._emit("vault.strategy.disabled", "alert", { strategyId, reason });
    }

    const s = this._state;
    if (s.status === "emergency_shutdown" || s.totalAssets === 0n) return;

    let disabled = 0n;
    for (const [id, amount] of s.deployed) {
      if (this._catalog.get(id)?.status === "disabled") disabled += amount;
    }
    const fractionBps = bpsOf(disabled, s.totalAssets);
    if (fractionBps > this.config.emergencyShutdownThresholdBps) {
      this._enterShutdown(
        `disabled strategies hold ${String(fractionBps)} bps of total assets (threshold ${String(this.config.emergencyShutdownThresholdBps)})`,
      );
    }
  }

  private _checkSlippage(entry: TransitEntry, moved: bigint): void {
    if (moved >= entry.amount || entry.amount === 0n) return;
    const lossBps = bpsOf(entry.amount - moved, entry.amount);
    if (lossBps > this.config.maxSlippageBps) {
      this._emit("vault.slippage", "alert", {
        strategyId: entry.strategyId,
        requested: this._money(entry.amount).amount,
        moved: this._money(moved).amount,
        lossBps,
        maxSlippageBps: this.config.maxSlippageBps,
      });
    }
  }

  // ===========================================================================
  // Internal: withdrawals
  // ===========================================================================

  private _updateLeg(
    d: LedgerState,
    withdrawalId: string,
    strategyId: string,
    fn: (leg: LegState) => LegState,
  ): WithdrawalState | undefined {
    const w = d.withdrawals.get(withdrawalId);
    if (w === undefined) return undefined;
    const next: WithdrawalState = {
      ...w,
      legs: w.legs.map((leg) => (leg.strategyId === strategyId ? fn(leg) : leg)),
    };
    d.withdrawals.set(withdrawalId, next);
    return next;
  }

  /**
   * Record proceeds for a leg. `legDone` marks the leg completed. Proceeds
   * of a withdrawal that already failed stay as free cash.
   */
  private _creditWithdrawal(
    d: LedgerState,
    withdrawalId: string,
    strategyId: string,
    amount: bigint,
    legDone: boolean,
  ): void {
    const updated = this._updateLeg(d, withdrawalId, strategyId, (leg) => ({
      ...leg,
      received: leg.received + amount,
      ...(legDone && leg.status !== "failed" ? { status: "completed" as const } : {}),
    }));
    if (updated === undefined || updated.status !== "pending") return;

    const w: WithdrawalState = { ...updated, reserved: updated.reserved + amount };
    d.withdrawals.set(withdrawalId, w);
    if (w.legs.every((leg) => leg.status === "completed")) {
      this._finalizeWithdrawal(d, w);
    }
  }

  /**
   * Pay out what was gathered, up to the gross amount. Unwind costs
   * (slippage, bridge fees) reduce this withdrawal's payout only.
   */
  private _finalizeWithdrawal(d: LedgerState, w: WithdrawalState): void {
    const payout = minScaled(w.reserved, w.gross);
    const penalty = minScaled(w.penalty, payout);

    d.cash -= payout;
    d.totalAssets -= payout;
    d.accruedFees += penalty;

    const position = d.positions.get(w.owner);
    if (position !== undefined) {
      this._burn(d, position, w.shares);
    }

    d.withdrawals.set(w.id, {
      ...w,
      penalty,
      net: payout - penalty,
      status: "completed",
      resolvedAt: this._clock.now(),
    });
  }

  private _failWithdrawal(d: LedgerState, withdrawalId: string, strategyId: string, reason: string): void {
    const updated = this._updateLeg(d, withdrawalId, strategyId, (leg) => ({ ...leg, status: "failed" }));
    if (updated === undefined || updated.status !== "pending") return;

    d.withdrawals.set(withdrawalId, {
      ...updated,
      status: "failed",
      failureReason: reason,
      resolvedAt: this._clock.now(),
    });
    const position = d.positions.get(updated.owner);
    if (position !== undefined) {
      const { pendingWithdrawalId: _cleared, ...rest } = position;
      d.positions.set(updated.owner, rest);
    }
  }

  private _wakeResolved(): void {
    for (const id of [...this._unresolved]) {
      const w = this._state.withdrawals.get(id);
      if (w === undefined || w.status === "pending") continue;
      this._unresolved.delete(id);

      const view = toWithdrawalView(w, this.config.asset);
      const waiters = this._waiters.get(id) ?? [];
      this._waiters.delete(id);
      for (const wake of waiters) wake(view);

      this._emit(
        w.status === "completed" ? "vault.withdrawal.completed" : "vault.withdrawal.failed",
        w.status === "completed" ? "info" : "warning",
        {
          withdrawalId: id,
          owner: w.owner,
          net: view.net.amount,
          ...(w.failureReason !== undefined ? { reason: w.failureReason } : {}),
        },
      );
    }
  }

  // ===========================================================================
  // Internal: bridge outcomes
  // ===========================================================================

  /**
   * Caller holds the lock. Returns false for transfers this vault does not track.
   */
  private _applyOutcome(outcome: BridgeOutcome, followUps: TransitEntry[]): boolean {
    const entry = findTransitByTransfer(this._state, outcome.transfer.id);
    if (entry === undefined || entry.stage !== "bridging") return false;

    switch (outcome.kind) {
      case "confirmed": {
        const delivered = this._parse(outcome.delivered, "delivered");
        const fee = entry.amount - delivered;
        this._mutate((d) => {
          d.totalAssets -= fee;
          if (entry.purpose === "deployment") {
            const next: TransitEntry = { ...entry, amount: delivered, stage: "deploying" };
            d.inTransit.set(entry.id, next);
            followUps.push(next);
            return;
          }
          d.inTransit.delete(entry.id);
          d.cash += delivered;
          if (entry.withdrawalId !== undefined) {
            const w = d.withdrawals.get(entry.withdrawalId);
            const leg = w?.legs.find((l) => l.strategyId === entry.strategyId);
            const legDone =
              leg !== undefined &&
              leg.transferIds.every((tid) => tid === entry.transferId || findTransitByTransfer(d, tid) === undefined);
            this._creditWithdrawal(d, entry.withdrawalId, entry.strategyId, delivered, legDone);
          }
        });
        return true;
      }

      case "failed": {
        // Funds stay in transit until an administrative refund.
        if (entry.withdrawalId !== undefined) {
          const withdrawalId = entry.withdrawalId;
          this._mutate((d) => {
            this._failWithdrawal(d, withdrawalId, entry.strategyId, `bridge transfer ${outcome.transfer.id} failed`);
          });
        }
        this._emit("vault.bridge.failed", "alert", {
          transferId: outcome.transfer.id,
          strategyId: entry.strategyId,
          purpose: entry.purpose,
          amount: this._money(entry.amount).amount,
          reason: outcome.transfer.failureReason ?? "unknown",
        });
        return true;
      }

      case "refunded": {
        this._mutate((d) => {
          d.inTransit.delete(entry.id);
          if (entry.purpose === "deployment") {
            d.cash += entry.amount;
          } else {
            d.deployed.set(entry.strategyId, deployedOf(d, entry.strategyId) + entry.amount);
          }
          if (entry.withdrawalId !== undefined) {
            this._failWithdrawal(d, entry.withdrawalId, entry.strategyId, `bridge transfer ${outcome.transfer.id} refunded`);
          }
        });
        this._emit("vault.bridge.refunded", "warning", {
          transferId: outcome.transfer.id,
          strategyId: entry.strategyId,
          amount: this._money(entry.amount).amount,
        });
        return true;
      }
    }
  }

  // ===========================================================================
  // Internal: helpers
  // ===========================================================================

  private _maybeDeployIdle(): void {
    const s = this._state;
    if (s.plan === null || s.status !== "active") return;
    const threshold = parseAmount(this.config.deploymentThreshold, this.config.asset.decimals);
    if (threshold <= 0n || availableCash(s) < threshold) return;

    this._tasks.spawn("deploy-idle", async () => {
      await this.deployIdleCash();
    });
  }

  private _withRetry<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, this.config.retry, isTransientError, this._sleep);
  }

  private _skipped(strategyId: string, amount: bigint, detail: string): MoveResult {
    return { strategyId, direction: "deploy", amount: this._money(amount), status: "skipped", detail };
  }

  private _harvestResult(
    outcome: HarvestResult["outcome"],
    epoch: number,
    gross: bigint,
    fee: bigint,
    perStrategy: readonly { strategyId: string; realized: bigint }[],
    failed: readonly string[],
  ): HarvestResult {
    return {
      outcome,
      epoch,
      grossYield: this._money(gross),
      performanceFee: this._money(fee),
      netYield: this._money(gross - fee),
      perStrategy: perStrategy.map((r) => ({
        strategyId: r.strategyId,
        realizedYield: this._money(r.realized),
      })),
      failed,
    };
  }

  private _money(value: bigint): Money {
    return toMoney(value, this.config.asset.currency, this.config.asset.decimals);
  }

  /**
   * Scaled value of an amount in the vault asset.
   */
  private _parse(money: Money, field: string): bigint {
    const { currency, decimals } = this.config.asset;
    if (money.currency !== currency || money.decimals !== decimals) {
      throw new VaultError(
        "INVALID_AMOUNT",
        `${field} must be ${currency} with ${String(decimals)} decimals, got ${money.currency}/${String(money.decimals)}`,
      );
    }
    try {
      return parseAmount(money.amount, decimals);
    } catch (err: unknown) {
      throw new VaultError("INVALID_AMOUNT", `${field}: ${errorMessage(err)}`);
    }
  }

  private _emit(type: string, severity: EventSeverity, payload: Readonly<Record<string, unknown>>): void {
    if (this._onEvent === undefined) return;
    const event: DomainEvent = {
      type,
      severity,
      metadata: {
        eventId: randomUUID(),
        timestamp: isoTime(this._clock),
        actor: `vault:${this.id}`,
        correlationId: this.id,
        source: "vault",
      },
      payload: { vaultId: this.id, ...payload },
    };
    this._onEvent(event);
  }
}
