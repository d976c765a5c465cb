/**
 * VaultService — Composition root for one vault.
 *
 * Wires a VaultLedger to its bridge coordinator, scheduler and health
 * monitor, and runs the background loops that keep it moving:
 *
 *   bridge   tick transfers, drain outcomes into the ledger
 *   harvest  once per harvest epoch
 *   health   grade the vault, log status changes
 *
 * Route handlers go through this service; they never build domain objects.
 */

import type { EventSink } from "@tidewater/types";
import type { Clock } from "@tidewater/runtime";
import { TaskGroup, systemClock } from "@tidewater/runtime";
import type { StateStore } from "@tidewater/store";
import type { BridgeBackend } from "@tidewater/bridge";
import { BridgeCoordinator } from "@tidewater/bridge";
import type { StrategyCatalog } from "@tidewater/strategy";
import { Allocator, RiskScorer } from "@tidewater/strategy";
import type { ExecutionPort, HealthReport, HealthStatus } from "@tidewater/vault";
import { HealthMonitor, RebalanceScheduler, VaultLedger } from "@tidewater/vault";
import type { AppConfig } from "../config.js";
import {
  toAllocatorConfig,
  toBridgeConfig,
  toSchedulerConfig,
  toVaultConfig,
} from "../config.js";
import type { Logger } from "../logger.js";
import { eventLogger } from "../logger.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceOptions {
  readonly id: string;
  readonly config: AppConfig;
  readonly catalog: StrategyCatalog;
  readonly port: ExecutionPort;
  readonly backend: BridgeBackend;
  readonly logger: Logger;
  readonly store?: StateStore;
  readonly clock?: Clock;
}

type LoopName = "bridge" | "harvest" | "health";

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly id: string;
  readonly ledger: VaultLedger;
  readonly bridge: BridgeCoordinator;
  readonly scheduler: RebalanceScheduler;
  readonly monitor: HealthMonitor;
  readonly catalog: StrategyCatalog;

  private readonly _config: AppConfig;
  private readonly _logger: Logger;
  private readonly _tasks: TaskGroup;
  private readonly _timers: ReturnType<typeof setInterval>[] = [];
  private readonly _busy = new Set<LoopName>();
  private _lastHealth: HealthStatus | undefined;
  private _running = false;

  constructor(options: VaultServiceOptions) {
    this.id = options.id;
    this.catalog = options.catalog;
    this._config = options.config;
    this._logger = options.logger.child({ vaultId: options.id });

    const clock = options.clock ?? systemClock;
    this.monitor = new HealthMonitor({ clock });
    const log = eventLogger(this._logger);
    const sink: EventSink = (event) => {
      this.monitor.sink(event);
      log(event);
    };
    const store = options.store !== undefined ? { store: options.store } : {};

    this.bridge = new BridgeCoordinator({
      backend: options.backend,
      config: toBridgeConfig(options.config),
      clock,
      namespace: options.id,
      onEvent: sink,
      ...store,
    });

    this.ledger = new VaultLedger({
      config: toVaultConfig(options.config, options.id),
      catalog: options.catalog,
      port: options.port,
      bridge: this.bridge,
      clock,
      onEvent: sink,
      ...store,
    });

    this.scheduler = new RebalanceScheduler({
      ledger: this.ledger,
      catalog: options.catalog,
      scorer: new RiskScorer(),
      allocator: new Allocator(toAllocatorConfig(options.config)),
      config: toSchedulerConfig(options.config),
      clock,
      onEvent: sink,
    });

    this._tasks = new TaskGroup((name, err) => {
      this._logger.error({ err, task: name }, "Background task failed");
    });
  }

  get running(): boolean {
    return this._running;
  }

  /**
   * Resume interrupted moves, re-deliver bridge outcomes the ledger may
   * not have applied before a restart, and start the background loops.
   */
  start(): void {
    if (this._running) return;
    this._running = true;

    // Resumes only moves past the bridge; replayed outcomes spawn their own
    const resumed = this.ledger.resumeInFlight();
    if (resumed > 0) {
      this._logger.info({ resumed }, "Resumed in-flight moves");
    }

    const replayed = this.bridge.replayOutcomes();
    if (replayed > 0) {
      this._tasks.spawn("bridge-replay", async () => {
        const applied = await this.ledger.drainBridgeOutcomes();
        this._logger.info({ replayed, applied }, "Replayed bridge outcomes");
      });
    }

    this.scheduler.start();
    this._every("bridge", this._config.BRIDGE_POLL_INTERVAL_MS, async () => {
      await this.pumpBridge();
    });
    this._every("harvest", this._config.HARVEST_EPOCH_MS, async () => {
      const result = await this.ledger.harvest();
      this._logger.info(
        { outcome: result.outcome, epoch: result.epoch, netYield: result.netYield.amount },
        "Harvest finished",
      );
    });
    this._every("health", this._config.HEALTH_CHECK_INTERVAL_MS, () => {
      this.checkHealth();
      return Promise.resolve();
    });
  }

  /**
   * Stop the loops and wait for running work to settle.
   */
  async stop(): Promise<void> {
    for (const timer of this._timers.splice(0)) {
      clearInterval(timer);
    }
    this._running = false;
    await this.scheduler.stop();
    await this._tasks.whenIdle();
    await this.ledger.whenIdle();
  }

  /**
   * Advance bridge transfers one step and apply their outcomes.
   */
  async pumpBridge(): Promise<number> {
    await this.bridge.tick();
    return this.ledger.drainBridgeOutcomes();
  }

  health(): HealthReport {
    return this.monitor.report({
      vault: this.ledger.snapshot(),
      strategies: this.catalog.list(),
      bridge: this.bridge.stats(),
    });
  }

  /**
   * Grade the vault and log when the status changes.
   */
  checkHealth(): HealthReport {
    const report = this.health();
    if (report.status !== this._lastHealth) {
      const level = report.status === "healthy" ? "info" : report.status === "warning" ? "warn" : "error";
      this._logger[level]({ status: report.status, reasons: report.reasons }, "Vault health changed");
      this._lastHealth = report.status;
    }
    return report;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /** Runs `body` every `ms`, skipping a tick while the previous run is busy */
  private _every(name: LoopName, ms: number, body: () => Promise<void>): void {
    const timer = setInterval(() => {
      if (this._busy.has(name)) return;
      this._busy.add(name);
      this._tasks.spawn(name, async () => {
        try {
          await body();
        } finally {
          this._busy.delete(name);
        }
      });
    }, ms);
    this._timers.push(timer);
  }
}
