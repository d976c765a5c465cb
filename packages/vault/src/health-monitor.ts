/**
 * @tidewater/vault — HealthMonitor.
 *
 * Collects one vault's domain events (ledger, bridge, scheduler) in a
 * bounded window and grades the vault:
 *   critical  emergency shutdown, or more than 10 alerts in the window
 *   warning   more than 5 alerts, a disabled strategy, or a terminally
 *             failed bridge transfer
 *   healthy   otherwise
 */

import type { DomainEvent, EventSink } from "@tidewater/types";
import type { Clock } from "@tidewater/runtime";
import { isoTime, systemClock } from "@tidewater/runtime";
import type { Strategy } from "@tidewater/strategy";
import type { BridgeStats } from "@tidewater/bridge";
import type { VaultSnapshot } from "./types.js";

export const HEALTH_WINDOW_SIZE = 1_000;
export const CRITICAL_ERROR_COUNT = 10;
export const WARNING_ERROR_COUNT = 5;

export type HealthStatus = "healthy" | "warning" | "critical";

export interface HealthInputs {
  readonly vault: VaultSnapshot;
  readonly strategies: readonly Strategy[];
  readonly bridge: BridgeStats;
}

export interface HealthReport {
  readonly vaultId: string;
  readonly status: HealthStatus;
  readonly reasons: readonly string[];
  readonly eventsInWindow: number;
  readonly errorsInWindow: number;
  readonly disabledStrategies: readonly string[];
  readonly terminalBridgeFailures: number;
  readonly lastAlerts: readonly DomainEvent[];
  readonly checkedAt: string;
}

export class HealthMonitor {
  private readonly _events: DomainEvent[] = [];
  private readonly _clock: Clock;
  private readonly _windowSize: number;

  constructor(options: { clock?: Clock; windowSize?: number } = {}) {
    this._clock = options.clock ?? systemClock;
    this._windowSize = options.windowSize ?? HEALTH_WINDOW_SIZE;
  }

  /** Bound to the instance so it can be handed out as an EventSink */
  readonly sink: EventSink = (event) => {
    this._events.push(event);
    if (this._events.length > this._windowSize) {
      this._events.splice(0, this._events.length - this._windowSize);
    }
  };

  get size(): number {
    return this._events.length;
  }

  recent(limit = 50): DomainEvent[] {
    return this._events.slice(-limit);
  }

  report(inputs: HealthInputs, alertLimit = 10): HealthReport {
    const vaultId = inputs.vault.id;
    const alerts = this._events.filter((e) => e.severity === "alert");
    const disabled = inputs.strategies.filter((s) => s.status === "disabled").map((s) => s.id);
    const terminal = inputs.bridge.terminalFailures;

    const reasons: string[] = [];
    let status: HealthStatus = "healthy";

    if (inputs.vault.status === "emergency_shutdown") {
      const detail = inputs.vault.statusReason !== undefined ? `: ${inputs.vault.statusReason}` : "";
      reasons.push(`vault in emergency shutdown${detail}`);
    }
    if (alerts.length > CRITICAL_ERROR_COUNT) {
      reasons.push(`${String(alerts.length)} alerts in window`);
    }
    if (reasons.length > 0) {
      status = "critical";
    } else {
      if (alerts.length > WARNING_ERROR_COUNT) reasons.push(`${String(alerts.length)} alerts in window`);
      if (disabled.length > 0) reasons.push(`disabled strategies: ${disabled.join(", ")}`);
      if (terminal > 0) reasons.push(`${String(terminal)} bridge transfer(s) terminally failed`);
      if (reasons.length > 0) status = "warning";
    }

    return {
      vaultId,
      status,
      reasons,
      eventsInWindow: this._events.length,
      errorsInWindow: alerts.length,
      disabledStrategies: disabled,
      terminalBridgeFailures: terminal,
      lastAlerts: alerts.slice(-alertLimit),
      checkedAt: isoTime(this._clock),
    };
  }
}
