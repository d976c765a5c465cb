/**
 * @tidewater/bridge — BridgeCoordinator.
 *
 * Drives one state machine per transfer. Only confirmation polling waits
 * on the outside world; every other step is a single backend call or a
 * local transition.
 *
 * Rules:
 * - A submitted transfer cannot be cancelled
 * - A transfer not confirmed within `confirmationTimeoutMs` of its latest
 *   submission is forced to failed
 * - Failed transfers are resubmitted with exponential backoff until
 *   `maxRetryAttempts` resubmissions have been made; after that they are
 *   terminal and wait for an administrative refund
 * - Outcomes (confirmed, terminal failure, refund) are published on a
 *   completion queue; the coordinator never calls into the vault
 * - With a StateStore attached, each transition is committed before it
 *   becomes visible
 * - An initiator that keeps its own books in the same store can `prepare`
 *   a transfer, commit its record together with its own changes, and then
 *   `adopt` it
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSeverity, EventSink } from "@tidewater/types";
import { applyBps, parseAmount, toMoney, toScaled } from "@tidewater/money";
import type { Clock } from "@tidewater/runtime";
import { CompletionQueue, computeDelay, isoTime, systemClock } from "@tidewater/runtime";
import type { StateOp, StateStore } from "@tidewater/store";
import type {
  BridgeBackend,
  BridgeConfig,
  BridgeFailureReason,
  BridgeOutcome,
  BridgeStats,
  BridgeTransfer,
  TransferRequest,
  TransferState,
} from "./types.js";
import { BridgeError, BridgeRejectedError, DEFAULT_BRIDGE_CONFIG } from "./types.js";
import { encodeTransfer, loadTransfers, transferKey } from "./persistence.js";

// =============================================================================
// Transition table
// =============================================================================

const VALID_TRANSITIONS: Readonly<Record<TransferState, readonly TransferState[]>> = {
  initiated: ["submitted", "failed"],
  submitted: ["pending_confirmation", "confirmed", "failed"],
  pending_confirmation: ["confirmed", "failed"],
  failed: ["submitted", "refunded"],
  confirmed: [],
  refunded: [],
};

export interface BridgeCoordinatorOptions {
  readonly backend: BridgeBackend;
  readonly config?: Partial<BridgeConfig>;
  readonly clock?: Clock;
  readonly store?: StateStore;
  /** Separates the transfers of several coordinators sharing one store */
  readonly namespace?: string;
  readonly onEvent?: EventSink;
  readonly idFactory?: () => string;
  /** Jitter source for backoff, in [0, 1) */
  readonly random?: () => number;
}

/** An `initiated` record built but not yet kept by the coordinator */
export interface PreparedTransfer {
  readonly transfer: BridgeTransfer;
  /** Store ops that persist the record; empty without a store */
  readonly ops: readonly StateOp[];
}

type TransferPatch = Partial<Omit<BridgeTransfer, "id">>;

function withoutSchedule(t: BridgeTransfer): BridgeTransfer {
  const { nextAttemptAt: _next, ...rest } = t;
  return rest;
}

/** Fresh attempt: drop the schedule and the previous failure */
function forAttempt(t: BridgeTransfer): BridgeTransfer {
  const { nextAttemptAt: _next, failureReason: _reason, failureDetail: _detail, ...rest } = t;
  return rest;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class BridgeCoordinator {
  readonly config: BridgeConfig;
  readonly outcomes = new CompletionQueue<BridgeOutcome>();

  private readonly _transfers = new Map<string, BridgeTransfer>();
  private readonly _busy = new Set<string>();
  private readonly _backend: BridgeBackend;
  private readonly _clock: Clock;
  private readonly _store: StateStore | undefined;
  private readonly _namespace: string;
  private readonly _onEvent: EventSink | undefined;
  private readonly _idFactory: () => string;
  private readonly _random: () => number;
  private _latencyTotalMs = 0;
  private _latencyCount = 0;
  private _tick: Promise<void> | undefined;

  constructor(options: BridgeCoordinatorOptions) {
    this.config = { ...DEFAULT_BRIDGE_CONFIG, ...options.config };
    this._backend = options.backend;
    this._clock = options.clock ?? systemClock;
    this._store = options.store;
    this._namespace = options.namespace ?? "default";
    this._onEvent = options.onEvent;
    this._idFactory = options.idFactory ?? randomUUID;
    this._random = options.random ?? Math.random;

    if (!Number.isInteger(this.config.maxRetryAttempts) || this.config.maxRetryAttempts < 0) {
      throw new BridgeError("INVALID_AMOUNT", "maxRetryAttempts must be a non-negative integer");
    }

    if (this._store !== undefined) {
      for (const transfer of loadTransfers(this._store, this._namespace)) {
        this._transfers.set(transfer.id, transfer);
        this._recordLatency(transfer);
      }
    }
  }

  // ─── Initiate ───────────────────────────────────────────────────────

  /**
   * Record a new transfer in state `initiated`. Nothing leaves the chain yet.
   */
  initiate(request: TransferRequest): BridgeTransfer {
    const prepared = this.prepare(request);
    if (prepared.ops.length > 0) {
      this._store?.commit(prepared.ops);
    }
    return this.adopt(prepared);
  }

  /**
   * Validate a request and build its `initiated` record without keeping it.
   * The caller commits `ops`, then hands the result to `adopt`.
   */
  prepare(request: TransferRequest): PreparedTransfer {
    const { amount } = request;
    const scaled = toScaled(amount);

    if (scaled <= 0n) {
      throw new BridgeError("INVALID_AMOUNT", `Transfer amount must be positive, got ${amount.amount}`);
    }
    if (request.sourceChainId === request.destinationChainId) {
      throw new BridgeError("SAME_CHAIN", `Source and destination are both ${request.sourceChainId}`);
    }
    if (scaled > parseAmount(this.config.maxTransferAmount, amount.decimals)) {
      throw new BridgeError(
        "AMOUNT_EXCEEDS_MAX",
        `Transfer of ${amount.amount} exceeds max ${this.config.maxTransferAmount} ${amount.currency}`,
      );
    }
    if (scaled < parseAmount(this.config.minTransferAmount, amount.decimals)) {
      throw new BridgeError(
        "AMOUNT_BELOW_MIN",
        `Transfer of ${amount.amount} is below min ${this.config.minTransferAmount} ${amount.currency}`,
      );
    }

    const transfer: BridgeTransfer = {
      id: this._idFactory(),
      sourceChainId: request.sourceChainId,
      destinationChainId: request.destinationChainId,
      amount,
      fee: toMoney(applyBps(scaled, this.config.bridgeFeeBps), amount.currency, amount.decimals),
      state: "initiated",
      requiredConfirmations: this.requiredConfirmations(request.destinationChainId),
      confirmations: 0,
      retryCount: 0,
      terminal: false,
      createdAt: isoTime(this._clock),
      memo: { ...request.memo },
    };

    const frozen = Object.freeze(transfer);
    const ops: StateOp[] =
      this._store !== undefined
        ? [{ op: "put", key: transferKey(this._namespace, frozen.id), value: encodeTransfer(frozen) }]
        : [];
    return { transfer: frozen, ops };
  }

  /**
   * Take over a prepared transfer whose record has been committed.
   */
  adopt(prepared: PreparedTransfer): BridgeTransfer {
    const { transfer } = prepared;
    if (this._transfers.has(transfer.id)) {
      throw new BridgeError("INVALID_TRANSITION", `Transfer ${transfer.id} is already tracked`, transfer.id);
    }
    this._transfers.set(transfer.id, transfer);
    this._emit("bridge.transfer.initiated", "info", transfer);
    return transfer;
  }

  /** Store the coordinator commits to, if any */
  get store(): StateStore | undefined {
    return this._store;
  }

  requiredConfirmations(chainId: string): number {
    return this.config.confirmationBlocks[chainId] ?? this.config.defaultConfirmationBlocks;
  }

  // ─── Submit ─────────────────────────────────────────────────────────

  /**
   * Hand an initiated (or due-for-retry failed) transfer to the backend.
   */
  async submit(id: string): Promise<BridgeTransfer> {
    const transfer = this.require(id);
    if (transfer.state !== "initiated" && transfer.state !== "failed") {
      throw new BridgeError(
        "INVALID_TRANSITION",
        `Cannot submit transfer ${id} in state ${transfer.state}`,
        id,
      );
    }
    if (transfer.state === "failed" && transfer.terminal) {
      throw new BridgeError("INVALID_TRANSITION", `Transfer ${id} is terminally failed`, id);
    }

    return this._exclusive(id, async () => {
      const isRetry = transfer.state === "failed";
      const attemptAt = isoTime(this._clock);
      const attempt = forAttempt(this.require(id));

      try {
        const handle = await this._backend.submitTransfer(attempt);
        return this._transition(attempt, "submitted", {
          handle,
          confirmations: 0,
          lastAttemptAt: attemptAt,
          submittedAt: attemptAt,
          retryCount: isRetry ? attempt.retryCount + 1 : attempt.retryCount,
        });
      } catch (err: unknown) {
        const reason: BridgeFailureReason =
          err instanceof BridgeRejectedError ? "CAPACITY_OR_VALIDATION_REJECTED" : "SUBMISSION_FAILED";
        return this._fail(
          { ...attempt, retryCount: isRetry ? attempt.retryCount + 1 : attempt.retryCount, lastAttemptAt: attemptAt },
          reason,
          errorMessage(err),
        );
      }
    });
  }

  // ─── Poll ───────────────────────────────────────────────────────────

  /**
   * Compare the backend's confirmation count with the required depth.
   * Backend errors leave the transfer where it is; the timeout still applies.
   */
  async pollConfirmation(id: string): Promise<BridgeTransfer> {
    const transfer = this.require(id);
    if (transfer.state !== "submitted" && transfer.state !== "pending_confirmation") {
      throw new BridgeError(
        "INVALID_TRANSITION",
        `Cannot poll transfer ${id} in state ${transfer.state}`,
        id,
      );
    }

    return this._exclusive(id, async () => {
      const current = this.require(id);
      const { handle } = current;
      if (handle === undefined) {
        throw new BridgeError("CORRUPT_STATE", `Transfer ${id} has no bridge handle`, id);
      }

      let confirmations: number | undefined;
      try {
        confirmations = await this._backend.getConfirmationCount(handle);
      } catch (err: unknown) {
        this._emit("bridge.poll.failed", "warning", current, { error: errorMessage(err) });
      }

      if (confirmations !== undefined && confirmations >= current.requiredConfirmations) {
        const confirmed = this._transition(current, "confirmed", {
          confirmations,
          confirmedAt: isoTime(this._clock),
          terminal: true,
        });
        this._recordLatency(confirmed);
        this.outcomes.push({
          kind: "confirmed",
          transfer: confirmed,
          delivered: toMoney(
            toScaled(confirmed.amount) - toScaled(confirmed.fee),
            confirmed.amount.currency,
            confirmed.amount.decimals,
          ),
        });
        return confirmed;
      }

      if (this._timedOut(current)) {
        return this._fail(
          { ...current, confirmations: confirmations ?? current.confirmations },
          "CONFIRMATION_TIMEOUT",
          `No confirmation within ${String(this.config.confirmationTimeoutMs)} ms`,
        );
      }

      if (confirmations === undefined) {
        return current;
      }
      if (current.state === "submitted") {
        return this._transition(current, "pending_confirmation", { confirmations });
      }
      return this._save({ ...current, confirmations });
    });
  }

  // ─── Refund ─────────────────────────────────────────────────────────

  /**
   * Administrative resolution of a failed transfer: funds are back at the source.
   */
  refund(id: string): BridgeTransfer {
    const transfer = this.require(id);
    if (this._busy.has(id)) {
      throw new BridgeError("INVALID_TRANSITION", `Transfer ${id} has an attempt in progress`, id);
    }
    const refunded = this._transition(withoutSchedule(transfer), "refunded", { terminal: true });
    this.outcomes.push({ kind: "refunded", transfer: refunded });
    return refunded;
  }

  // ─── Driver ─────────────────────────────────────────────────────────

  /**
   * One pass over live transfers: submit new ones, poll submitted ones,
   * resubmit failed ones whose backoff has elapsed. Overlapping calls share
   * the running pass.
   */
  tick(): Promise<void> {
    if (this._tick === undefined) {
      this._tick = this._runTick().finally(() => {
        this._tick = undefined;
      });
    }
    return this._tick;
  }

  private async _runTick(): Promise<void> {
    const now = this._clock.now();
    const work: Promise<BridgeTransfer>[] = [];

    for (const t of this._transfers.values()) {
      if (this._busy.has(t.id)) continue;
      switch (t.state) {
        case "initiated":
          work.push(this.submit(t.id));
          break;
        case "submitted":
        case "pending_confirmation":
          work.push(this.pollConfirmation(t.id));
          break;
        case "failed":
          if (!t.terminal && t.nextAttemptAt !== undefined && Date.parse(t.nextAttemptAt) <= now) {
            work.push(this.submit(t.id));
          }
          break;
        default:
          break;
      }
    }

    await Promise.all(work);
  }

  /**
   * Re-publish outcomes for every settled transfer. Consumers ignore
   * transfers they already reconciled; used after a restart.
   */
  replayOutcomes(): number {
    let count = 0;
    for (const t of this._transfers.values()) {
      if (t.state === "confirmed") {
        this.outcomes.push({
          kind: "confirmed",
          transfer: t,
          delivered: toMoney(toScaled(t.amount) - toScaled(t.fee), t.amount.currency, t.amount.decimals),
        });
      } else if (t.state === "refunded") {
        this.outcomes.push({ kind: "refunded", transfer: t });
      } else if (t.state === "failed" && t.terminal) {
        this.outcomes.push({ kind: "failed", transfer: t });
      } else {
        continue;
      }
      count++;
    }
    return count;
  }

  // ─── Queries ────────────────────────────────────────────────────────

  get(id: string): BridgeTransfer | undefined {
    return this._transfers.get(id);
  }

  require(id: string): BridgeTransfer {
    const transfer = this._transfers.get(id);
    if (transfer === undefined) {
      throw new BridgeError("TRANSFER_NOT_FOUND", `Transfer ${id} not found`, id);
    }
    return transfer;
  }

  /** All transfers, oldest first */
  list(filter?: { readonly state?: TransferState }): readonly BridgeTransfer[] {
    return [...this._transfers.values()]
      .filter((t) => filter?.state === undefined || t.state === filter.state)
      .sort((a, b) => (a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0));
  }

  stats(): BridgeStats {
    const byState: Record<TransferState, number> = {
      initiated: 0,
      submitted: 0,
      pending_confirmation: 0,
      confirmed: 0,
      failed: 0,
      refunded: 0,
    };
    let totalRetries = 0;
    let terminalFailures = 0;

    for (const t of this._transfers.values()) {
      byState[t.state] += 1;
      totalRetries += t.retryCount;
      if (t.state === "failed" && t.terminal) terminalFailures++;
    }

    return {
      byState,
      meanConfirmationLatencyMs:
        this._latencyCount === 0 ? null : this._latencyTotalMs / this._latencyCount,
      totalRetries,
      terminalFailures,
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _exclusive(
    id: string,
    fn: () => Promise<BridgeTransfer>,
  ): Promise<BridgeTransfer> {
    if (this._busy.has(id)) {
      return this.require(id);
    }
    this._busy.add(id);
    try {
      return await fn();
    } finally {
      this._busy.delete(id);
    }
  }

  private _timedOut(t: BridgeTransfer): boolean {
    if (t.submittedAt === undefined) return false;
    return this._clock.now() - Date.parse(t.submittedAt) >= this.config.confirmationTimeoutMs;
  }

  private _fail(t: BridgeTransfer, reason: BridgeFailureReason, detail: string): BridgeTransfer {
    const exhausted = t.retryCount >= this.config.maxRetryAttempts;
    const patch: TransferPatch = { failureReason: reason, failureDetail: detail, terminal: exhausted };

    if (!exhausted) {
      const delay = computeDelay(
        t.retryCount,
        {
          maxAttempts: this.config.maxRetryAttempts + 1,
          baseDelayMs: this.config.retryBaseDelayMs,
          maxDelayMs: this.config.retryMaxDelayMs,
          jitterMs: this.config.retryJitterMs,
        },
        this._random,
      );
      const failed = this._transition(t, "failed", {
        ...patch,
        nextAttemptAt: new Date(this._clock.now() + delay).toISOString(),
      });
      this._emit("bridge.transfer.retry_scheduled", "warning", failed, { reason, detail });
      return failed;
    }

    const failed = this._transition(withoutSchedule(t), "failed", patch);
    this._emit("bridge.transfer.failed", "alert", failed, { reason, detail });
    this.outcomes.push({ kind: "failed", transfer: failed });
    return failed;
  }

  /**
   * Validate and apply a transition. `failed → failed` is allowed for a
   * rejected resubmission.
   */
  private _transition(t: BridgeTransfer, to: TransferState, patch: TransferPatch): BridgeTransfer {
    const allowed = VALID_TRANSITIONS[t.state];
    if (!allowed.includes(to) && !(t.state === "failed" && to === "failed")) {
      throw new BridgeError(
        "INVALID_TRANSITION",
        `Transfer ${t.id} cannot move from ${t.state} to ${to}`,
        t.id,
      );
    }
    const next = this._save({ ...t, ...patch, state: to });
    if (to !== "failed") {
      this._emit(`bridge.transfer.${to}`, "info", next);
    }
    return next;
  }

  private _save(t: BridgeTransfer): BridgeTransfer {
    const frozen = Object.freeze(t);
    this._store?.commit([
      { op: "put", key: transferKey(this._namespace, t.id), value: encodeTransfer(frozen) },
    ]);
    this._transfers.set(t.id, frozen);
    return frozen;
  }

  private _recordLatency(t: BridgeTransfer): void {
    if (t.state !== "confirmed" || t.submittedAt === undefined || t.confirmedAt === undefined) {
      return;
    }
    this._latencyTotalMs += Date.parse(t.confirmedAt) - Date.parse(t.submittedAt);
    this._latencyCount++;
  }

  private _emit(
    type: string,
    severity: EventSeverity,
    t: BridgeTransfer,
    extra: Readonly<Record<string, unknown>> = {},
  ): void {
    if (this._onEvent === undefined) return;
    const event: DomainEvent = {
      type,
      severity,
      metadata: {
        eventId: randomUUID(),
        timestamp: isoTime(this._clock),
        actor: `bridge:${this._namespace}`,
        correlationId: t.id,
        source: "bridge",
      },
      payload: {
        transferId: t.id,
        state: t.state,
        amount: t.amount.amount,
        currency: t.amount.currency,
        sourceChainId: t.sourceChainId,
        destinationChainId: t.destinationChainId,
        retryCount: t.retryCount,
        ...extra,
      },
    };
    this._onEvent(event);
  }
}
