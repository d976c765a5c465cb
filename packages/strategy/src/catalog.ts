/**
 * @tidewater/strategy — StrategyCatalog.
 *
 * Registry of strategies with their return history. One catalog may be
 * shared by several vaults.
 *
 * Rules:
 * - Return history is append-only (only the oldest samples beyond
 *   `historyLimit` are dropped)
 * - History writers serialize on the catalog's own lock, never a vault's
 * - Readers get frozen copies and never wait on writers
 * - When a StateStore is attached, every mutation is committed before it
 *   becomes visible
 */

import { z } from "zod";
import type { JsonValue, StateOp, StateStore } from "@tidewater/store";
import { Mutex } from "@tidewater/runtime";
import type { Clock } from "@tidewater/runtime";
import { systemClock, isoTime } from "@tidewater/runtime";
import { validateMoney } from "@tidewater/money";
import type {
  AllocationPlan,
  ReturnSample,
  Strategy,
  StrategyDefinition,
} from "./types.js";
import { CatalogError } from "./types.js";

export const CATALOG_KEY_PREFIX = "catalog/strategies/";

export interface StrategyCatalogOptions {
  readonly store?: StateStore;
  readonly clock?: Clock;
  /** Samples kept per strategy. Default: 1000 */
  readonly historyLimit?: number;
}

// =============================================================================
// Persisted shape
// =============================================================================

const MoneySchema = z.object({
  amount: z.string().regex(/^\d+(\.\d+)?$/),
  currency: z.string().min(1),
  decimals: z.number().int().min(0),
});

const LockupSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("none") }),
  z.object({
    kind: z.literal("fixed"),
    durationMs: z.number().int().min(0),
    earlyExitPenaltyBps: z.number().int().min(0).max(10_000),
  }),
]);

export const StrategyDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  kind: z.enum(["lending", "swap", "liquidity"]),
  chainId: z.string().min(1),
  lockup: LockupSchema,
  liquidityCeiling: MoneySchema,
  liquidityUsd: z.number().min(0),
  maxAllocationBps: z.number().int().min(0).max(10_000),
});

const StrategyRecordSchema = StrategyDefinitionSchema.extend({
  status: z.enum(["enabled", "disabled"]),
  disabledReason: z.string().nullable().optional(),
  targetWeightBps: z.number().int().min(0).max(10_000),
  deployed: z.record(z.string()),
  returns: z.array(z.object({ value: z.number(), recordedAt: z.string() })),
  registeredAt: z.string(),
});

type StrategyRecord = z.infer<typeof StrategyRecordSchema>;

function fromRecord(record: StrategyRecord): Strategy {
  const { disabledReason, ...rest } = record;
  return {
    ...rest,
    ...(typeof disabledReason === "string" ? { disabledReason } : {}),
  };
}

function toRecord(s: Strategy): JsonValue {
  return {
    id: s.id,
    name: s.name,
    kind: s.kind,
    chainId: s.chainId,
    lockup:
      s.lockup.kind === "none"
        ? { kind: "none" }
        : {
            kind: "fixed",
            durationMs: s.lockup.durationMs,
            earlyExitPenaltyBps: s.lockup.earlyExitPenaltyBps,
          },
    liquidityCeiling: {
      amount: s.liquidityCeiling.amount,
      currency: s.liquidityCeiling.currency,
      decimals: s.liquidityCeiling.decimals,
    },
    liquidityUsd: s.liquidityUsd,
    maxAllocationBps: s.maxAllocationBps,
    status: s.status,
    disabledReason: s.disabledReason ?? null,
    targetWeightBps: s.targetWeightBps,
    deployed: { ...s.deployed },
    returns: s.returns.map((r) => ({ value: r.value, recordedAt: r.recordedAt })),
    registeredAt: s.registeredAt,
  };
}

function freezeStrategy(strategy: Strategy): Strategy {
  return Object.freeze({
    ...strategy,
    deployed: Object.freeze({ ...strategy.deployed }),
    returns: Object.freeze([...strategy.returns]),
  });
}

// =============================================================================
// Catalog
// =============================================================================

export class StrategyCatalog {
  private readonly _strategies = new Map<string, Strategy>();
  private readonly _historyLock = new Mutex();
  private readonly _store: StateStore | undefined;
  private readonly _clock: Clock;
  private readonly _historyLimit: number;

  constructor(options: StrategyCatalogOptions = {}) {
    this._store = options.store;
    this._clock = options.clock ?? systemClock;
    this._historyLimit = options.historyLimit ?? 1000;

    if (this._store !== undefined) {
      this._loadFromStore(this._store);
    }
  }

  // ─── Registration ───────────────────────────────────────────────────

  register(definition: StrategyDefinition): Strategy {
    if (this._strategies.has(definition.id)) {
      throw new CatalogError("STRATEGY_EXISTS", `Strategy "${definition.id}" already registered`);
    }

    const parsed = StrategyDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CatalogError(
        "INVALID_STRATEGY",
        `Strategy "${definition.id}": ${issue !== undefined ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`,
      );
    }
    validateMoney(definition.liquidityCeiling);

    const strategy: Strategy = {
      ...definition,
      status: "enabled",
      targetWeightBps: 0,
      deployed: {},
      returns: [],
      registeredAt: isoTime(this._clock),
    };
    this._put([strategy]);
    return this.require(definition.id);
  }

  // ─── Queries ────────────────────────────────────────────────────────

  get(id: string): Strategy | undefined {
    return this._strategies.get(id);
  }

  require(id: string): Strategy {
    const strategy = this._strategies.get(id);
    if (strategy === undefined) {
      throw new CatalogError("STRATEGY_NOT_FOUND", `Strategy "${id}" not found`);
    }
    return strategy;
  }

  has(id: string): boolean {
    return this._strategies.has(id);
  }

  /** All strategies ordered by id */
  list(): readonly Strategy[] {
    return [...this._strategies.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  // ─── Return history ─────────────────────────────────────────────────

  /**
   * Append one period return. Serialized with other history writers.
   */
  recordReturn(id: string, value: number): Promise<ReturnSample> {
    return this._historyLock.runExclusive(() => {
      if (!Number.isFinite(value) || value <= -1) {
        throw new CatalogError("INVALID_RETURN", `Return ${String(value)} for "${id}" is not a valid period return`);
      }
      const strategy = this.require(id);
      const sample: ReturnSample = { value, recordedAt: isoTime(this._clock) };
      const returns = [...strategy.returns, sample].slice(-this._historyLimit);
      this._put([{ ...strategy, returns }]);
      return sample;
    });
  }

  // ─── Status ─────────────────────────────────────────────────────────

  disable(id: string, reason: string): Strategy {
    const strategy = this.require(id);
    this._put([{ ...strategy, status: "disabled", disabledReason: reason }]);
    return this.require(id);
  }

  enable(id: string): Strategy {
    const { disabledReason: _dropped, ...strategy } = this.require(id);
    this._put([{ ...strategy, status: "enabled" }]);
    return this.require(id);
  }

  // ─── Writes from the allocation and accounting layers ───────────────

  /**
   * Record the weights of a newly adopted plan. Strategies absent from the
   * plan get weight 0.
   */
  applyPlan(plan: AllocationPlan): void {
    const weights = new Map(plan.weights.map((w) => [w.strategyId, w.weightBps]));
    const changed = this.list()
      .filter((s) => s.targetWeightBps !== (weights.get(s.id) ?? 0))
      .map((s) => ({ ...s, targetWeightBps: weights.get(s.id) ?? 0 }));
    if (changed.length > 0) {
      this._put(changed);
    }
  }

  /**
   * Record a vault's deployed amounts. Strategies not listed are reset to 0
   * for that vault.
   */
  reportDeployed(vaultId: string, amounts: ReadonlyMap<string, string>): void {
    const changed: Strategy[] = [];
    for (const strategy of this._strategies.values()) {
      const next = amounts.get(strategy.id);
      const current = strategy.deployed[vaultId];
      if (next === current) continue;

      const deployed: Record<string, string> = { ...strategy.deployed };
      if (next === undefined) {
        delete deployed[vaultId];
      } else {
        deployed[vaultId] = next;
      }
      changed.push({ ...strategy, deployed });
    }
    if (changed.length > 0) {
      this._put(changed);
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _put(strategies: readonly Strategy[]): void {
    if (this._store !== undefined) {
      const ops: StateOp[] = strategies.map((s) => ({
        op: "put",
        key: CATALOG_KEY_PREFIX + s.id,
        value: toRecord(s),
      }));
      this._store.commit(ops);
    }
    for (const s of strategies) {
      this._strategies.set(s.id, freezeStrategy(s));
    }
  }

  private _loadFromStore(store: StateStore): void {
    for (const entry of store.list(CATALOG_KEY_PREFIX)) {
      const parsed = StrategyRecordSchema.safeParse(entry.value);
      if (!parsed.success) {
        throw new CatalogError("INVALID_STRATEGY", `Stored strategy at "${entry.key}" is malformed`);
      }
      const strategy = fromRecord(parsed.data);
      this._strategies.set(strategy.id, freezeStrategy(strategy));
    }
  }
}
