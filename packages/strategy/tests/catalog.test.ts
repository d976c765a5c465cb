/**
 * Tests for StrategyCatalog.
 *
 * Verifies:
 * - Registration and validation
 * - Append-only return history under concurrent writers
 * - Disable / enable
 * - Plan weights and per-vault deployed amounts
 * - Persistence through a StateStore
 */

import { describe, it, expect } from "vitest";
import { InMemoryStateStore } from "@tidewater/store";
import { ManualClock } from "@tidewater/runtime";
import { StrategyCatalog, CATALOG_KEY_PREFIX } from "../src/catalog.js";
import { Allocator } from "../src/allocator.js";
import { CatalogError } from "../src/types.js";
import { definition, scored } from "./fixtures.js";

function catalogWith(...ids: string[]): StrategyCatalog {
  const catalog = new StrategyCatalog({ clock: new ManualClock(Date.UTC(2025, 0, 1)) });
  for (const id of ids) catalog.register(definition(id));
  return catalog;
}

describe("registration", () => {
  it("registers an enabled strategy with empty history", () => {
    const catalog = catalogWith("aave-usdc");
    const s = catalog.require("aave-usdc");

    expect(s.status).toBe("enabled");
    expect(s.returns).toEqual([]);
    expect(s.targetWeightBps).toBe(0);
    expect(s.registeredAt).toBe("2025-01-01T00:00:00.000Z");
  });

  it("rejects duplicates", () => {
    const catalog = catalogWith("a");
    expect(() => catalog.register(definition("a"))).toThrow(CatalogError);
  });

  it("rejects invalid definitions", () => {
    const catalog = new StrategyCatalog();
    expect(() => catalog.register(definition("a", { maxAllocationBps: 20_000 }))).toThrow(
      /maxAllocationBps/,
    );
    expect(() => catalog.register(definition(""))).toThrow(CatalogError);
  });

  it("lists by id and reports unknown strategies", () => {
    const catalog = catalogWith("c", "a", "b");
    expect(catalog.list().map((s) => s.id)).toEqual(["a", "b", "c"]);
    expect(catalog.get("nope")).toBeUndefined();
    expect(() => catalog.require("nope")).toThrow(/not found/);
  });
});

describe("return history", () => {
  it("appends concurrent writes in call order", async () => {
    const catalog = catalogWith("a");
    await Promise.all([
      catalog.recordReturn("a", 0.01),
      catalog.recordReturn("a", 0.02),
      catalog.recordReturn("a", 0.03),
    ]);

    expect(catalog.require("a").returns.map((r) => r.value)).toEqual([0.01, 0.02, 0.03]);
  });

  it("keeps only the most recent samples beyond the limit", async () => {
    const catalog = new StrategyCatalog({ historyLimit: 2 });
    catalog.register(definition("a"));
    for (const v of [0.01, 0.02, 0.03]) {
      await catalog.recordReturn("a", v);
    }
    expect(catalog.require("a").returns.map((r) => r.value)).toEqual([0.02, 0.03]);
  });

  it("rejects impossible returns", async () => {
    const catalog = catalogWith("a");
    await expect(catalog.recordReturn("a", Number.NaN)).rejects.toThrow(CatalogError);
    await expect(catalog.recordReturn("a", -1)).rejects.toThrow(/not a valid period return/);
    await expect(catalog.recordReturn("missing", 0.01)).rejects.toThrow(/not found/);
  });

  it("hands out frozen snapshots", async () => {
    const catalog = catalogWith("a");
    const before = catalog.require("a");
    await catalog.recordReturn("a", 0.01);

    expect(Object.isFrozen(before.returns)).toBe(true);
    expect(before.returns).toHaveLength(0);
    expect(catalog.require("a").returns).toHaveLength(1);
  });
});

describe("status", () => {
  it("disables with a reason and re-enables", () => {
    const catalog = catalogWith("a");
    catalog.disable("a", "withdraw failed after 3 attempts");
    expect(catalog.require("a")).toMatchObject({
      status: "disabled",
      disabledReason: "withdraw failed after 3 attempts",
    });

    const enabled = catalog.enable("a");
    expect(enabled.status).toBe("enabled");
    expect(enabled.disabledReason).toBeUndefined();
  });
});

describe("plan and deployment writes", () => {
  it("records plan weights and zeroes strategies left out", () => {
    const catalog = catalogWith("a", "b");
    const allocator = new Allocator({ minLiquidityUsd: 0, maxStrategyWeightBps: 10_000, maxPositionSizeBps: 10_000 });
    catalog.applyPlan(allocator.allocate([scored(catalog.require("a"), 1)]));
    expect(catalog.require("a").targetWeightBps).toBe(10_000);
    expect(catalog.require("b").targetWeightBps).toBe(0);

    catalog.applyPlan(allocator.allocate([scored(catalog.require("b"), 1)]));
    expect(catalog.require("a").targetWeightBps).toBe(0);
    expect(catalog.require("b").targetWeightBps).toBe(10_000);
  });

  it("tracks deployed amounts per vault", () => {
    const catalog = catalogWith("a", "b");
    catalog.reportDeployed("vault-1", new Map([["a", "10.000000"]]));
    catalog.reportDeployed("vault-2", new Map([["a", "5.000000"], ["b", "1.000000"]]));
    catalog.reportDeployed("vault-1", new Map());

    expect(catalog.require("a").deployed).toEqual({ "vault-2": "5.000000" });
    expect(catalog.require("b").deployed).toEqual({ "vault-2": "1.000000" });
  });
});

describe("persistence", () => {
  it("commits every mutation and reloads it", async () => {
    const store = new InMemoryStateStore();
    const catalog = new StrategyCatalog({ store });
    catalog.register(
      definition("curve", { lockup: { kind: "fixed", durationMs: 86_400_000, earlyExitPenaltyBps: 50 } }),
    );
    await catalog.recordReturn("curve", 0.004);
    catalog.disable("curve", "paused");

    expect(store.revision).toBe(3);
    expect(store.list(CATALOG_KEY_PREFIX)).toHaveLength(1);

    const reloaded = new StrategyCatalog({ store });
    const s = reloaded.require("curve");
    expect(s.lockup).toEqual({ kind: "fixed", durationMs: 86_400_000, earlyExitPenaltyBps: 50 });
    expect(s.returns.map((r) => r.value)).toEqual([0.004]);
    expect(s.status).toBe("disabled");
    expect(s.disabledReason).toBe("paused");
  });

  it("refuses malformed stored records", () => {
    const store = new InMemoryStateStore();
    store.commit([{ op: "put", key: `${CATALOG_KEY_PREFIX}bad`, value: { id: "bad" } }]);
    expect(() => new StrategyCatalog({ store })).toThrow(/malformed/);
  });
});
