/**
 * Tests for VaultLedger deposits, cash withdrawals, harvests and
 * administrative transitions.
 */

import { describe, it, expect } from "vitest";
import { VaultError, ExecutionError } from "../src/errors.js";
import type { YieldReport } from "../src/ports.js";
import type { Harness } from "./fixtures.js";
import { DAY_MS, eventTypes, gate, harness, plan, usdc } from "./fixtures.js";

/**
 * alice deposits 100, 40 is deployed to aave, aave yields 50:
 * total assets 150 over 100 shares.
 */
async function navOneAndAHalf(h: Harness): Promise<void> {
  await h.ledger.deposit("alice", usdc("100"));
  await h.ledger.adoptPlan(plan("p1", [["aave", 4_000]]));
  await h.ledger.deployIdleCash();
  h.port.yields.set("aave", usdc("50"));
  await h.ledger.harvest();
}

// =============================================================================
// deposit
// =============================================================================

describe("deposit", () => {
  it("mints shares one-to-one into an empty vault", async () => {
    const h = harness();
    const receipt = await h.ledger.deposit("alice", usdc("100"));

    expect(receipt.sharesMinted).toEqual(usdc("100.000000"));
    expect(receipt.position.shares).toEqual(usdc("100.000000"));

    const snap = h.ledger.snapshot();
    expect(snap.totalAssets).toEqual(usdc("100.000000"));
    expect(snap.totalShares).toEqual(usdc("100.000000"));
    expect(snap.cash).toEqual(usdc("100.000000"));
    expect(snap.sharePrice).toBe("1.000000");
    expect(eventTypes(h.events)).toEqual(["vault.deposit"]);
  });

  it("mints at the current share price", async () => {
    const h = harness();
    await navOneAndAHalf(h);

    const receipt = await h.ledger.deposit("bob", usdc("50"));

    expect(receipt.sharesMinted).toEqual(usdc("33.333333"));
    expect(h.ledger.snapshot().totalAssets).toEqual(usdc("200.000000"));
    expect(h.ledger.snapshot().totalShares).toEqual(usdc("133.333333"));
  });

  it("rejects non-positive amounts", async () => {
    const h = harness();
    await expect(h.ledger.deposit("alice", usdc("0"))).rejects.toMatchObject({
      code: "INVALID_AMOUNT",
      transient: false,
    });
    await expect(h.ledger.deposit("alice", usdc("-5"))).rejects.toMatchObject({
      code: "INVALID_AMOUNT",
    });
    expect(h.ledger.snapshot().totalAssets).toEqual(usdc("0.000000"));
  });

  it("rejects amounts in another asset", async () => {
    const h = harness();
    await expect(
      h.ledger.deposit("alice", { amount: "1", currency: "USDT", decimals: 6 }),
    ).rejects.toBeInstanceOf(VaultError);
  });

  it("enforces the deposit range", async () => {
    const h = harness({ minDeposit: "10", maxDeposit: "500" });

    await expect(h.ledger.deposit("alice", usdc("5"))).rejects.toMatchObject({
      code: "DEPOSIT_OUT_OF_RANGE",
    });
    await expect(h.ledger.deposit("alice", usdc("501"))).rejects.toMatchObject({
      code: "DEPOSIT_OUT_OF_RANGE",
    });
    await expect(h.ledger.deposit("alice", usdc("10"))).resolves.toMatchObject({
      sharesMinted: usdc("10.000000"),
    });
  });

  it("refuses deposits during emergency shutdown", async () => {
    const h = harness();
    await h.ledger.triggerEmergencyShutdown("test");

    await expect(h.ledger.deposit("alice", usdc("1"))).rejects.toMatchObject({
      code: "VAULT_HALTED",
      category: "state",
    });
  });

  it("applies the longer of the configured and requested lockup", async () => {
    const h = harness({ lockupMs: DAY_MS });

    await h.ledger.deposit("alice", usdc("100"), { lockupMs: 3 * DAY_MS });
    expect(h.ledger.position("alice")?.lockupReleaseAt).toBe("2025-01-04T00:00:00.000Z");

    // A later deposit with a shorter lockup keeps the later release.
    await h.ledger.deposit("alice", usdc("1"));
    expect(h.ledger.position("alice")?.lockupReleaseAt).toBe("2025-01-04T00:00:00.000Z");
  });

  it("deploys idle cash in the background once the threshold is reached", async () => {
    const h = harness({ deploymentThreshold: "50" });
    await h.ledger.adoptPlan(plan("p1", [["aave", 5_000]]));

    await h.ledger.deposit("alice", usdc("40"));
    await h.ledger.whenIdle();
    expect(h.port.deploy).not.toHaveBeenCalled();

    await h.ledger.deposit("alice", usdc("20"));
    await h.ledger.whenIdle();

    expect(h.port.deploy).toHaveBeenCalledTimes(1);
    expect(h.ledger.snapshot().deployed).toEqual({ aave: usdc("30.000000") });
    expect(h.ledger.snapshot().cash).toEqual(usdc("30.000000"));
  });
});

// =============================================================================
// withdraw (from cash)
// =============================================================================

describe("withdraw from cash", () => {
  it("charges the early-withdrawal penalty inside the lockup", async () => {
    const h = harness({ lockupMs: DAY_MS, earlyWithdrawalPenaltyBps: 500 });
    await navOneAndAHalf(h);

    const w = await h.ledger.withdraw("alice", usdc("50"));

    expect(w.status).toBe("completed");
    expect(w.gross).toEqual(usdc("75.000000"));
    expect(w.penalty).toEqual(usdc("3.750000"));
    expect(w.net).toEqual(usdc("71.250000"));

    const snap = h.ledger.snapshot();
    expect(snap.totalAssets).toEqual(usdc("75.000000"));
    expect(snap.cash).toEqual(usdc("35.000000"));
    expect(snap.accruedFees).toEqual(usdc("3.750000"));
    expect(snap.totalShares).toEqual(usdc("50.000000"));
    expect(h.ledger.position("alice")?.shares).toEqual(usdc("50.000000"));
  });

  it("waives the penalty once the lockup has passed", async () => {
    const h = harness({ lockupMs: DAY_MS, earlyWithdrawalPenaltyBps: 500 });
    await navOneAndAHalf(h);
    h.clock.advance(DAY_MS);

    const w = await h.ledger.withdraw("alice", usdc("50"));

    expect(w.penalty).toEqual(usdc("0.000000"));
    expect(w.net).toEqual(usdc("75.000000"));
  });

  it("charges the withdrawal fee and removes an emptied position", async () => {
    const h = harness({ withdrawalFeeBps: 50 });
    await h.ledger.deposit("alice", usdc("100"));

    const w = await h.ledger.withdraw("alice", usdc("100"));

    expect(w.penalty).toEqual(usdc("0.500000"));
    expect(w.net).toEqual(usdc("99.500000"));
    expect(h.ledger.position("alice")).toBeUndefined();
    expect(h.ledger.snapshot().totalAssets).toEqual(usdc("0.000000"));
    expect(h.ledger.snapshot().accruedFees).toEqual(usdc("0.500000"));
    expect(h.ledger.metrics().totalUsers).toBe(0);
  });

  it("rejects more shares than the owner holds", async () => {
    const h = harness();
    await h.ledger.deposit("alice", usdc("10"));

    await expect(h.ledger.withdraw("alice", usdc("11"))).rejects.toMatchObject({
      code: "INSUFFICIENT_SHARES",
    });
    await expect(h.ledger.withdraw("mallory", usdc("1"))).rejects.toMatchObject({
      code: "INSUFFICIENT_SHARES",
    });
    await expect(h.ledger.withdraw("alice", usdc("0"))).rejects.toMatchObject({
      code: "INVALID_AMOUNT",
    });
  });

  it("stays available during emergency shutdown", async () => {
    const h = harness();
    await h.ledger.deposit("alice", usdc("100"));
    await h.ledger.triggerEmergencyShutdown("test");

    const w = await h.ledger.withdraw("alice", usdc("100"));
    expect(w.status).toBe("completed");
    expect(w.net).toEqual(usdc("100.000000"));
  });
});

// =============================================================================
// harvest
// =============================================================================

describe("harvest", () => {
  it("credits net yield and accrues the performance fee", async () => {
    const h = harness({ performanceFeeBps: 1_000 });
    await h.ledger.deposit("alice", usdc("100"));
    await h.ledger.adoptPlan(plan("p1", [["aave", 4_000]]));
    await h.ledger.deployIdleCash();
    h.port.yields.set("aave", usdc("50"));

    const result = await h.ledger.harvest();

    expect(result.outcome).toBe("HARVESTED");
    expect(result.grossYield).toEqual(usdc("50.000000"));
    expect(result.performanceFee).toEqual(usdc("5.000000"));
    expect(result.netYield).toEqual(usdc("45.000000"));
    expect(result.perStrategy).toEqual([{ strategyId: "aave", realizedYield: usdc("50.000000") }]);
    expect(result.failed).toEqual([]);

    const snap = h.ledger.snapshot();
    expect(snap.totalAssets).toEqual(usdc("145.000000"));
    expect(snap.cash).toEqual(usdc("105.000000"));
    expect(snap.accruedFees).toEqual(usdc("5.000000"));

    expect(h.catalog.require("aave").returns.map((r) => r.value)).toEqual([1.25]);

    const metrics = h.ledger.metrics();
    expect(metrics.tvlHistory).toEqual([
      { at: "2025-01-01T00:00:00.000Z", totalAssets: "145.000000" },
    ]);
    expect(metrics.apyHistory[0]?.apy).toBeCloseTo(164.25, 6);
    expect(metrics.lifetimeYield).toEqual(usdc("50.000000"));
  });

  it("changes nothing on a second call in the same epoch", async () => {
    const h = harness();
    await navOneAndAHalf(h);
    h.port.yields.set("aave", usdc("10"));

    const again = await h.ledger.harvest();

    expect(again.outcome).toBe("ZERO_YIELD_AVAILABLE");
    expect(h.ledger.snapshot().totalAssets).toEqual(usdc("150.000000"));
    expect(h.port.harvest).toHaveBeenCalledTimes(1);

    h.clock.advance(DAY_MS);
    const next = await h.ledger.harvest();
    expect(next.outcome).toBe("HARVESTED");
    expect(next.grossYield).toEqual(usdc("10.000000"));
    expect(h.ledger.snapshot().totalAssets).toEqual(usdc("160.000000"));
  });

  it("lets only one harvest per epoch collect while another is in flight", async () => {
    const h = harness();
    await h.ledger.deposit("alice", usdc("100"));
    await h.ledger.adoptPlan(plan("p1", [["aave", 4_000]]));
    await h.ledger.deployIdleCash();
    const held = gate<YieldReport>();
    h.port.harvest.mockImplementationOnce(() => held.promise);

    const first = h.ledger.harvest();
    const second = await h.ledger.harvest();
    expect(second.outcome).toBe("ZERO_YIELD_AVAILABLE");

    held.release({ strategyId: "aave", realizedYield: usdc("5"), reportedAt: "2025-01-01T00:00:00.000Z" });
    expect((await first).grossYield).toEqual(usdc("5.000000"));
    expect(h.port.harvest).toHaveBeenCalledTimes(1);
    expect(h.ledger.snapshot().totalAssets).toEqual(usdc("105.000000"));
  });

  it("reports zero yield when strategies paid nothing", async () => {
    const h = harness();
    await h.ledger.deposit("alice", usdc("100"));
    await h.ledger.adoptPlan(plan("p1", [["aave", 4_000]]));
    await h.ledger.deployIdleCash();

    const result = await h.ledger.harvest();

    expect(result.outcome).toBe("ZERO_YIELD_AVAILABLE");
    expect(h.ledger.snapshot().totalAssets).toEqual(usdc("100.000000"));
    expect(h.catalog.require("aave").returns.map((r) => r.value)).toEqual([0]);
  });

  it("disables a strategy whose harvest keeps failing", async () => {
    const h = harness();
    await h.ledger.deposit("alice", usdc("100"));
    await h.ledger.adoptPlan(plan("p1", [["aave", 1_000]]));
    await h.ledger.deployIdleCash();
    h.port.harvest.mockRejectedValue(new ExecutionError("rpc down", true, "aave"));

    const result = await h.ledger.harvest();

    expect(result.failed).toEqual(["aave"]);
    expect(h.port.harvest).toHaveBeenCalledTimes(3);
    expect(h.catalog.require("aave").status).toBe("disabled");
    // 10 of 100 in disabled strategies stays under the 2000 bps threshold.
    expect(h.ledger.status).toBe("active");
    expect(eventTypes(h.events)).toContain("vault.strategy.disabled");
  });
});

// =============================================================================
// administration
// =============================================================================

describe("administration", () => {
  it("moves between active and emergency shutdown", async () => {
    const h = harness();

    const halted = await h.ledger.triggerEmergencyShutdown("oracle outage");
    expect(halted.status).toBe("emergency_shutdown");
    expect(halted.statusReason).toBe("oracle outage");
    await expect(h.ledger.triggerEmergencyShutdown("again")).rejects.toMatchObject({
      code: "INVALID_TRANSITION",
    });

    const resumed = await h.ledger.resume();
    expect(resumed.status).toBe("active");
    expect(resumed.statusReason).toBeUndefined();
    await expect(h.ledger.resume()).rejects.toMatchObject({ code: "INVALID_TRANSITION" });

    expect(eventTypes(h.events)).toEqual(["vault.emergency_shutdown", "vault.resumed"]);
  });

  it("pays out accrued fees", async () => {
    const h = harness({ withdrawalFeeBps: 100 });
    await h.ledger.deposit("alice", usdc("100"));
    await h.ledger.withdraw("alice", usdc("100"));

    const receipt = await h.ledger.collectFees();

    expect(receipt).toEqual({ amount: usdc("1.000000"), collectedAt: "2025-01-01T00:00:00.000Z" });
    expect(h.ledger.snapshot().accruedFees).toEqual(usdc("0.000000"));
    expect(h.ledger.metrics().lifetimeFeesCollected).toEqual(usdc("1.000000"));
  });

  it("reports a consistent ledger after ordinary operations", async () => {
    const h = harness({ lockupMs: DAY_MS });
    await navOneAndAHalf(h);
    await h.ledger.deposit("bob", usdc("25"));
    await h.ledger.withdraw("alice", usdc("10"));

    expect(h.ledger.verify()).toEqual({ consistent: true, violations: [] });
  });
});
