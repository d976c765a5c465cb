/**
 * Tests for vault routes.
 */

import { describe, it, expect } from "vitest";
import type { CycleResult, DepositReceipt, PendingWithdrawal, UserPosition, VaultSnapshot } from "@tidewater/vault";
import { createTestApp, jsonRequest, seedReturns } from "../setup.js";
import type { TestApp } from "../setup.js";

interface ErrorBody {
  error: { code: string; message: string; transient: boolean; details?: Record<string, unknown> };
}

const usdc = (amount: string) => ({ amount, currency: "USDC", decimals: 6 });

async function deposit(t: TestApp, owner: string, amount: string): Promise<Response> {
  return t.app.request(jsonRequest("/api/v1/vaults/main/deposits", "POST", { owner, amount }));
}

describe("vault routes", () => {
  // ─── Reads ─────────────────────────────────────────────────────────

  it("lists every configured vault", async () => {
    const t = createTestApp({ env: { VAULT_IDS: "main,reserve" } });

    const res = await t.app.request("/api/v1/vaults");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: VaultSnapshot[] };
    expect(body.data.map((s) => s.id)).toEqual(["main", "reserve"]);
    expect(body.data[0]?.totalAssets).toEqual(usdc("0.000000"));
  });

  it("returns an overview with health and no cycle yet", async () => {
    const t = createTestApp();

    const res = await t.app.request("/api/v1/vaults/main");

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      data: { snapshot: VaultSnapshot; health: string; lastCycle: CycleResult | null };
    };
    expect(body.data.snapshot.status).toBe("active");
    expect(body.data.snapshot.sharePrice).toBe("1");
    expect(body.data.health).toBe("healthy");
    expect(body.data.lastCycle).toBeNull();
  });

  it("returns 404 for an unknown vault", async () => {
    const t = createTestApp();

    const res = await t.app.request("/api/v1/vaults/nope/positions/alice");

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "VAULT_NOT_FOUND", message: "Vault nope not found", transient: false });
  });

  // ─── Deposits ──────────────────────────────────────────────────────

  it("mints shares one to one into an empty vault", async () => {
    const t = createTestApp();

    const res = await deposit(t, "alice", "100");

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: DepositReceipt };
    expect(body.data).toEqual({
      owner: "alice",
      amount: usdc("100.000000"),
      sharesMinted: usdc("100.000000"),
      position: {
        owner: "alice",
        shares: usdc("100.000000"),
        value: usdc("100.000000"),
        depositedAt: "2025-01-01T00:00:00.000Z",
        lockupReleaseAt: "2025-01-08T00:00:00.000Z",
      },
    });
  });

  it("honours a longer requested lockup", async () => {
    const t = createTestApp();

    const res = await t.app.request(
      jsonRequest("/api/v1/vaults/main/deposits", "POST", {
        owner: "alice",
        amount: "10",
        lockupMs: 30 * 24 * 60 * 60 * 1000,
      }),
    );

    const body = (await res.json()) as { data: DepositReceipt };
    expect(body.data.position.lockupReleaseAt).toBe("2025-01-31T00:00:00.000Z");
  });

  it("rejects a malformed amount with the failing field", async () => {
    const t = createTestApp();

    const res = await deposit(t, "alice", "ten");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details).toEqual({
      issues: [{ path: "amount", message: "must be a non-negative decimal string" }],
    });
  });

  it("rejects a zero deposit", async () => {
    const t = createTestApp();

    const res = await deposit(t, "alice", "0");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_AMOUNT");
  });

  it("rejects deposits outside the configured range", async () => {
    const t = createTestApp({ env: { MAX_DEPOSIT: "1000" } });

    const res = await deposit(t, "alice", "5000");

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("DEPOSIT_OUT_OF_RANGE");
    expect(body.error.details).toEqual({ min: "0", max: "1000" });
  });

  // ─── Withdrawals ───────────────────────────────────────────────────

  it("completes a withdrawal from cash and charges the early penalty", async () => {
    const t = createTestApp();
    await deposit(t, "alice", "100");

    const res = await t.app.request(
      jsonRequest("/api/v1/vaults/main/withdrawals", "POST", { owner: "alice", shares: "40" }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: PendingWithdrawal };
    expect(body.data).toMatchObject({
      owner: "alice",
      status: "completed",
      shares: usdc("40.000000"),
      gross: usdc("40.000000"),
      // 5% early exit + 0.5% withdrawal fee
      penalty: usdc("2.200000"),
      net: usdc("37.800000"),
    });

    const snapshot = t.registry.require("main").ledger.snapshot();
    expect(snapshot.totalShares).toEqual(usdc("60.000000"));
    expect(snapshot.accruedFees).toEqual(usdc("2.200000"));
  });

  it("skips the early penalty after the lockup", async () => {
    const t = createTestApp();
    await deposit(t, "alice", "100");
    t.clock.advance(7 * 24 * 60 * 60 * 1000);

    const res = await t.app.request(
      jsonRequest("/api/v1/vaults/main/withdrawals", "POST", { owner: "alice", shares: "100" }),
    );

    const body = (await res.json()) as { data: PendingWithdrawal };
    expect(body.data.penalty).toEqual(usdc("0.500000"));
    expect(body.data.net).toEqual(usdc("99.500000"));
  });

  it("returns 422 when redeeming more shares than held", async () => {
    const t = createTestApp();
    await deposit(t, "alice", "10");

    const res = await t.app.request(
      jsonRequest("/api/v1/vaults/main/withdrawals", "POST", { owner: "alice", shares: "11" }),
    );

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INSUFFICIENT_SHARES");
  });

  it("lists withdrawals with cursor pagination", async () => {
    const t = createTestApp();
    await deposit(t, "alice", "100");
    await deposit(t, "bob", "100");
    for (const owner of ["alice", "bob", "alice"]) {
      t.clock.advance(1_000);
      await t.app.request(jsonRequest("/api/v1/vaults/main/withdrawals", "POST", { owner, shares: "1" }));
    }

    const first = await t.app.request("/api/v1/vaults/main/withdrawals?limit=2");
    const page1 = (await first.json()) as {
      data: PendingWithdrawal[];
      pagination: { cursor: string | null; hasMore: boolean };
    };
    expect(page1.data.map((w) => w.owner)).toEqual(["alice", "bob"]);
    expect(page1.pagination.hasMore).toBe(true);

    const second = await t.app.request(
      `/api/v1/vaults/main/withdrawals?limit=2&cursor=${encodeURIComponent(page1.pagination.cursor ?? "")}`,
    );
    const page2 = (await second.json()) as { data: PendingWithdrawal[]; pagination: { hasMore: boolean } };
    expect(page2.data.map((w) => w.requestedAt)).toEqual(["2025-01-01T00:00:03.000Z"]);
    expect(page2.pagination.hasMore).toBe(false);

    const filtered = await t.app.request("/api/v1/vaults/main/withdrawals?owner=bob");
    const bobs = (await filtered.json()) as { data: PendingWithdrawal[] };
    expect(bobs.data).toHaveLength(1);
  });

  it("gets one withdrawal and 404s on unknown ids", async () => {
    const t = createTestApp();
    await deposit(t, "alice", "100");
    const created = await t.app.request(
      jsonRequest("/api/v1/vaults/main/withdrawals", "POST", { owner: "alice", shares: "5" }),
    );
    const { data } = (await created.json()) as { data: PendingWithdrawal };

    const found = await t.app.request(`/api/v1/vaults/main/withdrawals/${data.id}`);
    expect(found.status).toBe(200);
    expect(((await found.json()) as { data: PendingWithdrawal }).data.id).toBe(data.id);

    const missing = await t.app.request("/api/v1/vaults/main/withdrawals/w-missing");
    expect(missing.status).toBe(404);
    expect(((await missing.json()) as ErrorBody).error.code).toBe("WITHDRAWAL_NOT_FOUND");
  });

  // ─── Positions ─────────────────────────────────────────────────────

  it("returns a position and 404s for owners without one", async () => {
    const t = createTestApp();
    await deposit(t, "alice", "25");

    const res = await t.app.request("/api/v1/vaults/main/positions/alice");
    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: UserPosition };
    expect(body.data.shares).toEqual(usdc("25.000000"));

    const missing = await t.app.request("/api/v1/vaults/main/positions/bob");
    expect(missing.status).toBe(404);
    expect(((await missing.json()) as ErrorBody).error).toEqual({
      code: "POSITION_NOT_FOUND",
      message: "Owner bob has no position in vault main",
      transient: false,
    });
  });

  // ─── Operations ────────────────────────────────────────────────────

  it("reports zero yield on a second harvest in the same epoch", async () => {
    const t = createTestApp();

    await t.app.request(jsonRequest("/api/v1/vaults/main/harvest", "POST"));
    const res = await t.app.request(jsonRequest("/api/v1/vaults/main/harvest", "POST"));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { outcome: string; epoch: number } };
    expect(body.data.outcome).toBe("ZERO_YIELD_AVAILABLE");
    expect(body.data.epoch).toBe(Math.floor(Date.UTC(2025, 0, 1) / (24 * 60 * 60 * 1000)));
  });

  it("runs a rebalance cycle and deploys toward the plan", async () => {
    const t = createTestApp();
    await seedReturns(t, "aave-usdc");
    await deposit(t, "alice", "100");

    const res = await t.app.request(jsonRequest("/api/v1/vaults/main/rebalance", "POST", {}));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: CycleResult };
    expect(body.data).toMatchObject({ status: "rebalanced", reason: "api", driftBps: 10_000 });

    const plan = await t.app.request("/api/v1/vaults/main/plan");
    const planBody = (await plan.json()) as {
      data: { plan: { id: string; mode: string }; weights: Record<string, number> };
    };
    expect(planBody.data.plan.id).toBe(body.data.planId);
    expect(planBody.data.plan.mode).toBe("normal");
    expect(planBody.data.weights).toEqual({ "aave-usdc": 10_000 });
  });

  it("returns no plan before the first cycle", async () => {
    const t = createTestApp();

    const res = await t.app.request("/api/v1/vaults/main/plan");

    const body = (await res.json()) as { data: { plan: unknown } };
    expect(body.data.plan).toBeNull();
  });

  // ─── Administration ────────────────────────────────────────────────

  it("halts deposits during emergency shutdown and resumes", async () => {
    const t = createTestApp();

    const halt = await t.app.request(
      jsonRequest("/api/v1/vaults/main/emergency-shutdown", "POST", { reason: "drill" }),
    );
    expect(halt.status).toBe(200);
    const halted = (await halt.json()) as { data: VaultSnapshot };
    expect(halted.data.status).toBe("emergency_shutdown");
    expect(halted.data.statusReason).toBe("drill");

    const blocked = await deposit(t, "alice", "10");
    expect(blocked.status).toBe(409);
    expect(((await blocked.json()) as ErrorBody).error.code).toBe("VAULT_HALTED");

    const health = await t.app.request("/api/v1/vaults/main/health");
    const report = (await health.json()) as { data: { status: string; reasons: string[] } };
    expect(report.data.status).toBe("critical");
    expect(report.data.reasons).toEqual(["vault in emergency shutdown: drill"]);

    const resume = await t.app.request(jsonRequest("/api/v1/vaults/main/resume", "POST"));
    expect(resume.status).toBe(200);
    expect(((await resume.json()) as { data: VaultSnapshot }).data.status).toBe("active");
  });

  it("refuses to resume a vault that is not halted", async () => {
    const t = createTestApp();

    const res = await t.app.request(jsonRequest("/api/v1/vaults/main/resume", "POST"));

    expect(res.status).toBe(409);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INVALID_TRANSITION");
  });

  it("requires a reason for emergency shutdown", async () => {
    const t = createTestApp();

    const res = await t.app.request(jsonRequest("/api/v1/vaults/main/emergency-shutdown", "POST", {}));

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("VALIDATION_ERROR");
  });

  it("collects accrued fees", async () => {
    const t = createTestApp();
    await deposit(t, "alice", "100");
    await t.app.request(
      jsonRequest("/api/v1/vaults/main/withdrawals", "POST", { owner: "alice", shares: "40" }),
    );

    const res = await t.app.request(jsonRequest("/api/v1/vaults/main/fees/collect", "POST"));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { amount: unknown; collectedAt: string } };
    expect(body.data).toEqual({ amount: usdc("2.200000"), collectedAt: "2025-01-01T00:00:00.000Z" });
    expect(t.registry.require("main").ledger.snapshot().accruedFees).toEqual(usdc("0.000000"));
  });
});
