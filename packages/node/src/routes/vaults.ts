/**
 * Vault routes.
 *
 * GET    /api/v1/vaults                              — List vault snapshots
 * GET    /api/v1/vaults/:id                          — Snapshot, metrics and health
 * POST   /api/v1/vaults/:id/deposits                 — Deposit and mint shares
 * POST   /api/v1/vaults/:id/withdrawals              — Redeem shares
 * GET    /api/v1/vaults/:id/withdrawals              — List withdrawals (cursor pagination)
 * GET    /api/v1/vaults/:id/withdrawals/:wid         — Get one withdrawal
 * GET    /api/v1/vaults/:id/positions/:owner         — Get one position
 * POST   /api/v1/vaults/:id/harvest                  — Harvest the current epoch
 * POST   /api/v1/vaults/:id/rebalance                — Run a scheduler cycle now
 * GET    /api/v1/vaults/:id/plan                     — Current plan and weights
 * POST   /api/v1/vaults/:id/emergency-shutdown       — Halt the vault
 * POST   /api/v1/vaults/:id/resume                   — Leave emergency shutdown
 * POST   /api/v1/vaults/:id/fees/collect             — Pay out accrued fees
 */

import { Hono } from "hono";
import { VaultError } from "@tidewater/vault";
import type { AppEnv } from "../types/api-contract.js";
import {
  DepositSchema,
  EmergencyShutdownSchema,
  ListWithdrawalsQuerySchema,
  RebalanceSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { parseBody, parseQuery } from "../middleware/validate.js";
import { vaultMiddleware } from "../middleware/vault.js";
import type { VaultRegistry } from "../services/vault-registry.js";
import { createBridgeRoutes } from "./bridge.js";

export function createVaultRoutes(registry: VaultRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("/:id", vaultMiddleware(registry));
  routes.use("/:id/*", vaultMiddleware(registry));

  // GET /api/v1/vaults — List
  routes.get("/", (c) => {
    return c.json({ data: registry.list().map((s) => s.ledger.snapshot()) });
  });

  // GET /api/v1/vaults/:id — Overview
  routes.get("/:id", (c) => {
    const vault = c.get("vault");
    return c.json({
      data: {
        snapshot: vault.ledger.snapshot(),
        metrics: vault.ledger.metrics(),
        health: vault.health().status,
        lastCycle: vault.scheduler.lastCycle ?? null,
      },
    });
  });

  // ─── Deposits and withdrawals ──────────────────────────────────

  routes.post("/:id/deposits", async (c) => {
    const vault = c.get("vault");
    const body = await parseBody(c, DepositSchema);
    const { asset } = vault.ledger.config;

    const receipt = await vault.ledger.deposit(
      body.owner,
      { amount: body.amount, currency: asset.currency, decimals: asset.decimals },
      body.lockupMs !== undefined ? { lockupMs: body.lockupMs } : {},
    );
    return c.json({ data: receipt }, 201);
  });

  routes.post("/:id/withdrawals", async (c) => {
    const vault = c.get("vault");
    const body = await parseBody(c, WithdrawSchema);
    const { asset } = vault.ledger.config;

    const withdrawal = await vault.ledger.withdraw(body.owner, {
      amount: body.shares,
      currency: asset.currency,
      decimals: asset.decimals,
    });
    // Pending withdrawals finish in the background
    return c.json({ data: withdrawal }, withdrawal.status === "pending" ? 202 : 201);
  });

  routes.get("/:id/withdrawals", (c) => {
    const vault = c.get("vault");
    const query = parseQuery(c, ListWithdrawalsQuerySchema);
    const sorted = [...vault.ledger.withdrawals(query.owner)].sort((a, b) =>
      orderKey(a).localeCompare(orderKey(b)),
    );
    return c.json(paginate(sorted, query, orderKey, "requestedAt"));
  });

  routes.get("/:id/withdrawals/:wid", (c) => {
    const vault = c.get("vault");
    const wid = c.req.param("wid");
    const withdrawal = vault.ledger.withdrawal(wid);
    if (withdrawal === undefined) {
      throw new VaultError("WITHDRAWAL_NOT_FOUND", `Withdrawal ${wid} not found`);
    }
    return c.json({ data: withdrawal });
  });

  routes.get("/:id/positions/:owner", (c) => {
    const vault = c.get("vault");
    const owner = c.req.param("owner");
    const position = vault.ledger.position(owner);
    if (position === undefined) {
      throw new VaultError("POSITION_NOT_FOUND", `Owner ${owner} has no position in vault ${vault.id}`);
    }
    return c.json({ data: position });
  });

  // ─── Operations ────────────────────────────────────────────────

  routes.post("/:id/harvest", async (c) => {
    const result = await c.get("vault").ledger.harvest();
    return c.json({ data: result });
  });

  routes.post("/:id/rebalance", async (c) => {
    const body = await parseBody(c, RebalanceSchema);
    const cycle = await c.get("vault").scheduler.trigger(body.reason);
    return c.json({ data: cycle });
  });

  routes.get("/:id/plan", (c) => {
    const { ledger } = c.get("vault");
    return c.json({ data: { plan: ledger.currentPlan(), weights: ledger.currentWeights() } });
  });

  routes.get("/:id/health", (c) => {
    return c.json({ data: c.get("vault").health() });
  });

  // ─── Administration ────────────────────────────────────────────

  routes.post("/:id/emergency-shutdown", async (c) => {
    const body = await parseBody(c, EmergencyShutdownSchema);
    const snapshot = await c.get("vault").ledger.triggerEmergencyShutdown(body.reason);
    return c.json({ data: snapshot });
  });

  routes.post("/:id/resume", async (c) => {
    const snapshot = await c.get("vault").ledger.resume();
    return c.json({ data: snapshot });
  });

  routes.post("/:id/fees/collect", async (c) => {
    const receipt = await c.get("vault").ledger.collectFees();
    return c.json({ data: receipt });
  });

  routes.route("/:id/bridge", createBridgeRoutes());

  return routes;
}

/** Sorts by request time, ids breaking ties */
function orderKey(w: { readonly requestedAt: string; readonly id: string }): string {
  return `${w.requestedAt}|${w.id}`;
}
