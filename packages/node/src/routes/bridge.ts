/**
 * Bridge routes, mounted under a vault.
 *
 * GET    /api/v1/vaults/:id/bridge/transfers              — List transfers (cursor pagination)
 * GET    /api/v1/vaults/:id/bridge/transfers/:tid         — Get one transfer
 * GET    /api/v1/vaults/:id/bridge/stats                  — Counts, latency, retries
 * POST   /api/v1/vaults/:id/bridge/transfers/:tid/refund  — Refund a failed transfer
 */

import { Hono } from "hono";
import { ListTransfersQuerySchema } from "../types/dto.js";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { parseQuery } from "../middleware/validate.js";

export function createBridgeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/transfers", (c) => {
    const { bridge } = c.get("vault");
    const query = parseQuery(c, ListTransfersQuerySchema);
    const transfers = bridge.list(query.state !== undefined ? { state: query.state } : undefined);
    const sorted = [...transfers].sort((a, b) => orderKey(a).localeCompare(orderKey(b)));
    return c.json(paginate(sorted, query, orderKey, "createdAt"));
  });

  routes.get("/transfers/:tid", (c) => {
    const { bridge } = c.get("vault");
    return c.json({ data: bridge.require(c.req.param("tid")) });
  });

  routes.get("/stats", (c) => {
    return c.json({ data: c.get("vault").bridge.stats() });
  });

  // The refund outcome is applied to the ledger before responding
  routes.post("/transfers/:tid/refund", async (c) => {
    const vault = c.get("vault");
    const transfer = vault.bridge.refund(c.req.param("tid"));
    await vault.ledger.drainBridgeOutcomes();
    return c.json({ data: transfer });
  });

  return routes;
}

function orderKey(t: { readonly createdAt: string; readonly id: string }): string {
  return `${t.createdAt}|${t.id}`;
}
