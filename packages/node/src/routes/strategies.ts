/**
 * Strategy catalog routes.
 *
 * GET    /api/v1/strategies               — List strategies with their current score
 * GET    /api/v1/strategies/:sid          — Get one strategy
 * POST   /api/v1/strategies/:sid/returns  — Record a period return
 * POST   /api/v1/strategies/:sid/disable  — Take a strategy out of allocation
 * POST   /api/v1/strategies/:sid/enable   — Put it back
 */

import { Hono } from "hono";
import type { Strategy } from "@tidewater/strategy";
import { RiskScorer } from "@tidewater/strategy";
import type { AppEnv } from "../types/api-contract.js";
import { DisableStrategySchema, RecordReturnSchema } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import type { VaultRegistry } from "../services/vault-registry.js";

export function createStrategyRoutes(registry: VaultRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { catalog } = registry;
  const scorer = new RiskScorer();

  const view = (strategy: Strategy) => ({
    ...strategy,
    score: scorer.scoreStrategy(strategy).result,
  });

  routes.get("/", (c) => {
    return c.json({ data: catalog.list().map(view) });
  });

  routes.get("/:sid", (c) => {
    return c.json({ data: view(catalog.require(c.req.param("sid"))) });
  });

  routes.post("/:sid/returns", async (c) => {
    const body = await parseBody(c, RecordReturnSchema);
    const sample = await catalog.recordReturn(c.req.param("sid"), body.value);
    return c.json({ data: sample }, 201);
  });

  routes.post("/:sid/disable", async (c) => {
    const body = await parseBody(c, DisableStrategySchema);
    return c.json({ data: view(catalog.disable(c.req.param("sid"), body.reason)) });
  });

  routes.post("/:sid/enable", (c) => {
    return c.json({ data: view(catalog.enable(c.req.param("sid"))) });
  });

  return routes;
}
