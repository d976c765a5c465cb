/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe: every vault's health report; 503 when any
 *               vault is critical
 */

import { Hono } from "hono";
import type { HealthReport } from "@tidewater/vault";
import type { AppEnv } from "../types/api-contract.js";
import type { VaultRegistry } from "../services/vault-registry.js";

export function createHealthRoutes(registry: VaultRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const vaults: Record<string, HealthReport> = {};
    let ready = true;

    for (const service of registry.list()) {
      const report = service.health();
      vaults[service.id] = report;
      if (report.status === "critical") ready = false;
    }

    const store = registry.store.verifyIntegrity();
    if (!store.valid) ready = false;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        vaults,
        store: { valid: store.valid, revision: registry.store.revision },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
