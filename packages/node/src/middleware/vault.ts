/**
 * Resolves the `:id` path parameter to a running vault.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { VaultRegistry } from "../services/vault-registry.js";

export function vaultMiddleware(registry: VaultRegistry): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("vault", registry.require(c.req.param("id") ?? ""));
    await next();
  };
}
