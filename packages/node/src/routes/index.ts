/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vaults.js";
export { createBridgeRoutes } from "./bridge.js";
export { createStrategyRoutes } from "./strategies.js";
