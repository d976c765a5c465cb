/**
 * @tidewater/node — HTTP service for Tidewater vaults.
 *
 * Public API for embedding the service or driving it from tests. The
 * process entry point lives in main.ts.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";

// Configuration
export {
  ConfigError,
  ConfigSchema,
  loadConfig,
  toVaultConfig,
  toBridgeConfig,
  toAllocatorConfig,
  toSchedulerConfig,
  SandboxStrategySchema,
  StrategiesFileSchema,
  parseStrategies,
  loadStrategies,
} from "./config.js";
export type { AppConfig, SandboxStrategy } from "./config.js";

// Logging
export { createLogger, eventLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Services
export { VaultService } from "./services/vault-service.js";
export type { VaultServiceOptions } from "./services/vault-service.js";
export { VaultRegistry, RegistryError } from "./services/vault-registry.js";
export type { VaultAdapters, VaultRegistryOptions } from "./services/vault-registry.js";

// Sandbox adapters
export { SandboxExecutionPort } from "./sandbox/execution-port.js";
export type { SandboxExecutionPortOptions } from "./sandbox/execution-port.js";
export { SandboxBridgeBackend } from "./sandbox/bridge-backend.js";
export type { SandboxBridgeBackendOptions } from "./sandbox/bridge-backend.js";

// HTTP
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
