/**
 * Test helpers for @tidewater/node.
 *
 * Builds the full app over an in-memory store and a manual clock, with
 * sandbox adapters and no HTTP server or background loops.
 */

import { ManualClock } from "@tidewater/runtime";
import { InMemoryStateStore } from "@tidewater/store";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import type { SandboxStrategy } from "../src/config.js";
import { loadConfig, parseStrategies } from "../src/config.js";
import { createLogger } from "../src/logger.js";
import type { Logger } from "../src/logger.js";
import type { VaultAdapters } from "../src/services/vault-registry.js";
import { VaultRegistry } from "../src/services/vault-registry.js";

export const T0 = Date.UTC(2025, 0, 1);

function strategy(id: string, chainId: string): Record<string, unknown> {
  return {
    id,
    name: `Strategy ${id}`,
    kind: "lending",
    chainId,
    lockup: { kind: "none" },
    liquidityCeiling: { amount: "1000000", currency: "USDC", decimals: 6 },
    liquidityUsd: 5_000_000,
    maxAllocationBps: 10_000,
    apy: 0.05,
  };
}

export const TEST_STRATEGIES: readonly SandboxStrategy[] = parseStrategies({
  strategies: [strategy("aave-usdc", "base"), strategy("comp-usdc", "base"), strategy("aave-arb", "arbitrum")],
});

/** Quiet logging, no background deployment, and an allocator without caps */
export const TEST_ENV: Readonly<Record<string, string>> = {
  LOG_LEVEL: "silent",
  NODE_ENV: "test",
  DEPLOYMENT_THRESHOLD: "1000000",
  MIN_LIQUIDITY_USD: "0",
  MAX_POSITION_SIZE_BPS: "10000",
  MAX_STRATEGY_WEIGHT_BPS: "10000",
};

export interface TestApp extends AppInstance {
  readonly registry: VaultRegistry;
  readonly clock: ManualClock;
  readonly store: InMemoryStateStore;
}

export interface TestAppOptions {
  readonly env?: Readonly<Record<string, string>>;
  readonly adapters?: (vaultId: string) => VaultAdapters;
  readonly logger?: Logger;
  /** Reopen over an existing store */
  readonly store?: InMemoryStateStore;
}

/**
 * Create a test app. Vault "main" exists unless VAULT_IDS says otherwise.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const config = loadConfig({ ...TEST_ENV, ...options.env });
  const clock = new ManualClock(T0);
  const store = options.store ?? new InMemoryStateStore();
  const registry = VaultRegistry.init({
    config,
    logger: options.logger ?? createLogger(config),
    strategies: TEST_STRATEGIES,
    store,
    clock,
    ...(options.adapters !== undefined ? { adapters: options.adapters } : {}),
  });
  const instance = createApp({ registry, clock });
  return { ...instance, registry, clock, store };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Record `samples` identical returns so the strategy gets scored.
 */
export async function seedReturns(app: TestApp, strategyId: string, value = 0.01, samples = 7): Promise<void> {
  for (let i = 0; i < samples; i++) {
    await app.registry.catalog.recordReturn(strategyId, value);
  }
}
