/**
 * @tidewater/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * and projects it into the value objects the vault packages take.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { BridgeConfig } from "@tidewater/bridge";
import type { AllocatorConfig, StrategyDefinition } from "@tidewater/strategy";
import { StrategyDefinitionSchema } from "@tidewater/strategy";
import type { SchedulerConfig, VaultConfig } from "@tidewater/vault";
import { DEFAULT_VAULT_CONFIG } from "@tidewater/vault";

// =============================================================================
// Errors
// =============================================================================

export class ConfigError extends Error {
  public readonly code = "INVALID_CONFIG" as const;
  public readonly category = "config" as const;
  public readonly transient = false;

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// =============================================================================
// Schema
// =============================================================================

const decimalString = z.string().regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal");
const bps = z.coerce.number().int().min(0).max(10_000);
const millis = z.coerce.number().int().min(0);
const positiveMillis = z.coerce.number().int().min(1);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  IDEMPOTENCY_TTL_MS: positiveMillis.default(86_400_000),

  // Storage. Without a file, state lives in memory only.
  DATA_FILE: z.string().min(1).optional(),
  STRATEGIES_FILE: z.string().min(1).default("packages/node/config/strategies.json"),

  // Vaults
  VAULT_IDS: z
    .string()
    .default("main")
    .transform((v) => v.split(",").map((id) => id.trim()).filter((id) => id !== ""))
    .pipe(z.array(z.string().regex(/^[A-Za-z0-9_-]+$/)).min(1)),
  HOME_CHAIN_ID: z.string().min(1).default("base"),
  ASSET_CURRENCY: z.string().min(1).default("USDC"),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),

  MIN_DEPOSIT: decimalString.default("0"),
  MAX_DEPOSIT: decimalString.default("1000000000"),
  PERFORMANCE_FEE_BPS: bps.default(1_000),
  WITHDRAWAL_FEE_BPS: bps.default(50),
  EARLY_WITHDRAWAL_PENALTY_BPS: bps.default(500),
  LOCKUP_MS: millis.default(7 * 24 * 60 * 60 * 1000),
  MAX_SLIPPAGE_BPS: bps.default(100),
  EMERGENCY_SHUTDOWN_THRESHOLD_BPS: bps.default(2_000),
  HARVEST_EPOCH_MS: positiveMillis.default(24 * 60 * 60 * 1000),
  DEPLOYMENT_THRESHOLD: decimalString.default("1000"),
  MAX_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(3),
  RETRY_BASE_DELAY_MS: millis.default(1_000),
  RETRY_MAX_DELAY_MS: millis.default(30_000),

  // Allocation
  MIN_LIQUIDITY_USD: z.coerce.number().min(0).default(1_000_000),
  MAX_POSITION_SIZE_BPS: bps.default(5_000),
  MAX_STRATEGY_WEIGHT_BPS: bps.default(4_000),

  // Bridge
  CONFIRMATION_BLOCKS: z.coerce.number().int().min(1).default(12),
  MAX_TRANSFER_AMOUNT: decimalString.default("1000000"),
  MIN_TRANSFER_AMOUNT: decimalString.default("0"),
  BRIDGE_FEE_BPS: bps.default(30),
  CONFIRMATION_TIMEOUT_MS: positiveMillis.default(3_600_000),
  BRIDGE_POLL_INTERVAL_MS: positiveMillis.default(5_000),

  // Scheduling
  DRIFT_TOLERANCE_BPS: bps.default(200),
  REBALANCE_INTERVAL_MS: positiveMillis.default(60 * 60 * 1000),
  MIN_REBALANCE_INTERVAL_MS: millis.default(15 * 60 * 1000),
  HEALTH_CHECK_INTERVAL_MS: positiveMillis.default(30_000),

  // Sandbox adapters
  SANDBOX_CONFIRMATIONS_PER_POLL: z.coerce.number().int().min(1).default(4),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Load and validate configuration from process.env.
 *
 * @throws {ConfigError} listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues);
  }

  const config = result.data;
  if (Number(config.MIN_DEPOSIT) > Number(config.MAX_DEPOSIT)) {
    throw new ConfigError("Invalid configuration: MIN_DEPOSIT exceeds MAX_DEPOSIT", [
      "MIN_DEPOSIT: exceeds MAX_DEPOSIT",
    ]);
  }
  if (Number(config.MIN_TRANSFER_AMOUNT) > Number(config.MAX_TRANSFER_AMOUNT)) {
    throw new ConfigError("Invalid configuration: MIN_TRANSFER_AMOUNT exceeds MAX_TRANSFER_AMOUNT", [
      "MIN_TRANSFER_AMOUNT: exceeds MAX_TRANSFER_AMOUNT",
    ]);
  }
  return config;
}

// =============================================================================
// Projections
// =============================================================================

export function toVaultConfig(config: AppConfig, id: string): VaultConfig {
  return {
    ...DEFAULT_VAULT_CONFIG,
    id,
    asset: { currency: config.ASSET_CURRENCY, decimals: config.ASSET_DECIMALS },
    homeChainId: config.HOME_CHAIN_ID,
    minDeposit: config.MIN_DEPOSIT,
    maxDeposit: config.MAX_DEPOSIT,
    performanceFeeBps: config.PERFORMANCE_FEE_BPS,
    withdrawalFeeBps: config.WITHDRAWAL_FEE_BPS,
    earlyWithdrawalPenaltyBps: config.EARLY_WITHDRAWAL_PENALTY_BPS,
    lockupMs: config.LOCKUP_MS,
    maxSlippageBps: config.MAX_SLIPPAGE_BPS,
    emergencyShutdownThresholdBps: config.EMERGENCY_SHUTDOWN_THRESHOLD_BPS,
    harvestEpochMs: config.HARVEST_EPOCH_MS,
    deploymentThreshold: config.DEPLOYMENT_THRESHOLD,
    retry: {
      ...DEFAULT_VAULT_CONFIG.retry,
      maxAttempts: config.MAX_RETRY_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS,
    },
  };
}

export function toBridgeConfig(config: AppConfig): Partial<BridgeConfig> {
  return {
    defaultConfirmationBlocks: config.CONFIRMATION_BLOCKS,
    maxTransferAmount: config.MAX_TRANSFER_AMOUNT,
    minTransferAmount: config.MIN_TRANSFER_AMOUNT,
    maxRetryAttempts: config.MAX_RETRY_ATTEMPTS,
    bridgeFeeBps: config.BRIDGE_FEE_BPS,
    confirmationTimeoutMs: config.CONFIRMATION_TIMEOUT_MS,
  };
}

export function toAllocatorConfig(config: AppConfig): AllocatorConfig {
  return {
    maxStrategyWeightBps: config.MAX_STRATEGY_WEIGHT_BPS,
    maxPositionSizeBps: config.MAX_POSITION_SIZE_BPS,
    minLiquidityUsd: config.MIN_LIQUIDITY_USD,
  };
}

export function toSchedulerConfig(config: AppConfig): SchedulerConfig {
  return {
    intervalMs: config.REBALANCE_INTERVAL_MS,
    driftToleranceBps: config.DRIFT_TOLERANCE_BPS,
    minRebalanceIntervalMs: config.MIN_REBALANCE_INTERVAL_MS,
  };
}

// =============================================================================
// Strategies file
// =============================================================================

export const SandboxStrategySchema = StrategyDefinitionSchema.extend({
  /** Annual yield the sandbox port pays on deployed capital, as a fraction */
  apy: z.number().min(0).max(10).default(0.05),
});

export const StrategiesFileSchema = z.object({
  strategies: z.array(SandboxStrategySchema).min(1),
});

export interface SandboxStrategy {
  readonly definition: StrategyDefinition;
  readonly apy: number;
}

/**
 * Parse a strategies document (already decoded from JSON).
 */
export function parseStrategies(raw: unknown, source = "strategies file"): SandboxStrategy[] {
  const result = StrategiesFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid ${source}:\n  ${issues.join("\n  ")}`, issues);
  }

  const seen = new Set<string>();
  return result.data.strategies.map(({ apy, ...definition }) => {
    if (seen.has(definition.id)) {
      throw new ConfigError(`Invalid ${source}: duplicate strategy id "${definition.id}"`);
    }
    seen.add(definition.id);
    return { definition, apy };
  });
}

export function loadStrategies(path: string): SandboxStrategy[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read strategies file ${path}: ${detail}`);
  }
  return parseStrategies(raw, `strategies file ${path}`);
}
