/**
 * Shared wiring for vault tests: a manual clock, an in-process execution
 * port and bridge backend, and a catalog with two home-chain strategies
 * and one remote strategy.
 */

import { vi } from "vitest";
import type { DomainEvent, Money } from "@tidewater/types";
import { applyBps, parseAmount, toMoney } from "@tidewater/money";
import { ManualClock, isoTime } from "@tidewater/runtime";
import type { StateStore } from "@tidewater/store";
import { StrategyCatalog } from "@tidewater/strategy";
import type { AllocationPlan, PlanMode, StrategyDefinition } from "@tidewater/strategy";
import { BridgeCoordinator } from "@tidewater/bridge";
import type { BridgeBackend, BridgeConfig, BridgeHandle, BridgeTransfer } from "@tidewater/bridge";
import { VaultLedger } from "../src/vault-ledger.js";
import type { ExecutionOptions, ExecutionReceipt, ExecutionPort, YieldReport } from "../src/ports.js";
import type { VaultConfig } from "../src/types.js";
import { DEFAULT_VAULT_CONFIG } from "../src/types.js";

export const T0 = Date.UTC(2025, 0, 1);
export const DAY_MS = 24 * 60 * 60 * 1000;

export function usdc(amount: string): Money {
  return { amount, currency: "USDC", decimals: 6 };
}

export function definition(id: string, chainId = "base"): StrategyDefinition {
  return {
    id,
    name: `Strategy ${id}`,
    kind: "lending",
    chainId,
    lockup: { kind: "none" },
    liquidityCeiling: usdc("1000000"),
    liquidityUsd: 5_000_000,
    maxAllocationBps: 10_000,
  };
}

export function plan(
  id: string,
  weights: readonly (readonly [string, number])[],
  mode: PlanMode = "normal",
): AllocationPlan {
  const allocated = weights.reduce((sum, [, w]) => sum + w, 0);
  return {
    id,
    issuedAt: "2025-01-01T00:00:00.000Z",
    mode,
    weights: weights.map(([strategyId, weightBps]) => ({
      strategyId,
      weightBps,
      capBps: 10_000,
      score: 1,
    })),
    unallocatedBps: 10_000 - allocated,
  };
}

/**
 * Moves exactly what is asked unless a slippage is configured for the
 * strategy; harvest pays whatever is queued in `yields`.
 */
export class FakePort implements ExecutionPort {
  readonly yields = new Map<string, Money>();
  readonly withdrawSlippageBps = new Map<string, number>();

  constructor(private readonly clock: ManualClock) {}

  readonly deploy = vi.fn(
    (strategyId: string, amount: Money, _options?: ExecutionOptions): Promise<ExecutionReceipt> =>
      Promise.resolve(this.receipt(strategyId, amount, amount)),
  );

  readonly withdraw = vi.fn(
    (strategyId: string, amount: Money, _options?: ExecutionOptions): Promise<ExecutionReceipt> => {
      const requested = parseAmount(amount.amount, amount.decimals);
      const moved = requested - applyBps(requested, this.withdrawSlippageBps.get(strategyId) ?? 0);
      return Promise.resolve(
        this.receipt(strategyId, amount, toMoney(moved, amount.currency, amount.decimals)),
      );
    },
  );

  readonly harvest = vi.fn((strategyId: string, _options?: ExecutionOptions): Promise<YieldReport> => {
    const realizedYield = this.yields.get(strategyId) ?? usdc("0");
    this.yields.delete(strategyId);
    return Promise.resolve({ strategyId, realizedYield, reportedAt: isoTime(this.clock) });
  });

  private receipt(strategyId: string, requested: Money, moved: Money): ExecutionReceipt {
    return { strategyId, requested, moved, executedAt: isoTime(this.clock) };
  }
}

export class FakeBridge implements BridgeBackend {
  confirmations = 0;

  readonly submitTransfer = vi.fn(
    (transfer: BridgeTransfer): Promise<BridgeHandle> => Promise.resolve({ id: `h-${transfer.id}` }),
  );

  readonly getConfirmationCount = vi.fn(
    (_handle: BridgeHandle): Promise<number> => Promise.resolve(this.confirmations),
  );
}

export const BRIDGE_CONFIG: Partial<BridgeConfig> = {
  defaultConfirmationBlocks: 3,
  maxTransferAmount: "1000",
  minTransferAmount: "1",
  maxRetryAttempts: 2,
  retryJitterMs: 0,
  bridgeFeeBps: 30,
};

/**
 * A deferred result for holding a port call open.
 */
export function gate<T>(): { promise: Promise<T>; release: (value: T) => void } {
  let release: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

export interface Harness {
  readonly clock: ManualClock;
  readonly catalog: StrategyCatalog;
  readonly port: FakePort;
  readonly backend: FakeBridge;
  readonly bridge: BridgeCoordinator;
  readonly ledger: VaultLedger;
  readonly events: DomainEvent[];
  /** Another ledger over the same store, catalog and bridge */
  reopen(port?: ExecutionPort): VaultLedger;
}

export function vaultConfig(overrides: Partial<VaultConfig> = {}): VaultConfig {
  return {
    ...DEFAULT_VAULT_CONFIG,
    id: "v1",
    asset: { currency: "USDC", decimals: 6 },
    homeChainId: "base",
    performanceFeeBps: 0,
    withdrawalFeeBps: 0,
    lockupMs: 0,
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
    ...overrides,
  };
}

export function harness(overrides: Partial<VaultConfig> = {}, store?: StateStore): Harness {
  const clock = new ManualClock(T0);
  const catalog = new StrategyCatalog({ clock });
  catalog.register(definition("aave"));
  catalog.register(definition("comp"));
  catalog.register(definition("remote", "arbitrum"));

  const events: DomainEvent[] = [];
  const port = new FakePort(clock);
  const backend = new FakeBridge();
  let transfers = 0;
  const bridge = new BridgeCoordinator({
    backend,
    config: BRIDGE_CONFIG,
    clock,
    namespace: "v1",
    idFactory: () => `t-${String(++transfers)}`,
    random: () => 0,
    onEvent: (e) => events.push(e),
    ...(store !== undefined ? { store } : {}),
  });

  const config = vaultConfig(overrides);
  let ids = 0;
  const build = (p: ExecutionPort): VaultLedger =>
    new VaultLedger({
      config,
      catalog,
      port: p,
      bridge,
      clock,
      onEvent: (e) => events.push(e),
      idFactory: () => `id-${String(++ids)}`,
      sleep: () => Promise.resolve(),
      ...(store !== undefined ? { store } : {}),
    });

  return {
    clock,
    catalog,
    port,
    backend,
    bridge,
    ledger: build(port),
    events,
    reopen: (p = port) => build(p),
  };
}

export function eventTypes(events: readonly DomainEvent[], prefix = "vault."): string[] {
  return events.map((e) => e.type).filter((t) => t.startsWith(prefix));
}
