/**
 * VaultRegistry — process-wide handle on every running vault.
 *
 * Built once by `init` and passed to the HTTP layer. Vaults share one
 * StateStore and one StrategyCatalog; each gets its own sandbox adapters.
 */

import type { Clock } from "@tidewater/runtime";
import { systemClock } from "@tidewater/runtime";
import type { StateStore } from "@tidewater/store";
import { InMemoryStateStore, JsonlStateStore } from "@tidewater/store";
import { StrategyCatalog } from "@tidewater/strategy";
import type { BridgeBackend } from "@tidewater/bridge";
import type { ExecutionPort } from "@tidewater/vault";
import type { AppConfig, SandboxStrategy } from "../config.js";
import type { Logger } from "../logger.js";
import { SandboxBridgeBackend } from "../sandbox/bridge-backend.js";
import { SandboxExecutionPort } from "../sandbox/execution-port.js";
import { VaultService } from "./vault-service.js";

export class RegistryError extends Error {
  public readonly code = "VAULT_NOT_FOUND" as const;
  public readonly category = "input" as const;
  public readonly transient = false;

  constructor(public readonly vaultId: string) {
    super(`Vault ${vaultId} not found`);
    this.name = "RegistryError";
  }
}

export interface VaultAdapters {
  readonly port: ExecutionPort;
  readonly backend: BridgeBackend;
}

export interface VaultRegistryOptions {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly strategies: readonly SandboxStrategy[];
  /** Default: a JsonlStateStore at DATA_FILE, else in memory */
  readonly store?: StateStore;
  readonly clock?: Clock;
  /** Default: sandbox adapters */
  readonly adapters?: (vaultId: string) => VaultAdapters;
}

export class VaultRegistry {
  private readonly _vaults = new Map<string, VaultService>();

  private constructor(
    readonly store: StateStore,
    readonly catalog: StrategyCatalog,
    private readonly _logger: Logger,
  ) {}

  /**
   * Open the store, register strategies the store does not know yet and
   * build every configured vault.
   */
  static init(options: VaultRegistryOptions): VaultRegistry {
    const { config, logger } = options;
    const clock = options.clock ?? systemClock;
    const store =
      options.store ??
      (config.DATA_FILE !== undefined
        ? new JsonlStateStore({ filePath: config.DATA_FILE })
        : new InMemoryStateStore());

    const catalog = new StrategyCatalog({ store, clock });
    for (const { definition } of options.strategies) {
      if (!catalog.has(definition.id)) {
        catalog.register(definition);
        logger.info({ strategyId: definition.id, chainId: definition.chainId }, "Strategy registered");
      }
    }

    const registry = new VaultRegistry(store, catalog, logger);
    const apy = new Map(options.strategies.map((s) => [s.definition.id, s.apy]));

    for (const id of config.VAULT_IDS) {
      let adapters: VaultAdapters;
      let sandbox: SandboxExecutionPort | undefined;
      if (options.adapters !== undefined) {
        adapters = options.adapters(id);
      } else {
        sandbox = new SandboxExecutionPort({ apy, clock });
        adapters = {
          port: sandbox,
          backend: new SandboxBridgeBackend({
            confirmationsPerPoll: config.SANDBOX_CONFIRMATIONS_PER_POLL,
          }),
        };
      }

      const service = new VaultService({ id, config, catalog, store, clock, logger, ...adapters });
      if (sandbox !== undefined) {
        for (const [strategyId, amount] of Object.entries(service.ledger.snapshot().deployed)) {
          if (apy.has(strategyId)) sandbox.restore(strategyId, amount);
        }
      }
      registry._vaults.set(id, service);
      logger.info({ vaultId: id, status: service.ledger.status }, "Vault opened");
    }

    return registry;
  }

  get(id: string): VaultService | undefined {
    return this._vaults.get(id);
  }

  /** @throws {RegistryError} for unknown ids */
  require(id: string): VaultService {
    const service = this._vaults.get(id);
    if (service === undefined) throw new RegistryError(id);
    return service;
  }

  ids(): readonly string[] {
    return [...this._vaults.keys()];
  }

  list(): readonly VaultService[] {
    return [...this._vaults.values()];
  }

  startAll(): void {
    for (const service of this._vaults.values()) {
      service.start();
    }
  }

  /**
   * Stop every vault service and wait for in-flight work.
   */
  async stopAll(): Promise<void> {
    await Promise.all([...this._vaults.values()].map((s) => s.stop()));
    this._logger.info({ vaults: this._vaults.size }, "All vaults stopped");
  }
}
