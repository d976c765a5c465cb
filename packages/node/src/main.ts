/**
 * @tidewater/node — Entry point.
 *
 * Loads config and strategies, opens every vault, starts the HTTP server
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, loadStrategies } from "./config.js";
import { createLogger } from "./logger.js";
import { createApp } from "./app.js";
import { VaultRegistry } from "./services/vault-registry.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  const strategies = loadStrategies(config.STRATEGIES_FILE);
  const registry = VaultRegistry.init({ config, logger, strategies });

  const { app } = createApp({
    registry,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
  });

  registry.startAll();

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, vaults: registry.ids() },
    "Tidewater node started",
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await registry.stopAll();
    logger.info("Shutdown complete");
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.fatal({ err }, "Shutdown failed");
        process.exit(1);
      },
    );
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // The configured logger may not exist yet
  pino().fatal({ err }, "Fatal startup error");
  process.exitCode = 1;
});
