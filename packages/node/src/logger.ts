/**
 * @tidewater/node — Logging.
 *
 * pino everywhere in the node; pretty output in development. Domain packages
 * never log: their DomainEvents reach pino through `eventLogger`.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { DomainEvent, EventSink } from "@tidewater/types";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/**
 * Alerts from the ledger's consistency checks and shutdowns are errors;
 * other alerts are warnings.
 */
function levelOf(event: DomainEvent): "info" | "warn" | "error" {
  switch (event.severity) {
    case "info":
      return "info";
    case "warning":
      return "warn";
    case "alert":
      return event.type === "vault.consistency_violation" ||
        event.type === "vault.emergency_shutdown"
        ? "error"
        : "warn";
  }
}

/**
 * An EventSink writing each domain event as one structured log line.
 */
export function eventLogger(logger: Logger): EventSink {
  return (event) => {
    logger[levelOf(event)](
      {
        event: event.type,
        source: event.metadata.source,
        correlationId: event.metadata.correlationId,
        ...event.payload,
      },
      event.type,
    );
  };
}
