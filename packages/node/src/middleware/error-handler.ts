/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain error codes (VaultError, BridgeError, CatalogError, ...)
 * to HTTP status codes and echoes their `transient` flag.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isClassifiedError, isTransientError } from "@tidewater/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope, RequestValidationError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Request errors
  VALIDATION_ERROR: 400,
  VAULT_NOT_FOUND: 404,

  // Vault input errors
  INVALID_AMOUNT: 400,
  INSUFFICIENT_SHARES: 422,
  DEPOSIT_OUT_OF_RANGE: 422,
  UNKNOWN_STRATEGY: 404,
  POSITION_NOT_FOUND: 404,
  WITHDRAWAL_NOT_FOUND: 404,

  // Vault state errors
  VAULT_HALTED: 409,
  INVALID_TRANSITION: 409,
  WITHDRAWAL_PENDING: 409,
  INSUFFICIENT_LIQUIDITY: 503,

  // Consistency
  CONSISTENCY_VIOLATION: 409,
  CORRUPT_STATE: 500,

  // Execution
  EXECUTION_FAILED: 502,
  RETRY_EXHAUSTED: 502,

  // Bridge
  AMOUNT_EXCEEDS_MAX: 422,
  AMOUNT_BELOW_MIN: 422,
  SAME_CHAIN: 400,
  TRANSFER_NOT_FOUND: 404,
  BRIDGE_REJECTED: 502,

  // Catalog
  STRATEGY_EXISTS: 409,
  STRATEGY_NOT_FOUND: 404,
  INVALID_STRATEGY: 400,
  INVALID_RETURN: 400,

  // Storage
  WRITE_FAILED: 503,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }
  if (!isClassifiedError(err)) {
    return c.json(
      createErrorEnvelope("INTERNAL_ERROR", "Internal server error", isTransientError(err)),
      500,
    );
  }

  const status = STATUS_MAP[err.code] ?? 500;

  // Don't leak internal details of unmapped failures
  if (status === 500) {
    return c.json(createErrorEnvelope(err.code, "Internal server error", err.transient), 500);
  }

  const details =
    err instanceof RequestValidationError && err.issues.length > 0
      ? { issues: err.issues }
      : detailsOf(err);
  return c.json(createErrorEnvelope(err.code, err.message, err.transient, details), status);
}

function detailsOf(err: Error): Readonly<Record<string, unknown>> | undefined {
  if ("details" in err && typeof err.details === "object" && err.details !== null) {
    return { ...err.details };
  }
  return undefined;
}
