/**
 * @tidewater/vault — Error types.
 */

import type { ErrorCategory } from "@tidewater/types";

export type VaultErrorCode =
  // input
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_SHARES"
  | "DEPOSIT_OUT_OF_RANGE"
  | "UNKNOWN_STRATEGY"
  | "POSITION_NOT_FOUND"
  | "WITHDRAWAL_NOT_FOUND"
  // state
  | "VAULT_HALTED"
  | "INVALID_TRANSITION"
  | "WITHDRAWAL_PENDING"
  | "INSUFFICIENT_LIQUIDITY"
  // consistency
  | "CONSISTENCY_VIOLATION"
  | "CORRUPT_STATE";

const CATEGORY: Readonly<Record<VaultErrorCode, ErrorCategory>> = {
  INVALID_AMOUNT: "input",
  INSUFFICIENT_SHARES: "input",
  DEPOSIT_OUT_OF_RANGE: "input",
  UNKNOWN_STRATEGY: "input",
  POSITION_NOT_FOUND: "input",
  WITHDRAWAL_NOT_FOUND: "input",
  VAULT_HALTED: "state",
  INVALID_TRANSITION: "state",
  WITHDRAWAL_PENDING: "state",
  INSUFFICIENT_LIQUIDITY: "state",
  CONSISTENCY_VIOLATION: "consistency",
  CORRUPT_STATE: "consistency",
};

/** Codes a caller may retry unchanged once the vault has moved on */
const TRANSIENT: ReadonlySet<VaultErrorCode> = new Set(["WITHDRAWAL_PENDING", "INSUFFICIENT_LIQUIDITY"]);

export class VaultError extends Error {
  public readonly category: ErrorCategory;
  public readonly transient: boolean;

  constructor(
    public readonly code: VaultErrorCode,
    message: string,
    public readonly details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "VaultError";
    this.category = CATEGORY[code];
    this.transient = TRANSIENT.has(code);
  }
}

/**
 * Raised by ExecutionPort implementations. `transient` decides whether the
 * ledger retries the call.
 */
export class ExecutionError extends Error {
  public readonly code = "EXECUTION_FAILED" as const;
  public readonly category = "execution" as const;

  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly strategyId?: string,
  ) {
    super(message);
    this.name = "ExecutionError";
  }
}
