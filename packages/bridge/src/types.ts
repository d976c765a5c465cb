/**
 * @tidewater/bridge — Core types.
 *
 * A BridgeTransfer moves an amount from one chain to another through an
 * external bridge backend. Its lifecycle:
 *
 *   initiated → submitted → pending_confirmation → confirmed
 *                   ↓               ↓
 *                 failed ←──────────┘   (rejection or confirmation timeout)
 *                   ↓
 *        submitted (retry, with backoff) | refunded (administrative)
 */

import type { ChainId, Money } from "@tidewater/types";

export type TransferState =
  | "initiated"
  | "submitted"
  | "pending_confirmation"
  | "confirmed"
  | "failed"
  | "refunded";

export const TRANSFER_STATES: readonly TransferState[] = [
  "initiated",
  "submitted",
  "pending_confirmation",
  "confirmed",
  "failed",
  "refunded",
];

export type BridgeFailureReason =
  | "CAPACITY_OR_VALIDATION_REJECTED"
  | "SUBMISSION_FAILED"
  | "CONFIRMATION_TIMEOUT";

/**
 * Opaque reference returned by a backend on acceptance.
 */
export interface BridgeHandle {
  readonly id: string;
  readonly txHash?: string;
}

export interface TransferRequest {
  readonly sourceChainId: ChainId;
  readonly destinationChainId: ChainId;
  readonly amount: Money;
  /** Free-form tags for the initiator (purpose, strategy, withdrawal id) */
  readonly memo?: Readonly<Record<string, string>>;
}

export interface BridgeTransfer {
  readonly id: string;
  readonly sourceChainId: ChainId;
  readonly destinationChainId: ChainId;
  readonly amount: Money;

  /** Bridge fee withheld from the delivered amount */
  readonly fee: Money;

  readonly state: TransferState;
  readonly requiredConfirmations: number;
  readonly confirmations: number;

  /** Resubmissions made after failures */
  readonly retryCount: number;

  /** No further automatic transitions will happen */
  readonly terminal: boolean;

  readonly createdAt: string;
  readonly lastAttemptAt?: string;
  readonly submittedAt?: string;
  readonly confirmedAt?: string;
  readonly nextAttemptAt?: string;

  readonly failureReason?: BridgeFailureReason;
  readonly failureDetail?: string;
  readonly handle?: BridgeHandle;
  readonly memo: Readonly<Record<string, string>>;
}

/**
 * Capability interface implemented per concrete bridge.
 */
export interface BridgeBackend {
  /**
   * Hand the transfer to the bridge. Reject with BridgeRejectedError for
   * capacity or validation refusals.
   */
  submitTransfer(transfer: BridgeTransfer): Promise<BridgeHandle>;

  getConfirmationCount(handle: BridgeHandle): Promise<number>;
}

export interface BridgeConfig {
  /** Required confirmations per destination chain */
  readonly confirmationBlocks: Readonly<Record<ChainId, number>>;
  /** Used for chains missing from `confirmationBlocks` */
  readonly defaultConfirmationBlocks: number;
  readonly maxTransferAmount: string;
  readonly minTransferAmount: string;
  readonly maxRetryAttempts: number;
  readonly retryBaseDelayMs: number;
  readonly retryMaxDelayMs: number;
  readonly retryJitterMs: number;
  /** Submission-to-confirmation window before a transfer is forced to failed */
  readonly confirmationTimeoutMs: number;
  readonly bridgeFeeBps: number;
}

export const DEFAULT_BRIDGE_CONFIG: BridgeConfig = {
  confirmationBlocks: {},
  defaultConfirmationBlocks: 12,
  maxTransferAmount: "1000000",
  minTransferAmount: "0",
  maxRetryAttempts: 3,
  retryBaseDelayMs: 5_000,
  retryMaxDelayMs: 300_000,
  retryJitterMs: 1_000,
  confirmationTimeoutMs: 3_600_000,
  bridgeFeeBps: 30,
};

export type BridgeOutcome =
  | { readonly kind: "confirmed"; readonly transfer: BridgeTransfer; readonly delivered: Money }
  | { readonly kind: "failed"; readonly transfer: BridgeTransfer }
  | { readonly kind: "refunded"; readonly transfer: BridgeTransfer };

export interface BridgeStats {
  readonly byState: Readonly<Record<TransferState, number>>;
  /** Mean submitted → confirmed time; null before the first confirmation */
  readonly meanConfirmationLatencyMs: number | null;
  readonly totalRetries: number;
  readonly terminalFailures: number;
}

// =============================================================================
// Errors
// =============================================================================

export type BridgeErrorCode =
  | "INVALID_AMOUNT"
  | "AMOUNT_EXCEEDS_MAX"
  | "AMOUNT_BELOW_MIN"
  | "SAME_CHAIN"
  | "TRANSFER_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "CORRUPT_STATE";

export class BridgeError extends Error {
  public readonly category = "bridge" as const;
  public readonly transient = false;

  constructor(
    public readonly code: BridgeErrorCode,
    message: string,
    public readonly transferId?: string,
  ) {
    super(message);
    this.name = "BridgeError";
  }
}

/**
 * Raised by a backend that refuses a transfer (capacity, limits, validation).
 */
export class BridgeRejectedError extends Error {
  public readonly code = "BRIDGE_REJECTED" as const;
  public readonly category = "bridge" as const;
  public readonly transient = true;

  constructor(message: string) {
    super(message);
    this.name = "BridgeRejectedError";
  }
}
