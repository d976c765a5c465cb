/**
 * SandboxBridgeBackend — simulated bridge.
 *
 * Accepts every transfer up to an optional capacity and reports a growing
 * confirmation count on each poll.
 */

import { createHash } from "node:crypto";
import { parseAmount } from "@tidewater/money";
import type { BridgeBackend, BridgeHandle, BridgeTransfer } from "@tidewater/bridge";
import { BridgeRejectedError } from "@tidewater/bridge";

export interface SandboxBridgeBackendOptions {
  /** Confirmations added per `getConfirmationCount` call. Default: 1 */
  readonly confirmationsPerPoll?: number;
  /** Largest single transfer accepted, as a decimal string */
  readonly capacity?: string;
}

export class SandboxBridgeBackend implements BridgeBackend {
  private readonly _step: number;
  private readonly _capacity: string | undefined;
  private readonly _confirmations = new Map<string, number>();

  constructor(options: SandboxBridgeBackendOptions = {}) {
    this._step = options.confirmationsPerPoll ?? 1;
    this._capacity = options.capacity;
  }

  submitTransfer(transfer: BridgeTransfer): Promise<BridgeHandle> {
    if (this._capacity !== undefined) {
      const amount = parseAmount(transfer.amount.amount, transfer.amount.decimals);
      if (amount > parseAmount(this._capacity, transfer.amount.decimals)) {
        return Promise.reject(
          new BridgeRejectedError(`Transfer ${transfer.id} exceeds sandbox capacity ${this._capacity}`),
        );
      }
    }

    const txHash = createHash("sha256")
      .update(`${transfer.id}:${String(transfer.retryCount)}`)
      .digest("hex");
    const handle: BridgeHandle = { id: `sandbox-${transfer.id}-${String(transfer.retryCount)}`, txHash };
    this._confirmations.set(handle.id, 0);
    return Promise.resolve(handle);
  }

  getConfirmationCount(handle: BridgeHandle): Promise<number> {
    const next = (this._confirmations.get(handle.id) ?? 0) + this._step;
    this._confirmations.set(handle.id, next);
    return Promise.resolve(next);
  }
}
