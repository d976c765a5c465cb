/**
 * @tidewater/bridge — Cross-chain transfer coordination.
 */

// Types
export type {
  TransferState,
  BridgeFailureReason,
  BridgeHandle,
  TransferRequest,
  BridgeTransfer,
  BridgeBackend,
  BridgeConfig,
  BridgeOutcome,
  BridgeStats,
  BridgeErrorCode,
} from "./types.js";
export {
  TRANSFER_STATES,
  DEFAULT_BRIDGE_CONFIG,
  BridgeError,
  BridgeRejectedError,
} from "./types.js";

// Coordinator
export { BridgeCoordinator } from "./coordinator.js";
export type { BridgeCoordinatorOptions, PreparedTransfer } from "./coordinator.js";

// Persistence
export {
  transferKey,
  transferKeyPrefix,
  encodeTransfer,
  decodeTransfer,
  loadTransfers,
} from "./persistence.js";
