/**
 * Chain Types
 *
 * Execution environments that hold vault capital.
 * Chain IDs follow CAIP-2 where applicable ("eip155:1", "eip155:42161").
 */

/**
 * Chain identifier (e.g., "eip155:1" for Ethereum mainnet).
 */
export type ChainId = string;

/**
 * Reference to a specific chain.
 */
export interface ChainRef {
  /** Chain identifier */
  readonly chainId: ChainId;

  /** Human-readable chain name */
  readonly name: string;

  /** Blocks the bridge waits for before treating a transfer as final */
  readonly confirmationBlocks: number;
}
