/**
 * Financial Types
 *
 * Core financial primitives for deterministic accounting.
 *
 * Rules:
 * - All amounts are strings at every boundary (API, persistence, events)
 * - Currency is always explicit
 * - Arithmetic happens in bigint fixed-point (see @tidewater/money)
 */

/**
 * Currency or token symbol (e.g., "USDC").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "1000000") */
  readonly amount: string;

  /** Currency symbol or identifier (e.g., "USDC", "DAI") */
  readonly currency: Currency;

  /**
   * Number of decimal places for this currency.
   * USDC = 6, DAI = 18.
   */
  readonly decimals: number;
}

/**
 * Basis points. 10_000 bps = 100%.
 */
export type Bps = number;

export const BPS_DENOMINATOR = 10_000;
