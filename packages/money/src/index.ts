/**
 * @tidewater/money — Deterministic money math.
 *
 * Amounts are decimal strings at every boundary and bigint in arithmetic.
 */

export {
  parseAmount,
  formatAmount,
  toMoney,
  toScaled,
  validateMoney,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  compareMoney,
  isZero,
  isPositive,
  zeroMoney,
  mulDiv,
  applyBps,
  bpsOf,
  sumScaled,
  minScaled,
  maxScaled,
} from "./money-math.js";

export { MoneyError } from "./errors.js";
export type { MoneyErrorCode } from "./errors.js";
