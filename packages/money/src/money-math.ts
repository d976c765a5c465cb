/**
 * @tidewater/money — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally. String amounts are converted
 * to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations on amounts
 * - Currency must match for all binary operations
 * - Division always rounds toward zero (floor for non-negative values),
 *   so the vault never pays out more than it holds
 */

import type { Money } from "@tidewater/types";
import { BPS_DENOMINATOR } from "@tidewater/types";
import { MoneyError } from "./errors.js";

const AMOUNT_FORMAT = /^-?\d+(\.\d+)?$/;
const BPS = BigInt(BPS_DENOMINATOR);

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!AMOUNT_FORMAT.test(trimmed)) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const negative = trimmed.startsWith("-");
  const [intPart = "0", fracPart = ""] = (negative ? trimmed.slice(1) : trimmed).split(".");

  if (fracPart.length > decimals) {
    throw new MoneyError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string with exactly
 * `decimals` fractional digits.
 *
 * 10050n with decimals=2 → "100.50"
 * 33333333n with decimals=6 → "33.333333"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const digits = (negative ? -scaled : scaled).toString().padStart(decimals + 1, "0");
  const result = `${digits.slice(0, digits.length - decimals)}.${digits.slice(digits.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Build a Money value from a scaled amount.
 */
export function toMoney(scaled: bigint, currency: string, decimals: number): Money {
  return { amount: formatAmount(scaled, decimals), currency, decimals };
}

/**
 * Scaled bigint of a Money value.
 */
export function toScaled(money: Money): bigint {
  return parseAmount(money.amount, money.decimals);
}

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 */
export function validateMoney(money: Money): void {
  if (money.currency.trim() === "") {
    throw new MoneyError("INVALID_MONEY", "Money currency must be a non-empty string");
  }

  if (!Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new MoneyError(
      "INVALID_MONEY",
      `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`,
    );
  }

  parseAmount(money.amount, money.decimals);
}

export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency || a.decimals !== b.decimals) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Cannot operate on ${a.currency}/${String(a.decimals)} and ${b.currency}/${String(b.decimals)}`,
    );
  }
}

// ─── Money arithmetic ────────────────────────────────────────────────────

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return toMoney(toScaled(a) + toScaled(b), a.currency, a.decimals);
}

export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return toMoney(toScaled(a) - toScaled(b), a.currency, a.decimals);
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = toScaled(a);
  const vb = toScaled(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function isZero(money: Money): boolean {
  return toScaled(money) === 0n;
}

export function isPositive(money: Money): boolean {
  return toScaled(money) > 0n;
}

export function zeroMoney(currency: string, decimals: number): Money {
  return toMoney(0n, currency, decimals);
}

// ─── Scaled helpers ──────────────────────────────────────────────────────

/**
 * floor(value * numerator / denominator) for non-negative operands.
 */
export function mulDiv(value: bigint, numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new MoneyError("DIVISION_BY_ZERO", "mulDiv denominator is zero");
  }
  return (value * numerator) / denominator;
}

/**
 * Portion of `value` expressed in basis points, rounded down.
 *
 * applyBps(75_000000n, 500) → 3_750000n
 */
export function applyBps(value: bigint, bps: number): bigint {
  return mulDiv(value, BigInt(bps), BPS);
}

/**
 * Share of `part` in `whole` in basis points, rounded down. 0 when whole is 0.
 */
export function bpsOf(part: bigint, whole: bigint): number {
  if (whole === 0n) return 0;
  return Number(mulDiv(part, BPS, whole));
}

export function sumScaled(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const v of values) total += v;
  return total;
}

export function minScaled(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxScaled(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}
