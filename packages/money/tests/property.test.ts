/**
 * Property-Based Tests for @tidewater/money
 *
 * 1. parse → format → parse is the identity
 * 2. mulDiv never rounds up
 * 3. applyBps never exceeds the input and is monotone in bps
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { parseAmount, formatAmount, mulDiv, applyBps } from "../src/money-math.js";

const arbDecimals = fc.integer({ min: 0, max: 18 });
const arbScaled = fc.bigInt({ min: -(10n ** 30n), max: 10n ** 30n });
const arbNonNegative = fc.bigInt({ min: 0n, max: 10n ** 30n });
const arbPositive = fc.bigInt({ min: 1n, max: 10n ** 30n });
const arbBps = fc.integer({ min: 0, max: 10_000 });

describe("amount scaling", () => {
  it("format then parse returns the scaled value", () => {
    fc.assert(
      fc.property(arbScaled, arbDecimals, (scaled, decimals) => {
        expect(parseAmount(formatAmount(scaled, decimals), decimals)).toBe(scaled);
      }),
    );
  });
});

describe("mulDiv", () => {
  it("never rounds up", () => {
    fc.assert(
      fc.property(arbNonNegative, arbNonNegative, arbPositive, (value, num, den) => {
        const result = mulDiv(value, num, den);
        expect(result * den <= value * num).toBe(true);
        expect((result + 1n) * den > value * num).toBe(true);
      }),
    );
  });
});

describe("applyBps", () => {
  it("stays within the input and grows with bps", () => {
    fc.assert(
      fc.property(arbNonNegative, arbBps, arbBps, (value, a, b) => {
        const lo = Math.min(a, b);
        const hi = Math.max(a, b);
        expect(applyBps(value, hi) <= value).toBe(true);
        expect(applyBps(value, lo) <= applyBps(value, hi)).toBe(true);
      }),
    );
  });
});
