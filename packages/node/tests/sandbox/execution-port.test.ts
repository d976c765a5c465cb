/**
 * Tests for the sandbox execution port.
 */

import { describe, it, expect } from "vitest";
import { ManualClock } from "@tidewater/runtime";
import { ExecutionError } from "@tidewater/vault";
import { SandboxExecutionPort } from "../../src/sandbox/execution-port.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const usdc = (amount: string) => ({ amount, currency: "USDC", decimals: 6 });

function port(clock = new ManualClock(0)): SandboxExecutionPort {
  return new SandboxExecutionPort({ apy: new Map([["aave", 0.0365]]), clock });
}

describe("SandboxExecutionPort", () => {
  it("holds deployed principal", async () => {
    const p = port();

    const receipt = await p.deploy("aave", usdc("100"));
    await p.withdraw("aave", usdc("40"));

    expect(receipt).toEqual({
      strategyId: "aave",
      requested: usdc("100"),
      moved: usdc("100"),
      executedAt: "1970-01-01T00:00:00.000Z",
    });
    expect(p.balanceOf("aave")).toBe(60_000_000n);
  });

  it("moves funds once per idempotency key", async () => {
    const p = port();

    await p.deploy("aave", usdc("100"), { idempotencyKey: "move-1" });
    await p.deploy("aave", usdc("100"), { idempotencyKey: "move-1" });

    expect(p.balanceOf("aave")).toBe(100_000_000n);
  });

  it("refuses to withdraw more than the principal", async () => {
    const p = port();
    await p.deploy("aave", usdc("10"));

    const attempt = p.withdraw("aave", usdc("11"));

    await expect(attempt).rejects.toBeInstanceOf(ExecutionError);
    await expect(attempt).rejects.toMatchObject({ transient: false, strategyId: "aave" });
  });

  it("rejects unknown strategies", async () => {
    const p = port();

    await expect(p.deploy("nope", usdc("1"))).rejects.toThrow("Unknown strategy nope");
    await expect(p.harvest("nope")).rejects.toThrow("Unknown strategy nope");
  });

  it("pays simple interest since the last harvest", async () => {
    const clock = new ManualClock(0);
    const p = port(clock);
    await p.deploy("aave", usdc("1000"));

    clock.advance(10 * DAY_MS);
    const first = await p.harvest("aave");
    const again = await p.harvest("aave");

    // 1000 × 3.65% × 10/365
    expect(first.realizedYield).toEqual(usdc("1.000000"));
    expect(again.realizedYield).toEqual(usdc("0.000000"));
  });

  it("replays a keyed harvest instead of paying twice", async () => {
    const clock = new ManualClock(0);
    const p = port(clock);
    await p.deploy("aave", usdc("1000"));
    clock.advance(10 * DAY_MS);

    const first = await p.harvest("aave", { idempotencyKey: "main/harvest-10/aave" });
    const replayed = await p.harvest("aave", { idempotencyKey: "main/harvest-10/aave" });
    const unkeyed = await p.harvest("aave");

    expect(first.realizedYield).toEqual(usdc("1.000000"));
    expect(replayed).toBe(first);
    expect(unkeyed.realizedYield).toEqual(usdc("0.000000"));
  });

  it("harvests nothing before the first deployment", async () => {
    const p = port();

    const report = await p.harvest("aave");

    expect(report.realizedYield).toEqual(usdc("0.000000"));
  });

  it("restores principal after a restart", async () => {
    const p = port();

    p.restore("aave", usdc("250.5"));

    expect(p.balanceOf("aave")).toBe(250_500_000n);
  });
});
