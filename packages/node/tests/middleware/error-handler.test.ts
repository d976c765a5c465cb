/**
 * Tests for the error handler.
 *
 * Domain errors keep their code, get the mapped status and echo their
 * `transient` flag; everything else becomes a 500 without details.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { BridgeError, BridgeRejectedError } from "@tidewater/bridge";
import { RetryExhaustedError } from "@tidewater/runtime";
import { StoreError } from "@tidewater/store";
import { VaultError } from "@tidewater/vault";
import { handleError } from "../../src/middleware/error-handler.js";
import type { AppEnv } from "../../src/types/api-contract.js";
import { RequestValidationError } from "../../src/types/error.js";

function throwing(err: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

async function render(err: Error): Promise<{ status: number; body: unknown }> {
  const res = await throwing(err).request("/boom");
  return { status: res.status, body: await res.json() };
}

describe("handleError", () => {
  it("maps vault input errors to 4xx with their details", async () => {
    const result = await render(
      new VaultError("DEPOSIT_OUT_OF_RANGE", "Deposit of 5 outside [10, 20]", { min: "10", max: "20" }),
    );

    expect(result).toEqual({
      status: 422,
      body: {
        error: {
          code: "DEPOSIT_OUT_OF_RANGE",
          message: "Deposit of 5 outside [10, 20]",
          transient: false,
          details: { min: "10", max: "20" },
        },
      },
    });
  });

  it("echoes the transient flag", async () => {
    const result = await render(new VaultError("INSUFFICIENT_LIQUIDITY", "Not enough free cash"));

    expect(result.status).toBe(503);
    expect(result.body).toEqual({
      error: { code: "INSUFFICIENT_LIQUIDITY", message: "Not enough free cash", transient: true },
    });
  });

  it("lists validation issues", async () => {
    const result = await render(
      new RequestValidationError("Request body validation failed", [{ path: "owner", message: "Required" }]),
    );

    expect(result).toEqual({
      status: 400,
      body: {
        error: {
          code: "VALIDATION_ERROR",
          message: "Request body validation failed",
          transient: false,
          details: { issues: [{ path: "owner", message: "Required" }] },
        },
      },
    });
  });

  it("maps bridge and execution failures to 502", async () => {
    expect((await render(new BridgeRejectedError("over capacity"))).status).toBe(502);
    expect((await render(new RetryExhaustedError(3, new Error("timeout")))).status).toBe(502);
    expect((await render(new BridgeError("SAME_CHAIN", "Source and destination are both base"))).status).toBe(400);
  });

  it("maps a failed store write to a transient 503", async () => {
    const result = await render(new StoreError("WRITE_FAILED", "disk full"));

    expect(result).toEqual({
      status: 503,
      body: { error: { code: "WRITE_FAILED", message: "disk full", transient: true } },
    });
  });

  it("hides the message of unmapped domain errors", async () => {
    const result = await render(new VaultError("CORRUPT_STATE", "position p-1 points at missing withdrawal"));

    expect(result).toEqual({
      status: 500,
      body: { error: { code: "CORRUPT_STATE", message: "Internal server error", transient: false } },
    });
  });

  it("renders unclassified errors as transient internal errors", async () => {
    const result = await render(new Error("socket hang up"));

    expect(result).toEqual({
      status: 500,
      body: { error: { code: "INTERNAL_ERROR", message: "Internal server error", transient: true } },
    });
  });

  it("passes HTTPException responses through", async () => {
    const res = await throwing(new HTTPException(418, { message: "teapot" })).request("/boom");

    expect(res.status).toBe(418);
    expect(await res.text()).toBe("teapot");
  });
});
