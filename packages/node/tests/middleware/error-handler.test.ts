/**
 * Error envelope and status mapping.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import pino from "pino";
import { CustodyError } from "@stakegate/custody";
import { createErrorHandler, statusFor } from "../../src/middleware/error-handler.js";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorEnvelope, isErrorCode } from "../../src/types/error.js";
import { createTestApp, jsonRequest, readJson } from "../setup.js";
import type { ErrorBody } from "../setup.js";

describe("statusFor", () => {
  it("maps lifecycle codes", () => {
    expect(statusFor("VALIDATION_FAILED")).toBe(400);
    expect(statusFor("STATE_VIOLATION")).toBe(409);
    expect(statusFor("COOLDOWN_ACTIVE")).toBe(409);
    expect(statusFor("UNAUTHORIZED_ACTOR")).toBe(403);
    expect(statusFor("ROOT_MISMATCH")).toBe(422);
    expect(statusFor("EXTERNAL_CALL_FAILED")).toBe(502);
    expect(statusFor("HANDLE_NOT_FOUND")).toBe(404);
    expect(statusFor("INVALID_HEX")).toBe(400);
  });

  it("falls back to 500", () => {
    expect(statusFor("CONSERVATION_BROKEN")).toBe(500);
    expect(statusFor("SOMETHING_ELSE")).toBe(500);
    expect(statusFor(undefined)).toBe(500);
  });
});

describe("error codes", () => {
  it("knows the codes of every domain package and the HTTP layer", () => {
    expect(isErrorCode("ROOT_MISMATCH")).toBe(true);
    expect(isErrorCode("INVALID_CREDENTIAL_TYPE")).toBe(true);
    expect(isErrorCode("CONCURRENCY_CONFLICT")).toBe(true);
    expect(isErrorCode("INSUFFICIENT_FUNDS")).toBe(true);
    expect(isErrorCode("FORBIDDEN")).toBe(true);
    expect(isErrorCode("SOMETHING_ELSE")).toBe(false);
    expect(isErrorCode("toString")).toBe(false);
  });

  it("omits details unless given", () => {
    expect(createErrorEnvelope("NOT_FOUND", "gone")).toEqual({ error: { code: "NOT_FOUND", message: "gone" } });
    expect(createErrorEnvelope("COOLDOWN_ACTIVE", "wait", { availableAt: "later" })).toEqual({
      error: { code: "COOLDOWN_ACTIVE", message: "wait", details: { availableAt: "later" } },
    });
  });

  it("renders unknown routes as NOT_FOUND", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/nowhere"));

    expect(res.status).toBe(404);
    expect((await readJson<ErrorBody>(res)).error).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /nowhere",
    });
  });
});

describe("createErrorHandler", () => {
  it("keeps the code of a custody invariant failure but hides its message", async () => {
    const app = new Hono<AppEnv>();
    app.onError(createErrorHandler());
    app.get("/drift", () => {
      throw new CustodyError("CONSERVATION_BROKEN", "pending drifted by 1 wei");
    });

    const res = await app.request(jsonRequest("/drift"));
    expect(res.status).toBe(500);
    expect((await readJson<ErrorBody>(res)).error).toEqual({
      code: "CONSERVATION_BROKEN",
      message: "Internal server error",
    });
  });

  it("reports an unknown code as INTERNAL_ERROR", async () => {
    const app = new Hono<AppEnv>();
    app.onError(createErrorHandler());
    app.get("/odd", () => {
      throw Object.assign(new Error("odd"), { code: "ENOENT" });
    });

    const res = await app.request(jsonRequest("/odd"));
    expect(res.status).toBe(500);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("INTERNAL_ERROR");
  });

  it("hides and logs unexpected errors", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "error" }, { write: (line: string) => void lines.push(line) });

    const app = new Hono<AppEnv>();
    app.onError(createErrorHandler(logger));
    app.get("/boom", () => {
      throw new Error("database password leaked here");
    });

    const res = await app.request(jsonRequest("/boom"));
    expect(res.status).toBe(500);
    expect((await readJson<ErrorBody>(res)).error).toEqual({
      code: "INTERNAL_ERROR",
      message: "Internal server error",
    });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({ level: 50, msg: "Unhandled error" });
  });
});
