/**
 * HTTP round trips through the deposit registry.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  confirmedDeposit,
  createTestApp,
  DEPOSITOR,
  jsonRequest,
  OPERATOR,
  OTHER,
  post,
  PUBKEY_A,
  readJson,
  ROOT_A,
  SIGNATURE_A,
  STAKE,
  T0,
} from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";

interface RecordBody {
  readonly data: {
    readonly id: number;
    readonly state: string;
    readonly owner: string;
    readonly withdrawalAddress: string;
    readonly withdrawalCredentials: string;
    readonly amount: string;
    readonly createdAt: string;
    readonly pubkey?: string;
    readonly committedRoot?: string;
    readonly validatorId?: number;
  };
}

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

// =============================================================================
// POST /api/v1/deposits
// =============================================================================

describe("POST /api/v1/deposits", () => {
  it("opens a record for one stake unit and returns 201", async () => {
    const res = await instance.app.request(post("/api/v1/deposits", DEPOSITOR, { amount: STAKE }));

    expect(res.status).toBe(201);
    expect(await readJson<RecordBody>(res)).toEqual({
      data: {
        id: 1,
        state: "requested",
        owner: DEPOSITOR,
        withdrawalAddress: DEPOSITOR,
        withdrawalCredentials: "0x01" + "00".repeat(11) + "12".repeat(20),
        amount: STAKE,
        createdAt: T0,
      },
    });
  });

  it("uses a separate withdrawal address when given", async () => {
    const res = await instance.app.request(
      post("/api/v1/deposits", DEPOSITOR, { amount: STAKE, withdrawalAddress: OTHER }),
    );
    const { data } = await readJson<RecordBody>(res);
    expect(data.owner).toBe(DEPOSITOR);
    expect(data.withdrawalAddress).toBe(OTHER);
  });

  it("rejects anything but exactly 32 ETH", async () => {
    const res = await instance.app.request(post("/api/v1/deposits", DEPOSITOR, { amount: "1" }));

    expect(res.status).toBe(400);
    const body = await readJson<ErrorBody>(res);
    expect(body.error.code).toBe("INVALID_AMOUNT");
    expect(body.error.details).toEqual({ field: "amount" });
  });

  it("rejects a non-decimal amount at the schema", async () => {
    const res = await instance.app.request(post("/api/v1/deposits", DEPOSITOR, { amount: "32e18" }));

    expect(res.status).toBe(400);
    const body = await readJson<ErrorBody>(res);
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details).toEqual({
      issues: [{ path: "amount", message: "Expected a decimal amount in wei" }],
    });
  });

  it("requires a caller", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/deposits", "POST", { amount: STAKE }));

    expect(res.status).toBe(401);
    const body = await readJson<ErrorBody>(res);
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "X-Actor header required" });
  });
});

// =============================================================================
// Full lifecycle
// =============================================================================

describe("deposit lifecycle", () => {
  it("assigns, confirms and finalizes", async () => {
    const { app } = instance;
    await app.request(post("/api/v1/deposits", DEPOSITOR, { amount: STAKE }));

    const assigned = await app.request(
      post("/api/v1/deposits/1/assign", OPERATOR, { pubkey: PUBKEY_A, signature: SIGNATURE_A }),
    );
    expect(assigned.status).toBe(200);
    expect((await readJson<RecordBody>(assigned)).data).toMatchObject({
      state: "assigned",
      pubkey: PUBKEY_A,
    });

    const confirmed = await app.request(
      post("/api/v1/deposits/1/confirm", DEPOSITOR, { depositDataRoot: ROOT_A }),
    );
    expect((await readJson<RecordBody>(confirmed)).data).toMatchObject({
      state: "confirmed",
      committedRoot: ROOT_A,
    });

    const finalized = await app.request(post("/api/v1/deposits/1/finalize", OPERATOR));
    expect(finalized.status).toBe(200);
    expect((await readJson<RecordBody>(finalized)).data).toMatchObject({
      state: "finalized",
      validatorId: 1,
    });

    expect(instance.service.sink.calls).toHaveLength(1);
    expect(instance.service.sink.calls[0]?.depositDataRoot).toBe(ROOT_A);
  });

  it("reports custody after finalize", async () => {
    const id = await confirmedDeposit(instance);
    await instance.app.request(post(`/api/v1/deposits/${String(id)}/finalize`, OPERATOR));

    const res = await instance.app.request(jsonRequest("/api/v1/custody"));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        balances: {
          pending: "0",
          committed: STAKE,
          exited: "0",
          received: STAKE,
          paidOut: "0",
          sentToSink: STAKE,
          returnedFromSink: "0",
        },
        held: "0",
        conserved: true,
        reconciliation: { matched: true, expected: "0", actual: "0", difference: "0" },
      },
    });
  });

  it("only lets an operator assign", async () => {
    await instance.app.request(post("/api/v1/deposits", DEPOSITOR, { amount: STAKE }));
    const res = await instance.app.request(
      post("/api/v1/deposits/1/assign", DEPOSITOR, { pubkey: PUBKEY_A, signature: SIGNATURE_A }),
    );

    expect(res.status).toBe(403);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("UNAUTHORIZED_ACTOR");
  });

  it("refuses a root that does not match the stored credentials", async () => {
    const { app } = instance;
    await app.request(post("/api/v1/deposits", DEPOSITOR, { amount: STAKE }));
    await app.request(
      post("/api/v1/deposits/1/assign", OPERATOR, { pubkey: PUBKEY_A, signature: SIGNATURE_A }),
    );

    const wrong = "0x" + "00".repeat(32);
    const res = await app.request(
      post("/api/v1/deposits/1/confirm", DEPOSITOR, { depositDataRoot: wrong }),
    );

    expect(res.status).toBe(422);
    const body = await readJson<ErrorBody>(res);
    expect(body.error.code).toBe("ROOT_MISMATCH");
    expect(body.error.details).toEqual({ expected: ROOT_A, actual: wrong });
  });

  it("refuses to skip a step", async () => {
    await instance.app.request(post("/api/v1/deposits", DEPOSITOR, { amount: STAKE }));
    const res = await instance.app.request(post("/api/v1/deposits/1/finalize", OPERATOR));

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: {
        code: "STATE_VIOLATION",
        message: 'Cannot finalize a deposit in state "requested"; requires "confirmed"',
        details: { required: ["confirmed"], actual: "requested" },
      },
    });
  });

  it("rolls back when the deposit contract call fails", async () => {
    const id = await confirmedDeposit(instance);
    instance.service.sink.failNext();

    const res = await instance.app.request(post(`/api/v1/deposits/${String(id)}/finalize`, OPERATOR));
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: {
        code: "EXTERNAL_CALL_FAILED",
        message: "Deposit contract call for deposit-1 reported failure",
        details: { target: "deposit-sink" },
      },
    });

    const record = await instance.app.request(jsonRequest(`/api/v1/deposits/${String(id)}`));
    expect((await readJson<RecordBody>(record)).data.state).toBe("confirmed");
    expect(instance.service.validators.list()).toEqual([]);
  });
});

// =============================================================================
// Cancellation
// =============================================================================

describe("cancellation", () => {
  it("reports the cooldown and refuses to cancel inside it", async () => {
    const id = await confirmedDeposit(instance);

    const decision = await instance.app.request(
      jsonRequest(`/api/v1/deposits/${String(id)}/cancellation`),
    );
    expect(await decision.json()).toEqual({
      data: { allowed: false, reason: "cooldown", availableAt: "2024-03-08T12:00:00.000Z" },
    });

    const res = await instance.app.request(post(`/api/v1/deposits/${String(id)}/cancel`, DEPOSITOR));
    expect(res.status).toBe(409);
    const body = await readJson<ErrorBody>(res);
    expect(body.error.code).toBe("COOLDOWN_ACTIVE");
    expect(body.error.details).toEqual({ availableAt: "2024-03-08T12:00:00.000Z" });
  });

  it("refunds and deletes the record once the cooldown has passed", async () => {
    const id = await confirmedDeposit(instance);
    instance.clock.advance(7 * 24 * 60 * 60);

    const res = await instance.app.request(post(`/api/v1/deposits/${String(id)}/cancel`, DEPOSITOR));
    expect(res.status).toBe(200);
    expect((await readJson<RecordBody>(res)).data.state).toBe("cancelled");

    expect(instance.service.transfer.totalSentTo(DEPOSITOR)).toBe(32n * 10n ** 18n);

    const gone = await instance.app.request(jsonRequest(`/api/v1/deposits/${String(id)}`));
    expect(gone.status).toBe(404);
    expect((await readJson<ErrorBody>(gone)).error).toEqual({
      code: "RECORD_NOT_FOUND",
      message: "Deposit 1 does not exist",
    });
  });

  it("cancels an open record at once", async () => {
    await instance.app.request(post("/api/v1/deposits", DEPOSITOR, { amount: STAKE }));
    const res = await instance.app.request(post("/api/v1/deposits/1/cancel", DEPOSITOR));
    expect(res.status).toBe(200);
  });
});

// =============================================================================
// Reads and handles
// =============================================================================

describe("reads", () => {
  it("lists records by state with pagination", async () => {
    for (let i = 0; i < 3; i++) {
      await instance.app.request(post("/api/v1/deposits", DEPOSITOR, { amount: STAKE }));
    }
    await instance.app.request(
      post("/api/v1/deposits/2/assign", OPERATOR, { pubkey: PUBKEY_A, signature: SIGNATURE_A }),
    );

    const requested = await instance.app.request(jsonRequest("/api/v1/deposits?state=requested"));
    const body = await readJson<{ data: { id: number }[]; pagination: { hasMore: boolean } }>(
      requested,
    );
    expect(body.data.map((r) => r.id)).toEqual([1, 3]);
    expect(body.pagination.hasMore).toBe(false);

    const page = await instance.app.request(jsonRequest("/api/v1/deposits?limit=2"));
    const first = await readJson<{
      data: { id: number }[];
      pagination: { cursor: string | null; hasMore: boolean };
    }>(page);
    expect(first.data.map((r) => r.id)).toEqual([1, 2]);
    expect(first.pagination.hasMore).toBe(true);

    const next = await instance.app.request(
      jsonRequest(`/api/v1/deposits?limit=2&cursor=${first.pagination.cursor ?? ""}`),
    );
    expect((await readJson<{ data: { id: number }[] }>(next)).data.map((r) => r.id)).toEqual([3]);
  });

  it("rejects an unknown state filter", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/deposits?state=cancelled"));
    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("VALIDATION_FAILED");
  });

  it("rejects a malformed id", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/deposits/abc"));
    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error).toEqual({
      code: "VALIDATION_FAILED",
      message: 'Invalid id "abc"',
      details: { field: "id" },
    });
  });

  it("transfers the handle of a finalized record only", async () => {
    const id = await confirmedDeposit(instance);

    const early = await instance.app.request(
      post(`/api/v1/deposits/${String(id)}/transfer`, DEPOSITOR, { to: OTHER }),
    );
    expect(early.status).toBe(409);
    expect((await readJson<ErrorBody>(early)).error.code).toBe("HANDLE_NOT_TRANSFERABLE");

    await instance.app.request(post(`/api/v1/deposits/${String(id)}/finalize`, OPERATOR));
    const res = await instance.app.request(
      post(`/api/v1/deposits/${String(id)}/transfer`, DEPOSITOR, { to: OTHER }),
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { id, owner: OTHER, locked: false } });
  });
});
