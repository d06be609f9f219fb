/**
 * Async vault routes.
 *
 * Deposit direction:
 * POST /api/v1/vault/deposits                 Request (pays one stake unit)
 * POST /api/v1/vault/deposits/:id/assign      Operator attaches key + signature
 * POST /api/v1/vault/deposits/:id/process     Operator funds the validator
 * POST /api/v1/vault/deposits/:id/claim       Controller mints shares
 * POST /api/v1/vault/deposits/:id/cancel      Refund (processing: after the cooldown)
 *
 * Redemption direction:
 * POST /api/v1/vault/redeems                  Request against a validator
 * POST /api/v1/vault/redeems/:id/acknowledge
 * POST /api/v1/vault/redeems/:id/process      Validator exited ({exitEpoch})
 * POST /api/v1/vault/redeems/:id/claim        Pay the owner
 * POST /api/v1/vault/redeems/:id/cancel
 *
 * Reads:
 * GET  /api/v1/vault/requests                 ?kind=&state=
 * GET  /api/v1/vault/requests/:id
 * GET  /api/v1/vault/shares/:address
 */

import { Hono } from "hono";
import { parseWei } from "@stakegate/custody";
import { ValidationError } from "@stakegate/lifecycle";
import { normalizeAddress } from "@stakegate/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  AssignDepositSchema,
  ListRequestsQuerySchema,
  ProcessRedeemSchema,
  ProcessVaultDepositSchema,
  RequestRedeemSchema,
  RequestVaultDepositSchema,
  toExitRequestDto,
} from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { readBody, validateBody } from "../middleware/validate.js";
import { actor, idParam, parseQuery } from "./params.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Deposit direction ───────────────────────────────────────────

  routes.post("/deposits", validateBody(RequestVaultDepositSchema), (c) => {
    const body = readBody(c, RequestVaultDepositSchema);
    const request = c.get("service").requestVaultDeposit(actor(c), {
      amount: parseWei(body.amount),
      ...(body.controller !== undefined ? { controller: body.controller } : {}),
    });
    return c.json({ data: toExitRequestDto(request) }, 201);
  });

  routes.post("/deposits/:id/assign", validateBody(AssignDepositSchema), (c) => {
    const body = readBody(c, AssignDepositSchema);
    const request = c.get("service").assignVaultDeposit(actor(c), idParam(c), body);
    return c.json({ data: toExitRequestDto(request) });
  });

  routes.post("/deposits/:id/process", validateBody(ProcessVaultDepositSchema), async (c) => {
    const { depositDataRoot } = readBody(c, ProcessVaultDepositSchema);
    const request = await c
      .get("service")
      .processVaultDeposit(actor(c), idParam(c), depositDataRoot);
    return c.json({ data: toExitRequestDto(request) });
  });

  routes.post("/deposits/:id/claim", (c) => {
    const request = c.get("service").claimVaultDeposit(actor(c), idParam(c));
    return c.json({ data: toExitRequestDto(request) });
  });

  routes.post("/deposits/:id/cancel", async (c) => {
    const request = await c.get("service").cancelVaultDeposit(actor(c), idParam(c));
    return c.json({ data: toExitRequestDto(request) });
  });

  // ─── Redemption direction ────────────────────────────────────────

  routes.post("/redeems", validateBody(RequestRedeemSchema), (c) => {
    const body = readBody(c, RequestRedeemSchema);
    const request = c.get("service").requestRedeem(actor(c), {
      validatorId: body.validatorId,
      ...(body.controller !== undefined ? { controller: body.controller } : {}),
      ...(body.owner !== undefined ? { owner: body.owner } : {}),
    });
    return c.json({ data: toExitRequestDto(request) }, 201);
  });

  routes.post("/redeems/:id/acknowledge", (c) => {
    const request = c.get("service").acknowledgeRedeem(actor(c), idParam(c));
    return c.json({ data: toExitRequestDto(request) });
  });

  routes.post("/redeems/:id/process", validateBody(ProcessRedeemSchema), (c) => {
    const { exitEpoch } = readBody(c, ProcessRedeemSchema);
    const request = c.get("service").processRedeem(actor(c), idParam(c), exitEpoch);
    return c.json({ data: toExitRequestDto(request) });
  });

  routes.post("/redeems/:id/claim", async (c) => {
    const request = await c.get("service").claimRedeem(actor(c), idParam(c));
    return c.json({ data: toExitRequestDto(request) });
  });

  routes.post("/redeems/:id/cancel", (c) => {
    const request = c.get("service").cancelRedeem(actor(c), idParam(c));
    return c.json({ data: toExitRequestDto(request) });
  });

  // ─── Reads ───────────────────────────────────────────────────────

  routes.get("/requests", (c) => {
    const query = parseQuery(c, ListRequestsQuerySchema);
    const requests = c
      .get("service")
      .listRequests({
        ...(query.kind !== undefined ? { kind: query.kind } : {}),
        ...(query.state !== undefined ? { state: query.state } : {}),
      })
      .map(toExitRequestDto);
    return c.json(
      paginate(requests, { cursor: query.cursor, limit: query.limit }, (r) => r.id, "id"),
    );
  });

  routes.get("/requests/:id", (c) => {
    return c.json({ data: toExitRequestDto(c.get("service").getRequest(idParam(c))) });
  });

  routes.get("/shares/:address", (c) => {
    const raw = c.req.param("address");
    const address = normalizeAddress(raw);
    if (address === undefined) {
      throw new ValidationError("INVALID_ADDRESS", `Invalid address "${raw}"`, "address");
    }
    const report = c.get("service").shares(address);
    return c.json({
      data: {
        address: report.address,
        shares: report.shares.toString(),
        locked: report.locked.toString(),
      },
    });
  });

  return routes;
}
