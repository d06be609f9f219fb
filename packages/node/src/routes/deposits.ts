/**
 * Deposit registry routes.
 *
 * POST /api/v1/deposits                   Open a record (one stake unit)
 * GET  /api/v1/deposits                   List records (?state=)
 * GET  /api/v1/deposits/:id               Read a record
 * GET  /api/v1/deposits/:id/cancellation  Cancellation policy decision
 * POST /api/v1/deposits/:id/assign        Operator attaches key + signature
 * POST /api/v1/deposits/:id/confirm       Holder approves the deposit data root
 * POST /api/v1/deposits/:id/finalize      Operator sends to the deposit contract
 * POST /api/v1/deposits/:id/cancel        Refund and delete the record
 * POST /api/v1/deposits/:id/transfer      Pass a terminal record's handle to another owner
 */

import { Hono } from "hono";
import { parseWei } from "@stakegate/custody";
import type { AppEnv } from "../types/api-contract.js";
import {
  AssignDepositSchema,
  ConfirmDepositSchema,
  CreateDepositSchema,
  ListDepositsQuerySchema,
  toDepositRecordDto,
  TransferHandleSchema,
} from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { readBody, validateBody } from "../middleware/validate.js";
import { actor, idParam, parseQuery } from "./params.js";

export function createDepositRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateDepositSchema), (c) => {
    const body = readBody(c, CreateDepositSchema);
    const record = c.get("service").createDeposit(actor(c), {
      amount: parseWei(body.amount),
      ...(body.withdrawalAddress !== undefined ? { withdrawalAddress: body.withdrawalAddress } : {}),
    });
    return c.json({ data: toDepositRecordDto(record) }, 201);
  });

  routes.get("/", (c) => {
    const query = parseQuery(c, ListDepositsQuerySchema);
    const records = c.get("service").listDeposits(query.state).map(toDepositRecordDto);
    return c.json(
      paginate(records, { cursor: query.cursor, limit: query.limit }, (r) => r.id, "id"),
    );
  });

  routes.get("/:id", (c) => {
    return c.json({ data: toDepositRecordDto(c.get("service").getDeposit(idParam(c))) });
  });

  routes.get("/:id/cancellation", (c) => {
    return c.json({ data: c.get("service").cancellationDecision(idParam(c)) });
  });

  routes.post("/:id/assign", validateBody(AssignDepositSchema), (c) => {
    const body = readBody(c, AssignDepositSchema);
    const record = c.get("service").assignDeposit(actor(c), idParam(c), body);
    return c.json({ data: toDepositRecordDto(record) });
  });

  routes.post("/:id/confirm", validateBody(ConfirmDepositSchema), (c) => {
    const { depositDataRoot } = readBody(c, ConfirmDepositSchema);
    const record = c.get("service").confirmDeposit(actor(c), idParam(c), depositDataRoot);
    return c.json({ data: toDepositRecordDto(record) });
  });

  routes.post("/:id/finalize", async (c) => {
    const record = await c.get("service").finalizeDeposit(actor(c), idParam(c));
    return c.json({ data: toDepositRecordDto(record) });
  });

  routes.post("/:id/cancel", async (c) => {
    const record = await c.get("service").cancelDeposit(actor(c), idParam(c));
    return c.json({ data: toDepositRecordDto(record) });
  });

  routes.post("/:id/transfer", validateBody(TransferHandleSchema), (c) => {
    const { to } = readBody(c, TransferHandleSchema);
    return c.json({ data: c.get("service").transferHandle(actor(c), idParam(c), to) });
  });

  return routes;
}
