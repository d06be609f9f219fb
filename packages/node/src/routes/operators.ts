/**
 * Operator set routes.
 *
 * GET  /api/v1/operators           Owner and enabled operators
 * POST /api/v1/operators/:address  Enable or disable (owner only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SetOperatorSchema } from "../types/dto.js";
import { readBody, validateBody } from "../middleware/validate.js";
import { actor } from "./params.js";

export function createOperatorRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listOperators() });
  });

  routes.post("/:address", validateBody(SetOperatorSchema), (c) => {
    const { enabled } = readBody(c, SetOperatorSchema);
    const address = c.req.param("address");
    const changed = c.get("service").setOperator(actor(c), address, enabled);
    return c.json({ data: { operator: address.toLowerCase(), enabled, changed } });
  });

  return routes;
}
