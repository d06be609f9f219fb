/**
 * Journal routes.
 *
 * GET  /api/v1/events            All events (cursor pagination)
 * GET  /api/v1/events/verify     Hash-chain integrity
 * GET  /api/v1/events/:streamId  Events of one stream, e.g. deposit-1
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "./params.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, ListEventsQuerySchema);
    const events = c
      .get("service")
      .readAllEvents(
        query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : undefined,
      );

    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        (e) => e.globalPosition,
        "globalPosition",
      ),
    );
  });

  routes.get("/verify", (c) => {
    return c.json({ data: c.get("service").verifyEvents() });
  });

  routes.get("/:streamId", (c) => {
    const streamId = c.req.param("streamId");
    const query = parseQuery(c, ListStreamEventsQuerySchema);
    const events = c
      .get("service")
      .readStreamEvents(
        streamId,
        query.afterVersion !== undefined ? { fromVersion: query.afterVersion + 1 } : undefined,
      );

    return c.json(
      paginate(events, { cursor: query.cursor, limit: query.limit }, (e) => e.version, "version"),
    );
  });

  return routes;
}
