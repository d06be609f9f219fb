/**
 * Path and query parameter helpers shared by the route modules.
 */

import type { Context } from "hono";
import type { ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "@stakegate/lifecycle";
import type { AppEnv } from "../types/api-contract.js";
import { IdParamSchema } from "../types/dto.js";
import { formatZodErrors } from "../middleware/validate.js";

/**
 * The `:id` path parameter as a positive integer.
 *
 * @throws ValidationError VALIDATION_FAILED for anything else
 */
export function idParam(c: Context<AppEnv>): number {
  const raw = c.req.param("id") ?? "";
  const result = IdParamSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError("VALIDATION_FAILED", `Invalid id "${raw}"`, "id");
  }
  return result.data;
}

/**
 * @throws ValidationError VALIDATION_FAILED naming the first bad parameter
 */
export function parseQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    const [first] = formatZodErrors(result.error);
    throw new ValidationError(
      "VALIDATION_FAILED",
      `Invalid query parameters${first !== undefined ? `: ${first.path} ${first.message}` : ""}`,
      first?.path,
    );
  }
  return result.data;
}

/** Address of the authenticated caller. */
export function actor(c: Context<AppEnv>): string {
  return c.get("auth").address;
}
