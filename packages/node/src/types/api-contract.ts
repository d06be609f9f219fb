/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { StakeService } from "../services/stake-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The lifecycle service (set once for the whole app) */
    service: StakeService;

    /** Resolved caller (set by auth middleware) */
    auth: AuthContext;

    /** Parsed JSON body that passed its route schema (set by validateBody) */
    validatedBody: unknown;
  };
}
