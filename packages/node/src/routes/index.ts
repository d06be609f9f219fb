/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createDepositRoutes } from "./deposits.js";
export { createOperatorRoutes } from "./operators.js";
export { createVaultRoutes } from "./vault.js";
export { createCustodyRoutes } from "./custody.js";
export { createEventRoutes } from "./events.js";
