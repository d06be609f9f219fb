/**
 * @stakegate/node: Public API.
 *
 * main.ts starts the server; this module only re-exports.
 */

export { StakeService } from "./services/stake-service.js";
export type {
  StakeServiceConfig,
  CustodyReport,
  SharesReport,
} from "./services/stake-service.js";
export { loadConfig, parseApiKeys, parseOperators, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
