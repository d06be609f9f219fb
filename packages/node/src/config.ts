/**
 * @stakegate/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { normalizeAddress } from "@stakegate/types";
import type { Address } from "@stakegate/types";
import { isRole } from "./types/auth.js";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine((v) => normalizeAddress(v) !== undefined, {
    message: "Expected a 0x-prefixed 20-byte address",
  });

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Lifecycle
  OWNER_ADDRESS: AddressSchema,
  OPERATORS: z.string().default(""),
  /** Withdrawal address of vault-created validators. Default: OWNER_ADDRESS */
  VAULT_ADDRESS: AddressSchema.optional(),
  CANCEL_COOLDOWN_SECONDS: z.coerce.number().int().min(0).default(604800),
  WITHDRAWAL_CREDENTIAL_TYPE: z
    .enum(["0x01", "0x02"])
    .default("0x01")
    .transform((v) => (v === "0x02" ? 0x02 : 0x01)),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:address1,key2:role2:address2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, address, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || address === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    const normalized = normalizeAddress(address);
    if (normalized === undefined) {
      throw new Error(`Invalid address "${address}" for API key in API_KEYS`);
    }

    keys.push({ key, role, address: normalized });
  }

  return keys;
}

/**
 * Parse the OPERATORS env var: a comma-separated address list.
 */
export function parseOperators(raw: string): readonly Address[] {
  const operators: Address[] = [];
  for (const entry of raw.split(",")) {
    const value = entry.trim();
    if (value === "") continue;
    const normalized = normalizeAddress(value);
    if (normalized === undefined) {
      throw new Error(`Invalid operator address "${value}" in OPERATORS`);
    }
    operators.push(normalized);
  }
  return operators;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
