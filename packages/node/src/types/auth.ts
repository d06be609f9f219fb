/**
 * Authentication and authorization types.
 *
 * Callers are identified in one of two ways:
 * 1. API key via X-Api-Key header, mapped to a role and an address
 * 2. X-Actor header carrying the caller's address (only when no API keys
 *    are configured: development and tests)
 *
 * Role hierarchy: admin > operator > viewer. Roles gate the HTTP surface
 * only; lifecycle authorization (operator set, handle owner, withdrawal
 * holder) is always decided on the resolved address.
 */

import type { Address } from "@stakegate/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write"],
};

const ROLES: readonly string[] = ["admin", "operator", "viewer"];

export function isRole(value: string): value is Role {
  return ROLES.includes(value);
}

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "actor-header";
  /** API key, or the address for actor-header callers */
  readonly identity: string;
  readonly role: Role;
  readonly address: Address;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}
