/**
 * Primitive Types
 *
 * Byte strings, addresses and amounts shared by every Stakegate package.
 *
 * Rules:
 * - Byte strings travel as 0x-prefixed lowercase hex
 * - Amounts are bigint in base units (wei, gwei); never floating point
 * - Addresses are compared after lower-casing
 */

/** A 0x-prefixed hex string of any length. */
export type Hex = `0x${string}`;

/** A 0x-prefixed 20-byte execution-layer address. */
export type Address = `0x${string}`;

/** Amount in wei (10^-18 ETH). */
export type Wei = bigint;

/** Amount in gwei (10^-9 ETH), the unit the deposit contract commits to. */
export type Gwei = bigint;

// =============================================================================
// Protocol constants
// =============================================================================

export const WEI_PER_GWEI = 1_000_000_000n;

/** Fixed deposit required to create one validator: 32 ETH. */
export const STAKE_UNIT_GWEI: Gwei = 32_000_000_000n;
export const STAKE_UNIT_WEI: Wei = STAKE_UNIT_GWEI * WEI_PER_GWEI;

export const PUBKEY_LENGTH = 48;
export const SIGNATURE_LENGTH = 96;
export const ROOT_LENGTH = 32;
export const WITHDRAWAL_CREDENTIALS_LENGTH = 32;
export const ADDRESS_LENGTH = 20;

/** Seconds a confirmed record must wait before it can be cancelled. */
export const DEFAULT_CANCEL_COOLDOWN_SECONDS = 7 * 24 * 60 * 60;

// =============================================================================
// Helpers
// =============================================================================

const HEX_PATTERN = /^0x[0-9a-fA-F]*$/;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/**
 * Lower-case an address so it can be used as a map key.
 * Returns undefined when the input is not a 20-byte hex address.
 */
export function normalizeAddress(value: string): Address | undefined {
  if (!ADDRESS_PATTERN.test(value)) {
    return undefined;
  }
  return `0x${value.slice(2).toLowerCase()}`;
}

export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function gweiToWei(amount: Gwei): Wei {
  return amount * WEI_PER_GWEI;
}

/**
 * Convert wei to gwei. Sub-gwei remainders cannot be committed to the
 * deposit contract, so they are reported instead of truncated.
 */
export function weiToGwei(amount: Wei): { gwei: Gwei; remainder: Wei } {
  return { gwei: amount / WEI_PER_GWEI, remainder: amount % WEI_PER_GWEI };
}

/** @internal exported for guards */
export function matchesHex(value: string): boolean {
  return HEX_PATTERN.test(value) && value.length % 2 === 0;
}

/** @internal exported for guards */
export function matchesAddress(value: string): boolean {
  return ADDRESS_PATTERN.test(value);
}
