/**
 * @stakegate/custody: Wei amount parsing and formatting.
 *
 * Amounts cross the HTTP boundary as decimal strings. Parsing is
 * strict: no exponents, no signs, no fractional wei.
 *
 * "32"    with parseEther → 32000000000000000000n
 * "1.5"   with parseEther → 1500000000000000000n
 * 10n**18n with formatEther → "1.0"
 */

import type { Wei } from "@stakegate/types";
import { CustodyError } from "./types.js";

const ETHER_DECIMALS = 18;

/**
 * Parse an integer wei string ("32000000000000000000").
 */
export function parseWei(value: string): Wei {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new CustodyError("INVALID_AMOUNT", `Invalid wei amount: "${value}"`);
  }
  return BigInt(trimmed);
}

/**
 * Parse a decimal ether string into wei.
 */
export function parseEther(value: string): Wei {
  const trimmed = value.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new CustodyError("INVALID_AMOUNT", `Invalid ether amount: "${value}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  if (fracPart.length > ETHER_DECIMALS) {
    throw new CustodyError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but ether allows ${String(ETHER_DECIMALS)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(ETHER_DECIMALS, "0"));
}

/**
 * Format wei as ether with trailing zeros trimmed (at least one
 * fractional digit is kept).
 */
export function formatEther(value: Wei): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const str = abs.toString().padStart(ETHER_DECIMALS + 1, "0");
  const intPart = str.slice(0, str.length - ETHER_DECIMALS);
  const fracPart = str.slice(str.length - ETHER_DECIMALS).replace(/0+$/, "") || "0";
  const result = `${intPart}.${fracPart}`;
  return negative ? `-${result}` : result;
}
