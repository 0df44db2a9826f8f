/**
 * @coldsig/ledger — Deterministic token arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * Token strings are converted to/from e8s via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are non-negative and fit in a nat64
 * - Overflow and underflow throw, never wrap
 */

import {
  E8S_PER_TOKEN,
  InputError,
  MAX_NAT64,
  TOKEN_DECIMALS,
} from "@coldsig/types";
import type { E8s } from "@coldsig/types";

// ─── Natural numbers ─────────────────────────────────────────────────────

/**
 * Parse a decimal string into a nat64.
 *
 * "42" → 42n
 * "18446744073709551616" → InputError INVALID_NAT
 */
export function parseNat64(text: string, field: string): bigint {
  const value = parseDigits(text, field, "INVALID_NAT");
  if (value > MAX_NAT64) {
    throw new InputError(
      "INVALID_NAT",
      `${field} "${text.trim()}" does not fit in 64 bits`,
    );
  }
  return value;
}

/**
 * Parse a decimal string of e8s.
 *
 * "10000" → 10000n
 * "18446744073709551616" → InputError AMOUNT_OVERFLOW
 */
export function parseE8s(text: string, field = "amount"): E8s {
  const value = parseDigits(text, field, "INVALID_AMOUNT");
  return assertE8s(value, field);
}

// ─── Tokens ──────────────────────────────────────────────────────────────

/**
 * Parse a token amount with up to 8 decimal places into e8s.
 *
 * "2.5" → 250000000n
 * "0.0001" → 10000n
 * "1" → 100000000n
 */
export function parseTokens(amount: string, field = "amount"): E8s {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new InputError("INVALID_AMOUNT", `${field} must not be empty`);
  }

  const trimmed = amount.trim();

  if (trimmed.startsWith("-")) {
    throw new InputError("INVALID_AMOUNT", `${field} "${trimmed}" must not be negative`);
  }

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new InputError("INVALID_AMOUNT", `Invalid ${field} format: "${trimmed}"`);
  }

  const parts = trimmed.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > TOKEN_DECIMALS) {
    throw new InputError(
      "INVALID_AMOUNT",
      `${field} "${trimmed}" has ${String(fracPart.length)} decimal places, but ICP allows ${String(TOKEN_DECIMALS)}`,
    );
  }

  const value = BigInt(intPart) * E8S_PER_TOKEN + BigInt(fracPart.padEnd(TOKEN_DECIMALS, "0"));
  return assertE8s(value, field);
}

/**
 * Convert e8s back to a token string without trailing zeros.
 *
 * 250000000n → "2.5"
 * 10000n → "0.0001"
 * 100000000n → "1"
 */
export function formatTokens(e8s: E8s): string {
  const whole = e8s / E8S_PER_TOKEN;
  const frac = (e8s % E8S_PER_TOKEN)
    .toString()
    .padStart(TOKEN_DECIMALS, "0")
    .replace(/0+$/, "");

  return frac === "" ? whole.toString() : `${whole.toString()}.${frac}`;
}

// ─── Checked arithmetic ──────────────────────────────────────────────────

/**
 * Assert a bigint is a valid e8s amount.
 * Throws InputError if negative or beyond 64 bits.
 */
export function assertE8s(value: bigint, field = "amount"): E8s {
  if (value < 0n) {
    throw new InputError("AMOUNT_UNDERFLOW", `${field} must not be negative, got ${value.toString()}`);
  }
  if (value > MAX_NAT64) {
    throw new InputError(
      "AMOUNT_OVERFLOW",
      `${field} ${value.toString()} e8s exceeds the 64-bit maximum`,
    );
  }
  return value;
}

/**
 * Add two amounts. Throws on 64-bit overflow.
 */
export function addE8s(a: E8s, b: E8s): E8s {
  return assertE8s(a + b, "sum");
}

/**
 * Subtract b from a. Throws if the result would be negative.
 */
export function subtractE8s(a: E8s, b: E8s): E8s {
  return assertE8s(a - b, "difference");
}

// ─── Internal Helpers ────────────────────────────────────────────────────

function parseDigits(
  text: string,
  field: string,
  code: "INVALID_NAT" | "INVALID_AMOUNT",
): bigint {
  if (typeof text !== "string" || text.trim() === "") {
    throw new InputError(code, `${field} must not be empty`);
  }

  const trimmed = text.trim();

  if (trimmed.startsWith("-")) {
    throw new InputError(code, `${field} "${trimmed}" must not be negative`);
  }

  if (!/^\d+$/.test(trimmed)) {
    throw new InputError(code, `${field} "${trimmed}" is not a whole number`);
  }

  return BigInt(trimmed);
}
