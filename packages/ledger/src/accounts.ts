/**
 * @coldsig/ledger — Account identifiers.
 *
 * An account is a (principal, subaccount) pair. Its textual identifier is
 * bit-exact with the ledger canister's derivation:
 *
 *   hash     = SHA-224("\x0Aaccount-id" || principal || subaccount)
 *   checksum = CRC32(hash), big-endian
 *   text     = hex(checksum || hash)
 *
 * Rules:
 * - Subaccounts are exactly 32 bytes; an absent subaccount is all zeros
 * - Same (principal, subaccount) → same identifier
 * - Any single corrupted hex character fails validation
 */

import { createHash } from "node:crypto";
import CRC32 from "crc-32";
import { Principal } from "@dfinity/principal";
import {
  InputError,
  IntegrityError,
  SUBACCOUNT_LENGTH,
  isAccountIdentifierHex,
} from "@coldsig/types";
import type { AccountIdentifierHex, Subaccount } from "@coldsig/types";

/** Domain separator: length byte 0x0A followed by "account-id". */
const ACCOUNT_DOMAIN_SEPARATOR = Buffer.from("\x0Aaccount-id", "latin1");

/** All-zero default subaccount. */
export const DEFAULT_SUBACCOUNT: Subaccount = new Uint8Array(SUBACCOUNT_LENGTH);

// =============================================================================
// Derivation
// =============================================================================

/**
 * Derive the account identifier of a principal and optional subaccount.
 *
 * @throws InputError INVALID_SUBACCOUNT if the subaccount is not 32 bytes
 */
export function deriveAccountIdentifier(
  principal: Principal | Uint8Array,
  subaccount?: Uint8Array,
): AccountIdentifierHex {
  const principalBytes =
    principal instanceof Uint8Array ? principal : principal.toUint8Array();
  const sub = subaccount === undefined ? DEFAULT_SUBACCOUNT : checkSubaccount(subaccount);

  const hash = createHash("sha224")
    .update(ACCOUNT_DOMAIN_SEPARATOR)
    .update(principalBytes)
    .update(sub)
    .digest();

  return Buffer.concat([crc32BigEndian(hash), hash]).toString("hex");
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check the shape and embedded checksum of a textual account identifier.
 */
export function validateAccountIdentifier(text: string): boolean {
  if (!isAccountIdentifierHex(text)) {
    return false;
  }
  const bytes = Buffer.from(text, "hex");
  return crc32BigEndian(bytes.subarray(4)).equals(bytes.subarray(0, 4));
}

/**
 * Parse user input into an account identifier.
 *
 * Accepts surrounding whitespace and uppercase hex.
 *
 * @throws InputError INVALID_ACCOUNT_ID if the text is not 64 hex characters
 * @throws IntegrityError CHECKSUM_MISMATCH if the checksum does not match
 */
export function parseAccountIdentifier(text: string, field = "account"): AccountIdentifierHex {
  const normalized = typeof text === "string" ? text.trim().toLowerCase() : "";

  if (!isAccountIdentifierHex(normalized)) {
    throw new InputError(
      "INVALID_ACCOUNT_ID",
      `${field} must be 64 hex characters, got "${String(text)}"`,
    );
  }

  if (!validateAccountIdentifier(normalized)) {
    throw new IntegrityError(
      "CHECKSUM_MISMATCH",
      `${field} "${normalized}" has an invalid checksum`,
    );
  }

  return normalized;
}

/**
 * The 32 raw bytes (checksum and hash) of a validated account identifier.
 */
export function accountIdentifierToBytes(account: AccountIdentifierHex): Uint8Array {
  return Uint8Array.from(Buffer.from(parseAccountIdentifier(account), "hex"));
}

/**
 * Textual form of 32 raw account identifier bytes.
 *
 * @throws IntegrityError CHECKSUM_MISMATCH if the checksum does not match
 */
export function accountIdentifierFromBytes(bytes: Uint8Array): AccountIdentifierHex {
  return parseAccountIdentifier(Buffer.from(bytes).toString("hex"));
}

// =============================================================================
// Subaccounts
// =============================================================================

/**
 * Require a subaccount of exactly 32 bytes. Never pads or truncates.
 */
export function checkSubaccount(bytes: Uint8Array, field = "subaccount"): Subaccount {
  if (bytes.length !== SUBACCOUNT_LENGTH) {
    throw new InputError(
      "INVALID_SUBACCOUNT",
      `${field} must be ${String(SUBACCOUNT_LENGTH)} bytes, got ${String(bytes.length)}`,
    );
  }
  return bytes;
}

/**
 * Parse a hex subaccount (64 characters).
 */
export function parseSubaccount(hex: string, field = "subaccount"): Subaccount {
  const trimmed = hex.trim();
  if (!/^([0-9a-fA-F]{2})*$/.test(trimmed)) {
    throw new InputError("INVALID_SUBACCOUNT", `${field} "${trimmed}" is not hex`);
  }
  return checkSubaccount(Uint8Array.from(Buffer.from(trimmed, "hex")), field);
}

// =============================================================================
// Principals
// =============================================================================

/**
 * Parse a textual principal.
 *
 * @throws InputError INVALID_PRINCIPAL if the text or its checksum is malformed
 */
export function parsePrincipal(text: string, field = "principal"): Principal {
  if (text.trim() === "") {
    throw new InputError("INVALID_PRINCIPAL", `${field} must not be empty`);
  }
  try {
    return Principal.fromText(text.trim());
  } catch (err) {
    throw new InputError("INVALID_PRINCIPAL", `${field} "${text}" is not a valid principal`, {
      cause: err,
    });
  }
}

// =============================================================================
// Internal helpers
// =============================================================================

function crc32BigEndian(data: Uint8Array): Buffer {
  const checksum = Buffer.alloc(4);
  checksum.writeUInt32BE(CRC32.buf(data) >>> 0);
  return checksum;
}
