/**
 * Request identifiers.
 *
 * The request id is the representation-independent hash of a request's
 * content map, the value the remote service recomputes before checking
 * the signature:
 *
 * - text → SHA-256(UTF-8 bytes)
 * - blob → SHA-256(bytes)
 * - nat → SHA-256(unsigned LEB128)
 * - array → SHA-256(concatenation of element hashes)
 * - map → SHA-256(concatenation of sorted hash(key) || hash(value) pairs)
 *
 * Absent (undefined) map entries are skipped, so an omitted field and an
 * explicit zero never hash alike.
 */

import { createHash } from "node:crypto";
import { EncodingError } from "@coldsig/types";

// =============================================================================
// Types
// =============================================================================

/** 32-byte SHA-256 request id. */
export type RequestId = Uint8Array;

export type ContentValue =
  | string
  | bigint
  | number
  | Uint8Array
  | readonly ContentValue[]
  | ContentMap;

export type ContentMap = { readonly [key: string]: ContentValue | undefined };

export const REQUEST_ID_LENGTH = 32;

// =============================================================================
// Hashing
// =============================================================================

/**
 * Compute the request id of a content map.
 */
export function requestIdOf(content: ContentMap): RequestId {
  return hashMap(content);
}

/**
 * Hash a single content value.
 *
 * @throws EncodingError MALFORMED_CONTENT for negative or fractional numbers
 */
export function hashValue(value: ContentValue): Uint8Array {
  if (typeof value === "string") {
    return sha256(Buffer.from(value, "utf8"));
  }
  if (typeof value === "bigint") {
    return sha256(lebEncode(value));
  }
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new EncodingError("MALFORMED_CONTENT", `Cannot hash non-integer number ${String(value)}`);
    }
    return sha256(lebEncode(BigInt(value)));
  }
  if (value instanceof Uint8Array) {
    return sha256(value);
  }
  if (isContentArray(value)) {
    return sha256(Buffer.concat(value.map(hashValue)));
  }
  return hashMap(value);
}

function hashMap(map: ContentMap): Uint8Array {
  const pairs: Buffer[] = [];
  for (const [key, value] of Object.entries(map)) {
    if (value === undefined) continue;
    pairs.push(Buffer.concat([hashValue(key), hashValue(value)]));
  }
  pairs.sort(Buffer.compare);
  return sha256(Buffer.concat(pairs));
}

function isContentArray(value: readonly ContentValue[] | ContentMap): value is readonly ContentValue[] {
  return Array.isArray(value);
}

function sha256(data: Uint8Array): Uint8Array {
  return Uint8Array.from(createHash("sha256").update(data).digest());
}

// =============================================================================
// LEB128
// =============================================================================

/**
 * Unsigned LEB128 encoding of a natural number.
 *
 * 624485n → e5 8e 26
 */
export function lebEncode(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new EncodingError("MALFORMED_CONTENT", `Cannot LEB128-encode negative ${value.toString()}`);
  }
  const bytes: number[] = [];
  let rest = value;
  do {
    let byte = Number(rest & 0x7fn);
    rest >>= 7n;
    if (rest !== 0n) byte |= 0x80;
    bytes.push(byte);
  } while (rest !== 0n);
  return Uint8Array.from(bytes);
}
