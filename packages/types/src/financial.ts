/**
 * Financial Types
 *
 * Token primitives for the ICP ledger.
 *
 * Rules:
 * - Amounts are counted in e8s (1 ICP = 100_000_000 e8s)
 * - Amounts are bigint, never floating point
 * - Every amount fits in an unsigned 64-bit integer
 */

/** Number of e8s in one ICP. */
export const E8S_PER_TOKEN = 100_000_000n;

/** Decimal places of the ICP token. */
export const TOKEN_DECIMALS = 8;

/** Largest value of a Candid nat64. */
export const MAX_NAT64 = 0xffff_ffff_ffff_ffffn;

/** Ledger fee for a transfer, in e8s. */
export const DEFAULT_TRANSFER_FEE = 10_000n;

/**
 * A non-negative count of e8s, bounded by {@link MAX_NAT64}.
 */
export type E8s = bigint;

/**
 * Textual account identifier: 64 lowercase hex characters,
 * a CRC32 checksum followed by the SHA-224 account hash.
 */
export type AccountIdentifierHex = string;

/**
 * A 32-byte ledger subaccount.
 */
export type Subaccount = Uint8Array;

/** Length of a subaccount in bytes. */
export const SUBACCOUNT_LENGTH = 32;
