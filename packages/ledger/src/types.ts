/**
 * @coldsig/ledger domain types.
 *
 * Builder inputs are deliberately loose: strings as a user typed them.
 * Builders turn them into the typed operations of @coldsig/types.
 */

import type { PrincipalText } from "@coldsig/types";

// ─── Builder options ─────────────────────────────────────────────────────

/**
 * Options shared by the ledger request builders.
 */
export interface LedgerCallOptions {
  /** Target ledger canister; defaults to the NNS ledger */
  readonly canisterId?: PrincipalText | undefined;
}

// ─── Builder inputs ──────────────────────────────────────────────────────

/**
 * User input for a transfer.
 */
export interface TransferInput {
  /** Destination account identifier (hex) */
  readonly to: string;
  /** Amount in ICP, up to 8 decimals (e.g. "2.5") */
  readonly amount: string;
  /** Fee in ICP; defaults to 0.0001 */
  readonly fee?: string | undefined;
  /** Reference number; defaults to 0 */
  readonly memo?: string | undefined;
  /** Source subaccount (hex, 32 bytes) */
  readonly fromSubaccount?: string | undefined;
  /** Creation time in nanoseconds since the epoch, for ledger deduplication */
  readonly createdAt?: string | undefined;
}

/**
 * User input for a balance query.
 */
export interface BalanceQueryInput {
  readonly account: string;
}

/**
 * User input for a notify call.
 */
export interface NotifyInput {
  /** Block height of the transfer being notified */
  readonly blockHeight: string;
  /** Canister to notify */
  readonly toCanister: string;
  /** Maximum fee in ICP; defaults to 0.0001 */
  readonly maxFee?: string | undefined;
  readonly fromSubaccount?: string | undefined;
  readonly toSubaccount?: string | undefined;
}
