/**
 * Canister Call Types
 *
 * The chain-facing half of a request: which canister, which method,
 * which Candid-encoded argument.
 *
 * Rules:
 * - Principals are carried in their textual form
 * - Argument bytes are already Candid encoded
 * - No signing material in these types
 */

/**
 * Textual principal (e.g. "ryjl3-tyaaa-aaaaa-aaaba-cai").
 */
export type PrincipalText = string;

/**
 * How the remote service executes a call.
 * Updates go through consensus, queries are answered by a single replica.
 */
export type CallType = "update" | "query";

/**
 * A fully described canister method invocation, ready to be wrapped in
 * request content and signed.
 */
export interface CanisterCall {
  /** Target canister */
  readonly canisterId: PrincipalText;

  /** Method name as exported by the canister's Candid interface */
  readonly methodName: string;

  /** Candid-encoded argument bytes */
  readonly arg: Uint8Array;

  /** Update or query */
  readonly callType: CallType;
}

/** NNS ledger canister. */
export const LEDGER_CANISTER_ID: PrincipalText = "ryjl3-tyaaa-aaaaa-aaaba-cai";

/** NNS governance canister. */
export const GOVERNANCE_CANISTER_ID: PrincipalText = "rrkah-fqaaa-aaaaa-aaaaq-cai";
