/**
 * Operation Types
 *
 * The closed set of requests the toolkit knows how to build, sign and
 * render. Every consumer switches over `kind` exhaustively.
 *
 * Rules:
 * - Each variant owns only the fields relevant to it
 * - Optional fields are omitted, never zero-filled
 * - Principals are textual, account identifiers are hex
 */

import type { AccountIdentifierHex, E8s, Subaccount } from "./financial.js";
import type { CallType, CanisterCall, PrincipalText } from "./chain.js";

// =============================================================================
// Ledger
// =============================================================================

/**
 * Transfer ICP from the signer's account (ledger `send_dfx`).
 */
export interface TransferOperation {
  readonly kind: "transfer";
  readonly to: AccountIdentifierHex;
  readonly amount: E8s;
  readonly fee: E8s;
  readonly memo: bigint;
  readonly fromSubaccount?: Subaccount | undefined;
  /** Nanoseconds since the Unix epoch */
  readonly createdAt?: bigint | undefined;
}

/**
 * Query the balance of an account (ledger `account_balance_dfx`).
 */
export interface BalanceQueryOperation {
  readonly kind: "balance";
  readonly account: AccountIdentifierHex;
}

/**
 * Notify a canister of a prior transfer (ledger `notify_dfx`).
 */
export interface NotifyOperation {
  readonly kind: "notify";
  readonly blockHeight: bigint;
  readonly maxFee: E8s;
  readonly toCanister: PrincipalText;
  readonly fromSubaccount?: Subaccount | undefined;
  readonly toSubaccount?: Subaccount | undefined;
}

// =============================================================================
// Governance
// =============================================================================

/**
 * Claim or refresh a neuron funded from the controller's staking
 * subaccount (`claim_or_refresh_neuron_from_account`), optionally preceded
 * by the transfer that funds it.
 */
export interface NeuronStakeOperation {
  readonly kind: "neuron-stake";
  readonly controller: PrincipalText;
  readonly nonce: bigint;
  readonly transfer?: TransferOperation | undefined;
}

/**
 * A single `manage_neuron` command.
 */
export type NeuronCommand =
  | { readonly kind: "add-hot-key"; readonly hotKey: PrincipalText }
  | { readonly kind: "remove-hot-key"; readonly hotKey: PrincipalText }
  | { readonly kind: "increase-dissolve-delay"; readonly additionalSeconds: number }
  | { readonly kind: "start-dissolving" }
  | { readonly kind: "stop-dissolving" }
  | {
      readonly kind: "disburse";
      readonly toAccount?: AccountIdentifierHex | undefined;
      readonly amount?: E8s | undefined;
    }
  | { readonly kind: "spawn"; readonly newController?: PrincipalText | undefined }
  | { readonly kind: "split"; readonly amount: E8s }
  | { readonly kind: "merge"; readonly sourceNeuronId: bigint }
  | { readonly kind: "merge-maturity"; readonly percentage: number };

export type NeuronCommandKind = NeuronCommand["kind"];

/**
 * Apply one command to a neuron (governance `manage_neuron`).
 */
export interface NeuronManageOperation {
  readonly kind: "neuron-manage";
  readonly neuronId: bigint;
  readonly command: NeuronCommand;
}

/**
 * List the caller's neurons (governance `list_neurons`).
 */
export interface ListNeuronsOperation {
  readonly kind: "list-neurons";
  readonly neuronIds: readonly bigint[];
}

// =============================================================================
// Raw
// =============================================================================

/**
 * Any other canister method with pre-encoded Candid arguments.
 */
export interface RawCallOperation {
  readonly kind: "raw";
  readonly canisterId: PrincipalText;
  readonly methodName: string;
  readonly arg: Uint8Array;
  readonly callType: CallType;
}

// =============================================================================
// Union
// =============================================================================

export type Operation =
  | TransferOperation
  | BalanceQueryOperation
  | NotifyOperation
  | NeuronStakeOperation
  | NeuronManageOperation
  | ListNeuronsOperation
  | RawCallOperation;

export type OperationKind = Operation["kind"];

/**
 * What a request builder returns: the typed operation and the canister
 * calls that carry it. Most operations need one call; a funded neuron
 * stake needs two.
 */
export interface BuiltRequest<T extends Operation = Operation> {
  readonly operation: T;
  readonly calls: readonly CanisterCall[];
}

/**
 * Compile-time exhaustiveness check for switches over a closed union.
 */
export function assertNever(value: never, context: string): never {
  throw new Error(`Unhandled ${context}: ${String(value)}`);
}
