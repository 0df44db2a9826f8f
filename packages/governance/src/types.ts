/**
 * Neuron Governance Types
 *
 * Loose user input for the governance request builders.
 *
 * Design:
 * - All types are readonly
 * - Strings as typed by the user; the builders validate and convert
 */

import type { PrincipalText } from "@coldsig/types";

// =============================================================================
// Options
// =============================================================================

/**
 * Canisters the governance builders target.
 */
export interface GovernanceCallOptions {
  /** Defaults to the NNS governance canister */
  readonly governanceCanisterId?: PrincipalText | undefined;

  /** Ledger used to fund a stake; defaults to the NNS ledger */
  readonly ledgerCanisterId?: PrincipalText | undefined;
}

// =============================================================================
// Inputs
// =============================================================================

/**
 * Stake a new neuron or top up an existing one.
 *
 * Exactly one of `name` or `nonce` identifies the neuron.
 */
export interface NeuronStakeInput {
  /** Controller principal (normally the signer's own) */
  readonly controller: string;

  /** ICP to transfer to the staking subaccount; omitted = refresh only */
  readonly amount?: string | undefined;

  /** Transfer fee in ICP; defaults to 0.0001 */
  readonly fee?: string | undefined;

  /** Neuron name, up to 8 ASCII characters */
  readonly name?: string | undefined;

  /** Neuron nonce */
  readonly nonce?: string | undefined;
}

/**
 * One requested `manage_neuron` command.
 *
 * `kind` must be one of the recognised command kinds; the other fields
 * are read according to it.
 */
export interface NeuronCommandInput {
  readonly kind: string;
  readonly hotKey?: string | undefined;
  readonly seconds?: string | undefined;
  readonly toAccount?: string | undefined;
  readonly amount?: string | undefined;
  readonly newController?: string | undefined;
  readonly sourceNeuronId?: string | undefined;
  readonly percentage?: string | undefined;
}

/**
 * Manage a neuron with one or more commands.
 */
export interface NeuronManageInput {
  /** Neuron id; `_` digit separators are allowed */
  readonly neuronId: string;
  readonly commands: readonly NeuronCommandInput[];
}

/**
 * List the caller's neurons, optionally narrowed to some ids.
 */
export interface ListNeuronsInput {
  readonly neuronIds?: readonly string[] | undefined;
}
