/**
 * Candid interface of the governance canister methods the toolkit signs.
 *
 * Variants list only the commands the toolkit builds; a variant with
 * fewer tags is a Candid subtype of the canister's declaration.
 */

import { IDL } from "@dfinity/candid";

export const NeuronId = IDL.Record({ id: IDL.Nat64 });

/** Governance account identifier: the 32 raw bytes of the ledger id. */
export const AccountIdentifier = IDL.Record({ hash: IDL.Vec(IDL.Nat8) });

export const Amount = IDL.Record({ e8s: IDL.Nat64 });

export const RemoveHotKey = IDL.Record({ hot_key_to_remove: IDL.Opt(IDL.Principal) });

export const AddHotKey = IDL.Record({ new_hot_key: IDL.Opt(IDL.Principal) });

export const IncreaseDissolveDelay = IDL.Record({
  additional_dissolve_delay_seconds: IDL.Nat32,
});

export const ConfigureOperation = IDL.Variant({
  RemoveHotKey,
  AddHotKey,
  StopDissolving: IDL.Record({}),
  StartDissolving: IDL.Record({}),
  IncreaseDissolveDelay,
});

export const Configure = IDL.Record({ operation: IDL.Opt(ConfigureOperation) });

export const Disburse = IDL.Record({
  to_account: IDL.Opt(AccountIdentifier),
  amount: IDL.Opt(Amount),
});

export const Spawn = IDL.Record({ new_controller: IDL.Opt(IDL.Principal) });

export const Split = IDL.Record({ amount_e8s: IDL.Nat64 });

export const Merge = IDL.Record({ source_neuron_id: IDL.Opt(NeuronId) });

export const MergeMaturity = IDL.Record({ percentage_to_merge: IDL.Nat32 });

export const Command = IDL.Variant({
  Spawn,
  Split,
  Configure,
  Merge,
  MergeMaturity,
  Disburse,
});

export const NeuronIdOrSubaccount = IDL.Variant({
  Subaccount: IDL.Vec(IDL.Nat8),
  NeuronId,
});

export const ManageNeuron = IDL.Record({
  id: IDL.Opt(NeuronId),
  command: IDL.Opt(Command),
  neuron_id_or_subaccount: IDL.Opt(NeuronIdOrSubaccount),
});

export const ClaimOrRefreshNeuronFromAccount = IDL.Record({
  controller: IDL.Opt(IDL.Principal),
  memo: IDL.Nat64,
});

export const ListNeurons = IDL.Record({
  neuron_ids: IDL.Vec(IDL.Nat64),
  include_neurons_readable_by_caller: IDL.Bool,
});

export const GOVERNANCE_METHODS = {
  stake: "claim_or_refresh_neuron_from_account",
  manage: "manage_neuron",
  list: "list_neurons",
} as const;

export type GovernanceMethod = (typeof GOVERNANCE_METHODS)[keyof typeof GOVERNANCE_METHODS];
