/**
 * Governance call decoding for dry runs.
 */

import { z } from "zod";
import { EncodingError } from "@coldsig/types";
import type {
  ListNeuronsOperation,
  NeuronCommand,
  NeuronManageOperation,
  NeuronStakeOperation,
  Operation,
} from "@coldsig/types";
import {
  accountIdentifierFromBytes,
  bytesSchema,
  decodeArg,
  nat32Schema,
  nat64Schema,
  optSchema,
  principalSchema,
} from "@coldsig/ledger";
import {
  ClaimOrRefreshNeuronFromAccount,
  GOVERNANCE_METHODS,
  ListNeurons,
  ManageNeuron,
} from "./governance-idl.js";

// =============================================================================
// Schemas
// =============================================================================

const neuronIdSchema = z.object({ id: nat64Schema });

const configureOperationSchema = z.union([
  z.object({ AddHotKey: z.object({ new_hot_key: optSchema(principalSchema) }) }),
  z.object({ RemoveHotKey: z.object({ hot_key_to_remove: optSchema(principalSchema) }) }),
  z.object({
    IncreaseDissolveDelay: z.object({ additional_dissolve_delay_seconds: nat32Schema }),
  }),
  z.object({ StartDissolving: z.object({}) }),
  z.object({ StopDissolving: z.object({}) }),
]);

const commandSchema = z.union([
  z.object({ Configure: z.object({ operation: optSchema(configureOperationSchema) }) }),
  z.object({
    Disburse: z.object({
      to_account: optSchema(z.object({ hash: bytesSchema })),
      amount: optSchema(z.object({ e8s: nat64Schema })),
    }),
  }),
  z.object({ Spawn: z.object({ new_controller: optSchema(principalSchema) }) }),
  z.object({ Split: z.object({ amount_e8s: nat64Schema }) }),
  z.object({ Merge: z.object({ source_neuron_id: optSchema(neuronIdSchema) }) }),
  z.object({ MergeMaturity: z.object({ percentage_to_merge: nat32Schema }) }),
]);

const manageNeuronSchema = z.object({
  id: optSchema(neuronIdSchema),
  command: optSchema(commandSchema),
  neuron_id_or_subaccount: optSchema(
    z.union([z.object({ NeuronId: neuronIdSchema }), z.object({ Subaccount: bytesSchema })]),
  ),
});

const claimSchema = z.object({
  controller: optSchema(principalSchema),
  memo: nat64Schema,
});

const listNeuronsSchema = z.object({
  neuron_ids: z
    .union([z.array(nat64Schema), z.instanceof(BigUint64Array)])
    .transform((ids) => Array.from(ids)),
  include_neurons_readable_by_caller: z.boolean(),
});

type CandidCommand = z.output<typeof commandSchema>;
type CandidConfigureOperation = z.output<typeof configureOperationSchema>;

// =============================================================================
// Decoders
// =============================================================================

/**
 * Decode a `claim_or_refresh_neuron_from_account` argument. The funding
 * transfer, if any, is a separate ledger call.
 */
export function decodeNeuronStake(arg: Uint8Array): NeuronStakeOperation {
  const args = decodeArg(ClaimOrRefreshNeuronFromAccount, claimSchema, arg, GOVERNANCE_METHODS.stake);
  if (args.controller === undefined) {
    throw malformed(GOVERNANCE_METHODS.stake, "controller is missing");
  }
  return { kind: "neuron-stake", controller: args.controller, nonce: args.memo };
}

/**
 * Decode a `manage_neuron` argument.
 */
export function decodeNeuronManage(arg: Uint8Array): NeuronManageOperation {
  const args = decodeArg(ManageNeuron, manageNeuronSchema, arg, GOVERNANCE_METHODS.manage);

  let neuronId = args.id?.id;
  if (neuronId === undefined && args.neuron_id_or_subaccount !== undefined) {
    if ("NeuronId" in args.neuron_id_or_subaccount) {
      neuronId = args.neuron_id_or_subaccount.NeuronId.id;
    }
  }
  if (neuronId === undefined) {
    throw malformed(GOVERNANCE_METHODS.manage, "the neuron is not addressed by id");
  }
  if (args.command === undefined) {
    throw malformed(GOVERNANCE_METHODS.manage, "command is missing");
  }

  return { kind: "neuron-manage", neuronId, command: fromCandidCommand(args.command) };
}

/**
 * Decode a `list_neurons` argument.
 */
export function decodeListNeurons(arg: Uint8Array): ListNeuronsOperation {
  const args = decodeArg(ListNeurons, listNeuronsSchema, arg, GOVERNANCE_METHODS.list);
  return { kind: "list-neurons", neuronIds: args.neuron_ids };
}

/**
 * Decode any governance method the toolkit signs.
 * Returns undefined for methods it does not know.
 */
export function decodeGovernanceCall(
  methodName: string,
  arg: Uint8Array,
): Operation | undefined {
  switch (methodName) {
    case GOVERNANCE_METHODS.stake:
      return decodeNeuronStake(arg);
    case GOVERNANCE_METHODS.manage:
      return decodeNeuronManage(arg);
    case GOVERNANCE_METHODS.list:
      return decodeListNeurons(arg);
    default:
      return undefined;
  }
}

// =============================================================================
// Internal helpers
// =============================================================================

function fromCandidCommand(command: CandidCommand): NeuronCommand {
  if ("Configure" in command) {
    if (command.Configure.operation === undefined) {
      throw malformed(GOVERNANCE_METHODS.manage, "configure operation is missing");
    }
    return fromConfigureOperation(command.Configure.operation);
  }
  if ("Disburse" in command) {
    const to = command.Disburse.to_account;
    return {
      kind: "disburse",
      toAccount: to === undefined ? undefined : accountIdentifierFromBytes(to.hash),
      amount: command.Disburse.amount?.e8s,
    };
  }
  if ("Spawn" in command) {
    return { kind: "spawn", newController: command.Spawn.new_controller };
  }
  if ("Split" in command) {
    return { kind: "split", amount: command.Split.amount_e8s };
  }
  if ("Merge" in command) {
    const source = command.Merge.source_neuron_id;
    if (source === undefined) {
      throw malformed(GOVERNANCE_METHODS.manage, "merge source neuron is missing");
    }
    return { kind: "merge", sourceNeuronId: source.id };
  }
  return { kind: "merge-maturity", percentage: command.MergeMaturity.percentage_to_merge };
}

function fromConfigureOperation(operation: CandidConfigureOperation): NeuronCommand {
  if ("AddHotKey" in operation) {
    const hotKey = operation.AddHotKey.new_hot_key;
    if (hotKey === undefined) throw malformed(GOVERNANCE_METHODS.manage, "hot key is missing");
    return { kind: "add-hot-key", hotKey };
  }
  if ("RemoveHotKey" in operation) {
    const hotKey = operation.RemoveHotKey.hot_key_to_remove;
    if (hotKey === undefined) throw malformed(GOVERNANCE_METHODS.manage, "hot key is missing");
    return { kind: "remove-hot-key", hotKey };
  }
  if ("IncreaseDissolveDelay" in operation) {
    return {
      kind: "increase-dissolve-delay",
      additionalSeconds: operation.IncreaseDissolveDelay.additional_dissolve_delay_seconds,
    };
  }
  if ("StartDissolving" in operation) {
    return { kind: "start-dissolving" };
  }
  return { kind: "stop-dissolving" };
}

function malformed(methodName: string, detail: string): EncodingError {
  return new EncodingError("MALFORMED_ARGUMENT", `Argument of ${methodName}: ${detail}`);
}
