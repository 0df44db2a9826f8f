/**
 * Governance request builders.
 *
 * Neuron staking, neuron management and neuron listing. Like the ledger
 * builders, these are pure: user input in, typed operations and
 * Candid-encoded calls out.
 */

import {
  DEFAULT_TRANSFER_FEE,
  GOVERNANCE_CANISTER_ID,
  InputError,
  assertNever,
  isNeuronCommandKind,
} from "@coldsig/types";
import type {
  BuiltRequest,
  CanisterCall,
  ListNeuronsOperation,
  NeuronCommand,
  NeuronManageOperation,
  NeuronStakeOperation,
  TransferOperation,
} from "@coldsig/types";
import {
  accountIdentifierToBytes,
  assertE8s,
  deriveAccountIdentifier,
  encodeArg,
  encodeTransfer,
  opt,
  parseAccountIdentifier,
  parseNat64,
  parsePrincipal,
  parseTokens,
} from "@coldsig/ledger";
import {
  ClaimOrRefreshNeuronFromAccount,
  GOVERNANCE_METHODS,
  ListNeurons,
  ManageNeuron,
} from "./governance-idl.js";
import { computeNeuronStakingSubaccount, neuronNameToNonce } from "./staking.js";
import type {
  GovernanceCallOptions,
  ListNeuronsInput,
  NeuronCommandInput,
  NeuronManageInput,
  NeuronStakeInput,
} from "./types.js";

const MAX_NAT32 = 0xffff_ffff;

// =============================================================================
// Neuron stake
// =============================================================================

/**
 * Build a neuron stake: an optional funding transfer to the staking
 * subaccount, then `claim_or_refresh_neuron_from_account`.
 *
 * The transfer memo is the neuron nonce.
 */
export function buildNeuronStake(
  input: NeuronStakeInput,
  options: GovernanceCallOptions = {},
): BuiltRequest<NeuronStakeOperation> {
  const controller = parsePrincipal(input.controller, "controller");
  const nonce = resolveNonce(input);
  const governance = options.governanceCanisterId ?? GOVERNANCE_CANISTER_ID;

  let transfer: TransferOperation | undefined;
  if (input.amount !== undefined) {
    transfer = {
      kind: "transfer",
      to: deriveAccountIdentifier(
        parsePrincipal(governance, "governanceCanisterId"),
        computeNeuronStakingSubaccount(controller, nonce),
      ),
      amount: parseTokens(input.amount, "amount"),
      fee: input.fee === undefined ? DEFAULT_TRANSFER_FEE : parseTokens(input.fee, "fee"),
      memo: nonce,
    };
    assertE8s(transfer.amount + transfer.fee, "amount plus fee");
  }

  const operation: NeuronStakeOperation = {
    kind: "neuron-stake",
    controller: controller.toText(),
    nonce,
    transfer,
  };

  return { operation, calls: encodeNeuronStake(operation, options) };
}

/**
 * Encode a neuron stake; the funding transfer, when present, comes first.
 */
export function encodeNeuronStake(
  operation: NeuronStakeOperation,
  options: GovernanceCallOptions = {},
): readonly CanisterCall[] {
  const claim: CanisterCall = {
    canisterId: options.governanceCanisterId ?? GOVERNANCE_CANISTER_ID,
    methodName: GOVERNANCE_METHODS.stake,
    arg: encodeArg(ClaimOrRefreshNeuronFromAccount, {
      controller: [parsePrincipal(operation.controller, "controller")],
      memo: operation.nonce,
    }),
    callType: "update",
  };

  if (operation.transfer === undefined) {
    return [claim];
  }
  return [
    encodeTransfer(operation.transfer, { canisterId: options.ledgerCanisterId }),
    claim,
  ];
}

function resolveNonce(input: NeuronStakeInput): bigint {
  if (input.nonce !== undefined && input.name !== undefined) {
    throw new InputError("INVALID_COMMAND", "Specify either a neuron nonce or a name, not both");
  }
  if (input.nonce !== undefined) {
    return parseNat64(input.nonce, "nonce");
  }
  if (input.name !== undefined) {
    return neuronNameToNonce(input.name);
  }
  throw new InputError("MISSING_FIELD", "Either a nonce or a name should be specified");
}

// =============================================================================
// Neuron manage
// =============================================================================

/**
 * Build one `manage_neuron` request per requested command, in input order.
 *
 * @throws InputError INVALID_COMMAND if no command is given or a kind is unknown
 */
export function buildNeuronManage(
  input: NeuronManageInput,
  options: GovernanceCallOptions = {},
): readonly BuiltRequest<NeuronManageOperation>[] {
  const neuronId = parseNeuronId(input.neuronId, "neuronId");

  if (input.commands.length === 0) {
    throw new InputError("INVALID_COMMAND", "No instructions provided");
  }

  return input.commands.map((commandInput) => {
    const operation: NeuronManageOperation = {
      kind: "neuron-manage",
      neuronId,
      command: parseNeuronCommand(commandInput),
    };
    return { operation, calls: [encodeNeuronManage(operation, options)] };
  });
}

/**
 * Encode a neuron command as a `manage_neuron` update call.
 */
export function encodeNeuronManage(
  operation: NeuronManageOperation,
  options: GovernanceCallOptions = {},
): CanisterCall {
  return {
    canisterId: options.governanceCanisterId ?? GOVERNANCE_CANISTER_ID,
    methodName: GOVERNANCE_METHODS.manage,
    arg: encodeArg(ManageNeuron, {
      id: [{ id: operation.neuronId }],
      command: [toCandidCommand(operation.command)],
      neuron_id_or_subaccount: [],
    }),
    callType: "update",
  };
}

/**
 * Validate one loosely typed command against the recognised set.
 */
export function parseNeuronCommand(input: NeuronCommandInput): NeuronCommand {
  const kind = input.kind.trim();
  if (!isNeuronCommandKind(kind)) {
    throw new InputError("INVALID_COMMAND", `Unknown neuron command "${input.kind}"`);
  }

  switch (kind) {
    case "add-hot-key":
      return { kind, hotKey: parsePrincipal(required(input.hotKey, "hotKey"), "hotKey").toText() };
    case "remove-hot-key":
      return { kind, hotKey: parsePrincipal(required(input.hotKey, "hotKey"), "hotKey").toText() };
    case "increase-dissolve-delay":
      return { kind, additionalSeconds: parseNat32(required(input.seconds, "seconds"), "seconds") };
    case "start-dissolving":
    case "stop-dissolving":
      return { kind };
    case "disburse":
      return {
        kind,
        toAccount:
          input.toAccount === undefined
            ? undefined
            : parseAccountIdentifier(input.toAccount, "toAccount"),
        amount: input.amount === undefined ? undefined : parseTokens(input.amount, "amount"),
      };
    case "spawn":
      return {
        kind,
        newController:
          input.newController === undefined
            ? undefined
            : parsePrincipal(input.newController, "newController").toText(),
      };
    case "split":
      return { kind, amount: parseTokens(required(input.amount, "amount"), "amount") };
    case "merge":
      return {
        kind,
        sourceNeuronId: parseNeuronId(
          required(input.sourceNeuronId, "sourceNeuronId"),
          "sourceNeuronId",
        ),
      };
    case "merge-maturity": {
      const percentage = parseNat32(required(input.percentage, "percentage"), "percentage");
      if (percentage === 0 || percentage > 100) {
        throw new InputError(
          "INVALID_COMMAND",
          "Percentage to merge must be a number from 1 to 100",
        );
      }
      return { kind, percentage };
    }
    default:
      return assertNever(kind, "neuron command");
  }
}

function toCandidCommand(command: NeuronCommand): Record<string, unknown> {
  switch (command.kind) {
    case "add-hot-key":
      return configure({
        AddHotKey: { new_hot_key: [parsePrincipal(command.hotKey, "hotKey")] },
      });
    case "remove-hot-key":
      return configure({
        RemoveHotKey: { hot_key_to_remove: [parsePrincipal(command.hotKey, "hotKey")] },
      });
    case "increase-dissolve-delay":
      return configure({
        IncreaseDissolveDelay: { additional_dissolve_delay_seconds: command.additionalSeconds },
      });
    case "start-dissolving":
      return configure({ StartDissolving: {} });
    case "stop-dissolving":
      return configure({ StopDissolving: {} });
    case "disburse":
      return {
        Disburse: {
          to_account: opt(
            command.toAccount === undefined
              ? undefined
              : { hash: Array.from(accountIdentifierToBytes(command.toAccount)) },
          ),
          amount: opt(command.amount === undefined ? undefined : { e8s: command.amount }),
        },
      };
    case "spawn":
      return {
        Spawn: {
          new_controller: opt(
            command.newController === undefined
              ? undefined
              : parsePrincipal(command.newController, "newController"),
          ),
        },
      };
    case "split":
      return { Split: { amount_e8s: command.amount } };
    case "merge":
      return { Merge: { source_neuron_id: [{ id: command.sourceNeuronId }] } };
    case "merge-maturity":
      return { MergeMaturity: { percentage_to_merge: command.percentage } };
    default:
      return assertNever(command, "neuron command");
  }
}

function configure(operation: Record<string, unknown>): Record<string, unknown> {
  return { Configure: { operation: [operation] } };
}

// =============================================================================
// List neurons
// =============================================================================

/**
 * Build a `list_neurons` query. Without ids it lists every neuron the
 * caller may read.
 */
export function buildListNeurons(
  input: ListNeuronsInput = {},
  options: GovernanceCallOptions = {},
): BuiltRequest<ListNeuronsOperation> {
  const operation: ListNeuronsOperation = {
    kind: "list-neurons",
    neuronIds: (input.neuronIds ?? []).map((id) => parseNeuronId(id, "neuronIds")),
  };
  return { operation, calls: [encodeListNeurons(operation, options)] };
}

export function encodeListNeurons(
  operation: ListNeuronsOperation,
  options: GovernanceCallOptions = {},
): CanisterCall {
  return {
    canisterId: options.governanceCanisterId ?? GOVERNANCE_CANISTER_ID,
    methodName: GOVERNANCE_METHODS.list,
    arg: encodeArg(ListNeurons, {
      neuron_ids: [...operation.neuronIds],
      include_neurons_readable_by_caller: operation.neuronIds.length === 0,
    }),
    callType: "query",
  };
}

// =============================================================================
// Internal helpers
// =============================================================================

/**
 * Neuron ids may be written with `_` separators ("1_234_567").
 */
export function parseNeuronId(text: string, field: string): bigint {
  return parseNat64(text.replace(/_/g, ""), field);
}

function parseNat32(text: string, field: string): number {
  const value = parseNat64(text, field);
  if (value > BigInt(MAX_NAT32)) {
    throw new InputError("INVALID_NAT", `${field} "${text}" does not fit in 32 bits`);
  }
  return Number(value);
}

function required(value: string | undefined, field: string): string {
  if (value === undefined) {
    throw new InputError("MISSING_FIELD", `${field} is required`);
  }
  return value;
}
