/**
 * Operation dispatch.
 *
 * The set of operations is closed: encoding into canister calls and
 * decoding back out of them both switch over every kind.
 */

import { InputError, assertNever } from "@coldsig/types";
import type {
  BuiltRequest,
  CallType,
  CanisterCall,
  Operation,
  PrincipalText,
  RawCallOperation,
} from "@coldsig/types";
import {
  decodeLedgerCall,
  encodeBalanceQuery,
  encodeNotify,
  encodeTransfer,
  parsePrincipal,
} from "@coldsig/ledger";
import {
  decodeGovernanceCall,
  encodeListNeurons,
  encodeNeuronManage,
  encodeNeuronStake,
} from "@coldsig/governance";

/**
 * Canisters the toolkit routes operations to.
 */
export interface CanisterTargets {
  readonly ledgerCanisterId: PrincipalText;
  readonly governanceCanisterId: PrincipalText;
}

/**
 * Loose input for a call to any canister method.
 */
export interface RawCallInput {
  readonly canisterId: string;
  readonly methodName: string;
  /** Candid-encoded argument, hex */
  readonly argHex: string;
  readonly callType?: string | undefined;
}

// =============================================================================
// Encode
// =============================================================================

/**
 * Canister calls that carry an operation, in submission order.
 */
export function encodeOperation(
  operation: Operation,
  targets: CanisterTargets,
): readonly CanisterCall[] {
  const ledger = { canisterId: targets.ledgerCanisterId };
  const governance = {
    governanceCanisterId: targets.governanceCanisterId,
    ledgerCanisterId: targets.ledgerCanisterId,
  };

  switch (operation.kind) {
    case "transfer":
      return [encodeTransfer(operation, ledger)];
    case "balance":
      return [encodeBalanceQuery(operation, ledger)];
    case "notify":
      return [encodeNotify(operation, ledger)];
    case "neuron-stake":
      return encodeNeuronStake(operation, governance);
    case "neuron-manage":
      return [encodeNeuronManage(operation, governance)];
    case "list-neurons":
      return [encodeListNeurons(operation, governance)];
    case "raw":
      return [
        {
          canisterId: operation.canisterId,
          methodName: operation.methodName,
          arg: operation.arg,
          callType: operation.callType,
        },
      ];
    default:
      return assertNever(operation, "operation");
  }
}

// =============================================================================
// Decode
// =============================================================================

/**
 * Recover the operation a canister call carries. Methods of the
 * configured ledger and governance canisters decode to their typed
 * operation; anything else is a raw call.
 *
 * @throws EncodingError MALFORMED_ARGUMENT if a known method's argument is malformed
 */
export function decodeCall(
  call: CanisterCall,
  targets: CanisterTargets,
): Operation {
  let decoded: Operation | undefined;
  if (call.canisterId === targets.ledgerCanisterId) {
    decoded = decodeLedgerCall(call.methodName, call.arg);
  } else if (call.canisterId === targets.governanceCanisterId) {
    decoded = decodeGovernanceCall(call.methodName, call.arg);
  }

  return decoded ?? { kind: "raw", ...call };
}

// =============================================================================
// Raw calls
// =============================================================================

/**
 * Build a call to an arbitrary canister method from pre-encoded Candid.
 */
export function buildRawCall(input: RawCallInput): BuiltRequest<RawCallOperation> {
  const argHex = input.argHex.trim();
  if (!/^([0-9a-fA-F]{2})*$/.test(argHex)) {
    throw new InputError("INVALID_ARGUMENT", `argHex "${input.argHex}" is not hex`);
  }
  const methodName = input.methodName.trim();
  if (methodName === "") {
    throw new InputError("MISSING_FIELD", "methodName is required");
  }

  const operation: RawCallOperation = {
    kind: "raw",
    canisterId: parsePrincipal(input.canisterId, "canisterId").toText(),
    methodName,
    arg: Uint8Array.from(Buffer.from(argHex, "hex")),
    callType: parseCallType(input.callType),
  };

  return {
    operation,
    calls: [
      {
        canisterId: operation.canisterId,
        methodName: operation.methodName,
        arg: operation.arg,
        callType: operation.callType,
      },
    ],
  };
}

function parseCallType(text: string | undefined): CallType {
  const value = (text ?? "update").trim();
  if (value === "update" || value === "query") {
    return value;
  }
  throw new InputError("INVALID_COMMAND", `Call type must be "update" or "query", got "${value}"`);
}

