/**
 * Runtime Type Guards
 *
 * Narrowing functions for coldsig domain types.
 * These enable safe runtime validation at system boundaries
 * (user input, decoded envelopes, message files).
 */

import { MAX_NAT64, SUBACCOUNT_LENGTH } from "./financial.js";
import type { E8s, Subaccount } from "./financial.js";
import type { CallType, CanisterCall } from "./chain.js";
import type { NeuronCommandKind, OperationKind } from "./operation.js";
import { ColdsigError } from "./errors.js";

// =============================================================================
// Financial guards
// =============================================================================

export function isNat64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= MAX_NAT64;
}

export function isE8s(value: unknown): value is E8s {
  return isNat64(value);
}

export function isSubaccount(value: unknown): value is Subaccount {
  return value instanceof Uint8Array && value.length === SUBACCOUNT_LENGTH;
}

const ACCOUNT_ID_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Shape check only; checksum verification lives with the derivation.
 */
export function isAccountIdentifierHex(value: unknown): value is string {
  return typeof value === "string" && ACCOUNT_ID_PATTERN.test(value);
}

// =============================================================================
// Call guards
// =============================================================================

const CALL_TYPES = new Set<string>(["update", "query"]);

export function isCallType(value: unknown): value is CallType {
  return typeof value === "string" && CALL_TYPES.has(value);
}

export function isCanisterCall(value: unknown): value is CanisterCall {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.canisterId === "string" &&
    v.canisterId.length > 0 &&
    typeof v.methodName === "string" &&
    v.methodName.length > 0 &&
    v.arg instanceof Uint8Array &&
    isCallType(v.callType)
  );
}

// =============================================================================
// Operation guards
// =============================================================================

const OPERATION_KINDS = new Set<string>([
  "transfer",
  "balance",
  "notify",
  "neuron-stake",
  "neuron-manage",
  "list-neurons",
  "raw",
]);

export function isOperationKind(value: unknown): value is OperationKind {
  return typeof value === "string" && OPERATION_KINDS.has(value);
}

const NEURON_COMMAND_KINDS = new Set<string>([
  "add-hot-key",
  "remove-hot-key",
  "increase-dissolve-delay",
  "start-dissolving",
  "stop-dissolving",
  "disburse",
  "spawn",
  "split",
  "merge",
  "merge-maturity",
]);

export function isNeuronCommandKind(value: unknown): value is NeuronCommandKind {
  return typeof value === "string" && NEURON_COMMAND_KINDS.has(value);
}

// =============================================================================
// Error guards
// =============================================================================

export function isColdsigError(value: unknown): value is ColdsigError {
  return value instanceof ColdsigError;
}
