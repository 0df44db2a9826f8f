/**
 * @coldsig/types — Shared domain types for the coldsig stack.
 *
 * These types are used across all coldsig packages:
 * - Token primitives (e8s, account identifiers, subaccounts)
 * - Canister calls
 * - The closed Operation union
 * - Error kinds
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  E8s,
  AccountIdentifierHex,
  Subaccount,
} from "./financial.js";
export {
  E8S_PER_TOKEN,
  TOKEN_DECIMALS,
  MAX_NAT64,
  DEFAULT_TRANSFER_FEE,
  SUBACCOUNT_LENGTH,
} from "./financial.js";

// Call types
export type {
  PrincipalText,
  CallType,
  CanisterCall,
} from "./chain.js";
export { LEDGER_CANISTER_ID, GOVERNANCE_CANISTER_ID } from "./chain.js";

// Operation types
export type {
  TransferOperation,
  BalanceQueryOperation,
  NotifyOperation,
  NeuronStakeOperation,
  NeuronCommand,
  NeuronCommandKind,
  NeuronManageOperation,
  ListNeuronsOperation,
  RawCallOperation,
  Operation,
  OperationKind,
  BuiltRequest,
} from "./operation.js";
export { assertNever } from "./operation.js";

// Errors
export type {
  InputErrorCode,
  KeyErrorCode,
  EncodingErrorCode,
  IntegrityErrorCode,
  ColdsigErrorKind,
} from "./errors.js";
export {
  ColdsigError,
  InputError,
  KeyError,
  EncodingError,
  IntegrityError,
} from "./errors.js";

// Runtime type guards
export {
  isNat64,
  isE8s,
  isSubaccount,
  isAccountIdentifierHex,
  isCallType,
  isCanisterCall,
  isOperationKind,
  isNeuronCommandKind,
  isColdsigError,
} from "./guards.js";
