/**
 * @coldsig/ledger — ICP ledger requests.
 *
 * Account identifiers, token arithmetic and the ledger canister calls
 * the toolkit signs offline:
 * - send_dfx (transfer)
 * - account_balance_dfx (balance query)
 * - notify_dfx (notify)
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Fail-closed: invalid input throws, never silently defaults
 * - Account identifiers are bit-exact with the ledger canister
 */

// Token arithmetic
export {
  parseNat64,
  parseE8s,
  parseTokens,
  formatTokens,
  assertE8s,
  addE8s,
  subtractE8s,
} from "./money-math.js";

// Account identifiers
export {
  DEFAULT_SUBACCOUNT,
  deriveAccountIdentifier,
  validateAccountIdentifier,
  parseAccountIdentifier,
  accountIdentifierToBytes,
  accountIdentifierFromBytes,
  checkSubaccount,
  parseSubaccount,
  parsePrincipal,
} from "./accounts.js";

// Candid helpers
export {
  nat64Schema,
  nat32Schema,
  bytesSchema,
  principalSchema,
  tokensSchema,
  optSchema,
  opt,
  encodeArg,
  decodeArg,
} from "./candid-values.js";

// Candid interface
export {
  Tokens,
  SubAccount,
  TimeStamp,
  SendArgs,
  AccountBalanceArgs,
  NotifyCanisterArgs,
  LEDGER_METHODS,
} from "./ledger-idl.js";
export type { LedgerMethod } from "./ledger-idl.js";

// Request builders
export {
  buildTransfer,
  encodeTransfer,
  buildBalanceQuery,
  encodeBalanceQuery,
  buildNotify,
  encodeNotify,
} from "./requests.js";

// Decoding
export {
  decodeTransfer,
  decodeBalanceQuery,
  decodeNotify,
  decodeLedgerCall,
} from "./decode.js";

// Types
export type {
  LedgerCallOptions,
  TransferInput,
  BalanceQueryInput,
  NotifyInput,
} from "./types.js";
