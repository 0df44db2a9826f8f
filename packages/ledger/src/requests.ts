/**
 * Ledger request builders.
 *
 * Each builder validates loose user input, returns the typed operation
 * and the Candid-encoded canister call that carries it. Pure data
 * transformation: no keys, no clock, no network.
 */

import {
  DEFAULT_TRANSFER_FEE,
  LEDGER_CANISTER_ID,
} from "@coldsig/types";
import type {
  BalanceQueryOperation,
  BuiltRequest,
  CanisterCall,
  NotifyOperation,
  TransferOperation,
} from "@coldsig/types";
import { assertE8s, parseNat64, parseTokens } from "./money-math.js";
import {
  parseAccountIdentifier,
  parsePrincipal,
  parseSubaccount,
} from "./accounts.js";
import { encodeArg, opt } from "./candid-values.js";
import {
  AccountBalanceArgs,
  LEDGER_METHODS,
  NotifyCanisterArgs,
  SendArgs,
} from "./ledger-idl.js";
import type {
  BalanceQueryInput,
  LedgerCallOptions,
  NotifyInput,
  TransferInput,
} from "./types.js";

// =============================================================================
// Transfer
// =============================================================================

/**
 * Build a transfer from user input.
 *
 * @throws InputError on a malformed amount, fee, memo or subaccount, or
 *   AMOUNT_OVERFLOW if amount plus fee does not fit in 64 bits
 * @throws IntegrityError if the destination checksum does not match
 */
export function buildTransfer(
  input: TransferInput,
  options: LedgerCallOptions = {},
): BuiltRequest<TransferOperation> {
  const operation: TransferOperation = {
    kind: "transfer",
    to: parseAccountIdentifier(input.to, "to"),
    amount: parseTokens(input.amount, "amount"),
    fee: input.fee === undefined ? DEFAULT_TRANSFER_FEE : parseTokens(input.fee, "fee"),
    memo: input.memo === undefined ? 0n : parseNat64(input.memo, "memo"),
    fromSubaccount:
      input.fromSubaccount === undefined
        ? undefined
        : parseSubaccount(input.fromSubaccount, "fromSubaccount"),
    createdAt:
      input.createdAt === undefined ? undefined : parseNat64(input.createdAt, "createdAt"),
  };
  assertE8s(operation.amount + operation.fee, "amount plus fee");

  return { operation, calls: [encodeTransfer(operation, options)] };
}

/**
 * Encode a transfer as a `send_dfx` update call.
 */
export function encodeTransfer(
  operation: TransferOperation,
  options: LedgerCallOptions = {},
): CanisterCall {
  const arg = encodeArg(SendArgs, {
    to: operation.to,
    fee: { e8s: operation.fee },
    memo: operation.memo,
    from_subaccount: opt(
      operation.fromSubaccount === undefined ? undefined : Array.from(operation.fromSubaccount),
    ),
    created_at_time: opt(
      operation.createdAt === undefined ? undefined : { timestamp_nanos: operation.createdAt },
    ),
    amount: { e8s: operation.amount },
  });

  return {
    canisterId: options.canisterId ?? LEDGER_CANISTER_ID,
    methodName: LEDGER_METHODS.transfer,
    arg,
    callType: "update",
  };
}

// =============================================================================
// Balance query
// =============================================================================

/**
 * Build an account balance query from user input.
 */
export function buildBalanceQuery(
  input: BalanceQueryInput,
  options: LedgerCallOptions = {},
): BuiltRequest<BalanceQueryOperation> {
  const operation: BalanceQueryOperation = {
    kind: "balance",
    account: parseAccountIdentifier(input.account, "account"),
  };

  return { operation, calls: [encodeBalanceQuery(operation, options)] };
}

/**
 * Encode a balance query as an `account_balance_dfx` query call.
 */
export function encodeBalanceQuery(
  operation: BalanceQueryOperation,
  options: LedgerCallOptions = {},
): CanisterCall {
  return {
    canisterId: options.canisterId ?? LEDGER_CANISTER_ID,
    methodName: LEDGER_METHODS.balance,
    arg: encodeArg(AccountBalanceArgs, { account: operation.account }),
    callType: "query",
  };
}

// =============================================================================
// Notify
// =============================================================================

/**
 * Build a notify call from user input.
 */
export function buildNotify(
  input: NotifyInput,
  options: LedgerCallOptions = {},
): BuiltRequest<NotifyOperation> {
  const operation: NotifyOperation = {
    kind: "notify",
    blockHeight: parseNat64(input.blockHeight, "blockHeight"),
    maxFee:
      input.maxFee === undefined ? DEFAULT_TRANSFER_FEE : parseTokens(input.maxFee, "maxFee"),
    toCanister: parsePrincipal(input.toCanister, "toCanister").toText(),
    fromSubaccount:
      input.fromSubaccount === undefined
        ? undefined
        : parseSubaccount(input.fromSubaccount, "fromSubaccount"),
    toSubaccount:
      input.toSubaccount === undefined
        ? undefined
        : parseSubaccount(input.toSubaccount, "toSubaccount"),
  };

  return { operation, calls: [encodeNotify(operation, options)] };
}

/**
 * Encode a notify operation as a `notify_dfx` update call.
 */
export function encodeNotify(
  operation: NotifyOperation,
  options: LedgerCallOptions = {},
): CanisterCall {
  const arg = encodeArg(NotifyCanisterArgs, {
    to_subaccount: opt(
      operation.toSubaccount === undefined ? undefined : Array.from(operation.toSubaccount),
    ),
    from_subaccount: opt(
      operation.fromSubaccount === undefined ? undefined : Array.from(operation.fromSubaccount),
    ),
    to_canister: parsePrincipal(operation.toCanister, "toCanister"),
    max_fee: { e8s: operation.maxFee },
    block_height: operation.blockHeight,
  });

  return {
    canisterId: options.canisterId ?? LEDGER_CANISTER_ID,
    methodName: LEDGER_METHODS.notify,
    arg,
    callType: "update",
  };
}
