/**
 * Ledger call decoding.
 *
 * Turns the Candid argument of a signed ledger call back into the typed
 * operation, so a dry run can show what was signed without the key.
 */

import { z } from "zod";
import type {
  BalanceQueryOperation,
  NotifyOperation,
  Operation,
  TransferOperation,
} from "@coldsig/types";
import {
  bytesSchema,
  decodeArg,
  nat64Schema,
  optSchema,
  principalSchema,
  tokensSchema,
} from "./candid-values.js";
import {
  AccountBalanceArgs,
  LEDGER_METHODS,
  NotifyCanisterArgs,
  SendArgs,
} from "./ledger-idl.js";

const sendArgsSchema = z.object({
  to: z.string(),
  fee: tokensSchema,
  memo: nat64Schema,
  from_subaccount: optSchema(bytesSchema),
  created_at_time: optSchema(z.object({ timestamp_nanos: nat64Schema })),
  amount: tokensSchema,
});

const accountBalanceArgsSchema = z.object({ account: z.string() });

const notifyArgsSchema = z.object({
  to_subaccount: optSchema(bytesSchema),
  from_subaccount: optSchema(bytesSchema),
  to_canister: principalSchema,
  max_fee: tokensSchema,
  block_height: nat64Schema,
});

/**
 * Decode a `send_dfx` argument.
 */
export function decodeTransfer(arg: Uint8Array): TransferOperation {
  const args = decodeArg(SendArgs, sendArgsSchema, arg, LEDGER_METHODS.transfer);
  return {
    kind: "transfer",
    to: args.to,
    amount: args.amount.e8s,
    fee: args.fee.e8s,
    memo: args.memo,
    fromSubaccount: args.from_subaccount,
    createdAt: args.created_at_time?.timestamp_nanos,
  };
}

/**
 * Decode an `account_balance_dfx` argument.
 */
export function decodeBalanceQuery(arg: Uint8Array): BalanceQueryOperation {
  const args = decodeArg(
    AccountBalanceArgs,
    accountBalanceArgsSchema,
    arg,
    LEDGER_METHODS.balance,
  );
  return { kind: "balance", account: args.account };
}

/**
 * Decode a `notify_dfx` argument.
 */
export function decodeNotify(arg: Uint8Array): NotifyOperation {
  const args = decodeArg(NotifyCanisterArgs, notifyArgsSchema, arg, LEDGER_METHODS.notify);
  return {
    kind: "notify",
    blockHeight: args.block_height,
    maxFee: args.max_fee.e8s,
    toCanister: args.to_canister,
    fromSubaccount: args.from_subaccount,
    toSubaccount: args.to_subaccount,
  };
}

/**
 * Decode any ledger method the toolkit signs.
 * Returns undefined for methods it does not know.
 */
export function decodeLedgerCall(methodName: string, arg: Uint8Array): Operation | undefined {
  switch (methodName) {
    case LEDGER_METHODS.transfer:
      return decodeTransfer(arg);
    case LEDGER_METHODS.balance:
      return decodeBalanceQuery(arg);
    case LEDGER_METHODS.notify:
      return decodeNotify(arg);
    default:
      return undefined;
  }
}
