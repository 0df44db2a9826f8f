/**
 * Candid interface of the ledger canister methods the toolkit signs.
 *
 * Only the argument types are declared; a record with fewer optional
 * fields or a variant with fewer tags is a Candid subtype of the
 * canister's own declaration and is accepted as such.
 */

import { IDL } from "@dfinity/candid";

export const Tokens = IDL.Record({ e8s: IDL.Nat64 });

export const SubAccount = IDL.Vec(IDL.Nat8);

export const TimeStamp = IDL.Record({ timestamp_nanos: IDL.Nat64 });

/** `send_dfx` argument; `to` is the textual account identifier. */
export const SendArgs = IDL.Record({
  to: IDL.Text,
  fee: Tokens,
  memo: IDL.Nat64,
  from_subaccount: IDL.Opt(SubAccount),
  created_at_time: IDL.Opt(TimeStamp),
  amount: Tokens,
});

/** `account_balance_dfx` argument. */
export const AccountBalanceArgs = IDL.Record({ account: IDL.Text });

/** `notify_dfx` argument. */
export const NotifyCanisterArgs = IDL.Record({
  to_subaccount: IDL.Opt(SubAccount),
  from_subaccount: IDL.Opt(SubAccount),
  to_canister: IDL.Principal,
  max_fee: Tokens,
  block_height: IDL.Nat64,
});

export const LEDGER_METHODS = {
  transfer: "send_dfx",
  balance: "account_balance_dfx",
  notify: "notify_dfx",
} as const;

export type LedgerMethod = (typeof LEDGER_METHODS)[keyof typeof LEDGER_METHODS];
