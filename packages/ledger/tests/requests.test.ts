/**
 * Tests for the ledger request builders and their decoders.
 */

import { describe, it, expect } from "vitest";
import { Principal } from "@dfinity/principal";
import { EncodingError, InputError, IntegrityError, LEDGER_CANISTER_ID } from "@coldsig/types";
import { deriveAccountIdentifier } from "../src/accounts.js";
import {
  buildTransfer,
  buildBalanceQuery,
  buildNotify,
  encodeTransfer,
} from "../src/requests.js";
import {
  decodeTransfer,
  decodeBalanceQuery,
  decodeNotify,
  decodeLedgerCall,
} from "../src/decode.js";

const ACCOUNT_B = deriveAccountIdentifier(
  Principal.fromText("rrkah-fqaaa-aaaaa-aaaaq-cai"),
  new Uint8Array(32).fill(2),
);

function firstCall<T extends { calls: readonly unknown[] }>(built: T): T["calls"][number] {
  const [call] = built.calls;
  if (call === undefined) throw new Error("no call built");
  return call;
}

// =============================================================================
// Transfer
// =============================================================================

describe("buildTransfer", () => {
  it("builds a send_dfx update call on the ledger", () => {
    const built = buildTransfer({ to: ACCOUNT_B, amount: "2.5", fee: "0.0001", memo: "42" });

    expect(built.operation).toEqual({
      kind: "transfer",
      to: ACCOUNT_B,
      amount: 250_000_000n,
      fee: 10_000n,
      memo: 42n,
      fromSubaccount: undefined,
      createdAt: undefined,
    });
    expect(built.calls).toHaveLength(1);
    const call = firstCall(built);
    expect(call.canisterId).toBe(LEDGER_CANISTER_ID);
    expect(call.methodName).toBe("send_dfx");
    expect(call.callType).toBe("update");
    expect(Buffer.from(call.arg.subarray(0, 4)).toString("latin1")).toBe("DIDL");
  });

  it("defaults fee to 10000 e8s and memo to 0", () => {
    const { operation } = buildTransfer({ to: ACCOUNT_B, amount: "1" });
    expect(operation.fee).toBe(10_000n);
    expect(operation.memo).toBe(0n);
  });

  it("is idempotent for identical input", () => {
    const input = { to: ACCOUNT_B, amount: "2.5", memo: "42" };
    const a = buildTransfer(input);
    const b = buildTransfer(input);
    expect(a.operation).toEqual(b.operation);
    expect(Buffer.from(firstCall(a).arg).equals(Buffer.from(firstCall(b).arg))).toBe(true);
  });

  it("honours a custom ledger canister", () => {
    const built = buildTransfer(
      { to: ACCOUNT_B, amount: "1" },
      { canisterId: "ryjl3-tyaaa-aaaaa-aaaba-cai" },
    );
    expect(firstCall(built).canisterId).toBe("ryjl3-tyaaa-aaaaa-aaaba-cai");
  });

  it("rejects a destination with a corrupted checksum", () => {
    const corrupted = (ACCOUNT_B.startsWith("0") ? "1" : "0") + ACCOUNT_B.slice(1);
    expect(() => buildTransfer({ to: corrupted, amount: "1" })).toThrow(IntegrityError);
  });

  it("rejects an overflowing memo", () => {
    expect(() =>
      buildTransfer({ to: ACCOUNT_B, amount: "1", memo: "18446744073709551616" }),
    ).toThrow(InputError);
  });

  it("rejects a 31-byte source subaccount", () => {
    expect(() =>
      buildTransfer({ to: ACCOUNT_B, amount: "1", fromSubaccount: "00".repeat(31) }),
    ).toThrow("fromSubaccount must be 32 bytes, got 31");
  });

  it("rejects a negative amount", () => {
    expect(() => buildTransfer({ to: ACCOUNT_B, amount: "-2.5" })).toThrow(InputError);
  });

  it("rejects an amount whose total with the fee exceeds 64 bits", () => {
    let error: unknown;
    try {
      buildTransfer({ to: ACCOUNT_B, amount: "184467440737.09551615" });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(InputError);
    expect(error).toMatchObject({ code: "AMOUNT_OVERFLOW" });
  });

  it("accepts an amount whose total with the fee is exactly the 64-bit maximum", () => {
    const { operation } = buildTransfer({ to: ACCOUNT_B, amount: "184467440737.09541615" });
    expect(operation.amount + operation.fee).toBe(18_446_744_073_709_551_615n);
  });
});

describe("decodeTransfer", () => {
  it("recovers the operation from the Candid argument", () => {
    const built = buildTransfer({
      to: ACCOUNT_B,
      amount: "2.5",
      memo: "42",
      fromSubaccount: "03".repeat(32),
      createdAt: "1700000000000000000",
    });

    const decoded = decodeTransfer(firstCall(built).arg);

    expect(decoded.to).toBe(ACCOUNT_B);
    expect(decoded.amount).toBe(250_000_000n);
    expect(decoded.fee).toBe(10_000n);
    expect(decoded.memo).toBe(42n);
    expect(decoded.fromSubaccount).toEqual(new Uint8Array(32).fill(3));
    expect(decoded.createdAt).toBe(1_700_000_000_000_000_000n);
  });

  it("leaves optional fields undefined when absent", () => {
    const decoded = decodeTransfer(firstCall(buildTransfer({ to: ACCOUNT_B, amount: "1" })).arg);
    expect(decoded.fromSubaccount).toBeUndefined();
    expect(decoded.createdAt).toBeUndefined();
  });

  it("rejects bytes that are not Candid", () => {
    expect(() => decodeTransfer(new Uint8Array([1, 2, 3]))).toThrow(EncodingError);
  });

  it("rejects a Candid argument of another method", () => {
    const balance = firstCall(buildBalanceQuery({ account: ACCOUNT_B }));
    expect(() => decodeTransfer(balance.arg)).toThrow(EncodingError);
  });
});

// =============================================================================
// Balance query
// =============================================================================

describe("buildBalanceQuery", () => {
  it("builds an account_balance_dfx query", () => {
    const built = buildBalanceQuery({ account: ACCOUNT_B.toUpperCase() });
    expect(built.operation).toEqual({ kind: "balance", account: ACCOUNT_B });
    expect(firstCall(built).methodName).toBe("account_balance_dfx");
    expect(firstCall(built).callType).toBe("query");
  });

  it("round-trips through the decoder", () => {
    const built = buildBalanceQuery({ account: ACCOUNT_B });
    expect(decodeBalanceQuery(firstCall(built).arg)).toEqual(built.operation);
  });
});

// =============================================================================
// Notify
// =============================================================================

describe("buildNotify", () => {
  it("builds a notify_dfx update call", () => {
    const built = buildNotify({
      blockHeight: "1234",
      toCanister: "rrkah-fqaaa-aaaaa-aaaaq-cai",
      toSubaccount: "05".repeat(32),
    });

    expect(built.operation).toEqual({
      kind: "notify",
      blockHeight: 1234n,
      maxFee: 10_000n,
      toCanister: "rrkah-fqaaa-aaaaa-aaaaq-cai",
      fromSubaccount: undefined,
      toSubaccount: new Uint8Array(32).fill(5),
    });
    expect(firstCall(built).methodName).toBe("notify_dfx");
  });

  it("round-trips through the decoder", () => {
    const built = buildNotify({
      blockHeight: "99",
      toCanister: "rrkah-fqaaa-aaaaa-aaaaq-cai",
      maxFee: "0.0002",
    });
    expect(decodeNotify(firstCall(built).arg)).toEqual(built.operation);
  });

  it("rejects an invalid canister principal", () => {
    expect(() => buildNotify({ blockHeight: "1", toCanister: "not a principal" })).toThrow(
      InputError,
    );
  });
});

// =============================================================================
// Dispatch
// =============================================================================

describe("decodeLedgerCall", () => {
  it("dispatches on the method name", () => {
    const call = encodeTransfer({
      kind: "transfer",
      to: ACCOUNT_B,
      amount: 5n,
      fee: 10_000n,
      memo: 0n,
    });
    expect(decodeLedgerCall(call.methodName, call.arg)?.kind).toBe("transfer");
  });

  it("returns undefined for unknown methods", () => {
    expect(decodeLedgerCall("icrc1_transfer", new Uint8Array())).toBeUndefined();
  });
});
