/**
 * Tests for account identifier derivation and validation.
 */

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { Principal } from "@dfinity/principal";
import { InputError, IntegrityError } from "@coldsig/types";
import {
  DEFAULT_SUBACCOUNT,
  deriveAccountIdentifier,
  validateAccountIdentifier,
  parseAccountIdentifier,
  accountIdentifierToBytes,
  accountIdentifierFromBytes,
  checkSubaccount,
  parseSubaccount,
  parsePrincipal,
} from "../src/accounts.js";

/** Account of the anonymous principal with the default subaccount. */
const ANONYMOUS_ACCOUNT =
  "1c7a48ba6a562aa9eaa2481a9049cdf0433b9738c992d698c31d8abf89cadc79";

const LEDGER = Principal.fromText("ryjl3-tyaaa-aaaaa-aaaba-cai");

function flipHexChar(text: string, index: number): string {
  const current = text.charAt(index);
  const replacement = current === "0" ? "1" : "0";
  return text.slice(0, index) + replacement + text.slice(index + 1);
}

describe("deriveAccountIdentifier", () => {
  it("matches the published account of the anonymous principal", () => {
    expect(deriveAccountIdentifier(Principal.anonymous())).toBe(ANONYMOUS_ACCOUNT);
  });

  it("treats an omitted subaccount as all zeros", () => {
    expect(deriveAccountIdentifier(LEDGER)).toBe(
      deriveAccountIdentifier(LEDGER, new Uint8Array(32)),
    );
  });

  it("accepts raw principal bytes", () => {
    expect(deriveAccountIdentifier(LEDGER.toUint8Array())).toBe(deriveAccountIdentifier(LEDGER));
  });

  it("is deterministic", () => {
    const sub = new Uint8Array(32).fill(7);
    expect(deriveAccountIdentifier(LEDGER, sub)).toBe(deriveAccountIdentifier(LEDGER, sub));
  });

  it("differs per subaccount", () => {
    const one = new Uint8Array(32);
    one[31] = 1;
    expect(deriveAccountIdentifier(LEDGER, one)).not.toBe(deriveAccountIdentifier(LEDGER));
  });

  it("is the CRC32 of the SHA-224 hash followed by the hash", () => {
    const account = deriveAccountIdentifier(LEDGER);
    const hash = createHash("sha224")
      .update(Buffer.from("\x0Aaccount-id", "latin1"))
      .update(LEDGER.toUint8Array())
      .update(DEFAULT_SUBACCOUNT)
      .digest("hex");
    expect(account).toHaveLength(64);
    expect(account.slice(8)).toBe(hash);
  });

  it.each([0, 31, 33])("rejects a %i-byte subaccount", (length) => {
    expect(() => deriveAccountIdentifier(LEDGER, new Uint8Array(length))).toThrow(InputError);
  });
});

describe("validateAccountIdentifier", () => {
  it("accepts derived identifiers", () => {
    expect(validateAccountIdentifier(ANONYMOUS_ACCOUNT)).toBe(true);
    expect(validateAccountIdentifier(deriveAccountIdentifier(LEDGER))).toBe(true);
  });

  it("rejects every single-character corruption", () => {
    for (let i = 0; i < ANONYMOUS_ACCOUNT.length; i++) {
      expect(validateAccountIdentifier(flipHexChar(ANONYMOUS_ACCOUNT, i))).toBe(false);
    }
  });

  it("rejects wrong shapes", () => {
    expect(validateAccountIdentifier(ANONYMOUS_ACCOUNT.slice(2))).toBe(false);
    expect(validateAccountIdentifier(ANONYMOUS_ACCOUNT.toUpperCase())).toBe(false);
    expect(validateAccountIdentifier("")).toBe(false);
  });
});

describe("parseAccountIdentifier", () => {
  it("normalises case and whitespace", () => {
    expect(parseAccountIdentifier(` ${ANONYMOUS_ACCOUNT.toUpperCase()} `)).toBe(ANONYMOUS_ACCOUNT);
  });

  it("reports a malformed identifier as an input error", () => {
    try {
      parseAccountIdentifier("not-an-account", "to");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InputError);
      expect((err as InputError).code).toBe("INVALID_ACCOUNT_ID");
    }
  });

  it("reports a checksum mismatch as an integrity error", () => {
    try {
      parseAccountIdentifier(flipHexChar(ANONYMOUS_ACCOUNT, 40), "to");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(IntegrityError);
      expect((err as IntegrityError).code).toBe("CHECKSUM_MISMATCH");
    }
  });
});

describe("account identifier bytes", () => {
  it("round-trips through 32 raw bytes", () => {
    const bytes = accountIdentifierToBytes(ANONYMOUS_ACCOUNT);
    expect(bytes).toHaveLength(32);
    expect(accountIdentifierFromBytes(bytes)).toBe(ANONYMOUS_ACCOUNT);
  });

  it("rejects raw bytes with a bad checksum", () => {
    const bytes = accountIdentifierToBytes(ANONYMOUS_ACCOUNT);
    bytes[0] = (bytes[0] ?? 0) ^ 0xff;
    expect(() => accountIdentifierFromBytes(bytes)).toThrow(IntegrityError);
  });
});

describe("subaccounts", () => {
  it("accepts exactly 32 bytes", () => {
    const sub = new Uint8Array(32).fill(1);
    expect(checkSubaccount(sub)).toBe(sub);
  });

  it.each([0, 31, 33])("rejects %i bytes without padding or truncating", (length) => {
    expect(() => checkSubaccount(new Uint8Array(length))).toThrow(
      `subaccount must be 32 bytes, got ${String(length)}`,
    );
  });

  it("parses 64 hex characters", () => {
    expect(parseSubaccount("01".repeat(32))).toEqual(new Uint8Array(32).fill(1));
  });

  it("rejects non-hex input", () => {
    expect(() => parseSubaccount("zz".repeat(32))).toThrow(InputError);
  });

  it("rejects 31 hex bytes", () => {
    expect(() => parseSubaccount("01".repeat(31))).toThrow(InputError);
  });
});

describe("parsePrincipal", () => {
  it("parses a canister id", () => {
    expect(parsePrincipal("ryjl3-tyaaa-aaaaa-aaaba-cai").toText()).toBe(
      "ryjl3-tyaaa-aaaaa-aaaba-cai",
    );
  });

  it("rejects empty input", () => {
    expect(() => parsePrincipal("  ")).toThrow(InputError);
  });

  it("rejects a principal with a broken checksum", () => {
    expect(() => parsePrincipal("ryjl3-tyaaa-aaaaa-aaaba-caa")).toThrow(InputError);
  });
});
