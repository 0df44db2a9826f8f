/**
 * Request id tests
 *
 * Known answers, the map permutation law and omission semantics.
 */
import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import fc from "fast-check";
import { hashValue, lebEncode, requestIdOf } from "../src/request-id.js";
import type { ContentMap } from "../src/request-id.js";

const hex = (bytes: Uint8Array): string => Buffer.from(bytes).toString("hex");

describe("lebEncode", () => {
  it("encodes small and multi-byte values", () => {
    expect(hex(lebEncode(0n))).toBe("00");
    expect(hex(lebEncode(127n))).toBe("7f");
    expect(hex(lebEncode(128n))).toBe("8001");
    expect(hex(lebEncode(624485n))).toBe("e58e26");
  });

  it("encodes u64::MAX in ten bytes", () => {
    expect(hex(lebEncode(0xffff_ffff_ffff_ffffn))).toBe("ffffffffffffffffff01");
  });

  it("rejects negative values", () => {
    expect(() => lebEncode(-1n)).toThrow("negative");
  });
});

describe("requestIdOf", () => {
  it("matches the published request id of a hello call", () => {
    const content: ContentMap = {
      request_type: "call",
      canister_id: Uint8Array.from(Buffer.from("00000000000004D2", "hex")),
      method_name: "hello",
      arg: Uint8Array.from(Buffer.from("4449444c00fd2a", "hex")),
    };

    expect(hex(requestIdOf(content))).toBe(
      "8781291c347db32a9d8c10eb62b710fce5a93be676474c42babc74c51858f94b",
    );
  });

  it("hashes numbers and bigints alike", () => {
    expect(hex(hashValue(1_000))).toBe(hex(hashValue(1_000n)));
  });

  it("rejects fractional numbers", () => {
    expect(() => hashValue(1.5)).toThrow("non-integer");
  });

  it("skips undefined entries", () => {
    const base = { method_name: "send_dfx", ingress_expiry: 10n };
    expect(hex(requestIdOf({ ...base, nonce: undefined }))).toBe(hex(requestIdOf(base)));
  });

  it("does not confuse an omitted field with an empty one", () => {
    const base = { method_name: "send_dfx", ingress_expiry: 10n };
    expect(hex(requestIdOf({ ...base, nonce: new Uint8Array() }))).not.toBe(
      hex(requestIdOf(base)),
    );
  });

  it("hashes nested arrays element by element", () => {
    const label = Uint8Array.from(Buffer.from("request_status"));
    const id = new Uint8Array(32);
    const sha256 = (data: Uint8Array): Buffer => createHash("sha256").update(data).digest();

    const expected = sha256(sha256(Buffer.concat([sha256(label), sha256(id)])));
    expect(hex(hashValue([[label, id]]))).toBe(expected.toString("hex"));
  });
});

// =============================================================================
// Properties
// =============================================================================

const entryArb = fc.tuple(
  fc.string({ minLength: 1, maxLength: 12 }),
  fc.oneof(
    fc.string({ maxLength: 16 }),
    fc.bigInt({ min: 0n, max: 0xffff_ffff_ffff_ffffn }),
    fc.uint8Array({ maxLength: 32 }),
  ),
);

describe("requestIdOf properties", () => {
  it("is invariant under field construction order", () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(entryArb, { selector: ([key]) => key, minLength: 1, maxLength: 8 }),
        (entries) => {
          const forward = Object.fromEntries(entries);
          const backward = Object.fromEntries([...entries].reverse());

          expect(hex(requestIdOf(forward))).toBe(hex(requestIdOf(backward)));
        },
      ),
    );
  });

  it("changes when a nat field moves by one", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 0xffff_ffff_ffff_fffen }), (amount) => {
        const a = requestIdOf({ method_name: "send_dfx", amount });
        const b = requestIdOf({ method_name: "send_dfx", amount: amount + 1n });
        expect(hex(a)).not.toBe(hex(b));
      }),
    );
  });
});
