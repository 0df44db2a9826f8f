/**
 * Property-Based Tests for @coldsig/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Account derivation is deterministic and validates its own output
 * 2. Any single hex-character corruption is rejected
 * 3. Token parse → format → parse is the identity
 * 4. Checked addition never wraps
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { MAX_NAT64 } from "@coldsig/types";
import { deriveAccountIdentifier, validateAccountIdentifier } from "../src/accounts.js";
import { addE8s, formatTokens, parseTokens } from "../src/money-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** Principals are at most 29 bytes. */
const arbPrincipalBytes = fc.uint8Array({ minLength: 0, maxLength: 29 });

const arbSubaccount = fc.uint8Array({ minLength: 32, maxLength: 32 });

const arbE8s = fc.bigInt({ min: 0n, max: MAX_NAT64 });

const HEX = "0123456789abcdef";

// =============================================================================
// Account identifiers
// =============================================================================

describe("account identifier properties", () => {
  it("derivation is deterministic and self-validating", () => {
    fc.assert(
      fc.property(arbPrincipalBytes, fc.option(arbSubaccount, { nil: undefined }), (p, sub) => {
        const a = deriveAccountIdentifier(p, sub);
        const b = deriveAccountIdentifier(p, sub);
        expect(a).toBe(b);
        expect(validateAccountIdentifier(a)).toBe(true);
      }),
    );
  });

  it("rejects any single-character corruption", () => {
    fc.assert(
      fc.property(
        arbPrincipalBytes,
        arbSubaccount,
        fc.integer({ min: 0, max: 63 }),
        fc.integer({ min: 1, max: 15 }),
        (p, sub, index, shift) => {
          const account = deriveAccountIdentifier(p, sub);
          const original = HEX.indexOf(account.charAt(index));
          const replacement = HEX.charAt((original + shift) % 16);
          const corrupted = account.slice(0, index) + replacement + account.slice(index + 1);
          expect(validateAccountIdentifier(corrupted)).toBe(false);
        },
      ),
    );
  });
});

// =============================================================================
// Token arithmetic
// =============================================================================

describe("token arithmetic properties", () => {
  it("parse(format(x)) === x", () => {
    fc.assert(
      fc.property(arbE8s, (e8s) => {
        expect(parseTokens(formatTokens(e8s))).toBe(e8s);
      }),
    );
  });

  it("addition either fits or throws, never wraps", () => {
    fc.assert(
      fc.property(arbE8s, arbE8s, (a, b) => {
        if (a + b > MAX_NAT64) {
          expect(() => addE8s(a, b)).toThrow();
        } else {
          expect(addE8s(a, b)).toBe(a + b);
        }
      }),
    );
  });
});
