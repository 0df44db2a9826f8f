/**
 * Configuration tests
 */
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";
import { createLogger } from "../src/logger.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "production",
      INGRESS_EXPIRY_SECONDS: 240,
      NONCE_BYTES: 16,
      LEDGER_CANISTER_ID: "ryjl3-tyaaa-aaaaa-aaaba-cai",
      GOVERNANCE_CANISTER_ID: "rrkah-fqaaa-aaaaa-aaaaq-cai",
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ INGRESS_EXPIRY_SECONDS: "120", NONCE_BYTES: "8" });
    expect(config.INGRESS_EXPIRY_SECONDS).toBe(120);
    expect(config.NONCE_BYTES).toBe(8);
  });

  it("accepts a key scheme", () => {
    expect(loadConfig({ KEY_SCHEME: "secp256k1" }).KEY_SCHEME).toBe("secp256k1");
  });

  it("rejects an expiry window beyond 300 seconds", () => {
    expect(() => loadConfig({ INGRESS_EXPIRY_SECONDS: "301" })).toThrow(ZodError);
  });

  it("rejects a short nonce", () => {
    expect(() => loadConfig({ NONCE_BYTES: "4" })).toThrow(ZodError);
  });

  it("rejects an unknown key scheme", () => {
    expect(() => loadConfig({ KEY_SCHEME: "rsa" })).toThrow(ZodError);
  });

  it("rejects a canister id that is not a principal", () => {
    expect(() => loadConfig({ LEDGER_CANISTER_ID: "ledger" })).toThrow(ZodError);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});

describe("createLogger", () => {
  it("logs at the configured level", () => {
    const logger = createLogger({ LOG_LEVEL: "warn", NODE_ENV: "test" });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
  });
});
