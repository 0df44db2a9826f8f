/**
 * @coldsig/toolkit — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { Principal } from "@dfinity/principal";
import { GOVERNANCE_CANISTER_ID, LEDGER_CANISTER_ID } from "@coldsig/types";
import {
  DEFAULT_INGRESS_EXPIRY_SECONDS,
  DEFAULT_NONCE_BYTES,
  KEY_SCHEMES,
  MAX_INGRESS_EXPIRY_SECONDS,
} from "@coldsig/signer";

// =============================================================================
// Schema
// =============================================================================

const principalText = z.string().refine(
  (text) => {
    try {
      return Principal.fromText(text).toText() === text;
    } catch {
      return false;
    }
  },
  { message: "Expected a textual principal" },
);

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Signing
  INGRESS_EXPIRY_SECONDS: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_INGRESS_EXPIRY_SECONDS)
    .default(DEFAULT_INGRESS_EXPIRY_SECONDS),
  NONCE_BYTES: z.coerce.number().int().min(8).max(32).default(DEFAULT_NONCE_BYTES),
  KEY_SCHEME: z.enum(KEY_SCHEMES).optional(),

  // Canisters
  LEDGER_CANISTER_ID: principalText.default(LEDGER_CANISTER_ID),
  GOVERNANCE_CANISTER_ID: principalText.default(GOVERNANCE_CANISTER_ID),
});

export type ToolkitConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ToolkitConfig {
  return ConfigSchema.parse(env);
}
