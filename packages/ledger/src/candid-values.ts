/**
 * Candid value helpers.
 *
 * `IDL.decode` returns loosely typed values; the zod schemas here narrow
 * them into the shapes the decoders expect:
 * - nat64 → bigint
 * - opt T → T | undefined
 * - vec nat8 → Uint8Array (whichever representation the decoder produced)
 * - principal → textual principal
 */

import { IDL } from "@dfinity/candid";
import { z } from "zod";
import { EncodingError } from "@coldsig/types";

// =============================================================================
// Schemas
// =============================================================================

export const nat64Schema = z.bigint().nonnegative();

export const nat32Schema = z.number().int().nonnegative();

export const bytesSchema = z
  .union([z.instanceof(Uint8Array), z.array(z.number().int().min(0).max(255))])
  .transform((b) => Uint8Array.from(b));

export const principalSchema = z
  .custom<{ toText(): string }>(
    (v) =>
      typeof v === "object" && v !== null && "toText" in v && typeof v.toText === "function",
    { message: "Expected a principal" },
  )
  .transform((p) => p.toText());

export const tokensSchema = z.object({ e8s: nat64Schema });

/**
 * Candid `opt T` decodes to `[]` or `[value]`.
 */
export function optSchema<T extends z.ZodTypeAny>(inner: T) {
  return z
    .union([z.tuple([]), z.tuple([inner])])
    .transform((v): z.output<T> | undefined => (v.length === 1 ? v[0] : undefined));
}

/**
 * Candid `opt T` encodes from `[]` or `[value]`.
 */
export function opt<T>(value: T | undefined): [] | [T] {
  return value === undefined ? [] : [value];
}

// =============================================================================
// Encode / decode
// =============================================================================

/**
 * Encode a single Candid argument.
 */
export function encodeArg(type: IDL.Type, value: unknown): Uint8Array {
  return new Uint8Array(IDL.encode([type], [value]));
}

/**
 * Decode a single Candid argument and narrow it with a zod schema.
 *
 * @throws EncodingError MALFORMED_ARGUMENT if the bytes or shape are wrong
 */
export function decodeArg<S extends z.ZodTypeAny>(
  type: IDL.Type,
  schema: S,
  arg: Uint8Array,
  methodName: string,
): z.output<S> {
  let decoded: unknown;
  try {
    decoded = IDL.decode([type], toArrayBuffer(arg))[0];
  } catch (err) {
    throw new EncodingError(
      "MALFORMED_ARGUMENT",
      `Argument of ${methodName} is not valid Candid for its interface`,
      { cause: err },
    );
  }

  const result = schema.safeParse(decoded);
  if (!result.success) {
    throw new EncodingError(
      "MALFORMED_ARGUMENT",
      `Argument of ${methodName} has an unexpected shape: ${result.error.message}`,
      { cause: result.error },
    );
  }
  return result.data;
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}
