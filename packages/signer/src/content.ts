/**
 * Request content maps.
 *
 * The content is the structure that is hashed into the request id and
 * carried in the envelope. Field names are the wire names. Optional
 * fields are left out of the object entirely when absent.
 *
 * Fields this module does not know are carried through decoding as
 * plain content values, so that they still count towards the request id
 * and survive re-serialization.
 */

import { z } from "zod";
import { Principal } from "@dfinity/principal";
import { EncodingError, assertNever } from "@coldsig/types";
import type { CanisterCall } from "@coldsig/types";
import type { ContentValue, RequestId } from "./request-id.js";

// =============================================================================
// Types
// =============================================================================

export type CallRequestContent = {
  readonly [field: string]: ContentValue | undefined;
  readonly request_type: "call";
  readonly canister_id: Uint8Array;
  readonly method_name: string;
  readonly arg: Uint8Array;
  readonly sender: Uint8Array;
  /** Nanoseconds since the Unix epoch */
  readonly ingress_expiry: bigint;
  readonly nonce?: Uint8Array;
};

export type QueryRequestContent = {
  readonly [field: string]: ContentValue | undefined;
  readonly request_type: "query";
  readonly canister_id: Uint8Array;
  readonly method_name: string;
  readonly arg: Uint8Array;
  readonly sender: Uint8Array;
  readonly ingress_expiry: bigint;
  readonly nonce?: Uint8Array;
};

export type ReadStateRequestContent = {
  readonly [field: string]: ContentValue | undefined;
  readonly request_type: "read_state";
  readonly sender: Uint8Array;
  readonly paths: readonly (readonly Uint8Array[])[];
  readonly ingress_expiry: bigint;
};

export type RequestContent = CallRequestContent | QueryRequestContent | ReadStateRequestContent;

export type RequestType = RequestContent["request_type"];

/**
 * Per-request metadata that flows into the content and therefore into the
 * request id and the signature.
 */
export interface RequestMetadata {
  readonly sender: Principal;
  readonly ingressExpiry: bigint;
  readonly nonce?: Uint8Array | undefined;
}

// =============================================================================
// Builders
// =============================================================================

/**
 * Content of an update (`call`) or `query` request for a canister call.
 */
export function buildCallContent(
  call: CanisterCall,
  metadata: RequestMetadata,
): CallRequestContent | QueryRequestContent {
  const common = {
    canister_id: Principal.fromText(call.canisterId).toUint8Array(),
    method_name: call.methodName,
    arg: Uint8Array.from(call.arg),
    sender: metadata.sender.toUint8Array(),
    ingress_expiry: metadata.ingressExpiry,
    ...(metadata.nonce === undefined ? {} : { nonce: Uint8Array.from(metadata.nonce) }),
  };

  switch (call.callType) {
    case "update":
      return { request_type: "call", ...common };
    case "query":
      return { request_type: "query", ...common };
    default:
      return assertNever(call.callType, "call type");
  }
}

/**
 * Content of a `read_state` request for the status of a prior update.
 */
export function buildRequestStatusContent(
  requestId: RequestId,
  metadata: RequestMetadata,
): ReadStateRequestContent {
  return {
    request_type: "read_state",
    sender: metadata.sender.toUint8Array(),
    paths: [[Uint8Array.from(Buffer.from("request_status")), Uint8Array.from(requestId)]],
    ingress_expiry: metadata.ingressExpiry,
  };
}

// =============================================================================
// Parsing
// =============================================================================

const bytesSchema = z.instanceof(Uint8Array).transform((b) => Uint8Array.from(b));

const natSchema = z
  .union([z.bigint().nonnegative(), z.number().int().nonnegative()])
  .transform((n) => BigInt(n));

const contentValueSchema: z.ZodType<ContentValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.bigint(),
    z.number().int(),
    z.instanceof(Uint8Array),
    z.array(contentValueSchema),
    z.record(z.string(), contentValueSchema),
  ]),
);

const callFields = {
  canister_id: bytesSchema,
  method_name: z.string(),
  arg: bytesSchema,
  sender: bytesSchema,
  ingress_expiry: natSchema,
  nonce: bytesSchema.optional(),
};

const readStateFields = {
  sender: bytesSchema,
  paths: z.array(z.array(bytesSchema)),
  ingress_expiry: natSchema,
};

const contentSchema = z.discriminatedUnion("request_type", [
  z.object({ request_type: z.literal("call"), ...callFields }).catchall(contentValueSchema),
  z.object({ request_type: z.literal("query"), ...callFields }).catchall(contentValueSchema),
  z
    .object({ request_type: z.literal("read_state"), ...readStateFields })
    .catchall(contentValueSchema),
]);

/**
 * Narrow a decoded CBOR value into request content. Unknown fields are
 * kept as they were decoded.
 *
 * @throws EncodingError MALFORMED_CONTENT if a known field is missing or
 *   has the wrong type, or an unknown field holds something other than a
 *   content value
 */
export function parseRequestContent(value: unknown): RequestContent {
  const result = contentSchema.safeParse(value);
  if (!result.success) {
    throw new EncodingError(
      "MALFORMED_CONTENT",
      `Request content is malformed: ${result.error.message}`,
      { cause: result.error },
    );
  }

  const content = result.data;
  switch (content.request_type) {
    case "call":
    case "query": {
      const { nonce, ...rest } = content;
      return nonce === undefined ? rest : { ...rest, nonce };
    }
    case "read_state":
      return content;
    default:
      return assertNever(content, "request type");
  }
}

/**
 * Textual canister id of call or query content.
 */
export function canisterIdOf(content: CallRequestContent | QueryRequestContent): string {
  return Principal.fromUint8Array(content.canister_id).toText();
}

/**
 * Fields of the content other than the ones its request type defines.
 */
export function extraFieldsOf(content: RequestContent): [string, ContentValue][] {
  const known = new Set([
    "request_type",
    ...Object.keys(content.request_type === "read_state" ? readStateFields : callFields),
  ]);
  const extras: [string, ContentValue][] = [];
  for (const [field, value] of Object.entries(content)) {
    if (!known.has(field) && value !== undefined) {
      extras.push([field, value]);
    }
  }
  return extras;
}
