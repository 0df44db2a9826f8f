/**
 * Message file — the JSON hand-off between the offline signer and the
 * online submitter.
 *
 * [
 *   {
 *     "ingress": { "call_type": "update", "request_id": "<hex>", "content": "<hex CBOR>" },
 *     "request_status": { "canister_id": "<principal>", "request_id": "<hex>", "content": "<hex CBOR>" }
 *   }
 * ]
 *
 * `request_id` is written for update calls only. Unknown fields are
 * ignored on read.
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import { EncodingError } from "@coldsig/types";
import { deserializeEnvelope, serializeEnvelope } from "./envelope.js";
import type { SignedMessage } from "./message.js";
import { requestIdOf } from "./request-id.js";

// =============================================================================
// Schema
// =============================================================================

const hexSchema = z
  .string()
  .regex(/^([0-9a-fA-F]{2})*$/, "Expected an even-length hex string")
  .transform((hex) => Uint8Array.from(Buffer.from(hex, "hex")));

const messageFileSchema = z.array(
  z.object({
    ingress: z.object({
      call_type: z.enum(["update", "query"]),
      request_id: hexSchema.optional(),
      content: hexSchema,
    }),
    request_status: z
      .object({
        canister_id: z.string().min(1),
        request_id: hexSchema,
        content: hexSchema,
      })
      .optional(),
  }),
);

// =============================================================================
// Serialization
// =============================================================================

/**
 * Write signed messages as canonical JSON (RFC 8785).
 */
export function serializeMessageFile(messages: readonly SignedMessage[]): string {
  return canonicalize(
    messages.map((message) => {
      const { ingress, requestStatus } = message;
      return {
        ingress: {
          call_type: ingress.callType,
          ...(ingress.callType === "update" ? { request_id: toHex(ingress.requestId) } : {}),
          content: toHex(serializeEnvelope(ingress.envelope)),
        },
        ...(requestStatus === undefined
          ? {}
          : {
              request_status: {
                canister_id: requestStatus.canisterId,
                request_id: toHex(requestStatus.requestId),
                content: toHex(serializeEnvelope(requestStatus.envelope)),
              },
            }),
      };
    }),
  );
}

/**
 * Read a message file.
 *
 * The ingress request id is recomputed from the content when the file
 * does not record it. Recorded ids are returned as written; checking them
 * is `verifyEnvelope`'s job.
 *
 * @throws EncodingError MALFORMED_MESSAGE_FILE if the JSON or its shape is wrong
 * @throws EncodingError MALFORMED_ENVELOPE or MALFORMED_CONTENT for a bad envelope
 */
export function parseMessageFile(json: string): SignedMessage[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new EncodingError("MALFORMED_MESSAGE_FILE", "Message file is not valid JSON", {
      cause: err,
    });
  }

  const result = messageFileSchema.safeParse(raw);
  if (!result.success) {
    throw new EncodingError(
      "MALFORMED_MESSAGE_FILE",
      `Message file is malformed: ${result.error.message}`,
      { cause: result.error },
    );
  }

  return result.data.map((entry): SignedMessage => {
    const envelope = deserializeEnvelope(entry.ingress.content);
    const ingress = {
      callType: entry.ingress.call_type,
      requestId: entry.ingress.request_id ?? requestIdOf(envelope.content),
      envelope,
    };
    if (entry.request_status === undefined) {
      return { ingress };
    }
    return {
      ingress,
      requestStatus: {
        canisterId: entry.request_status.canister_id,
        requestId: entry.request_status.request_id,
        envelope: deserializeEnvelope(entry.request_status.content),
      },
    };
  });
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}
