/**
 * Envelope — signed request content, ready for transport.
 *
 * Wire form: the CBOR map `{content, sender_pubkey, sender_sig}` behind
 * the self-describe tag 55799. Decoding is all-or-nothing. Unknown
 * envelope fields are ignored; unknown content fields are kept.
 */

import { decode, encode } from "cborg";
import { z } from "zod";
import { Principal } from "@dfinity/principal";
import { EncodingError, IntegrityError } from "@coldsig/types";
import { parseRequestContent } from "./content.js";
import type { RequestContent } from "./content.js";
import { requestIdOf } from "./request-id.js";
import type { RequestId } from "./request-id.js";
import { verifySignature } from "./key-signer.js";
import type { KeySigner, Signature } from "./key-signer.js";

// =============================================================================
// Types
// =============================================================================

export interface Envelope {
  readonly content: RequestContent;
  /** DER public key */
  readonly senderPubkey: Uint8Array;
  readonly senderSig: Uint8Array;
}

const SELF_DESCRIBE_TAG = 55799;
const SELF_DESCRIBE_PREFIX = Uint8Array.from([0xd9, 0xd9, 0xf7]);

// =============================================================================
// Construction
// =============================================================================

/**
 * Assemble an envelope from content and its signature.
 */
export function seal(
  content: RequestContent,
  signature: Uint8Array,
  publicKey: Uint8Array,
): Envelope {
  return {
    content,
    senderPubkey: Uint8Array.from(publicKey),
    senderSig: Uint8Array.from(signature),
  };
}

/**
 * Compute the request id of the content, sign it and seal the result.
 */
export function signContent(
  content: RequestContent,
  signer: KeySigner,
): { readonly requestId: RequestId; readonly envelope: Envelope } {
  const requestId = requestIdOf(content);
  const signature: Signature = signer.sign(requestId);
  return { requestId, envelope: seal(content, signature.signature, signature.publicKey) };
}

// =============================================================================
// Serialization
// =============================================================================

export function serializeEnvelope(envelope: Envelope): Uint8Array {
  const body = encode({
    content: envelope.content,
    sender_pubkey: envelope.senderPubkey,
    sender_sig: envelope.senderSig,
  });
  const bytes = new Uint8Array(SELF_DESCRIBE_PREFIX.length + body.length);
  bytes.set(SELF_DESCRIBE_PREFIX);
  bytes.set(body, SELF_DESCRIBE_PREFIX.length);
  return bytes;
}

const envelopeSchema = z.object({
  content: z.unknown(),
  sender_pubkey: z.instanceof(Uint8Array),
  sender_sig: z.instanceof(Uint8Array),
});

/**
 * Decode an envelope.
 *
 * @throws EncodingError MALFORMED_ENVELOPE on truncated or malformed CBOR
 *   or missing envelope fields
 * @throws EncodingError MALFORMED_CONTENT if the content is malformed
 */
export function deserializeEnvelope(bytes: Uint8Array): Envelope {
  const tags: ((inner: unknown) => unknown)[] = [];
  tags[SELF_DESCRIBE_TAG] = (inner) => inner;

  let decoded: unknown;
  try {
    decoded = decode(bytes, { tags });
  } catch (err) {
    throw new EncodingError("MALFORMED_ENVELOPE", "Envelope is not valid CBOR", { cause: err });
  }

  const result = envelopeSchema.safeParse(decoded);
  if (!result.success) {
    throw new EncodingError(
      "MALFORMED_ENVELOPE",
      `Envelope is malformed: ${result.error.message}`,
      { cause: result.error },
    );
  }

  return {
    content: parseRequestContent(result.data.content),
    senderPubkey: Uint8Array.from(result.data.sender_pubkey),
    senderSig: Uint8Array.from(result.data.sender_sig),
  };
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Check an envelope the way the remote service would, short of expiry.
 *
 * @param expectedRequestId request id recorded alongside the envelope, if any
 * @returns the recomputed request id
 * @throws IntegrityError REQUEST_ID_MISMATCH, SENDER_MISMATCH or SIGNATURE_INVALID
 */
export function verifyEnvelope(envelope: Envelope, expectedRequestId?: RequestId): RequestId {
  const requestId = requestIdOf(envelope.content);

  if (
    expectedRequestId !== undefined &&
    !Buffer.from(expectedRequestId).equals(Buffer.from(requestId))
  ) {
    throw new IntegrityError(
      "REQUEST_ID_MISMATCH",
      `Recorded request id ${toHex(expectedRequestId)} does not match the content (${toHex(requestId)})`,
    );
  }

  const sender = Principal.selfAuthenticating(envelope.senderPubkey);
  if (!Buffer.from(sender.toUint8Array()).equals(Buffer.from(envelope.content.sender))) {
    throw new IntegrityError(
      "SENDER_MISMATCH",
      `Sender ${Principal.fromUint8Array(envelope.content.sender).toText()} is not the principal of the public key (${sender.toText()})`,
    );
  }

  if (!verifySignature(envelope.senderPubkey, requestId, envelope.senderSig)) {
    throw new IntegrityError("SIGNATURE_INVALID", `Signature does not verify for request ${toHex(requestId)}`);
  }

  return requestId;
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}
