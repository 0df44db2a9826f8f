/**
 * Signed message bundles.
 *
 * Every update call travels with a signed `read_state` request for its
 * status, so that whoever submits the call can poll for the outcome
 * without holding the key. Queries carry no status request.
 */

import { IntegrityError } from "@coldsig/types";
import type { CallType, CanisterCall, PrincipalText } from "@coldsig/types";
import { buildCallContent, buildRequestStatusContent, canisterIdOf } from "./content.js";
import type { RequestMetadata, RequestType } from "./content.js";
import { signContent, verifyEnvelope } from "./envelope.js";
import type { Envelope } from "./envelope.js";
import type { ExpiryPolicy } from "./expiry.js";
import type { KeySigner } from "./key-signer.js";
import type { RequestId } from "./request-id.js";

// =============================================================================
// Types
// =============================================================================

export interface SignedIngress {
  readonly callType: CallType;
  readonly requestId: RequestId;
  readonly envelope: Envelope;
}

export interface SignedRequestStatus {
  readonly canisterId: PrincipalText;
  /** Id of the update call whose status is requested */
  readonly requestId: RequestId;
  readonly envelope: Envelope;
}

export interface SignedMessage {
  readonly ingress: SignedIngress;
  readonly requestStatus?: SignedRequestStatus | undefined;
}

const CALL_TYPE_OF = {
  call: "update",
  query: "query",
} as const satisfies Record<Exclude<RequestType, "read_state">, CallType>;

const REQUEST_STATUS_LABEL = "request_status";

export interface SignCallOptions {
  readonly policy: ExpiryPolicy;
  readonly now: Date;
}

// =============================================================================
// Signing
// =============================================================================

/**
 * Sign a canister call, plus its request status when it is an update.
 */
export function signCall(
  call: CanisterCall,
  signer: KeySigner,
  options: SignCallOptions,
): SignedMessage {
  const ingressExpiry = options.policy.computeExpiry(options.now);
  const sender = signer.principal();

  const metadata: RequestMetadata = {
    sender,
    ingressExpiry,
    nonce: call.callType === "update" ? options.policy.nonce() : undefined,
  };

  const ingress = signContent(buildCallContent(call, metadata), signer);

  if (call.callType === "query") {
    return {
      ingress: { callType: call.callType, requestId: ingress.requestId, envelope: ingress.envelope },
    };
  }

  const status = signContent(
    buildRequestStatusContent(ingress.requestId, { sender, ingressExpiry }),
    signer,
  );

  return {
    ingress: { callType: call.callType, requestId: ingress.requestId, envelope: ingress.envelope },
    requestStatus: {
      canisterId: call.canisterId,
      requestId: ingress.requestId,
      envelope: status.envelope,
    },
  };
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Verify both envelopes of a bundle, and that the status request asks for
 * the call it travels with, on that call's canister.
 *
 * @returns the ingress request id
 * @throws IntegrityError REQUEST_ID_MISMATCH if the parts of the bundle
 *   disagree, or anything {@link verifyEnvelope} throws
 */
export function verifyMessage(message: SignedMessage): RequestId {
  const { ingress, requestStatus } = message;
  const requestId = verifyEnvelope(ingress.envelope, ingress.requestId);

  const { content } = ingress.envelope;
  if (
    content.request_type === "read_state" ||
    CALL_TYPE_OF[content.request_type] !== ingress.callType
  ) {
    throw new IntegrityError(
      "REQUEST_ID_MISMATCH",
      `Call type ${ingress.callType} does not match request type ${content.request_type}`,
    );
  }
  if (requestStatus === undefined) {
    return requestId;
  }

  verifyEnvelope(requestStatus.envelope);
  if (!sameBytes(requestStatus.requestId, requestId)) {
    throw new IntegrityError(
      "REQUEST_ID_MISMATCH",
      `Request status is for ${toHex(requestStatus.requestId)}, not ${toHex(requestId)}`,
    );
  }
  if (requestStatus.canisterId !== canisterIdOf(content)) {
    throw new IntegrityError(
      "REQUEST_ID_MISMATCH",
      `Request status names canister ${requestStatus.canisterId}, the call goes to ${canisterIdOf(content)}`,
    );
  }

  const status = requestStatus.envelope.content;
  const [path, ...others] = status.request_type === "read_state" ? status.paths : [];
  const [label, id, ...rest] = path ?? [];
  if (
    others.length > 0 ||
    rest.length > 0 ||
    label === undefined ||
    id === undefined ||
    Buffer.from(label).toString("latin1") !== REQUEST_STATUS_LABEL ||
    !sameBytes(id, requestId)
  ) {
    throw new IntegrityError(
      "REQUEST_ID_MISMATCH",
      `Request status envelope does not read request_status/${toHex(requestId)}`,
    );
  }
  return requestId;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a).equals(Buffer.from(b));
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}
