/**
 * @coldsig/signer — offline request signing.
 *
 * Request content → request id → signature → envelope → message file.
 * No network access and no key storage: keys come in as PEM or raw
 * bytes, signed messages go out as bytes or JSON.
 */

// Keys
export {
  KeySigner,
  KEY_SCHEMES,
  IC_REQUEST_DOMAIN_SEPARATOR,
  verifySignature,
} from "./key-signer.js";
export type { KeyScheme, KeySignerOptions, Signature } from "./key-signer.js";

// Request ids
export { requestIdOf, hashValue, lebEncode, REQUEST_ID_LENGTH } from "./request-id.js";
export type { RequestId, ContentValue, ContentMap } from "./request-id.js";

// Content
export {
  buildCallContent,
  buildRequestStatusContent,
  parseRequestContent,
  canisterIdOf,
  extraFieldsOf,
} from "./content.js";
export type {
  CallRequestContent,
  QueryRequestContent,
  ReadStateRequestContent,
  RequestContent,
  RequestType,
  RequestMetadata,
} from "./content.js";

// Expiry
export {
  ExpiryPolicy,
  DEFAULT_INGRESS_EXPIRY_SECONDS,
  MAX_INGRESS_EXPIRY_SECONDS,
  DEFAULT_NONCE_BYTES,
  toNanos,
  fromNanos,
} from "./expiry.js";
export type { ExpiryPolicyOptions } from "./expiry.js";

// Envelopes
export {
  seal,
  signContent,
  serializeEnvelope,
  deserializeEnvelope,
  verifyEnvelope,
} from "./envelope.js";
export type { Envelope } from "./envelope.js";

// Messages
export { signCall, verifyMessage } from "./message.js";
export type {
  SignedIngress,
  SignedRequestStatus,
  SignedMessage,
  SignCallOptions,
} from "./message.js";
export { serializeMessageFile, parseMessageFile } from "./message-file.js";
