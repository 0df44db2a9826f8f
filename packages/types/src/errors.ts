/**
 * Error Types
 *
 * Four kinds of failure, each carrying a machine-readable code.
 * Always thrown, never returned as a default value.
 */

/** Malformed or out-of-range user-supplied fields. */
export type InputErrorCode =
  | "INVALID_AMOUNT"
  | "AMOUNT_OVERFLOW"
  | "AMOUNT_UNDERFLOW"
  | "INVALID_ACCOUNT_ID"
  | "INVALID_SUBACCOUNT"
  | "INVALID_PRINCIPAL"
  | "INVALID_NAT"
  | "INVALID_NEURON_NAME"
  | "INVALID_COMMAND"
  | "INVALID_ARGUMENT"
  | "MISSING_FIELD";

/** Malformed or unsupported key material. */
export type KeyErrorCode =
  | "MALFORMED_KEY"
  | "UNSUPPORTED_ALGORITHM"
  | "SCHEME_MISMATCH"
  | "INVALID_DIGEST"
  | "INSUFFICIENT_ENTROPY";

/** Bytes that do not decode. */
export type EncodingErrorCode =
  | "MALFORMED_ENVELOPE"
  | "MALFORMED_CONTENT"
  | "MALFORMED_MESSAGE_FILE"
  | "MALFORMED_ARGUMENT";

/** Data that decodes but does not check out. */
export type IntegrityErrorCode =
  | "CHECKSUM_MISMATCH"
  | "REQUEST_ID_MISMATCH"
  | "SIGNATURE_INVALID"
  | "SENDER_MISMATCH"
  | "EXPIRED";

export type ColdsigErrorKind = "input" | "key" | "encoding" | "integrity";

/**
 * Base class of every error the toolkit throws on purpose.
 */
export abstract class ColdsigError<C extends string = string> extends Error {
  public abstract readonly kind: ColdsigErrorKind;
  public readonly code: C;

  constructor(code: C, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
  }
}

export class InputError extends ColdsigError<InputErrorCode> {
  public readonly kind = "input";

  constructor(code: InputErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "InputError";
  }
}

export class KeyError extends ColdsigError<KeyErrorCode> {
  public readonly kind = "key";

  constructor(code: KeyErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "KeyError";
  }
}

export class EncodingError extends ColdsigError<EncodingErrorCode> {
  public readonly kind = "encoding";

  constructor(code: EncodingErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "EncodingError";
  }
}

export class IntegrityError extends ColdsigError<IntegrityErrorCode> {
  public readonly kind = "integrity";

  constructor(code: IntegrityErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "IntegrityError";
  }
}
