/**
 * ExpiryPolicy — ingress expiry and nonce for each signed request.
 *
 * Both values are part of the content and so of the signature: changing
 * either after signing invalidates the envelope.
 */

import { randomBytes } from "node:crypto";
import { KeyError } from "@coldsig/types";

export const DEFAULT_INGRESS_EXPIRY_SECONDS = 240;

/** Upper bound the remote service accepts for an ingress expiry window. */
export const MAX_INGRESS_EXPIRY_SECONDS = 300;

export const DEFAULT_NONCE_BYTES = 16;

const NANOS_PER_MILLI = 1_000_000n;

export interface ExpiryPolicyOptions {
  readonly windowSeconds?: number | undefined;
  readonly nonceBytes?: number | undefined;
  /** Source of nonce bytes; defaults to node:crypto randomBytes */
  readonly random?: ((size: number) => Uint8Array) | undefined;
}

export class ExpiryPolicy {
  readonly windowSeconds: number;
  readonly nonceBytes: number;
  private readonly random: (size: number) => Uint8Array;

  constructor(options: ExpiryPolicyOptions = {}) {
    const windowSeconds = options.windowSeconds ?? DEFAULT_INGRESS_EXPIRY_SECONDS;
    if (
      !Number.isInteger(windowSeconds) ||
      windowSeconds < 1 ||
      windowSeconds > MAX_INGRESS_EXPIRY_SECONDS
    ) {
      throw new RangeError(
        `Expiry window must be 1 to ${String(MAX_INGRESS_EXPIRY_SECONDS)} seconds, got ${String(windowSeconds)}`,
      );
    }
    const nonceBytes = options.nonceBytes ?? DEFAULT_NONCE_BYTES;
    if (!Number.isInteger(nonceBytes) || nonceBytes < 8 || nonceBytes > 32) {
      throw new RangeError(`Nonce must be 8 to 32 bytes, got ${String(nonceBytes)}`);
    }

    this.windowSeconds = windowSeconds;
    this.nonceBytes = nonceBytes;
    this.random = options.random ?? ((size) => Uint8Array.from(randomBytes(size)));
  }

  /**
   * Ingress expiry in nanoseconds since the epoch: `now` plus the window.
   */
  computeExpiry(now: Date): bigint {
    return toNanos(now) + BigInt(this.windowSeconds) * 1000n * NANOS_PER_MILLI;
  }

  /**
   * Fresh random nonce. Fails rather than return a short nonce.
   *
   * @throws KeyError INSUFFICIENT_ENTROPY if the source returns too few bytes
   */
  nonce(): Uint8Array {
    const bytes = this.random(this.nonceBytes);
    if (bytes.length !== this.nonceBytes) {
      throw new KeyError(
        "INSUFFICIENT_ENTROPY",
        `Random source returned ${String(bytes.length)} bytes, expected ${String(this.nonceBytes)}`,
      );
    }
    return bytes;
  }

  /**
   * True once `now` has passed the expiry.
   */
  static isExpired(ingressExpiry: bigint, now: Date): boolean {
    return toNanos(now) > ingressExpiry;
  }
}

export function toNanos(date: Date): bigint {
  const millis = date.getTime();
  if (Number.isNaN(millis)) {
    throw new RangeError("Invalid date");
  }
  return BigInt(millis) * NANOS_PER_MILLI;
}

export function fromNanos(nanos: bigint): Date {
  return new Date(Number(nanos / NANOS_PER_MILLI));
}
