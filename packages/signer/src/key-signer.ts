/**
 * KeySigner — signs request ids with a single private key.
 *
 * Two schemes are recognised, fixed by the key material:
 * - Ed25519: signs the domain-separated request id directly
 * - secp256k1: signs SHA-256 of it, 64-byte r || s with low S
 *
 * The signer holds no mutable state; one instance may sign any number of
 * requests.
 */

import {
  createPrivateKey,
  createPublicKey,
  sign as cryptoSign,
  verify as cryptoVerify,
} from "node:crypto";
import type { KeyObject } from "node:crypto";
import { secp256k1 } from "@noble/curves/secp256k1.js";
import { sha256 } from "@noble/hashes/sha2.js";
import { Principal } from "@dfinity/principal";
import { KeyError } from "@coldsig/types";
import { REQUEST_ID_LENGTH } from "./request-id.js";

// =============================================================================
// Types
// =============================================================================

export const KEY_SCHEMES = ["ed25519", "secp256k1"] as const;

export type KeyScheme = (typeof KEY_SCHEMES)[number];

/**
 * A signature together with the DER public key that verifies it.
 */
export interface Signature {
  readonly publicKey: Uint8Array;
  readonly signature: Uint8Array;
}

export interface KeySignerOptions {
  /** Reject key material of any other scheme */
  readonly expectedScheme?: KeyScheme | undefined;
}

type SigningKey =
  | { readonly scheme: "ed25519"; readonly key: KeyObject }
  | { readonly scheme: "secp256k1"; readonly privateKey: Uint8Array };

// =============================================================================
// Constants
// =============================================================================

/** Prefix of every signed request id. */
export const IC_REQUEST_DOMAIN_SEPARATOR = Buffer.from("\x0Aic-request", "latin1");

const SEED_LENGTH = 32;

const ED25519_PKCS8_PREFIX = Buffer.from("302e020100300506032b657004220420", "hex");

// =============================================================================
// KeySigner
// =============================================================================

export class KeySigner {
  private constructor(
    private readonly key: SigningKey,
    private readonly der: Uint8Array,
  ) {}

  get scheme(): KeyScheme {
    return this.key.scheme;
  }

  /**
   * Load a PEM private key (PKCS#8, or SEC1 for secp256k1).
   *
   * @throws KeyError MALFORMED_KEY if the PEM cannot be parsed
   * @throws KeyError UNSUPPORTED_ALGORITHM for any other key type
   * @throws KeyError SCHEME_MISMATCH if `expectedScheme` differs
   */
  static fromPem(pem: string, options: KeySignerOptions = {}): KeySigner {
    let key: KeyObject;
    try {
      key = createPrivateKey({ key: stripEcParameters(pem), format: "pem" });
    } catch (err) {
      throw new KeyError("MALFORMED_KEY", "Private key PEM could not be parsed", { cause: err });
    }
    return KeySigner.fromKeyObject(key, options);
  }

  /**
   * Load a raw 32-byte private key of the given scheme.
   *
   * @throws KeyError MALFORMED_KEY if the seed is not 32 bytes or out of range
   */
  static fromSeed(seed: Uint8Array, scheme: KeyScheme): KeySigner {
    if (seed.length !== SEED_LENGTH) {
      throw new KeyError(
        "MALFORMED_KEY",
        `A ${scheme} private key is ${String(SEED_LENGTH)} bytes, got ${String(seed.length)}`,
      );
    }

    if (scheme === "secp256k1") {
      return KeySigner.fromSecp256k1(seed);
    }

    let key: KeyObject;
    try {
      key = createPrivateKey({
        key: Buffer.concat([ED25519_PKCS8_PREFIX, seed]),
        format: "der",
        type: "pkcs8",
      });
    } catch (err) {
      throw new KeyError("MALFORMED_KEY", `Invalid ${scheme} private key`, { cause: err });
    }
    return KeySigner.fromKeyObject(key, { expectedScheme: scheme });
  }

  /**
   * Wrap an already parsed private key.
   */
  static fromKeyObject(key: KeyObject, options: KeySignerOptions = {}): KeySigner {
    if (key.type !== "private") {
      throw new KeyError("MALFORMED_KEY", `Expected a private key, got a ${key.type} key`);
    }
    const scheme = schemeOf(key);
    if (options.expectedScheme !== undefined && options.expectedScheme !== scheme) {
      throw new KeyError(
        "SCHEME_MISMATCH",
        `Expected a ${options.expectedScheme} key, got ${scheme}`,
      );
    }

    if (scheme === "secp256k1") {
      const { d } = key.export({ format: "jwk" });
      if (d === undefined) {
        throw new KeyError("MALFORMED_KEY", "secp256k1 key has no private scalar");
      }
      return KeySigner.fromSecp256k1(Uint8Array.from(Buffer.from(d, "base64url")));
    }

    const der = Uint8Array.from(createPublicKey(key).export({ type: "spki", format: "der" }));
    return new KeySigner({ scheme, key }, der);
  }

  private static fromSecp256k1(privateKey: Uint8Array): KeySigner {
    if (!secp256k1.utils.isValidPrivateKey(privateKey)) {
      throw new KeyError("MALFORMED_KEY", "Invalid secp256k1 private key");
    }
    const point = secp256k1.getPublicKey(privateKey, false);
    return new KeySigner(
      { scheme: "secp256k1", privateKey: Uint8Array.from(privateKey) },
      secp256k1SpkiOf(point),
    );
  }

  /**
   * DER-encoded SubjectPublicKeyInfo.
   */
  publicKey(): Uint8Array {
    return Uint8Array.from(this.der);
  }

  /**
   * Self-authenticating principal of the public key.
   */
  principal(): Principal {
    return Principal.selfAuthenticating(this.der);
  }

  /**
   * Sign a 32-byte request id.
   *
   * @throws KeyError INVALID_DIGEST if the digest is not 32 bytes
   */
  sign(digest: Uint8Array): Signature {
    if (digest.length !== REQUEST_ID_LENGTH) {
      throw new KeyError(
        "INVALID_DIGEST",
        `Digest must be ${String(REQUEST_ID_LENGTH)} bytes, got ${String(digest.length)}`,
      );
    }
    const message = Buffer.concat([IC_REQUEST_DOMAIN_SEPARATOR, digest]);

    const signature =
      this.key.scheme === "ed25519"
        ? Uint8Array.from(cryptoSign(null, message, this.key.key))
        : secp256k1
            .sign(sha256(message), this.key.privateKey, { lowS: true })
            .toCompactRawBytes();

    return { publicKey: this.publicKey(), signature };
  }
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Verify a request id signature against a DER public key.
 *
 * Returns false for a wrong signature; throws only when the public key
 * itself is unusable.
 *
 * @throws KeyError MALFORMED_KEY or UNSUPPORTED_ALGORITHM
 */
export function verifySignature(
  publicKeyDer: Uint8Array,
  digest: Uint8Array,
  signature: Uint8Array,
): boolean {
  let key: KeyObject;
  try {
    key = createPublicKey({ key: Buffer.from(publicKeyDer), format: "der", type: "spki" });
  } catch (err) {
    throw new KeyError("MALFORMED_KEY", "Public key DER could not be parsed", { cause: err });
  }
  const message = Buffer.concat([IC_REQUEST_DOMAIN_SEPARATOR, digest]);

  if (schemeOf(key) === "ed25519") {
    return cryptoVerify(null, message, key, signature);
  }
  return secp256k1.verify(signature, sha256(message), secp256k1PointOf(key), { lowS: true });
}

// =============================================================================
// Internal helpers
// =============================================================================

function schemeOf(key: KeyObject): KeyScheme {
  if (key.asymmetricKeyType === "ed25519") {
    return "ed25519";
  }
  if (key.asymmetricKeyType === "ec" && key.asymmetricKeyDetails?.namedCurve === "secp256k1") {
    return "secp256k1";
  }
  const curve = key.asymmetricKeyDetails?.namedCurve;
  throw new KeyError(
    "UNSUPPORTED_ALGORITHM",
    `Unsupported key type ${key.asymmetricKeyType ?? "unknown"}${curve === undefined ? "" : ` (${curve})`}`,
  );
}

/**
 * Some PEM files carry an EC PARAMETERS block ahead of the key.
 */
function stripEcParameters(pem: string): string {
  return pem.replace(/-----BEGIN EC PARAMETERS-----[\s\S]*?-----END EC PARAMETERS-----\s*/g, "");
}

/**
 * SubjectPublicKeyInfo of an uncompressed secp256k1 point (0x04 || x || y).
 */
function secp256k1SpkiOf(point: Uint8Array): Uint8Array {
  const key = createPublicKey({
    key: {
      kty: "EC",
      crv: "secp256k1",
      x: Buffer.from(point.subarray(1, 33)).toString("base64url"),
      y: Buffer.from(point.subarray(33, 65)).toString("base64url"),
    },
    format: "jwk",
  });
  return Uint8Array.from(key.export({ type: "spki", format: "der" }));
}

/**
 * Uncompressed point of a secp256k1 public key.
 */
function secp256k1PointOf(key: KeyObject): Uint8Array {
  const { x, y } = key.export({ format: "jwk" });
  if (x === undefined || y === undefined) {
    throw new KeyError("MALFORMED_KEY", "secp256k1 public key has no coordinates");
  }
  return Uint8Array.from(
    Buffer.concat([Buffer.from([0x04]), Buffer.from(x, "base64url"), Buffer.from(y, "base64url")]),
  );
}
