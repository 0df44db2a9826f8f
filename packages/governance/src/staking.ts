/**
 * Neuron staking subaccounts.
 *
 * A neuron is funded by a transfer to a subaccount of the governance
 * canister derived from its controller and a 64-bit nonce:
 *
 *   SHA-256(0x0C || "neuron-stake" || controller || nonce as u64 big-endian)
 */

import { createHash } from "node:crypto";
import type { Principal } from "@dfinity/principal";
import { InputError, MAX_NAT64 } from "@coldsig/types";
import type { Subaccount } from "@coldsig/types";

const STAKE_DOMAIN_SEPARATOR = Buffer.from("\x0Cneuron-stake", "latin1");

/** Maximum neuron name length in bytes. */
export const MAX_NEURON_NAME_LENGTH = 8;

/**
 * Derive the governance subaccount that funds a neuron.
 */
export function computeNeuronStakingSubaccount(
  controller: Principal,
  nonce: bigint,
): Subaccount {
  if (nonce < 0n || nonce > MAX_NAT64) {
    throw new InputError("INVALID_NAT", `nonce ${nonce.toString()} does not fit in 64 bits`);
  }
  const nonceBytes = Buffer.alloc(8);
  nonceBytes.writeBigUInt64BE(nonce);

  return Uint8Array.from(
    createHash("sha256")
      .update(STAKE_DOMAIN_SEPARATOR)
      .update(controller.toUint8Array())
      .update(nonceBytes)
      .digest(),
  );
}

/**
 * Convert a neuron name into its nonce: the ASCII bytes, left-padded with
 * zeros to 8 bytes, read as a big-endian u64.
 *
 * "a" → 97n
 */
export function neuronNameToNonce(name: string): bigint {
  if (!/^[\x00-\x7F]*$/.test(name)) {
    throw new InputError("INVALID_NEURON_NAME", `Neuron name "${name}" must be ASCII`);
  }
  if (name.length > MAX_NEURON_NAME_LENGTH) {
    throw new InputError(
      "INVALID_NEURON_NAME",
      `The neuron name must be ${String(MAX_NEURON_NAME_LENGTH)} characters or less`,
    );
  }

  const bytes = Buffer.alloc(8);
  Buffer.from(name, "latin1").copy(bytes, 8 - name.length);
  return bytes.readBigUInt64BE();
}
