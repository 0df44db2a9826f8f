/**
 * @coldsig/toolkit — Signing pipeline.
 *
 * User input → typed operation → canister calls → signed message bundles.
 * One pipeline per key; it keeps no state between calls.
 */

import type { Logger } from "pino";
import { KeyError } from "@coldsig/types";
import type { AccountIdentifierHex, BuiltRequest, Operation, PrincipalText } from "@coldsig/types";
import {
  buildBalanceQuery,
  buildNotify,
  buildTransfer,
  deriveAccountIdentifier,
} from "@coldsig/ledger";
import type { BalanceQueryInput, NotifyInput, TransferInput } from "@coldsig/ledger";
import { buildListNeurons, buildNeuronManage, buildNeuronStake } from "@coldsig/governance";
import type {
  ListNeuronsInput,
  NeuronManageInput,
  NeuronStakeInput,
} from "@coldsig/governance";
import { ExpiryPolicy, KeySigner, signCall } from "@coldsig/signer";
import type { SignedMessage } from "@coldsig/signer";
import type { ToolkitConfig } from "./config.js";
import { silentLogger } from "./logger.js";
import { buildRawCall, encodeOperation } from "./operations.js";
import type { CanisterTargets, RawCallInput } from "./operations.js";

// =============================================================================
// Types
// =============================================================================

export interface SigningPipelineOptions {
  readonly signer: KeySigner;
  readonly config: ToolkitConfig;
  readonly logger?: Logger | undefined;
  /** Expiry and nonce source; built from the config when omitted */
  readonly policy?: ExpiryPolicy | undefined;
  /** Clock; defaults to the system time */
  readonly now?: (() => Date) | undefined;
}

/**
 * Neuron stake input; the controller defaults to the signer.
 */
export type StakeInput = Omit<NeuronStakeInput, "controller"> & {
  readonly controller?: string | undefined;
};

export interface PublicIds {
  readonly principal: PrincipalText;
  readonly accountId: AccountIdentifierHex;
}

// =============================================================================
// Pipeline
// =============================================================================

export class SigningPipeline {
  private readonly signer: KeySigner;
  private readonly logger: Logger;
  private readonly policy: ExpiryPolicy;
  private readonly now: () => Date;
  private readonly targets: CanisterTargets;

  constructor(options: SigningPipelineOptions) {
    const { signer, config } = options;
    if (config.KEY_SCHEME !== undefined && config.KEY_SCHEME !== signer.scheme) {
      throw new KeyError(
        "SCHEME_MISMATCH",
        `Configured for ${config.KEY_SCHEME} keys, got a ${signer.scheme} key`,
      );
    }

    this.signer = signer;
    this.logger = options.logger ?? silentLogger;
    this.policy =
      options.policy ??
      new ExpiryPolicy({
        windowSeconds: config.INGRESS_EXPIRY_SECONDS,
        nonceBytes: config.NONCE_BYTES,
      });
    this.now = options.now ?? (() => new Date());
    this.targets = {
      ledgerCanisterId: config.LEDGER_CANISTER_ID,
      governanceCanisterId: config.GOVERNANCE_CANISTER_ID,
    };
  }

  /**
   * Load the key from PEM, checking it against the configured scheme.
   */
  static fromPem(
    pem: string,
    options: Omit<SigningPipelineOptions, "signer">,
  ): SigningPipeline {
    const signer = KeySigner.fromPem(pem, { expectedScheme: options.config.KEY_SCHEME });
    return new SigningPipeline({ ...options, signer });
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  transfer(input: TransferInput): SignedMessage[] {
    return this.signBuilt(buildTransfer(input, { canisterId: this.targets.ledgerCanisterId }));
  }

  balance(input: BalanceQueryInput): SignedMessage[] {
    return this.signBuilt(
      buildBalanceQuery(input, { canisterId: this.targets.ledgerCanisterId }),
    );
  }

  notify(input: NotifyInput): SignedMessage[] {
    return this.signBuilt(buildNotify(input, { canisterId: this.targets.ledgerCanisterId }));
  }

  stakeNeuron(input: StakeInput): SignedMessage[] {
    return this.signBuilt(
      buildNeuronStake(
        { ...input, controller: input.controller ?? this.signer.principal().toText() },
        this.targets,
      ),
    );
  }

  manageNeuron(input: NeuronManageInput): SignedMessage[] {
    return buildNeuronManage(input, this.targets).flatMap((built) => this.signBuilt(built));
  }

  listNeurons(input: ListNeuronsInput = {}): SignedMessage[] {
    return this.signBuilt(buildListNeurons(input, this.targets));
  }

  rawCall(input: RawCallInput): SignedMessage[] {
    return this.signBuilt(buildRawCall(input));
  }

  /**
   * Sign an already typed operation.
   */
  signOperation(operation: Operation): SignedMessage[] {
    return this.signBuilt({ operation, calls: encodeOperation(operation, this.targets) });
  }

  /**
   * Principal and default account of the key. Needs no clock or nonce.
   */
  publicIds(): PublicIds {
    const principal = this.signer.principal();
    return { principal: principal.toText(), accountId: deriveAccountIdentifier(principal) };
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private signBuilt(built: BuiltRequest): SignedMessage[] {
    const now = this.now();
    const messages = built.calls.map((call) => {
      const message = signCall(call, this.signer, { policy: this.policy, now });
      this.logger.debug(
        {
          canisterId: call.canisterId,
          method: call.methodName,
          callType: call.callType,
          requestId: Buffer.from(message.ingress.requestId).toString("hex"),
          ingressExpiry: message.ingress.envelope.content.ingress_expiry.toString(),
        },
        "Signed message",
      );
      return message;
    });

    this.logger.info(
      { operation: built.operation.kind, messages: messages.length },
      `Signed ${built.operation.kind}`,
    );
    return messages;
  }
}
