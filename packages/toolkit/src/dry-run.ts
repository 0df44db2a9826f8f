/**
 * @coldsig/toolkit — Dry run.
 *
 * Renders signed envelopes and message files as plain text for review
 * before they leave the offline machine. Needs no key. Every field that
 * flows into the signature is shown.
 */

import { Principal } from "@dfinity/principal";
import { MAX_NAT64, assertNever } from "@coldsig/types";
import type { NeuronCommand, Operation } from "@coldsig/types";
import { formatTokens } from "@coldsig/ledger";
import {
  ExpiryPolicy,
  canisterIdOf,
  extraFieldsOf,
  fromNanos,
  parseMessageFile,
  requestIdOf,
  verifyMessage,
} from "@coldsig/signer";
import type { ContentMap, ContentValue, Envelope, SignedMessage } from "@coldsig/signer";
import { decodeCall } from "./operations.js";
import type { CanisterTargets } from "./operations.js";

// =============================================================================
// Envelopes
// =============================================================================

/**
 * Human-readable summary of one envelope.
 *
 * @throws EncodingError MALFORMED_ARGUMENT if a known method's argument does not decode
 */
export function renderHuman(envelope: Envelope, targets: CanisterTargets): string {
  const { content } = envelope;
  const lines = [
    `Request type: ${content.request_type}`,
    `Sender: ${Principal.fromUint8Array(content.sender).toText()}`,
  ];

  switch (content.request_type) {
    case "call":
    case "query": {
      const canisterId = canisterIdOf(content);
      lines.push(
        `Canister: ${canisterId}`,
        `Method: ${content.method_name}`,
        `Request id: ${hex(requestIdOf(content))}`,
        `Ingress expiry: ${formatExpiry(content.ingress_expiry)}`,
        `Nonce: ${content.nonce === undefined ? "(none)" : hex(content.nonce)}`,
      );
      const operation = decodeCall(
        {
          canisterId,
          methodName: content.method_name,
          arg: content.arg,
          callType: content.request_type === "call" ? "update" : "query",
        },
        targets,
      );
      lines.push(...renderOperation(operation));
      break;
    }
    case "read_state":
      lines.push(
        `Request id: ${hex(requestIdOf(content))}`,
        `Ingress expiry: ${formatExpiry(content.ingress_expiry)}`,
        ...content.paths.map((path) => `Path: ${path.map(renderPathSegment).join("/")}`),
      );
      break;
    default:
      return assertNever(content, "request type");
  }

  for (const [field, value] of extraFieldsOf(content)) {
    lines.push(`Extra field ${field}: ${renderContentValue(value)}`);
  }
  return lines.join("\n");
}

/**
 * Text lines describing an operation.
 */
export function renderOperation(operation: Operation): string[] {
  switch (operation.kind) {
    case "transfer":
      return [
        "Operation: transfer",
        `  To: ${operation.to}`,
        `  Amount: ${renderAmount(operation.amount)}`,
        `  Fee: ${renderAmount(operation.fee)}`,
        `  Total: ${renderTotal(operation.amount, operation.fee)}`,
        `  Memo: ${operation.memo.toString()}`,
        `  From subaccount: ${renderSubaccount(operation.fromSubaccount)}`,
        `  Created at: ${operation.createdAt === undefined ? "(not set)" : formatExpiry(operation.createdAt)}`,
      ];
    case "balance":
      return ["Operation: balance query", `  Account: ${operation.account}`];
    case "notify":
      return [
        "Operation: notify",
        `  Block height: ${operation.blockHeight.toString()}`,
        `  To canister: ${operation.toCanister}`,
        `  Max fee: ${renderAmount(operation.maxFee)}`,
        `  From subaccount: ${renderSubaccount(operation.fromSubaccount)}`,
        `  To subaccount: ${renderSubaccount(operation.toSubaccount)}`,
      ];
    case "neuron-stake":
      return [
        "Operation: claim or refresh neuron",
        `  Controller: ${operation.controller}`,
        `  Nonce (memo): ${operation.nonce.toString()}`,
      ];
    case "neuron-manage":
      return [
        "Operation: manage neuron",
        `  Neuron id: ${operation.neuronId.toString()}`,
        ...renderCommand(operation.command),
      ];
    case "list-neurons":
      return [
        "Operation: list neurons",
        `  Neuron ids: ${
          operation.neuronIds.length === 0
            ? "(all readable by caller)"
            : operation.neuronIds.map((id) => id.toString()).join(", ")
        }`,
      ];
    case "raw":
      return [
        "Operation: raw call",
        `  Call type: ${operation.callType}`,
        `  Argument: ${hex(operation.arg)}`,
      ];
    default:
      return assertNever(operation, "operation");
  }
}

function renderCommand(command: NeuronCommand): string[] {
  switch (command.kind) {
    case "add-hot-key":
      return ["  Command: add hot key", `    Hot key: ${command.hotKey}`];
    case "remove-hot-key":
      return ["  Command: remove hot key", `    Hot key: ${command.hotKey}`];
    case "increase-dissolve-delay":
      return [
        "  Command: increase dissolve delay",
        `    Additional seconds: ${String(command.additionalSeconds)}`,
      ];
    case "start-dissolving":
      return ["  Command: start dissolving"];
    case "stop-dissolving":
      return ["  Command: stop dissolving"];
    case "disburse":
      return [
        "  Command: disburse",
        `    To account: ${command.toAccount ?? "(controller's default account)"}`,
        `    Amount: ${command.amount === undefined ? "(entire stake)" : renderAmount(command.amount)}`,
      ];
    case "spawn":
      return ["  Command: spawn", `    New controller: ${command.newController ?? "(same controller)"}`];
    case "split":
      return ["  Command: split", `    Amount: ${renderAmount(command.amount)}`];
    case "merge":
      return ["  Command: merge", `    Source neuron id: ${command.sourceNeuronId.toString()}`];
    case "merge-maturity":
      return ["  Command: merge maturity", `    Percentage: ${String(command.percentage)}%`];
    default:
      return assertNever(command, "neuron command");
  }
}

// =============================================================================
// Message files
// =============================================================================

export interface RenderMessageFileOptions extends CanisterTargets {
  /** Clock the expiry is checked against */
  readonly now: Date;
}

/**
 * Render every bundle of a message file, verifying each envelope and
 * flagging the ones whose ingress expiry has passed.
 *
 * @throws EncodingError if the file or an envelope is malformed
 * @throws IntegrityError if an envelope fails verification, or a status
 *   request does not belong to the call it is bundled with
 */
export function renderMessageFile(json: string, options: RenderMessageFileOptions): string {
  const messages = parseMessageFile(json);
  return messages
    .map((message, index) => renderMessage(message, index, messages.length, options))
    .join("\n\n");
}

function renderMessage(
  message: SignedMessage,
  index: number,
  count: number,
  options: RenderMessageFileOptions,
): string {
  const { ingress, requestStatus } = message;
  verifyMessage(message);

  const sections = [
    `Message ${String(index + 1)} of ${String(count)} (${ingress.callType})`,
    renderHuman(ingress.envelope, options),
  ];
  if (ExpiryPolicy.isExpired(ingress.envelope.content.ingress_expiry, options.now)) {
    sections.push(
      `EXPIRED: ingress expiry ${formatExpiry(ingress.envelope.content.ingress_expiry)} is before ${options.now.toISOString()}`,
    );
  }

  if (requestStatus !== undefined) {
    sections.push(
      `Request status for ${hex(requestStatus.requestId)} on ${requestStatus.canisterId}`,
      renderHuman(requestStatus.envelope, options),
    );
  }
  return sections.join("\n");
}

// =============================================================================
// Formatting
// =============================================================================

function renderAmount(e8s: bigint): string {
  return `${formatTokens(e8s)} ICP (${e8s.toString()} e8s)`;
}

/**
 * Envelopes built elsewhere may carry an amount and fee no ledger can debit.
 */
function renderTotal(amount: bigint, fee: bigint): string {
  const total = amount + fee;
  return total > MAX_NAT64
    ? `${total.toString()} e8s (exceeds the 64-bit maximum)`
    : renderAmount(total);
}

function renderSubaccount(subaccount: Uint8Array | undefined): string {
  return subaccount === undefined ? "(default)" : hex(subaccount);
}

function renderContentValue(value: ContentValue): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "bigint" || typeof value === "number") {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return hex(value);
  }
  if (isContentArray(value)) {
    return `[${value.map(renderContentValue).join(", ")}]`;
  }
  const entries = Object.entries(value).flatMap(([key, inner]) =>
    inner === undefined ? [] : [`${key}: ${renderContentValue(inner)}`],
  );
  return `{${entries.join(", ")}}`;
}

function isContentArray(value: readonly ContentValue[] | ContentMap): value is readonly ContentValue[] {
  return Array.isArray(value);
}

function renderPathSegment(segment: Uint8Array): string {
  const text = Buffer.from(segment).toString("utf8");
  return /^[\x20-\x7e]+$/.test(text) ? text : hex(segment);
}

function formatExpiry(nanos: bigint): string {
  return `${fromNanos(nanos).toISOString()} (${nanos.toString()} ns)`;
}

function hex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}
