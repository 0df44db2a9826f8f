/**
 * Tests for the governance request builders and their decoders.
 */

import { describe, it, expect } from "vitest";
import { Principal } from "@dfinity/principal";
import {
  GOVERNANCE_CANISTER_ID,
  InputError,
  LEDGER_CANISTER_ID,
} from "@coldsig/types";
import type { NeuronCommand } from "@coldsig/types";
import { decodeTransfer, deriveAccountIdentifier } from "@coldsig/ledger";
import {
  buildListNeurons,
  buildNeuronManage,
  buildNeuronStake,
  parseNeuronCommand,
  parseNeuronId,
} from "../src/requests.js";
import {
  decodeGovernanceCall,
  decodeListNeurons,
  decodeNeuronManage,
  decodeNeuronStake,
} from "../src/decode.js";
import { computeNeuronStakingSubaccount } from "../src/staking.js";

const CONTROLLER = "2vxsx-fae";
const HOT_KEY = "rrkah-fqaaa-aaaaa-aaaaq-cai";
const DESTINATION = deriveAccountIdentifier(
  Principal.fromText(HOT_KEY),
  new Uint8Array(32).fill(7),
);

function callAt<T extends { calls: readonly unknown[] }>(
  built: T,
  index: number,
): T["calls"][number] {
  const call = built.calls[index];
  if (call === undefined) throw new Error(`no call at ${String(index)}`);
  return call;
}

// =============================================================================
// Neuron stake
// =============================================================================

describe("buildNeuronStake", () => {
  it("funds the staking subaccount, then claims the neuron", () => {
    const built = buildNeuronStake({ controller: CONTROLLER, amount: "12", name: "a" });

    expect(built.calls).toHaveLength(2);
    const transfer = callAt(built, 0);
    const claim = callAt(built, 1);

    expect(transfer.canisterId).toBe(LEDGER_CANISTER_ID);
    expect(transfer.methodName).toBe("send_dfx");
    expect(claim.canisterId).toBe(GOVERNANCE_CANISTER_ID);
    expect(claim.methodName).toBe("claim_or_refresh_neuron_from_account");
    expect(claim.callType).toBe("update");

    const expectedTo = deriveAccountIdentifier(
      Principal.fromText(GOVERNANCE_CANISTER_ID),
      computeNeuronStakingSubaccount(Principal.fromText(CONTROLLER), 97n),
    );
    const decoded = decodeTransfer(transfer.arg);
    expect(decoded.to).toBe(expectedTo);
    expect(decoded.amount).toBe(1_200_000_000n);
    expect(decoded.fee).toBe(10_000n);
    expect(decoded.memo).toBe(97n);
  });

  it("only claims when no amount is given", () => {
    const built = buildNeuronStake({ controller: CONTROLLER, nonce: "5" });

    expect(built.operation).toEqual({
      kind: "neuron-stake",
      controller: CONTROLLER,
      nonce: 5n,
      transfer: undefined,
    });
    expect(built.calls).toHaveLength(1);
    expect(callAt(built, 0).methodName).toBe("claim_or_refresh_neuron_from_account");
  });

  it("round-trips the claim argument", () => {
    const built = buildNeuronStake({ controller: CONTROLLER, nonce: "123" });
    expect(decodeNeuronStake(callAt(built, 0).arg)).toEqual({
      kind: "neuron-stake",
      controller: CONTROLLER,
      nonce: 123n,
    });
  });

  it("requires a nonce or a name", () => {
    expect(() => buildNeuronStake({ controller: CONTROLLER })).toThrow(
      "Either a nonce or a name should be specified",
    );
  });

  it("rejects both a nonce and a name", () => {
    expect(() => buildNeuronStake({ controller: CONTROLLER, nonce: "1", name: "a" })).toThrow(
      InputError,
    );
  });

  it("rejects a malformed controller", () => {
    expect(() => buildNeuronStake({ controller: "not-a-principal", nonce: "1" })).toThrow(
      InputError,
    );
  });

  it("rejects a funding amount whose total with the fee exceeds 64 bits", () => {
    let error: unknown;
    try {
      buildNeuronStake({ controller: CONTROLLER, nonce: "1", amount: "184467440737.09551615" });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(InputError);
    expect(error).toMatchObject({ code: "AMOUNT_OVERFLOW" });
  });
});

// =============================================================================
// Neuron manage
// =============================================================================

describe("buildNeuronManage", () => {
  it("builds one manage_neuron call per command, in order", () => {
    const built = buildNeuronManage({
      neuronId: "1_234",
      commands: [{ kind: "start-dissolving" }, { kind: "stop-dissolving" }],
    });

    expect(built).toHaveLength(2);
    expect(built.map((request) => request.operation.command.kind)).toEqual([
      "start-dissolving",
      "stop-dissolving",
    ]);
    for (const request of built) {
      expect(request.operation.neuronId).toBe(1234n);
      expect(callAt(request, 0).methodName).toBe("manage_neuron");
      expect(callAt(request, 0).canisterId).toBe(GOVERNANCE_CANISTER_ID);
    }
  });

  it("rejects an empty command list", () => {
    expect(() => buildNeuronManage({ neuronId: "1", commands: [] })).toThrow(
      "No instructions provided",
    );
  });

  const cases: readonly { readonly name: string; readonly expected: NeuronCommand; readonly input: Parameters<typeof parseNeuronCommand>[0] }[] = [
    {
      name: "add-hot-key",
      input: { kind: "add-hot-key", hotKey: HOT_KEY },
      expected: { kind: "add-hot-key", hotKey: HOT_KEY },
    },
    {
      name: "remove-hot-key",
      input: { kind: "remove-hot-key", hotKey: HOT_KEY },
      expected: { kind: "remove-hot-key", hotKey: HOT_KEY },
    },
    {
      name: "increase-dissolve-delay",
      input: { kind: "increase-dissolve-delay", seconds: "86400" },
      expected: { kind: "increase-dissolve-delay", additionalSeconds: 86400 },
    },
    {
      name: "start-dissolving",
      input: { kind: "start-dissolving" },
      expected: { kind: "start-dissolving" },
    },
    {
      name: "stop-dissolving",
      input: { kind: "stop-dissolving" },
      expected: { kind: "stop-dissolving" },
    },
    {
      name: "disburse with destination and amount",
      input: { kind: "disburse", toAccount: DESTINATION, amount: "3" },
      expected: { kind: "disburse", toAccount: DESTINATION, amount: 300_000_000n },
    },
    {
      name: "disburse everything to the controller",
      input: { kind: "disburse" },
      expected: { kind: "disburse", toAccount: undefined, amount: undefined },
    },
    {
      name: "spawn",
      input: { kind: "spawn", newController: HOT_KEY },
      expected: { kind: "spawn", newController: HOT_KEY },
    },
    {
      name: "split",
      input: { kind: "split", amount: "1.5" },
      expected: { kind: "split", amount: 150_000_000n },
    },
    {
      name: "merge",
      input: { kind: "merge", sourceNeuronId: "99" },
      expected: { kind: "merge", sourceNeuronId: 99n },
    },
    {
      name: "merge-maturity",
      input: { kind: "merge-maturity", percentage: "50" },
      expected: { kind: "merge-maturity", percentage: 50 },
    },
  ];

  for (const { name, input, expected } of cases) {
    it(`round-trips ${name}`, () => {
      const [request] = buildNeuronManage({ neuronId: "42", commands: [input] });
      if (request === undefined) throw new Error("no request built");

      expect(request.operation.command).toEqual(expected);
      expect(decodeNeuronManage(callAt(request, 0).arg)).toEqual({
        kind: "neuron-manage",
        neuronId: 42n,
        command: expected,
      });
    });
  }
});

describe("parseNeuronCommand", () => {
  it("rejects an unknown kind", () => {
    expect(() => parseNeuronCommand({ kind: "dissolve-now" })).toThrow(
      'Unknown neuron command "dissolve-now"',
    );
  });

  it("reports a missing field", () => {
    expect(() => parseNeuronCommand({ kind: "add-hot-key" })).toThrow("hotKey is required");
  });

  it("rejects a merge percentage of 0", () => {
    expect(() => parseNeuronCommand({ kind: "merge-maturity", percentage: "0" })).toThrow(
      "Percentage to merge must be a number from 1 to 100",
    );
  });

  it("rejects a merge percentage above 100", () => {
    expect(() => parseNeuronCommand({ kind: "merge-maturity", percentage: "101" })).toThrow(
      InputError,
    );
  });

  it("rejects a dissolve delay beyond 32 bits", () => {
    expect(() =>
      parseNeuronCommand({ kind: "increase-dissolve-delay", seconds: "4294967296" }),
    ).toThrow("does not fit in 32 bits");
  });
});

describe("parseNeuronId", () => {
  it("strips digit separators", () => {
    expect(parseNeuronId("12_345_678", "neuronId")).toBe(12_345_678n);
  });

  it("rejects non-numeric ids", () => {
    expect(() => parseNeuronId("abc", "neuronId")).toThrow(InputError);
  });
});

// =============================================================================
// List neurons
// =============================================================================

describe("buildListNeurons", () => {
  it("lists readable neurons when no ids are given", () => {
    const built = buildListNeurons();
    const call = callAt(built, 0);

    expect(call.methodName).toBe("list_neurons");
    expect(call.callType).toBe("query");
    expect(decodeListNeurons(call.arg)).toEqual({ kind: "list-neurons", neuronIds: [] });
  });

  it("round-trips explicit ids", () => {
    const built = buildListNeurons({ neuronIds: ["1", "2_000"] });
    expect(decodeListNeurons(callAt(built, 0).arg)).toEqual({
      kind: "list-neurons",
      neuronIds: [1n, 2000n],
    });
  });
});

describe("decodeGovernanceCall", () => {
  it("dispatches on the method name", () => {
    const built = buildListNeurons({ neuronIds: ["7"] });
    expect(decodeGovernanceCall("list_neurons", callAt(built, 0).arg)).toEqual({
      kind: "list-neurons",
      neuronIds: [7n],
    });
  });

  it("returns undefined for an unknown method", () => {
    expect(decodeGovernanceCall("get_proposal_info", new Uint8Array())).toBeUndefined();
  });
});
