/**
 * @coldsig/governance — NNS governance requests.
 *
 * Neuron staking, neuron management and neuron listing, signed offline:
 * 1. Stake: fund the staking subaccount, then claim or refresh the neuron
 * 2. Manage: one `manage_neuron` call per command
 * 3. List: query the caller's neurons
 */

// Request builders
export {
  buildNeuronStake,
  encodeNeuronStake,
  buildNeuronManage,
  encodeNeuronManage,
  parseNeuronCommand,
  parseNeuronId,
  buildListNeurons,
  encodeListNeurons,
} from "./requests.js";

// Decoding
export {
  decodeNeuronStake,
  decodeNeuronManage,
  decodeListNeurons,
  decodeGovernanceCall,
} from "./decode.js";

// Staking
export {
  computeNeuronStakingSubaccount,
  neuronNameToNonce,
  MAX_NEURON_NAME_LENGTH,
} from "./staking.js";

// Candid interface
export {
  NeuronId,
  ManageNeuron,
  ClaimOrRefreshNeuronFromAccount,
  ListNeurons,
  GOVERNANCE_METHODS,
} from "./governance-idl.js";
export type { GovernanceMethod } from "./governance-idl.js";

// Types
export type {
  GovernanceCallOptions,
  NeuronStakeInput,
  NeuronCommandInput,
  NeuronManageInput,
  ListNeuronsInput,
} from "./types.js";
