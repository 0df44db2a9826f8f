/**
 * @coldsig/toolkit — offline signing for the ICP ledger and NNS governance.
 *
 * Wires the request builders, the signer and the ambient stack together:
 * - Configuration from the environment (zod)
 * - Structured logging (pino)
 * - The signing pipeline: input → operation → signed message bundles
 * - Dry runs of envelopes and message files
 */

export { ConfigSchema, loadConfig } from "./config.js";
export type { ToolkitConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { encodeOperation, decodeCall, buildRawCall } from "./operations.js";
export type { CanisterTargets, RawCallInput } from "./operations.js";
export { SigningPipeline } from "./sign.js";
export type { SigningPipelineOptions, StakeInput, PublicIds } from "./sign.js";
export { renderHuman, renderOperation, renderMessageFile } from "./dry-run.js";
export type { RenderMessageFileOptions } from "./dry-run.js";
