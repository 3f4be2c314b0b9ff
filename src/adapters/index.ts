/**
 * Runtime adapter exports.
 */

export type { ProbeOutcome, RuntimeAdapter, RuntimeKind } from "./types";
export { MAX_PROBE_OUTPUT_LENGTH, truncateOutput } from "./types";

export { RuntimeError } from "./errors";
export type { RuntimeErrorCode } from "./errors";

// Factory function
export { createRuntimeAdapter } from "./factory";

// Config validation
export { RuntimeConfigSchema, parseRuntimeConfig, runtimeConfigFor } from "./config";
export type { RuntimeConfig } from "./config";

// Adapter factory functions
export { createDryRunAdapter } from "./dry-run";
export type { DryRunAdapter, DryRunAdapterConfig } from "./dry-run";
export { createProcessAdapter, resolveEnvironment } from "./process";
export type { ProcessAdapterConfig } from "./process";
