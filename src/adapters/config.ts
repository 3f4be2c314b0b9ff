/**
 * Runtime adapter configuration validation schemas.
 */

import { dirname, resolve } from "node:path";

import * as v from "valibot";

import type { AppConfig } from "@/lib/config";

export const RuntimeConfigSchema = v.variant("runtime", [
  v.object({
    runtime: v.literal("process"),
    /** Working directory for service commands and shell probes */
    cwd: v.optional(v.pipe(v.string(), v.minLength(1))),
    /** Delay after spawn during which an exit counts as a failed launch */
    settleMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0))),
  }),
  v.object({
    runtime: v.literal("dry-run"),
    /** Services whose probes always fail, for rehearsing failure paths */
    failingProbes: v.optional(v.array(v.string())),
    /** Services whose launch always fails */
    failingLaunches: v.optional(v.array(v.string())),
  }),
]);

export type RuntimeConfig = v.InferOutput<typeof RuntimeConfigSchema>;

export const parseRuntimeConfig = (config: unknown): RuntimeConfig =>
  v.parse(RuntimeConfigSchema, config);

/**
 * Runtime configuration for the application config. Process commands run in
 * the compose file's directory.
 */
export const runtimeConfigFor = (config: AppConfig): RuntimeConfig => {
  const { runtime } = config;
  return parseRuntimeConfig(
    runtime.kind === "process"
      ? {
          runtime: "process",
          cwd: dirname(resolve(config.compose.file)),
          settleMs: runtime.settleMs,
        }
      : {
          runtime: "dry-run",
          failingProbes: runtime.failingProbes,
          failingLaunches: runtime.failingLaunches,
        },
  );
};
