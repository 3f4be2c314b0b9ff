import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const millisecondsSchema = v.pipe(
  v.string(),
  v.transform(Number),
  v.number(),
  v.integer(),
  v.minValue(1),
);

/** Comma-separated service names */
const serviceListSchema = v.pipe(
  v.string(),
  v.transform((value) =>
    value
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  ),
);

export const envSchema = v.object({
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "production"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Topology
  COMPOSE_FILE: v.optional(v.pipe(v.string(), v.minLength(1)), "docker-compose.yml"),
  RUNTIME: v.optional(v.picklist(["process", "dry-run"]), "process"),
  COMPOSE_PARALLEL_LIMIT: v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(1)),
  ),

  // Runtime
  PROCESS_SETTLE_MS: v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(0)),
  ),
  DRY_RUN_FAILING_PROBES: v.optional(serviceListSchema),
  DRY_RUN_FAILING_LAUNCHES: v.optional(serviceListSchema),

  // Timing
  STARTUP_DEADLINE_MS: v.optional(millisecondsSchema),
  SHUTDOWN_GRACE_MS: v.optional(millisecondsSchema, "10000"),

  // Status server
  PORT: v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.minValue(1), v.maxValue(65535)),
  ),
});

export type Env = v.InferOutput<typeof envSchema>;
