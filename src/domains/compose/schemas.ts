/**
 * Valibot schemas for the parts of a compose document the orchestrator reads.
 *
 * Service entries are loose objects: fields the orchestrator does not
 * interpret (image, build, ports, env_file, ...) pass through untouched and
 * reach the runtime as the service's `spec`.
 */

import * as v from "valibot";

import { isDuration, parseDuration } from "./duration";

const SERVICE_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

export const durationSchema = v.pipe(
  v.string(),
  v.check(isDuration, (issue) => `Invalid duration: ${JSON.stringify(issue.input)}`),
  v.transform(parseDuration),
);

export const composeConditionSchema = v.picklist([
  "service_started",
  "service_healthy",
  "service_completed_successfully",
]);

export type ComposeCondition = v.InferOutput<typeof composeConditionSchema>;

export const healthcheckSchema = v.looseObject({
  test: v.optional(v.union([v.string(), v.array(v.string())])),
  interval: v.optional(durationSchema),
  timeout: v.optional(durationSchema),
  retries: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0))),
  start_period: v.optional(durationSchema),
  disable: v.optional(v.boolean()),
});

export type ComposeHealthcheck = v.InferOutput<typeof healthcheckSchema>;

export const dependsOnSchema = v.union([
  v.array(v.string()),
  v.record(
    v.string(),
    v.looseObject({
      condition: v.optional(composeConditionSchema, "service_started"),
      required: v.optional(v.boolean(), true),
      restart: v.optional(v.boolean()),
    }),
  ),
]);

export const networksSchema = v.union([
  v.array(v.string()),
  v.record(v.string(), v.nullable(v.looseObject({}))),
]);

export const volumesSchema = v.array(
  v.union([
    v.string(),
    v.looseObject({
      type: v.optional(v.string()),
      source: v.optional(v.string()),
      target: v.string(),
    }),
  ]),
);

export const composeServiceSchema = v.looseObject({
  healthcheck: v.optional(healthcheckSchema),
  depends_on: v.optional(dependsOnSchema),
  networks: v.optional(networksSchema),
  volumes: v.optional(volumesSchema),
});

export type ComposeService = v.InferOutput<typeof composeServiceSchema>;

export const composeFileSchema = v.looseObject({
  name: v.optional(v.string()),
  version: v.optional(v.string()),
  services: v.pipe(
    v.record(
      v.pipe(
        v.string(),
        v.regex(SERVICE_NAME_PATTERN, (issue) => `Invalid service name: ${issue.input}`),
      ),
      composeServiceSchema,
    ),
    v.check((services) => Object.keys(services).length > 0, "No services declared"),
  ),
});

export type ComposeFile = v.InferOutput<typeof composeFileSchema>;
