/**
 * Turn a validated compose document into service definitions and dependency
 * edges.
 */

import { ConfigurationError } from "@/domains/errors";
import {
  DEFAULT_HEALTH_CHECK_TIMING,
  type DependencyCondition,
  type DependencyEdge,
  type HealthCheckDescriptor,
  type ServiceDefinition,
} from "@/domains/service";

import type { ComposeCondition, ComposeFile, ComposeHealthcheck, ComposeService } from "./schemas";

export interface ComposeProject {
  name: string | null;
  /** Services in declaration order */
  services: ServiceDefinition[];
  /** Edges grouped by dependent, each group in declaration order */
  edges: DependencyEdge[];
}

const CONDITIONS: Record<ComposeCondition, DependencyCondition | null> = {
  service_started: "started",
  service_healthy: "healthy",
  service_completed_successfully: null,
};

type Issues = string[];

/**
 * `null` means the service has no health check: none declared, disabled, or
 * a `NONE` test.
 */
export const normalizeHealthcheck = (
  service: string,
  healthcheck: ComposeHealthcheck | undefined,
  issues: Issues,
): HealthCheckDescriptor | null => {
  if (!healthcheck || healthcheck.disable === true || healthcheck.test === undefined) {
    return null;
  }

  const timing = {
    // Zero means "use the default" for every timing field
    intervalMs: healthcheck.interval || DEFAULT_HEALTH_CHECK_TIMING.intervalMs,
    timeoutMs: healthcheck.timeout || DEFAULT_HEALTH_CHECK_TIMING.timeoutMs,
    retries: healthcheck.retries || DEFAULT_HEALTH_CHECK_TIMING.retries,
    startPeriodMs: healthcheck.start_period ?? DEFAULT_HEALTH_CHECK_TIMING.startPeriodMs,
  };

  const { test } = healthcheck;
  if (typeof test === "string") {
    if (test.trim().length === 0) {
      issues.push(`${service}: healthcheck test is empty`);
      return null;
    }
    return { test: { kind: "shell", command: test }, ...timing };
  }

  const [mode, ...rest] = test;
  switch (mode) {
    case "NONE":
      return null;
    case "CMD":
      if (rest.length === 0) {
        issues.push(`${service}: healthcheck CMD needs a command`);
        return null;
      }
      return { test: { kind: "exec", argv: rest }, ...timing };
    case "CMD-SHELL":
      if (rest.length === 0) {
        issues.push(`${service}: healthcheck CMD-SHELL needs a command`);
        return null;
      }
      return { test: { kind: "shell", command: rest.join(" ") }, ...timing };
    default:
      issues.push(
        `${service}: healthcheck test must start with NONE, CMD or CMD-SHELL, got ${JSON.stringify(mode ?? null)}`,
      );
      return null;
  }
};

const normalizeNetworks = (networks: ComposeService["networks"]): string[] => {
  if (!networks) return [];
  return Array.isArray(networks) ? [...networks] : Object.keys(networks);
};

const normalizeVolumes = (volumes: ComposeService["volumes"]): string[] =>
  (volumes ?? []).map((volume) => {
    if (typeof volume === "string") return volume;
    return volume.source ? `${volume.source}:${volume.target}` : volume.target;
  });

const normalizeDependsOn = (
  dependent: string,
  dependsOn: ComposeService["depends_on"],
  declared: ReadonlySet<string>,
  issues: Issues,
): DependencyEdge[] => {
  if (!dependsOn) return [];

  if (Array.isArray(dependsOn)) {
    return dependsOn.map(
      (prerequisite): DependencyEdge => ({ dependent, prerequisite, condition: "started" }),
    );
  }

  const edges: DependencyEdge[] = [];
  for (const [prerequisite, options] of Object.entries(dependsOn)) {
    const condition = CONDITIONS[options.condition];
    if (condition === null) {
      issues.push(`${dependent}: condition ${options.condition} on ${prerequisite} is not supported`);
      continue;
    }
    // Optional dependencies on services that are not declared are dropped
    if (!options.required && !declared.has(prerequisite)) {
      continue;
    }
    edges.push({
      dependent,
      prerequisite,
      condition,
      ...(!options.required && { required: false }),
    });
  }
  return edges;
};

/**
 * Extract service definitions and dependency edges. Everything that is wrong
 * with the document is reported at once in one `ConfigurationError`.
 * Undeclared prerequisites, cycles and unsatisfiable `healthy` conditions are
 * left to the dependency graph.
 *
 * @throws {ConfigurationError} When a health check or condition is unsupported
 */
export const normalizeCompose = (file: ComposeFile): ComposeProject => {
  const issues: Issues = [];
  const declared = new Set(Object.keys(file.services));
  const services: ServiceDefinition[] = [];
  const edges: DependencyEdge[] = [];

  for (const [name, entry] of Object.entries(file.services)) {
    services.push({
      name,
      healthCheck: normalizeHealthcheck(name, entry.healthcheck, issues),
      networks: normalizeNetworks(entry.networks),
      volumes: normalizeVolumes(entry.volumes),
      spec: entry,
    });
    edges.push(...normalizeDependsOn(name, entry.depends_on, declared, issues));
  }

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid compose file", issues);
  }

  return { name: file.name ?? null, services, edges };
};
