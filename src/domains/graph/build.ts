/**
 * Dependency graph construction and validation.
 *
 * Validation runs in three passes, all before anything can be scheduled:
 * 1. every edge names declared services
 * 2. the edges are acyclic (depth-first search with visiting/visited sets)
 * 3. `healthy` edges point at services that declare a health check
 */

import { ConfigurationError, CycleError } from "../errors";
import type { DependencyEdge, ServiceDefinition } from "../service/types";

import type { DependencyGraph } from "./types";

const validateNames = (services: readonly ServiceDefinition[]): Map<string, number> => {
  const index = new Map<string, number>();
  const duplicates: string[] = [];

  services.forEach((service, position) => {
    if (index.has(service.name)) {
      duplicates.push(service.name);
      return;
    }
    index.set(service.name, position);
  });

  if (duplicates.length > 0) {
    throw new ConfigurationError(
      `Duplicate service names: ${duplicates.join(", ")}`,
      duplicates.map((name) => `service ${name} is declared more than once`),
    );
  }
  return index;
};

const validateReferences = (
  edges: readonly DependencyEdge[],
  index: ReadonlyMap<string, number>,
): void => {
  const issues: string[] = [];
  for (const edge of edges) {
    if (!index.has(edge.dependent)) {
      issues.push(`dependent ${edge.dependent} is not a declared service`);
    }
    if (!index.has(edge.prerequisite)) {
      issues.push(`${edge.dependent} depends on undeclared service ${edge.prerequisite}`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigurationError("Dependency edges reference undeclared services", issues);
  }
};

/**
 * Returns the first cycle found, as a path that starts and ends on the same
 * service, or null when the edges are acyclic.
 */
export const findCycle = (
  services: readonly ServiceDefinition[],
  prerequisites: ReadonlyMap<string, readonly DependencyEdge[]>,
): string[] | null => {
  const visited = new Set<string>();
  const visiting = new Set<string>();
  const path: string[] = [];

  const visit = (name: string): string[] | null => {
    visiting.add(name);
    path.push(name);

    for (const edge of prerequisites.get(name) ?? []) {
      const next = edge.prerequisite;
      if (visiting.has(next)) {
        // Back-edge: the cycle is the path from `next` onwards
        return [...path.slice(path.indexOf(next)), next];
      }
      if (!visited.has(next)) {
        const cycle = visit(next);
        if (cycle) return cycle;
      }
    }

    visiting.delete(name);
    visited.add(name);
    path.pop();
    return null;
  };

  for (const service of services) {
    if (!visited.has(service.name)) {
      const cycle = visit(service.name);
      if (cycle) return cycle;
    }
  }
  return null;
};

const validateHealthConditions = (
  edges: readonly DependencyEdge[],
  byName: ReadonlyMap<string, ServiceDefinition>,
): void => {
  const issues = edges
    .filter((edge) => edge.condition === "healthy" && !byName.get(edge.prerequisite)?.healthCheck)
    .map(
      (edge) =>
        `${edge.dependent} requires ${edge.prerequisite} to be healthy, but ${edge.prerequisite} declares no health check`,
    );
  if (issues.length > 0) {
    throw new ConfigurationError("Health condition on a service without a health check", issues);
  }
};

/**
 * Kahn's algorithm; among the services whose prerequisites are all placed,
 * the earliest declared goes first.
 */
const sortTopologically = (
  services: readonly ServiceDefinition[],
  index: ReadonlyMap<string, number>,
  prerequisites: ReadonlyMap<string, readonly DependencyEdge[]>,
  dependents: ReadonlyMap<string, readonly DependencyEdge[]>,
): ServiceDefinition[] => {
  const remaining = new Map<string, number>();
  for (const service of services) {
    const distinct = new Set((prerequisites.get(service.name) ?? []).map((e) => e.prerequisite));
    remaining.set(service.name, distinct.size);
  }

  const available = services.filter((service) => remaining.get(service.name) === 0);
  const order: ServiceDefinition[] = [];
  const placed = new Set<string>();

  while (available.length > 0) {
    available.sort((a, b) => (index.get(a.name) ?? 0) - (index.get(b.name) ?? 0));
    const next = available.shift();
    if (!next) break;
    order.push(next);
    placed.add(next.name);

    const released = new Set<string>();
    for (const edge of dependents.get(next.name) ?? []) {
      if (released.has(edge.dependent)) continue;
      released.add(edge.dependent);
      const count = (remaining.get(edge.dependent) ?? 0) - 1;
      remaining.set(edge.dependent, count);
      if (count === 0 && !placed.has(edge.dependent)) {
        const dependent = services[index.get(edge.dependent) ?? -1];
        if (dependent) available.push(dependent);
      }
    }
  }

  return order;
};

/**
 * Build an immutable dependency graph.
 *
 * @throws ConfigurationError for duplicate names, undeclared references or a
 *   `healthy` condition on a service without a health check
 * @throws CycleError when the edges contain a cycle
 *
 * @example
 * ```typescript
 * const graph = buildDependencyGraph(services, [
 *   { dependent: "api", prerequisite: "db", condition: "healthy" },
 * ]);
 * graph.topologicalOrder().map((s) => s.name); // ["db", "api"]
 * ```
 */
export const buildDependencyGraph = (
  services: readonly ServiceDefinition[],
  edges: readonly DependencyEdge[],
): DependencyGraph => {
  const index = validateNames(services);
  validateReferences(edges, index);

  const byName = new Map(services.map((service) => [service.name, service]));
  const prerequisites = new Map<string, DependencyEdge[]>();
  const dependents = new Map<string, DependencyEdge[]>();
  for (const service of services) {
    prerequisites.set(service.name, []);
    dependents.set(service.name, []);
  }
  for (const edge of edges) {
    const frozen = Object.freeze({ ...edge });
    prerequisites.get(edge.dependent)?.push(frozen);
    dependents.get(edge.prerequisite)?.push(frozen);
  }
  for (const list of dependents.values()) {
    list.sort((a, b) => (index.get(a.dependent) ?? 0) - (index.get(b.dependent) ?? 0));
  }

  const cycle = findCycle(services, prerequisites);
  if (cycle) {
    throw new CycleError(cycle);
  }
  validateHealthConditions(edges, byName);

  const declared = Object.freeze([...services]);
  const order = Object.freeze(sortTopologically(services, index, prerequisites, dependents));
  for (const list of [...prerequisites.values(), ...dependents.values()]) {
    Object.freeze(list);
  }

  const get = (name: string): ServiceDefinition => {
    const service = byName.get(name);
    if (!service) {
      throw new ConfigurationError(`Unknown service: ${name}`);
    }
    return service;
  };

  return {
    services: () => declared,
    get,
    has: (name) => byName.has(name),
    prerequisitesOf: (name) => {
      get(name);
      return prerequisites.get(name) ?? [];
    },
    dependentsOf: (name) => {
      get(name);
      return dependents.get(name) ?? [];
    },
    topologicalOrder: () => order,
  };
};
