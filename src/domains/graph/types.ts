import type { DependencyEdge, ServiceDefinition } from "../service/types";

/**
 * Immutable, validated dependency graph.
 */
export interface DependencyGraph {
  /** Services in declaration order */
  services(): readonly ServiceDefinition[];
  get(name: string): ServiceDefinition;
  has(name: string): boolean;
  /** Edges on which `name` depends, in declaration order */
  prerequisitesOf(name: string): readonly DependencyEdge[];
  /** Edges that depend on `name`, in declaration order of the dependents */
  dependentsOf(name: string): readonly DependencyEdge[];
  /** Every service after all of its prerequisites; ties follow declaration order */
  topologicalOrder(): readonly ServiceDefinition[];
}
