export type { DependencyGraph } from "./types";
export { buildDependencyGraph, findCycle } from "./build";
