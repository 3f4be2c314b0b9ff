// Types
export type {
  DependencyCondition,
  DependencyEdge,
  HealthCheckDescriptor,
  HealthStatus,
  HealthVerdict,
  LifecyclePhase,
  LifecycleState,
  ProbeTest,
  ServiceDefinition,
  ServiceFailure,
  ServiceHandle,
} from "./types";

// Schemas and defaults
export {
  DEFAULT_HEALTH_CHECK_TIMING,
  dependencyConditionSchema,
  healthStatusSchema,
  initialVerdict,
  lifecyclePhaseSchema,
  lifecycleStateSchema,
} from "./types";

// State machine
export {
  canTransition,
  deriveLifecycleState,
  isConditionSatisfied,
  isTerminalPhase,
} from "./lifecycle";
