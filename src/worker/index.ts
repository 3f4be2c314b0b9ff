export { createOrchestrator } from "./orchestrator";
export type { Orchestrator, OrchestratorConfig } from "./orchestrator";
export { createStartupScheduler } from "./scheduler";
export type { RunResult, StartupScheduler, StartupSchedulerDeps } from "./scheduler";
export { createHealthProber, nextVerdict } from "./prober";
export type { HealthProber, HealthProberDeps } from "./prober";
export { createLaunchQueue } from "./launch-queue";
export type { LaunchJob, LaunchQueue, LaunchQueueConfig, LaunchStatus } from "./launch-queue";
export { UnknownServiceError, createServiceRegistry } from "./registry";
export type {
  RegistryEvent,
  RegistryListener,
  ServiceRegistry,
  ServiceSnapshot,
} from "./registry";
