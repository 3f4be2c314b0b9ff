import type {
  DependencyCondition,
  DependencyEdge,
  HealthCheckDescriptor,
  ServiceDefinition,
} from "@/domains/service";

export const healthCheck = (overrides: Partial<HealthCheckDescriptor> = {}): HealthCheckDescriptor => ({
  test: { kind: "shell", command: "true" },
  intervalMs: 1000,
  timeoutMs: 500,
  retries: 3,
  startPeriodMs: 0,
  ...overrides,
});

export const service = (
  name: string,
  check: HealthCheckDescriptor | null = null,
): ServiceDefinition => ({
  name,
  healthCheck: check,
  networks: [],
  volumes: [],
  spec: {},
});

export const edge = (
  dependent: string,
  prerequisite: string,
  condition: DependencyCondition = "started",
): DependencyEdge => ({ dependent, prerequisite, condition });
