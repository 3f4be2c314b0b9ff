export { COUNTER_NAMES, createMetrics } from "./metrics";
export type { CounterName, CounterSnapshot, Metrics } from "./metrics";
