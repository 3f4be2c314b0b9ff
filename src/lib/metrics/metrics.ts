/**
 * In-process counters for one orchestrator run, rendered by the status
 * server's `/metrics` route.
 */

export const COUNTER_NAMES = [
  "launchesTotal",
  "launchFailuresTotal",
  "probesTotal",
  "probeFailuresTotal",
  "probeTimeoutsTotal",
  "httpRequestsTotal",
] as const;

export type CounterName = (typeof COUNTER_NAMES)[number];

export type CounterSnapshot = Record<CounterName, number>;

/** Durations above this count are dropped oldest first */
const MAX_DURATIONS = 1000;

export interface Metrics {
  increment(counter: CounterName): void;
  recordRequestDuration(durationMs: number): void;
  counters(): CounterSnapshot;
  /** Most recent HTTP request durations in milliseconds */
  requestDurations(): readonly number[];
}

export const createMetrics = (): Metrics => {
  const counters: CounterSnapshot = {
    launchesTotal: 0,
    launchFailuresTotal: 0,
    probesTotal: 0,
    probeFailuresTotal: 0,
    probeTimeoutsTotal: 0,
    httpRequestsTotal: 0,
  };
  const durations: number[] = [];

  return {
    increment: (counter) => {
      counters[counter] += 1;
    },
    recordRequestDuration: (durationMs) => {
      durations.push(durationMs);
      if (durations.length > MAX_DURATIONS) {
        durations.shift();
      }
    },
    counters: () => ({ ...counters }),
    requestDurations: () => [...durations],
  };
};
