import { describe, expect, it } from "vitest";

import { createMetrics } from "./metrics";

describe("createMetrics", () => {
  it("should start every counter at zero", () => {
    expect(createMetrics().counters()).toEqual({
      launchesTotal: 0,
      launchFailuresTotal: 0,
      probesTotal: 0,
      probeFailuresTotal: 0,
      probeTimeoutsTotal: 0,
      httpRequestsTotal: 0,
    });
  });

  it("should increment counters independently", () => {
    const metrics = createMetrics();

    metrics.increment("probesTotal");
    metrics.increment("probesTotal");
    metrics.increment("probeTimeoutsTotal");

    expect(metrics.counters()).toMatchObject({ probesTotal: 2, probeTimeoutsTotal: 1, launchesTotal: 0 });
  });

  it("should return copies", () => {
    const metrics = createMetrics();
    const before = metrics.counters();

    metrics.increment("launchesTotal");

    expect(before.launchesTotal).toBe(0);
  });

  it("should keep only the most recent request durations", () => {
    const metrics = createMetrics();

    for (let i = 0; i < 1005; i++) {
      metrics.recordRequestDuration(i);
    }

    const durations = metrics.requestDurations();
    expect(durations).toHaveLength(1000);
    expect(durations[0]).toBe(5);
    expect(durations[999]).toBe(1004);
  });
});
