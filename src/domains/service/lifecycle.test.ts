import { describe, expect, it } from "vitest";

import {
  canTransition,
  deriveLifecycleState,
  isConditionSatisfied,
  isTerminalPhase,
} from "./lifecycle";

describe("canTransition", () => {
  it("should follow the forward path", () => {
    expect(canTransition("pending", "starting")).toBe(true);
    expect(canTransition("starting", "started")).toBe(true);
    expect(canTransition("started", "stopped")).toBe(true);
  });

  it("should not skip the starting phase", () => {
    expect(canTransition("pending", "started")).toBe(false);
  });

  it("should never leave a terminal phase", () => {
    for (const to of ["pending", "starting", "started", "stopped", "failed"] as const) {
      expect(canTransition("failed", to)).toBe(false);
      expect(canTransition("stopped", to)).toBe(false);
    }
  });

  it("should allow stopping from every non-failed phase", () => {
    expect(canTransition("pending", "stopped")).toBe(true);
    expect(canTransition("starting", "stopped")).toBe(true);
    expect(canTransition("started", "stopped")).toBe(true);
  });
});

describe("isTerminalPhase", () => {
  it("should treat failed and stopped as terminal", () => {
    expect(isTerminalPhase("failed")).toBe(true);
    expect(isTerminalPhase("stopped")).toBe(true);
    expect(isTerminalPhase("started")).toBe(false);
  });
});

describe("deriveLifecycleState", () => {
  it("should report the verdict for started health-checked services", () => {
    expect(deriveLifecycleState("started", "healthy", true)).toBe("healthy");
    expect(deriveLifecycleState("started", "unhealthy", true)).toBe("unhealthy");
    expect(deriveLifecycleState("started", "checking", true)).toBe("started");
    expect(deriveLifecycleState("started", "unknown", true)).toBe("started");
  });

  it("should ignore the verdict outside the started phase", () => {
    expect(deriveLifecycleState("failed", "healthy", true)).toBe("failed");
    expect(deriveLifecycleState("stopped", "healthy", true)).toBe("stopped");
  });

  it("should ignore the verdict for services without a health check", () => {
    expect(deriveLifecycleState("started", "healthy", false)).toBe("started");
  });
});

describe("isConditionSatisfied", () => {
  it("should accept started or healthy prerequisites for the started condition", () => {
    expect(isConditionSatisfied("started", "started")).toBe(true);
    expect(isConditionSatisfied("started", "healthy")).toBe(true);
    expect(isConditionSatisfied("started", "starting")).toBe(false);
    expect(isConditionSatisfied("started", "unhealthy")).toBe(false);
  });

  it("should only accept healthy prerequisites for the healthy condition", () => {
    expect(isConditionSatisfied("healthy", "healthy")).toBe(true);
    expect(isConditionSatisfied("healthy", "started")).toBe(false);
    expect(isConditionSatisfied("healthy", "unhealthy")).toBe(false);
  });
});
