import { describe, expect, it } from "vitest"

import { EngineHealthTracker } from "./engine-stats.js"
import { failureResponse, successResponse } from "./response.js"

const success = (provider: string) => successResponse({ provider, model: "m", content: "ok" })
const failure = (provider: string) =>
  failureResponse({ provider, model: "m", status: "error", errorMessage: "down", errorCode: "API_ERROR" })

describe("EngineHealthTracker", () => {
  it("treats unvisited providers as fully successful", () => {
    const tracker = new EngineHealthTracker()
    tracker.register("a")

    expect(tracker.successRate("a")).toBe(1)
    expect(tracker.successRate("never-registered")).toBe(1)
    expect(tracker.isHealthy("a", 3)).toBe(true)
  })

  it("averages response time over successful calls only", () => {
    const tracker = new EngineHealthTracker()
    tracker.record("a", success("a"), 1)
    tracker.record("a", failure("a"), 30)
    tracker.record("a", success("a"), 3)

    const record = tracker.getRecord("a")
    expect(record.totalRequests).toBe(3)
    expect(record.totalSuccesses).toBe(2)
    expect(record.totalFailures).toBe(1)
    expect(record.averageResponseTimeSeconds).toBe(2)
    expect(tracker.successRate("a")).toBeCloseTo(2 / 3)
  })

  it("resets the consecutive failure count on success", () => {
    const tracker = new EngineHealthTracker()
    tracker.record("a", failure("a"), 1)
    tracker.record("a", failure("a"), 1)
    expect(tracker.isHealthy("a", 2)).toBe(false)

    tracker.record("a", success("a"), 1)
    expect(tracker.getRecord("a").consecutiveFailures).toBe(0)
    expect(tracker.isHealthy("a", 2)).toBe(true)
  })

  it("ranks by success rate, then latency, then candidate order", () => {
    const tracker = new EngineHealthTracker()
    tracker.record("slow", success("slow"), 2)
    tracker.record("fast", success("fast"), 0.5)
    tracker.record("flaky", success("flaky"), 0.1)
    tracker.record("flaky", failure("flaky"), 0.1)

    expect(tracker.rankProviders(["flaky", "fresh", "slow", "fast"])).toEqual(["fast", "slow", "fresh", "flaky"])
  })

  it("keeps candidate order for ties", () => {
    const tracker = new EngineHealthTracker()
    expect(tracker.rankProviders(["c", "a", "b"])).toEqual(["c", "a", "b"])
  })

  it("clears a provider's record on reset", () => {
    const tracker = new EngineHealthTracker()
    tracker.record("a", failure("a"), 1)
    tracker.reset("a")

    expect(tracker.getRecord("a").totalRequests).toBe(0)
    expect(tracker.getRecord("a").lastUsedAt).toBeNull()
  })

  it("summarizes overall health", () => {
    const tracker = new EngineHealthTracker()
    expect(tracker.healthReport(1).overallHealth).toBe("unknown")

    for (const name of ["a", "b", "c"]) {
      tracker.register(name)
    }
    expect(tracker.healthReport(1).overallHealth).toBe("healthy")

    tracker.record("a", failure("a"), 1)
    tracker.record("b", failure("b"), 1)
    const degraded = tracker.healthReport(1)
    expect(degraded.overallHealth).toBe("degraded")
    expect(degraded.healthyProviders).toBe(1)
    expect(degraded.providers.a.isHealthy).toBe(false)

    tracker.record("c", failure("c"), 1)
    expect(tracker.healthReport(1).overallHealth).toBe("critical")
  })
})
