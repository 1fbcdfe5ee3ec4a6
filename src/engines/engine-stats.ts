/**
 * engine-stats.ts: Per-engine health records for provider ranking.
 *
 * Every completed engine call (after its retries) is recorded here. The
 * orchestrator asks for a ranking before each request and skips engines
 * whose consecutive failures reached the threshold.
 *
 * Ranking: higher success rate first, then lower average latency over
 * successful calls, then the caller's candidate order. Engines with no
 * successful call yet have no latency and sort after measured ones at the
 * same success rate. Unvisited engines count as a 100% success rate so they
 * are not penalized before they are tried.
 *
 * Records live for the lifetime of the process and are never persisted.
 *
 * @module engines/engine-stats
 */
import { createLogger } from "../logger.js"
import type { AIResponse } from "./types.js"

const log = createLogger("engines.stats")

const NEUTRAL_SUCCESS_RATE = 1

export type OverallHealth = "healthy" | "degraded" | "critical" | "unknown"

export interface ProviderHealthRecord {
  provider: string
  totalRequests: number
  totalSuccesses: number
  totalFailures: number
  consecutiveFailures: number
  /** Running mean over successful calls; null until the first success. */
  averageResponseTimeSeconds: number | null
  lastUsedAt: Date | null
}

export interface ProviderHealthStatus extends ProviderHealthRecord {
  successRate: number
  isHealthy: boolean
}

export interface HealthReport {
  timestamp: Date
  overallHealth: OverallHealth
  healthyProviders: number
  totalProviders: number
  providers: Record<string, ProviderHealthStatus>
}

function emptyRecord(provider: string): ProviderHealthRecord {
  return {
    provider,
    totalRequests: 0,
    totalSuccesses: 0,
    totalFailures: 0,
    consecutiveFailures: 0,
    averageResponseTimeSeconds: null,
    lastUsedAt: null,
  }
}

export class EngineHealthTracker {
  private readonly records = new Map<string, ProviderHealthRecord>()

  register(provider: string): void {
    if (!this.records.has(provider)) {
      this.records.set(provider, emptyRecord(provider))
    }
  }

  private recordFor(provider: string): ProviderHealthRecord {
    let record = this.records.get(provider)
    if (!record) {
      record = emptyRecord(provider)
      this.records.set(provider, record)
    }
    return record
  }

  record(provider: string, response: AIResponse, elapsedSeconds: number): void {
    const record = this.recordFor(provider)
    record.totalRequests += 1
    record.lastUsedAt = new Date()

    if (response.status === "success") {
      record.totalSuccesses += 1
      record.consecutiveFailures = 0
      const previous = record.averageResponseTimeSeconds ?? 0
      record.averageResponseTimeSeconds = previous + (elapsedSeconds - previous) / record.totalSuccesses
    } else {
      record.totalFailures += 1
      record.consecutiveFailures += 1
    }
  }

  getRecord(provider: string): ProviderHealthRecord {
    const record = this.records.get(provider)
    return record ? { ...record } : emptyRecord(provider)
  }

  successRate(provider: string): number {
    const record = this.records.get(provider)
    if (!record || record.totalRequests === 0) {
      return NEUTRAL_SUCCESS_RATE
    }
    return record.totalSuccesses / record.totalRequests
  }

  isHealthy(provider: string, consecutiveFailureThreshold: number): boolean {
    const record = this.records.get(provider)
    return !record || record.consecutiveFailures < consecutiveFailureThreshold
  }

  rankProviders(candidates: readonly string[]): string[] {
    return candidates
      .map((provider, index) => ({
        provider,
        index,
        successRate: this.successRate(provider),
        latency: this.records.get(provider)?.averageResponseTimeSeconds ?? null,
      }))
      .sort((a, b) => {
        if (a.successRate !== b.successRate) {
          return b.successRate - a.successRate
        }
        if (a.latency !== b.latency) {
          if (a.latency === null) return 1
          if (b.latency === null) return -1
          return a.latency - b.latency
        }
        return a.index - b.index
      })
      .map((entry) => entry.provider)
  }

  reset(provider: string): void {
    this.records.set(provider, emptyRecord(provider))
    log.info("health reset", { provider })
  }

  healthReport(consecutiveFailureThreshold: number): HealthReport {
    const providers: Record<string, ProviderHealthStatus> = {}
    let healthyProviders = 0

    for (const record of this.records.values()) {
      const isHealthy = record.consecutiveFailures < consecutiveFailureThreshold
      if (isHealthy) {
        healthyProviders += 1
      }
      providers[record.provider] = {
        ...record,
        successRate: this.successRate(record.provider),
        isHealthy,
      }
    }

    const totalProviders = this.records.size
    let overallHealth: OverallHealth = "healthy"
    if (totalProviders === 0) {
      overallHealth = "unknown"
    } else if (healthyProviders === 0) {
      overallHealth = "critical"
    } else if (healthyProviders < totalProviders / 2) {
      overallHealth = "degraded"
    }

    return { timestamp: new Date(), overallHealth, healthyProviders, totalProviders, providers }
  }

  logStatus(): void {
    for (const record of this.records.values()) {
      log.info("engine stats", {
        engine: record.provider,
        requests: record.totalRequests,
        successRate: this.successRate(record.provider).toFixed(2),
        consecutiveFailures: record.consecutiveFailures,
        avgSeconds: record.averageResponseTimeSeconds?.toFixed(3) ?? null,
      })
    }
  }
}
