/**
 * Orchestrator: multi-provider AI routing with caching, retry and fallback.
 *
 * Handles each request in this order:
 *   1. Cache lookup by request fingerprint (hits skip health tracking)
 *   2. Provider selection: explicit hint first, then engines ranked by the
 *      health tracker. Unhealthy engines are skipped unless every engine is
 *      unhealthy, in which case all of them are tried, healthiest first.
 *   3. Attempt: retry controller around one engine; the outcome is recorded
 *   4. Success → cache store → return. Failure → next candidate (fallback)
 *   5. Candidates exhausted → the last failure is returned
 *
 * Callers always get an AIResponse. The only thrown error is an
 * OrchestratorError at construction time (no engines, duplicate names).
 *
 * Concurrency: cache and health mutations are synchronous, so no other
 * request can interleave with them. Identical in-flight requests share one
 * promise while caching is on, so one upstream call serves them all.
 *
 * @module engines/orchestrator
 */

import config, { type Config } from "../config.js"
import { createLogger } from "../logger.js"
import { EngineHealthTracker, type HealthReport, type ProviderHealthStatus } from "./engine-stats.js"
import { errorMessage, OrchestratorError, redactSecrets } from "./errors.js"
import { createEngines } from "./registry.js"
import { failureResponse, isSuccess, markCached } from "./response.js"
import { fingerprint, ResponseCache, type CacheStats } from "./response-cache.js"
import { DEFAULT_RETRY_POLICY, RetryController, type RetryPolicy } from "./retry.js"
import type { AIRequest, AIResponse, Engine, ProviderInfo } from "./types.js"
import { elapsedSeconds } from "./utils.js"

const log = createLogger("engines.orchestrator")

const DEFAULT_CACHE_TTL_SECONDS = 3600
const DEFAULT_HEALTH_FAILURE_THRESHOLD = 3

export interface OrchestratorOptions {
  engines: readonly Engine[]
  /** Preferred engine; wins ranking ties. Defaults to the first engine. */
  defaultProvider?: string
  enableCaching?: boolean
  cacheTtlSeconds?: number
  cacheMaxEntries?: number
  fallbackEnabled?: boolean
  retryPolicy?: RetryPolicy
  healthFailureThreshold?: number
  cache?: ResponseCache
  tracker?: EngineHealthTracker
  retryController?: RetryController
}

export interface ProviderDetails extends ProviderInfo {
  stats: ProviderHealthStatus
  isCurrentProvider: boolean
  fallbackAvailable: boolean
}

export interface OrchestratorCacheStats extends CacheStats {
  enabled: boolean
  ttlSeconds: number
}

/** Cache entries are tagged with the demo industry so one vertical can be cleared on its own. */
function cacheScopeOf(request: AIRequest): string | undefined {
  const industry = request.context?.industry
  return typeof industry === "string" && industry.trim().length > 0 ? industry : undefined
}

export class Orchestrator {
  private readonly engines = new Map<string, Engine>()
  private readonly inflight = new Map<string, Promise<AIResponse>>()
  private readonly cache: ResponseCache
  private readonly tracker: EngineHealthTracker
  private readonly retry: RetryController

  private readonly enableCaching: boolean
  private readonly cacheTtlSeconds: number
  private readonly fallbackEnabled: boolean
  private readonly retryPolicy: RetryPolicy
  private readonly healthFailureThreshold: number

  private currentProvider: string

  constructor(options: OrchestratorOptions) {
    if (options.engines.length === 0) {
      throw new OrchestratorError(
        "Orchestrator requires at least one engine. Configure an API key for at least one provider.",
      )
    }

    this.tracker = options.tracker ?? new EngineHealthTracker()
    for (const engine of options.engines) {
      if (this.engines.has(engine.name)) {
        throw new OrchestratorError(`Duplicate engine name '${engine.name}'`)
      }
      this.engines.set(engine.name, engine)
      this.tracker.register(engine.name)
    }

    this.cache = options.cache ?? new ResponseCache({ maxEntries: options.cacheMaxEntries })
    this.retry = options.retryController ?? new RetryController()
    this.enableCaching = options.enableCaching ?? true
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS
    this.fallbackEnabled = options.fallbackEnabled ?? true
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.healthFailureThreshold = options.healthFailureThreshold ?? DEFAULT_HEALTH_FAILURE_THRESHOLD

    const [first] = this.engines.keys()
    this.currentProvider = first
    if (options.defaultProvider !== undefined && !this.setProvider(options.defaultProvider)) {
      log.warn("default provider not registered, using first engine", {
        requested: options.defaultProvider,
        using: first,
      })
    }

    log.info("orchestrator ready", {
      engines: this.getAvailableProviders(),
      current: this.currentProvider,
      caching: this.enableCaching,
      fallback: this.fallbackEnabled,
    })
  }

  async generateResponse(request: AIRequest, providerHint?: string): Promise<AIResponse> {
    if (!this.enableCaching) {
      return this.dispatch(request, providerHint)
    }

    const key = fingerprint(request)
    const cached = this.cache.get(key)
    if (cached) {
      log.debug("cache hit", { provider: cached.provider })
      return markCached(cached)
    }

    const flightKey = `${key}:${providerHint ?? ""}`
    const pending = this.inflight.get(flightKey)
    if (pending) {
      log.debug("joining in-flight request", { hint: providerHint })
      return pending
    }

    const promise = this.dispatch(request, providerHint, key).finally(() => {
      this.inflight.delete(flightKey)
    })
    this.inflight.set(flightKey, promise)
    return promise
  }

  private async dispatch(request: AIRequest, providerHint?: string, cacheKey?: string): Promise<AIResponse> {
    const candidates = this.candidateOrder(providerHint)
    const attempts = this.fallbackEnabled ? candidates : candidates.slice(0, 1)
    const startedAt = Date.now()
    let last: AIResponse | null = null

    for (const name of attempts) {
      const engine = this.engines.get(name)
      if (!engine) {
        continue
      }

      if (last) {
        log.info("falling back", { from: last.provider, to: name, reason: last.status })
      }

      const attemptStartedAt = Date.now()
      const response = await this.retry.execute(() => this.invoke(engine, request), this.retryPolicy)
      this.tracker.record(name, response, elapsedSeconds(attemptStartedAt))

      if (isSuccess(response)) {
        if (cacheKey !== undefined) {
          this.cache.put(cacheKey, response, this.cacheTtlSeconds, cacheScopeOf(request))
        }
        log.info("request handled", {
          engine: name,
          fallback: last !== null,
          seconds: elapsedSeconds(startedAt),
        })
        return response
      }

      last = response.provider === name ? response : failureResponse({ ...response, provider: name })
    }

    if (!last) {
      return failureResponse({
        provider: this.currentProvider,
        model: "orchestrator",
        status: "error",
        errorMessage: "No AI provider available",
        errorCode: "UNKNOWN_ERROR",
      })
    }

    log.error("all providers failed", {
      attempted: attempts,
      lastProvider: last.provider,
      status: last.status,
    })
    return last
  }

  /** Engines must not throw, but one that does is turned into a failure here. */
  private async invoke(engine: Engine, request: AIRequest): Promise<AIResponse> {
    try {
      return await engine.generate(request)
    } catch (error) {
      const message = redactSecrets(errorMessage(error), [])
      log.error("engine threw", { engine: engine.name, error: message })
      return failureResponse({
        provider: engine.name,
        model: engine.model,
        status: "error",
        errorMessage: `${engine.name} failed unexpectedly: ${message}`,
        errorCode: "UNKNOWN_ERROR",
      })
    }
  }

  private preferenceOrder(): string[] {
    const names = [...this.engines.keys()]
    return [this.currentProvider, ...names.filter((name) => name !== this.currentProvider)]
  }

  candidateOrder(providerHint?: string): string[] {
    const preference = this.preferenceOrder()
    const healthy = preference.filter((name) => this.tracker.isHealthy(name, this.healthFailureThreshold))

    if (healthy.length === 0) {
      log.warn("all engines unhealthy, trying every engine", { engines: preference })
    }

    const ranked = this.tracker.rankProviders(healthy.length > 0 ? healthy : preference)

    if (providerHint === undefined) {
      return ranked
    }
    if (!this.engines.has(providerHint)) {
      log.warn("unknown provider hint ignored", { hint: providerHint })
      return ranked
    }
    return [providerHint, ...ranked.filter((name) => name !== providerHint)]
  }

  setProvider(name: string): boolean {
    if (!this.engines.has(name)) {
      log.error("provider not available", { provider: name })
      return false
    }
    this.currentProvider = name
    log.info("current provider set", { provider: name })
    return true
  }

  getCurrentProvider(): string {
    return this.currentProvider
  }

  getAvailableProviders(): string[] {
    return [...this.engines.keys()]
  }

  getProviderStats(): Record<string, ProviderHealthStatus> {
    return this.tracker.healthReport(this.healthFailureThreshold).providers
  }

  getHealthReport(): HealthReport {
    return this.tracker.healthReport(this.healthFailureThreshold)
  }

  logProviderStats(): void {
    this.tracker.logStatus()
  }

  getProviderInfo(name: string = this.currentProvider): ProviderDetails | null {
    const engine = this.engines.get(name)
    if (!engine) {
      return null
    }

    const record = this.tracker.getRecord(name)
    return {
      ...engine.describe(),
      stats: {
        ...record,
        successRate: this.tracker.successRate(name),
        isHealthy: this.tracker.isHealthy(name, this.healthFailureThreshold),
      },
      isCurrentProvider: name === this.currentProvider,
      fallbackAvailable: this.engines.size > 1,
    }
  }

  async validateProviderConnection(name: string = this.currentProvider): Promise<boolean> {
    const engine = this.engines.get(name)
    if (!engine) {
      return false
    }

    try {
      return await engine.validateConnection()
    } catch (error) {
      log.error("connection validation failed", { provider: name, error: redactSecrets(errorMessage(error), []) })
      return false
    }
  }

  resetProviderHealth(name: string): boolean {
    if (!this.engines.has(name)) {
      return false
    }
    this.tracker.reset(name)
    return true
  }

  clearCache(scope?: string): number {
    return this.cache.clear(scope)
  }

  getCacheStats(): OrchestratorCacheStats {
    return {
      ...this.cache.stats(),
      enabled: this.enableCaching,
      ttlSeconds: this.cacheTtlSeconds,
    }
  }
}

export function retryPolicyFromConfig(cfg: Config): RetryPolicy {
  return {
    maxRetries: cfg.AI_MAX_RETRIES,
    baseDelayMs: cfg.RETRY_BASE_DELAY * 1000,
    maxDelayMs: cfg.RETRY_MAX_DELAY * 1000,
    exponentialBase: DEFAULT_RETRY_POLICY.exponentialBase,
    jitter: DEFAULT_RETRY_POLICY.jitter,
  }
}

export function createOrchestrator(cfg: Config = config, engines: readonly Engine[] = createEngines(cfg)): Orchestrator {
  return new Orchestrator({
    engines,
    defaultProvider: cfg.AI_PROVIDER,
    enableCaching: cfg.ENABLE_CACHING,
    cacheTtlSeconds: cfg.CACHE_TTL,
    cacheMaxEntries: cfg.CACHE_MAX_ENTRIES,
    fallbackEnabled: cfg.FALLBACK_ENABLED,
    retryPolicy: retryPolicyFromConfig(cfg),
    healthFailureThreshold: cfg.HEALTH_FAILURE_THRESHOLD,
  })
}

let shared: Orchestrator | null = null

/** Process-wide orchestrator built from the environment on first use. */
export function getOrchestrator(): Orchestrator {
  if (!shared) {
    shared = createOrchestrator()
  }
  return shared
}
