import { setTimeout as delay } from "node:timers/promises"

import { createLogger } from "../logger.js"
import { isRetryable } from "./response.js"
import type { AIResponse } from "./types.js"

const log = createLogger("engines.retry")

/** Jittered delays fall in [delay × (1 − JITTER_RATIO), delay × (1 + JITTER_RATIO)]. */
const JITTER_RATIO = 0.5

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  maxRetries: number
  baseDelayMs: number
  maxDelayMs: number
  exponentialBase: number
  jitter: boolean
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  exponentialBase: 2,
  jitter: true,
}

export interface RetryControllerOptions {
  sleep?: (ms: number) => Promise<void>
  /** Uniform in [0, 1), like Math.random. */
  random?: () => number
}

/** `attempt` is zero-based: the delay after the first failure uses attempt 0. */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const base = Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.exponentialBase ** attempt)
  if (!policy.jitter) {
    return base
  }
  const factor = 1 + (random() * 2 - 1) * JITTER_RATIO
  return Math.max(0, base * factor)
}

export class RetryController {
  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number

  constructor(options: RetryControllerOptions = {}) {
    this.sleep = options.sleep ?? (async (ms: number) => {
      await delay(ms)
    })
    this.random = options.random ?? Math.random
  }

  /**
   * Runs `fn` until it returns a non-retryable response or the retries run
   * out. The last response is returned as is, whatever its status.
   */
  async execute(fn: () => Promise<AIResponse>, policy: RetryPolicy): Promise<AIResponse> {
    const maxRetries = Math.max(0, Math.floor(policy.maxRetries))
    let response = await fn()

    for (let attempt = 0; attempt < maxRetries && isRetryable(response); attempt += 1) {
      const waitMs = backoffDelay(attempt, policy, this.random)
      log.warn("attempt failed, retrying", {
        provider: response.provider,
        status: response.status,
        attempt: attempt + 1,
        of: maxRetries + 1,
        delayMs: Math.round(waitMs),
      })
      await this.sleep(waitMs)
      response = await fn()
    }

    if (maxRetries > 0 && isRetryable(response)) {
      log.error("retries exhausted", {
        provider: response.provider,
        status: response.status,
        attempts: maxRetries + 1,
      })
    }

    return response
  }
}
