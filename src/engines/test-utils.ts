import { setTimeout as delay } from "node:timers/promises"

import type { FailureStatus } from "./errors.js"
import { failureResponse, successResponse } from "./response.js"
import type { AIRequest, AIResponse, Engine, ProviderInfo } from "./types.js"

export type FakeOutcome =
  | { kind: "success"; content: string; tokensUsed?: number }
  | { kind: "failure"; status: FailureStatus }
  | { kind: "throw"; message: string }

export const ok = (content = "fake answer", tokensUsed = 12): FakeOutcome => ({ kind: "success", content, tokensUsed })
export const fail = (status: FailureStatus = "error"): FakeOutcome => ({ kind: "failure", status })
export const boom = (message = "socket hang up"): FakeOutcome => ({ kind: "throw", message })

const FAILURE_CODES = {
  error: "API_ERROR",
  timeout: "TIMEOUT_ERROR",
  rate_limited: "RATE_LIMIT_ERROR",
  invalid_request: "INVALID_REQUEST_ERROR",
} as const

interface FakeEngineOptions {
  delayMs?: number
  model?: string
  connected?: boolean
}

/**
 * In-process engine for tests. Plays `outcomes` in order and repeats the
 * last one once the script runs out.
 */
export class FakeEngine implements Engine {
  readonly model: string
  readonly requests: AIRequest[] = []
  private readonly delayMs: number
  private readonly connected: boolean

  constructor(
    readonly name: string,
    private readonly outcomes: FakeOutcome[],
    options: FakeEngineOptions = {},
  ) {
    this.model = options.model ?? `${name}-model`
    this.delayMs = options.delayMs ?? 0
    this.connected = options.connected ?? true
  }

  get calls(): number {
    return this.requests.length
  }

  async generate(request: AIRequest): Promise<AIResponse> {
    const outcome = this.outcomes[Math.min(this.requests.length, this.outcomes.length - 1)] ?? ok()
    this.requests.push(request)

    if (this.delayMs > 0) {
      await delay(this.delayMs)
    }

    switch (outcome.kind) {
      case "success":
        return successResponse({
          provider: this.name,
          model: this.model,
          content: outcome.content,
          tokensUsed: outcome.tokensUsed,
          responseTimeSeconds: this.delayMs / 1000,
        })
      case "failure":
        return failureResponse({
          provider: this.name,
          model: this.model,
          status: outcome.status,
          errorMessage: `${this.name} ${outcome.status}`,
          errorCode: FAILURE_CODES[outcome.status],
        })
      case "throw":
        throw new Error(outcome.message)
    }
  }

  async validateConnection(): Promise<boolean> {
    return this.connected
  }

  describe(): ProviderInfo {
    return {
      provider: this.name,
      model: this.model,
      supportsSystemMessage: true,
      supportsContext: true,
      supportsStreaming: false,
      temperature: 0.7,
      maxTokens: 500,
      timeoutSeconds: 30,
    }
  }
}
