import { z } from "zod"

import type { ProviderSettings } from "../config.js"
import { createLogger, type Logger } from "../logger.js"
import { errorMessage, redactSecrets, type ClassifiedError } from "./errors.js"
import { failureResponse, successResponse } from "./response.js"
import type { AIRequest, AIResponse, Engine, ProviderInfo } from "./types.js"
import { elapsedSeconds } from "./utils.js"

const RequestSchema = z.object({
  prompt: z.string().refine((value) => value.trim().length > 0, { message: "Prompt must not be empty" }),
  context: z.record(z.string(), z.unknown()).optional(),
  systemMessage: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
})

export interface Completion {
  content: string
  tokensUsed?: number
}

/** Settings every engine needs; `provider` is free-form so tests can register their own engines. */
export type EngineSettings = Omit<ProviderSettings, "provider">

/**
 * Shared half of every engine: request validation, timing, failure
 * translation and secret redaction. Subclasses make exactly one upstream
 * call in {@link complete} and map SDK errors in {@link classifyError}.
 */
export abstract class BaseEngine implements Engine {
  abstract readonly name: string
  protected abstract readonly supportsSystemMessage: boolean
  protected abstract readonly supportsContext: boolean

  protected readonly log: Logger

  constructor(
    protected readonly settings: EngineSettings,
    scope: string,
  ) {
    this.log = createLogger(scope)
  }

  get model(): string {
    return this.settings.model
  }

  protected abstract complete(request: AIRequest): Promise<Completion>

  protected abstract classifyError(error: unknown): ClassifiedError

  async generate(request: AIRequest): Promise<AIResponse> {
    const validation = RequestSchema.safeParse(request)
    if (!validation.success) {
      const details = validation.error.issues
        .map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
        .join("; ")
      this.log.warn("request rejected", { engine: this.name, details })
      return failureResponse({
        provider: this.name,
        model: this.model,
        status: "invalid_request",
        errorMessage: `Invalid request: ${details}`,
        errorCode: "INVALID_REQUEST_ERROR",
      })
    }

    this.log.debug("request", {
      engine: this.name,
      model: this.model,
      promptLength: request.prompt.length,
      hasContext: Boolean(request.context && Object.keys(request.context).length > 0),
    })

    const startedAt = Date.now()
    try {
      const completion = await this.complete(request)
      const response = successResponse({
        provider: this.name,
        model: this.model,
        content: completion.content,
        tokensUsed: completion.tokensUsed,
        responseTimeSeconds: elapsedSeconds(startedAt),
      })
      if (response.status === "success") {
        this.log.debug("response", {
          engine: this.name,
          tokens: response.tokensUsed,
          seconds: response.responseTimeSeconds,
        })
      } else {
        this.log.warn("empty response", { engine: this.name })
      }
      return response
    } catch (error) {
      const classified = this.classifyError(error)
      const message = redactSecrets(classified.message, [this.settings.apiKey])
      this.log.warn("generate failed", {
        engine: this.name,
        status: classified.status,
        code: classified.code,
        error: message,
      })
      return failureResponse({
        provider: this.name,
        model: this.model,
        status: classified.status,
        errorMessage: message,
        errorCode: classified.code,
      })
    }
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await this.generate({ prompt: "Hello", temperature: 0.1, maxTokens: 5 })
      return response.status === "success"
    } catch (error) {
      this.log.warn("connection validation failed", {
        engine: this.name,
        error: redactSecrets(errorMessage(error), [this.settings.apiKey]),
      })
      return false
    }
  }

  describe(): ProviderInfo {
    return {
      provider: this.name,
      model: this.model,
      supportsSystemMessage: this.supportsSystemMessage,
      supportsContext: this.supportsContext,
      supportsStreaming: false,
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
      timeoutSeconds: this.settings.timeoutMs / 1000,
      ...(this.settings.baseUrl ? { baseUrl: this.settings.baseUrl } : {}),
    }
  }

  protected temperatureFor(request: AIRequest): number {
    return request.temperature ?? this.settings.temperature
  }

  protected maxTokensFor(request: AIRequest): number {
    return request.maxTokens ?? this.settings.maxTokens
  }
}
