import OpenAI from "openai"

import { classifyHttpStatus, classifyMessage, errorMessage, type ClassifiedError } from "./errors.js"
import { BaseEngine, type Completion, type EngineSettings } from "./base.js"
import type { AIRequest } from "./types.js"
import { buildMessages } from "./utils.js"

/** Maps the SDK's error hierarchy; the timeout check must precede the connection check it extends. */
export function classifyOpenAIError(error: unknown, label: string): ClassifiedError {
  const detail = errorMessage(error)

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return { status: "timeout", code: "TIMEOUT_ERROR", message: `${label} request timed out: ${detail}` }
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return { status: "error", code: "API_ERROR", message: `${label} connection failed: ${detail}` }
  }
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return { status: "error", code: "AUTHENTICATION_ERROR", message: `${label} authentication failed: ${detail}` }
  }
  if (error instanceof OpenAI.RateLimitError) {
    return { status: "rate_limited", code: "RATE_LIMIT_ERROR", message: `${label} rate limit exceeded: ${detail}` }
  }
  if (error instanceof OpenAI.BadRequestError || error instanceof OpenAI.UnprocessableEntityError) {
    return { status: "invalid_request", code: "INVALID_REQUEST_ERROR", message: `${label} invalid request: ${detail}` }
  }
  if (error instanceof OpenAI.APIError && typeof error.status === "number") {
    return { ...classifyHttpStatus(error.status), message: `${label} API error (HTTP ${error.status}): ${detail}` }
  }
  return { ...classifyMessage(detail), message: `${label} API error: ${detail}` }
}

interface OpenAICompatibleOptions {
  name: string
  label: string
  scope: string
  defaultBaseUrl?: string
  defaultHeaders?: Record<string, string>
}

/** Any backend that speaks the OpenAI chat completions wire format. */
export class OpenAICompatibleEngine extends BaseEngine {
  readonly name: string
  protected readonly supportsSystemMessage = true
  protected readonly supportsContext = true

  private readonly label: string
  private readonly client: OpenAI

  constructor(settings: EngineSettings, options: OpenAICompatibleOptions) {
    super(settings, options.scope)
    this.name = options.name
    this.label = options.label
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl ?? options.defaultBaseUrl,
      timeout: settings.timeoutMs,
      maxRetries: 0,
      defaultHeaders: options.defaultHeaders,
    })
  }

  protected async complete(request: AIRequest): Promise<Completion> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: buildMessages(request),
      temperature: this.temperatureFor(request),
      max_tokens: this.maxTokensFor(request),
    })

    return {
      content: response.choices[0]?.message?.content ?? "",
      tokensUsed: response.usage?.total_tokens,
    }
  }

  protected classifyError(error: unknown): ClassifiedError {
    return classifyOpenAIError(error, this.label)
  }
}

export class OpenAIEngine extends OpenAICompatibleEngine {
  constructor(settings: EngineSettings) {
    super(settings, { name: "openai", label: "OpenAI", scope: "engines.openai" })
  }
}
