import Anthropic from "@anthropic-ai/sdk"

import { BaseEngine, type Completion, type EngineSettings } from "./base.js"
import { classifyHttpStatus, classifyMessage, errorMessage, type ClassifiedError } from "./errors.js"
import type { AIRequest } from "./types.js"
import { buildSystemText } from "./utils.js"

export function classifyAnthropicError(error: unknown): ClassifiedError {
  const detail = errorMessage(error)

  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return { status: "timeout", code: "TIMEOUT_ERROR", message: `Anthropic request timed out: ${detail}` }
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return { status: "error", code: "API_ERROR", message: `Anthropic connection failed: ${detail}` }
  }
  if (error instanceof Anthropic.AuthenticationError || error instanceof Anthropic.PermissionDeniedError) {
    return { status: "error", code: "AUTHENTICATION_ERROR", message: `Anthropic authentication failed: ${detail}` }
  }
  if (error instanceof Anthropic.RateLimitError) {
    return { status: "rate_limited", code: "RATE_LIMIT_ERROR", message: `Anthropic rate limit exceeded: ${detail}` }
  }
  if (error instanceof Anthropic.BadRequestError || error instanceof Anthropic.UnprocessableEntityError) {
    return { status: "invalid_request", code: "INVALID_REQUEST_ERROR", message: `Anthropic invalid request: ${detail}` }
  }
  // 529 overloaded and 5xx land here as generic, retryable errors
  if (error instanceof Anthropic.APIError && typeof error.status === "number") {
    return { ...classifyHttpStatus(error.status), message: `Anthropic API error (HTTP ${error.status}): ${detail}` }
  }
  return { ...classifyMessage(detail), message: `Anthropic API error: ${detail}` }
}

export class AnthropicEngine extends BaseEngine {
  readonly name = "anthropic"
  protected readonly supportsSystemMessage = true
  protected readonly supportsContext = true

  private readonly client: Anthropic

  constructor(settings: EngineSettings) {
    super(settings, "engines.anthropic")
    this.client = new Anthropic({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    })
  }

  protected async complete(request: AIRequest): Promise<Completion> {
    const system = buildSystemText(request)
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokensFor(request),
      temperature: this.temperatureFor(request),
      ...(system ? { system } : {}),
      messages: [{ role: "user", content: request.prompt }],
    })

    const text = response.content
      .map((block: Anthropic.ContentBlock) => (block.type === "text" ? block.text : ""))
      .join("")

    return {
      content: text,
      tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
    }
  }

  protected classifyError(error: unknown): ClassifiedError {
    return classifyAnthropicError(error)
  }
}
