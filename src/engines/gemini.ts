import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from "@google/generative-ai"

import { BaseEngine, type Completion, type EngineSettings } from "./base.js"
import { classifyHttpStatus, classifyMessage, errorMessage, type ClassifiedError } from "./errors.js"
import type { AIRequest } from "./types.js"
import { buildSystemText } from "./utils.js"

/** The Gemini SDK only exposes an HTTP status on fetch errors; everything else is matched by text. */
export function classifyGeminiError(error: unknown): ClassifiedError {
  const detail = errorMessage(error)
  const classified = classifyMessage(detail)

  // Gemini rejects a bad API key with HTTP 400, so the text wins over the status.
  if (
    error instanceof GoogleGenerativeAIFetchError &&
    typeof error.status === "number" &&
    classified.code !== "AUTHENTICATION_ERROR"
  ) {
    return { ...classifyHttpStatus(error.status), message: `Gemini API error (HTTP ${error.status}): ${detail}` }
  }

  const prefix: Record<ClassifiedError["code"], string> = {
    AUTHENTICATION_ERROR: "Gemini authentication failed",
    RATE_LIMIT_ERROR: "Gemini rate limit exceeded",
    TIMEOUT_ERROR: "Gemini request timed out",
    INVALID_REQUEST_ERROR: "Gemini invalid request",
    API_ERROR: "Gemini API error",
    EMPTY_RESPONSE: "Gemini returned no content",
    UNKNOWN_ERROR: "Unknown Gemini error",
  }
  return { ...classified, message: `${prefix[classified.code]}: ${detail}` }
}

export class GeminiEngine extends BaseEngine {
  readonly name = "gemini"
  protected readonly supportsSystemMessage = true
  protected readonly supportsContext = true

  private readonly client: GoogleGenerativeAI

  constructor(settings: EngineSettings) {
    super(settings, "engines.gemini")
    this.client = new GoogleGenerativeAI(settings.apiKey)
  }

  protected async complete(request: AIRequest): Promise<Completion> {
    const model = this.client.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: buildSystemText(request),
        generationConfig: {
          temperature: this.temperatureFor(request),
          maxOutputTokens: this.maxTokensFor(request),
        },
      },
      {
        timeout: this.settings.timeoutMs,
        ...(this.settings.baseUrl ? { baseUrl: this.settings.baseUrl } : {}),
      },
    )

    const result = await model.generateContent(request.prompt)

    return {
      content: result.response.text(),
      tokensUsed: result.response.usageMetadata?.totalTokenCount,
    }
  }

  protected classifyError(error: unknown): ClassifiedError {
    return classifyGeminiError(error)
  }
}
