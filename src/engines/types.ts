import type { ErrorCode, FailureStatus } from "./errors.js"

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export interface AIRequest {
  readonly prompt: string
  /** Personalization data injected into the prompt (e.g. a restaurant's menu and bookings). */
  readonly context?: Readonly<Record<string, JsonValue>>
  readonly systemMessage?: string
  readonly temperature?: number
  readonly maxTokens?: number
  /** Caller bookkeeping. Never sent upstream and never part of the cache fingerprint. */
  readonly metadata?: Readonly<Record<string, unknown>>
}

export type ResponseStatus = "success" | FailureStatus

interface ResponseBase {
  /** Name of the engine that produced, or attempted to produce, the response. */
  readonly provider: string
  readonly model: string
  readonly timestamp: Date
}

export interface SuccessResponse extends ResponseBase {
  readonly status: "success"
  readonly content: string
  readonly tokensUsed?: number
  readonly responseTimeSeconds?: number
  /** Set when the response was served from the response cache. */
  readonly cached?: boolean
}

export interface FailureResponse extends ResponseBase {
  readonly status: FailureStatus
  readonly content: ""
  readonly errorMessage: string
  readonly errorCode: ErrorCode
}

export type AIResponse = SuccessResponse | FailureResponse

export interface ProviderInfo {
  provider: string
  model: string
  supportsSystemMessage: boolean
  supportsContext: boolean
  supportsStreaming: boolean
  temperature: number
  maxTokens: number
  timeoutSeconds: number
  baseUrl?: string
}

export interface Engine {
  readonly name: string
  readonly model: string
  /** Exactly one upstream call. Failures come back as failure responses, never as rejections. */
  generate(request: AIRequest): Promise<AIResponse>
  validateConnection(): Promise<boolean>
  describe(): ProviderInfo
}

export interface ChatMessage {
  role: "system" | "user" | "assistant"
  content: string
}
