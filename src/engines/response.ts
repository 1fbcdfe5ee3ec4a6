import type { ErrorCode, FailureStatus } from "./errors.js"
import type { AIResponse, FailureResponse, ResponseStatus, SuccessResponse } from "./types.js"

interface SuccessInput {
  provider: string
  model: string
  content: string
  tokensUsed?: number
  responseTimeSeconds?: number
}

interface FailureInput {
  provider: string
  model: string
  status: FailureStatus
  errorMessage: string
  errorCode: ErrorCode
}

/**
 * Builds a success response. Content is stored as the provider sent it; blank
 * content is not a success and comes back as an `EMPTY_RESPONSE` failure.
 */
export function successResponse(input: SuccessInput): AIResponse {
  if (input.content.trim().length === 0) {
    return failureResponse({
      provider: input.provider,
      model: input.model,
      status: "error",
      errorMessage: `${input.provider} returned an empty response`,
      errorCode: "EMPTY_RESPONSE",
    })
  }

  const response: SuccessResponse = {
    status: "success",
    content: input.content,
    provider: input.provider,
    model: input.model,
    timestamp: new Date(),
    ...(input.tokensUsed !== undefined ? { tokensUsed: input.tokensUsed } : {}),
    ...(input.responseTimeSeconds !== undefined ? { responseTimeSeconds: input.responseTimeSeconds } : {}),
  }
  return Object.freeze(response)
}

export function failureResponse(input: FailureInput): FailureResponse {
  const errorMessage = input.errorMessage.trim().length > 0 ? input.errorMessage : "Unknown error"
  const response: FailureResponse = {
    status: input.status,
    content: "",
    provider: input.provider,
    model: input.model,
    errorMessage,
    errorCode: input.errorCode,
    timestamp: new Date(),
  }
  return Object.freeze(response)
}

export function isSuccess(response: AIResponse): response is SuccessResponse {
  return response.status === "success"
}

export function markCached(response: SuccessResponse): SuccessResponse {
  return Object.freeze({ ...response, cached: true })
}

export const RETRYABLE_STATUSES: ReadonlySet<ResponseStatus> = new Set<ResponseStatus>([
  "rate_limited",
  "timeout",
  "error",
])

export function isRetryable(response: AIResponse): boolean {
  return RETRYABLE_STATUSES.has(response.status)
}
