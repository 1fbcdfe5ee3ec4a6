/**
 * Error taxonomy shared by engines, the orchestrator and configuration.
 *
 * Operational failures (rate limits, timeouts, backend faults) never leave
 * the orchestration layer as exceptions: engines classify them into a
 * failure status plus an {@link ErrorCode}. Only programming errors at
 * construction time and invalid configuration are thrown.
 *
 * @module engines/errors
 */

export type FailureStatus = "error" | "timeout" | "rate_limited" | "invalid_request"

export type ErrorCode =
  | "AUTHENTICATION_ERROR"
  | "RATE_LIMIT_ERROR"
  | "TIMEOUT_ERROR"
  | "INVALID_REQUEST_ERROR"
  | "API_ERROR"
  | "EMPTY_RESPONSE"
  | "UNKNOWN_ERROR"

export interface ClassifiedError {
  status: FailureStatus
  code: ErrorCode
  message: string
}

export class OrchestratorError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "OrchestratorError"
  }
}

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message)
    this.name = "ConfigError"
    this.issues = issues
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return typeof error === "string" ? error : String(error)
}

export function classifyHttpStatus(status: number): Pick<ClassifiedError, "status" | "code"> {
  if (status === 401 || status === 403) {
    return { status: "error", code: "AUTHENTICATION_ERROR" }
  }
  if (status === 429) {
    return { status: "rate_limited", code: "RATE_LIMIT_ERROR" }
  }
  if (status === 408 || status === 504) {
    return { status: "timeout", code: "TIMEOUT_ERROR" }
  }
  if (status === 400 || status === 404 || status === 413 || status === 422) {
    return { status: "invalid_request", code: "INVALID_REQUEST_ERROR" }
  }
  return { status: "error", code: "API_ERROR" }
}

/** For SDKs that surface failures only as text. Order matters: auth before "invalid". */
export function classifyMessage(message: string): Pick<ClassifiedError, "status" | "code"> {
  const text = message.toLowerCase()

  if (/api key|authentication|unauthori[sz]ed|permission denied|forbidden/.test(text)) {
    return { status: "error", code: "AUTHENTICATION_ERROR" }
  }
  if (/quota|rate limit|too many requests|resource exhausted/.test(text)) {
    return { status: "rate_limited", code: "RATE_LIMIT_ERROR" }
  }
  if (/timeout|timed out|aborted|deadline/.test(text)) {
    return { status: "timeout", code: "TIMEOUT_ERROR" }
  }
  if (/invalid|bad request/.test(text)) {
    return { status: "invalid_request", code: "INVALID_REQUEST_ERROR" }
  }
  return { status: "error", code: "API_ERROR" }
}

const TOKEN_PATTERN = /\b(sk|key|AIza)[-_A-Za-z0-9]{16,}/g

export function redactSecrets(text: string, secrets: readonly string[]): string {
  let redacted = text
  for (const secret of secrets) {
    if (secret.length > 0) {
      redacted = redacted.split(secret).join("[REDACTED]")
    }
  }
  return redacted.replace(TOKEN_PATTERN, "[REDACTED]")
}
