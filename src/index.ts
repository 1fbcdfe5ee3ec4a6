/**
 * index.ts: Public API of the engine orchestration layer.
 *
 * @example
 *   import { getOrchestrator } from "context-demo"
 *   const response = await getOrchestrator().generateResponse({ prompt: "Any tables free at 8?" })
 */

export { config, parseConfig, providerSettings, configuredProviders, PROVIDER_IDS, DEFAULT_MODELS } from "./config.js"
export type { Config, ProviderId, ProviderSettings } from "./config.js"
export { createLogger, closeLogFile } from "./logger.js"
export type { Logger } from "./logger.js"

export {
  Orchestrator,
  createOrchestrator,
  getOrchestrator,
  retryPolicyFromConfig,
} from "./engines/orchestrator.js"
export type { OrchestratorOptions, ProviderDetails, OrchestratorCacheStats } from "./engines/orchestrator.js"
export { BaseEngine } from "./engines/base.js"
export type { Completion, EngineSettings } from "./engines/base.js"
export { OpenAIEngine, OpenAICompatibleEngine } from "./engines/openai.js"
export { OpenRouterEngine } from "./engines/openrouter.js"
export { AnthropicEngine } from "./engines/anthropic.js"
export { GeminiEngine } from "./engines/gemini.js"
export { createEngine, createEngines } from "./engines/registry.js"
export { ResponseCache, fingerprint, canonicalJson } from "./engines/response-cache.js"
export type { CacheStats, ResponseCacheOptions } from "./engines/response-cache.js"
export { RetryController, backoffDelay, DEFAULT_RETRY_POLICY } from "./engines/retry.js"
export type { RetryPolicy, RetryControllerOptions } from "./engines/retry.js"
export { EngineHealthTracker } from "./engines/engine-stats.js"
export type { HealthReport, OverallHealth, ProviderHealthRecord, ProviderHealthStatus } from "./engines/engine-stats.js"
export { successResponse, failureResponse, isSuccess, isRetryable, RETRYABLE_STATUSES } from "./engines/response.js"
export { OrchestratorError, ConfigError, redactSecrets } from "./engines/errors.js"
export type { ErrorCode, FailureStatus, ClassifiedError } from "./engines/errors.js"
export type {
  AIRequest,
  AIResponse,
  SuccessResponse,
  FailureResponse,
  ResponseStatus,
  ProviderInfo,
  Engine,
  JsonValue,
} from "./engines/types.js"
