import { PROVIDER_IDS, providerSettings, type Config, type ProviderId, type ProviderSettings } from "../config.js"
import { createLogger } from "../logger.js"
import { AnthropicEngine } from "./anthropic.js"
import { GeminiEngine } from "./gemini.js"
import { OpenAIEngine } from "./openai.js"
import { OpenRouterEngine } from "./openrouter.js"
import type { Engine } from "./types.js"

const log = createLogger("engines.registry")

export function createEngine(settings: ProviderSettings): Engine {
  switch (settings.provider) {
    case "openai":
      return new OpenAIEngine(settings)
    case "anthropic":
      return new AnthropicEngine(settings)
    case "gemini":
      return new GeminiEngine(settings)
    case "openrouter":
      return new OpenRouterEngine(settings)
  }
}

/**
 * Builds one engine per provider with an API key. The preferred provider
 * (`AI_PROVIDER`) is registered first so it wins ranking ties.
 */
export function createEngines(config: Config): Engine[] {
  const order: ProviderId[] = [
    config.AI_PROVIDER,
    ...PROVIDER_IDS.filter((provider) => provider !== config.AI_PROVIDER),
  ]

  const engines: Engine[] = []
  for (const provider of order) {
    const settings = providerSettings(config, provider)
    if (!settings) {
      log.info("engine unavailable", { provider, reason: "API key not configured" })
      continue
    }

    engines.push(createEngine(settings))
    log.info("engine ready", { provider, model: settings.model })
  }

  return engines
}
