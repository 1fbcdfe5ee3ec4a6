import type { EngineSettings } from "./base.js"
import { OpenAICompatibleEngine } from "./openai.js"

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1"

export class OpenRouterEngine extends OpenAICompatibleEngine {
  constructor(settings: EngineSettings) {
    super(settings, {
      name: "openrouter",
      label: "OpenRouter",
      scope: "engines.openrouter",
      defaultBaseUrl: OPENROUTER_BASE_URL,
      // OpenRouter attribution headers
      defaultHeaders: {
        "HTTP-Referer": "https://github.com/context-demo/context-demo",
        "X-Title": "Context Demo",
      },
    })
  }
}
