import { describe, expect, it } from "vitest"

import { configuredProviders, parseConfig, providerSettings } from "./config.js"
import { ConfigError } from "./engines/errors.js"

describe("parseConfig", () => {
  it("applies defaults to an empty environment", () => {
    const cfg = parseConfig({})

    expect(cfg.AI_PROVIDER).toBe("openai")
    expect(cfg.AI_TEMPERATURE).toBe(0.7)
    expect(cfg.AI_MAX_TOKENS).toBe(500)
    expect(cfg.AI_TIMEOUT).toBe(30)
    expect(cfg.ENABLE_CACHING).toBe(true)
    expect(cfg.CACHE_TTL).toBe(3600)
    expect(cfg.CACHE_MAX_ENTRIES).toBe(1000)
    expect(cfg.FALLBACK_ENABLED).toBe(true)
    expect(cfg.AI_MAX_RETRIES).toBe(2)
    expect(cfg.HEALTH_FAILURE_THRESHOLD).toBe(3)
    expect(cfg.OPENAI_MODEL).toBe("gpt-3.5-turbo")
    expect(cfg.ANTHROPIC_MODEL).toBe("claude-3-haiku-20240307")
  })

  it("parses numbers and booleans from strings", () => {
    const cfg = parseConfig({
      AI_PROVIDER: "gemini",
      AI_TEMPERATURE: "0.2",
      AI_TIMEOUT: "12",
      ENABLE_CACHING: "false",
      FALLBACK_ENABLED: "0",
      RETRY_BASE_DELAY: "0.5",
    })

    expect(cfg.AI_PROVIDER).toBe("gemini")
    expect(cfg.AI_TEMPERATURE).toBe(0.2)
    expect(cfg.AI_TIMEOUT).toBe(12)
    expect(cfg.ENABLE_CACHING).toBe(false)
    expect(cfg.FALLBACK_ENABLED).toBe(false)
    expect(cfg.RETRY_BASE_DELAY).toBe(0.5)
  })

  it("treats blank values as unset", () => {
    expect(parseConfig({ AI_MAX_TOKENS: "  ", OPENAI_MODEL: "" }).AI_MAX_TOKENS).toBe(500)
  })

  it("reports every invalid setting", () => {
    try {
      parseConfig({ AI_PROVIDER: "mystery", AI_TEMPERATURE: "5", CACHE_TTL: "soon" })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      const issues = error instanceof ConfigError ? error.issues : []
      expect(issues.map((issue) => issue.split(":")[0])).toEqual(["AI_PROVIDER", "AI_TEMPERATURE", "CACHE_TTL"])
    }
  })

  it("rejects base URLs without a scheme", () => {
    expect(() => parseConfig({ OPENAI_BASE_URL: "localhost:8080" })).toThrow(
      "OPENAI_BASE_URL: Base URL must start with http:// or https://",
    )
  })
})

describe("providerSettings", () => {
  it("is null without an API key", () => {
    expect(providerSettings(parseConfig({}), "anthropic")).toBeNull()
  })

  it("resolves key, model and shared generation settings", () => {
    const cfg = parseConfig({
      ANTHROPIC_API_KEY: " test-secret ",
      ANTHROPIC_MODEL: "claude-test",
      AI_TIMEOUT: "20",
    })

    expect(providerSettings(cfg, "anthropic")).toEqual({
      provider: "anthropic",
      apiKey: "test-secret",
      model: "claude-test",
      baseUrl: undefined,
      temperature: 0.7,
      maxTokens: 500,
      timeoutMs: 20_000,
    })
  })

  it("lists configured providers in canonical order", () => {
    const cfg = parseConfig({ OPENROUTER_API_KEY: "test-secret", OPENAI_API_KEY: "test-secret" })
    expect(configuredProviders(cfg)).toEqual(["openai", "openrouter"])
  })
})
