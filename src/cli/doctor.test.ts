import { describe, expect, it } from "vitest"

import { parseConfig } from "../config.js"
import { FakeEngine, ok } from "../engines/test-utils.js"
import { formatReport, runChecks } from "./doctor.js"

describe("runChecks", () => {
  it("reports each provider plus the cache and fallback settings", async () => {
    const cfg = parseConfig({ AI_PROVIDER: "anthropic", OPENAI_API_KEY: "test-secret" })

    const results = await runChecks(cfg, [new FakeEngine("openai", [ok()])])

    expect(results).toEqual([
      { level: "ok", label: "OpenAI", detail: "Connected (gpt-3.5-turbo)" },
      { level: "warn", label: "Anthropic", detail: "API key missing" },
      { level: "warn", label: "Gemini", detail: "API key missing" },
      { level: "warn", label: "OpenRouter", detail: "API key missing" },
      { level: "warn", label: "Default provider", detail: "anthropic is not configured, openai will be preferred" },
      { level: "ok", label: "Cache", detail: "Enabled (TTL 3600s, max 1000 entries)" },
      { level: "ok", label: "Fallback", detail: "Enabled (2 retries per provider)" },
    ])
  })

  it("flags failed connections and a missing engine", async () => {
    const cfg = parseConfig({
      OPENAI_API_KEY: "test-secret",
      GEMINI_API_KEY: "test-secret",
      ENABLE_CACHING: "false",
      FALLBACK_ENABLED: "false",
    })

    const results = await runChecks(cfg, [new FakeEngine("openai", [ok()], { connected: false })])

    expect(results.slice(0, 3)).toEqual([
      { level: "error", label: "OpenAI", detail: "Connection failed (gpt-3.5-turbo)" },
      { level: "warn", label: "Anthropic", detail: "API key missing" },
      { level: "error", label: "Gemini", detail: "API key configured but engine not created" },
    ])
    expect(results.slice(-2)).toEqual([
      { level: "ok", label: "Cache", detail: "Disabled" },
      { level: "ok", label: "Fallback", detail: "Disabled (2 retries)" },
    ])
  })

  it("errors when no provider is configured", async () => {
    const results = await runChecks(parseConfig({}), [])
    expect(results).toContainEqual({ level: "error", label: "Providers", detail: "No AI provider configured" })
  })
})

describe("formatReport", () => {
  it("prints one line per check and a summary", () => {
    const report = formatReport([
      { level: "ok", label: "OpenAI", detail: "Connected (gpt-3.5-turbo)" },
      { level: "warn", label: "Gemini", detail: "API key missing" },
      { level: "error", label: "Providers", detail: "No AI provider configured" },
    ])

    expect(report.split("\n")).toEqual([
      "Context Demo Doctor",
      "===================",
      "OK OpenAI - Connected (gpt-3.5-turbo)",
      "WARN Gemini - API key missing",
      "ERR Providers - No AI provider configured",
      "",
      "Issues: 1 errors, 1 warnings",
    ])
  })
})
