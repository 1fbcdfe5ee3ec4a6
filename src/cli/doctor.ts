import { pathToFileURL } from "node:url"

import config, { PROVIDER_IDS, providerSettings, type Config } from "../config.js"
import { createEngines } from "../engines/registry.js"
import type { Engine } from "../engines/types.js"
import { createLogger } from "../logger.js"

const log = createLogger("cli.doctor")

type Level = "ok" | "warn" | "error"

export interface CheckResult {
  level: Level
  label: string
  detail: string
}

function icon(level: Level): string {
  if (level === "ok") return "OK"
  if (level === "warn") return "WARN"
  return "ERR"
}

const LABELS: Record<(typeof PROVIDER_IDS)[number], string> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
  gemini: "Gemini",
  openrouter: "OpenRouter",
}

/**
 * One line per provider (key configured, connection validated) plus the
 * cache and fallback settings. Connection checks run one after another so
 * a slow provider does not hide the others' results.
 */
export async function runChecks(cfg: Config, engines: readonly Engine[]): Promise<CheckResult[]> {
  const results: CheckResult[] = []

  for (const provider of PROVIDER_IDS) {
    const label = LABELS[provider]
    const settings = providerSettings(cfg, provider)
    if (!settings) {
      results.push({ level: "warn", label, detail: "API key missing" })
      continue
    }

    const engine = engines.find((candidate) => candidate.name === provider)
    if (!engine) {
      results.push({ level: "error", label, detail: "API key configured but engine not created" })
      continue
    }

    const connected = await engine.validateConnection()
    results.push(
      connected
        ? { level: "ok", label, detail: `Connected (${settings.model})` }
        : { level: "error", label, detail: `Connection failed (${settings.model})` },
    )
  }

  if (engines.length === 0) {
    results.push({ level: "error", label: "Providers", detail: "No AI provider configured" })
  } else if (!engines.some((engine) => engine.name === cfg.AI_PROVIDER)) {
    results.push({
      level: "warn",
      label: "Default provider",
      detail: `${cfg.AI_PROVIDER} is not configured, ${engines[0].name} will be preferred`,
    })
  }

  results.push({
    level: "ok",
    label: "Cache",
    detail: cfg.ENABLE_CACHING ? `Enabled (TTL ${cfg.CACHE_TTL}s, max ${cfg.CACHE_MAX_ENTRIES} entries)` : "Disabled",
  })
  results.push({
    level: "ok",
    label: "Fallback",
    detail: cfg.FALLBACK_ENABLED
      ? `Enabled (${cfg.AI_MAX_RETRIES} retries per provider)`
      : `Disabled (${cfg.AI_MAX_RETRIES} retries)`,
  })

  return results
}

export function formatReport(results: readonly CheckResult[]): string {
  const errors = results.filter((item) => item.level === "error").length
  const warnings = results.filter((item) => item.level === "warn").length

  return [
    "Context Demo Doctor",
    "===================",
    ...results.map((result) => `${icon(result.level)} ${result.label} - ${result.detail}`),
    "",
    `Issues: ${errors} errors, ${warnings} warnings`,
  ].join("\n")
}

async function main(): Promise<void> {
  const results = await runChecks(config, createEngines(config))
  console.log(formatReport(results))
  process.exit(results.some((item) => item.level === "error") ? 1 : 0)
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    log.error("doctor failed", error)
    process.exit(1)
  })
}
