import dotenv from "dotenv"
import { z } from "zod"

import { ConfigError } from "./engines/errors.js"

dotenv.config({ path: ".env" })

export const PROVIDER_IDS = ["openai", "anthropic", "gemini", "openrouter"] as const

export type ProviderId = (typeof PROVIDER_IDS)[number]

export const DEFAULT_MODELS: Record<ProviderId, string> = {
  openai: "gpt-3.5-turbo",
  anthropic: "claude-3-haiku-20240307",
  gemini: "gemini-1.5-flash",
  openrouter: "openai/gpt-3.5-turbo",
}

const boolFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") {
    return value
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase()
    return normalized === "true" || normalized === "1" || normalized === "yes"
  }
  return undefined
}, z.boolean())

const intFromEnv = z.preprocess((value) => {
  if (typeof value === "number") {
    return value
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim())
    return Number.isNaN(parsed) ? value : parsed
  }
  return undefined
}, z.number().int())

const floatFromEnv = z.preprocess((value) => {
  if (typeof value === "number") {
    return value
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number.parseFloat(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return undefined
}, z.number())

const optionalUrl = z
  .string()
  .trim()
  .refine((value) => value.length === 0 || /^https?:\/\//.test(value), {
    message: "Base URL must start with http:// or https://",
  })
  .default("")

const logLevelSchema = z.enum(["debug", "info", "warn", "error"])

const ConfigSchema = z.object({
  AI_PROVIDER: z.enum(PROVIDER_IDS).default("openai"),
  AI_TEMPERATURE: floatFromEnv.pipe(z.number().min(0).max(2)).default(0.7),
  AI_MAX_TOKENS: intFromEnv.pipe(z.number().int().positive()).default(500),
  AI_TIMEOUT: intFromEnv.pipe(z.number().int().positive()).default(30),

  ENABLE_CACHING: boolFromEnv.default(true),
  CACHE_TTL: intFromEnv.pipe(z.number().int().positive()).default(3600),
  CACHE_MAX_ENTRIES: intFromEnv.pipe(z.number().int().positive()).default(1000),

  FALLBACK_ENABLED: boolFromEnv.default(true),
  AI_MAX_RETRIES: intFromEnv.pipe(z.number().int().min(0)).default(2),
  RETRY_BASE_DELAY: floatFromEnv.pipe(z.number().min(0)).default(1),
  RETRY_MAX_DELAY: floatFromEnv.pipe(z.number().min(0)).default(60),
  HEALTH_FAILURE_THRESHOLD: intFromEnv.pipe(z.number().int().positive()).default(3),

  LOG_LEVEL: logLevelSchema.default("info"),
  LOG_FILE: z.string().default(""),

  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: optionalUrl,
  OPENAI_MODEL: z.string().trim().min(1).default(DEFAULT_MODELS.openai),
  ANTHROPIC_API_KEY: z.string().default(""),
  ANTHROPIC_BASE_URL: optionalUrl,
  ANTHROPIC_MODEL: z.string().trim().min(1).default(DEFAULT_MODELS.anthropic),
  GEMINI_API_KEY: z.string().default(""),
  GEMINI_BASE_URL: optionalUrl,
  GEMINI_MODEL: z.string().trim().min(1).default(DEFAULT_MODELS.gemini),
  OPENROUTER_API_KEY: z.string().default(""),
  OPENROUTER_BASE_URL: optionalUrl,
  OPENROUTER_MODEL: z.string().trim().min(1).default(DEFAULT_MODELS.openrouter),
})

export type Config = z.infer<typeof ConfigSchema>

/** Connection and generation settings for one provider, resolved from {@link Config}. */
export interface ProviderSettings {
  provider: ProviderId
  apiKey: string
  model: string
  baseUrl?: string
  temperature: number
  maxTokens: number
  timeoutMs: number
}

/**
 * Validates an environment map. Empty strings count as unset so that a
 * blank line in `.env` falls back to the default.
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  const cleaned: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      cleaned[key] = value
    }
  }

  const parsed = ConfigSchema.safeParse(cleaned)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new ConfigError("Invalid environment configuration", issues)
  }
  return parsed.data
}

const API_KEYS: Record<ProviderId, (config: Config) => string> = {
  openai: (config) => config.OPENAI_API_KEY,
  anthropic: (config) => config.ANTHROPIC_API_KEY,
  gemini: (config) => config.GEMINI_API_KEY,
  openrouter: (config) => config.OPENROUTER_API_KEY,
}

const BASE_URLS: Record<ProviderId, (config: Config) => string> = {
  openai: (config) => config.OPENAI_BASE_URL,
  anthropic: (config) => config.ANTHROPIC_BASE_URL,
  gemini: (config) => config.GEMINI_BASE_URL,
  openrouter: (config) => config.OPENROUTER_BASE_URL,
}

const MODELS: Record<ProviderId, (config: Config) => string> = {
  openai: (config) => config.OPENAI_MODEL,
  anthropic: (config) => config.ANTHROPIC_MODEL,
  gemini: (config) => config.GEMINI_MODEL,
  openrouter: (config) => config.OPENROUTER_MODEL,
}

/** Returns null when the provider has no API key configured. */
export function providerSettings(config: Config, provider: ProviderId): ProviderSettings | null {
  const apiKey = API_KEYS[provider](config).trim()
  if (apiKey.length === 0) {
    return null
  }

  const baseUrl = BASE_URLS[provider](config)
  return {
    provider,
    apiKey,
    model: MODELS[provider](config),
    baseUrl: baseUrl.length > 0 ? baseUrl : undefined,
    temperature: config.AI_TEMPERATURE,
    maxTokens: config.AI_MAX_TOKENS,
    timeoutMs: config.AI_TIMEOUT * 1000,
  }
}

export function configuredProviders(config: Config): ProviderId[] {
  return PROVIDER_IDS.filter((provider) => providerSettings(config, provider) !== null)
}

function loadProcessConfig(): Config {
  try {
    return parseConfig(process.env)
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error("[Config Error] Invalid environment configuration.")
      for (const issue of error.issues) {
        console.error(`  - ${issue}`)
      }
      process.exit(1)
    }
    throw error
  }
}

export const config: Config = loadProcessConfig()

export default config
