import type { AIRequest } from "../engines/types.js"

export interface CliArgs {
  request: AIRequest
  provider?: string
}

const VALUE_FLAGS = new Set(["--provider", "--industry", "--system", "--temperature", "--max-tokens"])

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "CliUsageError"
  }
}

export const USAGE =
  "Usage: context-demo [--provider <id>] [--industry <name>] [--system <text>] " +
  "[--temperature <0-2>] [--max-tokens <n>] <prompt...>"

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new CliUsageError(`${flag} expects a number, got '${raw}'`)
  }
  return value
}

/** `argv` without the node binary and script path. */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const flags = new Map<string, string>()
  const words: string[] = []

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[index + 1]
      if (value === undefined) {
        throw new CliUsageError(`${arg} expects a value`)
      }
      flags.set(arg, value)
      index += 1
    } else {
      words.push(arg)
    }
  }

  const prompt = words.join(" ").trim()
  if (prompt.length === 0) {
    throw new CliUsageError("A prompt is required")
  }

  const industry = flags.get("--industry")
  const system = flags.get("--system")
  const temperature = flags.get("--temperature")
  const maxTokens = flags.get("--max-tokens")

  const request: AIRequest = {
    prompt,
    ...(industry !== undefined ? { context: { industry } } : {}),
    ...(system !== undefined ? { systemMessage: system } : {}),
    ...(temperature !== undefined ? { temperature: parseNumber("--temperature", temperature) } : {}),
    ...(maxTokens !== undefined ? { maxTokens: parseNumber("--max-tokens", maxTokens) } : {}),
  }

  const provider = flags.get("--provider")
  return provider !== undefined ? { request, provider } : { request }
}
