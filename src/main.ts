#!/usr/bin/env node
/**
 * main.ts: one-shot command line entry point.
 *
 * Builds the process-wide orchestrator from the environment, sends a single
 * request and prints the answer. Exit code 1 on a failed response, 2 on bad
 * usage. The orchestration logic lives in src/engines/orchestrator.ts.
 */

import { CliUsageError, parseCliArgs, USAGE, type CliArgs } from "./cli/args.js"
import { getOrchestrator } from "./engines/orchestrator.js"
import { closeLogFile, createLogger } from "./logger.js"

const log = createLogger("main")

async function main(): Promise<number> {
  let args: CliArgs
  try {
    args = parseCliArgs(process.argv.slice(2))
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message)
      console.error(USAGE)
      return 2
    }
    throw error
  }

  const orchestrator = getOrchestrator()
  const response = await orchestrator.generateResponse(args.request, args.provider)
  orchestrator.logProviderStats()

  if (response.status !== "success") {
    console.error(`[${response.provider}] ${response.status}: ${response.errorMessage}`)
    return 1
  }

  console.log(response.content)
  log.info("response printed", {
    provider: response.provider,
    model: response.model,
    tokens: response.tokensUsed,
    cached: response.cached ?? false,
  })
  return 0
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log.error("fatal", error)
    process.exitCode = 1
  })
  .finally(() => {
    closeLogFile()
  })
