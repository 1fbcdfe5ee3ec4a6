import fs from "node:fs"
import path from "node:path"

import config, { type Config } from "./config.js"

export type LogLevel = Config["LOG_LEVEL"]

/** Ascending severity; a line is written when its level is at or above `LOG_LEVEL`. */
const SEVERITY: readonly LogLevel[] = ["debug", "info", "warn", "error"]

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return SEVERITY.indexOf(level) >= SEVERITY.indexOf(threshold)
}

// Error instances stringify to "{}" with JSON.stringify.
function serializeMeta(meta: unknown): string {
  return JSON.stringify(meta, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message }
    }
    return value
  })
}

export function formatMessage(level: LogLevel, scope: string, message: string, meta?: unknown): string {
  const line = `[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} [${scope}] ${message}`
  return meta === undefined ? line : `${line} ${serializeMeta(meta)}`
}

class LogStream {
  private static instance: LogStream | null = null
  private stream: fs.WriteStream | null = null

  private constructor(filePath: string) {
    if (filePath.trim().length === 0) {
      return
    }

    try {
      const resolved = path.resolve(process.cwd(), filePath)
      fs.mkdirSync(path.dirname(resolved), { recursive: true })
      this.stream = fs.createWriteStream(resolved, { flags: "a" })
    } catch (error) {
      console.error(`[Logger] Failed to initialize log stream: ${String(error)}`)
    }
  }

  static getInstance(): LogStream {
    if (!LogStream.instance) {
      LogStream.instance = new LogStream(config.LOG_FILE)
    }
    return LogStream.instance
  }

  write(line: string): void {
    this.stream?.write(`${line}\n`)
  }

  close(): void {
    if (this.stream) {
      this.stream.end()
      this.stream = null
    }
  }
}

const logStream = LogStream.getInstance()

function emit(level: LogLevel, scope: string, message: string, meta?: unknown): void {
  if (!isLevelEnabled(level, config.LOG_LEVEL)) {
    return
  }

  const line = formatMessage(level, scope, message, meta)
  const out = level === "warn" || level === "error" ? process.stderr : process.stdout
  out.write(`${line}\n`)
  logStream.write(line)
}

export type Logger = Record<LogLevel, (message: string, meta?: unknown) => void>

export function createLogger(scope: string): Logger {
  return {
    debug: (message, meta) => emit("debug", scope, message, meta),
    info: (message, meta) => emit("info", scope, message, meta),
    warn: (message, meta) => emit("warn", scope, message, meta),
    error: (message, meta) => emit("error", scope, message, meta),
  }
}

export function closeLogFile(): void {
  logStream.close()
}

export default createLogger
