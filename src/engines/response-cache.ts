/**
 * response-cache.ts: TTL cache of successful AI responses.
 *
 * Keys are fingerprints of the request fields that shape the answer
 * (prompt, context, system message, temperature, max tokens). Metadata is
 * caller bookkeeping and is left out, so two requests that differ only in
 * metadata share an entry.
 *
 * Entries expire lazily: an expired entry is dropped when it is read, or
 * when the cache grows past `maxEntries` and prunes itself.
 *
 * @module engines/response-cache
 */
import { createHash } from "node:crypto"

import { createLogger } from "../logger.js"
import { isSuccess } from "./response.js"
import type { AIRequest, AIResponse, SuccessResponse } from "./types.js"

const log = createLogger("engines.cache")

const DEFAULT_MAX_ENTRIES = 1000

interface CacheEntry {
  response: SuccessResponse
  createdAt: number
  ttlSeconds: number
  scope?: string
}

export interface CacheStats {
  totalEntries: number
  validEntries: number
  expiredEntries: number
  hits: number
  misses: number
  maxEntries: number
}

export interface ResponseCacheOptions {
  maxEntries?: number
  /** Milliseconds clock, injectable for tests. */
  now?: () => number
}

/** JSON with object keys sorted at every depth; `undefined` members are dropped like JSON.stringify does. */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null"
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item === undefined ? null : item)).join(",")}]`
  }

  const entries = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`)
  return `{${entries.join(",")}}`
}

export function fingerprint(request: AIRequest): string {
  const context = request.context && Object.keys(request.context).length > 0 ? request.context : null
  const payload = canonicalJson({
    prompt: request.prompt,
    context,
    systemMessage: request.systemMessage ?? null,
    temperature: request.temperature ?? null,
    maxTokens: request.maxTokens ?? null,
  })
  return createHash("sha256").update(payload).digest("hex")
}

export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly maxEntries: number
  private readonly now: () => number
  private hits = 0
  private misses = 0

  constructor(options: ResponseCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES
    this.now = options.now ?? Date.now
  }

  get size(): number {
    return this.entries.size
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.createdAt > entry.ttlSeconds * 1000
  }

  get(key: string): SuccessResponse | undefined {
    const entry = this.entries.get(key)
    if (!entry) {
      this.misses += 1
      return undefined
    }

    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key)
      this.misses += 1
      log.debug("expired entry evicted", { key })
      return undefined
    }

    this.hits += 1
    return entry.response
  }

  /** Returns false, and stores nothing, for anything but a success response. */
  put(key: string, response: AIResponse, ttlSeconds: number, scope?: string): boolean {
    if (!isSuccess(response)) {
      return false
    }

    // Re-inserting moves the key to the end of the Map's insertion order.
    this.entries.delete(key)
    this.entries.set(key, {
      response,
      createdAt: this.now(),
      ttlSeconds,
      ...(scope !== undefined ? { scope } : {}),
    })

    if (this.entries.size > this.maxEntries) {
      this.prune()
    }
    return true
  }

  clear(scope?: string): number {
    if (scope === undefined) {
      const removed = this.entries.size
      this.entries.clear()
      log.info("response cache cleared", { removed })
      return removed
    }

    let removed = 0
    for (const [key, entry] of this.entries) {
      if (entry.scope === scope) {
        this.entries.delete(key)
        removed += 1
      }
    }
    log.info("response cache cleared", { scope, removed })
    return removed
  }

  /** Drops expired entries, then the oldest ones until the cache fits `maxEntries`. */
  prune(): number {
    const now = this.now()
    let removed = 0

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key)
        removed += 1
      }
    }

    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) {
        break
      }
      this.entries.delete(key)
      removed += 1
    }

    if (removed > 0) {
      log.debug("response cache pruned", { removed, remaining: this.entries.size })
    }
    return removed
  }

  stats(): CacheStats {
    const now = this.now()
    let validEntries = 0
    for (const entry of this.entries.values()) {
      if (!this.isExpired(entry, now)) {
        validEntries += 1
      }
    }

    return {
      totalEntries: this.entries.size,
      validEntries,
      expiredEntries: this.entries.size - validEntries,
      hits: this.hits,
      misses: this.misses,
      maxEntries: this.maxEntries,
    }
  }
}
