import { describe, expect, it } from "vitest"

import { failureResponse, successResponse } from "./response.js"
import { canonicalJson, fingerprint, ResponseCache } from "./response-cache.js"

const answer = (content: string) => successResponse({ provider: "mock", model: "mock-model", content })

function clock(start = 1_000_000) {
  let now = start
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms
    },
  }
}

describe("canonicalJson", () => {
  it("sorts object keys at every depth", () => {
    expect(canonicalJson({ b: 1, a: [{ d: 1, c: 2 }] })).toBe('{"a":[{"c":2,"d":1}],"b":1}')
  })

  it("drops undefined members", () => {
    expect(canonicalJson({ a: undefined, b: null })).toBe('{"b":null}')
  })
})

describe("fingerprint", () => {
  it("does not depend on context key order", () => {
    const first = fingerprint({ prompt: "hi", context: { industry: "retail", tier: 2 } })
    const second = fingerprint({ prompt: "hi", context: { tier: 2, industry: "retail" } })
    expect(first).toBe(second)
    expect(first).toMatch(/^[0-9a-f]{64}$/)
  })

  it("treats an empty context like no context", () => {
    expect(fingerprint({ prompt: "hi", context: {} })).toBe(fingerprint({ prompt: "hi" }))
  })

  it("ignores metadata", () => {
    expect(fingerprint({ prompt: "hi", metadata: { requestId: "r-1" } })).toBe(fingerprint({ prompt: "hi" }))
  })

  it("changes with the fields that shape the answer", () => {
    const base = fingerprint({ prompt: "hi" })
    expect(fingerprint({ prompt: "hi!" })).not.toBe(base)
    expect(fingerprint({ prompt: "hi", temperature: 0.2 })).not.toBe(base)
    expect(fingerprint({ prompt: "hi", maxTokens: 10 })).not.toBe(base)
    expect(fingerprint({ prompt: "hi", systemMessage: "be brief" })).not.toBe(base)
  })
})

describe("ResponseCache", () => {
  it("returns a stored response until its TTL has passed", () => {
    const time = clock()
    const cache = new ResponseCache({ now: time.now })
    const response = answer("cached")
    cache.put("k", response, 60)

    time.advance(60_000)
    expect(cache.get("k")).toBe(response)

    time.advance(1)
    expect(cache.get("k")).toBeUndefined()
    expect(cache.size).toBe(0)
  })

  it("refuses failure responses", () => {
    const cache = new ResponseCache()
    const stored = cache.put(
      "k",
      failureResponse({ provider: "mock", model: "m", status: "error", errorMessage: "x", errorCode: "API_ERROR" }),
      60,
    )

    expect(stored).toBe(false)
    expect(cache.size).toBe(0)
  })

  it("evicts the oldest entry past maxEntries", () => {
    const cache = new ResponseCache({ maxEntries: 2 })
    cache.put("a", answer("a"), 60)
    cache.put("b", answer("b"), 60)
    cache.put("c", answer("c"), 60)

    expect(cache.size).toBe(2)
    expect(cache.get("a")).toBeUndefined()
    expect(cache.get("c")?.content).toBe("c")
  })

  it("evicts expired entries before live ones when pruning", () => {
    const time = clock()
    const cache = new ResponseCache({ maxEntries: 2, now: time.now })
    cache.put("live", answer("live"), 600)
    cache.put("short", answer("short"), 1)
    time.advance(2_000)
    cache.put("new", answer("new"), 600)

    expect(cache.get("live")?.content).toBe("live")
    expect(cache.get("short")).toBeUndefined()
    expect(cache.get("new")?.content).toBe("new")
  })

  it("clears one scope or everything", () => {
    const cache = new ResponseCache()
    cache.put("a", answer("a"), 60, "healthcare")
    cache.put("b", answer("b"), 60, "restaurant")
    cache.put("c", answer("c"), 60)

    expect(cache.clear("healthcare")).toBe(1)
    expect(cache.get("a")).toBeUndefined()
    expect(cache.clear()).toBe(2)
    expect(cache.size).toBe(0)
  })

  it("counts hits, misses and expired entries", () => {
    const time = clock()
    const cache = new ResponseCache({ maxEntries: 10, now: time.now })
    cache.put("short", answer("short"), 1)
    cache.put("long", answer("long"), 600)
    cache.get("long")
    cache.get("missing")
    time.advance(5_000)

    expect(cache.stats()).toEqual({
      totalEntries: 2,
      validEntries: 1,
      expiredEntries: 1,
      hits: 1,
      misses: 1,
      maxEntries: 10,
    })
  })
})
