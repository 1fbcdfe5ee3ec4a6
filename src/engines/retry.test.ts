import { describe, expect, it, vi } from "vitest"

import { failureResponse, successResponse } from "./response.js"
import { backoffDelay, RetryController, type RetryPolicy } from "./retry.js"
import type { AIResponse } from "./types.js"

const policy: RetryPolicy = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 350, exponentialBase: 2, jitter: false }

const rateLimited = (): AIResponse =>
  failureResponse({
    provider: "mock",
    model: "mock-model",
    status: "rate_limited",
    errorMessage: "slow down",
    errorCode: "RATE_LIMIT_ERROR",
  })

describe("backoffDelay", () => {
  it("grows exponentially and stops at the maximum", () => {
    expect([0, 1, 2, 3].map((attempt) => backoffDelay(attempt, policy))).toEqual([100, 200, 350, 350])
  })

  it("scales the delay by a jitter factor between 0.5 and 1.5", () => {
    const jittered = { ...policy, jitter: true }
    expect(backoffDelay(0, jittered, () => 0)).toBe(50)
    expect(backoffDelay(0, jittered, () => 0.75)).toBe(125)
    expect(backoffDelay(1, jittered, () => 0.5)).toBe(200)
  })
})

describe("RetryController", () => {
  it("retries a retryable failure until the attempts run out", async () => {
    const sleeps: number[] = []
    const controller = new RetryController({
      sleep: async (ms) => {
        sleeps.push(ms)
      },
    })
    const last = rateLimited()
    const fn = vi.fn<() => Promise<AIResponse>>()
    fn.mockResolvedValueOnce(rateLimited()).mockResolvedValueOnce(rateLimited()).mockResolvedValueOnce(rateLimited())
    fn.mockResolvedValueOnce(last)

    const response = await controller.execute(fn, policy)

    expect(fn).toHaveBeenCalledTimes(4)
    expect(response).toBe(last)
    expect(sleeps).toEqual([100, 200, 350])
  })

  it("stops as soon as an attempt succeeds", async () => {
    const sleep = vi.fn(async () => {})
    const controller = new RetryController({ sleep })
    const fn = vi.fn<() => Promise<AIResponse>>()
    fn.mockResolvedValueOnce(rateLimited())
    fn.mockResolvedValue(successResponse({ provider: "mock", model: "mock-model", content: "done" }))

    const response = await controller.execute(fn, policy)

    expect(response.status).toBe("success")
    expect(fn).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledTimes(1)
  })

  it("does not retry an invalid request", async () => {
    const controller = new RetryController({ sleep: async () => {} })
    const fn = vi.fn(async (): Promise<AIResponse> =>
      failureResponse({
        provider: "mock",
        model: "mock-model",
        status: "invalid_request",
        errorMessage: "bad request",
        errorCode: "INVALID_REQUEST_ERROR",
      }),
    )

    const response = await controller.execute(fn, policy)

    expect(response.status).toBe("invalid_request")
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it("makes a single attempt without sleeping when retries are off", async () => {
    const sleep = vi.fn(async () => {})
    const controller = new RetryController({ sleep })
    const fn = vi.fn(async () => rateLimited())

    await controller.execute(fn, { ...policy, maxRetries: 0 })

    expect(fn).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })
})
