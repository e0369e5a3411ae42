/**
 * Retry policy
 *
 * A RetryPolicy value is resolved per call from three layers: the call's own
 * override, the client-wide setting, then the built-in default. Only transport
 * failures (and, when enabled, empty results) are retried; every other error
 * surfaces on its first occurrence.
 */

import { setTimeout as sleep } from "node:timers/promises"
import type { BackoffConfig } from "./config.ts"
import { DEFAULT_BACKOFF } from "./config.ts"
import { isRetryableError } from "./errors.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("retry")

export interface RetryPolicy {
  retryOnTransportError: boolean
  retryOnEmptyResult: boolean
}

export type RetryOverride = Partial<RetryPolicy>

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retryOnTransportError: true,
  retryOnEmptyResult: false,
}

/** Resolve a policy from override layers, most specific first. */
export function resolveRetryPolicy(...layers: Array<RetryOverride | undefined>): RetryPolicy {
  const pick = <K extends keyof RetryPolicy>(key: K): RetryPolicy[K] => {
    for (const layer of layers) {
      const value = layer?.[key]
      if (value !== undefined) return value
    }
    return DEFAULT_RETRY_POLICY[key]
  }
  return {
    retryOnTransportError: pick("retryOnTransportError"),
    retryOnEmptyResult: pick("retryOnEmptyResult"),
  }
}

export interface RetryContext {
  policy: RetryPolicy
  backoff?: BackoffConfig
  signal?: AbortSignal
  /** Label for log lines. */
  label?: string
}

/** Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped. */
export function backoffDelay(attempt: number, backoff: BackoffConfig = DEFAULT_BACKOFF): number {
  const exp = Math.min(attempt - 1, 30)
  return Math.min(backoff.baseDelayMs * 2 ** exp, backoff.maxDelayMs)
}

/**
 * Run `operation` under the policy. A `null` result counts as empty and is
 * retried only when `retryOnEmptyResult` is set; the last `null` is returned
 * once attempts run out. Aborting the signal rejects with an AbortError and
 * starts no further attempt.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, ctx: RetryContext): Promise<T> {
  const backoff = ctx.backoff ?? DEFAULT_BACKOFF
  const label = ctx.label ?? "operation"

  for (let attempt = 1; ; attempt++) {
    ctx.signal?.throwIfAborted()
    const last = attempt >= backoff.maxAttempts

    let result: T
    try {
      result = await operation(attempt)
    } catch (err) {
      if (last || !ctx.policy.retryOnTransportError || !isRetryableError(err)) throw err
      const delay = backoffDelay(attempt, backoff)
      log.warn("transient failure, retrying", { label, attempt, delayMs: delay, error: err })
      await sleep(delay, undefined, { signal: ctx.signal })
      continue
    }

    if (result === null && ctx.policy.retryOnEmptyResult && !last) {
      const delay = backoffDelay(attempt, backoff)
      log.debug("empty result, retrying", { label, attempt, delayMs: delay })
      await sleep(delay, undefined, { signal: ctx.signal })
      continue
    }
    return result
  }
}
