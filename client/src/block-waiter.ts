/**
 * Waiting for the chain to reach a height
 *
 * The receipt scan suspends here whenever it has caught up with the selected
 * chain. Transports that can push use head subscriptions; stateless ones poll
 * the head at a fixed interval.
 */

import { setTimeout as sleep } from "node:timers/promises"
import type { ChainSelector } from "./chain-types.ts"
import type { CallOptions, ChainRpc } from "./chain-rpc.ts"
import { TransportError } from "./errors.ts"
import { createLogger } from "./logger.ts"
import { backoffDelay } from "./retry.ts"

const log = createLogger("block-waiter")

export interface BlockWaiter {
  /**
   * Resolve with the head height once the selected chain is at or past
   * `height`. Head reads follow `opts.retry`.
   */
  waitForHeight(height: number, chain: ChainSelector, opts?: CallOptions): Promise<number>
}

export class PollingBlockWaiter implements BlockWaiter {
  private readonly rpc: ChainRpc
  private readonly intervalMs: number

  constructor(rpc: ChainRpc, intervalMs: number) {
    this.rpc = rpc
    this.intervalMs = intervalMs
  }

  async waitForHeight(height: number, chain: ChainSelector, opts: CallOptions = {}): Promise<number> {
    for (;;) {
      const head = await this.rpc.blockInfo(chain, opts)
      if (head.height >= height) return head.height
      log.debug("waiting for block", { chain, height, head: head.height })
      await sleep(this.intervalMs, undefined, { signal: opts.signal })
    }
  }
}

type Followed = { reached: number } | { dropped: TransportError }

/**
 * Follows pushed heads. A stream that fails or ends early is reopened under
 * the same retry policy as any other read.
 */
export class SubscriptionBlockWaiter implements BlockWaiter {
  private readonly rpc: ChainRpc

  constructor(rpc: ChainRpc) {
    this.rpc = rpc
  }

  async waitForHeight(height: number, chain: ChainSelector, opts: CallOptions = {}): Promise<number> {
    const policy = this.rpc.retryPolicy(opts.retry)
    const backoff = this.rpc.backoff
    for (let attempt = 1; ; attempt++) {
      const outcome = await this.follow(height, chain, opts)
      if ("reached" in outcome) return outcome.reached
      if (attempt >= backoff.maxAttempts || !policy.retryOnTransportError) throw outcome.dropped
      const delay = backoffDelay(attempt, backoff)
      log.warn("head subscription dropped, resubscribing", { chain, height, attempt, delayMs: delay, error: outcome.dropped })
      await sleep(delay, undefined, { signal: opts.signal })
    }
  }

  private async follow(height: number, chain: ChainSelector, opts: CallOptions): Promise<Followed> {
    const { signal } = opts
    signal?.throwIfAborted()
    const sub = await this.rpc.subscribeHeads(chain, opts)
    if (sub === null) {
      throw new TransportError("transport does not support subscriptions")
    }

    const stop = () => {
      sub.unsubscribe().catch((err: unknown) => log.warn("unsubscribe failed", { error: err }))
    }
    signal?.addEventListener("abort", stop, { once: true })
    try {
      // subscribe first so a head produced during this check is not missed
      const head = await this.rpc.blockInfo(chain, opts)
      if (head.height >= height) return { reached: head.height }

      try {
        for await (const header of sub) {
          if (header.number >= height) return { reached: header.number }
        }
      } catch (err) {
        signal?.throwIfAborted()
        if (!(err instanceof TransportError)) throw err
        return { dropped: err }
      }
      signal?.throwIfAborted()
      return { dropped: new TransportError(`head subscription ended before reaching height ${height}`) }
    } finally {
      signal?.removeEventListener("abort", stop)
      stop()
    }
  }
}

/** Pick the waiter the transport can support. */
export function createBlockWaiter(rpc: ChainRpc, pollIntervalMs: number): BlockWaiter {
  if (rpc.transport.subscribe) return new SubscriptionBlockWaiter(rpc)
  return new PollingBlockWaiter(rpc, pollIntervalMs)
}
