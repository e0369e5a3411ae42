/**
 * JSON-RPC transport abstraction
 *
 * Both the HTTP and WebSocket transports share the envelope handling and the
 * mapping from node error codes onto the client's error taxonomy.
 */

import { z } from "zod"
import {
  DecodingError,
  RuntimeRejection,
  TransportError,
  UnsupportedOperationError,
} from "./errors.ts"
import type { ClientError, RejectionReason } from "./errors.ts"

/** A server-pushed stream. Iteration ends after `unsubscribe()` or when the connection drops. */
export interface Subscription<T> extends AsyncIterable<T> {
  readonly id: string
  unsubscribe(): Promise<void>
}

export interface Transport {
  readonly kind: "http" | "ws"
  request(method: string, params: unknown[]): Promise<unknown>
  /** Only present on transports that can receive pushed notifications. */
  subscribe?(method: string, params: unknown[], unsubscribeMethod: string): Promise<Subscription<unknown>>
  close(): Promise<void>
}

export const JsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
})

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.number(), z.string(), z.null()]),
  result: z.unknown().optional(),
  error: JsonRpcErrorSchema.optional(),
})

export const JsonRpcNotificationSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string(),
  params: z.object({
    subscription: z.union([z.string(), z.number()]),
    result: z.unknown(),
  }),
})

export type JsonRpcError = z.infer<typeof JsonRpcErrorSchema>
export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>

export const METHOD_NOT_FOUND = -32601

// author_* pool errors reported by substrate nodes
const INVALID_TRANSACTION = 1010
const POOL_IMMEDIATELY_DROPPED = 1016
const POOL_ERROR_MIN = 1010
const POOL_ERROR_MAX = 1019

export function encodeRequest(id: number, method: string, params: unknown[]): string {
  return JSON.stringify({ jsonrpc: "2.0", id, method, params })
}

function rejectionReason(code: number, error: JsonRpcError): RejectionReason {
  const text = `${error.message} ${typeof error.data === "string" ? error.data : JSON.stringify(error.data ?? "")}`
  if (code === POOL_IMMEDIATELY_DROPPED || /exhaust|pool is full/i.test(text)) {
    return "exhausts-resources"
  }
  if (code === INVALID_TRANSACTION) {
    if (/stale|outdated/i.test(text)) return "stale"
    if (/future/i.test(text)) return "future"
    if (/payment|balance too low|inability to pay/i.test(text)) return "payment"
  }
  return "invalid"
}

/** Map a JSON-RPC error object onto the client error taxonomy. */
export function classifyRpcError(method: string, error: JsonRpcError): ClientError {
  if (error.code === METHOD_NOT_FOUND) {
    return new UnsupportedOperationError(method)
  }
  if (error.code >= POOL_ERROR_MIN && error.code <= POOL_ERROR_MAX) {
    return new RuntimeRejection(
      `${method} rejected: ${error.message}`,
      error.code,
      rejectionReason(error.code, error),
      error.data,
    )
  }
  return new TransportError(`${method} failed: ${error.message}`, { code: error.code })
}

/** Parse a raw JSON body into a response envelope. Malformed envelopes are transport failures. */
export function parseEnvelope(method: string, body: string): JsonRpcResponse {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch (err) {
    throw new TransportError(`${method}: response is not JSON`, { cause: err })
  }
  const parsed = JsonRpcResponseSchema.safeParse(json)
  if (!parsed.success) {
    throw new TransportError(`${method}: malformed JSON-RPC envelope`, { cause: parsed.error })
  }
  return parsed.data
}

/** Unwrap `result`, throwing the classified error when the node answered with one. */
export function unwrapResult(method: string, response: JsonRpcResponse): unknown {
  if (response.error) throw classifyRpcError(method, response.error)
  if (!("result" in response)) {
    throw new DecodingError(`${method}: response carries neither result nor error`)
  }
  return response.result
}

/**
 * Unbounded push/pull queue backing a subscription. `fail` ends iteration with
 * an error; `end` ends it cleanly.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = []
  private readonly waiters: Array<{
    resolve: (r: IteratorResult<T>) => void
    reject: (err: unknown) => void
  }> = []
  private done = false
  private error: unknown = null

  push(item: T): void {
    if (this.done) return
    const waiter = this.waiters.shift()
    if (waiter) waiter.resolve({ value: item, done: false })
    else this.items.push(item)
  }

  end(): void {
    if (this.done) return
    this.done = true
    for (const waiter of this.waiters.splice(0)) waiter.resolve({ value: undefined, done: true })
  }

  fail(err: unknown): void {
    if (this.done) return
    this.done = true
    this.error = err
    for (const waiter of this.waiters.splice(0)) waiter.reject(err)
  }

  get closed(): boolean {
    return this.done
  }

  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1)
      return Promise.resolve({ value: item, done: false })
    }
    if (this.done) {
      if (this.error !== null) return Promise.reject(this.error)
      return Promise.resolve({ value: undefined, done: true })
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject })
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() }
  }
}
