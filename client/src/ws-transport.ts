/**
 * WebSocket JSON-RPC transport
 *
 * A single socket multiplexes requests (matched by id) and subscription
 * notifications (matched by subscription id). The socket is opened lazily
 * and reopened by the next request after it drops; in-flight requests and
 * live subscriptions fail with TransportError when that happens.
 */

import { WebSocket } from "ws"
import type { RawData } from "ws"
import { TransportError } from "./errors.ts"
import { createLogger } from "./logger.ts"
import {
  AsyncQueue,
  JsonRpcNotificationSchema,
  JsonRpcResponseSchema,
  encodeRequest,
  unwrapResult,
} from "./transport.ts"
import type { Subscription, Transport } from "./transport.ts"

const log = createLogger("ws-transport")

const MAX_PAYLOAD_BYTES = 64 * 1024 * 1024

function frameText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8")
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8")
  return data.toString("utf-8")
}

export interface WsTransportOptions {
  endpoint: string
  requestTimeoutMs: number
}

interface PendingRequest {
  method: string
  resolve: (value: unknown) => void
  reject: (err: unknown) => void
  timer: ReturnType<typeof setTimeout>
  /** Set for subscribe calls: registered under the returned id before any notification is routed. */
  queue?: AsyncQueue<unknown>
}

export class WsTransport implements Transport {
  readonly kind = "ws"
  private readonly endpoint: string
  private readonly timeoutMs: number
  private socket: WebSocket | null = null
  private opening: Promise<WebSocket> | null = null
  private nextId = 1
  private closed = false
  private readonly pending = new Map<number, PendingRequest>()
  private readonly subscriptions = new Map<string, AsyncQueue<unknown>>()

  constructor(opts: WsTransportOptions) {
    this.endpoint = opts.endpoint
    this.timeoutMs = opts.requestTimeoutMs
  }

  async request(method: string, params: unknown[]): Promise<unknown> {
    return this.send(method, params)
  }

  async subscribe(method: string, params: unknown[], unsubscribeMethod: string): Promise<Subscription<unknown>> {
    const queue = new AsyncQueue<unknown>()
    const result = await this.send(method, params, queue)
    const id = String(result)
    log.debug("subscribed", { method, id })

    return {
      id,
      [Symbol.asyncIterator]: () => queue[Symbol.asyncIterator](),
      unsubscribe: async () => {
        if (!this.subscriptions.delete(id)) return
        queue.end()
        if (this.socket?.readyState === WebSocket.OPEN) {
          await this.send(unsubscribeMethod, [id])
        }
      },
    }
  }

  async close(): Promise<void> {
    this.closed = true
    const socket = this.socket
    this.socket = null
    this.failAll(new TransportError("transport closed"))
    if (socket && socket.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        socket.once("close", () => resolve())
        socket.close()
      })
    }
  }

  private async send(method: string, params: unknown[], queue?: AsyncQueue<unknown>): Promise<unknown> {
    if (this.closed) throw new TransportError(`${method}: transport closed`)
    const socket = await this.connect()
    const id = this.nextId++

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id)
        reject(new TransportError(`${method}: timed out after ${this.timeoutMs}ms`))
      }, this.timeoutMs)
      this.pending.set(id, { method, resolve, reject, timer, queue })
      socket.send(encodeRequest(id, method, params), (err) => {
        if (!err) return
        clearTimeout(timer)
        this.pending.delete(id)
        reject(new TransportError(`${method}: send failed: ${err.message}`, { cause: err }))
      })
    })
  }

  private connect(): Promise<WebSocket> {
    if (this.socket?.readyState === WebSocket.OPEN) return Promise.resolve(this.socket)
    if (this.opening) return this.opening

    this.opening = new Promise<WebSocket>((resolve, reject) => {
      const socket = new WebSocket(this.endpoint, {
        handshakeTimeout: this.timeoutMs,
        maxPayload: MAX_PAYLOAD_BYTES,
      })
      const onOpenError = (err: Error) => {
        reject(new TransportError(`cannot connect to ${this.endpoint}: ${err.message}`, { cause: err }))
      }
      socket.once("error", onOpenError)
      socket.once("open", () => {
        socket.off("error", onOpenError)
        socket.on("error", (err) => log.warn("socket error", { endpoint: this.endpoint, error: err }))
        if (this.closed) {
          socket.close()
          reject(new TransportError(`transport closed while connecting to ${this.endpoint}`))
          return
        }
        this.socket = socket
        log.info("connected", { endpoint: this.endpoint })
        resolve(socket)
      })
      socket.on("message", (data: RawData) => this.handleMessage(data))
      socket.on("close", (code) => {
        if (this.socket === socket) this.socket = null
        log.info("disconnected", { endpoint: this.endpoint, code })
        this.failAll(new TransportError(`connection closed (${code})`))
      })
    }).finally(() => {
      this.opening = null
    })
    return this.opening
  }

  private handleMessage(data: RawData): void {
    let json: unknown
    try {
      json = JSON.parse(frameText(data))
    } catch (err) {
      log.warn("dropping non-JSON frame", { error: err })
      return
    }

    const notification = JsonRpcNotificationSchema.safeParse(json)
    if (notification.success) {
      const queue = this.subscriptions.get(String(notification.data.params.subscription))
      if (queue) queue.push(notification.data.params.result)
      return
    }

    const response = JsonRpcResponseSchema.safeParse(json)
    if (!response.success || typeof response.data.id !== "number") {
      log.warn("dropping unrecognised frame")
      return
    }
    const entry = this.pending.get(response.data.id)
    if (!entry) return
    this.pending.delete(response.data.id)
    clearTimeout(entry.timer)

    let result: unknown
    try {
      result = unwrapResult(entry.method, response.data)
    } catch (err) {
      entry.reject(err)
      return
    }
    if (entry.queue) {
      if (typeof result !== "string" && typeof result !== "number") {
        entry.reject(new TransportError(`${entry.method}: subscription id missing`))
        return
      }
      this.subscriptions.set(String(result), entry.queue)
    }
    entry.resolve(result)
  }

  private failAll(err: TransportError): void {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer)
      entry.reject(err)
    }
    this.pending.clear()
    for (const queue of this.subscriptions.values()) queue.fail(err)
    this.subscriptions.clear()
  }
}
