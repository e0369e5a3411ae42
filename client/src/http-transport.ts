import http from "node:http"
import https from "node:https"
import { TransportError } from "./errors.ts"
import { createLogger } from "./logger.ts"
import { encodeRequest, parseEnvelope, unwrapResult } from "./transport.ts"
import type { JsonRpcResponse, Transport } from "./transport.ts"

const log = createLogger("http-transport")

const MAX_RESPONSE_BYTES = 64 * 1024 * 1024

export interface HttpTransportOptions {
  endpoint: string
  requestTimeoutMs: number
}

/** One POST per request; no subscriptions. */
export class HttpTransport implements Transport {
  readonly kind = "http"
  private readonly url: URL
  private readonly timeoutMs: number
  private readonly agent: http.Agent
  private nextId = 1

  constructor(opts: HttpTransportOptions) {
    this.url = new URL(opts.endpoint)
    this.timeoutMs = opts.requestTimeoutMs
    this.agent = this.url.protocol === "https:"
      ? new https.Agent({ keepAlive: true })
      : new http.Agent({ keepAlive: true })
  }

  async request(method: string, params: unknown[]): Promise<unknown> {
    const id = this.nextId++
    const body = encodeRequest(id, method, params)
    log.debug("rpc request", { method, id })
    const { status, text } = await this.post(method, body)

    // Nodes answer JSON-RPC errors with non-2xx codes too; prefer the envelope when there is one.
    let response: JsonRpcResponse
    try {
      response = parseEnvelope(method, text)
    } catch (err) {
      if (status < 200 || status >= 300) {
        throw new TransportError(`${method}: HTTP ${status}`, { cause: err })
      }
      throw err
    }
    return unwrapResult(method, response)
  }

  private post(method: string, body: string): Promise<{ status: number; text: string }> {
    const send: typeof http.request = this.url.protocol === "https:" ? https.request : http.request
    return new Promise((resolve, reject) => {
      const req = send(
        this.url,
        {
          method: "POST",
          agent: this.agent,
          headers: {
            "content-type": "application/json",
            "content-length": Buffer.byteLength(body),
          },
        },
        (res) => {
          const chunks: Buffer[] = []
          let size = 0
          res.on("data", (chunk: Buffer) => {
            size += chunk.length
            if (size > MAX_RESPONSE_BYTES) {
              req.destroy(new TransportError(`${method}: response exceeds ${MAX_RESPONSE_BYTES} bytes`))
              return
            }
            chunks.push(chunk)
          })
          res.on("end", () => {
            resolve({ status: res.statusCode ?? 0, text: Buffer.concat(chunks).toString("utf-8") })
          })
          res.on("error", (err) => reject(new TransportError(`${method}: ${err.message}`, { cause: err })))
        },
      )
      req.setTimeout(this.timeoutMs, () => {
        req.destroy(new TransportError(`${method}: timed out after ${this.timeoutMs}ms`))
      })
      req.on("error", (err) => {
        reject(err instanceof TransportError ? err : new TransportError(`${method}: ${err.message}`, { cause: err }))
      })
      req.end(body)
    })
  }

  async close(): Promise<void> {
    this.agent.destroy()
  }
}
