/**
 * Error taxonomy
 *
 * Every failure the client surfaces is a ClientError subclass with a `kind`
 * discriminant. Only TransportError is ever retried; everything else
 * surfaces on first occurrence.
 */

export type ErrorKind =
  | "transport"
  | "decoding"
  | "runtime-rejection"
  | "unsupported"
  | "user-input"
  | "resolution"
  | "submit"

export abstract class ClientError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Connectivity, timeout, TLS or malformed JSON-RPC envelope. */
export class TransportError extends ClientError {
  readonly kind = "transport"
  readonly code: number | undefined

  constructor(message: string, options?: { cause?: unknown; code?: number }) {
    super(message, options)
    this.code = options?.code
  }
}

/** Malformed bytes or a response shape that does not match the expected type. */
export class DecodingError extends ClientError {
  readonly kind = "decoding"
}

export type RejectionReason = "stale" | "future" | "payment" | "exhausts-resources" | "invalid"

/** The node refused the extrinsic as invalid. Identical bytes will fail identically. */
export class RuntimeRejection extends ClientError {
  readonly kind = "runtime-rejection"
  readonly code: number
  readonly reason: RejectionReason
  readonly data: unknown

  constructor(message: string, code: number, reason: RejectionReason, data?: unknown) {
    super(message)
    this.code = code
    this.reason = reason
    this.data = data
  }
}

/** The node does not implement the RPC method (JSON-RPC -32601). */
export class UnsupportedOperationError extends ClientError {
  readonly kind = "unsupported"
  readonly method: string

  constructor(method: string, message?: string) {
    super(message ?? `method not supported by node: ${method}`)
    this.method = method
  }
}

/** Caller supplied a malformed address, hash or argument. Raised before any network call. */
export class UserInputError extends ClientError {
  readonly kind = "user-input"
}

/** Filling in nonce or mortality failed. `cause` holds the underlying error. */
export class ResolutionError extends ClientError {
  readonly kind = "resolution"
  readonly field: "nonce" | "mortality"

  constructor(field: "nonce" | "mortality", cause: unknown) {
    super(`failed to resolve ${field}: ${errorMessage(cause)}`, { cause })
    this.field = field
  }
}

export type SubmitFailure = "transport" | "rejected" | "exhausts-resources"

export class SubmitError extends ClientError {
  readonly kind = "submit"
  readonly reason: SubmitFailure

  constructor(reason: SubmitFailure, cause: unknown) {
    super(`submission failed (${reason}): ${errorMessage(cause)}`, { cause })
    this.reason = reason
  }

  /** Only transport failures may be retried, and then only with rebuilt bytes. */
  get retryable(): boolean {
    return this.reason === "transport"
  }
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof TransportError
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
