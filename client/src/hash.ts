import { blake2b } from "@noble/hashes/blake2b"
import { getBytes, hexlify, isHexString } from "ethers"
import type { Hex } from "./chain-types.ts"
import { UserInputError } from "./errors.ts"

export function blake2b256(data: Uint8Array): Uint8Array {
  return blake2b(data, { dkLen: 32 })
}

export function blake2b256Hex(data: Uint8Array): Hex {
  return toHex(blake2b256(data))
}

export function toHex(data: Uint8Array): Hex {
  return asHex(hexlify(data))
}

export function fromHex(value: string): Uint8Array {
  if (!isHexString(value)) {
    throw new UserInputError(`not a 0x-prefixed hex string: ${value.slice(0, 20)}`)
  }
  return getBytes(value)
}

/** Narrow a string already known to be 0x-prefixed hex. */
export function asHex(value: string): Hex {
  if (!value.startsWith("0x")) {
    throw new UserInputError(`not a 0x-prefixed hex string: ${value.slice(0, 20)}`)
  }
  return `0x${value.slice(2).toLowerCase()}`
}

export function isHash(value: unknown): value is Hex {
  return typeof value === "string" && isHexString(value, 32)
}

/** Validate a 32-byte block or transaction hash supplied by the caller. */
export function parseHash(value: string): Hex {
  if (!isHash(value)) {
    throw new UserInputError(`expected a 32-byte 0x-prefixed hash, got "${value.slice(0, 20)}"`)
  }
  return asHex(value)
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0)
  const out = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    out.set(part, offset)
    offset += part.length
  }
  return out
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}
