/**
 * SS58 account addresses
 *
 * An SS58 string is base58(prefix ++ accountId ++ checksum) where the checksum
 * is the first two bytes of blake2b-512("SS58PRE" ++ prefix ++ accountId).
 * Prefixes below 64 take one byte, 64..16383 take two.
 */

import { blake2b } from "@noble/hashes/blake2b"
import { decodeBase58, encodeBase58, isHexString, getBytes, toBeArray } from "ethers"
import { bytesEqual, concatBytes } from "./hash.ts"
import { UserInputError } from "./errors.ts"

const SS58_PRE = new TextEncoder().encode("SS58PRE")
const ACCOUNT_ID_LEN = 32
const CHECKSUM_LEN = 2
const BASE58_ZERO = "1"

export interface DecodedAddress {
  accountId: Uint8Array
  prefix: number
}

function checksum(payload: Uint8Array): Uint8Array {
  return blake2b(concatBytes(SS58_PRE, payload), { dkLen: 64 }).slice(0, CHECKSUM_LEN)
}

function encodePrefix(prefix: number): Uint8Array {
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > 16383) {
    throw new UserInputError(`ss58 prefix out of range: ${prefix}`)
  }
  if (prefix < 64) return new Uint8Array([prefix])
  return new Uint8Array([
    ((prefix & 0b1111_1100) >> 2) | 0b0100_0000,
    (prefix >> 8) | ((prefix & 0b0000_0011) << 6),
  ])
}

export function encodeAddress(accountId: Uint8Array, prefix: number): string {
  if (accountId.length !== ACCOUNT_ID_LEN) {
    throw new UserInputError(`account id must be ${ACCOUNT_ID_LEN} bytes, got ${accountId.length}`)
  }
  const payload = concatBytes(encodePrefix(prefix), accountId)
  return encodeBase58(concatBytes(payload, checksum(payload)))
}

function base58Bytes(address: string): Uint8Array {
  let value: bigint
  try {
    value = decodeBase58(address)
  } catch (err) {
    throw new UserInputError(`invalid base58 in address "${address}"`, { cause: err })
  }
  let zeros = 0
  while (zeros < address.length && address[zeros] === BASE58_ZERO) zeros++
  const body = value === 0n ? new Uint8Array(0) : toBeArray(value)
  return concatBytes(new Uint8Array(zeros), body)
}

export function decodeAddress(address: string): DecodedAddress {
  const raw = base58Bytes(address)
  if (raw.length === 0) {
    throw new UserInputError("empty address")
  }

  let prefix: number
  let prefixLen: number
  if (raw[0] < 64) {
    prefix = raw[0]
    prefixLen = 1
  } else if (raw[0] < 128 && raw.length > 1) {
    const lower = ((raw[0] & 0b0011_1111) << 2) | (raw[1] >> 6)
    const upper = raw[1] & 0b0011_1111
    prefix = lower | (upper << 8)
    prefixLen = 2
  } else {
    throw new UserInputError(`unsupported ss58 prefix byte in "${address}"`)
  }

  if (raw.length !== prefixLen + ACCOUNT_ID_LEN + CHECKSUM_LEN) {
    throw new UserInputError(`address "${address}" does not encode a ${ACCOUNT_ID_LEN}-byte account`)
  }

  const payload = raw.slice(0, prefixLen + ACCOUNT_ID_LEN)
  const expected = checksum(payload)
  if (!bytesEqual(expected, raw.slice(prefixLen + ACCOUNT_ID_LEN))) {
    throw new UserInputError(`bad checksum in address "${address}"`)
  }

  return { accountId: raw.slice(prefixLen, prefixLen + ACCOUNT_ID_LEN), prefix }
}

export function isValidAddress(address: string): boolean {
  try {
    decodeAddress(address)
    return true
  } catch {
    return false
  }
}

/**
 * Accepts an SS58 address, a 0x-prefixed 32-byte hex string or raw bytes and
 * returns the 32-byte account id.
 */
export function parseAccountId(input: string | Uint8Array): Uint8Array {
  if (input instanceof Uint8Array) {
    if (input.length !== ACCOUNT_ID_LEN) {
      throw new UserInputError(`account id must be ${ACCOUNT_ID_LEN} bytes, got ${input.length}`)
    }
    return input
  }
  if (input.startsWith("0x")) {
    if (!isHexString(input, ACCOUNT_ID_LEN)) {
      throw new UserInputError(`hex account id must be ${ACCOUNT_ID_LEN} bytes: "${input}"`)
    }
    return getBytes(input)
  }
  return decodeAddress(input).accountId
}
