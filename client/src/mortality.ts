/**
 * Transaction mortality
 *
 * A mortal transaction is valid only inside [anchorHeight, anchorHeight + period).
 * The period is a power of two between MIN_PERIOD and MAX_PERIOD; the era is
 * encoded in two bytes as log2(period)-1 in the low nibble and the quantized
 * phase (anchor % period) in the upper twelve bits.
 */

import { u16 } from "scale-ts"
import type { ResolvedMortality } from "./chain-types.ts"
import { DecodingError, UserInputError } from "./errors.ts"

export const MIN_PERIOD = 4
export const MAX_PERIOD = 65_536
export const DEFAULT_PERIOD = 32

export type Era =
  | { kind: "immortal" }
  | { kind: "mortal"; period: number; phase: number }

/**
 * Round a caller-supplied period up to the next power of two and clamp it into
 * [MIN_PERIOD, MAX_PERIOD].
 */
export function normalizePeriod(period: number): number {
  if (!Number.isInteger(period) || period <= 0) {
    throw new UserInputError(`mortality period must be a positive integer, got ${period}`)
  }
  let p = 1
  while (p < period && p < MAX_PERIOD) p *= 2
  return Math.min(Math.max(p, MIN_PERIOD), MAX_PERIOD)
}

function quantizeFactor(period: number): number {
  return Math.max(period >> 12, 1)
}

function trailingZeros(value: number): number {
  let n = 0
  while (value > 1 && value % 2 === 0) {
    value /= 2
    n++
  }
  return n
}

export function mortalEra(period: number, anchorHeight: number): Era {
  const p = normalizePeriod(period)
  const phase = anchorHeight % p
  const qf = quantizeFactor(p)
  return { kind: "mortal", period: p, phase: Math.floor(phase / qf) * qf }
}

export function encodeEra(era: Era): Uint8Array {
  if (era.kind === "immortal") return new Uint8Array([0])
  const qf = quantizeFactor(era.period)
  const low = Math.min(15, Math.max(1, trailingZeros(era.period) - 1))
  const encoded = low | (Math.floor(era.phase / qf) << 4)
  return u16.enc(encoded)
}

/** Decode an era from the front of `input`; returns the era and the bytes consumed. */
export function decodeEra(input: Uint8Array): { era: Era; length: number } {
  if (input.length === 0) throw new DecodingError("era: unexpected end of input")
  if (input[0] === 0) return { era: { kind: "immortal" }, length: 1 }
  if (input.length < 2) throw new DecodingError("era: unexpected end of input")

  const encoded = u16.dec(input.slice(0, 2))
  const period = 2 << (encoded % 16)
  const phase = (encoded >> 4) * quantizeFactor(period)
  if (period < MIN_PERIOD || phase >= period) {
    throw new DecodingError(`era: invalid period/phase ${period}/${phase}`)
  }
  return { era: { kind: "mortal", period, phase }, length: 2 }
}

/** First block height at which an era with this phase was valid, given a later height. */
export function eraBirth(era: Era, current: number): number {
  if (era.kind === "immortal") return 0
  return Math.floor((Math.max(current, era.phase) - era.phase) / era.period) * era.period + era.phase
}

/** Inclusive height range a receipt scan covers. */
export function mortalityWindow(mortality: ResolvedMortality): { start: number; end: number } {
  return {
    start: mortality.blockHeight,
    end: mortality.blockHeight + mortality.period - 1,
  }
}
