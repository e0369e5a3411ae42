/**
 * Codec adapter
 *
 * The transaction pipeline talks to SCALE only through CodecAdapter. The
 * default adapter builds and parses version-4 extrinsics with the signed
 * extensions era, nonce, tip and app id:
 *
 *   compact(len) ++ 0x84 ++ MultiAddress ++ MultiSignature ++ extra ++ call
 *
 * where call = palletId ++ variantId ++ args.
 */

import { Bytes, Enum, compact, u32, u8 } from "scale-ts"
import type { Codec } from "scale-ts"
import type { ExtrinsicCall, Hex, SignatureScheme } from "./chain-types.ts"
import { blake2b256, blake2b256Hex, concatBytes, fromHex } from "./hash.ts"
import { decodeEra, encodeEra, mortalEra } from "./mortality.ts"
import type { Era } from "./mortality.ts"
import { DecodingError, UserInputError } from "./errors.ts"

const SIGNED_V4 = 0x84
const UNSIGNED_V4 = 0x04
const MAX_UNHASHED_PAYLOAD = 256

/** A typed call definition: where it lives in the runtime and how its arguments encode. */
export interface CallDefinition<T> {
  palletId: number
  variantId: number
  args: Codec<T>
}

export interface ExtrinsicExtra {
  era: Era
  nonce: number
  tip: bigint
  appId: number
}

export interface ExtrinsicAdditional {
  specVersion: number
  transactionVersion: number
  genesisHash: Hex
  anchorHash: Hex
}

export interface DecodedSignature {
  accountId: Uint8Array
  scheme: SignatureScheme
  signature: Uint8Array
  extra: ExtrinsicExtra
}

export interface DecodedExtrinsic {
  txHash: Hex
  signed: DecodedSignature | null
  call: ExtrinsicCall
}

export interface CodecAdapter {
  encodeCall(palletId: number, variantId: number, args: Uint8Array): Uint8Array
  headerIndexOf<T>(def: CallDefinition<T>): [palletId: number, variantId: number]
  signingPayload(call: ExtrinsicCall, extra: ExtrinsicExtra, additional: ExtrinsicAdditional): Uint8Array
  encodeSignedExtrinsic(
    accountId: Uint8Array,
    scheme: SignatureScheme,
    signature: Uint8Array,
    extra: ExtrinsicExtra,
    call: ExtrinsicCall,
  ): Uint8Array
  decodeExtrinsic(encoded: Uint8Array): DecodedExtrinsic
}

const MultiAddress = Enum({
  Id: Bytes(32),
  Index: compact,
  Raw: Bytes(),
  Address32: Bytes(32),
  Address20: Bytes(20),
})

const MultiSignature = Enum({
  Ed25519: Bytes(64),
  Sr25519: Bytes(64),
  Ecdsa: Bytes(65),
})

const SIGNATURE_LENGTH: Record<SignatureScheme, number> = {
  ed25519: 64,
  sr25519: 64,
  ecdsa: 65,
}

function signatureTag(scheme: SignatureScheme): "Ed25519" | "Sr25519" | "Ecdsa" {
  switch (scheme) {
    case "ed25519":
      return "Ed25519"
    case "sr25519":
      return "Sr25519"
    case "ecdsa":
      return "Ecdsa"
  }
}

function schemeOf(tag: "Ed25519" | "Sr25519" | "Ecdsa"): SignatureScheme {
  switch (tag) {
    case "Ed25519":
      return "ed25519"
    case "Sr25519":
      return "sr25519"
    case "Ecdsa":
      return "ecdsa"
  }
}

function assertByte(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new UserInputError(`${name} must be an integer in 0..255, got ${value}`)
  }
}

function encodeExtra(extra: ExtrinsicExtra): Uint8Array {
  return concatBytes(
    encodeEra(extra.era),
    compact.enc(extra.nonce),
    compact.enc(extra.tip),
    compact.enc(extra.appId),
  )
}

function encodeCallBytes(call: ExtrinsicCall): Uint8Array {
  assertByte(call.palletId, "palletId")
  assertByte(call.variantId, "variantId")
  return concatBytes(u8.enc(call.palletId), u8.enc(call.variantId), call.args)
}

/** Cursor over a byte slice; each read decodes a value and advances by its canonical length. */
class Reader {
  private offset = 0
  private readonly bytes: Uint8Array

  constructor(bytes: Uint8Array) {
    this.bytes = bytes
  }

  read<T>(codec: Codec<T>, what: string): T {
    const rest = this.bytes.slice(this.offset)
    let value: T
    try {
      value = codec.dec(rest)
    } catch (err) {
      throw new DecodingError(`cannot decode ${what}`, { cause: err })
    }
    const length = codec.enc(value).length
    if (length > rest.length) throw new DecodingError(`${what}: unexpected end of input`)
    this.offset += length
    return value
  }

  readEra(): Era {
    const { era, length } = decodeEra(this.bytes.subarray(this.offset))
    this.offset += length
    return era
  }

  rest(): Uint8Array {
    const out = this.bytes.slice(this.offset)
    this.offset = this.bytes.length
    return out
  }

  remaining(): number {
    return this.bytes.length - this.offset
  }
}

function toNumber(value: number | bigint, what: string): number {
  const n = Number(value)
  if (!Number.isSafeInteger(n) || n > 0xffff_ffff) {
    throw new DecodingError(`${what} out of u32 range: ${value}`)
  }
  return n
}

export const scaleCodec: CodecAdapter = {
  encodeCall(palletId, variantId, args) {
    return encodeCallBytes({ palletId, variantId, args })
  },

  headerIndexOf(def) {
    return [def.palletId, def.variantId]
  },

  signingPayload(call, extra, additional) {
    const payload = concatBytes(
      encodeCallBytes(call),
      encodeExtra(extra),
      u32.enc(additional.specVersion),
      u32.enc(additional.transactionVersion),
      fromHex(additional.genesisHash),
      fromHex(additional.anchorHash),
    )
    return payload.length > MAX_UNHASHED_PAYLOAD ? blake2b256(payload) : payload
  },

  encodeSignedExtrinsic(accountId, scheme, signature, extra, call) {
    if (accountId.length !== 32) {
      throw new UserInputError(`account id must be 32 bytes, got ${accountId.length}`)
    }
    if (signature.length !== SIGNATURE_LENGTH[scheme]) {
      throw new UserInputError(`${scheme} signature must be ${SIGNATURE_LENGTH[scheme]} bytes, got ${signature.length}`)
    }
    const sig = MultiSignature.enc({ tag: signatureTag(scheme), value: signature })
    const body = concatBytes(
      u8.enc(SIGNED_V4),
      MultiAddress.enc({ tag: "Id", value: accountId }),
      sig,
      encodeExtra(extra),
      encodeCallBytes(call),
    )
    return concatBytes(compact.enc(body.length), body)
  },

  decodeExtrinsic(encoded) {
    const reader = new Reader(encoded)
    const declared = toNumber(reader.read(compact, "length prefix"), "length prefix")
    if (declared !== reader.remaining()) {
      throw new DecodingError(`length prefix ${declared} does not match body length ${reader.remaining()}`)
    }

    const version = reader.read(u8, "version")
    let signed: DecodedSignature | null = null
    if (version === SIGNED_V4) {
      const address = reader.read(MultiAddress, "address")
      if (address.tag !== "Id") {
        throw new DecodingError(`unsupported address kind ${address.tag}`)
      }
      if (address.value.length !== 32) throw new DecodingError("address: unexpected end of input")
      const signature = reader.read(MultiSignature, "signature")
      const scheme = schemeOf(signature.tag)
      if (signature.value.length !== SIGNATURE_LENGTH[scheme]) {
        throw new DecodingError(`${scheme} signature: unexpected end of input`)
      }
      const era = reader.readEra()
      const nonce = toNumber(reader.read(compact, "nonce"), "nonce")
      const tip = BigInt(reader.read(compact, "tip"))
      const appId = toNumber(reader.read(compact, "app id"), "app id")
      signed = {
        accountId: address.value,
        scheme,
        signature: signature.value,
        extra: { era, nonce, tip, appId },
      }
    } else if (version !== UNSIGNED_V4) {
      throw new DecodingError(`unsupported extrinsic version 0x${version.toString(16)}`)
    }

    const palletId = reader.read(u8, "pallet index")
    const variantId = reader.read(u8, "call index")
    return {
      txHash: blake2b256Hex(encoded),
      signed,
      call: { palletId, variantId, args: reader.rest() },
    }
  },
}

/** Encode a typed call through its definition. */
export function encodeTypedCall<T>(def: CallDefinition<T>, value: T, codec: CodecAdapter = scaleCodec): ExtrinsicCall {
  const [palletId, variantId] = codec.headerIndexOf(def)
  let args: Uint8Array
  try {
    args = def.args.enc(value)
  } catch (err) {
    throw new UserInputError(`cannot encode call ${palletId}/${variantId}`, { cause: err })
  }
  return { palletId, variantId, args }
}

/** Decode a call's arguments, checking that it is the call the definition describes. */
export function decodeTypedCall<T>(def: CallDefinition<T>, call: ExtrinsicCall): T {
  if (call.palletId !== def.palletId || call.variantId !== def.variantId) {
    throw new DecodingError(
      `call ${call.palletId}/${call.variantId} is not ${def.palletId}/${def.variantId}`,
    )
  }
  try {
    return def.args.dec(call.args)
  } catch (err) {
    throw new DecodingError(`cannot decode arguments of ${def.palletId}/${def.variantId}`, { cause: err })
  }
}

export function extraFromOptions(
  options: { nonce: number; tip: bigint; appId: number; mortality: { period: number; blockHeight: number } },
): ExtrinsicExtra {
  return {
    era: mortalEra(options.mortality.period, options.mortality.blockHeight),
    nonce: options.nonce,
    tip: options.tip,
    appId: options.appId,
  }
}
