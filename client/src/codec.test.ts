import { describe, it } from "node:test"
import assert from "node:assert/strict"
import { Bytes } from "scale-ts"
import { decodeTypedCall, encodeTypedCall, extraFromOptions, scaleCodec } from "./codec.ts"
import type { CallDefinition, ExtrinsicExtra } from "./codec.ts"
import { DecodingError, UserInputError } from "./errors.ts"
import { blake2b256Hex } from "./hash.ts"
import { mortalEra } from "./mortality.ts"

const submitData: CallDefinition<Uint8Array> = { palletId: 29, variantId: 1, args: Bytes() }
const PAYLOAD = new TextEncoder().encode("1234")
const ACCOUNT = new Uint8Array(32).fill(1)
const SIGNATURE = new Uint8Array(64).fill(2)
const GENESIS = `0x${"aa".repeat(32)}` as const
const ANCHOR = `0x${"bb".repeat(32)}` as const

const extra: ExtrinsicExtra = { era: mortalEra(32, 1000), nonce: 5, tip: 0n, appId: 2 }

describe("typed calls", () => {
  it("encodes arguments behind the pallet and variant index", () => {
    const call = encodeTypedCall(submitData, PAYLOAD)
    assert.equal(call.palletId, 29)
    assert.equal(call.variantId, 1)
    assert.deepEqual(call.args, new Uint8Array([0x10, 0x31, 0x32, 0x33, 0x34]))
  })

  it("decodes arguments of the matching call", () => {
    const call = encodeTypedCall(submitData, PAYLOAD)
    assert.deepEqual(decodeTypedCall(submitData, call), PAYLOAD)
  })

  it("refuses to decode a different call", () => {
    const call = encodeTypedCall(submitData, PAYLOAD)
    assert.throws(() => decodeTypedCall({ ...submitData, variantId: 2 }, call), DecodingError)
  })

  it("rejects pallet indices outside a byte", () => {
    assert.throws(() => scaleCodec.encodeCall(256, 0, new Uint8Array()), UserInputError)
  })
})

describe("signed extrinsics", () => {
  const call = encodeTypedCall(submitData, PAYLOAD)

  it("lays out a v4 signed extrinsic", () => {
    const encoded = scaleCodec.encodeSignedExtrinsic(ACCOUNT, "ed25519", SIGNATURE, extra, call)
    // body: version 1 + address 33 + signature 65 + era 2 + nonce 1 + tip 1 + app id 1 + call 7
    assert.equal(encoded.length, 113)
    assert.deepEqual(encoded.slice(0, 4), new Uint8Array([0xbd, 0x01, 0x84, 0x00]))
    assert.deepEqual(encoded.slice(4, 36), ACCOUNT)
    assert.equal(encoded[36], 0x00)
    assert.deepEqual(encoded.slice(101, 106), new Uint8Array([0x84, 0x00, 0x14, 0x00, 0x08]))
    assert.deepEqual(encoded.slice(106), new Uint8Array([29, 1, 0x10, 0x31, 0x32, 0x33, 0x34]))
  })

  it("decodes what it encodes", () => {
    const encoded = scaleCodec.encodeSignedExtrinsic(ACCOUNT, "ed25519", SIGNATURE, extra, call)
    const decoded = scaleCodec.decodeExtrinsic(encoded)
    assert.equal(decoded.txHash, blake2b256Hex(encoded))
    assert.deepEqual(decoded.call, call)
    assert.ok(decoded.signed)
    assert.deepEqual(decoded.signed.accountId, ACCOUNT)
    assert.equal(decoded.signed.scheme, "ed25519")
    assert.deepEqual(decoded.signed.signature, SIGNATURE)
    assert.deepEqual(decoded.signed.extra, extra)
  })

  it("tags ecdsa signatures", () => {
    const encoded = scaleCodec.encodeSignedExtrinsic(ACCOUNT, "ecdsa", new Uint8Array(65).fill(3), extra, call)
    assert.equal(encoded[36], 0x02)
    assert.equal(scaleCodec.decodeExtrinsic(encoded).signed?.scheme, "ecdsa")
  })

  it("rejects a signature of the wrong length", () => {
    assert.throws(
      () => scaleCodec.encodeSignedExtrinsic(ACCOUNT, "ed25519", new Uint8Array(63), extra, call),
      UserInputError,
    )
  })

  it("rejects truncated input", () => {
    const encoded = scaleCodec.encodeSignedExtrinsic(ACCOUNT, "ed25519", SIGNATURE, extra, call)
    assert.throws(() => scaleCodec.decodeExtrinsic(encoded.slice(0, 100)), DecodingError)
  })

  it("decodes unsigned extrinsics", () => {
    const encoded = new Uint8Array([0x20, 0x04, 29, 1, 0x10, 0x31, 0x32, 0x33, 0x34])
    const decoded = scaleCodec.decodeExtrinsic(encoded)
    assert.equal(decoded.signed, null)
    assert.deepEqual(decoded.call, call)
  })

  it("rejects unknown versions", () => {
    assert.throws(() => scaleCodec.decodeExtrinsic(new Uint8Array([0x0c, 0x05, 29, 1])), DecodingError)
  })
})

describe("signing payload", () => {
  const additional = { specVersion: 1, transactionVersion: 1, genesisHash: GENESIS, anchorHash: ANCHOR }

  it("is call ++ extra ++ additional for short payloads", () => {
    const call = encodeTypedCall(submitData, PAYLOAD)
    const payload = scaleCodec.signingPayload(call, extra, additional)
    assert.equal(payload.length, 7 + 5 + 4 + 4 + 32 + 32)
    assert.deepEqual(payload.slice(0, 12), new Uint8Array([29, 1, 0x10, 0x31, 0x32, 0x33, 0x34, 0x84, 0x00, 0x14, 0x00, 0x08]))
    assert.deepEqual(payload.slice(12, 20), new Uint8Array([1, 0, 0, 0, 1, 0, 0, 0]))
  })

  it("is hashed once longer than 256 bytes", () => {
    const call = encodeTypedCall(submitData, new Uint8Array(300))
    const payload = scaleCodec.signingPayload(call, extra, additional)
    assert.equal(payload.length, 32)
  })

  it("changes with the anchor hash", () => {
    const call = encodeTypedCall(submitData, PAYLOAD)
    const a = scaleCodec.signingPayload(call, extra, additional)
    const b = scaleCodec.signingPayload(call, extra, { ...additional, anchorHash: GENESIS })
    assert.notDeepEqual(a, b)
    assert.deepEqual(a.slice(0, 52), b.slice(0, 52))
  })
})

describe("extraFromOptions", () => {
  it("builds the era from the anchor", () => {
    const built = extraFromOptions({
      nonce: 5,
      tip: 0n,
      appId: 2,
      mortality: { period: 32, blockHeight: 1000 },
    })
    assert.deepEqual(built, extra)
  })
})
