import { describe, it } from "node:test"
import assert from "node:assert/strict"
import { createEcdsaKeypair, createEd25519Keypair, createKeypair, signatureVerifier } from "./signer.ts"
import { decodeAddress } from "../address.ts"
import { UserInputError } from "../errors.ts"
import { blake2b256 } from "../hash.ts"

const SECRET = `0x${"01".repeat(32)}` as const
const MESSAGE = new TextEncoder().encode("signing payload")

describe("ed25519 keypair", () => {
  const key = createEd25519Keypair(SECRET)

  it("uses the public key as account id", () => {
    assert.equal(key.scheme, "ed25519")
    assert.equal(key.publicKey.length, 32)
    assert.deepEqual(key.accountId, key.publicKey)
  })

  it("signs deterministically", () => {
    const a = key.sign(MESSAGE)
    const b = key.sign(MESSAGE)
    assert.equal(a.length, 64)
    assert.deepEqual(a, b)
  })

  it("produces verifiable signatures", () => {
    const sig = key.sign(MESSAGE)
    assert.equal(signatureVerifier.verify("ed25519", MESSAGE, sig, key.publicKey), true)
    const tampered = sig.slice()
    tampered[0] ^= 0xff
    assert.equal(signatureVerifier.verify("ed25519", MESSAGE, tampered, key.publicKey), false)
  })

  it("renders its SS58 address", () => {
    const decoded = decodeAddress(key.address(42))
    assert.equal(decoded.prefix, 42)
    assert.deepEqual(decoded.accountId, key.accountId)
  })
})

describe("ecdsa keypair", () => {
  const key = createEcdsaKeypair(SECRET)

  it("derives the account id by hashing the compressed public key", () => {
    assert.equal(key.publicKey.length, 33)
    assert.deepEqual(key.accountId, blake2b256(key.publicKey))
  })

  it("signs r ++ s ++ recovery id deterministically", () => {
    const sig = key.sign(MESSAGE)
    assert.equal(sig.length, 65)
    assert.ok(sig[64] === 0 || sig[64] === 1)
    assert.deepEqual(key.sign(MESSAGE), sig)
  })

  it("verifies by recovering the public key", () => {
    const sig = key.sign(MESSAGE)
    assert.equal(signatureVerifier.verify("ecdsa", MESSAGE, sig, key.publicKey), true)
    const other = createEcdsaKeypair(`0x${"02".repeat(32)}`)
    assert.equal(signatureVerifier.verify("ecdsa", MESSAGE, sig, other.publicKey), false)
  })
})

describe("createKeypair", () => {
  it("dispatches on scheme", () => {
    assert.equal(createKeypair("ed25519", SECRET).scheme, "ed25519")
    assert.equal(createKeypair("ecdsa", SECRET).scheme, "ecdsa")
  })

  it("refuses sr25519 signing", () => {
    assert.throws(() => createKeypair("sr25519", SECRET), UserInputError)
  })

  it("rejects secrets that are not 32 bytes", () => {
    assert.throws(() => createEd25519Keypair(new Uint8Array(16)), UserInputError)
    assert.throws(() => createEcdsaKeypair("0x1234"), UserInputError)
  })

  it("does not verify sr25519 signatures", () => {
    assert.equal(signatureVerifier.verify("sr25519", MESSAGE, new Uint8Array(64), new Uint8Array(32)), false)
  })
})
