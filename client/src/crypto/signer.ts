import { ed25519 } from "@noble/curves/ed25519"
import { SigningKey, Signature, concat, getBytes, isHexString } from "ethers"
import type { Hex, SignatureScheme } from "../chain-types.ts"
import { blake2b256, bytesEqual, toHex } from "../hash.ts"
import { encodeAddress } from "../address.ts"
import { UserInputError } from "../errors.ts"

/** A signing key able to produce MultiSignature-compatible signatures. */
export interface Keypair {
  readonly scheme: SignatureScheme
  readonly publicKey: Uint8Array
  /** 32-byte on-chain account id derived from the public key. */
  readonly accountId: Uint8Array
  sign(message: Uint8Array): Uint8Array
  address(ss58Prefix: number): string
}

export interface SignatureVerifier {
  verify(scheme: SignatureScheme, message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean
}

function secretBytes(secret: Uint8Array | Hex): Uint8Array {
  if (secret instanceof Uint8Array) {
    if (secret.length !== 32) throw new UserInputError("secret key must be 32 bytes")
    return secret
  }
  if (!isHexString(secret, 32)) {
    throw new UserInputError("secret key must be a 0x-prefixed 32-byte hex string")
  }
  return getBytes(secret)
}

export function createEd25519Keypair(secret: Uint8Array | Hex): Keypair {
  const seed = secretBytes(secret)
  const publicKey = ed25519.getPublicKey(seed)

  return {
    scheme: "ed25519",
    publicKey,
    accountId: publicKey,
    sign(message: Uint8Array): Uint8Array {
      return ed25519.sign(message, seed)
    },
    address(ss58Prefix: number): string {
      return encodeAddress(publicKey, ss58Prefix)
    },
  }
}

/**
 * secp256k1 keypair. The message is blake2b-256 hashed before signing and the
 * signature is serialized as r ++ s ++ recoveryId (65 bytes). The account id is
 * blake2b-256 of the compressed public key.
 */
export function createEcdsaKeypair(secret: Uint8Array | Hex): Keypair {
  const signingKey = new SigningKey(secretBytes(secret))
  const publicKey = getBytes(signingKey.compressedPublicKey)
  const accountId = blake2b256(publicKey)

  return {
    scheme: "ecdsa",
    publicKey,
    accountId,
    sign(message: Uint8Array): Uint8Array {
      const sig = signingKey.sign(blake2b256(message))
      return getBytes(concat([sig.r, sig.s, sig.yParity === 0 ? "0x00" : "0x01"]))
    },
    address(ss58Prefix: number): string {
      return encodeAddress(accountId, ss58Prefix)
    },
  }
}

export function createKeypair(scheme: SignatureScheme, secret: Uint8Array | Hex): Keypair {
  switch (scheme) {
    case "ed25519":
      return createEd25519Keypair(secret)
    case "ecdsa":
      return createEcdsaKeypair(secret)
    case "sr25519":
      throw new UserInputError("sr25519 signing is not available; use an ed25519 or ecdsa key")
  }
}

export const signatureVerifier: SignatureVerifier = {
  verify(scheme, message, signature, publicKey) {
    try {
      if (scheme === "ed25519") {
        return ed25519.verify(signature, message, publicKey)
      }
      if (scheme === "ecdsa") {
        if (signature.length !== 65) return false
        const sig = Signature.from({
          r: toHex(signature.slice(0, 32)),
          s: toHex(signature.slice(32, 64)),
          v: signature[64] === 0 ? 27 : 28,
        })
        const recovered = SigningKey.recoverPublicKey(blake2b256(message), sig)
        return bytesEqual(getBytes(SigningKey.computePublicKey(recovered, true)), publicKey)
      }
      return false
    } catch {
      return false
    }
  },
}
