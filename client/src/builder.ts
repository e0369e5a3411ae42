import type { ExtrinsicCall, Hex, ResolvedOptions, RuntimeVersion, SignedTransaction } from "./chain-types.ts"
import { extraFromOptions, scaleCodec } from "./codec.ts"
import type { CodecAdapter } from "./codec.ts"
import type { Keypair } from "./crypto/signer.ts"
import { blake2b256Hex, parseHash } from "./hash.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("builder")

export interface SigningContext {
  genesisHash: Hex
  runtime: RuntimeVersion
  ss58Prefix: number
  codec?: CodecAdapter
}

/**
 * Build and sign a version-4 extrinsic. Pure and synchronous: the same call,
 * options, key and context always produce the same bytes.
 */
export function buildAndSign(
  call: ExtrinsicCall,
  options: ResolvedOptions,
  keypair: Keypair,
  ctx: SigningContext,
): SignedTransaction {
  const codec = ctx.codec ?? scaleCodec
  const extra = extraFromOptions(options)
  const payload = codec.signingPayload(call, extra, {
    specVersion: ctx.runtime.specVersion,
    transactionVersion: ctx.runtime.transactionVersion,
    genesisHash: parseHash(ctx.genesisHash),
    anchorHash: parseHash(options.mortality.blockHash),
  })
  const signature = keypair.sign(payload)
  const encoded = codec.encodeSignedExtrinsic(keypair.accountId, keypair.scheme, signature, extra, call)
  const txHash = blake2b256Hex(encoded)

  log.debug("extrinsic signed", { txHash, nonce: options.nonce, bytes: encoded.length })

  return Object.freeze({
    encoded,
    signature,
    scheme: keypair.scheme,
    signer: keypair.accountId,
    address: keypair.address(ctx.ss58Prefix),
    txHash,
    options: Object.freeze({
      ...options,
      mortality: Object.freeze({ ...options.mortality }),
    }),
  })
}
