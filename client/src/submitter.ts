import type { Hex, SignedTransaction } from "./chain-types.ts"
import type { ChainRpc } from "./chain-rpc.ts"
import { RuntimeRejection, SubmitError, TransportError } from "./errors.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("submitter")

/**
 * Broadcast a signed transaction exactly once. Transport failures and node
 * rejections become SubmitError; a retry after a rejection needs rebuilt bytes.
 * Returns the hash the node reports. A mismatch with the locally computed hash
 * is logged, not thrown: the bytes are already in the pool.
 */
export async function submitTransaction(signed: SignedTransaction, rpc: ChainRpc): Promise<Hex> {
  let reported: Hex
  try {
    reported = await rpc.submitExtrinsic(signed.encoded)
  } catch (err) {
    if (err instanceof TransportError) {
      log.warn("submission transport failure", { txHash: signed.txHash, error: err })
      throw new SubmitError("transport", err)
    }
    if (err instanceof RuntimeRejection) {
      log.warn("submission rejected", { txHash: signed.txHash, reason: err.reason, code: err.code })
      throw new SubmitError(err.reason === "exhausts-resources" ? "exhausts-resources" : "rejected", err)
    }
    throw err
  }

  if (reported !== signed.txHash) {
    log.warn("node reported a different tx hash", { txHash: signed.txHash, reported })
  }
  log.info("transaction submitted", { txHash: signed.txHash, nonce: signed.options.nonce })
  return reported
}
