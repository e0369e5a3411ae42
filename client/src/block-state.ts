import type { BlockId, BlockInfo, BlockState } from "./chain-types.ts"
import type { CallOptions, ChainRpc } from "./chain-rpc.ts"
import { UserInputError } from "./errors.ts"
import { parseHash } from "./hash.ts"

export type BlockRef = BlockId | BlockInfo

/**
 * Classify a block against the node's current view of the chain.
 *
 * For a hash: the finalized and best heads answer directly; otherwise the
 * block's height is compared with the finalized height and its hash with the
 * canonical hash at that height. A non-canonical block at or below the
 * finalized height lost a fork and is Discarded; above it, it is a live fork
 * and still Included.
 *
 * For a height: above best is DoesNotExist, above finalized is Included,
 * anything else is Finalized.
 */
export async function blockState(ref: BlockRef, rpc: ChainRpc, opts?: CallOptions): Promise<BlockState> {
  if (typeof ref === "number") return heightState(ref, rpc, opts)

  const target: { hash: string; height?: number } = typeof ref === "string" ? { hash: ref } : ref
  const hash = parseHash(target.hash)

  const finalized = await rpc.finalizedBlock(opts)
  if (hash === finalized.hash) return "Finalized"

  let height = target.height
  if (height === undefined) {
    const best = await rpc.bestBlock(opts)
    if (hash === best.hash) return "Included"
    const header = await rpc.header(hash, opts)
    if (header === null) return "DoesNotExist"
    if (header.number > finalized.height) return "Included"
    height = header.number
  }

  const canonical = await rpc.blockHash(height, opts)
  if (canonical === null) return "DoesNotExist"
  if (height > finalized.height) return "Included"
  return canonical === hash ? "Finalized" : "Discarded"
}

async function heightState(height: number, rpc: ChainRpc, opts?: CallOptions): Promise<BlockState> {
  if (!Number.isSafeInteger(height) || height < 0) {
    throw new UserInputError(`block height must be a non-negative integer, got ${height}`)
  }
  const finalized = await rpc.finalizedBlock(opts)
  if (height <= finalized.height) return "Finalized"
  const best = await rpc.bestBlock(opts)
  if (height <= best.height) return "Included"
  return "DoesNotExist"
}
