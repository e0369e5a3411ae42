/**
 * Receipt resolution
 *
 * A receipt scan walks the selected chain one height at a time over the
 * transaction's mortality window, waiting on the BlockWaiter whenever it
 * catches up with the head. Each scan is independent: nothing is cached
 * between calls, so a best-chain receipt may go stale after a re-org and a
 * later scan is the only way to notice.
 */

import type {
  BlockState,
  ChainSelector,
  Hex,
  ResolvedMortality,
} from "./chain-types.ts"
import type { CallOptions, ChainRpc } from "./chain-rpc.ts"
import type { BlockWaiter } from "./block-waiter.ts"
import { blockState } from "./block-state.ts"
import { scaleCodec } from "./codec.ts"
import type { CodecAdapter, DecodedSignature } from "./codec.ts"
import { DecodingError, UnsupportedOperationError, UserInputError } from "./errors.ts"
import { ExtrinsicEvents } from "./events.ts"
import { blake2b256Hex, bytesEqual, fromHex, parseHash } from "./hash.ts"
import { mortalityWindow } from "./mortality.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("receipt")

export interface ReceiptLocation {
  blockHash: Hex
  blockHeight: number
  txHash: Hex
  txIndex: number
}

/** Where a transaction landed. Holding one says nothing about finality; ask `blockState()`. */
export class TransactionReceipt implements ReceiptLocation {
  readonly blockHash: Hex
  readonly blockHeight: number
  readonly txHash: Hex
  readonly txIndex: number
  private readonly rpc: ChainRpc

  constructor(rpc: ChainRpc, location: ReceiptLocation) {
    this.rpc = rpc
    this.blockHash = location.blockHash
    this.blockHeight = location.blockHeight
    this.txHash = location.txHash
    this.txIndex = location.txIndex
    Object.freeze(this)
  }

  blockState(opts?: CallOptions): Promise<BlockState> {
    return blockState({ hash: this.blockHash, height: this.blockHeight }, this.rpc, opts)
  }

  /** Raw extrinsic bytes at the receipt's index. */
  async encoded(opts?: CallOptions): Promise<Uint8Array> {
    const block = await this.rpc.block(this.blockHash, opts)
    if (block === null) {
      throw new DecodingError(`block ${this.blockHash} is no longer known to the node`)
    }
    const ext = block.extrinsics[this.txIndex]
    if (ext === undefined) {
      throw new DecodingError(`block ${this.blockHash} has no extrinsic at index ${this.txIndex}`)
    }
    return fromHex(ext)
  }

  /**
   * Events the extrinsic emitted. `isExtrinsicSuccessPresent()` on the result
   * tells whether the call dispatched. Throws DecodingError when the node
   * reports none, which means it no longer has the block's events.
   */
  async events(opts?: CallOptions): Promise<ExtrinsicEvents> {
    const events = await this.rpc.fetchEvents(this.blockHash, { only: [this.txIndex] }, opts)
    const own = events.filter((e) => typeof e.phase === "object" && e.phase.applyExtrinsic === this.txIndex)
    if (own.length === 0) {
      throw new DecodingError(`no events for extrinsic ${this.txIndex} in block ${this.blockHash}`)
    }
    return new ExtrinsicEvents(own)
  }

  toJSON(): ReceiptLocation {
    return {
      blockHash: this.blockHash,
      blockHeight: this.blockHeight,
      txHash: this.txHash,
      txIndex: this.txIndex,
    }
  }
}

/** What to look for. The signer pair is the fallback match when hash lookup is unavailable. */
export interface ReceiptTarget {
  txHash: Hex
  signer?: { accountId: Uint8Array; nonce: number }
}

export interface ScanContext extends CallOptions {
  rpc: ChainRpc
  waiter: BlockWaiter
  codec?: CodecAdapter
}

type Lookup = "rpc" | "block"

interface Match {
  txHash: Hex
  txIndex: number
}

/**
 * Scan heights [start, end] inclusive in increasing order and return the
 * first block carrying the target, or null once `end` has been checked.
 * Errors surface without advancing; the retry policy in `ctx.retry` applies
 * to each underlying RPC call.
 */
export async function scanForReceipt(
  target: ReceiptTarget,
  start: number,
  end: number,
  chain: ChainSelector,
  ctx: ScanContext,
): Promise<TransactionReceipt | null> {
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start < 0) {
    throw new UserInputError(`invalid scan range ${start}..${end}`)
  }
  if (start > end) {
    throw new UserInputError(`scan range start ${start} is after end ${end}`)
  }
  const txHash = parseHash(target.txHash)
  const call: CallOptions = { retry: ctx.retry, signal: ctx.signal }
  let lookup: Lookup = "rpc"
  let head = -1
  // set after a height came back without a canonical hash; the next wait is for a newer head
  let stalled = false

  log.debug("scan started", { txHash, start, end, chain })
  let height = start
  while (height <= end) {
    if (height > head) {
      head = await ctx.waiter.waitForHeight(height, chain, call)
    }

    const blockHash = await ctx.rpc.blockHash(height, call)
    if (blockHash === null) {
      // head moved back under us (best-chain re-org) or the node lags its own head report
      head = await ctx.waiter.waitForHeight(stalled ? head + 1 : height, chain, call)
      stalled = true
      continue
    }
    stalled = false

    let match: Match | null | "missing"
    if (lookup === "rpc") {
      try {
        match = await lookupByRpc(ctx.rpc, blockHash, txHash, call)
      } catch (err) {
        if (!(err instanceof UnsupportedOperationError)) throw err
        log.info("node has no extrinsic filter rpc, falling back to block bodies", { method: err.method })
        lookup = "block"
        continue
      }
    } else {
      match = await lookupInBody(ctx.rpc, ctx.codec ?? scaleCodec, blockHash, { ...target, txHash }, call)
    }

    if (match === "missing") {
      const current = await ctx.rpc.blockHash(height, call)
      if (current === blockHash) {
        throw new DecodingError(`node has no body for canonical block ${blockHash} at height ${height}`)
      }
      log.debug("canonical block replaced during lookup", { height, blockHash, current })
      continue
    }
    if (match !== null) {
      log.info("transaction found", { txHash: match.txHash, height, blockHash, txIndex: match.txIndex })
      return new TransactionReceipt(ctx.rpc, { blockHash, blockHeight: height, ...match })
    }
    height++
  }

  log.info("mortality window passed without inclusion", { txHash, start, end, chain })
  return null
}

async function lookupByRpc(rpc: ChainRpc, blockHash: Hex, txHash: Hex, call: CallOptions): Promise<Match | null> {
  const found = await rpc.fetchExtrinsics(blockHash, { txHashes: [txHash] }, "None", call)
  const hit = found.find((ext) => ext.txHash === txHash)
  return hit ? { txHash: hit.txHash, txIndex: hit.txIndex } : null
}

async function lookupInBody(
  rpc: ChainRpc,
  codec: CodecAdapter,
  blockHash: Hex,
  target: ReceiptTarget,
  call: CallOptions,
): Promise<Match | null | "missing"> {
  const block = await rpc.block(blockHash, call)
  if (block === null) return "missing"

  let bySigner: Match | null = null
  for (const [index, hex] of block.extrinsics.entries()) {
    const bytes = fromHex(hex)
    const hash = blake2b256Hex(bytes)
    if (hash === target.txHash) return { txHash: hash, txIndex: index }
    if (!target.signer || bySigner !== null) continue

    let signed: DecodedSignature | null
    try {
      signed = codec.decodeExtrinsic(bytes).signed
    } catch (err) {
      if (!(err instanceof DecodingError)) throw err
      log.debug("skipping undecodable extrinsic", { blockHash, index, error: err })
      continue
    }
    if (
      signed !== null &&
      signed.extra.nonce === target.signer.nonce &&
      bytesEqual(signed.accountId, target.signer.accountId)
    ) {
      bySigner = { txHash: hash, txIndex: index }
    }
  }
  return bySigner
}

/** Scan a transaction's whole mortality window. */
export function resolveReceipt(
  target: ReceiptTarget,
  mortality: ResolvedMortality,
  useBestChain: boolean,
  ctx: ScanContext,
): Promise<TransactionReceipt | null> {
  const { start, end } = mortalityWindow(mortality)
  return scanForReceipt(target, start, end, useBestChain ? "best" : "finalized", ctx)
}

/** Scan an explicit inclusive range by hash alone. */
export function receiptFromRange(
  txHash: Hex,
  start: number,
  end: number,
  useBestChain: boolean,
  ctx: ScanContext,
): Promise<TransactionReceipt | null> {
  return scanForReceipt({ txHash }, start, end, useBestChain ? "best" : "finalized", ctx)
}
