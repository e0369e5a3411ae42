/**
 * Typed node RPC surface
 *
 * Every read goes through the retry layer and validates its response shape;
 * a mismatch is a DecodingError. `submitExtrinsic` is the single exception
 * to retrying: a broadcast is sent exactly once.
 */

import { z } from "zod"
import type { BackoffConfig } from "./config.ts"
import type {
  BlockHeader,
  BlockInfo,
  ChainInfo,
  ChainSelector,
  EventPhase,
  ExtrinsicInfo,
  Hex,
  RuntimeEvent,
  RuntimeVersion,
} from "./chain-types.ts"
import { DecodingError, UserInputError } from "./errors.ts"
import {
  QUERY_CALL_FEE_DETAILS,
  QUERY_CALL_INFO,
  QUERY_FEE_DETAILS,
  QUERY_INFO,
  decodeDispatchInfo,
  decodeFeeDetails,
  runtimeApiArgs,
} from "./fees.ts"
import type { DispatchInfo, FeeDetails } from "./fees.ts"
import { asHex, fromHex, isHash, toHex } from "./hash.ts"
import { resolveRetryPolicy, withRetry } from "./retry.ts"
import type { RetryOverride, RetryPolicy } from "./retry.ts"
import type { Subscription, Transport } from "./transport.ts"

export interface CallOptions {
  retry?: RetryOverride
  signal?: AbortSignal
}

export type EncodeSelector = "None" | "Call" | "Extrinsic"

export interface ExtrinsicFilter {
  txHashes?: Hex[]
  signer?: { address: string; nonce?: number; appId?: number }
}

/** Which phases `system_fetchEventsV1` reports. */
export type EventFilter = "All" | "OnlyExtrinsics" | "OnlyNonExtrinsics" | { only: number[] }

export interface RawBlock {
  header: BlockHeader
  extrinsics: Hex[]
}

const HashSchema = z.string().transform((value, ctx): Hex => {
  if (!isHash(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a 32-byte hex hash" })
    return z.NEVER
  }
  return asHex(value)
})

const HexSchema = z.string().transform((value, ctx): Hex => {
  if (!/^0x([0-9a-fA-F]{2})*$/.test(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected 0x-prefixed hex bytes" })
    return z.NEVER
  }
  return asHex(value)
})

// block numbers arrive as hex strings from substrate nodes, as plain numbers from some proxies
const BlockNumberSchema = z.union([z.number().int().nonnegative(), z.string()]).transform((value, ctx) => {
  const n = typeof value === "number" ? value : Number(value)
  if (!Number.isSafeInteger(n) || n < 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid block number ${value}` })
    return z.NEVER
  }
  return n
})

const ByteSchema = z.number().int().min(0).max(255)

const HeaderSchema = z.object({
  parentHash: HashSchema,
  number: BlockNumberSchema,
  stateRoot: HashSchema,
  extrinsicsRoot: HashSchema,
})

const SignedBlockSchema = z.object({
  block: z.object({
    header: HeaderSchema,
    extrinsics: z.array(HexSchema),
  }),
})

const RuntimeVersionSchema = z.object({
  specVersion: z.number().int().nonnegative(),
  transactionVersion: z.number().int().nonnegative(),
})

const ExtrinsicInformationSchema = z.object({
  encoded: HexSchema.nullable().optional(),
  tx_hash: HashSchema,
  tx_index: z.number().int().nonnegative(),
  pallet_id: ByteSchema,
  call_id: ByteSchema,
  signature: z
    .object({
      ss58_address: z.string().nullable().optional(),
      nonce: z.number().int().nonnegative(),
      app_id: z.number().int().nonnegative(),
    })
    .nullable()
    .optional(),
})

const PhaseSchema = z.union([
  z.literal("Initialization"),
  z.literal("Finalization"),
  z.object({ ApplyExtrinsic: z.number().int().nonnegative() }).transform((p): EventPhase => ({
    applyExtrinsic: p.ApplyExtrinsic,
  })),
])

const PhaseEventsSchema = z.object({
  phase: PhaseSchema,
  events: z.array(z.object({
    index: z.number().int().nonnegative(),
    emitted_index: z.tuple([ByteSchema, ByteSchema]),
    encoded: HexSchema.nullable().optional(),
    decoded: z.string().nullable().optional(),
  })),
})

function parseResult<T>(method: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : ""
    throw new DecodingError(`${method}: unexpected response${where}: ${issue?.message ?? "invalid"}`, {
      cause: parsed.error,
    })
  }
  return parsed.data
}

function headerFromWire(method: string, raw: unknown): BlockHeader {
  return parseResult(method, HeaderSchema, raw)
}

function checkHeight(height: number): void {
  if (!Number.isSafeInteger(height) || height < 0) {
    throw new UserInputError(`block height must be a non-negative integer, got ${height}`)
  }
}

export class ChainRpc {
  readonly transport: Transport
  readonly backoff: BackoffConfig
  private globalRetry: RetryOverride

  constructor(transport: Transport, backoff: BackoffConfig, globalRetry: RetryOverride = {}) {
    this.transport = transport
    this.backoff = backoff
    this.globalRetry = { ...globalRetry }
  }

  /** Replace fields of the client-wide retry layer. */
  setGlobalRetries(override: RetryOverride): void {
    this.globalRetry = { ...this.globalRetry, ...override }
  }

  retryPolicy(override?: RetryOverride): RetryPolicy {
    return resolveRetryPolicy(override, this.globalRetry)
  }

  private call<T>(method: string, params: unknown[], parse: (raw: unknown) => T, opts: CallOptions = {}): Promise<T> {
    return withRetry(async () => parse(await this.transport.request(method, params)), {
      policy: this.retryPolicy(opts.retry),
      backoff: this.backoff,
      signal: opts.signal,
      label: method,
    })
  }

  /** Canonical (best-chain) hash at `height`, or null when the node has not produced it. */
  blockHash(height: number, opts?: CallOptions): Promise<Hex | null> {
    checkHeight(height)
    return this.call("chain_getBlockHash", [height], (raw) => {
      return parseResult("chain_getBlockHash", HashSchema.nullable(), raw)
    }, opts)
  }

  /** Header by hash, or null when the node does not know the block. */
  header(hash: Hex, opts?: CallOptions): Promise<BlockHeader | null> {
    return this.call("chain_getHeader", [hash], (raw) => {
      return raw === null ? null : headerFromWire("chain_getHeader", raw)
    }, opts)
  }

  finalizedHead(opts?: CallOptions): Promise<Hex> {
    return this.call("chain_getFinalizedHead", [], (raw) => parseResult("chain_getFinalizedHead", HashSchema, raw), opts)
  }

  async bestBlock(opts?: CallOptions): Promise<BlockInfo> {
    const hash = await this.call("chain_getBlockHash", [], (raw) => parseResult("chain_getBlockHash", HashSchema, raw), opts)
    return { hash, height: await this.heightOf(hash, opts) }
  }

  async finalizedBlock(opts?: CallOptions): Promise<BlockInfo> {
    const hash = await this.finalizedHead(opts)
    return { hash, height: await this.heightOf(hash, opts) }
  }

  async blockInfo(chain: ChainSelector, opts?: CallOptions): Promise<BlockInfo> {
    return chain === "best" ? this.bestBlock(opts) : this.finalizedBlock(opts)
  }

  private async heightOf(hash: Hex, opts?: CallOptions): Promise<number> {
    const header = await this.header(hash, opts)
    if (header === null) {
      throw new DecodingError(`chain_getHeader: node reported head ${hash} but has no header for it`)
    }
    return header.number
  }

  async genesisHash(opts?: CallOptions): Promise<Hex> {
    const hash = await this.blockHash(0, opts)
    if (hash === null) throw new DecodingError("chain_getBlockHash: node has no genesis block")
    return hash
  }

  async chainInfo(opts?: CallOptions): Promise<ChainInfo> {
    const best = await this.bestBlock(opts)
    const finalized = await this.finalizedBlock(opts)
    const genesisHash = await this.genesisHash(opts)
    return {
      bestHash: best.hash,
      bestHeight: best.height,
      finalizedHash: finalized.hash,
      finalizedHeight: finalized.height,
      genesisHash,
    }
  }

  runtimeVersion(opts?: CallOptions): Promise<RuntimeVersion> {
    return this.call("state_getRuntimeVersion", [], (raw) => {
      return parseResult("state_getRuntimeVersion", RuntimeVersionSchema, raw)
    }, opts)
  }

  /** Next nonce for an account, counting transactions already in the pool. */
  accountNextIndex(address: string, opts?: CallOptions): Promise<number> {
    return this.call("system_accountNextIndex", [address], (raw) => {
      return parseResult("system_accountNextIndex", z.number().int().nonnegative(), raw)
    }, opts)
  }

  /** Block body by hash, or null when the node does not know the block. */
  block(hash: Hex, opts?: CallOptions): Promise<RawBlock | null> {
    return this.call("chain_getBlock", [hash], (raw) => {
      if (raw === null) return null
      const parsed = parseResult("chain_getBlock", SignedBlockSchema, raw)
      return { header: parsed.block.header, extrinsics: parsed.block.extrinsics }
    }, opts)
  }

  /**
   * Extrinsics of a block filtered node-side. Throws UnsupportedOperationError
   * when the node does not expose `system_fetchExtrinsicsV1`.
   */
  fetchExtrinsics(
    blockHash: Hex,
    filter: ExtrinsicFilter,
    encodeAs: EncodeSelector = "None",
    opts?: CallOptions,
  ): Promise<ExtrinsicInfo[]> {
    const options = {
      filter: {
        transaction: filter.txHashes ? { TxHash: filter.txHashes } : "All",
        signature: {
          ss58_address: filter.signer?.address ?? null,
          app_id: filter.signer?.appId ?? null,
          nonce: filter.signer?.nonce ?? null,
        },
      },
      encode_selector: encodeAs,
    }
    return this.call("system_fetchExtrinsicsV1", [{ Hash: blockHash }, options], (raw) => {
      const items = parseResult("system_fetchExtrinsicsV1", z.array(ExtrinsicInformationSchema), raw)
      return items.map((item) => ({
        txHash: item.tx_hash,
        txIndex: item.tx_index,
        palletId: item.pallet_id,
        variantId: item.call_id,
        encoded: item.encoded ?? null,
        signer: item.signature
          ? { address: item.signature.ss58_address ?? null, nonce: item.signature.nonce, appId: item.signature.app_id }
          : null,
      }))
    }, opts)
  }

  /**
   * Events of a block grouped by phase and flattened in emission order.
   * Encoded event data is required; an event without it is a DecodingError.
   */
  fetchEvents(blockHash: Hex, filter: EventFilter = "All", opts?: CallOptions): Promise<RuntimeEvent[]> {
    const options = {
      filter: typeof filter === "string" ? filter : { Only: filter.only },
      enable_encoding: true,
      enable_decoding: false,
    }
    return this.call("system_fetchEventsV1", [blockHash, options], (raw) => {
      const groups = parseResult("system_fetchEventsV1", z.array(PhaseEventsSchema), raw)
      return groups.flatMap((group) => group.events.map((event) => {
        if (event.encoded === null || event.encoded === undefined) {
          throw new DecodingError(`system_fetchEventsV1: event ${event.index} has no encoded data`)
        }
        return {
          index: event.index,
          palletId: event.emitted_index[0],
          variantId: event.emitted_index[1],
          encoded: event.encoded,
          phase: group.phase,
        }
      }))
    }, opts)
  }

  /** Call a runtime API with SCALE-encoded arguments; answers the raw SCALE result. */
  stateCall(method: string, data: Uint8Array, at?: Hex, opts?: CallOptions): Promise<Uint8Array> {
    const params: unknown[] = at === undefined ? [method, toHex(data)] : [method, toHex(data), at]
    return this.call("state_call", params, (raw) => fromHex(parseResult("state_call", HexSchema, raw)), opts)
  }

  /** Weight, class and partial fee of an encoded extrinsic. */
  async queryInfo(extrinsic: Uint8Array, at?: Hex, opts?: CallOptions): Promise<DispatchInfo> {
    return decodeDispatchInfo(await this.stateCall(QUERY_INFO, runtimeApiArgs(extrinsic), at, opts))
  }

  async queryFeeDetails(extrinsic: Uint8Array, at?: Hex, opts?: CallOptions): Promise<FeeDetails> {
    return decodeFeeDetails(await this.stateCall(QUERY_FEE_DETAILS, runtimeApiArgs(extrinsic), at, opts))
  }

  /** Like queryInfo, for an unsigned call. */
  async queryCallInfo(call: Uint8Array, at?: Hex, opts?: CallOptions): Promise<DispatchInfo> {
    return decodeDispatchInfo(await this.stateCall(QUERY_CALL_INFO, runtimeApiArgs(call), at, opts))
  }

  async queryCallFeeDetails(call: Uint8Array, at?: Hex, opts?: CallOptions): Promise<FeeDetails> {
    return decodeFeeDetails(await this.stateCall(QUERY_CALL_FEE_DETAILS, runtimeApiArgs(call), at, opts))
  }

  /** Broadcast once; never retried here. Returns the hash the node reports. */
  async submitExtrinsic(encoded: Uint8Array): Promise<Hex> {
    const raw = await this.transport.request("author_submitExtrinsic", [toHex(encoded)])
    return parseResult("author_submitExtrinsic", HashSchema, raw)
  }

  /**
   * New-head notifications for the selected chain, or null when the transport
   * cannot push. Opening the stream follows the retry policy; malformed
   * headers end iteration with a DecodingError.
   */
  async subscribeHeads(chain: ChainSelector, opts: CallOptions = {}): Promise<Subscription<BlockHeader> | null> {
    const subscribe = this.transport.subscribe?.bind(this.transport)
    if (!subscribe) return null
    const [method, unsubscribeMethod] = chain === "best"
      ? ["chain_subscribeNewHeads", "chain_unsubscribeNewHeads"]
      : ["chain_subscribeFinalizedHeads", "chain_unsubscribeFinalizedHeads"]
    const raw = await withRetry(() => subscribe(method, [], unsubscribeMethod), {
      policy: this.retryPolicy(opts.retry),
      backoff: this.backoff,
      signal: opts.signal,
      label: method,
    })

    async function* headers(): AsyncGenerator<BlockHeader> {
      for await (const item of raw) yield headerFromWire(method, item)
    }
    return {
      id: raw.id,
      [Symbol.asyncIterator]: () => headers(),
      unsubscribe: () => raw.unsubscribe(),
    }
  }
}
