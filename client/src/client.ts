/**
 * Client facade
 *
 * Wires config, transport, retry, codec and block waiting together and
 * exposes the transaction lifecycle: resolve options, build and sign,
 * submit, then resolve receipts and block states.
 */

import type {
  BlockInfo,
  BlockState,
  ChainInfo,
  ExtrinsicCall,
  Hex,
  ResolvedOptions,
  RuntimeVersion,
  SignedTransaction,
  TransactionOptions,
} from "./chain-types.ts"
import { resolveConfig } from "./config.ts"
import type { ClientConfig, ClientConfigInput } from "./config.ts"
import { ChainRpc } from "./chain-rpc.ts"
import type { CallOptions } from "./chain-rpc.ts"
import { createBlockWaiter } from "./block-waiter.ts"
import type { BlockWaiter } from "./block-waiter.ts"
import { blockState } from "./block-state.ts"
import type { BlockRef } from "./block-state.ts"
import { buildAndSign } from "./builder.ts"
import { scaleCodec } from "./codec.ts"
import type { CodecAdapter } from "./codec.ts"
import type { DispatchInfo, FeeDetails } from "./fees.ts"
import type { Keypair } from "./crypto/signer.ts"
import { encodeAddress } from "./address.ts"
import { resolveOptions } from "./options.ts"
import { receiptFromRange, resolveReceipt } from "./receipt.ts"
import type { ScanContext, TransactionReceipt } from "./receipt.ts"
import type { RetryOverride } from "./retry.ts"
import { submitTransaction } from "./submitter.ts"
import { HttpTransport } from "./http-transport.ts"
import { WsTransport } from "./ws-transport.ts"
import type { Transport } from "./transport.ts"
import { parseHash } from "./hash.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("client")

export interface ConnectOptions {
  config?: ClientConfigInput
  /** Use this transport instead of one built from `config.endpoint`. */
  transport?: Transport
  codec?: CodecAdapter
  waiter?: BlockWaiter
}

export function createTransport(config: ClientConfig): Transport {
  const opts = { endpoint: config.endpoint, requestTimeoutMs: config.requestTimeoutMs }
  return config.transport === "ws" ? new WsTransport(opts) : new HttpTransport(opts)
}

/** A broadcast transaction. Holds no subscription; each `receipt()` is a fresh scan. */
export class SubmittedTransaction {
  readonly txHash: Hex
  /** Hash the node answered the broadcast with; normally equal to `txHash`. */
  readonly reportedTxHash: Hex
  readonly accountId: Uint8Array
  readonly address: string
  readonly options: Readonly<ResolvedOptions>
  private readonly client: Client

  constructor(client: Client, signed: SignedTransaction, reportedTxHash: Hex) {
    this.client = client
    this.txHash = signed.txHash
    this.reportedTxHash = reportedTxHash
    this.accountId = signed.signer
    this.address = signed.address
    this.options = signed.options
    Object.freeze(this)
  }

  receipt(useBestChain = false, opts?: CallOptions): Promise<TransactionReceipt | null> {
    return this.client.receipt(this, useBestChain, opts)
  }
}

export class Client {
  readonly config: ClientConfig
  readonly rpc: ChainRpc
  readonly genesisHash: Hex
  private runtime: RuntimeVersion
  private readonly codec: CodecAdapter
  private readonly waiter: BlockWaiter

  private constructor(
    config: ClientConfig,
    rpc: ChainRpc,
    genesisHash: Hex,
    runtime: RuntimeVersion,
    codec: CodecAdapter,
    waiter: BlockWaiter,
  ) {
    this.config = config
    this.rpc = rpc
    this.genesisHash = genesisHash
    this.runtime = runtime
    this.codec = codec
    this.waiter = waiter
  }

  /** Build the transport and fetch the genesis hash and runtime version the signer needs. */
  static async connect(options: ConnectOptions = {}): Promise<Client> {
    const config = resolveConfig(options.config)
    const transport = options.transport ?? createTransport(config)
    const rpc = new ChainRpc(transport, config.backoff, {
      retryOnTransportError: config.retryOnTransportError,
      retryOnEmptyResult: config.retryOnEmptyResult,
    })
    try {
      const genesisHash = await rpc.genesisHash()
      const runtime = await rpc.runtimeVersion()
      log.info("connected", {
        endpoint: options.transport ? "custom" : config.endpoint,
        genesisHash,
        specVersion: runtime.specVersion,
      })
      const waiter = options.waiter ?? createBlockWaiter(rpc, config.pollIntervalMs)
      return new Client(config, rpc, genesisHash, runtime, options.codec ?? scaleCodec, waiter)
    } catch (err) {
      await transport.close()
      throw err
    }
  }

  get runtimeVersion(): RuntimeVersion {
    return this.runtime
  }

  /** Re-read the runtime version after an upgrade; signatures commit to it. */
  async refreshRuntimeVersion(opts?: CallOptions): Promise<RuntimeVersion> {
    this.runtime = await this.rpc.runtimeVersion(opts)
    return this.runtime
  }

  /** Change the client-wide retry layer; per-call overrides still take precedence. */
  setGlobalRetries(override: RetryOverride): void {
    this.rpc.setGlobalRetries(override)
  }

  resolveOptions(
    partial: TransactionOptions,
    account: Uint8Array | string,
    opts: CallOptions = {},
  ): Promise<ResolvedOptions> {
    return resolveOptions(partial, account, { ...opts, rpc: this.rpc, ss58Prefix: this.config.ss58Prefix })
  }

  buildAndSign(call: ExtrinsicCall, options: ResolvedOptions, keypair: Keypair): SignedTransaction {
    return buildAndSign(call, options, keypair, {
      genesisHash: this.genesisHash,
      runtime: this.runtime,
      ss58Prefix: this.config.ss58Prefix,
      codec: this.codec,
    })
  }

  async submit(signed: SignedTransaction): Promise<SubmittedTransaction> {
    const reported = await submitTransaction(signed, this.rpc)
    return new SubmittedTransaction(this, signed, reported)
  }

  /** Resolve options for the key's account, sign, and broadcast once. */
  async signAndSubmit(
    call: ExtrinsicCall,
    keypair: Keypair,
    options: TransactionOptions = {},
    opts: CallOptions = {},
  ): Promise<SubmittedTransaction> {
    const resolved = await this.resolveOptions(options, keypair.accountId, opts)
    return this.submit(this.buildAndSign(call, resolved, keypair))
  }

  /** Fee breakdown the runtime reports for a call, without signing anything. */
  estimateCallFees(call: ExtrinsicCall, at?: Hex, opts?: CallOptions): Promise<FeeDetails> {
    return this.rpc.queryCallFeeDetails(this.encodeCall(call), at, opts)
  }

  /** Weight, dispatch class and partial fee of a call. */
  callInfo(call: ExtrinsicCall, at?: Hex, opts?: CallOptions): Promise<DispatchInfo> {
    return this.rpc.queryCallInfo(this.encodeCall(call), at, opts)
  }

  /**
   * Sign the call with resolved options and ask what that exact extrinsic
   * would cost. Nothing is broadcast.
   */
  async estimateExtrinsicFees(
    call: ExtrinsicCall,
    keypair: Keypair,
    options: TransactionOptions = {},
    at?: Hex,
    opts: CallOptions = {},
  ): Promise<FeeDetails> {
    const resolved = await this.resolveOptions(options, keypair.accountId, opts)
    const signed = this.buildAndSign(call, resolved, keypair)
    return this.rpc.queryFeeDetails(signed.encoded, at, opts)
  }

  receipt(
    submitted: SubmittedTransaction,
    useBestChain = false,
    opts: CallOptions = {},
  ): Promise<TransactionReceipt | null> {
    return resolveReceipt(
      { txHash: submitted.txHash, signer: { accountId: submitted.accountId, nonce: submitted.options.nonce } },
      submitted.options.mortality,
      useBestChain,
      this.scanContext(opts),
    )
  }

  receiptFromRange(
    txHash: string,
    start: number,
    end: number,
    useBestChain = false,
    opts: CallOptions = {},
  ): Promise<TransactionReceipt | null> {
    return receiptFromRange(parseHash(txHash), start, end, useBestChain, this.scanContext(opts))
  }

  blockState(ref: BlockRef, opts?: CallOptions): Promise<BlockState> {
    return blockState(ref, this.rpc, opts)
  }

  chainInfo(opts?: CallOptions): Promise<ChainInfo> {
    return this.rpc.chainInfo(opts)
  }

  blockInfo(useBestChain = false, opts?: CallOptions): Promise<BlockInfo> {
    return this.rpc.blockInfo(useBestChain ? "best" : "finalized", opts)
  }

  /** SS58 form of an account id under the configured prefix. */
  address(accountId: Uint8Array): string {
    return encodeAddress(accountId, this.config.ss58Prefix)
  }

  close(): Promise<void> {
    return this.rpc.transport.close()
  }

  private encodeCall(call: ExtrinsicCall): Uint8Array {
    return this.codec.encodeCall(call.palletId, call.variantId, call.args)
  }

  private scanContext(opts: CallOptions): ScanContext {
    return { ...opts, rpc: this.rpc, waiter: this.waiter, codec: this.codec }
  }
}
