export type Hex = `0x${string}`

/** A block identified by hash and height. */
export interface BlockInfo {
  hash: Hex
  height: number
}

/** Either a block hash or a block height. */
export type BlockId = Hex | number

export interface ChainInfo {
  bestHash: Hex
  bestHeight: number
  finalizedHash: Hex
  finalizedHeight: number
  genesisHash: Hex
}

export interface RuntimeVersion {
  specVersion: number
  transactionVersion: number
}

export interface BlockHeader {
  parentHash: Hex
  number: number
  stateRoot: Hex
  extrinsicsRoot: Hex
}

export type MortalityInput =
  | { period: number }
  | { period: number; blockHash: Hex; blockHeight: number }

/** Caller-facing options; every field falls back to a chain-derived default. */
export interface TransactionOptions {
  nonce?: number
  appId?: number
  tip?: bigint
  mortality?: MortalityInput
}

export interface ResolvedMortality {
  period: number
  blockHash: Hex
  blockHeight: number
}

export interface ResolvedOptions {
  nonce: number
  appId: number
  tip: bigint
  mortality: ResolvedMortality
}

/** The pallet/variant pair plus SCALE-encoded arguments of a runtime call. */
export interface ExtrinsicCall {
  palletId: number
  variantId: number
  args: Uint8Array
}

export type SignatureScheme = "ed25519" | "sr25519" | "ecdsa"

export interface SignedTransaction {
  readonly encoded: Uint8Array
  readonly signature: Uint8Array
  readonly scheme: SignatureScheme
  readonly signer: Uint8Array
  readonly address: string
  readonly txHash: Hex
  readonly options: Readonly<ResolvedOptions>
}

export type BlockState = "Included" | "Finalized" | "Discarded" | "DoesNotExist"

/** One extrinsic as reported by `system_fetchExtrinsicsV1`. */
export interface ExtrinsicInfo {
  txHash: Hex
  txIndex: number
  palletId: number
  variantId: number
  encoded: Hex | null
  signer: { address: string | null; nonce: number; appId: number } | null
}

export type ChainSelector = "best" | "finalized"

export type EventPhase = "Initialization" | "Finalization" | { applyExtrinsic: number }

/** One runtime event as reported by `system_fetchEventsV1`. */
export interface RuntimeEvent {
  index: number
  palletId: number
  variantId: number
  encoded: Hex
  phase: EventPhase
}
