export { Client, SubmittedTransaction, createTransport } from "./client.ts"
export type { ConnectOptions } from "./client.ts"
export { DEFAULT_CONFIG, loadClientConfig, resolveConfig, validateConfig } from "./config.ts"
export type { BackoffConfig, ClientConfig, ClientConfigInput } from "./config.ts"
export * from "./errors.ts"
export type * from "./chain-types.ts"
export { ChainRpc } from "./chain-rpc.ts"
export type { CallOptions, EncodeSelector, EventFilter, ExtrinsicFilter, RawBlock } from "./chain-rpc.ts"
export { HttpTransport } from "./http-transport.ts"
export { WsTransport } from "./ws-transport.ts"
export { AsyncQueue, classifyRpcError } from "./transport.ts"
export type { Subscription, Transport } from "./transport.ts"
export { DEFAULT_RETRY_POLICY, backoffDelay, resolveRetryPolicy, withRetry } from "./retry.ts"
export type { RetryContext, RetryOverride, RetryPolicy } from "./retry.ts"
export { PollingBlockWaiter, SubscriptionBlockWaiter, createBlockWaiter } from "./block-waiter.ts"
export type { BlockWaiter } from "./block-waiter.ts"
export { resolveOptions } from "./options.ts"
export { buildAndSign } from "./builder.ts"
export type { SigningContext } from "./builder.ts"
export { submitTransaction } from "./submitter.ts"
export { TransactionReceipt, receiptFromRange, resolveReceipt, scanForReceipt } from "./receipt.ts"
export type { ReceiptLocation, ReceiptTarget, ScanContext } from "./receipt.ts"
export { EXTRINSIC_FAILED, EXTRINSIC_SUCCESS, ExtrinsicEvents, SYSTEM_PALLET_ID } from "./events.ts"
export { decodeDispatchInfo, decodeFeeDetails, finalFee, runtimeApiArgs } from "./fees.ts"
export type { DispatchClass, DispatchInfo, FeeDetails, InclusionFee } from "./fees.ts"
export { blockState } from "./block-state.ts"
export type { BlockRef } from "./block-state.ts"
export { decodeTypedCall, encodeTypedCall, scaleCodec } from "./codec.ts"
export type { CallDefinition, CodecAdapter, DecodedExtrinsic, DecodedSignature } from "./codec.ts"
export {
  DEFAULT_PERIOD,
  MAX_PERIOD,
  MIN_PERIOD,
  decodeEra,
  encodeEra,
  eraBirth,
  mortalEra,
  mortalityWindow,
  normalizePeriod,
} from "./mortality.ts"
export type { Era } from "./mortality.ts"
export { createEcdsaKeypair, createEd25519Keypair, createKeypair, signatureVerifier } from "./crypto/signer.ts"
export type { Keypair, SignatureVerifier } from "./crypto/signer.ts"
export { decodeAddress, encodeAddress, isValidAddress, parseAccountId } from "./address.ts"
export { blake2b256, blake2b256Hex, parseHash } from "./hash.ts"
export { createLogger, setLogLevel, setLogSink } from "./logger.ts"
export type { LogFields, LogLevel, Logger } from "./logger.ts"
