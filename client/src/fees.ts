/**
 * Fee estimation
 *
 * Fees come from the transaction-payment runtime APIs through `state_call`.
 * Each API takes `(bytes, len: u32)` SCALE-encoded and answers SCALE bytes:
 *
 *   FeeDetails   = Option<{ base_fee: u128, len_fee: u128, adjusted_weight_fee: u128 }>
 *   DispatchInfo = { weight: { compact ref_time, compact proof_size }, class: u8, partial_fee: u128 }
 */

import { Option, Struct, compact, u128, u32, u8 } from "scale-ts"
import type { Codec } from "scale-ts"
import { DecodingError } from "./errors.ts"
import { concatBytes } from "./hash.ts"

export const QUERY_INFO = "TransactionPaymentApi_query_info"
export const QUERY_FEE_DETAILS = "TransactionPaymentApi_query_fee_details"
export const QUERY_CALL_INFO = "TransactionPaymentCallApi_query_call_info"
export const QUERY_CALL_FEE_DETAILS = "TransactionPaymentCallApi_query_call_fee_details"

export interface InclusionFee {
  baseFee: bigint
  lenFee: bigint
  adjustedWeightFee: bigint
}

export interface FeeDetails {
  /** Null for calls that pay no inclusion fee. */
  inclusionFee: InclusionFee | null
}

export type DispatchClass = "Normal" | "Operational" | "Mandatory"

const DISPATCH_CLASSES: readonly DispatchClass[] = ["Normal", "Operational", "Mandatory"]

export interface DispatchInfo {
  weight: { refTime: bigint; proofSize: bigint }
  dispatchClass: DispatchClass
  partialFee: bigint
}

export const InclusionFeeCodec = Struct({ baseFee: u128, lenFee: u128, adjustedWeightFee: u128 })
export const FeeDetailsCodec = Option(InclusionFeeCodec)
export const DispatchInfoCodec = Struct({
  weight: Struct({ refTime: compact, proofSize: compact }),
  dispatchClass: u8,
  partialFee: u128,
})

/** Runtime API argument: the bytes followed by their length as u32. */
export function runtimeApiArgs(bytes: Uint8Array): Uint8Array {
  return concatBytes(bytes, u32.enc(bytes.length))
}

function decodeWith<T>(codec: Codec<T>, what: string, bytes: Uint8Array): T {
  try {
    return codec.dec(bytes)
  } catch (err) {
    throw new DecodingError(`cannot decode ${what} from ${bytes.length} bytes`, { cause: err })
  }
}

export function decodeFeeDetails(bytes: Uint8Array): FeeDetails {
  return { inclusionFee: decodeWith(FeeDetailsCodec, "fee details", bytes) ?? null }
}

export function decodeDispatchInfo(bytes: Uint8Array): DispatchInfo {
  const raw = decodeWith(DispatchInfoCodec, "dispatch info", bytes)
  const dispatchClass = DISPATCH_CLASSES[raw.dispatchClass]
  if (dispatchClass === undefined) {
    throw new DecodingError(`unknown dispatch class ${raw.dispatchClass}`)
  }
  return {
    weight: { refTime: BigInt(raw.weight.refTime), proofSize: BigInt(raw.weight.proofSize) },
    dispatchClass,
    partialFee: raw.partialFee,
  }
}

/** Total fee: base + length + adjusted weight fee, plus the tip. */
export function finalFee(details: FeeDetails, tip = 0n): bigint {
  const fee = details.inclusionFee
  if (fee === null) return tip
  return fee.baseFee + fee.lenFee + fee.adjustedWeightFee + tip
}
