import type { RuntimeEvent } from "./chain-types.ts"

export const SYSTEM_PALLET_ID = 0
/** (pallet, variant) of System.ExtrinsicSuccess. */
export const EXTRINSIC_SUCCESS = [SYSTEM_PALLET_ID, 0] as const
/** (pallet, variant) of System.ExtrinsicFailed. */
export const EXTRINSIC_FAILED = [SYSTEM_PALLET_ID, 1] as const

/** Events one extrinsic emitted, in emission order. */
export class ExtrinsicEvents {
  readonly events: readonly RuntimeEvent[]

  constructor(events: RuntimeEvent[]) {
    this.events = Object.freeze([...events])
    Object.freeze(this)
  }

  first(palletId: number, variantId: number): RuntimeEvent | null {
    return this.events.find((e) => e.palletId === palletId && e.variantId === variantId) ?? null
  }

  count(palletId: number, variantId: number): number {
    return this.events.filter((e) => e.palletId === palletId && e.variantId === variantId).length
  }

  isPresent(palletId: number, variantId: number): boolean {
    return this.first(palletId, variantId) !== null
  }

  isExtrinsicSuccessPresent(): boolean {
    return this.isPresent(...EXTRINSIC_SUCCESS)
  }

  isExtrinsicFailedPresent(): boolean {
    return this.isPresent(...EXTRINSIC_FAILED)
  }
}
