import type { ResolvedMortality, ResolvedOptions, TransactionOptions } from "./chain-types.ts"
import type { ChainRpc, CallOptions } from "./chain-rpc.ts"
import { encodeAddress, parseAccountId } from "./address.ts"
import { ResolutionError, UserInputError } from "./errors.ts"
import { parseHash } from "./hash.ts"
import { DEFAULT_PERIOD, normalizePeriod } from "./mortality.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("options")

const U32_MAX = 0xffff_ffff
const U128_MAX = (1n << 128n) - 1n

export interface OptionsContext extends CallOptions {
  rpc: ChainRpc
  ss58Prefix: number
}

function checkU32(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
    throw new UserInputError(`${name} must be an integer in 0..${U32_MAX}, got ${value}`)
  }
  return value
}

/**
 * Fill in every option the caller left out. Caller values are validated
 * before any network call. Nonce comes from the node's pool-aware
 * `system_accountNextIndex`; concurrent resolutions for one account can race
 * and return the same nonce.
 */
export async function resolveOptions(
  partial: TransactionOptions,
  account: Uint8Array | string,
  ctx: OptionsContext,
): Promise<ResolvedOptions> {
  const accountId = parseAccountId(account)
  const appId = checkU32(partial.appId ?? 0, "appId")
  const tip = partial.tip ?? 0n
  if (tip < 0n || tip > U128_MAX) {
    throw new UserInputError(`tip must fit in u128, got ${tip}`)
  }
  if (partial.nonce !== undefined) checkU32(partial.nonce, "nonce")
  const period = normalizePeriod(partial.mortality?.period ?? DEFAULT_PERIOD)

  let explicit: ResolvedMortality | null = null
  if (partial.mortality && "blockHash" in partial.mortality) {
    explicit = {
      period,
      blockHash: parseHash(partial.mortality.blockHash),
      blockHeight: checkU32(partial.mortality.blockHeight, "mortality.blockHeight"),
    }
  }

  const call: CallOptions = { retry: ctx.retry, signal: ctx.signal }

  let nonce: number
  if (partial.nonce !== undefined) {
    nonce = partial.nonce
  } else {
    try {
      nonce = await ctx.rpc.accountNextIndex(encodeAddress(accountId, ctx.ss58Prefix), call)
    } catch (err) {
      throw new ResolutionError("nonce", err)
    }
  }

  let mortality: ResolvedMortality
  if (explicit) {
    mortality = explicit
  } else {
    try {
      const anchor = await ctx.rpc.finalizedBlock(call)
      mortality = { period, blockHash: anchor.hash, blockHeight: anchor.height }
    } catch (err) {
      throw new ResolutionError("mortality", err)
    }
  }

  log.debug("options resolved", { nonce, appId, tip, period: mortality.period, anchor: mortality.blockHeight })
  return { nonce, appId, tip, mortality }
}
