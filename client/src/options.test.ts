import { describe, it } from "node:test"
import assert from "node:assert/strict"
import type { TransactionOptions } from "./chain-types.ts"
import { ChainRpc } from "./chain-rpc.ts"
import { createEd25519Keypair } from "./crypto/signer.ts"
import { ResolutionError, TransportError, UserInputError } from "./errors.ts"
import { resolveOptions } from "./options.ts"
import { MockNode } from "./testing/mock-node.ts"

const FAST = { baseDelayMs: 1, maxDelayMs: 2, maxAttempts: 3 }
const key = createEd25519Keypair(`0x${"01".repeat(32)}`)

function setup(tip = 10, finalized = 8) {
  const node = new MockNode({ tip, finalized })
  const rpc = new ChainRpc(node, FAST)
  return { node, rpc, ctx: { rpc, ss58Prefix: 42 } }
}

describe("resolveOptions", () => {
  it("fills every default from the chain", async () => {
    const { node, ctx } = setup()
    node.nonces.set(key.address(42), 7)
    const resolved = await resolveOptions({}, key.accountId, ctx)
    assert.deepEqual(resolved, {
      nonce: 7,
      appId: 0,
      tip: 0n,
      mortality: { period: 32, blockHash: node.hashAt(8), blockHeight: 8 },
    })
  })

  it("accepts an SS58 address for the account", async () => {
    const { node, ctx } = setup()
    node.nonces.set(key.address(42), 2)
    assert.equal((await resolveOptions({}, key.address(42), ctx)).nonce, 2)
  })

  it("keeps explicit values and makes no calls for them", async () => {
    const { node, ctx } = setup()
    const anchor = node.hashAt(9)
    const resolved = await resolveOptions(
      { nonce: 3, appId: 5, tip: 10n, mortality: { period: 64, blockHash: anchor, blockHeight: 9 } },
      key.accountId,
      ctx,
    )
    assert.deepEqual(resolved, {
      nonce: 3,
      appId: 5,
      tip: 10n,
      mortality: { period: 64, blockHash: anchor, blockHeight: 9 },
    })
    assert.equal(node.calls.length, 0)
  })

  it("normalises the period before anchoring", async () => {
    const { ctx } = setup()
    const resolved = await resolveOptions({ nonce: 0, mortality: { period: 100 } }, key.accountId, ctx)
    assert.equal(resolved.mortality.period, 128)
    assert.equal(resolved.mortality.blockHeight, 8)
  })

  it("validates caller input before touching the network", async () => {
    const { node, ctx } = setup()
    const bad: TransactionOptions[] = [
      { appId: -1 },
      { nonce: 2 ** 32 },
      { nonce: 1.5 },
      { tip: -1n },
      { tip: 1n << 128n },
      { mortality: { period: 0 } },
      { mortality: { period: 32, blockHash: "0x1234", blockHeight: 1 } },
    ]
    for (const options of bad) {
      await assert.rejects(() => resolveOptions(options, key.accountId, ctx), UserInputError)
    }
    await assert.rejects(() => resolveOptions({}, "not-an-address", ctx), UserInputError)
    assert.equal(node.calls.length, 0)
  })

  it("wraps a failed nonce lookup", async () => {
    const { node, ctx } = setup()
    node.failNext("system_accountNextIndex", new TransportError("down"))
    await assert.rejects(
      () => resolveOptions({}, key.accountId, { ...ctx, retry: { retryOnTransportError: false } }),
      (err: unknown) => {
        assert.ok(err instanceof ResolutionError)
        assert.equal(err.field, "nonce")
        assert.ok(err.cause instanceof TransportError)
        return true
      },
    )
  })

  it("wraps a failed mortality lookup", async () => {
    const { node, ctx } = setup()
    node.failNext("chain_getFinalizedHead", new TransportError("down"))
    await assert.rejects(
      () => resolveOptions({ nonce: 1 }, key.accountId, { ...ctx, retry: { retryOnTransportError: false } }),
      (err: unknown) => {
        assert.ok(err instanceof ResolutionError)
        assert.equal(err.field, "mortality")
        return true
      },
    )
  })

  it("retries the lookups under the default policy", async () => {
    const { node, ctx } = setup()
    node.failNext("system_accountNextIndex", new TransportError("down"))
    assert.equal((await resolveOptions({}, key.accountId, ctx)).nonce, 0)
    assert.equal(node.callCount("system_accountNextIndex"), 2)
  })
})
