import { describe, it } from "node:test"
import assert from "node:assert/strict"
import { ChainRpc } from "./chain-rpc.ts"
import { DecodingError, TransportError, UnsupportedOperationError, UserInputError } from "./errors.ts"
import { QUERY_CALL_FEE_DETAILS, QUERY_INFO } from "./fees.ts"
import { blake2b256Hex } from "./hash.ts"
import { MockNode } from "./testing/mock-node.ts"
import type { Transport } from "./transport.ts"

const FAST = { baseDelayMs: 1, maxDelayMs: 2, maxAttempts: 3 }

function answering(result: unknown): Transport {
  return {
    kind: "http",
    request: async () => result,
    close: async () => {},
  }
}

describe("ChainRpc reads", () => {
  it("resolves canonical hashes and null above the tip", async () => {
    const node = new MockNode({ tip: 5 })
    const rpc = new ChainRpc(node, FAST)
    assert.equal(await rpc.blockHash(3), node.hashAt(3))
    assert.equal(await rpc.blockHash(6), null)
    assert.equal(await rpc.genesisHash(), node.genesisHash)
  })

  it("parses hex block numbers in headers", async () => {
    const node = new MockNode({ tip: 300 })
    const rpc = new ChainRpc(node, FAST)
    const header = await rpc.header(node.hashAt(300))
    assert.equal(header?.number, 300)
    assert.equal(header?.parentHash, node.hashAt(299))
    assert.equal(await rpc.header(`0x${"ee".repeat(32)}`), null)
  })

  it("reports best and finalized heads", async () => {
    const node = new MockNode({ tip: 10, finalized: 7 })
    const rpc = new ChainRpc(node, FAST)
    assert.deepEqual(await rpc.blockInfo("best"), { hash: node.hashAt(10), height: 10 })
    assert.deepEqual(await rpc.blockInfo("finalized"), { hash: node.hashAt(7), height: 7 })
    assert.deepEqual(await rpc.chainInfo(), {
      bestHash: node.hashAt(10),
      bestHeight: 10,
      finalizedHash: node.hashAt(7),
      finalizedHeight: 7,
      genesisHash: node.genesisHash,
    })
  })

  it("reads runtime version and account nonce", async () => {
    const node = new MockNode({ runtime: { specVersion: 39, transactionVersion: 2 } })
    node.nonces.set("5Alice", 4)
    const rpc = new ChainRpc(node, FAST)
    assert.deepEqual(await rpc.runtimeVersion(), { specVersion: 39, transactionVersion: 2 })
    assert.equal(await rpc.accountNextIndex("5Alice"), 4)
    assert.equal(await rpc.accountNextIndex("5Bob"), 0)
  })

  it("returns block bodies as hex extrinsics", async () => {
    const node = new MockNode({ tip: 1 })
    const block = node.produceBlock([new Uint8Array([1, 2, 3])])
    const rpc = new ChainRpc(node, FAST)
    const body = await rpc.block(block.hash)
    assert.equal(body?.header.number, 2)
    assert.deepEqual(body?.extrinsics, ["0x010203"])
    assert.equal(await rpc.block(`0x${"ee".repeat(32)}`), null)
  })

  it("rejects negative heights before calling the node", async () => {
    const node = new MockNode()
    const rpc = new ChainRpc(node, FAST)
    assert.throws(() => rpc.blockHash(-1), UserInputError)
    assert.equal(node.callCount("chain_getBlockHash"), 0)
  })

  it("treats malformed responses as decoding errors", async () => {
    const rpc = new ChainRpc(answering("0x1234"), FAST)
    await assert.rejects(() => rpc.finalizedHead(), DecodingError)
    await assert.rejects(() => rpc.runtimeVersion(), DecodingError)
  })
})

describe("ChainRpc retries", () => {
  it("retries transport errors by default", async () => {
    const node = new MockNode({ tip: 2, finalized: 2 })
    node.failNext("chain_getFinalizedHead", new TransportError("reset"), 2)
    const rpc = new ChainRpc(node, FAST)
    assert.equal(await rpc.finalizedHead(), node.hashAt(2))
    assert.equal(node.callCount("chain_getFinalizedHead"), 3)
  })

  it("honours the global switch and lets a call override it", async () => {
    const node = new MockNode({ tip: 2, finalized: 2 })
    const rpc = new ChainRpc(node, FAST)
    rpc.setGlobalRetries({ retryOnTransportError: false })

    node.failNext("chain_getFinalizedHead", new TransportError("reset"))
    await assert.rejects(() => rpc.finalizedHead(), TransportError)
    assert.equal(node.callCount("chain_getFinalizedHead"), 1)

    node.failNext("chain_getFinalizedHead", new TransportError("reset"))
    assert.equal(await rpc.finalizedHead({ retry: { retryOnTransportError: true } }), node.hashAt(2))
    assert.equal(node.callCount("chain_getFinalizedHead"), 3)
  })

  it("retries empty results only when asked", async () => {
    const node = new MockNode({ tip: 4 })
    const rpc = new ChainRpc(node, FAST)

    node.emptyNext("chain_getBlockHash")
    assert.equal(await rpc.blockHash(4), null)

    node.emptyNext("chain_getBlockHash")
    assert.equal(await rpc.blockHash(4, { retry: { retryOnEmptyResult: true } }), node.hashAt(4))
  })

  it("sends submissions exactly once", async () => {
    const node = new MockNode()
    node.failNext("author_submitExtrinsic", new TransportError("reset"))
    const rpc = new ChainRpc(node, FAST)
    await assert.rejects(() => rpc.submitExtrinsic(new Uint8Array([1])), TransportError)
    assert.equal(node.callCount("author_submitExtrinsic"), 1)
  })

  it("returns the hash reported for a submission", async () => {
    const node = new MockNode()
    const rpc = new ChainRpc(node, FAST)
    const bytes = new Uint8Array([4, 5, 6])
    assert.equal(await rpc.submitExtrinsic(bytes), blake2b256Hex(bytes))
    assert.deepEqual(node.pool, [bytes])
  })
})

describe("ChainRpc.fetchExtrinsics", () => {
  it("maps node-side filtered extrinsics", async () => {
    const node = new MockNode()
    const a = new Uint8Array([1])
    const b = new Uint8Array([2])
    const block = node.produceBlock([a, b])
    const rpc = new ChainRpc(node, FAST)

    const found = await rpc.fetchExtrinsics(block.hash, { txHashes: [blake2b256Hex(b)] })
    assert.deepEqual(found, [{
      txHash: blake2b256Hex(b),
      txIndex: 1,
      palletId: 0,
      variantId: 0,
      encoded: null,
      signer: null,
    }])
    assert.equal((await rpc.fetchExtrinsics(block.hash, {})).length, 2)
  })

  it("sends the filter in the node's wire shape", async () => {
    const node = new MockNode()
    const rpc = new ChainRpc(node, FAST)
    const hash = node.genesisHash
    await rpc.fetchExtrinsics(hash, { signer: { address: "5Alice", nonce: 3 } }, "Extrinsic")
    const call = node.calls.find((c) => c.method === "system_fetchExtrinsicsV1")
    assert.deepEqual(call?.params, [
      { Hash: hash },
      {
        filter: { transaction: "All", signature: { ss58_address: "5Alice", app_id: null, nonce: 3 } },
        encode_selector: "Extrinsic",
      },
    ])
  })

  it("does not retry an unsupported method", async () => {
    const node = new MockNode({ fetchExtrinsics: false })
    const rpc = new ChainRpc(node, FAST)
    await assert.rejects(() => rpc.fetchExtrinsics(node.genesisHash, {}), UnsupportedOperationError)
    assert.equal(node.callCount("system_fetchExtrinsicsV1"), 1)
  })
})

describe("ChainRpc.fetchEvents", () => {
  it("flattens phase groups in emission order", async () => {
    const node = new MockNode()
    const b = new Uint8Array([2])
    node.failedTxHashes.add(blake2b256Hex(b))
    const block = node.produceBlock([new Uint8Array([1]), b])
    const rpc = new ChainRpc(node, FAST)

    assert.deepEqual(await rpc.fetchEvents(block.hash), [
      { index: 0, palletId: 0, variantId: 0, encoded: "0x0000", phase: { applyExtrinsic: 0 } },
      { index: 1, palletId: 0, variantId: 1, encoded: "0x0001", phase: { applyExtrinsic: 1 } },
      { index: 2, palletId: 3, variantId: 0, encoded: "0x0300", phase: "Finalization" },
    ])
  })

  it("sends the phase filter in the node's wire shape", async () => {
    const node = new MockNode()
    const block = node.produceBlock([new Uint8Array([1]), new Uint8Array([2])])
    const rpc = new ChainRpc(node, FAST)

    const events = await rpc.fetchEvents(block.hash, { only: [1] })
    assert.deepEqual(events.map((e) => e.index), [1])
    const call = node.calls.find((c) => c.method === "system_fetchEventsV1")
    assert.deepEqual(call?.params, [
      block.hash,
      { filter: { Only: [1] }, enable_encoding: true, enable_decoding: false },
    ])
    assert.deepEqual((await rpc.fetchEvents(block.hash, "OnlyNonExtrinsics")).map((e) => e.phase), ["Finalization"])
  })

  it("requires encoded event data", async () => {
    const rpc = new ChainRpc(answering([
      { phase: "Finalization", events: [{ index: 0, emitted_index: [0, 0], encoded: null, decoded: null }] },
    ]), FAST)
    await assert.rejects(() => rpc.fetchEvents(`0x${"aa".repeat(32)}`), DecodingError)
  })

  it("rejects unknown phases", async () => {
    const rpc = new ChainRpc(answering([{ phase: { Other: 1 }, events: [] }]), FAST)
    await assert.rejects(() => rpc.fetchEvents(`0x${"aa".repeat(32)}`), DecodingError)
  })
})

describe("ChainRpc runtime api calls", () => {
  it("queries call fees with the length-suffixed call at a block", async () => {
    const node = new MockNode({ tip: 3 })
    const rpc = new ChainRpc(node, FAST)
    const at = node.hashAt(3)

    assert.deepEqual(await rpc.queryCallFeeDetails(new Uint8Array([0x1d, 0x01]), at), {
      inclusionFee: { baseFee: 124_000_000n, lenFee: 1_200n, adjustedWeightFee: 5_000n },
    })
    const call = node.calls.find((c) => c.method === "state_call")
    assert.deepEqual(call?.params, [QUERY_CALL_FEE_DETAILS, "0x1d0102000000", at])
  })

  it("decodes dispatch info for an extrinsic at the best block", async () => {
    const node = new MockNode()
    const rpc = new ChainRpc(node, FAST)
    assert.deepEqual(await rpc.queryInfo(new Uint8Array([7])), {
      weight: { refTime: 180_000_000n, proofSize: 3_500n },
      dispatchClass: "Normal",
      partialFee: 124_006_200n,
    })
    assert.deepEqual(node.calls[0]?.params, [QUERY_INFO, "0x0701000000"])
  })

  it("reports a missing runtime api as unsupported", async () => {
    const rpc = new ChainRpc(new MockNode(), FAST)
    await assert.rejects(() => rpc.stateCall("Missing_api", new Uint8Array()), UnsupportedOperationError)
  })
})

describe("ChainRpc.subscribeHeads", () => {
  it("is unavailable over request-only transports", async () => {
    const rpc = new ChainRpc(new MockNode(), FAST)
    assert.equal(await rpc.subscribeHeads("best"), null)
  })

  it("yields decoded headers until unsubscribed", async () => {
    const node = new MockNode({ tip: 2, push: true })
    const rpc = new ChainRpc(node, FAST)
    const sub = await rpc.subscribeHeads("best")
    assert.ok(sub)
    const iterator = sub[Symbol.asyncIterator]()

    const block = node.produceBlock()
    const next = await iterator.next()
    assert.equal(next.done, false)
    assert.equal(next.value?.number, 3)
    assert.equal(next.value?.parentHash, node.hashAt(2))
    assert.equal(block.number, 3)

    await sub.unsubscribe()
    assert.equal(node.activeSubscriptions, 0)
    assert.equal(node.callCount("chain_unsubscribeNewHeads"), 1)
  })

  it("retries opening under the call's policy", async () => {
    const node = new MockNode({ push: true })
    const rpc = new ChainRpc(node, FAST)
    node.failNext("chain_subscribeFinalizedHeads", new TransportError("socket reset"))
    const sub = await rpc.subscribeHeads("finalized")
    assert.ok(sub)
    await sub.unsubscribe()
    assert.equal(node.callCount("chain_subscribeFinalizedHeads"), 2)

    node.failNext("chain_subscribeFinalizedHeads", new TransportError("socket reset"))
    await assert.rejects(
      () => rpc.subscribeHeads("finalized", { retry: { retryOnTransportError: false } }),
      TransportError,
    )
    assert.equal(node.callCount("chain_subscribeFinalizedHeads"), 3)
  })
})
