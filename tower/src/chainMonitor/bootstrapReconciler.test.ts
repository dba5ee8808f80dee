/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import {
  ArraySink,
  blockHash,
  createTestLogger,
  FakeNodeClient,
  FakeTipFeed,
  waitFor,
} from '../testUtilities'
import { StringUtils } from '../utils'
import { BootstrapReconciler, mergeMissedBlocks } from './bootstrapReconciler'
import { ChainMonitor } from './chainMonitor'
import { NoCommonAncestorError, TransientNodeError } from './errors'

describe('BootstrapReconciler', () => {
  const [h0, h1, h2, h3, h4] = [0, 1, 2, 3, 4].map((i) => blockHash(`h${i}`))
  const [n2, n3, n4] = [2, 3, 4].map((i) => blockHash(`n${i}`))

  /**
   * h0 - h1 - n2 - n3 - n4   best chain
   *        \- h2 - h3 - h4   reorged out while the tower was down
   */
  const setup = () => {
    const nodeClient = new FakeNodeClient()
    nodeClient.extend(h0, h1, h2, h3, h4)
    nodeClient.disconnect(3)
    nodeClient.extend(n2, n3, n4)

    const reconciler = new BootstrapReconciler({ nodeClient, logger: createTestLogger() })

    const createMonitor = (sinks: ArraySink[]) =>
      new ChainMonitor({
        sinks,
        nodeClient,
        createFeed: () => new FakeTipFeed(),
        pollingIntervalMs: 60 * 1000,
        logger: createTestLogger(),
      })

    return { nodeClient, reconciler, createMonitor }
  }

  it('should find the missed blocks after a reorg and replay them in order', async () => {
    const { reconciler, createMonitor } = setup()
    const sink = new ArraySink()

    const results = await reconciler.reconcile([
      { name: 'watcher', sink, lastKnownBlockHash: h4 },
    ])

    expect(results).toEqual([
      {
        name: 'watcher',
        sink,
        lastKnownBlockHash: h4,
        lastCommonAncestor: h1,
        missedBlocks: [n2, n3, n4],
        droppedTransactions: [`tx-${h4}`, `tx-${h3}`, `tx-${h2}`],
      },
    ])

    const monitor = createMonitor([sink])
    const enqueue = jest.spyOn(monitor, 'enqueue')

    expect(reconciler.replay(monitor, results)).toBe(3)
    expect(enqueue.mock.calls).toEqual([[n2], [n3], [n4]])
    expect([...monitor.queue]).toEqual([n2, n3, n4])
  })

  it('should report nothing missed on a fresh start', async () => {
    const { nodeClient, reconciler } = setup()
    const sink = new ArraySink()

    const results = await reconciler.reconcile([
      { name: 'watcher', sink, lastKnownBlockHash: null },
    ])

    expect(results).toEqual([
      {
        name: 'watcher',
        sink,
        lastKnownBlockHash: null,
        lastCommonAncestor: null,
        missedBlocks: [],
        droppedTransactions: [],
      },
    ])
    expect(nodeClient.findLastCommonAncestorCalls).toEqual([])
  })

  it('should walk the node once for consumers that stopped at the same block', async () => {
    const { nodeClient, reconciler } = setup()

    const results = await reconciler.reconcile([
      { name: 'watcher', sink: new ArraySink(), lastKnownBlockHash: n3 },
      { name: 'responder', sink: new ArraySink(), lastKnownBlockHash: n3 },
    ])

    expect(nodeClient.findLastCommonAncestorCalls).toEqual([n3])
    expect(results.map((r) => r.missedBlocks)).toEqual([[n4], [n4]])
  })

  it('should pass through a missing common ancestor', async () => {
    const { reconciler } = setup()
    const unknown = blockHash('unknown')

    await expect(
      reconciler.reconcile([
        { name: 'watcher', sink: new ArraySink(), lastKnownBlockHash: unknown },
      ]),
    ).rejects.toThrow(NoCommonAncestorError)
  })

  it('should wrap other node failures as transient', async () => {
    const { nodeClient, reconciler } = setup()
    jest.spyOn(nodeClient, 'getMissedBlocks').mockRejectedValue(new Error('connection refused'))

    const result = reconciler.reconcile([
      { name: 'watcher', sink: new ArraySink(), lastKnownBlockHash: n3 },
    ])

    await expect(result).rejects.toThrow(TransientNodeError)
    await expect(result).rejects.toThrow(
      `Could not reconcile from block ${StringUtils.shortHash(n3)}: connection refused`,
    )
  })

  it('should give each consumer only the blocks it missed', async () => {
    const { reconciler, createMonitor } = setup()
    const watcher = new ArraySink()
    const responder = new ArraySink()
    const fresh = new ArraySink()

    const results = await reconciler.reconcile([
      { name: 'watcher', sink: watcher, lastKnownBlockHash: h4 },
      { name: 'responder', sink: responder, lastKnownBlockHash: n3 },
      { name: 'fresh', sink: fresh, lastKnownBlockHash: null },
    ])

    const monitor = createMonitor([watcher, responder, fresh])
    expect(reconciler.replay(monitor, results)).toBe(3)

    await monitor.monitorChain()
    await monitor.activate()
    await waitFor(() => watcher.received.length === 3 && responder.received.length === 1)

    monitor.terminate()
    await monitor.wait()

    expect(watcher.received).toEqual([n2, n3, n4])
    expect(responder.received).toEqual([n4])
    expect(fresh.received).toEqual([])
  })

  it('should deliver blocks mined during reconciliation to every consumer that missed them', async () => {
    const nodeClient = new FakeNodeClient()
    nodeClient.extend(h0, h1, h2, h3)

    const getMissedBlocks = nodeClient.getMissedBlocks.bind(nodeClient)
    jest.spyOn(nodeClient, 'getMissedBlocks').mockImplementationOnce(async (ancestor) => {
      const missed = await getMissedBlocks(ancestor)
      nodeClient.extend(h4)
      return missed
    })

    const reconciler = new BootstrapReconciler({ nodeClient, logger: createTestLogger() })
    const watcher = new ArraySink()
    const responder = new ArraySink()

    const results = await reconciler.reconcile([
      { name: 'watcher', sink: watcher, lastKnownBlockHash: h1 },
      { name: 'responder', sink: responder, lastKnownBlockHash: h2 },
    ])

    expect(results.map((r) => r.missedBlocks)).toEqual([
      [h2, h3],
      [h3, h4],
    ])

    const monitor = new ChainMonitor({
      sinks: [watcher, responder],
      nodeClient,
      createFeed: () => new FakeTipFeed(),
      pollingIntervalMs: 60 * 1000,
      logger: createTestLogger(),
    })

    expect(reconciler.replay(monitor, results)).toBe(3)

    await monitor.monitorChain()
    await monitor.activate()
    await waitFor(() => watcher.received.length === 3 && responder.received.length === 2)

    monitor.terminate()
    await monitor.wait()

    expect(watcher.received).toEqual([h2, h3, h4])
    expect(responder.received).toEqual([h3, h4])
  })
})

describe('mergeMissedBlocks', () => {
  it('should merge shorter lists into the longest one', () => {
    expect(mergeMissedBlocks([['c'], ['a', 'b', 'c'], [], ['b', 'c']])).toEqual(['a', 'b', 'c'])
  })

  it('should append blocks missing from the longest list', () => {
    expect(mergeMissedBlocks([['a', 'b'], ['c']])).toEqual(['a', 'b', 'c'])
  })
})
