/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { createRootLogger, Logger } from '../logger'
import { StringUtils } from '../utils'
import { ChainMonitor } from './chainMonitor'
import { NoCommonAncestorError, TransientNodeError } from './errors'
import { ChainTip, ConsumerSink, NodeClient } from './types'

export type BootstrapConsumer = {
  name: string
  sink: ConsumerSink
  /**
   * The last block this consumer processed before the tower went down, null on a fresh start
   */
  lastKnownBlockHash: ChainTip | null
}

export type ReconcileResult = {
  name: string
  sink: ConsumerSink
  lastKnownBlockHash: ChainTip | null
  lastCommonAncestor: ChainTip | null
  /**
   * Blocks after `lastCommonAncestor` up to the node's tip, oldest first
   */
  missedBlocks: ChainTip[]
  /**
   * Transactions of the blocks this consumer saw that are no longer on the best chain
   */
  droppedTransactions: string[]
}

type Reconciliation = Pick<
  ReconcileResult,
  'lastCommonAncestor' | 'missedBlocks' | 'droppedTransactions'
>

/**
 * Works out what each consumer missed while the tower was down and feeds it back
 * through the chain monitor before live monitoring starts.
 */
export class BootstrapReconciler {
  readonly nodeClient: NodeClient
  readonly logger: Logger

  constructor(options: { nodeClient: NodeClient; logger?: Logger }) {
    this.nodeClient = options.nodeClient
    this.logger = (options.logger ?? createRootLogger()).withTag('bootstrap')
  }

  /**
   * Consumers that stopped at the same block share one walk of the node.
   *
   * @throws NoCommonAncestorError if a consumer's block shares no history with the node
   * @throws TransientNodeError if the node could not be queried
   */
  async reconcile(consumers: readonly BootstrapConsumer[]): Promise<ReconcileResult[]> {
    const cache = new Map<ChainTip, Reconciliation>()
    const results: ReconcileResult[] = []

    for (const consumer of consumers) {
      const hash = consumer.lastKnownBlockHash

      let reconciliation: Reconciliation

      if (hash === null) {
        reconciliation = { lastCommonAncestor: null, missedBlocks: [], droppedTransactions: [] }
      } else {
        const cached = cache.get(hash)
        reconciliation = cached ?? (await this.reconcileFrom(hash))
        cache.set(hash, reconciliation)
      }

      this.logger.debug(
        `${consumer.name} missed ${reconciliation.missedBlocks.length} blocks` +
          (hash ? ` since ${StringUtils.shortHash(hash)}` : ''),
      )

      results.push({
        name: consumer.name,
        sink: consumer.sink,
        lastKnownBlockHash: hash,
        ...reconciliation,
      })
    }

    return results
  }

  /**
   * Queues every missed block once, oldest first, and tells the monitor which sinks
   * must not see a block they already processed.
   *
   * The lists may end at different tips when blocks arrive during reconciliation,
   * so a sink only skips the merged blocks up to its own common ancestor.
   *
   * @returns how many blocks were queued
   */
  replay(monitor: ChainMonitor, results: readonly ReconcileResult[]): number {
    const blocks = mergeMissedBlocks(results.map((r) => r.missedBlocks))

    for (const result of results) {
      monitor.skip(result.sink, blocksAlreadySeen(blocks, result.lastCommonAncestor))
    }

    let replayed = 0
    for (const hash of blocks) {
      if (monitor.enqueue(hash)) {
        replayed++
      }
    }

    if (replayed > 0) {
      this.logger.info(`Replaying ${replayed} missed blocks`)
    }

    return replayed
  }

  private async reconcileFrom(lastKnownBlockHash: ChainTip): Promise<Reconciliation> {
    try {
      const { ancestor, droppedTransactions } = await this.nodeClient.findLastCommonAncestor(
        lastKnownBlockHash,
      )
      const missedBlocks = await this.nodeClient.getMissedBlocks(ancestor)

      return { lastCommonAncestor: ancestor, missedBlocks, droppedTransactions }
    } catch (error: unknown) {
      if (error instanceof NoCommonAncestorError) {
        throw error
      }

      throw new TransientNodeError(
        `Could not reconcile from block ${StringUtils.shortHash(lastKnownBlockHash)}`,
        error,
      )
    }
  }
}

/**
 * Every missed list ends at the node's tip, so the shorter ones are tails of the longest.
 * Anything outside the longest list is appended in the order it was first seen.
 */
export function mergeMissedBlocks(lists: readonly (readonly ChainTip[])[]): ChainTip[] {
  const sorted = [...lists].sort((a, b) => b.length - a.length)
  const seen = new Set<ChainTip>()
  const merged: ChainTip[] = []

  for (const list of sorted) {
    for (const hash of list) {
      if (!seen.has(hash)) {
        seen.add(hash)
        merged.push(hash)
      }
    }
  }

  return merged
}

/**
 * The blocks of a merged replay at or before `ancestor`. A fresh consumer skips them all.
 */
function blocksAlreadySeen(blocks: readonly ChainTip[], ancestor: ChainTip | null): ChainTip[] {
  if (ancestor === null) {
    return [...blocks]
  }

  return blocks.slice(0, blocks.indexOf(ancestor) + 1)
}
