/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { ChainTip, NoCommonAncestorError, NodeClient } from '../../chainMonitor'

type FakeBlock = {
  hash: ChainTip
  previous: ChainTip | null
  transactions: string[]
}

/**
 * An in-memory node with one best chain and any number of abandoned blocks
 */
export class FakeNodeClient implements NodeClient {
  readonly blocks = new Map<ChainTip, FakeBlock>()
  bestChain: ChainTip[] = []

  /**
   * Makes the next tip query fail or time out
   */
  failNext: Error | 'timeout' | null = null

  bestBlockHashCalls = 0
  findLastCommonAncestorCalls: ChainTip[] = []

  get tip(): ChainTip | null {
    return this.bestChain[this.bestChain.length - 1] ?? null
  }

  /**
   * Appends blocks to the best chain
   */
  extend(...hashes: ChainTip[]): void {
    for (const hash of hashes) {
      this.blocks.set(hash, { hash, previous: this.tip, transactions: [`tx-${hash}`] })
      this.bestChain.push(hash)
    }
  }

  /**
   * Drops the last `depth` blocks from the best chain, keeping them as known stale blocks
   */
  disconnect(depth: number): ChainTip[] {
    return this.bestChain.splice(this.bestChain.length - depth, depth)
  }

  getBestBlockHash(): Promise<ChainTip | null> {
    this.bestBlockHashCalls++

    const failure = this.failNext
    this.failNext = null

    if (failure === 'timeout') {
      return Promise.resolve(null)
    }

    if (failure) {
      return Promise.reject(failure)
    }

    return Promise.resolve(this.tip)
  }

  findLastCommonAncestor(
    lastKnownBlockHash: ChainTip,
  ): Promise<{ ancestor: ChainTip; droppedTransactions: string[] }> {
    this.findLastCommonAncestorCalls.push(lastKnownBlockHash)

    const droppedTransactions: string[] = []
    let block = this.blocks.get(lastKnownBlockHash)

    while (block) {
      if (this.bestChain.includes(block.hash)) {
        return Promise.resolve({ ancestor: block.hash, droppedTransactions })
      }

      droppedTransactions.push(...block.transactions)
      block = block.previous ? this.blocks.get(block.previous) : undefined
    }

    return Promise.reject(new NoCommonAncestorError(lastKnownBlockHash))
  }

  getMissedBlocks(ancestor: ChainTip): Promise<ChainTip[]> {
    const index = this.bestChain.indexOf(ancestor)
    return Promise.resolve(this.bestChain.slice(index + 1))
  }
}
