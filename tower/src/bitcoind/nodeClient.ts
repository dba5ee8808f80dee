/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { ChainTip, NoCommonAncestorError, NodeClient } from '../chainMonitor'
import { StringUtils } from '../utils'
import { BitcoindTimeoutError } from './errors'
import { BitcoindRpcClient } from './rpcClient'

/**
 * Answers the chain monitor's questions about the best chain using bitcoind's RPC
 */
export class BitcoindNodeClient implements NodeClient {
  readonly rpc: BitcoindRpcClient

  constructor(rpc: BitcoindRpcClient) {
    this.rpc = rpc
  }

  async getBestBlockHash(): Promise<ChainTip | null> {
    try {
      return await this.rpc.getBestBlockHash()
    } catch (e: unknown) {
      if (e instanceof BitcoindTimeoutError) {
        return null
      }
      throw e
    }
  }

  /**
   * Follows `previousblockhash` from `lastKnownBlockHash` while the blocks are off the
   * best chain, collecting their transactions.
   *
   * @throws NoCommonAncestorError if a block on the way is unknown or genesis is passed
   */
  async findLastCommonAncestor(
    lastKnownBlockHash: ChainTip,
  ): Promise<{ ancestor: ChainTip; droppedTransactions: string[] }> {
    const droppedTransactions: string[] = []
    let hash = lastKnownBlockHash

    for (;;) {
      const block = await this.rpc.getBlock(hash)

      if (!block) {
        throw new NoCommonAncestorError(
          lastKnownBlockHash,
          `block ${StringUtils.shortHash(hash)} is unknown to bitcoind`,
        )
      }

      if (block.confirmations !== -1) {
        return { ancestor: hash, droppedTransactions }
      }

      droppedTransactions.push(...block.tx)

      if (!block.previousblockhash) {
        throw new NoCommonAncestorError(lastKnownBlockHash, 'reached the genesis block')
      }

      hash = block.previousblockhash
    }
  }

  async getMissedBlocks(ancestor: ChainTip): Promise<ChainTip[]> {
    const missed: ChainTip[] = []
    let hash = await this.rpc.getBestBlockHash()

    while (hash !== ancestor) {
      const block = await this.rpc.getBlock(hash)

      if (!block || !block.previousblockhash) {
        throw new NoCommonAncestorError(ancestor, 'block is not on the best chain')
      }

      missed.push(hash)
      hash = block.previousblockhash
    }

    return missed.reverse()
  }
}
