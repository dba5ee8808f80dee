/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * A block hash in the hex form bitcoind prints, compared by equality only
 */
export type ChainTip = string

/**
 * Anything the monitor can append a new tip to, usually a downstream block queue
 */
export interface ConsumerSink {
  push(hash: ChainTip): void | Promise<void>
}

/**
 * The full node the monitor trusts as the source of truth for the best chain
 */
export interface NodeClient {
  /**
   * @returns the best tip, or null if the node did not answer in time
   */
  getBestBlockHash(): Promise<ChainTip | null>

  /**
   * Walks back from `lastKnownBlockHash` until a block on the node's best chain is found.
   * `droppedTransactions` holds the transactions of the abandoned blocks on the way.
   */
  findLastCommonAncestor(
    lastKnownBlockHash: ChainTip,
  ): Promise<{ ancestor: ChainTip; droppedTransactions: string[] }>

  /**
   * @returns the blocks after `ancestor` up to the best tip, oldest first
   */
  getMissedBlocks(ancestor: ChainTip): Promise<ChainTip[]>
}

/**
 * One multipart message from the node's pub/sub feed, `[topic, body, ...]`
 */
export type TipFeedMessage = Buffer[]

export interface TipFeed extends AsyncIterable<TipFeedMessage> {
  /**
   * Closes the subscription. A pending read ends instead of waiting for the next block.
   * Safe to call more than once.
   */
  close(): void
}

export type TipFeedParams = {
  protocol: string
  host: string
  port: number
}
