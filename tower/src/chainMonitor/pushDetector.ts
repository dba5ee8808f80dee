/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { Logger } from '../logger'
import { ErrorUtils, StringUtils } from '../utils'
import { LifecycleController } from './lifecycle'
import { ChainTip, TipFeed, TipFeedMessage } from './types'

export const HASHBLOCK_TOPIC = 'hashblock'
export const BLOCK_HASH_LENGTH = 32
export const DEFAULT_FEED_RECONNECT_DELAY_MS = 5 * 1000

/**
 * Turns a `hashblock` feed message into a tip
 *
 * @returns null for any other topic or a payload that is not a block hash
 */
export function decodeTipMessage(message: TipFeedMessage): ChainTip | null {
  if (message.length < 2) {
    return null
  }

  const [topic, body] = message

  if (topic.toString('utf8') !== HASHBLOCK_TOPIC || body.length !== BLOCK_HASH_LENGTH) {
    return null
  }

  return body.toString('hex')
}

/**
 * Reads tips from the node's pub/sub feed as soon as it announces them
 */
export class PushDetector {
  readonly lifecycle: LifecycleController
  readonly logger: Logger
  readonly reconnectDelayMs: number

  private readonly createFeed: () => TipFeed
  private readonly enqueue: (hash: ChainTip) => boolean

  constructor(options: {
    createFeed: () => TipFeed
    lifecycle: LifecycleController
    enqueue: (hash: ChainTip) => boolean
    logger: Logger
    reconnectDelayMs?: number
  }) {
    this.createFeed = options.createFeed
    this.lifecycle = options.lifecycle
    this.enqueue = options.enqueue
    this.logger = options.logger.withTag('pushdetector')
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_FEED_RECONNECT_DELAY_MS
  }

  async run(): Promise<void> {
    while (!this.lifecycle.isTerminated) {
      await this.listen()

      if (!this.lifecycle.isTerminated) {
        await this.lifecycle.sleep(this.reconnectDelayMs)
      }
    }

    this.logger.debug('Stopped listening to the tip feed')
  }

  /**
   * Reads one subscription until it ends, fails, or the lifecycle terminates
   */
  private async listen(): Promise<void> {
    const feed = this.subscribe()
    if (!feed) {
      return
    }

    // Closing the feed releases a read that would otherwise wait for the next block
    const onTerminate = () => feed.close()
    this.lifecycle.signal.addEventListener('abort', onTerminate, { once: true })

    try {
      for await (const message of feed) {
        if (this.lifecycle.isTerminated) {
          break
        }

        this.onMessage(message)
      }

      if (!this.lifecycle.isTerminated) {
        this.logger.warn('Tip feed closed unexpectedly, subscribing again')
      }
    } catch (error: unknown) {
      if (!this.lifecycle.isTerminated) {
        this.logger.warn(`Tip feed failed: ${ErrorUtils.renderError(error)}`)
      }
    } finally {
      this.lifecycle.signal.removeEventListener('abort', onTerminate)
      feed.close()
    }
  }

  private subscribe(): TipFeed | null {
    try {
      return this.createFeed()
    } catch (error: unknown) {
      this.logger.warn(`Could not subscribe to the tip feed: ${ErrorUtils.renderError(error)}`)
      return null
    }
  }

  private onMessage(message: TipFeedMessage): void {
    const hash = decodeTipMessage(message)

    if (hash === null) {
      this.logger.debug('Ignoring a feed message that is not a block hash')
      return
    }

    if (this.enqueue(hash)) {
      this.logger.info(`New block received via zmq ${StringUtils.shortHash(hash)}`)
    }
  }
}
