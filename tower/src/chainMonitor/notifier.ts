/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { Logger } from '../logger'
import { ErrorUtils, StringUtils } from '../utils'
import { LifecycleController } from './lifecycle'
import { PendingQueue } from './pendingQueue'
import { ChainTip, ConsumerSink } from './types'

export const NOTIFIER_POP_TIMEOUT_MS = 100

/**
 * Drains the pending queue in order and hands every tip to each sink
 */
export class Notifier {
  readonly sinks: readonly ConsumerSink[]
  readonly queue: PendingQueue<ChainTip>
  readonly lifecycle: LifecycleController
  readonly logger: Logger

  /**
   * Tips a sink must not be given once, see {@link Notifier.skip}
   */
  private readonly skipped = new Map<ConsumerSink, Set<ChainTip>>()

  constructor(options: {
    sinks: readonly ConsumerSink[]
    queue: PendingQueue<ChainTip>
    lifecycle: LifecycleController
    logger: Logger
  }) {
    this.sinks = options.sinks
    this.queue = options.queue
    this.lifecycle = options.lifecycle
    this.logger = options.logger.withTag('notifier')
  }

  /**
   * The next delivery of each of `hashes` will pass over `sink`. Used when replaying
   * blocks only some consumers missed.
   */
  skip(sink: ConsumerSink, hashes: Iterable<ChainTip>): void {
    const skipped = this.skipped.get(sink) ?? new Set<ChainTip>()

    for (const hash of hashes) {
      skipped.add(hash)
    }

    if (skipped.size > 0) {
      this.skipped.set(sink, skipped)
    }
  }

  async run(): Promise<void> {
    while (!this.lifecycle.isTerminated) {
      const hash = await this.queue.pop(NOTIFIER_POP_TIMEOUT_MS)

      if (hash === null || this.lifecycle.isTerminated) {
        continue
      }

      await this.notify(hash)
    }

    this.logger.debug(`Stopped, dropping ${this.queue.size} pending blocks`)
  }

  /**
   * Delivers `hash` to the sinks one after the other, so each sink sees tips in queue order.
   * Sinks not reached before termination are not notified.
   */
  async notify(hash: ChainTip): Promise<void> {
    for (const sink of this.sinks) {
      if (this.lifecycle.isTerminated) {
        return
      }

      const skipped = this.skipped.get(sink)

      if (skipped?.delete(hash)) {
        if (skipped.size === 0) {
          this.skipped.delete(sink)
        }
        continue
      }

      try {
        await sink.push(hash)
      } catch (error: unknown) {
        this.logger.error(
          `Could not notify a consumer of block ${StringUtils.shortHash(hash)}: ${ErrorUtils.renderError(error)}`,
        )
      }
    }
  }
}
