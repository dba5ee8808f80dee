/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { Logger } from '../logger'
import { ErrorUtils, PromiseUtils, StringUtils } from '../utils'
import { LifecycleController } from './lifecycle'
import { ChainTip, NodeClient } from './types'

export const DEFAULT_POLLING_INTERVAL_MS = 60 * 1000

/**
 * Asks the node for its best tip once per interval
 */
export class PollDetector {
  readonly nodeClient: NodeClient
  readonly lifecycle: LifecycleController
  readonly logger: Logger
  readonly intervalMs: number

  private readonly enqueue: (hash: ChainTip) => boolean
  private sleepController: AbortController | null = null
  private woken = false

  constructor(options: {
    nodeClient: NodeClient
    lifecycle: LifecycleController
    enqueue: (hash: ChainTip) => boolean
    logger: Logger
    intervalMs?: number
  }) {
    this.nodeClient = options.nodeClient
    this.lifecycle = options.lifecycle
    this.enqueue = options.enqueue
    this.logger = options.logger.withTag('polldetector')
    this.intervalMs = options.intervalMs ?? DEFAULT_POLLING_INTERVAL_MS
  }

  /**
   * Polls now instead of at the end of the current interval
   */
  wake(): void {
    this.woken = true
    this.sleepController?.abort()
  }

  async run(): Promise<void> {
    while (!this.lifecycle.isTerminated) {
      await this.waitForNextPoll()

      if (this.lifecycle.isTerminated) {
        break
      }

      await this.poll()
    }

    this.logger.debug('Stopped polling')
  }

  async poll(): Promise<void> {
    let hash: ChainTip | null

    try {
      hash = await this.nodeClient.getBestBlockHash()
    } catch (error: unknown) {
      this.logger.warn(`Could not poll the best block hash: ${ErrorUtils.renderError(error)}`)
      return
    }

    // The node may not answer in time; try again next interval
    if (!hash || this.lifecycle.isTerminated) {
      return
    }

    if (this.enqueue(hash)) {
      this.logger.info(`New block received via polling ${StringUtils.shortHash(hash)}`)
    }
  }

  private async waitForNextPoll(): Promise<void> {
    if (this.woken) {
      this.woken = false
      return
    }

    const controller = new AbortController()
    const onTerminate = () => controller.abort()

    this.sleepController = controller
    this.lifecycle.signal.addEventListener('abort', onTerminate, { once: true })

    try {
      await PromiseUtils.sleep(this.intervalMs, controller.signal)
    } finally {
      this.lifecycle.signal.removeEventListener('abort', onTerminate)
      this.sleepController = null
      this.woken = false
    }
  }
}
