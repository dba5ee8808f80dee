/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { Assert } from '../assert'
import { createRootLogger, Logger } from '../logger'
import { ErrorUtils, StringUtils } from '../utils'
import { LifecycleController, LifecyclePhase } from './lifecycle'
import { Notifier } from './notifier'
import { PendingQueue } from './pendingQueue'
import { PollDetector } from './pollDetector'
import { PushDetector } from './pushDetector'
import { StateTracker } from './stateTracker'
import { ChainTip, ConsumerSink, NodeClient, TipFeed } from './types'

/**
 * Watches the node for new best tips and tells every consumer about each one exactly once.
 *
 * Tips are found by two detectors racing each other: a push feed and a timer that polls
 * the node. Both report to the same {@link StateTracker}, which queues a tip only the
 * first time it shows up. The lifecycle goes through four phases:
 *
 * - `idle` after construction
 * - `listening` after {@link ChainMonitor.monitorChain}, tips pile up in the pending queue
 * - `active` after {@link ChainMonitor.activate}, pending and new tips reach the sinks in order
 * - `terminated` after {@link ChainMonitor.terminate}, nothing else is queued or delivered
 */
export class ChainMonitor {
  readonly sinks: readonly ConsumerSink[]
  readonly nodeClient: NodeClient
  readonly logger: Logger
  readonly lifecycle: LifecycleController
  readonly queue: PendingQueue<ChainTip>
  readonly state: StateTracker
  readonly pollDetector: PollDetector
  readonly pushDetector: PushDetector
  readonly notifier: Notifier

  private running: Promise<void>[] = []

  constructor(options: {
    sinks: readonly ConsumerSink[]
    nodeClient: NodeClient
    createFeed: () => TipFeed
    pollingIntervalMs?: number
    windowSize?: number
    feedReconnectDelayMs?: number
    logger?: Logger
  }) {
    Assert.isGreaterThan(options.sinks.length, 0, 'ChainMonitor needs at least one sink')

    this.sinks = [...options.sinks]
    this.nodeClient = options.nodeClient
    this.logger = (options.logger ?? createRootLogger()).withTag('chainmonitor')
    this.lifecycle = new LifecycleController()
    this.queue = new PendingQueue<ChainTip>()
    this.state = new StateTracker({ queue: this.queue, windowSize: options.windowSize })

    const enqueue = (hash: ChainTip) => this.enqueue(hash)

    this.pollDetector = new PollDetector({
      nodeClient: this.nodeClient,
      lifecycle: this.lifecycle,
      enqueue,
      logger: this.logger,
      intervalMs: options.pollingIntervalMs,
    })

    this.pushDetector = new PushDetector({
      createFeed: options.createFeed,
      lifecycle: this.lifecycle,
      enqueue,
      logger: this.logger,
      reconnectDelayMs: options.feedReconnectDelayMs,
    })

    this.notifier = new Notifier({
      sinks: this.sinks,
      queue: this.queue,
      lifecycle: this.lifecycle,
      logger: this.logger,
    })
  }

  get phase(): LifecyclePhase {
    return this.lifecycle.phase
  }

  get currentTip(): ChainTip | null {
    return this.state.currentTip
  }

  get tipWindow(): readonly ChainTip[] {
    return this.state.tipWindow
  }

  /**
   * The single entry point for new tips, used by both detectors and by bootstrap replay
   *
   * @returns true if the tip was new and has been queued for delivery
   */
  enqueue(hash: ChainTip): boolean {
    if (this.lifecycle.isTerminated) {
      return false
    }

    return this.state.enqueue(hash)
  }

  /**
   * Moves from idle to listening. Seeds the current tip from the node, then starts the
   * detectors. Tips found from here on are queued but not delivered until
   * {@link ChainMonitor.activate}.
   *
   * @throws InvalidLifecycleTransitionError if the phase is not idle
   */
  async monitorChain(): Promise<void> {
    await this.lifecycle.transition('monitorChain', 'idle', 'listening', async () => {
      await this.seedTip()

      if (this.lifecycle.isTerminated) {
        return
      }

      this.start(this.pollDetector.run())
      this.start(this.pushDetector.run())
      this.logger.debug('Listening for new blocks')
    })
  }

  /**
   * Moves from listening to active and starts delivering tips to the sinks
   *
   * @throws InvalidLifecycleTransitionError if the phase is not listening
   */
  async activate(): Promise<void> {
    await this.lifecycle.transition('activate', 'listening', 'active', () => {
      this.start(this.notifier.run())
      this.logger.debug(`Delivering blocks to ${this.sinks.length} consumers`)
    })
  }

  /**
   * Stops the monitor from any phase. Tips still pending are dropped.
   */
  terminate(): void {
    if (this.lifecycle.isTerminated) {
      return
    }

    this.lifecycle.terminate()
    this.queue.clear()
    this.logger.debug('Terminated')
  }

  /**
   * Keeps the next delivery of each of `hashes` away from `sink`
   */
  skip(sink: ConsumerSink, hashes: Iterable<ChainTip>): void {
    this.notifier.skip(sink, hashes)
  }

  /**
   * Polls the node now instead of waiting for the end of the interval
   */
  wake(): void {
    this.pollDetector.wake()
  }

  /**
   * Resolves once every loop started by the monitor has exited
   */
  async wait(): Promise<void> {
    await Promise.all(this.running)
  }

  private async seedTip(): Promise<void> {
    let tip: ChainTip | null = null

    try {
      tip = await this.nodeClient.getBestBlockHash()
    } catch (error: unknown) {
      this.logger.warn(`Could not fetch the best block hash: ${ErrorUtils.renderError(error)}`)
    }

    if (tip === null) {
      this.logger.warn('Starting without a known tip, the first one found will be treated as new')
      return
    }

    // Replay already moved the tip forward, so anything newer is a block to deliver
    if (this.state.currentTip !== null) {
      this.enqueue(tip)
      return
    }

    this.state.seed(tip)
    this.logger.info(`Best block is ${StringUtils.shortHash(tip)}`)
  }

  private start(loop: Promise<void>): void {
    this.running.push(
      loop.catch((error: unknown) => {
        this.logger.error(`Chain monitor loop crashed: ${ErrorUtils.renderError(error, true)}`)
      }),
    )
  }
}
