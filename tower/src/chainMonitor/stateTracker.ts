/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { Assert } from '../assert'
import { PendingQueue } from './pendingQueue'
import { ChainTip } from './types'

export const DEFAULT_WINDOW_SIZE = 10

/**
 * Owns the believed best tip and a window of the tips it superseded, and decides
 * whether a reported hash is new.
 *
 * Both detectors and bootstrap replay report through {@link StateTracker.enqueue}.
 * It never yields to the event loop, so two reports of the same tip are always
 * handled one after the other and only the first one is queued.
 */
export class StateTracker {
  readonly queue: PendingQueue<ChainTip>
  readonly windowSize: number

  private _currentTip: ChainTip | null = null
  private window: ChainTip[] = []

  constructor(options: { queue: PendingQueue<ChainTip>; windowSize?: number }) {
    this.queue = options.queue
    this.windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE

    Assert.isGreaterThan(this.windowSize, 0, 'windowSize must be greater than 0')
  }

  get currentTip(): ChainTip | null {
    return this._currentTip
  }

  /**
   * The superseded tips, oldest first
   */
  get tipWindow(): readonly ChainTip[] {
    return this.window
  }

  isKnown(hash: ChainTip): boolean {
    return hash === this._currentTip || this.window.includes(hash)
  }

  /**
   * Queues `hash` for delivery if it is neither the current tip nor one of the
   * recently superseded ones, and makes it the current tip.
   *
   * @returns true if the hash was queued
   */
  enqueue(hash: ChainTip): boolean {
    if (this.isKnown(hash)) {
      return false
    }

    this.queue.push(hash)
    this.advance(hash)
    return true
  }

  /**
   * Sets the current tip without queueing it
   */
  seed(hash: ChainTip): void {
    if (hash !== this._currentTip) {
      this.advance(hash)
    }
  }

  private advance(hash: ChainTip): void {
    if (this._currentTip !== null) {
      this.window.push(this._currentTip)

      if (this.window.length > this.windowSize) {
        this.window.shift()
      }
    }

    this._currentTip = hash
  }
}
