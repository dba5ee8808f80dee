/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { PromiseResolve, PromiseUtils } from '../utils'

/**
 * Consumed slots are compacted away once there are this many of them
 */
const COMPACT_THRESHOLD = 1024

/**
 * An unbounded FIFO queue whose consumers can wait, with a timeout, for the next item.
 */
export class PendingQueue<Item> {
  private items: Item[] = []
  /**
   * The position of the next item to pop in `items`
   */
  private start = 0
  private waiters = new Set<PromiseResolve<void>>()

  get size(): number {
    return this.items.length - this.start
  }

  isEmpty(): boolean {
    return this.size === 0
  }

  push(item: Item): void {
    this.items.push(item)

    for (const wake of this.waiters) {
      wake()
    }
    this.waiters.clear()
  }

  /**
   * Removes the item at the front of the queue. If the queue is empty, waits up to
   * `timeoutMs` for one to be pushed.
   *
   * @returns the item, or null if the timeout elapsed first
   */
  async pop(timeoutMs: number): Promise<Item | null> {
    if (this.isEmpty()) {
      const [pushed, resolve] = PromiseUtils.split<void>()
      this.waiters.add(resolve)

      const timeout = setTimeout(resolve, timeoutMs)
      await pushed
      clearTimeout(timeout)
      this.waiters.delete(resolve)

      // another consumer may have taken the item first
      if (this.isEmpty()) {
        return null
      }
    }

    return this.shift()
  }

  clear(): void {
    this.items = []
    this.start = 0
  }

  *[Symbol.iterator](): Generator<Item> {
    for (let i = this.start; i < this.items.length; i++) {
      yield this.items[i]
    }
  }

  private shift(): Item {
    const item = this.items[this.start]
    this.start++

    if (this.start >= COMPACT_THRESHOLD && this.start * 2 >= this.items.length) {
      this.items = this.items.slice(this.start)
      this.start = 0
    }

    return item
  }
}
