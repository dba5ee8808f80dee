/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { HASHBLOCK_TOPIC, TipFeed, TipFeedMessage } from '../../chainMonitor'
import { PromiseUtils } from '../../utils'

/**
 * A feed the test publishes to by hand. A read blocks until a message is published
 * or the feed is closed.
 */
export class FakeTipFeed implements TipFeed {
  closed = false
  private readonly messages: (TipFeedMessage | Error)[] = []
  private wake: (() => void) | null = null

  publish(message: TipFeedMessage): void {
    this.messages.push(message)
    this.notify()
  }

  publishHash(hash: string): void {
    this.publish([Buffer.from(HASHBLOCK_TOPIC), Buffer.from(hash, 'hex'), Buffer.alloc(4)])
  }

  /**
   * Makes the next read throw
   */
  fail(error: Error): void {
    this.messages.push(error)
    this.notify()
  }

  close(): void {
    this.closed = true
    this.notify()
  }

  async *[Symbol.asyncIterator](): AsyncIterator<TipFeedMessage> {
    while (!this.closed) {
      const next = this.messages.shift()

      if (next === undefined) {
        const [promise, resolve] = PromiseUtils.split<void>()
        this.wake = () => resolve()
        await promise
        continue
      }

      if (next instanceof Error) {
        throw next
      }

      yield next
    }
  }

  private notify(): void {
    const wake = this.wake
    this.wake = null
    wake?.()
  }
}
