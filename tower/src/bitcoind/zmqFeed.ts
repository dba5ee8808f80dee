/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { Subscriber } from 'zeromq'
import { HASHBLOCK_TOPIC, TipFeed, TipFeedMessage, TipFeedParams } from '../chainMonitor'

export function feedEndpoint(params: TipFeedParams): string {
  return `${params.protocol}://${params.host}:${params.port}`
}

/**
 * A subscription to bitcoind's `zmqpubhashblock` socket
 */
export class ZmqTipFeed implements TipFeed {
  readonly endpoint: string
  private readonly socket: Subscriber

  constructor(params: TipFeedParams) {
    this.endpoint = feedEndpoint(params)

    // Never drop a block announcement because the reader fell behind
    this.socket = new Subscriber({ receiveHighWaterMark: 0 })

    try {
      this.socket.connect(this.endpoint)
      this.socket.subscribe(HASHBLOCK_TOPIC)
    } catch (e: unknown) {
      this.socket.close()
      throw e
    }
  }

  get closed(): boolean {
    return this.socket.closed
  }

  async *[Symbol.asyncIterator](): AsyncIterator<TipFeedMessage> {
    while (!this.socket.closed) {
      let message: Buffer[]

      try {
        message = await this.socket.receive()
      } catch (e: unknown) {
        // Closing the socket rejects the pending receive
        if (this.socket.closed) {
          return
        }
        throw e
      }

      yield message
    }
  }

  close(): void {
    if (!this.socket.closed) {
      this.socket.close()
    }
  }
}
