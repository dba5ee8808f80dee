/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { ChainTip, ConsumerSink } from '../../chainMonitor'

/**
 * Records every tip it is given
 */
export class ArraySink implements ConsumerSink {
  readonly received: ChainTip[] = []

  push(hash: ChainTip): void {
    this.received.push(hash)
  }
}
