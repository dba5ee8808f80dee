/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { ErrorUtils } from '../utils'
import type { ChainTip } from './types'
import type { LifecyclePhase } from './lifecycle'

export abstract class ChainMonitorError extends Error {
  name = this.constructor.name
}

/**
 * Thrown when the orchestrator calls a lifecycle operation out of order
 */
export class InvalidLifecycleTransitionError extends ChainMonitorError {
  readonly operation: string
  readonly phase: LifecyclePhase

  constructor(operation: string, expected: LifecyclePhase, phase: LifecyclePhase) {
    super(`${operation}() can only be called in ${expected} phase. Current phase is ${phase}.`)
    this.operation = operation
    this.phase = phase
  }
}

/**
 * The node does not know any block between the persisted tip and genesis, for example
 * because it pruned them. Retrying will not help.
 */
export class NoCommonAncestorError extends ChainMonitorError {
  readonly lastKnownBlockHash: ChainTip

  constructor(lastKnownBlockHash: ChainTip, reason?: string) {
    super(
      `Could not find a common ancestor for block ${lastKnownBlockHash}` +
        (reason ? `: ${reason}` : ''),
    )
    this.lastKnownBlockHash = lastKnownBlockHash
  }
}

/**
 * A node query failed in a way that may succeed if tried again
 */
export class TransientNodeError extends ChainMonitorError {
  readonly error: unknown

  constructor(message: string, error: unknown) {
    super(`${message}: ${ErrorUtils.renderError(error)}`)
    this.error = error
  }
}
