/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { Mutex } from '../mutex'
import { PromiseUtils } from '../utils'
import { InvalidLifecycleTransitionError } from './errors'

/**
 * - idle: constructed, nothing is running
 * - listening: detectors run and new tips pile up in the pending queue
 * - active: the notifier delivers pending tips to the sinks
 * - terminated: every loop exits, pending tips are dropped
 */
export type LifecyclePhase = 'idle' | 'listening' | 'active' | 'terminated'

const PHASE_ORDER: Readonly<Record<LifecyclePhase, number>> = {
  idle: 0,
  listening: 1,
  active: 2,
  terminated: 3,
}

export class LifecycleController {
  private _phase: LifecyclePhase = 'idle'
  private readonly lock = new Mutex()
  private readonly abortController = new AbortController()

  get phase(): LifecyclePhase {
    return this._phase
  }

  get isTerminated(): boolean {
    return this._phase === 'terminated'
  }

  /**
   * Aborts once the lifecycle is terminated. Loops wait on this instead of a plain sleep.
   */
  get signal(): AbortSignal {
    return this.abortController.signal
  }

  /**
   * Runs `start` while holding the transition lock, then moves from `from` to `to`.
   *
   * Nothing is started and the phase is left alone if the current phase is not `from`.
   * If the lifecycle was terminated while `start` ran, the phase stays terminated.
   *
   * @throws InvalidLifecycleTransitionError
   */
  async transition(
    operation: string,
    from: LifecyclePhase,
    to: LifecyclePhase,
    start: () => void | Promise<void>,
  ): Promise<void> {
    await this.lock.dispatch(async () => {
      if (this._phase !== from) {
        throw new InvalidLifecycleTransitionError(operation, from, this._phase)
      }

      await start()

      if (PHASE_ORDER[to] > PHASE_ORDER[this._phase]) {
        this._phase = to
      }
    })
  }

  /**
   * Safe to call from any phase, any number of times
   */
  terminate(): void {
    this._phase = 'terminated'

    if (!this.abortController.signal.aborted) {
      this.abortController.abort()
    }
  }

  /**
   * Sleeps for `timeMs`, returning early when the lifecycle terminates
   */
  sleep(timeMs: number): Promise<void> {
    return PromiseUtils.sleep(timeMs, this.signal)
  }
}
