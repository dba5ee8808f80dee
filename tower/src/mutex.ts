/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export type MutexUnlockFunction = () => void

/**
 * A FIFO async lock. Callers are granted the lock in the order they asked for it.
 */
export class Mutex {
  private mutex = Promise.resolve()
  private waiting = 0

  get locked(): boolean {
    return this.waiting > 0
  }

  lock(): PromiseLike<MutexUnlockFunction> {
    let begin: (unlock: MutexUnlockFunction) => void
    this.waiting++

    this.mutex = this.mutex.then(() => {
      return new Promise(begin)
    })

    return new Promise<MutexUnlockFunction>((resolve) => {
      begin = (unlock) => {
        resolve(() => {
          this.waiting--
          unlock()
        })
      }
    })
  }

  async dispatch<T>(fn: (() => T) | (() => PromiseLike<T>)): Promise<T> {
    const unlock = await this.lock()
    try {
      return await Promise.resolve(fn())
    } finally {
      unlock()
    }
  }
}
