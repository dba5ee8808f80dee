/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export class Assert {
  static isNotNull<T>(x: null | T, message?: string): asserts x is T {
    if (x === null) {
      throw new Error(message || `Expected value not to be null`)
    }
  }

  static isGreaterThan(a: number, b: number, message?: string): void {
    if (a <= b) {
      throw new Error(message || `Expected ${String(a)} to be greater than ${String(b)}`)
    }
  }
}
