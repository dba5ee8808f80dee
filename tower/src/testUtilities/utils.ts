/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import consola, { LogLevel } from 'consola'
import path from 'path'
import { v4 as uuid } from 'uuid'
import { Logger } from '../logger'
import { PromiseUtils } from '../utils'

export const TEST_DATA_DIR = path.join(process.cwd(), 'testdbs')

export function getUniqueTestDataDir(): string {
  return path.join(TEST_DATA_DIR, uuid())
}

/**
 * A logger with no reporters, so tests can spy on it without printing
 */
export function createTestLogger(): Logger {
  return consola.create({ reporters: [], level: LogLevel.Verbose })
}

/**
 * Polls `check` until it returns true, failing the test after `timeoutMs`
 */
export async function waitFor(
  check: () => boolean,
  timeoutMs = 2000,
  intervalMs = 5,
): Promise<void> {
  const deadline = Date.now() + timeoutMs

  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`)
    }

    await PromiseUtils.sleep(intervalMs)
  }
}

/**
 * A 64 character hex block hash that is unique per `seed`
 */
export function blockHash(seed: number | string): string {
  const hex = Buffer.from(String(seed)).toString('hex')
  return hex.padStart(64, '0').slice(-64)
}
