/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import crypto from 'crypto'

/**
 * A simple MD5 number hash from a string
 *
 * This is not meant for any production or cryptographic use just a
 * simple way to pick a stable color for a log tag
 */
function hashToNumber(value: string): number {
  return parseInt(crypto.createHash('md5').update(value).digest('hex').slice(0, 8), 16)
}

/**
 * Shortens a block hash for log output, `0000000000000a3f...9c1b`
 */
function shortHash(hash: string, length = 8): string {
  if (hash.length <= length * 2) {
    return hash
  }

  return `${hash.slice(0, length)}...${hash.slice(-length)}`
}

export const StringUtils = { hashToNumber, shortHash }
