/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { LogLevel } from 'consola'
import { parseLogLevelConfig } from './logLevelParser'

describe('parseLogLevelConfig', () => {
  it('parses several comma separated entries in order', () => {
    const parsed = parseLogLevelConfig('*:warn,pushdetector:debug')

    expect(parsed).toEqual([
      ['*', LogLevel.Warn],
      ['pushdetector', LogLevel.Debug],
    ])
  })

  it('lowercases tags and levels', () => {
    expect(parseLogLevelConfig('ChainMonitor:InFo')).toEqual([['chainmonitor', LogLevel.Info]])
  })

  it('treats a bare level as the wildcard tag', () => {
    expect(parseLogLevelConfig('error')).toEqual([['*', LogLevel.Error]])
  })

  it('ignores whitespace and empty entries', () => {
    expect(parseLogLevelConfig(' notifier : verbose ,')).toEqual([
      ['notifier', LogLevel.Verbose],
    ])
  })

  it('throws on an unknown level', () => {
    expect(() => parseLogLevelConfig('polldetector:loud')).toThrow(
      'Log level loud should be one of the following',
    )
  })

  it('throws when an entry has too many colons', () => {
    expect(() => parseLogLevelConfig('tower::warn')).toThrow('Log levels must have format tag:level')
  })
})
