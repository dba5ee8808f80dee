/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { LogLevel } from 'consola'

const configToLogLevel: {
  [key: string]: LogLevel | undefined
} = Object.freeze({
  fatal: LogLevel.Fatal,
  error: LogLevel.Error,
  warn: LogLevel.Warn,
  log: LogLevel.Log,
  info: LogLevel.Info,
  success: LogLevel.Success,
  debug: LogLevel.Debug,
  trace: LogLevel.Trace,
  silent: LogLevel.Silent,
  verbose: LogLevel.Verbose,
})

const configLevelToLogLevel = (level: string): LogLevel => {
  const configLevel = configToLogLevel[level.trim().toLowerCase()]

  if (configLevel === undefined) {
    throw new Error(
      `Log level ${level} should be one of the following: ${Object.keys(configToLogLevel).join(
        ', ',
      )}`,
    )
  }

  return configLevel
}

/**
 * Parses a log level config string into tags and log levels.
 *
 * ex: `*:warn,chainmonitor:info`
 * @throws if an entry is not `level` or `tag:level`, or names an unknown level
 */
export const parseLogLevelConfig = (
  logLevelConfig: string,
): ReadonlyArray<[string, LogLevel]> => {
  return logLevelConfig
    .split(',')
    .filter((entry) => entry.trim().length > 0)
    .map((entry) => {
      const levelParams = entry.split(':')

      // A bare level applies to every tag
      if (levelParams.length === 1) {
        levelParams.unshift('*')
      }

      if (levelParams.length !== 2) {
        throw new Error('Log levels must have format tag:level')
      }

      const tag = levelParams[0].trim().toLowerCase()
      const level = configLevelToLogLevel(levelParams[1])

      return [tag, level]
    })
}
