/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Consola } from 'consola'
import consola, { LogLevel } from 'consola'
import { parseLogLevelConfig } from './logLevelParser'
import { ConsoleReporter } from './reporters/console'

export type Logger = Consola

export const ConsoleReporterInstance = new ConsoleReporter()

/**
 * Updates the reporter's log levels from a config string.
 *
 * Format is like so: `*:warn,pushdetector:debug`
 */
export const setLogLevelFromConfig = (logLevelConfig: string): void => {
  for (const [tag, level] of parseLogLevelConfig(logLevelConfig)) {
    ConsoleReporterInstance.setLogLevel(tag, level)
  }
}

/**
 * Format is like so: `[%time%] [%level%] [%tag%]`
 */
export const setLogPrefixFromConfig = (logPrefix: string): void => {
  ConsoleReporterInstance.logPrefix = logPrefix
}

export const setLogColorEnabledFromConfig = (enabled: boolean): void => {
  ConsoleReporterInstance.colorEnabled = enabled
}

export const createRootLogger = (): Logger => {
  return consola.create({
    reporters: [ConsoleReporterInstance],
    // Filtering happens per tag in the reporter, so let everything through here
    level: LogLevel.Verbose,
  })
}
