/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import colors from 'colors/safe'
import { ConsolaReporter, ConsolaReporterLogObject, LogLevel } from 'consola'
import { format as formatDate } from 'date-fns'
import { StringUtils } from '../../utils/string'

const COLORS = [
  colors.red,
  colors.green,
  colors.yellow,
  colors.blue,
  colors.magenta,
  colors.cyan,
  colors.white,
  colors.gray,
]

export abstract class TextReporter implements ConsolaReporter {
  /**
   * Maps tags to log level overrides.
   */
  readonly tagToLogLevelMap: Map<string, LogLevel> = new Map<string, LogLevel>()

  /**
   * The default minimum log level to display (inclusive),
   * if no specific overrides apply.
   */
  defaultMinimumLogLevel: LogLevel = LogLevel.Info

  /**
   * Prefix template string to prepend to all logs.
   */
  logPrefix = ''

  colorEnabled = false

  /**
   * `*` as a tag sets `defaultMinimumLogLevel`.
   */
  setLogLevel(tag: string, level: LogLevel): void {
    if (tag === '*') {
      this.defaultMinimumLogLevel = level
    } else {
      this.tagToLogLevelMap.set(tag, level)
    }
  }

  private shouldLog(logObj: ConsolaReporterLogObject): boolean {
    // logs with multiple tags come with the tags joined with ':'
    const tags = logObj.tag.split(':')

    // Start with the default log level, then let the most specific tag override it
    let level: LogLevel = this.defaultMinimumLogLevel
    for (const tag of tags) {
      const tagLevel = this.tagToLogLevelMap.get(tag)
      if (tagLevel !== undefined) {
        level = tagLevel
      }
    }

    return logObj.level <= level
  }

  private buildLogPrefix(logObj: ConsolaReporterLogObject): string {
    const formattedDate = formatDate(logObj.date, 'HH:mm:ss.SSS')
    let formattedTag = logObj.tag

    if (this.colorEnabled && formattedTag) {
      const index = StringUtils.hashToNumber(logObj.tag) % COLORS.length
      formattedTag = COLORS[index](logObj.tag)
    }

    return this.logPrefix
      .replace(/%time%/g, formattedDate)
      .replace(/%level%/g, logObj.type)
      .replace(/%tag%/g, formattedTag)
  }

  abstract logText(logObj: ConsolaReporterLogObject, args: unknown[]): void

  log(logObj: ConsolaReporterLogObject): void {
    if (!this.shouldLog(logObj)) {
      return
    }

    const args: unknown[] = [...logObj.args]

    if (this.logPrefix) {
      args.unshift(this.buildLogPrefix(logObj))
    }

    this.logText(logObj, args)
  }
}
