/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import parseJson from 'parse-json'
import { Assert } from '../assert'

/**
 * parse-json throws this, with a code frame when it can locate the error
 */
type JSONError = Error & { fileName?: string; codeFrame?: string }

function isJSONError(error: unknown): error is JSONError {
  return error instanceof Error && error.name === 'JSONError'
}

export class ParseJsonError extends Error {
  name = this.constructor.name
  jsonFileName: string
  jsonCodeFrame: string

  constructor(fileName: string, message: string, codeFrame: string) {
    super(`Parsing ${fileName} Failed\n${message}`)
    this.jsonFileName = fileName
    this.jsonCodeFrame = codeFrame
  }
}

function tryParse<T = unknown>(
  data: string,
  fileName?: string,
): [T, null] | [null, ParseJsonError] {
  try {
    const parsed: T = parseJson(data, fileName || '')
    return [parsed, null]
  } catch (e) {
    if (isJSONError(e)) {
      return [null, new ParseJsonError(e.fileName || fileName || '', e.message, e.codeFrame ?? '')]
    }

    throw e
  }
}

function parse<T = unknown>(data: string, fileName?: string): T {
  const [result, error] = tryParse<T>(data, fileName)
  if (error) {
    throw error
  }
  Assert.isNotNull(result)
  return result
}

export const JSONUtils = { parse, tryParse }
