/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { ErrorUtils } from '../utils'

export abstract class BitcoindError extends Error {
  name = this.constructor.name
}

export class BitcoindConnectionError extends BitcoindError {
  readonly error: unknown

  constructor(url: string, error: unknown) {
    super(`Could not connect to bitcoind at ${url}: ${ErrorUtils.renderError(error)}`)
    this.error = error
  }
}

export class BitcoindTimeoutError extends BitcoindError {
  readonly method: string

  constructor(method: string, timeoutMs: number) {
    super(`bitcoind did not answer ${method} within ${timeoutMs}ms`)
    this.method = method
  }
}

/**
 * bitcoind answered the call with an error object
 */
export class BitcoindRpcError extends BitcoindError {
  readonly method: string
  readonly code: number

  constructor(method: string, code: number, message: string) {
    super(`${method} failed with code ${code}: ${message}`)
    this.method = method
    this.code = code
  }
}

/**
 * The HTTP exchange itself failed, or the answer was not a JSON-RPC response
 */
export class BitcoindRequestError extends BitcoindError {
  readonly method: string
  readonly status: number | null

  constructor(method: string, status: number | null, message: string) {
    super(`${method} request failed${status ? ` with status ${status}` : ''}: ${message}`)
    this.method = method
    this.status = status
  }
}

/**
 * bitcoind runs a different chain than the tower was configured for
 */
export class BitcoindNetworkError extends BitcoindError {
  readonly expected: string
  readonly actual: string

  constructor(expected: string, actual: string) {
    super(`bitcoind is running on ${actual} but the tower is configured for ${expected}`)
    this.expected = expected
    this.actual = actual
  }
}
