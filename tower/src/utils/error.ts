/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * This is used to unwrap a message from an error
 *
 * Falls back to JSON.stringify the error if we cannot get the message
 */
export function renderError(error: unknown, stack = false): string {
  if (!error) {
    return ''
  }

  if (stack && error instanceof Error && error.stack) {
    // stack also contains the error message
    return error.stack
  }

  if (error instanceof Error) {
    return error.message
  }

  if (typeof error === 'string') {
    return error
  }

  return JSON.stringify(error)
}

function isNodeError(error: unknown): error is Error & { code: string } {
  return error instanceof Error && 'code' in error && typeof error['code'] === 'string'
}

function isConnectRefusedError(error: unknown): error is Error & { code: 'ECONNREFUSED' } {
  return isNodeError(error) && error.code === 'ECONNREFUSED'
}

function isConnectResetError(error: unknown): error is Error & { code: 'ECONNRESET' } {
  return isNodeError(error) && error.code === 'ECONNRESET'
}

function isConnectTimeOutError(
  error: unknown,
): error is Error & { code: 'ETIMEDOUT' | 'ECONNABORTED' } {
  return isNodeError(error) && (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED')
}

export const ErrorUtils = {
  renderError,
  isConnectRefusedError,
  isConnectResetError,
  isConnectTimeOutError,
  isNodeError,
}
