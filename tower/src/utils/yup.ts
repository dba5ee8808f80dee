/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import * as yup from 'yup'
import { UnwrapPromise } from './types'

export type YupSchema<Result = unknown, Context = yup.AnyObject> = yup.Schema<Result, Context>

export type YupSchemaResult<S extends yup.Schema<unknown, yup.AnyObject>> = UnwrapPromise<
  ReturnType<S['validate']>
>

export class YupUtils {
  static isPort = yup.number().integer().min(1).max(65535)

  /**
   * A 32 byte block hash in hex, as bitcoind renders it
   */
  static isBlockHash = yup
    .string()
    .matches(/^[0-9a-f]{64}$/, '${path} must be a 64 character hex block hash')

  static async tryValidate<S extends YupSchema>(
    schema: S,
    value: unknown,
    options?: yup.ValidateOptions<yup.AnyObject>,
  ): Promise<
    { result: YupSchemaResult<S>; error: null } | { result: null; error: yup.ValidationError }
  > {
    if (!options) {
      options = { stripUnknown: true }
    }

    if (options.stripUnknown === undefined) {
      options.stripUnknown = true
    }

    try {
      const result = await schema.validate(value, options)
      return { result: result as YupSchemaResult<S>, error: null }
    } catch (e) {
      if (e instanceof yup.ValidationError) {
        return { result: null, error: e }
      }
      throw e
    }
  }
}
