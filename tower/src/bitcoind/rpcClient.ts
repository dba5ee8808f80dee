/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import axios, { AxiosResponse } from 'axios'
import { v4 as uuid } from 'uuid'
import * as yup from 'yup'
import { ErrorUtils, YupSchema, YupSchemaResult, YupUtils } from '../utils'
import {
  BitcoindConnectionError,
  BitcoindRequestError,
  BitcoindRpcError,
  BitcoindTimeoutError,
} from './errors'

/**
 * Returned by bitcoind when a block hash is not in its index
 */
export const RPC_INVALID_ADDRESS_OR_KEY = -5

export const DEFAULT_RPC_TIMEOUT_MS = 30 * 1000

export type BitcoindRpcOptions = {
  host: string
  port: number
  user: string
  password: string
  timeoutMs?: number
}

export type BitcoindBlock = {
  hash: string
  /**
   * -1 when the block is not on the best chain
   */
  confirmations: number
  height: number
  previousblockhash?: string
  tx: string[]
}

export type BitcoindBlockchainInfo = {
  chain: string
  blocks: number
  bestblockhash: string
}

const RpcResponseSchema = yup
  .object({
    result: yup.mixed().nullable(),
    error: yup
      .object({
        code: yup.number().required(),
        message: yup.string().required(),
      })
      .nullable()
      .default(null),
  })
  .defined()

const BlockHashSchema = YupUtils.isBlockHash.defined()

const BlockSchema: yup.ObjectSchema<BitcoindBlock> = yup
  .object({
    hash: YupUtils.isBlockHash.defined(),
    confirmations: yup.number().integer().defined(),
    height: yup.number().integer().min(0).defined(),
    previousblockhash: YupUtils.isBlockHash.optional(),
    tx: yup.array(yup.string().defined()).defined(),
  })
  .defined()

const BlockchainInfoSchema: yup.ObjectSchema<BitcoindBlockchainInfo> = yup
  .object({
    chain: yup.string().defined(),
    blocks: yup.number().integer().min(0).defined(),
    bestblockhash: YupUtils.isBlockHash.defined(),
  })
  .defined()

/**
 * A JSON-RPC 1.0 client for bitcoind
 */
export class BitcoindRpcClient {
  readonly url: string
  readonly timeoutMs: number
  private readonly auth: { username: string; password: string }

  constructor(options: BitcoindRpcOptions) {
    this.url = `http://${options.host}:${options.port}`
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS
    this.auth = { username: options.user, password: options.password }
  }

  async getBestBlockHash(): Promise<string> {
    return this.call('getbestblockhash', [], BlockHashSchema)
  }

  /**
   * @returns the block, or null if bitcoind does not know it
   */
  async getBlock(hash: string): Promise<BitcoindBlock | null> {
    try {
      return await this.call('getblock', [hash, 1], BlockSchema)
    } catch (e: unknown) {
      if (e instanceof BitcoindRpcError && e.code === RPC_INVALID_ADDRESS_OR_KEY) {
        return null
      }
      throw e
    }
  }

  async getBlockchainInfo(): Promise<BitcoindBlockchainInfo> {
    return this.call('getblockchaininfo', [], BlockchainInfoSchema)
  }

  async call<S extends YupSchema>(
    method: string,
    params: unknown[],
    schema: S,
  ): Promise<YupSchemaResult<S>> {
    const response = await this.post(method, params)

    if (response.status === 401 || response.status === 403) {
      throw new BitcoindRequestError(method, response.status, 'invalid RPC credentials')
    }

    const { result: envelope, error: envelopeError } = await YupUtils.tryValidate(
      RpcResponseSchema,
      response.data,
    )

    if (envelopeError) {
      throw new BitcoindRequestError(method, response.status, envelopeError.message)
    }

    if (envelope.error) {
      throw new BitcoindRpcError(method, envelope.error.code, envelope.error.message)
    }

    const { result, error } = await YupUtils.tryValidate(schema, envelope.result)

    if (error) {
      throw new BitcoindRequestError(method, response.status, error.message)
    }

    return result
  }

  private async post(method: string, params: unknown[]): Promise<AxiosResponse<unknown>> {
    try {
      return await axios.post<unknown>(
        this.url,
        { jsonrpc: '1.0', id: uuid(), method, params },
        {
          auth: this.auth,
          timeout: this.timeoutMs,
          headers: { 'Content-Type': 'application/json' },
          // bitcoind reports RPC errors with a 500 and a JSON body
          validateStatus: () => true,
        },
      )
    } catch (e: unknown) {
      if (ErrorUtils.isConnectTimeOutError(e)) {
        throw new BitcoindTimeoutError(method, this.timeoutMs)
      }

      if (ErrorUtils.isConnectRefusedError(e) || ErrorUtils.isConnectResetError(e)) {
        throw new BitcoindConnectionError(this.url, e)
      }

      throw new BitcoindRequestError(method, null, ErrorUtils.renderError(e))
    }
  }
}
