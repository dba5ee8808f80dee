/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import axios, { AxiosHeaders, AxiosResponse } from 'axios'
import { blockHash } from '../testUtilities'
import {
  BitcoindConnectionError,
  BitcoindRequestError,
  BitcoindRpcError,
  BitcoindTimeoutError,
} from './errors'
import { BitcoindRpcClient } from './rpcClient'

describe('BitcoindRpcClient', () => {
  const response = (status: number, data: unknown): AxiosResponse<unknown> => ({
    status,
    statusText: '',
    headers: {},
    config: { headers: new AxiosHeaders() },
    data,
  })

  const networkError = (code: string, message: string) =>
    Object.assign(new Error(message), { code })

  const setup = () => {
    const post = jest.spyOn(axios, 'post')

    const client = new BitcoindRpcClient({
      host: 'localhost',
      port: 18443,
      user: 'user',
      password: 'test-secret',
      timeoutMs: 1000,
    })

    return { post, client }
  }

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should call bitcoind with basic auth and a timeout', async () => {
    const { post, client } = setup()
    post.mockResolvedValue(response(200, { result: blockHash(1), error: null, id: 'x' }))

    await expect(client.getBestBlockHash()).resolves.toBe(blockHash(1))

    expect(post).toHaveBeenCalledWith(
      'http://localhost:18443',
      expect.objectContaining({ jsonrpc: '1.0', method: 'getbestblockhash', params: [] }),
      expect.objectContaining({
        auth: { username: 'user', password: 'test-secret' },
        timeout: 1000,
      }),
    )
  })

  it('should return a block with its parent and transactions', async () => {
    const { post, client } = setup()
    post.mockResolvedValue(
      response(200, {
        result: {
          hash: blockHash(2),
          confirmations: -1,
          height: 2,
          previousblockhash: blockHash(1),
          tx: ['tx-a', 'tx-b'],
          nonce: 7,
        },
        error: null,
        id: 'x',
      }),
    )

    await expect(client.getBlock(blockHash(2))).resolves.toEqual({
      hash: blockHash(2),
      confirmations: -1,
      height: 2,
      previousblockhash: blockHash(1),
      tx: ['tx-a', 'tx-b'],
    })

    expect(post).toHaveBeenCalledWith(
      'http://localhost:18443',
      expect.objectContaining({ method: 'getblock', params: [blockHash(2), 1] }),
      expect.anything(),
    )
  })

  it('should return null for a block bitcoind does not know', async () => {
    const { post, client } = setup()
    post.mockResolvedValue(
      response(500, { result: null, error: { code: -5, message: 'Block not found' }, id: 'x' }),
    )

    await expect(client.getBlock(blockHash(9))).resolves.toBeNull()
  })

  it('should throw other RPC errors', async () => {
    const { post, client } = setup()
    post.mockResolvedValue(
      response(500, {
        result: null,
        error: { code: -8, message: 'blockhash must be of length 64' },
        id: 'x',
      }),
    )

    const result = client.getBlock('abc')
    await expect(result).rejects.toThrow(BitcoindRpcError)
    await expect(result).rejects.toThrow(
      'getblock failed with code -8: blockhash must be of length 64',
    )
  })

  it('should report bad credentials', async () => {
    const { post, client } = setup()
    post.mockResolvedValue(response(401, ''))

    await expect(client.getBestBlockHash()).rejects.toThrow(
      new BitcoindRequestError('getbestblockhash', 401, 'invalid RPC credentials'),
    )
  })

  it('should reject a result of the wrong shape', async () => {
    const { post, client } = setup()
    post.mockResolvedValue(response(200, { result: 'not a hash', error: null, id: 'x' }))

    await expect(client.getBestBlockHash()).rejects.toThrow(BitcoindRequestError)
  })

  it('should map a timeout', async () => {
    const { post, client } = setup()
    post.mockRejectedValue(networkError('ECONNABORTED', 'timeout of 1000ms exceeded'))

    await expect(client.getBestBlockHash()).rejects.toThrow(
      new BitcoindTimeoutError('getbestblockhash', 1000),
    )
  })

  it('should map a refused connection', async () => {
    const { post, client } = setup()
    post.mockRejectedValue(networkError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:18443'))

    await expect(client.getBlockchainInfo()).rejects.toThrow(BitcoindConnectionError)
  })

  it('should return the chain the node runs', async () => {
    const { post, client } = setup()
    post.mockResolvedValue(
      response(200, {
        result: { chain: 'regtest', blocks: 3, bestblockhash: blockHash(3), headers: 3 },
        error: null,
        id: 'x',
      }),
    )

    await expect(client.getBlockchainInfo()).resolves.toEqual({
      chain: 'regtest',
      blocks: 3,
      bestblockhash: blockHash(3),
    })
  })
})
