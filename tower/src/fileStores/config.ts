/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import * as yup from 'yup'
import { FileSystem } from '../fileSystems'
import { YupUtils } from '../utils'
import { KeyStore } from './keyStore'

export const DEFAULT_CONFIG_NAME = 'config.json'
export const DEFAULT_DATA_DIR = '~/.towerd'
export const DEFAULT_FEED_PORT = 28332
export const DEFAULT_POLLING_INTERVAL = 60
export const DEFAULT_RECENCY_WINDOW_SIZE = 10

export const BITCOIN_NETWORKS = ['mainnet', 'testnet', 'regtest', 'signet'] as const
export type BitcoinNetwork = (typeof BITCOIN_NETWORKS)[number]

export function isBitcoinNetwork(value: string): value is BitcoinNetwork {
  return BITCOIN_NETWORKS.some((network) => network === value)
}

/**
 * The RPC port bitcoind listens on by default for each network
 */
export const DEFAULT_RPC_PORTS: Readonly<Record<BitcoinNetwork, number>> = {
  mainnet: 8332,
  testnet: 18332,
  regtest: 18443,
  signet: 38332,
}

export type ConfigOptions = {
  bitcoindNetwork: BitcoinNetwork
  bitcoindRpcHost: string
  /**
   * Falls back to the default port of `bitcoindNetwork` when not set
   */
  bitcoindRpcPort: number
  bitcoindRpcUser: string
  bitcoindRpcPassword: string
  bitcoindRpcTimeoutMs: number
  /**
   * Where bitcoind publishes `zmqpubhashblock`, as `protocol://host:port`
   */
  bitcoindFeedProtocol: string
  bitcoindFeedHost: string
  bitcoindFeedPort: number
  /**
   * Seconds between two `getbestblockhash` polls
   */
  chainPollingInterval: number
  /**
   * How many superseded tips are remembered to tell reorg repeats from new tips
   */
  chainRecencyWindowSize: number
  /**
   * Log levels are formatted like so:
   * `*:warn,tag:info`
   *
   * ex: `*:warn,chainmonitor:info` displays warns and errors, as well as info
   *     logs from the chain monitor and its detectors.
   */
  logLevel: string
  /**
   * String to be prefixed to all logs. Accepts the following replacements:
   * %time% : The time of the log
   * %tag% : The tags on the log
   * %level% : The log level
   */
  logPrefix: string
  enableLogColor: boolean
}

export const ConfigOptionsSchema: yup.ObjectSchema<Partial<ConfigOptions>> = yup
  .object({
    bitcoindNetwork: yup.mixed<BitcoinNetwork>().oneOf([...BITCOIN_NETWORKS]),
    bitcoindRpcHost: yup.string().trim(),
    bitcoindRpcPort: YupUtils.isPort,
    bitcoindRpcUser: yup.string(),
    bitcoindRpcPassword: yup.string(),
    bitcoindRpcTimeoutMs: yup.number().integer().min(1),
    bitcoindFeedProtocol: yup.string().trim(),
    bitcoindFeedHost: yup.string().trim(),
    bitcoindFeedPort: YupUtils.isPort,
    chainPollingInterval: yup.number().integer().min(1),
    chainRecencyWindowSize: yup.number().integer().min(1),
    // validated separately by logLevelParser
    logLevel: yup.string(),
    logPrefix: yup.string(),
    enableLogColor: yup.boolean(),
  })
  .defined()

export class Config extends KeyStore<ConfigOptions> {
  constructor(files: FileSystem, dataDir: string, configName?: string) {
    super(files, configName || DEFAULT_CONFIG_NAME, Config.GetDefaults(), dataDir, ConfigOptionsSchema)
  }

  /**
   * The RPC port to dial, either configured or the network's default
   */
  get rpcPort(): number {
    if (this.isSet('bitcoindRpcPort')) {
      return this.get('bitcoindRpcPort')
    }

    return DEFAULT_RPC_PORTS[this.get('bitcoindNetwork')]
  }

  get pollingIntervalMs(): number {
    return this.get('chainPollingInterval') * 1000
  }

  static GetDefaults(): ConfigOptions {
    return {
      bitcoindNetwork: 'mainnet',
      bitcoindRpcHost: 'localhost',
      bitcoindRpcPort: DEFAULT_RPC_PORTS.mainnet,
      bitcoindRpcUser: 'user',
      bitcoindRpcPassword: 'passwd',
      bitcoindRpcTimeoutMs: 30 * 1000,
      bitcoindFeedProtocol: 'tcp',
      bitcoindFeedHost: 'localhost',
      bitcoindFeedPort: DEFAULT_FEED_PORT,
      chainPollingInterval: DEFAULT_POLLING_INTERVAL,
      chainRecencyWindowSize: DEFAULT_RECENCY_WINDOW_SIZE,
      logLevel: '*:info',
      logPrefix: '[%time%] [%level%] [%tag%]',
      enableLogColor: false,
    }
  }
}
