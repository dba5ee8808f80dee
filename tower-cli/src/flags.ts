/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { BITCOIN_NETWORKS, DEFAULT_CONFIG_NAME, DEFAULT_DATA_DIR } from '@towerd/tower'
import { Flags } from '@oclif/core'

export const VerboseFlagKey = 'verbose'
export const ConfigFlagKey = 'config'
export const DataDirFlagKey = 'datadir'
export const BtcNetworkFlagKey = 'btcnetwork'
export const BtcRpcUserFlagKey = 'btcrpcuser'
export const BtcRpcPasswordFlagKey = 'btcrpcpassword'
export const BtcRpcConnectFlagKey = 'btcrpcconnect'
export const BtcRpcPortFlagKey = 'btcrpcport'
export const BtcFeedConnectFlagKey = 'btcfeedconnect'
export const BtcFeedPortFlagKey = 'btcfeedport'

export const VerboseFlag = Flags.boolean({
  char: 'v',
  default: false,
  description: 'Set logging level to verbose',
  helpGroup: 'GLOBAL',
})

export const ConfigFlag = Flags.string({
  default: DEFAULT_CONFIG_NAME,
  description: 'The name of the config file to use',
  helpGroup: 'GLOBAL',
})

export const DataDirFlag = Flags.string({
  char: 'd',
  default: DEFAULT_DATA_DIR,
  description: 'The path to the data dir',
  env: 'TOWERD_DATA_DIR',
  helpGroup: 'GLOBAL',
})

export const BtcNetworkFlag = Flags.string({
  description: 'The network bitcoind runs on',
  options: [...BITCOIN_NETWORKS],
  helpGroup: 'BITCOIND',
})

export const BtcRpcUserFlag = Flags.string({
  description: 'The bitcoind RPC username',
  helpGroup: 'BITCOIND',
})

export const BtcRpcPasswordFlag = Flags.string({
  description: 'The bitcoind RPC password',
  helpGroup: 'BITCOIND',
})

export const BtcRpcConnectFlag = Flags.string({
  description: 'The host bitcoind serves RPC on',
  helpGroup: 'BITCOIND',
})

export const BtcRpcPortFlag = Flags.integer({
  description: 'The port bitcoind serves RPC on, defaults to the network port',
  min: 1,
  max: 65535,
  helpGroup: 'BITCOIND',
})

export const BtcFeedConnectFlag = Flags.string({
  description: 'The host bitcoind publishes block hashes on over ZMQ',
  helpGroup: 'BITCOIND',
})

export const BtcFeedPortFlag = Flags.integer({
  description: 'The port bitcoind publishes block hashes on over ZMQ',
  min: 1,
  max: 65535,
  helpGroup: 'BITCOIND',
})
