/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import {
  DEFAULT_DATA_DIR,
  feedEndpoint,
  isBitcoinNetwork,
  NodeFileProvider,
  PromiseUtils,
  Watchtower,
} from '@towerd/tower'
import { BlockLog } from '../blockLog'
import { SIGNALS, TowerCommand } from '../command'
import {
  BtcFeedConnectFlag,
  BtcFeedConnectFlagKey,
  BtcFeedPortFlag,
  BtcFeedPortFlagKey,
  BtcNetworkFlag,
  BtcNetworkFlagKey,
  BtcRpcConnectFlag,
  BtcRpcConnectFlagKey,
  BtcRpcPasswordFlag,
  BtcRpcPasswordFlagKey,
  BtcRpcPortFlag,
  BtcRpcPortFlagKey,
  BtcRpcUserFlag,
  BtcRpcUserFlagKey,
} from '../flags'

export default class Start extends TowerCommand {
  static description = 'start the tower and follow the bitcoind chain tip'

  static flags = {
    [BtcNetworkFlagKey]: BtcNetworkFlag,
    [BtcRpcUserFlagKey]: BtcRpcUserFlag,
    [BtcRpcPasswordFlagKey]: BtcRpcPasswordFlag,
    [BtcRpcConnectFlagKey]: BtcRpcConnectFlag,
    [BtcRpcPortFlagKey]: BtcRpcPortFlag,
    [BtcFeedConnectFlagKey]: BtcFeedConnectFlag,
    [BtcFeedPortFlagKey]: BtcFeedPortFlag,
  }

  watchtower: Watchtower | null = null

  /**
   * Resolves once bootstrap is over, so closeFromSignal does not shut down a tower
   * that is still catching up
   */
  startDonePromise: Promise<void> | null = null

  async start(): Promise<void> {
    const [startDonePromise, startDoneResolve] = PromiseUtils.split<void>()
    this.startDonePromise = startDonePromise

    const { flags } = await this.parse(Start)
    const configOverrides = { ...this.configOverrides }

    const network = flags[BtcNetworkFlagKey]
    if (network !== undefined && isBitcoinNetwork(network)) {
      configOverrides.bitcoindNetwork = network
    }

    const rpcUser = flags[BtcRpcUserFlagKey]
    if (rpcUser !== undefined) {
      configOverrides.bitcoindRpcUser = rpcUser
    }

    const rpcPassword = flags[BtcRpcPasswordFlagKey]
    if (rpcPassword !== undefined) {
      configOverrides.bitcoindRpcPassword = rpcPassword
    }

    const rpcHost = flags[BtcRpcConnectFlagKey]
    if (rpcHost !== undefined) {
      configOverrides.bitcoindRpcHost = rpcHost
    }

    const rpcPort = flags[BtcRpcPortFlagKey]
    if (rpcPort !== undefined) {
      configOverrides.bitcoindRpcPort = rpcPort
    }

    const feedHost = flags[BtcFeedConnectFlagKey]
    if (feedHost !== undefined) {
      configOverrides.bitcoindFeedHost = feedHost
    }

    const feedPort = flags[BtcFeedPortFlagKey]
    if (feedPort !== undefined) {
      configOverrides.bitcoindFeedPort = feedPort
    }

    const fileSystem = await new NodeFileProvider().init()
    const dataDir = fileSystem.resolve(this.dataDir ?? DEFAULT_DATA_DIR)
    await fileSystem.mkdir(dataDir, { recursive: true })

    const blockLog = new BlockLog({ files: fileSystem, dataDir, logger: this.logger })

    const watchtower = await Watchtower.init({
      consumers: [blockLog],
      configName: this.configName,
      configOverrides,
      fileSystem,
      dataDir,
      logger: this.logger,
    })
    this.watchtower = watchtower

    const { config } = watchtower
    const feed = feedEndpoint({
      protocol: config.get('bitcoindFeedProtocol'),
      host: config.get('bitcoindFeedHost'),
      port: config.get('bitcoindFeedPort'),
    })

    this.log(`Network       ${config.get('bitcoindNetwork')}`)
    this.log(`bitcoind RPC  ${config.get('bitcoindRpcHost')}:${config.rpcPort}`)
    this.log(`bitcoind ZMQ  ${feed}`)
    this.log(`Data Dir      ${dataDir}`)
    this.log(` `)

    await watchtower.start()

    startDoneResolve()
    this.listenForSignals()
    await watchtower.waitForShutdown()
  }

  async closeFromSignal(signal: SIGNALS): Promise<void> {
    this.log(`Shutting down the tower after ${signal}`)
    await this.startDonePromise
    await this.watchtower?.shutdown()
  }
}
