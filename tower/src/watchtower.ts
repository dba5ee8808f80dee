/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import {
  BitcoindNetworkError,
  BitcoindNodeClient,
  BitcoindRpcClient,
  ZmqTipFeed,
} from './bitcoind'
import {
  BootstrapReconciler,
  ChainMonitor,
  ChainTip,
  ConsumerSink,
  NodeClient,
  ReconcileResult,
  TipFeed,
} from './chainMonitor'
import { BitcoinNetwork, Config, ConfigOptions, DEFAULT_DATA_DIR } from './fileStores'
import { FileSystem, NodeFileProvider } from './fileSystems'
import {
  createRootLogger,
  Logger,
  setLogColorEnabledFromConfig,
  setLogLevelFromConfig,
  setLogPrefixFromConfig,
} from './logger'

/**
 * The name `getblockchaininfo` reports for each network
 */
export const BITCOIND_CHAIN_NAMES: Readonly<Record<BitcoinNetwork, string>> = {
  mainnet: 'main',
  testnet: 'test',
  regtest: 'regtest',
  signet: 'signet',
}

/**
 * A component that wants to hear about new blocks, such as the watcher or the responder
 */
export type WatchtowerConsumer = {
  name: string
  sink: ConsumerSink
  /**
   * The last block the consumer processed in a previous run, null if it never ran
   */
  loadLastBlockHash(): Promise<ChainTip | null> | ChainTip | null
}

export class Watchtower {
  readonly config: Config
  readonly fileSystem: FileSystem
  readonly logger: Logger
  readonly rpc: BitcoindRpcClient
  readonly nodeClient: NodeClient
  readonly monitor: ChainMonitor
  readonly reconciler: BootstrapReconciler
  readonly consumers: readonly WatchtowerConsumer[]
  readonly dataDir: string

  private constructor(options: {
    config: Config
    fileSystem: FileSystem
    logger: Logger
    rpc: BitcoindRpcClient
    nodeClient: NodeClient
    monitor: ChainMonitor
    consumers: readonly WatchtowerConsumer[]
    dataDir: string
  }) {
    this.config = options.config
    this.fileSystem = options.fileSystem
    this.logger = options.logger
    this.rpc = options.rpc
    this.nodeClient = options.nodeClient
    this.monitor = options.monitor
    this.consumers = options.consumers
    this.dataDir = options.dataDir
    this.reconciler = new BootstrapReconciler({ nodeClient: this.nodeClient, logger: this.logger })
  }

  static async init({
    consumers,
    configName,
    configOverrides,
    fileSystem,
    dataDir,
    logger = createRootLogger(),
    rpc,
    nodeClient,
    createFeed,
  }: {
    consumers: readonly WatchtowerConsumer[]
    configName?: string
    configOverrides?: Partial<ConfigOptions>
    fileSystem?: FileSystem
    dataDir?: string
    logger?: Logger
    rpc?: BitcoindRpcClient
    nodeClient?: NodeClient
    createFeed?: () => TipFeed
  }): Promise<Watchtower> {
    if (!fileSystem) {
      fileSystem = await new NodeFileProvider().init()
    }

    logger = logger.withTag('watchtower')
    dataDir = dataDir || DEFAULT_DATA_DIR

    const config = new Config(fileSystem, dataDir, configName)
    await config.load()

    if (configOverrides) {
      Object.assign(config.overrides, configOverrides)
    }

    // Update the logger settings
    const logLevel = config.get('logLevel')
    if (logLevel) {
      setLogLevelFromConfig(logLevel)
    }
    const logPrefix = config.get('logPrefix')
    if (logPrefix) {
      setLogPrefixFromConfig(logPrefix)
    }
    setLogColorEnabledFromConfig(config.get('enableLogColor'))

    rpc =
      rpc ??
      new BitcoindRpcClient({
        host: config.get('bitcoindRpcHost'),
        port: config.rpcPort,
        user: config.get('bitcoindRpcUser'),
        password: config.get('bitcoindRpcPassword'),
        timeoutMs: config.get('bitcoindRpcTimeoutMs'),
      })

    nodeClient = nodeClient ?? new BitcoindNodeClient(rpc)

    const feedParams = {
      protocol: config.get('bitcoindFeedProtocol'),
      host: config.get('bitcoindFeedHost'),
      port: config.get('bitcoindFeedPort'),
    }

    const monitor = new ChainMonitor({
      sinks: consumers.map((c) => c.sink),
      nodeClient,
      createFeed: createFeed ?? (() => new ZmqTipFeed(feedParams)),
      pollingIntervalMs: config.pollingIntervalMs,
      windowSize: config.get('chainRecencyWindowSize'),
      logger,
    })

    return new Watchtower({
      config,
      fileSystem,
      logger,
      rpc,
      nodeClient,
      monitor,
      consumers,
      dataDir,
    })
  }

  /**
   * Catches the consumers up with the node and starts delivering new blocks.
   *
   * @returns what each consumer missed, including transactions of blocks that were
   * reorged out while the tower was down
   */
  async start(): Promise<ReconcileResult[]> {
    await this.checkNetwork()

    const consumers = await Promise.all(
      this.consumers.map(async (consumer) => ({
        name: consumer.name,
        sink: consumer.sink,
        lastKnownBlockHash: await consumer.loadLastBlockHash(),
      })),
    )

    if (consumers.every((c) => c.lastKnownBlockHash === null)) {
      this.logger.info('Fresh bootstrap')
    } else {
      this.logger.info('Bootstrapping from backed up data')
    }

    const results = await this.reconciler.reconcile(consumers)
    this.reconciler.replay(this.monitor, results)

    await this.monitor.monitorChain()
    await this.monitor.activate()

    this.logger.info(`Watching the ${this.config.get('bitcoindNetwork')} chain`)
    return results
  }

  /**
   * Resolves once the monitor has stopped, whoever terminated it
   */
  async waitForShutdown(): Promise<void> {
    await this.monitor.wait()
  }

  async shutdown(): Promise<void> {
    this.monitor.terminate()
    await this.monitor.wait()
    this.logger.info('Shut down')
  }

  private async checkNetwork(): Promise<void> {
    const network = this.config.get('bitcoindNetwork')
    const info = await this.rpc.getBlockchainInfo()

    if (info.chain !== BITCOIND_CHAIN_NAMES[network]) {
      throw new BitcoindNetworkError(BITCOIND_CHAIN_NAMES[network], info.chain)
    }
  }
}
