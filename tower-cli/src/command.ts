/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import {
  BitcoindConnectionError,
  BitcoindNetworkError,
  ConfigOptions,
  createRootLogger,
  ErrorUtils,
  Logger,
  NoCommonAncestorError,
} from '@towerd/tower'
import { Command, Config } from '@oclif/core'
import {
  ConfigFlag,
  ConfigFlagKey,
  DataDirFlag,
  DataDirFlagKey,
  VerboseFlag,
  VerboseFlagKey,
} from './flags'

export type SIGNALS = 'SIGTERM' | 'SIGINT' | 'SIGQUIT'

export abstract class TowerCommand extends Command {
  /**
   * Use this logger instance for debug/error output.
   * Actual command output should use `this.log` instead.
   */
  logger: Logger

  /**
   * Set to true when the command is closing so any async things in the command can interrupt and quit
   */
  closing = false

  /**
   * Config values set by the global flags, applied over the config file
   */
  configOverrides: Partial<ConfigOptions> = {}
  configName: string | undefined
  dataDir: string | undefined

  public static baseFlags = {
    [VerboseFlagKey]: VerboseFlag,
    [ConfigFlagKey]: ConfigFlag,
    [DataDirFlagKey]: DataDirFlag,
  }

  constructor(argv: string[], config: Config) {
    super(argv, config)
    this.logger = createRootLogger().withTag(this.ctor.id)
  }

  abstract start(): Promise<unknown> | void

  async run(): Promise<unknown> {
    try {
      return await this.start()
    } catch (error: unknown) {
      if (error instanceof BitcoindConnectionError) {
        this.log(`Cannot connect to bitcoind, make sure it is running: ${error.message}`)
        this.exit(1)
      } else if (error instanceof BitcoindNetworkError) {
        this.log(error.message)
        this.exit(1)
      } else if (error instanceof NoCommonAncestorError) {
        this.log(`${error.message}. The data dir may belong to another chain.`)
        this.exit(1)
      } else if (error instanceof Error) {
        // eslint-disable-next-line no-console
        console.error(ErrorUtils.renderError(error, true))
        this.exit(1)
      } else {
        throw error
      }
    }

    this.exit(0)
  }

  async init(): Promise<void> {
    const { flags } = await this.parse(this.ctor)

    // The flags of the running command are not known here
    const values: Record<string, unknown> = flags

    const verboseFlag = values[VerboseFlagKey]
    if (typeof verboseFlag === 'boolean' && verboseFlag !== VerboseFlag.default) {
      this.configOverrides.logLevel = '*:verbose'
    }

    const configFlag = values[ConfigFlagKey]
    this.configName = typeof configFlag === 'string' ? configFlag : undefined

    const dataDirFlag = values[DataDirFlagKey]
    this.dataDir = typeof dataDirFlag === 'string' ? dataDirFlag : undefined
  }

  listenForSignals(): void {
    const signals: SIGNALS[] = ['SIGINT', 'SIGTERM', 'SIGQUIT']

    for (const signal of signals) {
      const gracefulShutdown = (signal: NodeJS.Signals) => {
        if (this.closing) {
          return
        }

        // Allow 3 seconds for graceful termination
        setTimeout(() => {
          this.log('Force closing after 3 seconds')
          process.exit(1)
        }, 3000).unref()

        this.closing = true
        const promise = this.closeFromSignal(signal).catch((err) => {
          this.logger.error(`Failed to close ${ErrorUtils.renderError(err)}`)
        })

        void promise.then(() => {
          process.exit(0)
        })
      }

      process.once(signal, gracefulShutdown)
    }
  }

  closeFromSignal(signal: NodeJS.Signals): Promise<unknown> {
    throw new Error(`Not implemented closeFromSignal: ${signal}`)
  }
}
