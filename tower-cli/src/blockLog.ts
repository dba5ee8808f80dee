/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import {
  ChainTip,
  FileStore,
  FileSystem,
  Logger,
  StringUtils,
  WatchtowerConsumer,
} from '@towerd/tower'

export const BLOCK_LOG_FILE_NAME = 'blocklog.json'

type BlockLogData = {
  lastBlockHash: ChainTip
}

/**
 * Logs every block the tower delivers and remembers the last one, so a restart
 * replays what was missed while the daemon was down
 */
export class BlockLog implements WatchtowerConsumer {
  readonly name = 'blocklog'
  readonly logger: Logger
  readonly store: FileStore<BlockLogData>

  readonly sink = {
    push: async (hash: ChainTip): Promise<void> => {
      this.logger.info(`Block ${StringUtils.shortHash(hash)}`)
      await this.store.save({ lastBlockHash: hash })
    },
  }

  constructor(options: { files: FileSystem; dataDir: string; logger: Logger }) {
    this.store = new FileStore<BlockLogData>(options.files, BLOCK_LOG_FILE_NAME, options.dataDir)
    this.logger = options.logger.withTag('blocklog')
  }

  async loadLastBlockHash(): Promise<ChainTip | null> {
    const data = await this.store.load()
    return typeof data?.lastBlockHash === 'string' ? data.lastBlockHash : null
  }
}
