/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import fs from 'fs'
import fsAsync from 'fs/promises'
import os from 'os'
import path from 'path'
import { FileSystem } from './fileSystem'

export class NodeFileProvider extends FileSystem {
  init(): Promise<FileSystem> {
    return Promise.resolve(this)
  }

  async access(path: fs.PathLike, mode?: number | undefined): Promise<void> {
    await fsAsync.access(path, mode)
  }

  async writeFile(path: string, data: string): Promise<void> {
    await fsAsync.writeFile(path, data)
  }

  async readFile(path: string): Promise<string> {
    return await fsAsync.readFile(path, { encoding: 'utf8' })
  }

  async mkdir(path: string, options: { recursive?: boolean }): Promise<void> {
    await fsAsync.mkdir(path, options)
  }

  resolve(_path: string): string {
    return path.resolve(this.expandTilde(_path))
  }

  join(...paths: string[]): string {
    return path.join(...paths)
  }

  dirname(_path: string): string {
    return path.dirname(_path)
  }

  async exists(_path: string): Promise<boolean> {
    return await this.access(_path)
      .then(() => true)
      .catch(() => false)
  }

  /**
   * Expands `~` to the home directory and `~+` to the current directory
   */
  private expandTilde(filePath: string): string {
    if (filePath.startsWith('~+')) {
      return path.join(process.cwd(), filePath.slice(2))
    }

    if (filePath.startsWith('~')) {
      const home = os.homedir()
      return home ? path.join(home, filePath.slice(1)) : filePath
    }

    return filePath
  }
}
