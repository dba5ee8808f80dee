/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { FileSystem } from '../fileSystems'
import { Mutex } from '../mutex'
import { JSONUtils, PartialRecursive } from '../utils'

/**
 * A JSON document stored at `dataDir/fileName`
 */
export class FileStore<T extends Record<string, unknown>> {
  files: FileSystem
  dataDir: string
  filePath: string
  fileName: string
  saveFileMutex = new Mutex()

  constructor(files: FileSystem, fileName: string, dataDir: string) {
    this.files = files
    this.dataDir = files.resolve(dataDir)
    this.fileName = fileName
    this.filePath = files.join(this.dataDir, fileName)
  }

  async load(): Promise<PartialRecursive<T> | null> {
    if (!(await this.files.exists(this.filePath))) {
      return null
    }

    const data = await this.files.readFile(this.filePath)

    if (data.trim().length === 0) {
      return null
    }

    return JSONUtils.parse<PartialRecursive<T>>(data, this.fileName)
  }

  async save(data: PartialRecursive<T>): Promise<void> {
    const json = JSON.stringify(data, undefined, '    ')

    await this.saveFileMutex.dispatch(async () => {
      await this.files.mkdir(this.files.dirname(this.filePath), { recursive: true })
      await this.files.writeFile(this.filePath, json)
    })
  }
}
