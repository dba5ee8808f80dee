/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import * as yup from 'yup'
import { FileSystem } from '../fileSystems'
import { PartialRecursive, YupUtils } from '../utils'
import { FileStore } from './fileStore'

/**
 * A typed key/value store backed by a JSON file.
 *
 * Values resolve through three layers, most specific first: overrides (set at
 * runtime, never saved), loaded values (from the file) and defaults.
 */
export class KeyStore<TSchema extends Record<string, unknown>> {
  dataDir: string
  files: FileSystem
  storage: FileStore<TSchema>
  config: Readonly<TSchema>
  defaults: TSchema
  loaded: Partial<TSchema>
  overrides: Partial<TSchema> = {}
  keysLoaded = new Set<keyof TSchema>()
  schema: yup.ObjectSchema<Partial<TSchema>> | undefined

  constructor(
    files: FileSystem,
    fileName: string,
    defaults: TSchema,
    dataDir: string,
    schema?: yup.ObjectSchema<Partial<TSchema>>,
  ) {
    this.files = files
    this.storage = new FileStore<TSchema>(files, fileName, dataDir)
    this.schema = schema
    this.dataDir = this.storage.dataDir

    const loaded = Object.setPrototypeOf({}, defaults) as TSchema
    const overrides = Object.setPrototypeOf({}, loaded) as TSchema
    const config = Object.setPrototypeOf({}, overrides) as TSchema

    this.defaults = defaults
    this.loaded = loaded
    this.overrides = overrides
    this.config = config
  }

  async load(): Promise<void> {
    const data = await this.storage.load()

    if (this.schema && data !== null) {
      const { error, result } = await YupUtils.tryValidate(this.schema, data)

      if (error) {
        throw new Error(`Invalid ${this.storage.fileName}: ${error.message}`)
      }

      Object.assign(data, result)
    }

    this.keysLoaded.clear()

    if (data !== null) {
      let key: keyof TSchema

      for (key in data) {
        this.keysLoaded.add(key)
      }
    }

    this.loaded = { ...data } as Partial<TSchema>

    // Patch back in inheritance so config is still TSchema
    Object.setPrototypeOf(this.loaded, this.defaults)
    Object.setPrototypeOf(this.overrides, this.loaded)

    if (data === null) {
      await this.save()
    }
  }

  async save(): Promise<void> {
    const save: PartialRecursive<TSchema> = {}

    let key: keyof TSchema
    for (key in this.loaded) {
      if (this.keysLoaded.has(key) || this.loaded[key] !== this.defaults[key]) {
        Object.assign(save, { [key]: this.loaded[key] })
      }
    }

    await this.storage.save(save)
  }

  set<T extends keyof TSchema>(key: T, value: TSchema[T]): void {
    if (this.schema) {
      // throws a ValidationError naming the key
      value = this.schema.validateSyncAt(String(key), { [key]: value })
    }

    Object.assign(this.loaded, { [key]: value })
    this.keysLoaded.add(key)

    if (Object.prototype.hasOwnProperty.call(this.overrides, key)) {
      delete this.overrides[key]
    }
  }

  setOverride<T extends keyof TSchema>(key: T, value: TSchema[T]): void {
    Object.assign(this.overrides, { [key]: value })
  }

  get<T extends keyof TSchema>(key: T): TSchema[T] {
    return this.config[key]
  }

  /**
   * Returns true if the key is set, or false if its value is from the defaults
   */
  isSet<T extends keyof TSchema>(key: T): boolean {
    return this.keysLoaded.has(key) || Object.prototype.hasOwnProperty.call(this.overrides, key)
  }
}
