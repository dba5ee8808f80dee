/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { NodeFileProvider } from '../fileSystems'
import { getUniqueTestDataDir } from '../testUtilities'
import { ParseJsonError } from '../utils'
import { Config, DEFAULT_CONFIG_NAME, isBitcoinNetwork } from './config'

describe('Config', () => {
  it('should write an empty config on first load', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()

    const config = new Config(files, dir)
    await config.load()

    const written = await files.readFile(files.join(dir, DEFAULT_CONFIG_NAME))
    expect(JSON.parse(written)).toEqual({})
    expect(config.get('chainPollingInterval')).toBe(60)
    expect(config.get('chainRecencyWindowSize')).toBe(10)
  })

  it('should load and save config', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()

    let config = new Config(files, dir)
    await config.load()
    expect(config.isSet('bitcoindFeedPort')).toBe(false)

    config.set('bitcoindFeedPort', 28444)
    await config.save()

    config = new Config(files, dir)
    await config.load()

    expect(config.isSet('bitcoindFeedPort')).toBe(true)
    expect(config.get('bitcoindFeedPort')).toBe(28444)
  })

  it('should not save overrides', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()

    const config = new Config(files, dir)
    await config.load()

    config.setOverride('logLevel', '*:debug')
    expect(config.get('logLevel')).toBe('*:debug')
    await config.save()

    const reloaded = new Config(files, dir)
    await reloaded.load()
    expect(reloaded.get('logLevel')).toBe('*:info')
  })

  it('should pick the RPC port of the configured network', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()

    const config = new Config(files, dir)
    await config.load()
    expect(config.rpcPort).toBe(8332)

    config.setOverride('bitcoindNetwork', 'regtest')
    expect(config.rpcPort).toBe(18443)

    config.set('bitcoindRpcPort', 9999)
    expect(config.rpcPort).toBe(9999)
  })

  it('should convert the polling interval to milliseconds', async () => {
    const config = new Config(await new NodeFileProvider().init(), getUniqueTestDataDir())
    config.setOverride('chainPollingInterval', 5)
    expect(config.pollingIntervalMs).toBe(5000)
  })

  it('should reject invalid values in the config file', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()

    await files.mkdir(dir, { recursive: true })
    await files.writeFile(
      files.join(dir, DEFAULT_CONFIG_NAME),
      JSON.stringify({ bitcoindRpcPort: 70000 }),
    )

    const config = new Config(files, dir)
    await expect(config.load()).rejects.toThrow(
      'Invalid config.json: bitcoindRpcPort must be less than or equal to 65535',
    )
  })

  it('should reject a malformed config file', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()

    await files.mkdir(dir, { recursive: true })
    await files.writeFile(files.join(dir, DEFAULT_CONFIG_NAME), '{ "logLevel": ')

    const config = new Config(files, dir)
    await expect(config.load()).rejects.toBeInstanceOf(ParseJsonError)
  })

  it('should validate values when they are set', async () => {
    const config = new Config(await new NodeFileProvider().init(), getUniqueTestDataDir())
    expect(() => config.set('chainRecencyWindowSize', 0)).toThrow(
      'chainRecencyWindowSize must be greater than or equal to 1',
    )
  })

  it('should recognize the supported networks', () => {
    expect(isBitcoinNetwork('regtest')).toBe(true)
    expect(isBitcoinNetwork('signet')).toBe(true)
    expect(isBitcoinNetwork('main')).toBe(false)
  })
})
