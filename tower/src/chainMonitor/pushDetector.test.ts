/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { blockHash, createTestLogger, FakeTipFeed, waitFor } from '../testUtilities'
import { LifecycleController } from './lifecycle'
import { decodeTipMessage, PushDetector } from './pushDetector'
import { TipFeed } from './types'

describe('decodeTipMessage', () => {
  it('should decode a hashblock message', () => {
    const hash = blockHash(1)
    const message = [Buffer.from('hashblock'), Buffer.from(hash, 'hex'), Buffer.alloc(4)]
    expect(decodeTipMessage(message)).toBe(hash)
  })

  it('should ignore other topics', () => {
    const message = [Buffer.from('hashtx'), Buffer.alloc(32, 1)]
    expect(decodeTipMessage(message)).toBeNull()
  })

  it('should ignore a truncated payload', () => {
    const message = [Buffer.from('hashblock'), Buffer.alloc(31, 1)]
    expect(decodeTipMessage(message)).toBeNull()
  })

  it('should ignore a message without a payload', () => {
    expect(decodeTipMessage([Buffer.from('hashblock')])).toBeNull()
  })
})

describe('PushDetector', () => {
  const setup = () => {
    const lifecycle = new LifecycleController()
    const feeds: FakeTipFeed[] = []
    const received: string[] = []

    const createFeed = jest.fn((): TipFeed => {
      const feed = new FakeTipFeed()
      feeds.push(feed)
      return feed
    })

    const detector = new PushDetector({
      createFeed,
      lifecycle,
      enqueue: (hash) => {
        received.push(hash)
        return true
      },
      logger: createTestLogger(),
      reconnectDelayMs: 1,
    })

    return { lifecycle, feeds, received, createFeed, detector }
  }

  it('should enqueue every block hash the feed announces', async () => {
    const { lifecycle, feeds, received, detector } = setup()

    const running = detector.run()
    await waitFor(() => feeds.length === 1)

    feeds[0].publishHash(blockHash(1))
    feeds[0].publish([Buffer.from('rawtx'), Buffer.alloc(32, 1)])
    feeds[0].publishHash(blockHash(2))

    await waitFor(() => received.length === 2)
    expect(received).toEqual([blockHash(1), blockHash(2)])

    lifecycle.terminate()
    await running
  })

  it('should close the feed on terminate without waiting for another block', async () => {
    const { lifecycle, feeds, createFeed, detector } = setup()

    const running = detector.run()
    await waitFor(() => feeds.length === 1)

    lifecycle.terminate()
    await running

    expect(feeds[0].closed).toBe(true)
    expect(createFeed).toHaveBeenCalledTimes(1)
  })

  it('should subscribe again after the feed fails', async () => {
    const { lifecycle, feeds, received, detector } = setup()
    const warn = jest.spyOn(detector.logger, 'warn')

    const running = detector.run()
    await waitFor(() => feeds.length === 1)

    feeds[0].fail(new Error('connection lost'))
    await waitFor(() => feeds.length === 2)

    expect(feeds[0].closed).toBe(true)
    expect(warn).toHaveBeenCalledWith('Tip feed failed: connection lost')

    feeds[1].publishHash(blockHash(3))
    await waitFor(() => received.length === 1)
    expect(received).toEqual([blockHash(3)])

    lifecycle.terminate()
    await running
    expect(feeds[1].closed).toBe(true)
  })

  it('should retry when the feed cannot be created', async () => {
    const { lifecycle, feeds, createFeed, detector } = setup()
    const warn = jest.spyOn(detector.logger, 'warn')

    createFeed.mockImplementationOnce(() => {
      throw new Error('invalid endpoint')
    })

    const running = detector.run()
    await waitFor(() => feeds.length === 1)

    expect(warn).toHaveBeenCalledWith('Could not subscribe to the tip feed: invalid endpoint')
    expect(createFeed).toHaveBeenCalledTimes(2)

    lifecycle.terminate()
    await running
  })

  it('should not enqueue anything published after terminate', async () => {
    const { lifecycle, feeds, received, detector } = setup()

    const running = detector.run()
    await waitFor(() => feeds.length === 1)

    lifecycle.terminate()
    feeds[0].publishHash(blockHash(1))
    await running

    expect(received).toEqual([])
  })
})
