/**
 * Gateway Tests
 */

import { describe, it, afterEach, expect, vi } from 'vitest'
import { createSocket } from 'node:dgram'
import { connect, createServer } from 'node:net'
import { startGateway, type Gateway } from './gateway.js'
import type { MessageProcessor } from './core/router.js'
import { Blacklist } from './protection/blacklist.js'

const TEST_HOST = '127.0.0.1'

function createRecordingProcessor(): { processor: MessageProcessor; received: string[] } {
  const received: string[] = []
  return {
    received,
    processor: {
      process: async (data) => {
        received.push(data.toString('utf-8'))
      },
    },
  }
}

function sendDatagram(port: number, payload: string): Promise<void> {
  const socket = createSocket('udp4')
  return new Promise((resolve, reject) => {
    socket.send(payload, port, TEST_HOST, (err) => {
      socket.close()
      if (err) reject(err)
      else resolve()
    })
  })
}

function sendStream(port: number, payload: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host: TEST_HOST, port }, () => socket.end(payload))
    socket.once('error', reject)
    socket.once('close', () => resolve())
  })
}

describe('Gateway', () => {
  const gateways: Gateway[] = []

  afterEach(async () => {
    await Promise.all(gateways.splice(0).map((gateway) => gateway.dispose()))
  })

  it('should start every configured listener and route their traffic', async () => {
    const { processor, received } = createRecordingProcessor()
    const gateway = await startGateway(
      {
        udp: { address: TEST_HOST, port: 24581 },
        tcp: { address: TEST_HOST, port: 24582 },
      },
      processor,
      { blacklist: new Blacklist() }
    )
    gateways.push(gateway)

    expect(gateway.isRunning).toBe(true)
    expect(gateway.listeners.map((listener) => listener.config.protocol)).toEqual(['udp', 'tcp'])

    await sendDatagram(24581, 'over udp')
    await sendStream(24582, 'over tcp')

    await vi.waitFor(() => expect(received).toHaveLength(2))
    expect([...received].sort()).toEqual(['over tcp', 'over udp'])
  })

  it('should merge configured blacklist sets with the built-in ones', async () => {
    const { processor } = createRecordingProcessor()
    const gateway = await startGateway(
      {
        udp: { address: TEST_HOST, port: 24583 },
        blacklist: { 'test-scanners': ['198.51.100.0/24'] },
      },
      processor
    )
    gateways.push(gateway)

    expect(gateway.blacklist.labels()).toEqual(['internet-measurement.com', 'test-scanners'])
    expect(gateway.blacklist.check('198.51.100.7')).toEqual({ blacklisted: true, label: 'test-scanners' })
  })

  it('should stop every listener once', async () => {
    const { processor } = createRecordingProcessor()
    const gateway = await startGateway(
      {
        udp: { address: TEST_HOST, port: 24584 },
        tcp: { address: TEST_HOST, port: 24585 },
      },
      processor
    )
    gateways.push(gateway)

    await gateway.stop()

    expect(gateway.isRunning).toBe(false)
    expect(gateway.listeners.every((listener) => listener.state === 'stopped')).toBe(true)
    await expect(gateway.stop()).rejects.toThrow('Gateway is not running')
  })

  it('should dispose idempotently', async () => {
    const { processor } = createRecordingProcessor()
    const gateway = await startGateway({ tcp: { address: TEST_HOST, port: 24586 } }, processor)

    await gateway.dispose()
    await gateway.dispose()

    expect(gateway.listeners.every((listener) => listener.isDisposed)).toBe(true)
  })

  it('should require at least one listener', async () => {
    const { processor } = createRecordingProcessor()

    await expect(startGateway({}, processor)).rejects.toThrow('udp: At least one of udp or tcp must be configured')
  })

  it('should release bound listeners when a later one fails to bind', async () => {
    const { processor } = createRecordingProcessor()
    const blocker = createServer()
    await new Promise<void>((resolve) => blocker.listen(24588, TEST_HOST, () => resolve()))

    const config = {
      udp: { address: TEST_HOST, port: 24587, enableReuseAddress: false },
      tcp: { address: TEST_HOST, port: 24588 },
    }

    try {
      await expect(startGateway(config, processor)).rejects.toMatchObject({ code: 'EADDRINUSE' })
    } finally {
      await new Promise<void>((resolve) => blocker.close(() => resolve()))
    }

    const gateway = await startGateway(config, processor)
    gateways.push(gateway)
    expect(gateway.isRunning).toBe(true)
  })
})
