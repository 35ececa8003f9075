/**
 * UDP Listener Tests
 */

import { describe, it, afterEach, expect, vi } from 'vitest'
import { createSocket, type Socket as UdpSocket } from 'node:dgram'
import { createUdpListener, type UdpListener } from './udp.js'
import { BufferPool } from '../buffers/buffer-pool.js'
import type { MessageProcessor } from '../core/router.js'
import { createLogMessageRouter, type LogMessageHandler } from '../messages/index.js'
import { Blacklist } from '../protection/blacklist.js'
import type { Endpoint } from '../types/endpoint.js'

const TEST_HOST = '127.0.0.1'

interface Received {
  text: string
  endpoint: Endpoint
}

function createRecordingProcessor(): { processor: MessageProcessor; received: Received[] } {
  const received: Received[] = []
  return {
    received,
    processor: {
      process: async (data, endpoint) => {
        received.push({ text: data.toString('utf-8'), endpoint })
      },
    },
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

describe('UdpListener', () => {
  const listeners: UdpListener[] = []
  const clients: UdpSocket[] = []

  afterEach(async () => {
    for (const client of clients.splice(0)) client.close()
    await Promise.all(listeners.splice(0).map((listener) => listener.dispose()))
  })

  async function listen(
    port: number,
    processor: MessageProcessor,
    options: { requestsPerMinutePerIp?: number; bufferSize?: number; blacklist?: Blacklist; bufferPool?: BufferPool } = {}
  ): Promise<UdpListener> {
    const listener = await createUdpListener(
      processor,
      {
        address: TEST_HOST,
        port,
        bufferSize: options.bufferSize,
        requestsPerMinutePerIp: options.requestsPerMinutePerIp,
      },
      { blacklist: options.blacklist ?? new Blacklist(), bufferPool: options.bufferPool }
    )
    listeners.push(listener)
    return listener
  }

  async function createClient(): Promise<{ port: number; send: (port: number, payload: string | Buffer) => Promise<void> }> {
    const socket = createSocket('udp4')
    clients.push(socket)
    await new Promise<void>((resolve) => socket.bind(0, TEST_HOST, () => resolve()))

    return {
      port: socket.address().port,
      send: (port, payload) =>
        new Promise((resolve, reject) => {
          socket.send(payload, port, TEST_HOST, (err) => (err ? reject(err) : resolve()))
        }),
    }
  }

  describe('construction', () => {
    it('should bind on creation with protocol defaults', async () => {
      const { processor } = createRecordingProcessor()
      const listener = await listen(24561, processor)

      expect(listener.isRunning).toBe(false)
      expect(listener.config.bufferSize).toBe(1500)
      expect(listener.socket.address().port).toBe(24561)
    })

    it('should reject an invalid address before binding', async () => {
      const { processor } = createRecordingProcessor()

      await expect(createUdpListener(processor, { address: 'not-an-ip', port: 24562 })).rejects.toMatchObject({
        code: 'INVALID_CONFIG',
      })
    })

    it('should reject out-of-range ports', async () => {
      const { processor } = createRecordingProcessor()

      await expect(createUdpListener(processor, { address: TEST_HOST, port: 0 })).rejects.toThrow(
        'port: Port number must be between 1 and 65535'
      )
      await expect(createUdpListener(processor, { address: TEST_HOST, port: 70000 })).rejects.toThrow(
        'port: Port number must be between 1 and 65535'
      )
    })

    it('should fail when the port is taken without address reuse', async () => {
      const { processor } = createRecordingProcessor()
      const first = await createUdpListener(processor, {
        address: TEST_HOST,
        port: 24563,
        enableReuseAddress: false,
      })
      listeners.push(first)

      await expect(
        createUdpListener(processor, { address: TEST_HOST, port: 24563, enableReuseAddress: false })
      ).rejects.toMatchObject({ code: 'EADDRINUSE' })
    })
  })

  describe('receiving', () => {
    it('should deliver a decoded message with the sender endpoint', async () => {
      const calls: Array<{ app: string; contestnr: number; endpoint: Endpoint }> = []
      const handleAppInfo: LogMessageHandler['handleAppInfo'] = async (message, endpoint) => {
        calls.push({ app: message.app, contestnr: message.contestnr, endpoint })
      }
      const unexpected = async () => {
        throw new Error('unexpected operation')
      }
      const router = createLogMessageRouter({
        handleAppInfo,
        handleContactInfo: unexpected,
        handleContactReplace: unexpected,
        handleContactDelete: unexpected,
        handleLookupInfo: unexpected,
        handleSpot: unexpected,
        handleDynamicResults: unexpected,
        handleRadioInfo: unexpected,
      })

      const listener = await listen(24564, router)
      listener.start()
      const client = await createClient()

      await client.send(24564, '<?xml version="1.0"?><AppInfo><app>N1MM</app><contestnr>12</contestnr></AppInfo>')

      await vi.waitFor(() => expect(calls).toHaveLength(1))
      expect(calls[0]).toEqual({
        app: 'N1MM',
        contestnr: 12,
        endpoint: { address: TEST_HOST, port: client.port, family: 'IPv4' },
      })
    })

    it('should drop datagrams beyond the per-source rate limit', async () => {
      const { processor, received } = createRecordingProcessor()
      const listener = await listen(24565, processor, { requestsPerMinutePerIp: 60 })
      listener.start()
      const client = await createClient()

      for (let i = 1; i <= 61; i++) {
        await client.send(24565, `message ${i}`)
      }

      await vi.waitFor(() => expect(received).toHaveLength(60))
      await sleep(100)
      expect(received).toHaveLength(60)
      expect(received[59].text).toBe('message 60')
    })

    it('should drop datagrams from blacklisted sources', async () => {
      const { processor, received } = createRecordingProcessor()
      const listener = await listen(24566, processor, { blacklist: new Blacklist({ loopback: ['127.0.0.0/8'] }) })
      listener.start()
      const client = await createClient()

      await client.send(24566, '<AppInfo/>')
      await sleep(100)

      expect(received).toHaveLength(0)
    })

    it('should drop datagrams larger than the buffer size', async () => {
      const { processor, received } = createRecordingProcessor()
      const listener = await listen(24567, processor, { bufferSize: 32 })
      listener.start()
      const client = await createClient()

      await client.send(24567, 'x'.repeat(64))
      await client.send(24567, 'fits')

      await vi.waitFor(() => expect(received).toHaveLength(1))
      await sleep(50)
      expect(received.map((entry) => entry.text)).toEqual(['fits'])
    })

    it('should drop empty datagrams', async () => {
      const { processor, received } = createRecordingProcessor()
      const listener = await listen(24560, processor, { requestsPerMinutePerIp: 2 })
      listener.start()
      const client = await createClient()

      await client.send(24560, Buffer.alloc(0))
      await client.send(24560, 'a')
      await client.send(24560, 'b')

      await vi.waitFor(() => expect(received).toHaveLength(1))
      await sleep(50)
      // the empty datagram still counts against the limit
      expect(received.map((entry) => entry.text)).toEqual(['a'])
    })

    it('should return buffers to the pool without residual data', async () => {
      const pool = new BufferPool()
      const { processor, received } = createRecordingProcessor()
      const listener = await listen(24568, processor, { bufferPool: pool })
      listener.start()
      const client = await createClient()

      await client.send(24568, 'first payload')
      await vi.waitFor(() => expect(received).toHaveLength(1))
      await vi.waitFor(() => expect(pool.stats().outstanding).toBe(0))

      const next = pool.rent(13)
      expect(next.bytes.equals(Buffer.alloc(13))).toBe(true)
      expect(pool.stats().reused).toBe(1)
      next.release()
    })

    it('should ignore traffic while stopped', async () => {
      const { processor, received } = createRecordingProcessor()
      const listener = await listen(24569, processor)
      const client = await createClient()

      await client.send(24569, 'before start')
      await sleep(50)

      listener.start()
      await client.send(24569, 'while running')
      await vi.waitFor(() => expect(received).toHaveLength(1))

      await listener.stop()
      await client.send(24569, 'after stop')
      await sleep(50)

      expect(received.map((entry) => entry.text)).toEqual(['while running'])
    })
  })
})
