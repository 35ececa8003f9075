import { describe, it, expect, vi, afterEach } from 'vitest'
import { RateLimiter, SourceRateLimiter } from './rate-limiter.js'

function manualClock(start = 0) {
  let now = start
  return {
    clock: () => now,
    advance(ms: number) {
      now += ms
    },
  }
}

describe('RateLimiter', () => {
  it('should reject the request after the limit inside one window', () => {
    const time = manualClock()
    const limiter = new RateLimiter({ maxRequests: 3, windowMs: 1000, clock: time.clock })

    expect(limiter.allowRequest()).toBe(true)
    expect(limiter.allowRequest()).toBe(true)
    expect(limiter.allowRequest()).toBe(true)
    time.advance(10)
    expect(limiter.allowRequest()).toBe(false)
    expect(limiter.count).toBe(3)
  })

  it('should accept again once the window has elapsed', () => {
    const time = manualClock()
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1000, clock: time.clock })

    limiter.allowRequest()
    limiter.allowRequest()
    time.advance(500)
    expect(limiter.allowRequest()).toBe(false)

    time.advance(501)
    expect(limiter.allowRequest()).toBe(true)
    expect(limiter.count).toBe(1)
  })

  it('should keep requests that are still inside the window', () => {
    const time = manualClock()
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1000, clock: time.clock })

    limiter.allowRequest()
    time.advance(900)
    limiter.allowRequest()
    time.advance(200)

    // first request aged out, second still counted
    expect(limiter.allowRequest()).toBe(true)
    expect(limiter.allowRequest()).toBe(false)
  })

  it('should track the last access time', () => {
    const time = manualClock(100)
    const limiter = new RateLimiter({ maxRequests: 1, clock: time.clock })

    time.advance(50)
    limiter.allowRequest()
    time.advance(50)
    limiter.allowRequest()

    expect(limiter.lastAccessed).toBe(200)
  })
})

describe('SourceRateLimiter', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should count each source separately', () => {
    const time = manualClock()
    const limiter = new SourceRateLimiter({ maxRequests: 1, clock: time.clock, sweepIntervalMs: 0 })

    expect(limiter.allowRequest('192.0.2.1')).toBe(true)
    expect(limiter.allowRequest('192.0.2.1')).toBe(false)
    expect(limiter.allowRequest('192.0.2.2')).toBe(true)
    expect(limiter.size).toBe(2)
  })

  it('should sweep idle sources', () => {
    const time = manualClock()
    const limiter = new SourceRateLimiter({
      maxRequests: 5,
      expiryMs: 1000,
      clock: time.clock,
      sweepIntervalMs: 0,
    })

    limiter.allowRequest('192.0.2.1')
    time.advance(600)
    limiter.allowRequest('192.0.2.2')
    time.advance(600)

    expect(limiter.sweep()).toBe(1)
    expect(limiter.size).toBe(1)
  })

  it('should sweep on its timer until shut down', () => {
    vi.useFakeTimers()
    const time = manualClock()
    const limiter = new SourceRateLimiter({
      maxRequests: 5,
      expiryMs: 1000,
      sweepIntervalMs: 5000,
      clock: time.clock,
    })

    limiter.allowRequest('192.0.2.1')
    time.advance(2000)
    vi.advanceTimersByTime(5000)
    expect(limiter.size).toBe(0)

    limiter.shutdown()
    limiter.allowRequest('192.0.2.3')
    time.advance(2000)
    vi.advanceTimersByTime(5000)
    expect(limiter.size).toBe(1)
  })
})
