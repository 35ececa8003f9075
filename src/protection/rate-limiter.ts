/**
 * Rate Limiting
 *
 * Fixed-window request counting per source address. A RateLimiter
 * tracks one source; SourceRateLimiter keeps one per address and sweeps
 * out sources that have gone quiet.
 */

import { performance } from 'node:perf_hooks'

/** Monotonic clock in milliseconds */
export type Clock = () => number

const monotonic: Clock = () => performance.now()

/**
 * Single-source limiter configuration
 */
export interface RateLimiterOptions {
  /** Requests allowed inside one window */
  maxRequests: number
  /** Window size in milliseconds (default: 60000) */
  windowMs?: number
  /** Clock used for timestamps (default: performance.now) */
  clock?: Clock
}

export class RateLimiter {
  private readonly maxRequests: number
  private readonly windowMs: number
  private readonly clock: Clock
  private readonly timestamps: number[] = []
  private lastCleanup: number
  private lastAccessedAt: number

  constructor(options: RateLimiterOptions) {
    this.maxRequests = options.maxRequests
    this.windowMs = options.windowMs ?? 60_000
    this.clock = options.clock ?? monotonic
    this.lastCleanup = this.clock()
    this.lastAccessedAt = this.lastCleanup
  }

  /** Clock reading of the most recent allowRequest() call */
  get lastAccessed(): number {
    return this.lastAccessedAt
  }

  /** Requests currently counted against the window */
  get count(): number {
    return this.timestamps.length
  }

  /**
   * Count a request. Returns false once the window is full.
   */
  allowRequest(): boolean {
    const now = this.clock()
    this.lastAccessedAt = now
    this.evictExpired(now)

    if (this.timestamps.length >= this.maxRequests) return false

    this.timestamps.push(now)
    return true
  }

  private evictExpired(now: number): void {
    // Evict at most once per window
    if (now - this.lastCleanup <= this.windowMs) return

    const cutoff = now - this.windowMs
    while (this.timestamps.length > 0 && this.timestamps[0] < cutoff) {
      this.timestamps.shift()
    }
    this.lastCleanup = now
  }
}

/**
 * Per-source limiter configuration
 */
export interface SourceRateLimiterOptions {
  /** Requests allowed per source per window */
  maxRequests: number
  /** Window size in milliseconds (default: 60000) */
  windowMs?: number
  /** Drop a source's state after this long without requests (default: 15 minutes) */
  expiryMs?: number
  /** Sweep cadence in milliseconds, 0 disables the timer (default: 5 minutes) */
  sweepIntervalMs?: number
  clock?: Clock
}

export class SourceRateLimiter {
  readonly maxRequests: number
  private readonly windowMs: number
  private readonly expiryMs: number
  private readonly clock: Clock
  private readonly limiters = new Map<string, RateLimiter>()
  private sweepHandle: ReturnType<typeof setInterval> | null = null

  constructor(options: SourceRateLimiterOptions) {
    this.maxRequests = options.maxRequests
    this.windowMs = options.windowMs ?? 60_000
    this.expiryMs = options.expiryMs ?? 15 * 60_000
    this.clock = options.clock ?? monotonic

    const sweepIntervalMs = options.sweepIntervalMs ?? 5 * 60_000
    if (sweepIntervalMs > 0) {
      this.sweepHandle = setInterval(() => this.sweep(), sweepIntervalMs)
      this.sweepHandle.unref?.()
    }
  }

  /** Number of sources currently tracked */
  get size(): number {
    return this.limiters.size
  }

  /**
   * Count a request from `key`, creating its limiter on first sight.
   */
  allowRequest(key: string): boolean {
    let limiter = this.limiters.get(key)
    if (!limiter) {
      limiter = new RateLimiter({ maxRequests: this.maxRequests, windowMs: this.windowMs, clock: this.clock })
      this.limiters.set(key, limiter)
    }
    return limiter.allowRequest()
  }

  /**
   * Remove sources idle for longer than the expiry. Returns how many were removed.
   */
  sweep(): number {
    const now = this.clock()
    let removed = 0
    for (const [key, limiter] of this.limiters) {
      if (now - limiter.lastAccessed > this.expiryMs) {
        this.limiters.delete(key)
        removed++
      }
    }
    return removed
  }

  /** Stop the sweep timer. Listeners call this when they are disposed. */
  shutdown(): void {
    if (this.sweepHandle) {
      clearInterval(this.sweepHandle)
      this.sweepHandle = null
    }
  }
}
