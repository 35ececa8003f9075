/**
 * Buffer Pool
 *
 * Rents fixed-capacity byte slabs for datagram and stream payloads.
 * Each rental is an OwnedBuffer with exactly one owner; releasing it
 * zero-fills the slab and returns it to its capacity bucket.
 */

import { Errors } from '../errors/index.js'

const MIN_CAPACITY = 256

/**
 * Buffer pool configuration
 */
export interface BufferPoolOptions {
  /** Idle slabs kept per capacity bucket (default: 32) */
  maxRetainedPerBucket?: number
}

/**
 * A rented byte region. `bytes` is exactly the requested length.
 */
export interface OwnedBuffer {
  readonly length: number
  readonly bytes: Buffer
  readonly released: boolean
  /** Return the slab to the pool. Throws if already released. */
  release(): void
}

/**
 * Pool counters, mostly for tests and diagnostics
 */
export interface BufferPoolStats {
  rented: number
  reused: number
  outstanding: number
  retained: number
}

function bucketCapacity(size: number): number {
  let capacity = MIN_CAPACITY
  while (capacity < size) capacity *= 2
  return capacity
}

class PooledBuffer implements OwnedBuffer {
  private slab: Buffer | null

  constructor(
    slab: Buffer,
    readonly length: number,
    private readonly onRelease: (slab: Buffer) => void
  ) {
    this.slab = slab
  }

  get bytes(): Buffer {
    if (!this.slab) throw Errors.bufferReleased()
    return this.slab.subarray(0, this.length)
  }

  get released(): boolean {
    return this.slab === null
  }

  release(): void {
    const slab = this.slab
    if (!slab) throw Errors.bufferReleased()
    this.slab = null
    this.onRelease(slab)
  }
}

export class BufferPool {
  private readonly maxRetainedPerBucket: number
  private readonly buckets = new Map<number, Buffer[]>()
  private rented = 0
  private reused = 0
  private outstanding = 0

  constructor(options: BufferPoolOptions = {}) {
    this.maxRetainedPerBucket = options.maxRetainedPerBucket ?? 32
  }

  /**
   * Rent a buffer of exactly `size` bytes. The caller owns it until release().
   */
  rent(size: number): OwnedBuffer {
    if (!Number.isInteger(size) || size <= 0) {
      throw Errors.invalidArgument('size', 'must be a positive integer', size)
    }

    const capacity = bucketCapacity(size)
    const idle = this.buckets.get(capacity)
    const recycled = idle?.pop()
    const slab = recycled ?? Buffer.alloc(capacity)

    this.rented++
    this.outstanding++
    if (recycled) this.reused++

    return new PooledBuffer(slab, size, (returned) => this.giveBack(capacity, returned))
  }

  /**
   * Rent a buffer for the duration of `fn`; it is released on every exit path.
   */
  async use<T>(size: number, fn: (buffer: OwnedBuffer) => Promise<T> | T): Promise<T> {
    const buffer = this.rent(size)
    try {
      return await fn(buffer)
    } finally {
      if (!buffer.released) buffer.release()
    }
  }

  stats(): BufferPoolStats {
    let retained = 0
    for (const idle of this.buckets.values()) retained += idle.length
    return { rented: this.rented, reused: this.reused, outstanding: this.outstanding, retained }
  }

  private giveBack(capacity: number, slab: Buffer): void {
    this.outstanding--
    slab.fill(0)

    let idle = this.buckets.get(capacity)
    if (!idle) {
      idle = []
      this.buckets.set(capacity, idle)
    }
    if (idle.length < this.maxRetainedPerBucket) {
      idle.push(slab)
    }
  }
}
