export { BufferPool } from './buffer-pool.js'
export type { OwnedBuffer, BufferPoolOptions, BufferPoolStats } from './buffer-pool.js'
