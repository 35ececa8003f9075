export { RateLimiter, SourceRateLimiter } from './rate-limiter.js'
export type { RateLimiterOptions, SourceRateLimiterOptions, Clock } from './rate-limiter.js'

export { Blacklist, createDefaultBlacklist } from './blacklist.js'
export type { BlacklistVerdict } from './blacklist.js'

export { DEFAULT_BLACKLIST } from './default-ranges.js'
