// Endpoint types
export type { Endpoint } from './endpoint.js'
export { toEndpoint, formatEndpoint } from './endpoint.js'
