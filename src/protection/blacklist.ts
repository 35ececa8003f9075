/**
 * Host Blacklist
 *
 * Labelled sets of CIDR ranges. Lookups normalize IPv4-mapped IPv6
 * addresses (::ffff:a.b.c.d) to plain IPv4 before matching, so a
 * dual-stack socket sees the same verdict as an IPv4 one.
 *
 * @example
 * const blacklist = createDefaultBlacklist()
 * blacklist.add('threat-feed', ['198.51.100.0/24'])
 *
 * const verdict = blacklist.check(remote.address)
 * if (verdict.blacklisted) logger.warn({ label: verdict.label }, 'Blacklisted host')
 */

import ipaddr from 'ipaddr.js'
import { Errors } from '../errors/index.js'
import { DEFAULT_BLACKLIST } from './default-ranges.js'

type NetworkRange =
  | { kind: 'ipv4'; network: ipaddr.IPv4; bits: number }
  | { kind: 'ipv6'; network: ipaddr.IPv6; bits: number }

export type BlacklistVerdict = { blacklisted: true; label: string } | { blacklisted: false }

function parseRange(cidr: string): NetworkRange {
  let parsed: [ipaddr.IPv4 | ipaddr.IPv6, number]
  try {
    parsed = ipaddr.parseCIDR(cidr)
  } catch {
    throw Errors.invalidArgument('cidr', 'not a valid CIDR range', cidr)
  }

  const [network, bits] = parsed
  return network instanceof ipaddr.IPv4
    ? { kind: 'ipv4', network, bits }
    : { kind: 'ipv6', network, bits }
}

function parseAddress(address: string): ipaddr.IPv4 | ipaddr.IPv6 | undefined {
  // Strip an IPv6 zone id (fe80::1%eth0)
  const bare = address.includes('%') ? address.slice(0, address.indexOf('%')) : address
  if (!ipaddr.isValid(bare)) return undefined
  // process() maps ::ffff:a.b.c.d to its IPv4 form
  return ipaddr.process(bare)
}

function contains(range: NetworkRange, address: ipaddr.IPv4 | ipaddr.IPv6): boolean {
  if (range.kind === 'ipv4') {
    return address instanceof ipaddr.IPv4 && address.match(range.network, range.bits)
  }
  return address instanceof ipaddr.IPv6 && address.match(range.network, range.bits)
}

export class Blacklist {
  private readonly ranges = new Map<string, readonly NetworkRange[]>()

  constructor(entries: Readonly<Record<string, readonly string[]>> = {}) {
    for (const [label, cidrs] of Object.entries(entries)) {
      this.add(label, cidrs)
    }
  }

  /**
   * Register a labelled set of ranges.
   *
   * @throws GatewayError if the label already exists or a range does not parse
   */
  add(label: string, cidrs: readonly string[]): void {
    if (this.ranges.has(label)) {
      throw Errors.invalidArgument('label', `blacklist '${label}' already registered`, label)
    }
    this.ranges.set(label, Object.freeze(cidrs.map(parseRange)))
  }

  /**
   * Report whether `address` falls in any registered range, and which set matched.
   * Unparseable addresses are never blacklisted.
   */
  check(address: string): BlacklistVerdict {
    const parsed = parseAddress(address)
    if (!parsed) return { blacklisted: false }

    for (const [label, ranges] of this.ranges) {
      if (ranges.some((range) => contains(range, parsed))) {
        return { blacklisted: true, label }
      }
    }
    return { blacklisted: false }
  }

  isBlacklisted(address: string): boolean {
    return this.check(address).blacklisted
  }

  labels(): string[] {
    return Array.from(this.ranges.keys())
  }
}

/**
 * Blacklist seeded with the built-in abuse ranges, plus any extra sets.
 */
export function createDefaultBlacklist(
  extra: Readonly<Record<string, readonly string[]>> = {}
): Blacklist {
  return new Blacklist({ ...DEFAULT_BLACKLIST, ...extra })
}
