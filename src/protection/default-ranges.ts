/**
 * Built-in abuse ranges seeded into the default blacklist.
 */

export const DEFAULT_BLACKLIST: Readonly<Record<string, readonly string[]>> = {
  // internet-wide scanning service
  'internet-measurement.com': [
    '87.236.176.0/24',
    '193.163.125.0/24',
    '68.183.53.77/32',
    '104.248.203.191/32',
    '104.248.204.195/32',
    '142.93.191.98/32',
    '157.245.216.203/32',
    '165.22.39.64/32',
    '167.99.209.184/32',
    '188.166.26.88/32',
    '206.189.7.178/32',
    '209.97.152.248/32',
    '2a06:4880::/32',
    '2604:a880:800:10::c4b:f000/124',
    '2604:a880:800:10::c51:a000/124',
    '2604:a880:800:10::c52:d000/124',
    '2604:a880:800:10::c55:5000/124',
    '2604:a880:800:10::c56:b000/124',
    '2a03:b0c0:2:d0::153e:a000/124',
    '2a03:b0c0:2:d0::1576:8000/124',
    '2a03:b0c0:2:d0::1577:7000/124',
    '2a03:b0c0:2:d0::1579:e000/124',
    '2a03:b0c0:2:d0::157c:a000/124',
  ],
}
