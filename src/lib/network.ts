import { isIP, isIPv4, isIPv6 } from 'node:net'
import * as debug from './debug'
import { ConfigurationError, NetworkDetectionError, errorMessage } from './errors'
import type { AllowedIpSet } from './types'
import * as ui from './ui'

export const IPV4_LOOKUP_SERVICES = [
  'https://api.ipify.org',
  'https://ifconfig.me/ip',
  'https://icanhazip.com',
]

export const IPV6_LOOKUP_SERVICES = ['https://api6.ipify.org', 'https://ipv6.icanhazip.com']

export type Fetcher = (url: string, init: { signal: AbortSignal }) => Promise<{
  ok: boolean
  status: number
  text(): Promise<string>
}>

export interface AllowListOptions {
  additionalIp?: string | null
  timeoutMs: number
  fetcher?: Fetcher
}

async function queryService(url: string, timeoutMs: number, fetcher: Fetcher): Promise<string | null> {
  try {
    const response = await fetcher(url, { signal: AbortSignal.timeout(timeoutMs) })
    if (!response.ok) {
      debug.log(`[network] ${url} answered ${response.status}`)
      return null
    }
    return (await response.text()).trim()
  } catch (err) {
    debug.log(`[network] ${url} failed: ${errorMessage(err)}`)
    return null
  }
}

async function firstValid(
  services: string[],
  valid: (value: string) => boolean,
  timeoutMs: number,
  fetcher: Fetcher,
): Promise<string | null> {
  for (const url of services) {
    const answer = await queryService(url, timeoutMs, fetcher)
    if (answer && valid(answer)) return answer
  }
  return null
}

export interface PublicAddress {
  address: string
  family: 4 | 6
}

/** Ask the lookup services for this host's public address, IPv4 first. */
export async function detectPublicAddress(
  timeoutMs: number,
  fetcher: Fetcher = fetch,
): Promise<PublicAddress> {
  const v4 = await firstValid(IPV4_LOOKUP_SERVICES, isIPv4, timeoutMs, fetcher)
  if (v4) return { address: v4, family: 4 }

  const v6 = await firstValid(IPV6_LOOKUP_SERVICES, isIPv6, timeoutMs, fetcher)
  if (v6) {
    ui.warn(
      `Only an IPv6 address was detected (${v6}). The VM network interface is IPv4-only, so SSH may be unreachable from this host.`,
    )
    return { address: v6, family: 6 }
  }

  throw new NetworkDetectionError()
}

/** `1.2.3.4` → `1.2.3.4/32`, `2001:db8::1` → `2001:db8::1/128`; existing prefixes are kept. */
export function toHostCidr(value: string): string {
  const trimmed = value.trim()
  const [address, prefix] = trimmed.split('/', 2)
  const family = isIP(address)
  if (family === 0) {
    throw new ConfigurationError(`Additional IP "${value}" is not a valid IPv4 or IPv6 address.`)
  }
  if (prefix !== undefined) {
    const bits = Number(prefix)
    const max = family === 4 ? 32 : 128
    if (!/^\d+$/.test(prefix) || bits > max) {
      throw new ConfigurationError(`Additional IP "${value}" has an invalid prefix length.`)
    }
    return trimmed
  }
  return family === 4 ? `${address}/32` : `${address}/128`
}

/**
 * Build the SSH allow-list: the detected public address plus the optional
 * additional one, de-duplicated in insertion order.
 */
export async function buildAllowedIps(options: AllowListOptions): Promise<AllowedIpSet> {
  // Validate the operator's input before going to the network.
  const extra = options.additionalIp ? toHostCidr(options.additionalIp) : null

  const detected = await detectPublicAddress(options.timeoutMs, options.fetcher)
  const entries = [toHostCidr(detected.address)]
  if (extra) entries.push(extra)

  const allowed = [...new Set(entries)]
  ui.info(`SSH allow-list: ${allowed.join(', ')}`)
  return allowed
}
