import { beforeEach, describe, expect, it, vi } from 'vitest'

vi.mock('../src/lib/ui', () => ({
  info: vi.fn(),
  warn: vi.fn(),
}))

import { ConfigurationError, NetworkDetectionError } from '../src/lib/errors'
import {
  type Fetcher,
  IPV4_LOOKUP_SERVICES,
  IPV6_LOOKUP_SERVICES,
  buildAllowedIps,
  detectPublicAddress,
  toHostCidr,
} from '../src/lib/network'
import * as ui from '../src/lib/ui'

function fetcherFrom(answers: Record<string, string | Error>) {
  return vi.fn<Fetcher>(async (url) => {
    const answer = answers[url]
    if (answer === undefined) return { ok: false, status: 503, text: async () => '' }
    if (answer instanceof Error) throw answer
    return { ok: true, status: 200, text: async () => answer }
  })
}

describe('detectPublicAddress', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('takes the first valid IPv4 answer', async () => {
    const fetcher = fetcherFrom({
      [IPV4_LOOKUP_SERVICES[0]]: new Error('timeout'),
      [IPV4_LOOKUP_SERVICES[1]]: '<html>blocked</html>',
      [IPV4_LOOKUP_SERVICES[2]]: '198.51.100.7\n',
    })

    const result = await detectPublicAddress(1000, fetcher)

    expect(result).toEqual({ address: '198.51.100.7', family: 4 })
    expect(fetcher).toHaveBeenCalledTimes(3)
  })

  it('falls back to IPv6 and warns', async () => {
    const fetcher = fetcherFrom({ [IPV6_LOOKUP_SERVICES[1]]: '2001:db8::1' })

    const result = await detectPublicAddress(1000, fetcher)

    expect(result).toEqual({ address: '2001:db8::1', family: 6 })
    expect(ui.warn).toHaveBeenCalledTimes(1)
  })

  it('fails when no service answers', async () => {
    await expect(detectPublicAddress(1000, fetcherFrom({}))).rejects.toBeInstanceOf(
      NetworkDetectionError,
    )
  })
})

describe('toHostCidr', () => {
  it('adds /32 to IPv4 and /128 to IPv6 addresses', () => {
    expect(toHostCidr('10.0.0.5')).toBe('10.0.0.5/32')
    expect(toHostCidr('2001:db8::1')).toBe('2001:db8::1/128')
  })

  it('keeps an explicit prefix', () => {
    expect(toHostCidr('10.0.0.0/24')).toBe('10.0.0.0/24')
  })

  it('rejects values that are not addresses', () => {
    expect(() => toHostCidr('office')).toThrow(ConfigurationError)
    expect(() => toHostCidr('10.0.0.0/33')).toThrow(ConfigurationError)
  })
})

describe('buildAllowedIps', () => {
  const detected = { [IPV4_LOOKUP_SERVICES[0]]: '1.2.3.4' }

  it('contains exactly the detected address by default', async () => {
    const allowed = await buildAllowedIps({ timeoutMs: 1000, fetcher: fetcherFrom(detected) })
    expect(allowed).toEqual(['1.2.3.4/32'])
  })

  it('appends the additional address', async () => {
    const allowed = await buildAllowedIps({
      additionalIp: '10.0.0.5',
      timeoutMs: 1000,
      fetcher: fetcherFrom(detected),
    })
    expect(allowed).toEqual(['1.2.3.4/32', '10.0.0.5/32'])
  })

  it('accepts an IPv6 additional address', async () => {
    const allowed = await buildAllowedIps({
      additionalIp: '2001:db8::1',
      timeoutMs: 1000,
      fetcher: fetcherFrom(detected),
    })
    expect(allowed).toContain('2001:db8::1/128')
  })

  it('de-duplicates the additional address', async () => {
    const allowed = await buildAllowedIps({
      additionalIp: '1.2.3.4/32',
      timeoutMs: 1000,
      fetcher: fetcherFrom(detected),
    })
    expect(allowed).toEqual(['1.2.3.4/32'])
  })

  it('validates the additional address before any lookup', async () => {
    const fetcher = fetcherFrom(detected)
    await expect(
      buildAllowedIps({ additionalIp: 'not-an-ip', timeoutMs: 1000, fetcher }),
    ).rejects.toBeInstanceOf(ConfigurationError)
    expect(fetcher).not.toHaveBeenCalled()
  })
})
