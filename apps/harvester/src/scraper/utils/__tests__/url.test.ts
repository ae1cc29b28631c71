import { describe, expect, it } from 'vitest'
import {
  canonicalizeUrl,
  getRegistrableDomain,
  hostMatches,
  isDomainAllowed,
  resolveUrl,
} from '../url.js'

describe('canonicalizeUrl', () => {
  it('drops tracking params, empty params, fragments and trailing slashes', () => {
    expect(
      canonicalizeUrl('https://Homes.Example.com/listing/42/?utm_source=x&b=2&a=1&ref=feed&empty=#photos')
    ).toBe('https://homes.example.com/listing/42?a=1&b=2')
  })

  it('keeps the root path slash', () => {
    expect(canonicalizeUrl('http://example.com/')).toBe('http://example.com/')
  })
})

describe('resolveUrl', () => {
  it('resolves relative links against the page', () => {
    expect(resolveUrl('/homes/7', 'https://example.com/search?page=2')).toBe('https://example.com/homes/7')
  })

  it('rejects non-http links', () => {
    expect(resolveUrl('mailto:owner@example.com', 'https://example.com/')).toBeNull()
    expect(resolveUrl('javascript:void(0)', 'https://example.com/')).toBeNull()
  })
})

describe('getRegistrableDomain', () => {
  it('reduces hosts to eTLD+1', () => {
    expect(getRegistrableDomain('https://www.listings.example.com/a')).toBe('example.com')
    expect(getRegistrableDomain('https://shop.example.co.uk/')).toBe('example.co.uk')
  })

  it('falls back to the hostname when there is no registrable domain', () => {
    expect(getRegistrableDomain('http://localhost:8080/')).toBe('localhost')
  })
})

describe('domain filters', () => {
  it('matches exact hosts and subdomains only', () => {
    expect(hostMatches('example.com', ['example.com'])).toBe(true)
    expect(hostMatches('www.example.com', ['example.com'])).toBe(true)
    expect(hostMatches('badexample.com', ['example.com'])).toBe(false)
  })

  it('treats an empty allow list as unrestricted and lets the block list win', () => {
    expect(isDomainAllowed('https://a.example.org/x', { allow: [], block: [] })).toBe(true)
    expect(isDomainAllowed('https://a.example.org/x', { allow: ['example.org'], block: ['a.example.org'] })).toBe(false)
    expect(isDomainAllowed('https://other.test/x', { allow: ['example.org'], block: [] })).toBe(false)
    expect(isDomainAllowed('not a url', { allow: [], block: [] })).toBe(false)
  })
})
