/**
 * URL utilities
 *
 * Canonicalization for target ids, eTLD+1 scoping for throttling, and the
 * domain allow/block filter used by discovery.
 */

import psl from 'psl'

/**
 * Marketing/analytics parameters that never change page content.
 */
const TRACKING_PARAMS = new Set([
  'fbclid',
  'gclid',
  'msclkid',
  'ref',
  'source',
  'campaign',
])

/**
 * Canonicalize a listing URL so the same page discovered twice maps to one target.
 *
 * - lowercase hostname
 * - drop utm_* and other tracking params, and empty params
 * - sort remaining params
 * - drop fragment
 * - drop trailing slash (except root)
 *
 * @throws TypeError if url is not absolute
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url)
  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return parsed.toString()
}

/**
 * Resolve a possibly-relative href against the page it appeared on.
 * Returns null for non-http(s) links (mailto:, javascript:, ...).
 */
export function resolveUrl(href: string, base: string): string | null {
  try {
    const resolved = new URL(href, base)
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null
    return resolved.toString()
  } catch {
    return null
  }
}

/**
 * Registrable domain (eTLD+1) of a URL, e.g. "example.co.uk" for
 * "https://www.example.co.uk/a". Falls back to the hostname when the
 * Public Suffix List has no answer (localhost, IPs).
 */
export function getRegistrableDomain(url: string): string {
  const hostname = new URL(url).hostname.toLowerCase()
  return psl.get(hostname) ?? hostname
}

export interface DomainFilter {
  /** Empty = unrestricted */
  allow: readonly string[]
  block: readonly string[]
}

/** Host equals the entry or is a subdomain of it. */
export function hostMatches(host: string, domains: readonly string[]): boolean {
  const h = host.toLowerCase()
  return domains.some((entry) => {
    const d = entry.trim().toLowerCase()
    return d !== '' && (h === d || h.endsWith(`.${d}`))
  })
}

/**
 * Block list wins over allow list. Unparseable URLs are never allowed.
 */
export function isDomainAllowed(url: string, filter: DomainFilter): boolean {
  let host: string
  try {
    host = new URL(url).hostname
  } catch {
    return false
  }

  if (hostMatches(host, filter.block)) return false
  if (filter.allow.length === 0) return true
  return hostMatches(host, filter.allow)
}
