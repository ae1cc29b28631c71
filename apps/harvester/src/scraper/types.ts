/**
 * Harvester Core Types
 *
 * Source configuration, the extractor capability, fetch plumbing and the
 * persisted listing/session records.
 */

import type { ILogger } from '@doorstep/logger'

// ═══════════════════════════════════════════════════════════════════════════════
// Source Configuration
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One configured website. Delays are in seconds.
 * An empty allowedStates list means every state is accepted.
 */
export interface SourceConfig {
  id: string
  name: string
  /** Registered extractor id that drives this source */
  extractor: string
  enabled: boolean
  minDelay: number
  maxDelay: number
  maxListings: number
  allowedStates: string[]
  /** Extractor-specific discovery parameters, validated by the extractor */
  discovery: Record<string, unknown>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetching
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchOptions {
  timeoutMs?: number
  maxSizeBytes?: number
  headers?: Record<string, string>
  /** Aborts the request when the owning session closes */
  signal?: AbortSignal
}

export interface FetchResponse {
  /** Final URL after redirects */
  url: string
  statusCode: number
  body: string
  /** sha256 of the body, first 32 hex chars */
  contentHash: string
  durationMs: number
}

/**
 * Single-attempt fetcher. Throws FetchError on any failure; retries are the
 * caller's concern (see withRetry).
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResponse>
}

/**
 * Fetch resource scoped to one run (HTTP client, browser page, ...).
 * The orchestrator opens it before discovery and closes it on every exit path.
 */
export interface FetchSession {
  readonly kind: string
  open(): Promise<void>
  fetch(url: string): Promise<FetchResponse>
  close(): Promise<void>
}

export type FetchSessionFactory = (source: SourceConfig) => FetchSession

/**
 * Honest identification. No user-agent rotation.
 */
export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  'User-Agent': 'DoorstepBot/1.0 (+address harvester; polite crawling)',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
}

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 10_000,
  maxSizeBytes: 10 * 1024 * 1024,
} satisfies FetchOptions

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries: number
  /** Sleep backoffFactor ** attempt seconds before the next attempt */
  backoffFactor: number
  retryableStatusCodes: readonly number[]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  backoffFactor: 2.0,
  retryableStatusCodes: [408, 429, 500, 502, 503, 504],
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extractor Capability
// ═══════════════════════════════════════════════════════════════════════════════

/** A page to fetch. id is stable within a run (usually the canonical URL). */
export interface FetchTarget {
  id: string
  url: string
}

/**
 * Unvalidated address fragments pulled from a page. Any field may be missing.
 */
export interface RawCandidate {
  street?: string
  city?: string
  state?: string
  zipCode?: string
  url?: string
}

export interface ExtractorContext {
  source: SourceConfig
  logger: ILogger
  /** Rate-limited, throttled, retried fetch bound to the run's session */
  fetch(url: string): Promise<FetchResponse>
}

/**
 * Site-specific discovery and parsing. The orchestrator depends only on this
 * interface and never inspects which extractor it drives.
 */
export interface Extractor {
  readonly id: string
  readonly version: string
  readonly description?: string

  /**
   * Produce the targets for a run. Must be finite: paginated discovery is
   * capped by a hard page ceiling.
   */
  discover(ctx: ExtractorContext): Promise<FetchTarget[]>

  /**
   * Pull raw candidates out of fetched content. Throws ParseError on content
   * it cannot interpret; returns [] when the page simply has no address.
   */
  extract(content: string, target: FetchTarget, ctx: ExtractorContext): RawCandidate[]
}

/** Lookup table from extractor id to implementation. */
export interface ExtractorRegistry {
  register(extractor: Extractor): void
  get(id: string): Extractor | undefined
  has(id: string): boolean
  list(): string[]
  size(): number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Persisted Records
// ═══════════════════════════════════════════════════════════════════════════════

export interface AddressFields {
  street: string
  city: string
  state: string
  zipCode: string
}

export interface NewListing extends AddressFields {
  listingUrl: string | null
  sourceWebsite: string
  fingerprint: string
  notes?: string | null
}

export interface Listing extends AddressFields {
  id: number
  listingUrl: string | null
  sourceWebsite: string
  scrapedAt: Date
  lastUpdated: Date
  fingerprint: string
  isExported: boolean
  notes: string | null
}

export type SessionStatus = 'completed' | 'failed'

export interface SessionRecord {
  sourceWebsite: string
  /** Defaults to the time of recording */
  scrapeStart?: Date
  listingsFound: number
  listingsNew: number
  listingsDuplicates: number
  errors: number
  status: SessionStatus
  errorMessage?: string | null
}

export interface ScrapeSession {
  id: number
  sourceWebsite: string
  scrapeStart: Date
  scrapeEnd: Date
  listingsFound: number
  listingsNew: number
  listingsDuplicates: number
  errors: number
  status: SessionStatus
  errorMessage: string | null
}
