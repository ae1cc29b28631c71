/**
 * Scraping engine
 *
 * Discovery, polite fetching, address extraction, normalization, fingerprint
 * dedupe, session bookkeeping and CSV export.
 */

// Core types
export * from './types.js'
export * from './errors.js'

// Orchestration
export {
  HarvestOrchestrator,
  type OrchestratorContext,
  type RateLimiter,
  type RunResult,
  type RunSourcesOptions,
  type RunState,
} from './orchestrator.js'

// Registry and extractors
export { InMemoryExtractorRegistry } from './registry.js'
export * from './extractors/index.js'

// Fetch layer
export { HttpFetcher } from './fetch/http-fetcher.js'
export { HttpFetchSession, createHttpSessionFactory } from './fetch/session.js'
export { SourceRateLimiter, type SourceRateLimiterOptions } from './fetch/rate-limiter.js'
export { RequestThrottler, type RequestThrottlerOptions } from './fetch/throttler.js'
export { backoffDelayMs, isRetryableError, withRetry, type WithRetryOptions } from './fetch/retry.js'

// Normalization
export {
  STATE_ABBREVIATIONS,
  extractZip,
  formatMailingLabel,
  isValidAddress,
  normalizeAddress,
  normalizeCity,
  normalizeState,
  normalizeStreet,
  normalizeZip,
} from './normalize/address.js'
export { addressFingerprint, toNewListing } from './normalize/fingerprint.js'

// Storage
export { MemoryHarvestStore } from './store/memory-store.js'
export { PgHarvestStore } from './store/pg-store.js'
export * from './store/types.js'

// Export
export {
  EXPORT_COLUMNS,
  defaultExportFilename,
  exportListings,
  renderListingsCsv,
  type ExportOptions,
} from './export/csv-exporter.js'

// Utilities
export { canonicalizeUrl, getRegistrableDomain, isDomainAllowed, type DomainFilter } from './utils/url.js'
