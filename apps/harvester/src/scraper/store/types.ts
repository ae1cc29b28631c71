import type { Listing, NewListing, ScrapeSession, SessionRecord } from '../types.js'

export interface ListingQuery {
  source?: string
  /** Default false (not yet exported). 'all' disables the filter. */
  exported?: boolean | 'all'
  limit?: number
  offset?: number
}

export interface CountQuery {
  source?: string
  /** Default: count regardless of export state */
  exported?: boolean
}

export interface BulkInsertResult {
  newCount: number
  duplicateCount: number
  insertedIds: number[]
}

export interface HistoryQuery {
  source?: string
  /** Default 10 */
  limit?: number
}

/**
 * Listings keyed by fingerprint. Inserting a fingerprint that already exists
 * is a no-op reported as a duplicate, never an error.
 */
export interface ListingStore {
  /** New row id, or null when the fingerprint already exists. */
  insert(listing: NewListing): Promise<number | null>
  bulkInsert(listings: readonly NewListing[]): Promise<BulkInsertResult>
  /** Most recently scraped first. */
  getListings(query?: ListingQuery): Promise<Listing[]>
  countListings(query?: CountQuery): Promise<number>
  /** Sets the exported flag and refreshes last_updated. Returns rows changed. */
  markExported(ids: readonly number[]): Promise<number>
  /** Deletes every listing and session. The only delete path. */
  clearAll(): Promise<void>
}

/** Append-only run log. */
export interface SessionStore {
  recordSession(record: SessionRecord): Promise<ScrapeSession>
  /** Most recent first. */
  getHistory(query?: HistoryQuery): Promise<ScrapeSession[]>
}

export interface HarvestStore extends ListingStore, SessionStore {
  close(): Promise<void>
}

export const DEFAULT_HISTORY_LIMIT = 10
