/**
 * In-process store
 *
 * Single-threaded insert-or-reject on fingerprint. Used for STORE=memory
 * runs and as the stand-in for PostgreSQL in tests.
 */

import type { Listing, NewListing, ScrapeSession, SessionRecord } from '../types.js'
import { systemClock, type Clock } from '../utils/timing.js'
import {
  DEFAULT_HISTORY_LIMIT,
  type BulkInsertResult,
  type CountQuery,
  type HarvestStore,
  type HistoryQuery,
  type ListingQuery,
} from './types.js'

export class MemoryHarvestStore implements HarvestStore {
  private listings: Listing[] = []
  private sessions: ScrapeSession[] = []
  private readonly fingerprints = new Set<string>()
  private nextListingId = 1
  private nextSessionId = 1
  private readonly now: Clock

  constructor(options: { now?: Clock } = {}) {
    this.now = options.now ?? systemClock
  }

  async insert(listing: NewListing): Promise<number | null> {
    return this.insertSync(listing)
  }

  async bulkInsert(listings: readonly NewListing[]): Promise<BulkInsertResult> {
    const insertedIds: number[] = []
    for (const listing of listings) {
      const id = this.insertSync(listing)
      if (id !== null) insertedIds.push(id)
    }
    return {
      newCount: insertedIds.length,
      duplicateCount: listings.length - insertedIds.length,
      insertedIds,
    }
  }

  async getListings(query: ListingQuery = {}): Promise<Listing[]> {
    const exported = query.exported ?? false
    const offset = query.offset ?? 0

    const rows = this.listings
      .filter((l) => query.source === undefined || l.sourceWebsite === query.source)
      .filter((l) => exported === 'all' || l.isExported === exported)
      .sort((a, b) => b.scrapedAt.getTime() - a.scrapedAt.getTime() || b.id - a.id)

    const page = query.limit === undefined ? rows.slice(offset) : rows.slice(offset, offset + query.limit)
    return page.map((l) => ({ ...l }))
  }

  async countListings(query: CountQuery = {}): Promise<number> {
    return this.listings.filter(
      (l) =>
        (query.source === undefined || l.sourceWebsite === query.source) &&
        (query.exported === undefined || l.isExported === query.exported)
    ).length
  }

  async markExported(ids: readonly number[]): Promise<number> {
    const wanted = new Set(ids)
    const at = new Date(this.now())
    let changed = 0
    for (const listing of this.listings) {
      if (!wanted.has(listing.id)) continue
      listing.isExported = true
      listing.lastUpdated = at
      changed++
    }
    return changed
  }

  async clearAll(): Promise<void> {
    this.listings = []
    this.sessions = []
    this.fingerprints.clear()
  }

  async recordSession(record: SessionRecord): Promise<ScrapeSession> {
    const scrapeEnd = new Date(this.now())
    const session: ScrapeSession = {
      id: this.nextSessionId++,
      sourceWebsite: record.sourceWebsite,
      scrapeStart: record.scrapeStart ?? scrapeEnd,
      scrapeEnd,
      listingsFound: record.listingsFound,
      listingsNew: record.listingsNew,
      listingsDuplicates: record.listingsDuplicates,
      errors: record.errors,
      status: record.status,
      errorMessage: record.errorMessage ?? null,
    }
    this.sessions.push(session)
    return { ...session }
  }

  async getHistory(query: HistoryQuery = {}): Promise<ScrapeSession[]> {
    return this.sessions
      .filter((s) => query.source === undefined || s.sourceWebsite === query.source)
      .sort((a, b) => b.scrapeStart.getTime() - a.scrapeStart.getTime() || b.id - a.id)
      .slice(0, query.limit ?? DEFAULT_HISTORY_LIMIT)
      .map((s) => ({ ...s }))
  }

  async close(): Promise<void> {}

  private insertSync(listing: NewListing): number | null {
    if (this.fingerprints.has(listing.fingerprint)) {
      return null
    }

    const at = new Date(this.now())
    const row: Listing = {
      id: this.nextListingId++,
      street: listing.street,
      city: listing.city,
      state: listing.state,
      zipCode: listing.zipCode,
      listingUrl: listing.listingUrl,
      sourceWebsite: listing.sourceWebsite,
      scrapedAt: at,
      lastUpdated: at,
      fingerprint: listing.fingerprint,
      isExported: false,
      notes: listing.notes ?? null,
    }
    this.fingerprints.add(listing.fingerprint)
    this.listings.push(row)
    return row.id
  }
}
