/**
 * PostgreSQL store
 *
 * Dedup relies on the unique constraint on listings.fingerprint:
 * INSERT ... ON CONFLICT (fingerprint) DO NOTHING RETURNING id returns a row
 * only for addresses that were new. Concurrent source runs need no extra
 * locking. Schema: packages/db/sql.
 */

import type pg from 'pg'
import { PersistenceError, errorMessage } from '../errors.js'
import type { Listing, NewListing, ScrapeSession, SessionRecord, SessionStatus } from '../types.js'
import { systemClock, type Clock } from '../utils/timing.js'
import {
  DEFAULT_HISTORY_LIMIT,
  type BulkInsertResult,
  type CountQuery,
  type HarvestStore,
  type HistoryQuery,
  type ListingQuery,
} from './types.js'

/** Rows per INSERT statement; 8 params each keeps well under the 65535 bind limit. */
const INSERT_CHUNK_SIZE = 500

const LISTING_COLUMNS = `id, street, city, state, zip_code, listing_url, source_website,
  scraped_at, last_updated, fingerprint, is_exported, notes`

const SESSION_COLUMNS = `id, source_website, scrape_start, scrape_end, listings_found, listings_new,
  listings_duplicates, errors, status, error_message`

interface ListingRow {
  id: number
  street: string
  city: string
  state: string
  zip_code: string
  listing_url: string | null
  source_website: string
  scraped_at: Date
  last_updated: Date
  fingerprint: string
  is_exported: boolean
  notes: string | null
}

interface SessionRow {
  id: number
  source_website: string
  scrape_start: Date
  scrape_end: Date
  listings_found: number
  listings_new: number
  listings_duplicates: number
  errors: number
  status: SessionStatus
  error_message: string | null
}

type Queryable = Pick<pg.Pool, 'query' | 'end'>

export class PgHarvestStore implements HarvestStore {
  private readonly now: Clock

  /** Session times come from `now`, not the database clock, so start and end share one clock. */
  constructor(
    private readonly pool: Queryable,
    options: { now?: Clock } = {}
  ) {
    this.now = options.now ?? systemClock
  }

  async insert(listing: NewListing): Promise<number | null> {
    const { insertedIds } = await this.insertChunk([listing])
    return insertedIds[0] ?? null
  }

  async bulkInsert(listings: readonly NewListing[]): Promise<BulkInsertResult> {
    const insertedIds: number[] = []
    for (let i = 0; i < listings.length; i += INSERT_CHUNK_SIZE) {
      const chunk = listings.slice(i, i + INSERT_CHUNK_SIZE)
      const result = await this.insertChunk(chunk)
      insertedIds.push(...result.insertedIds)
    }
    return {
      newCount: insertedIds.length,
      duplicateCount: listings.length - insertedIds.length,
      insertedIds,
    }
  }

  async getListings(query: ListingQuery = {}): Promise<Listing[]> {
    const exported = query.exported ?? false
    const where: string[] = []
    const params: unknown[] = []

    if (query.source !== undefined) {
      params.push(query.source)
      where.push(`source_website = $${params.length}`)
    }
    if (exported !== 'all') {
      params.push(exported)
      where.push(`is_exported = $${params.length}`)
    }

    let sql = `SELECT ${LISTING_COLUMNS} FROM listings`
    if (where.length > 0) sql += ` WHERE ${where.join(' AND ')}`
    sql += ' ORDER BY scraped_at DESC, id DESC'

    if (query.limit !== undefined) {
      params.push(query.limit)
      sql += ` LIMIT $${params.length}`
    }
    if (query.offset !== undefined && query.offset > 0) {
      params.push(query.offset)
      sql += ` OFFSET $${params.length}`
    }

    const result = await this.query<ListingRow>('getListings', sql, params)
    return result.rows.map(rowToListing)
  }

  async countListings(query: CountQuery = {}): Promise<number> {
    const where: string[] = []
    const params: unknown[] = []

    if (query.source !== undefined) {
      params.push(query.source)
      where.push(`source_website = $${params.length}`)
    }
    if (query.exported !== undefined) {
      params.push(query.exported)
      where.push(`is_exported = $${params.length}`)
    }

    let sql = 'SELECT COUNT(*)::int AS count FROM listings'
    if (where.length > 0) sql += ` WHERE ${where.join(' AND ')}`

    const result = await this.query<{ count: number }>('countListings', sql, params)
    return result.rows[0]?.count ?? 0
  }

  async markExported(ids: readonly number[]): Promise<number> {
    if (ids.length === 0) return 0

    const result = await this.query(
      'markExported',
      'UPDATE listings SET is_exported = TRUE, last_updated = now() WHERE id = ANY($1::int[])',
      [[...ids]]
    )
    return result.rowCount ?? 0
  }

  async clearAll(): Promise<void> {
    await this.query('clearAll', 'TRUNCATE listings, scrape_sessions RESTART IDENTITY', [])
  }

  async recordSession(record: SessionRecord): Promise<ScrapeSession> {
    const scrapeEnd = new Date(this.now())
    const result = await this.query<SessionRow>(
      'recordSession',
      `INSERT INTO scrape_sessions (
        source_website, scrape_start, scrape_end, listings_found, listings_new,
        listings_duplicates, errors, status, error_message
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING ${SESSION_COLUMNS}`,
      [
        record.sourceWebsite,
        record.scrapeStart ?? scrapeEnd,
        scrapeEnd,
        record.listingsFound,
        record.listingsNew,
        record.listingsDuplicates,
        record.errors,
        record.status,
        record.errorMessage ?? null,
      ]
    )

    const row = result.rows[0]
    if (!row) {
      throw new PersistenceError('recordSession returned no row')
    }
    return rowToSession(row)
  }

  async getHistory(query: HistoryQuery = {}): Promise<ScrapeSession[]> {
    const params: unknown[] = []
    let sql = `SELECT ${SESSION_COLUMNS} FROM scrape_sessions`

    if (query.source !== undefined) {
      params.push(query.source)
      sql += ` WHERE source_website = $${params.length}`
    }

    params.push(query.limit ?? DEFAULT_HISTORY_LIMIT)
    sql += ` ORDER BY scrape_start DESC, id DESC LIMIT $${params.length}`

    const result = await this.query<SessionRow>('getHistory', sql, params)
    return result.rows.map(rowToSession)
  }

  async close(): Promise<void> {
    await this.pool.end()
  }

  private async insertChunk(chunk: readonly NewListing[]): Promise<{ insertedIds: number[] }> {
    if (chunk.length === 0) return { insertedIds: [] }

    const params: unknown[] = []
    const tuples = chunk.map((listing) => {
      const base = params.length
      params.push(
        listing.street,
        listing.city,
        listing.state,
        listing.zipCode,
        listing.listingUrl,
        listing.sourceWebsite,
        listing.fingerprint,
        listing.notes ?? null
      )
      const placeholders = Array.from({ length: 8 }, (_, i) => `$${base + i + 1}`)
      return `(${placeholders.join(', ')})`
    })

    const result = await this.query<{ id: number }>(
      'insert',
      `INSERT INTO listings (
        street, city, state, zip_code, listing_url, source_website, fingerprint, notes
      ) VALUES ${tuples.join(', ')}
      ON CONFLICT (fingerprint) DO NOTHING
      RETURNING id`,
      params
    )
    return { insertedIds: result.rows.map((row) => row.id) }
  }

  private async query<R extends pg.QueryResultRow>(
    operation: string,
    text: string,
    params: unknown[]
  ): Promise<pg.QueryResult<R>> {
    try {
      return await this.pool.query<R>(text, params)
    } catch (error) {
      throw new PersistenceError(`${operation} failed: ${errorMessage(error)}`, { cause: error })
    }
  }
}

function rowToListing(row: ListingRow): Listing {
  return {
    id: row.id,
    street: row.street,
    city: row.city,
    state: row.state,
    zipCode: row.zip_code,
    listingUrl: row.listing_url,
    sourceWebsite: row.source_website,
    scrapedAt: row.scraped_at,
    lastUpdated: row.last_updated,
    fingerprint: row.fingerprint,
    isExported: row.is_exported,
    notes: row.notes,
  }
}

function rowToSession(row: SessionRow): ScrapeSession {
  return {
    id: row.id,
    sourceWebsite: row.source_website,
    scrapeStart: row.scrape_start,
    scrapeEnd: row.scrape_end,
    listingsFound: row.listings_found,
    listingsNew: row.listings_new,
    listingsDuplicates: row.listings_duplicates,
    errors: row.errors,
    status: row.status,
    errorMessage: row.error_message,
  }
}
