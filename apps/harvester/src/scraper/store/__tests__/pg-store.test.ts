import { describe, expect, it, vi } from 'vitest'
import { PgHarvestStore } from '../pg-store.js'
import { PersistenceError } from '../../errors.js'
import type { NewListing } from '../../types.js'

const newListing = (overrides: Partial<NewListing> = {}): NewListing => ({
  street: '123 Main St',
  city: 'Springfield',
  state: 'IL',
  zipCode: '62701',
  listingUrl: 'https://example.com/homes/1',
  sourceWebsite: 'example-fsbo',
  fingerprint: 'a'.repeat(32),
  ...overrides,
})

const createPool = (): any => ({
  query: vi.fn(),
  end: vi.fn().mockResolvedValue(undefined),
})

describe('PgHarvestStore', () => {
  it('inserts a batch in one statement and counts returned ids as new', async () => {
    const pool = createPool()
    pool.query.mockResolvedValue({ rows: [{ id: 7 }, { id: 8 }], rowCount: 2 })
    const store = new PgHarvestStore(pool)

    const result = await store.bulkInsert([
      newListing(),
      newListing(),
      newListing({ street: '456 Oak Ave', fingerprint: 'b'.repeat(32) }),
    ])

    expect(result).toEqual({ newCount: 2, duplicateCount: 1, insertedIds: [7, 8] })
    expect(pool.query).toHaveBeenCalledTimes(1)
    const [sql, params] = pool.query.mock.calls[0]
    expect(sql).toContain('ON CONFLICT (fingerprint) DO NOTHING')
    expect(sql).toContain('($17, $18, $19, $20, $21, $22, $23, $24)')
    expect(params).toHaveLength(24)
    expect(params.slice(0, 8)).toEqual([
      '123 Main St',
      'Springfield',
      'IL',
      '62701',
      'https://example.com/homes/1',
      'example-fsbo',
      'a'.repeat(32),
      null,
    ])
  })

  it('returns null from insert when the fingerprint already exists', async () => {
    const pool = createPool()
    pool.query.mockResolvedValue({ rows: [], rowCount: 0 })

    expect(await new PgHarvestStore(pool).insert(newListing())).toBeNull()
  })

  it('skips the database for an empty batch', async () => {
    const pool = createPool()

    expect(await new PgHarvestStore(pool).bulkInsert([])).toEqual({
      newCount: 0,
      duplicateCount: 0,
      insertedIds: [],
    })
    expect(pool.query).not.toHaveBeenCalled()
  })

  it('builds listing queries with the not-exported default', async () => {
    const pool = createPool()
    const scrapedAt = new Date('2024-03-01T12:00:00Z')
    pool.query.mockResolvedValue({
      rows: [
        {
          id: 1,
          street: '123 Main St',
          city: 'Springfield',
          state: 'IL',
          zip_code: '62701',
          listing_url: null,
          source_website: 'example-fsbo',
          scraped_at: scrapedAt,
          last_updated: scrapedAt,
          fingerprint: 'a'.repeat(32),
          is_exported: false,
          notes: null,
        },
      ],
    })
    const store = new PgHarvestStore(pool)

    const rows = await store.getListings({ source: 'example-fsbo', limit: 5, offset: 10 })

    const [sql, params] = pool.query.mock.calls[0]
    expect(sql).toContain('WHERE source_website = $1 AND is_exported = $2')
    expect(sql).toContain('ORDER BY scraped_at DESC, id DESC LIMIT $3 OFFSET $4')
    expect(params).toEqual(['example-fsbo', false, 5, 10])
    expect(rows[0]).toMatchObject({ zipCode: '62701', sourceWebsite: 'example-fsbo', isExported: false })
  })

  it('omits the export filter for exported: all', async () => {
    const pool = createPool()
    pool.query.mockResolvedValue({ rows: [] })

    await new PgHarvestStore(pool).getListings({ exported: 'all' })

    const [sql, params] = pool.query.mock.calls[0]
    expect(sql).not.toContain('WHERE')
    expect(params).toEqual([])
  })

  it('marks exported by id array', async () => {
    const pool = createPool()
    pool.query.mockResolvedValue({ rows: [], rowCount: 2 })

    expect(await new PgHarvestStore(pool).markExported([3, 4])).toBe(2)
    expect(pool.query.mock.calls[0][1]).toEqual([[3, 4]])
    expect(await new PgHarvestStore(pool).markExported([])).toBe(0)
    expect(pool.query).toHaveBeenCalledTimes(1)
  })

  it('maps session rows and applies the default history limit', async () => {
    const pool = createPool()
    const at = new Date('2024-03-01T12:00:00Z')
    pool.query.mockResolvedValue({
      rows: [
        {
          id: 4,
          source_website: 'example-fsbo',
          scrape_start: at,
          scrape_end: at,
          listings_found: 3,
          listings_new: 2,
          listings_duplicates: 1,
          errors: 0,
          status: 'completed',
          error_message: null,
        },
      ],
    })

    const history = await new PgHarvestStore(pool).getHistory()

    expect(pool.query.mock.calls[0][1]).toEqual([10])
    expect(history[0]).toEqual({
      id: 4,
      sourceWebsite: 'example-fsbo',
      scrapeStart: at,
      scrapeEnd: at,
      listingsFound: 3,
      listingsNew: 2,
      listingsDuplicates: 1,
      errors: 0,
      status: 'completed',
      errorMessage: null,
    })
  })

  it('stamps session start and end from the app clock', async () => {
    const pool = createPool()
    const start = new Date('2024-03-01T12:00:00Z')
    const end = new Date('2024-03-01T12:05:00Z')
    pool.query.mockResolvedValue({
      rows: [
        {
          id: 5,
          source_website: 'example-fsbo',
          scrape_start: start,
          scrape_end: end,
          listings_found: 1,
          listings_new: 1,
          listings_duplicates: 0,
          errors: 0,
          status: 'completed',
          error_message: null,
        },
      ],
    })
    const store = new PgHarvestStore(pool, { now: () => end.getTime() })

    await store.recordSession({
      sourceWebsite: 'example-fsbo',
      scrapeStart: start,
      listingsFound: 1,
      listingsNew: 1,
      listingsDuplicates: 0,
      errors: 0,
      status: 'completed',
    })

    const [sql, params] = pool.query.mock.calls[0]
    expect(sql).not.toContain('now()')
    expect(params).toEqual(['example-fsbo', start, end, 1, 1, 0, 0, 'completed', null])
  })

  it('wraps driver failures in PersistenceError', async () => {
    const pool = createPool()
    pool.query.mockRejectedValue(new Error('connection refused'))

    const error = await new PgHarvestStore(pool).bulkInsert([newListing()]).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(PersistenceError)
    expect(error).toMatchObject({ message: 'insert failed: connection refused', code: 'PERSISTENCE_FAILED' })
  })

  it('closes the pool', async () => {
    const pool = createPool()
    await new PgHarvestStore(pool).close()
    expect(pool.end).toHaveBeenCalledTimes(1)
  })
})
