import { describe, expect, it } from 'vitest'
import { MemoryHarvestStore } from '../memory-store.js'
import { toNewListing } from '../../normalize/fingerprint.js'
import { normalizeAddress } from '../../normalize/address.js'
import type { NewListing } from '../../types.js'

const listing = (street: string, source = 'example-fsbo', zipCode = '62701'): NewListing =>
  toNewListing(
    normalizeAddress({ street, city: 'Springfield', state: 'IL', zipCode }),
    source,
    `https://example.com/${encodeURIComponent(street)}`
  )

function createStore() {
  let now = Date.parse('2024-03-01T12:00:00Z')
  const store = new MemoryHarvestStore({ now: () => now })
  const tick = (ms = 1000) => {
    now += ms
  }
  return { store, tick }
}

describe('MemoryHarvestStore listings', () => {
  it('reports [A, A, B] as two new and one duplicate', async () => {
    const { store } = createStore()
    const a = listing('123 Main St')
    const b = listing('456 Oak Ave')

    const result = await store.bulkInsert([a, a, b])

    expect(result.newCount).toBe(2)
    expect(result.duplicateCount).toBe(1)
    expect(result.insertedIds).toEqual([1, 2])
    expect(await store.countListings()).toBe(2)
  })

  it('treats a duplicate insert as a no-op returning null', async () => {
    const { store } = createStore()

    expect(await store.insert(listing('123 main street'))).toBe(1)
    expect(await store.insert(listing('  123 MAIN Street '))).toBeNull()
    expect(await store.countListings()).toBe(1)
  })

  it('lists not-yet-exported rows by default, newest first', async () => {
    const { store, tick } = createStore()
    await store.insert(listing('1 Elm St'))
    tick()
    await store.insert(listing('2 Elm St'))
    tick()
    await store.insert(listing('3 Elm St'))
    await store.markExported([2])

    const rows = await store.getListings()

    expect(rows.map((r) => r.street)).toEqual(['3 Elm St', '1 Elm St'])
    expect((await store.getListings({ exported: true })).map((r) => r.id)).toEqual([2])
    expect((await store.getListings({ exported: 'all' })).map((r) => r.id)).toEqual([3, 2, 1])
  })

  it('filters by source and paginates', async () => {
    const { store, tick } = createStore()
    for (const n of [1, 2, 3, 4]) {
      await store.insert(listing(`${n} Pine Rd`, n % 2 === 0 ? 'even-source' : 'odd-source'))
      tick()
    }

    expect((await store.getListings({ source: 'even-source' })).map((r) => r.street)).toEqual([
      '4 Pine Rd',
      '2 Pine Rd',
    ])
    expect((await store.getListings({ limit: 2, offset: 1 })).map((r) => r.street)).toEqual([
      '3 Pine Rd',
      '2 Pine Rd',
    ])
    expect(await store.countListings({ source: 'odd-source' })).toBe(2)
  })

  it('marks rows exported and refreshes last_updated', async () => {
    const { store, tick } = createStore()
    await store.insert(listing('1 Elm St'))
    const [before] = await store.getListings()
    tick(5000)

    expect(await store.markExported([1, 99])).toBe(1)

    const [after] = await store.getListings({ exported: true })
    expect(after.isExported).toBe(true)
    expect(after.lastUpdated.getTime() - before.lastUpdated.getTime()).toBe(5000)
    expect(after.scrapedAt).toEqual(before.scrapedAt)
    expect(await store.countListings({ exported: false })).toBe(0)
  })

  it('clearAll removes listings, sessions and fingerprints', async () => {
    const { store } = createStore()
    const a = listing('1 Elm St')
    await store.insert(a)
    await store.recordSession({
      sourceWebsite: 'example-fsbo',
      listingsFound: 1,
      listingsNew: 1,
      listingsDuplicates: 0,
      errors: 0,
      status: 'completed',
    })

    await store.clearAll()

    expect(await store.countListings()).toBe(0)
    expect(await store.getHistory()).toEqual([])
    expect(await store.insert(a)).not.toBeNull()
  })
})

describe('MemoryHarvestStore sessions', () => {
  it('records one row with start/end bracketing the call', async () => {
    const { store } = createStore()
    const start = new Date('2024-03-01T11:59:00Z')

    const session = await store.recordSession({
      sourceWebsite: 'example-fsbo',
      scrapeStart: start,
      listingsFound: 3,
      listingsNew: 2,
      listingsDuplicates: 1,
      errors: 1,
      status: 'completed',
    })

    expect(session).toEqual({
      id: 1,
      sourceWebsite: 'example-fsbo',
      scrapeStart: start,
      scrapeEnd: new Date('2024-03-01T12:00:00Z'),
      listingsFound: 3,
      listingsNew: 2,
      listingsDuplicates: 1,
      errors: 1,
      status: 'completed',
      errorMessage: null,
    })
  })

  it('returns history most recent first, filtered and limited', async () => {
    const { store, tick } = createStore()
    for (const [i, source] of ['a', 'b', 'a', 'a'].entries()) {
      await store.recordSession({
        sourceWebsite: source,
        listingsFound: i,
        listingsNew: 0,
        listingsDuplicates: 0,
        errors: 0,
        status: i === 3 ? 'failed' : 'completed',
        errorMessage: i === 3 ? 'discovery failed' : null,
      })
      tick()
    }

    const history = await store.getHistory({ source: 'a', limit: 2 })

    expect(history.map((s) => s.listingsFound)).toEqual([3, 2])
    expect(history[0].status).toBe('failed')
    expect(history[0].errorMessage).toBe('discovery failed')
    expect(await store.getHistory()).toHaveLength(4)
  })
})
