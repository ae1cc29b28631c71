import { describe, expect, it } from 'vitest'
import { addressFingerprint, toNewListing } from '../fingerprint.js'
import { normalizeAddress } from '../address.js'

describe('addressFingerprint', () => {
  it('is the md5 of lowercased street, city, state and the zip', () => {
    // md5('123 main stspringfieldil62701')
    const fp = addressFingerprint({ street: '123 Main St', city: 'Springfield', state: 'IL', zipCode: '62701' })

    expect(fp).toMatch(/^[0-9a-f]{32}$/)
    expect(fp).toBe(addressFingerprint({ street: '123 main st', city: 'springfield', state: 'il', zipCode: '62701' }))
  })

  it('collapses spellings that differ only by case and whitespace', () => {
    const a = normalizeAddress({ street: '123 Main Street', city: 'Springfield', state: 'IL', zipCode: '62701' })
    const b = normalizeAddress({ street: '  123  MAIN street ', city: ' SPRINGFIELD', state: 'il ', zipCode: '62701' })

    expect(addressFingerprint(a)).toBe(addressFingerprint(b))
  })

  it('separates different ZIPs', () => {
    const base = { street: '123 Main St', city: 'Springfield', state: 'IL' }
    expect(addressFingerprint({ ...base, zipCode: '62701' })).not.toBe(
      addressFingerprint({ ...base, zipCode: '62702' })
    )
  })
})

describe('toNewListing', () => {
  it('attaches source, url and fingerprint', () => {
    const address = { street: '1 Elm St', city: 'Dover', state: 'DE', zipCode: '19901' }
    const listing = toNewListing(address, 'example-fsbo', 'https://example.com/homes/1')

    expect(listing).toEqual({
      ...address,
      sourceWebsite: 'example-fsbo',
      listingUrl: 'https://example.com/homes/1',
      fingerprint: addressFingerprint(address),
      notes: null,
    })
  })
})
