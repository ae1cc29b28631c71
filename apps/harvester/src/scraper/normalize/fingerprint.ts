import { createHash } from 'crypto'
import type { AddressFields, NewListing } from '../types.js'

/**
 * Dedup key: md5 hex of lowercased street, city, state plus the ZIP.
 * Callers pass normalized fields; two spellings that normalize alike share a key.
 */
export function addressFingerprint(address: AddressFields): string {
  const key =
    address.street.toLowerCase() + address.city.toLowerCase() + address.state.toLowerCase() + address.zipCode
  return createHash('md5').update(key).digest('hex')
}

export function toNewListing(
  address: AddressFields,
  sourceWebsite: string,
  listingUrl: string | null,
  notes: string | null = null
): NewListing {
  return {
    ...address,
    listingUrl,
    sourceWebsite,
    fingerprint: addressFingerprint(address),
    notes,
  }
}
