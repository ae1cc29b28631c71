/**
 * USPS-style address normalization
 *
 * Every function here is pure and idempotent: f(f(x)) === f(x).
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import type { AddressFields, RawCandidate } from '../types.js'

const stateTableSchema = z.record(z.string(), z.string().regex(/^[A-Z]{2}$/))

/** Full state name (lowercase) → USPS code. 50 states + DC. */
export const STATE_ABBREVIATIONS: Readonly<Record<string, string>> = stateTableSchema.parse(
  JSON.parse(readFileSync(new URL('./data/us-states.json', import.meta.url), 'utf-8'))
)

const DIRECTIONALS: Readonly<Record<string, string>> = {
  north: 'N',
  south: 'S',
  east: 'E',
  west: 'W',
  northeast: 'NE',
  northwest: 'NW',
  southeast: 'SE',
  southwest: 'SW',
  // Title-casing turns "NE" into "Ne"; map back so the function stays idempotent
  ne: 'NE',
  nw: 'NW',
  se: 'SE',
  sw: 'SW',
}

const STREET_TYPES: Readonly<Record<string, string>> = {
  street: 'St',
  st: 'St',
  avenue: 'Ave',
  ave: 'Ave',
  road: 'Rd',
  rd: 'Rd',
  drive: 'Dr',
  dr: 'Dr',
  boulevard: 'Blvd',
  blvd: 'Blvd',
  court: 'Ct',
  ct: 'Ct',
  lane: 'Ln',
  ln: 'Ln',
  way: 'Way',
  circle: 'Cir',
  cir: 'Cir',
  trail: 'Trl',
  trl: 'Trl',
  parkway: 'Pkwy',
  pkwy: 'Pkwy',
  plaza: 'Plz',
  plz: 'Plz',
  terrace: 'Ter',
  ter: 'Ter',
  highway: 'Hwy',
  hwy: 'Hwy',
}

// Word edges by Unicode letter/digit, so accented letters are not boundaries
const wordPattern = (table: Readonly<Record<string, string>>): RegExp =>
  new RegExp(`(?<![\\p{L}\\p{N}])(${Object.keys(table).join('|')})(?![\\p{L}\\p{N}])`, 'giu')

const DIRECTIONAL_PATTERN = wordPattern(DIRECTIONALS)
const STREET_TYPE_PATTERN = wordPattern(STREET_TYPES)

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

/** Uppercase the first letter of every word; everything else lowercase. */
function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^\p{L}\p{N}'])(\p{L})/gu, (_m, lead: string, ch: string) => lead + ch.toUpperCase())
}

function replaceWords(value: string, pattern: RegExp, table: Readonly<Record<string, string>>): string {
  return value.replace(pattern, (word: string) => table[word.toLowerCase()] ?? word)
}

export function normalizeStreet(street: string | undefined | null): string {
  if (!street) return ''

  let result = titleCase(collapseWhitespace(street))
  result = replaceWords(result, DIRECTIONAL_PATTERN, DIRECTIONALS)
  result = replaceWords(result, STREET_TYPE_PATTERN, STREET_TYPES)
  return result.trim()
}

export function normalizeCity(city: string | undefined | null): string {
  if (!city) return ''
  return titleCase(collapseWhitespace(city))
}

/**
 * Two letters → uppercased as-is. Full name → table lookup.
 * Anything else → uppercased input (lenient, not an error).
 */
export function normalizeState(state: string | undefined | null): string {
  if (!state) return ''

  const key = collapseWhitespace(state).toLowerCase()
  if (/^[a-z]{2}$/.test(key)) {
    return key.toUpperCase()
  }
  return STATE_ABBREVIATIONS[key] ?? key.toUpperCase()
}

/** "62701" | "62701-1234", or "" when the digits do not form a ZIP. */
export function normalizeZip(zip: string | undefined | null): string {
  if (!zip) return ''

  const digits = zip.replace(/\D/g, '')
  if (digits.length >= 9) {
    return `${digits.slice(0, 5)}-${digits.slice(5, 9)}`
  }
  if (digits.length === 5) {
    return digits
  }
  return ''
}

export function normalizeAddress(raw: Pick<RawCandidate, 'street' | 'city' | 'state' | 'zipCode'>): AddressFields {
  return {
    street: normalizeStreet(raw.street),
    city: normalizeCity(raw.city),
    state: normalizeState(raw.state),
    zipCode: normalizeZip(raw.zipCode),
  }
}

export function isValidAddress(address: AddressFields): boolean {
  return address.street !== '' && address.city !== '' && address.state !== '' && address.zipCode !== ''
}

/**
 * Two-line mailing label:
 *
 *   123 Main St
 *   Springfield, IL 62701
 */
export function formatMailingLabel(address: AddressFields): string {
  return `${address.street}\n${address.city}, ${address.state} ${address.zipCode}`
}

/** First ZIP or ZIP+4 in free text. */
export function extractZip(text: string): string | null {
  const match = /\b\d{5}(?:-\d{4})?\b/.exec(text)
  return match ? match[0] : null
}
