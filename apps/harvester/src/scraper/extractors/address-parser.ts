/**
 * Free-text address heuristics shared by the text strategies.
 */

import { STATE_ABBREVIATIONS, extractZip } from '../normalize/address.js'

export interface ParsedAddress {
  street: string
  city: string
  state: string
  zipCode: string
}

const STREET_NUMBER = /\b\d{1,5}\b/
const FIVE_DIGIT_ZIP = /\b\d{5}\b/
const STATE_CODE = /\b([A-Z]{2})\b/
const STATE_NAME = new RegExp(`\\b(${Object.keys(STATE_ABBREVIATIONS).join('|')})\\b`, 'i')

const MAX_ADDRESS_CHARS = 240
const MAX_ADDRESS_WORDS = 28

/** Page chrome that tends to sit next to addresses and carry numbers. */
const BLOCKED_PHRASES = [
  'sign in',
  'sign up',
  'login',
  'continue with',
  'get started',
  'forgot password',
  'mortgage',
  'payment calculator',
  'home affordability',
  'welcome',
  'by clicking',
  'privacy',
  'terms',
  'list my property',
]

/**
 * Split one address string into components. Handles
 *
 *   "123 Main St, Springfield, IL 62701"
 *   "123 Main St\nSpringfield, IL 62701"
 *   "123 Main St / Springfield / IL / 62701"
 *   "123 Main St, Springfield IL 62701"
 *
 * Missing pieces come back as empty strings.
 */
export function parseAddressLine(line: string): ParsedAddress {
  const result: ParsedAddress = { street: '', city: '', state: '', zipCode: extractZip(line) ?? '' }

  const parts = line
    .split(/[,/\n]/)
    .map((part) => part.trim())
    .filter((part) => part !== '')

  if (parts.length === 0) return result
  result.street = parts[0]
  if (parts.length === 1) return result

  // Two-letter codes first so a city named like a state ("Washington, DC") stays the city
  for (const pattern of [STATE_CODE, STATE_NAME]) {
    for (let i = 1; i < parts.length; i++) {
      const match = pattern.exec(parts[i])
      if (!match) continue

      result.state = match[1]
      // "Springfield IL 62701": city shares the part with the state
      result.city = i > 1 ? parts[1] : parts[i].slice(0, match.index).trim()
      return result
    }
  }

  result.city = parts[1]
  return result
}

/** A street number and a 5-digit ZIP somewhere in the text. */
export function isLikelyAddress(text: string): boolean {
  return STREET_NUMBER.test(text) && FIVE_DIGIT_ZIP.test(text)
}

/** Rejects long blocks, UI copy and text with no street number. */
export function isPlausibleAddressText(text: string): boolean {
  const cleaned = text.replace(/\s+/g, ' ').trim()

  if (cleaned.length > MAX_ADDRESS_CHARS) return false
  if (cleaned.split(' ').length > MAX_ADDRESS_WORDS) return false
  if (!STREET_NUMBER.test(cleaned)) return false

  const lower = cleaned.toLowerCase()
  return !BLOCKED_PHRASES.some((phrase) => lower.includes(phrase))
}

/**
 * Street lines that start with a price or lack a house number are not
 * addresses, whatever the other fields say.
 */
export function isAcceptableStreet(street: string): boolean {
  const trimmed = street.trim()
  return trimmed !== '' && !trimmed.startsWith('$') && STREET_NUMBER.test(trimmed)
}
