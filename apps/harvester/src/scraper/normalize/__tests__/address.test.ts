import { describe, expect, it } from 'vitest'
import {
  STATE_ABBREVIATIONS,
  extractZip,
  formatMailingLabel,
  isValidAddress,
  normalizeAddress,
  normalizeCity,
  normalizeState,
  normalizeStreet,
  normalizeZip,
} from '../address.js'

describe('normalizeStreet', () => {
  it.each([
    ['123 main street', '123 Main St'],
    ['  456   OAK   avenue ', '456 Oak Ave'],
    ['789 north elm road', '789 N Elm Rd'],
    ['10 Southwest Pine Boulevard', '10 SW Pine Blvd'],
    ['22 ne willow lane', '22 NE Willow Ln'],
    ['5 Cedar Ct', '5 Cedar Ct'],
    ['900 Lakeshore Parkway', '900 Lakeshore Pkwy'],
    ['1 Sunset Way', '1 Sunset Way'],
  ])('%s → %s', (input, expected) => {
    expect(normalizeStreet(input)).toBe(expected)
  })

  it('is idempotent', () => {
    for (const input of ['123 main street', '10 southwest pine terrace', '77 EAST HIGHWAY 9', "4 o'hara circle"]) {
      const once = normalizeStreet(input)
      expect(normalizeStreet(once)).toBe(once)
    }
  })

  it('does not touch street-type letters inside words', () => {
    expect(normalizeStreet('12 Westfield Drive')).toBe('12 Westfield Dr')
    expect(normalizeStreet('3 Stone Court')).toBe('3 Stone Ct')
  })

  it('keeps accented letters inside words', () => {
    expect(normalizeStreet('12 münchen street')).toBe('12 München St')
    expect(normalizeStreet('8 cañave road')).toBe('8 Cañave Rd')
  })

  it('returns empty for missing input', () => {
    expect(normalizeStreet('')).toBe('')
    expect(normalizeStreet(undefined)).toBe('')
  })
})

describe('normalizeCity', () => {
  it('collapses whitespace and title-cases', () => {
    expect(normalizeCity('  san   FRANCISCO ')).toBe('San Francisco')
    expect(normalizeCity('springfield')).toBe('Springfield')
    expect(normalizeCity(null)).toBe('')
  })

  it('title-cases names with accented letters', () => {
    expect(normalizeCity('cañon city')).toBe('Cañon City')
    expect(normalizeCity('ESPAÑOLA')).toBe('Española')
  })
})

describe('normalizeState', () => {
  it('maps every full state name, in any case, to its code', () => {
    for (const [name, code] of Object.entries(STATE_ABBREVIATIONS)) {
      expect(normalizeState(name)).toBe(code)
      expect(normalizeState(name.toUpperCase())).toBe(code)
      expect(normalizeState(normalizeState(name))).toBe(code)
    }
  })

  it('uppercases two-letter codes as-is', () => {
    expect(normalizeState('ca')).toBe('CA')
    expect(normalizeState('TX')).toBe('TX')
    expect(normalizeState(' il ')).toBe('IL')
  })

  it('covers 50 states plus DC', () => {
    expect(Object.keys(STATE_ABBREVIATIONS)).toHaveLength(51)
    expect(normalizeState('illinois')).toBe('IL')
    expect(normalizeState('District of Columbia')).toBe('DC')
    expect(normalizeState('new   york')).toBe('NY')
  })

  it('falls back to the uppercased input for unknown names', () => {
    expect(normalizeState('ontario')).toBe('ONTARIO')
    expect(normalizeState('')).toBe('')
  })
})

describe('normalizeZip', () => {
  it('formats 5 and 9 digit codes and rejects the rest', () => {
    expect(normalizeZip('62701')).toBe('62701')
    expect(normalizeZip('62701-1234')).toBe('62701-1234')
    expect(normalizeZip('627011234')).toBe('62701-1234')
    expect(normalizeZip('62')).toBe('')
    expect(normalizeZip('1234567')).toBe('')
    expect(normalizeZip('ZIP: 62701')).toBe('62701')
  })

  it('is idempotent', () => {
    for (const input of ['62701', '627011234', '62701 1234', 'abc']) {
      const once = normalizeZip(input)
      expect(normalizeZip(once)).toBe(once)
    }
  })
})

describe('normalizeAddress / isValidAddress', () => {
  it('normalizes every field of a raw candidate', () => {
    const address = normalizeAddress({
      street: '123 main street',
      city: 'springfield',
      state: 'illinois',
      zipCode: '62701',
    })

    expect(address).toEqual({ street: '123 Main St', city: 'Springfield', state: 'IL', zipCode: '62701' })
    expect(isValidAddress(address)).toBe(true)
  })

  it('treats any empty field as invalid', () => {
    const address = normalizeAddress({ street: '123 main street', city: 'springfield', state: 'IL', zipCode: '62' })

    expect(address.zipCode).toBe('')
    expect(isValidAddress(address)).toBe(false)
    expect(isValidAddress(normalizeAddress({ city: 'x', state: 'IL', zipCode: '62701' }))).toBe(false)
  })
})

describe('formatMailingLabel / extractZip', () => {
  it('renders a two-line label', () => {
    expect(
      formatMailingLabel({ street: '123 Main St', city: 'Springfield', state: 'IL', zipCode: '62701' })
    ).toBe('123 Main St\nSpringfield, IL 62701')
  })

  it('finds the first ZIP in text', () => {
    expect(extractZip('Listed at 12 Elm St, Dover, DE 19901-2222 today')).toBe('19901-2222')
    expect(extractZip('Call 555-1234')).toBeNull()
  })
})
