/**
 * Address extraction strategies
 *
 * An ordered list of independent strategies, each turning a loaded page into
 * zero or more raw candidates. Site fragility lives here, not in the pipeline.
 *
 *   1. jsonLd          schema.org PostalAddress blocks
 *   2. addressRegions  text of elements that usually hold an address
 *   3. zipTextScan     any visible line containing a 5-digit ZIP
 */

import * as cheerio from 'cheerio'
import { z } from 'zod'
import type { ILogger } from '@doorstep/logger'
import type { RawCandidate } from '../types.js'
import { resolveUrl } from '../utils/url.js'
import { isAcceptableStreet, isLikelyAddress, isPlausibleAddressText, parseAddressLine } from './address-parser.js'
import { SELECTORS } from './selectors.js'

export interface PageDocument {
  $: cheerio.CheerioAPI
  /** URL the page was fetched from */
  url: string
  /** JSON-LD blocks, parsed before non-content elements are stripped */
  jsonLd: unknown[]
  logger?: ILogger
}

export interface AddressStrategy {
  readonly name: string
  collect(page: PageDocument): RawCandidate[]
}

/**
 * Parse HTML once for all strategies. Block elements are padded with line
 * breaks so element text reads line by line.
 */
export function loadPage(html: string, url: string, logger?: ILogger): PageDocument {
  const $ = cheerio.load(html)
  const jsonLd: unknown[] = []

  $(SELECTORS.jsonLd).each((index, el) => {
    const raw = $(el).text().trim()
    if (!raw) return

    try {
      jsonLd.push(JSON.parse(raw))
    } catch (error) {
      logger?.debug('Skipping malformed JSON-LD block', { url, index, reason: String(error) })
    }
  })

  $(SELECTORS.nonContent).remove()
  $('br').replaceWith('\n')
  $(SELECTORS.blockElements).each((_, el) => {
    $(el).prepend('\n').append('\n')
  })

  return { $, url, jsonLd, logger }
}

// ═══════════════════════════════════════════════════════════════════════════════
// JSON-LD
// ═══════════════════════════════════════════════════════════════════════════════

const jsonLdText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .optional()

const postalAddressSchema = z.object({
  streetAddress: jsonLdText,
  addressLocality: jsonLdText,
  addressRegion: jsonLdText,
  postalCode: jsonLdText,
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Breadth-first walk over @graph, itemListElement and item nesting. */
function flattenJsonLd(roots: unknown[]): Record<string, unknown>[] {
  const output: Record<string, unknown>[] = []
  const queue: unknown[] = [...roots]

  while (queue.length > 0) {
    const current = queue.shift()
    if (Array.isArray(current)) {
      queue.push(...current)
      continue
    }
    if (!isRecord(current)) continue

    output.push(current)
    for (const key of ['@graph', 'itemListElement', 'item', 'mainEntity']) {
      if (current[key] !== undefined) queue.push(current[key])
    }
  }

  return output
}

function fromJsonLdAddress(address: unknown, url: string): RawCandidate | null {
  if (typeof address === 'string') {
    return { ...parseAddressLine(address), url }
  }

  const parsed = postalAddressSchema.safeParse(address)
  if (!parsed.success) return null

  return {
    street: parsed.data.streetAddress,
    city: parsed.data.addressLocality,
    state: parsed.data.addressRegion,
    zipCode: parsed.data.postalCode,
    url,
  }
}

export const jsonLdStrategy: AddressStrategy = {
  name: 'jsonLd',
  collect(page) {
    const candidates: RawCandidate[] = []

    for (const node of flattenJsonLd(page.jsonLd)) {
      const addresses = Array.isArray(node.address) ? node.address : [node.address]
      const url = (typeof node.url === 'string' && resolveUrl(node.url, page.url)) || page.url

      for (const address of addresses) {
        if (address === undefined) continue
        const candidate = fromJsonLdAddress(address, url)
        if (candidate) candidates.push(candidate)
      }
    }

    return candidates
  },
}

// ═══════════════════════════════════════════════════════════════════════════════
// Text strategies
// ═══════════════════════════════════════════════════════════════════════════════

function tidyLines(text: string): string {
  return text
    .split('\n')
    .map((line) => line.replace(/[ \t\r\f\v\u00a0]+/g, ' ').trim())
    .filter((line) => line !== '')
    .join('\n')
}

function fromText(text: string, url: string): RawCandidate | null {
  if (!isLikelyAddress(text) || !isPlausibleAddressText(text)) return null
  return { ...parseAddressLine(text), url }
}

export const addressRegionStrategy: AddressStrategy = {
  name: 'addressRegions',
  collect(page) {
    const { $ } = page
    const seen = new Set<string>()
    const candidates: RawCandidate[] = []

    for (const selector of SELECTORS.addressRegions) {
      $(selector).each((_, el) => {
        const text = tidyLines($(el).text())
        if (!text || seen.has(text)) return
        seen.add(text)

        const candidate = fromText(text, page.url)
        if (candidate) candidates.push(candidate)
      })
    }

    return candidates
  },
}

export const zipTextScanStrategy: AddressStrategy = {
  name: 'zipTextScan',
  collect(page) {
    const body = page.$('body')
    const text = tidyLines(body.length > 0 ? body.text() : page.$.root().text())

    return text
      .split('\n')
      .filter((line) => /\b\d{5}\b/.test(line))
      .map((line) => fromText(line, page.url))
      .filter((candidate): candidate is RawCandidate => candidate !== null)
  },
}

export const DEFAULT_STRATEGIES: readonly AddressStrategy[] = [
  jsonLdStrategy,
  addressRegionStrategy,
  zipTextScanStrategy,
]

// ═══════════════════════════════════════════════════════════════════════════════
// Cascade
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExtractCandidatesOptions {
  strategies?: readonly AddressStrategy[]
  /** Stop once this many distinct candidates are collected */
  maxCandidates?: number
  logger?: ILogger
}

function candidateKey(candidate: RawCandidate): string {
  return [candidate.street, candidate.city, candidate.state, candidate.zipCode]
    .map((value) => (value ?? '').trim())
    .join('\u0000')
}

function isComplete(candidate: RawCandidate): boolean {
  return (
    isAcceptableStreet(candidate.street ?? '') &&
    (candidate.city ?? '').trim() !== '' &&
    (candidate.state ?? '').trim() !== '' &&
    (candidate.zipCode ?? '').trim() !== ''
  )
}

/**
 * Run every strategy in order, keeping complete candidates and dropping
 * exact repeats of the same raw (street, city, state, zip).
 */
export function extractCandidates(
  html: string,
  url: string,
  options: ExtractCandidatesOptions = {}
): RawCandidate[] {
  const page = loadPage(html, url, options.logger)
  const strategies = options.strategies ?? DEFAULT_STRATEGIES
  const max = options.maxCandidates ?? Number.POSITIVE_INFINITY
  const seen = new Set<string>()
  const candidates: RawCandidate[] = []

  for (const strategy of strategies) {
    if (candidates.length >= max) break

    let found = 0
    for (const candidate of strategy.collect(page)) {
      if (candidates.length >= max) break
      if (!isComplete(candidate)) continue

      const key = candidateKey(candidate)
      if (seen.has(key)) continue
      seen.add(key)

      candidates.push({
        street: candidate.street?.trim(),
        city: candidate.city?.trim(),
        state: candidate.state?.trim(),
        zipCode: candidate.zipCode?.trim(),
        url: candidate.url,
      })
      found++
    }

    options.logger?.debug('Strategy finished', { strategy: strategy.name, url, found })
  }

  return candidates
}
