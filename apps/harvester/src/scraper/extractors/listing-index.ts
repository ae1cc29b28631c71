/**
 * Listing index
 *
 * Search/index pages that link out to one page per property. Discovery walks
 * the index pagination collecting listing links; each listing page then goes
 * through the strategy cascade.
 *
 * discovery:
 *   index_urls            first index page(s)
 *   listing_link_pattern  regex a listing href must match
 *   link_selector         anchors to consider (default a[href])
 *   next_selector         "next page" anchor; omit for a single page
 *   max_pages             pages to read in total (default 5, capped at 20)
 *   allow_domains / block_domains
 */

import * as cheerio from 'cheerio'
import { z } from 'zod'
import { DiscoveryError, errorMessage } from '../errors.js'
import type { Extractor, ExtractorContext } from '../types.js'
import { canonicalizeUrl, resolveUrl } from '../utils/url.js'
import {
  MAX_DISCOVERY_PAGES,
  TargetCollector,
  domainFilterOf,
  domainListFields,
  extractWithStrategies,
  parseDiscoveryParams,
} from './discovery.js'

const regexString = z.string().refine(
  (value) => {
    try {
      new RegExp(value)
      return true
    } catch {
      return false
    }
  },
  { message: 'Invalid regular expression' }
)

export const listingIndexDiscoverySchema = z.object({
  index_urls: z.array(z.string().url()).min(1),
  listing_link_pattern: regexString,
  link_selector: z.string().default('a[href]'),
  next_selector: z.string().optional(),
  max_pages: z.number().int().positive().default(5),
  ...domainListFields,
})

type ListingIndexParams = z.output<typeof listingIndexDiscoverySchema>

interface IndexPage {
  links: string[]
  next: string | null
}

function readIndexPage(html: string, pageUrl: string, params: ListingIndexParams): IndexPage {
  const $ = cheerio.load(html)
  const links: string[] = []

  $(params.link_selector).each((_, el) => {
    const href = $(el).attr('href')
    if (!href) return
    const resolved = resolveUrl(href, pageUrl)
    if (resolved) links.push(resolved)
  })

  let next: string | null = null
  if (params.next_selector) {
    const href = $(params.next_selector).first().attr('href')
    next = href ? resolveUrl(href, pageUrl) : null
  }

  return { links, next }
}

async function walkIndexes(ctx: ExtractorContext, params: ListingIndexParams, collector: TargetCollector) {
  const pattern = new RegExp(params.listing_link_pattern)
  const pageBudget = Math.min(params.max_pages, MAX_DISCOVERY_PAGES)
  const visited = new Set<string>()
  let pagesRead = 0

  for (const start of params.index_urls) {
    let url: string | null = start

    while (url && pagesRead < pageBudget && !collector.full) {
      const pageId = canonicalizeUrl(url)
      if (visited.has(pageId)) break
      visited.add(pageId)

      let html: string
      try {
        html = (await ctx.fetch(url)).body
      } catch (error) {
        if (collector.size === 0) {
          throw new DiscoveryError(`Index page ${url} failed: ${errorMessage(error)}`, { cause: error })
        }
        ctx.logger.warn('Index page failed, keeping targets found so far', {
          url,
          targets: collector.size,
          reason: errorMessage(error),
        })
        break
      }
      pagesRead++

      const page = readIndexPage(html, url, params)
      let added = 0
      for (const link of page.links) {
        if (pattern.test(link) && collector.add(link)) added++
      }

      ctx.logger.debug('Index page read', { url, page: pagesRead, added, total: collector.size })

      // A page with nothing new means pagination has run dry or is looping
      if (added === 0) break
      url = page.next
    }
  }
}

export const listingIndexExtractor: Extractor = {
  id: 'listing_index',
  version: '1.0.0',
  description: 'Paginated index pages linking to one page per property',

  async discover(ctx) {
    const params = parseDiscoveryParams(listingIndexDiscoverySchema, ctx.source)
    const collector = new TargetCollector(domainFilterOf(params), ctx.source.maxListings)

    await walkIndexes(ctx, params, collector)
    return collector.toArray()
  },

  extract: extractWithStrategies,
}
