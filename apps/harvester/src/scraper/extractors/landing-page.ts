/**
 * Landing pages
 *
 * Static pages that each list several properties. Discovery is the configured
 * URL list; every page goes through the strategy cascade.
 *
 * discovery:
 *   landing_urls   pages to scan
 *   allow_domains  optional; empty = any host
 *   block_domains  optional; wins over allow_domains
 */

import { z } from 'zod'
import type { Extractor } from '../types.js'
import {
  TargetCollector,
  domainFilterOf,
  domainListFields,
  extractWithStrategies,
  parseDiscoveryParams,
} from './discovery.js'

export const landingDiscoverySchema = z.object({
  landing_urls: z.array(z.string().url()).default([]),
  ...domainListFields,
})

export const landingPageExtractor: Extractor = {
  id: 'landing_pages',
  version: '1.0.0',
  description: 'Static landing pages listing several properties each',

  async discover(ctx) {
    const params = parseDiscoveryParams(landingDiscoverySchema, ctx.source)
    const collector = new TargetCollector(domainFilterOf(params))

    for (const url of params.landing_urls) {
      if (!collector.add(url)) {
        ctx.logger.debug('Skipping landing URL', { url })
      }
    }

    return collector.toArray()
  },

  extract: extractWithStrategies,
}
