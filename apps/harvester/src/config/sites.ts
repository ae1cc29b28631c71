/**
 * Per-source configuration
 *
 * sites.json:
 *
 *   {
 *     "sites": [
 *       {
 *         "id": "example-fsbo",
 *         "name": "Example FSBO",
 *         "extractor": "landing_pages",
 *         "enabled": true,
 *         "min_delay": 2.0,
 *         "max_delay": 5.0,
 *         "max_listings": 50,
 *         "allowed_states": ["IL", "WI"],
 *         "discovery": { "landing_urls": ["https://fsbo.example.com/homes"] }
 *       }
 *     ]
 *   }
 *
 * Absent keys take the defaults passed in (from settings); unknown keys are
 * ignored. The discovery block is validated later by the source's extractor.
 */

import { readFile } from 'fs/promises'
import { z } from 'zod'
import type { ILogger } from '@doorstep/logger'
import { ConfigError, errorMessage } from '../scraper/errors.js'
import type { SourceConfig } from '../scraper/types.js'

export const DEFAULT_MAX_LISTINGS = 100

export interface SourceDefaults {
  minDelay: number
  maxDelay: number
  maxListings: number
}

export interface LoadSitesOptions {
  defaults: SourceDefaults
  /** Registered extractor ids; any other value is a ConfigError */
  knownExtractors: readonly string[]
  logger?: ILogger
}

const siteSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, 'must be letters, digits, "-" or "_"'),
  name: z.string().min(1).optional(),
  extractor: z.string().min(1),
  enabled: z.boolean().default(true),
  min_delay: z.number().nonnegative().optional(),
  max_delay: z.number().nonnegative().optional(),
  max_listings: z.number().int().positive().optional(),
  allowed_states: z.array(z.string().regex(/^[A-Za-z]{2}$/, 'must be a 2-letter state code')).default([]),
  discovery: z.record(z.unknown()).default({}),
})

const sitesFileSchema = z.object({
  sites: z.array(siteSchema),
})

type SiteEntry = z.output<typeof siteSchema>

/**
 * Used when no sites file exists. Both disabled: nothing is fetched until
 * real URLs are configured.
 */
export const BUILT_IN_SITES: readonly z.input<typeof siteSchema>[] = [
  {
    id: 'example-landing',
    name: 'Example landing pages',
    extractor: 'landing_pages',
    enabled: false,
    discovery: { landing_urls: ['https://www.example.com/homes-for-sale-by-owner'] },
  },
  {
    id: 'example-index',
    name: 'Example listing index',
    extractor: 'listing_index',
    enabled: false,
    discovery: {
      index_urls: ['https://www.example.com/search?page=1'],
      listing_link_pattern: '/homes/\\d+',
      next_selector: 'a[rel="next"]',
    },
  },
]

function toSourceConfig(site: SiteEntry, defaults: SourceDefaults): SourceConfig {
  const minDelay = site.min_delay ?? defaults.minDelay
  const maxDelay = site.max_delay ?? Math.max(defaults.maxDelay, minDelay)

  if (minDelay > maxDelay) {
    throw new ConfigError(`Site '${site.id}': min_delay (${minDelay}) exceeds max_delay (${maxDelay})`)
  }

  return {
    id: site.id,
    name: site.name ?? site.id,
    extractor: site.extractor,
    enabled: site.enabled,
    minDelay,
    maxDelay,
    maxListings: site.max_listings ?? defaults.maxListings,
    allowedStates: [...new Set(site.allowed_states.map((state) => state.toUpperCase()))],
    discovery: site.discovery,
  }
}

/**
 * Validate parsed sites.json content.
 * @throws ConfigError on schema violations, duplicate ids or unknown extractors
 */
export function parseSitesConfig(raw: unknown, options: LoadSitesOptions): SourceConfig[] {
  const parsed = sitesFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigError(`Invalid sites config: ${issues.join('; ')}`)
  }

  const seen = new Set<string>()
  return parsed.data.sites.map((site) => {
    if (seen.has(site.id)) {
      throw new ConfigError(`Duplicate site id '${site.id}'`)
    }
    seen.add(site.id)

    if (!options.knownExtractors.includes(site.extractor)) {
      throw new ConfigError(
        `Site '${site.id}' uses unknown extractor '${site.extractor}'. Known: ${options.knownExtractors.join(', ')}`
      )
    }

    return toSourceConfig(site, options.defaults)
  })
}

/**
 * Load sites.json from disk. A missing file yields BUILT_IN_SITES; an
 * unreadable or malformed one is a ConfigError.
 */
export async function loadSitesConfig(path: string, options: LoadSitesOptions): Promise<SourceConfig[]> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      options.logger?.warn('Sites config not found, using built-in defaults', { path })
      return parseSitesConfig({ sites: BUILT_IN_SITES }, options)
    }
    throw new ConfigError(`Cannot read sites config ${path}: ${errorMessage(error)}`, { cause: error })
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ConfigError(`Sites config ${path} is not valid JSON: ${errorMessage(error)}`, { cause: error })
  }

  const sources = parseSitesConfig(raw, options)
  options.logger?.info('Loaded sites config', {
    path,
    sites: sources.length,
    enabled: sources.filter((source) => source.enabled).length,
  })
  return sources
}
