import { z } from 'zod'
import { DiscoveryError, ParseError } from '../errors.js'
import type { ExtractorContext, FetchTarget, RawCandidate, SourceConfig } from '../types.js'
import { canonicalizeUrl, isDomainAllowed, type DomainFilter } from '../utils/url.js'
import { extractCandidates } from './strategies.js'

/** Paginated discovery never reads more pages than this, whatever the config says. */
export const MAX_DISCOVERY_PAGES = 20

export const domainListFields = {
  allow_domains: z.array(z.string()).default([]),
  block_domains: z.array(z.string()).default([]),
}

export function domainFilterOf(params: { allow_domains: string[]; block_domains: string[] }): DomainFilter {
  return { allow: params.allow_domains, block: params.block_domains }
}

/**
 * Validate a source's discovery block against an extractor's schema.
 * @throws DiscoveryError listing every invalid field
 */
export function parseDiscoveryParams<T extends z.ZodTypeAny>(schema: T, source: SourceConfig): z.output<T> {
  const result = schema.safeParse(source.discovery)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new DiscoveryError(`Invalid discovery config for source '${source.id}': ${issues.join('; ')}`)
  }
  return result.data
}

/**
 * Canonical, de-duplicated, domain-filtered targets in first-seen order.
 */
export class TargetCollector {
  private readonly targets = new Map<string, FetchTarget>()

  constructor(
    private readonly filter: DomainFilter,
    private readonly limit: number = Number.POSITIVE_INFINITY
  ) {}

  get size(): number {
    return this.targets.size
  }

  get full(): boolean {
    return this.targets.size >= this.limit
  }

  /** Returns true when the URL was new and accepted. */
  add(url: string): boolean {
    if (this.full || !isDomainAllowed(url, this.filter)) return false

    let id: string
    try {
      id = canonicalizeUrl(url)
    } catch {
      return false
    }
    if (this.targets.has(id)) return false

    this.targets.set(id, { id, url })
    return true
  }

  toArray(): FetchTarget[] {
    return [...this.targets.values()]
  }
}

/** Shared extract step: the strategy cascade over one fetched page. */
export function extractWithStrategies(content: string, target: FetchTarget, ctx: ExtractorContext): RawCandidate[] {
  if (content.trim() === '') {
    throw new ParseError(`Empty page at ${target.url}`)
  }
  return extractCandidates(content, target.url, {
    maxCandidates: ctx.source.maxListings,
    logger: ctx.logger,
  })
}
