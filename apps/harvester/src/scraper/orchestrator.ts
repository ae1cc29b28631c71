/**
 * Harvest Orchestrator
 *
 * Drives one source through discover → fetch/extract → normalize → persist
 * and writes exactly one session record per run, whatever the outcome.
 *
 *   idle → discovering → fetching → normalizing → persisting → completed
 *                  \___________\____________\___________\____→ failed
 *
 * Per-target failures (fetch, parse) are counted and skipped. Discovery and
 * persistence failures end the run as a failed session.
 *
 * Targets of one source are fetched one at a time behind that source's own
 * rate limiter. Several sources may run side by side (runSources); they share
 * only the store and the per-domain throttler.
 */

import { randomUUID } from 'crypto'
import type { ILogger } from '@doorstep/logger'
import { createWorkflowLogger, sanitizeUrl } from '../config/structured-log.js'
import { ConfigError, DiscoveryError, PersistenceError, errorMessage } from './errors.js'
import { withRetry } from './fetch/retry.js'
import { SourceRateLimiter } from './fetch/rate-limiter.js'
import type { RequestThrottler } from './fetch/throttler.js'
import { toNewListing } from './normalize/fingerprint.js'
import { isValidAddress, normalizeAddress } from './normalize/address.js'
import type { ListingStore, SessionStore } from './store/types.js'
import type {
  Extractor,
  ExtractorContext,
  ExtractorRegistry,
  FetchResponse,
  FetchSession,
  FetchSessionFactory,
  FetchTarget,
  NewListing,
  RawCandidate,
  RetryPolicy,
  SessionRecord,
  SessionStatus,
  SourceConfig,
} from './types.js'
import { getRegistrableDomain } from './utils/url.js'
import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from './utils/timing.js'

export type RunState = 'idle' | 'discovering' | 'fetching' | 'normalizing' | 'persisting' | 'completed' | 'failed'

/** Anything that can pace one source's requests. */
export interface RateLimiter {
  wait(): Promise<void>
}

export interface OrchestratorContext {
  logger: ILogger
  store: ListingStore & SessionStore
  registry: ExtractorRegistry
  /** Every configured source, enabled or not */
  sources: readonly SourceConfig[]
  throttler: RequestThrottler
  retryPolicy: RetryPolicy
  createSession: FetchSessionFactory
  /** Default: SourceRateLimiter over the source's min/max delay */
  createRateLimiter?: (source: SourceConfig) => RateLimiter
  onTransition?: (sourceId: string, from: RunState, to: RunState) => void
  sleep?: Sleep
  now?: Clock
}

export interface RunResult {
  sourceId: string
  runId: string
  status: SessionStatus
  targets: number
  listingsFound: number
  listingsNew: number
  listingsDuplicates: number
  errors: number
  errorMessage: string | null
  /** Null only when the session record itself could not be written */
  sessionId: number | null
}

export interface RunSourcesOptions {
  /** Sources running at once. Default: 1 */
  concurrency?: number
}

interface PendingCandidate {
  candidate: RawCandidate
  target: FetchTarget
}

interface RunCounts {
  targets: number
  found: number
  new: number
  duplicates: number
  errors: number
}

export class HarvestOrchestrator {
  private readonly log: ILogger
  private readonly sleep: Sleep
  private readonly now: Clock

  constructor(private readonly ctx: OrchestratorContext) {
    this.log = ctx.logger
    this.sleep = ctx.sleep ?? defaultSleep
    this.now = ctx.now ?? systemClock
  }

  /**
   * Run every requested source (all configured sources by default), skipping
   * disabled ones, with at most `concurrency` runs in flight.
   *
   * @throws ConfigError when a requested id is not configured
   */
  async runSources(sourceIds?: readonly string[], options: RunSourcesOptions = {}): Promise<RunResult[]> {
    const requested = sourceIds ? sourceIds.map((id) => this.getSource(id)) : [...this.ctx.sources]
    const sources = requested.filter((source) => {
      if (!source.enabled) {
        this.log.info('Skipping disabled source', { sourceId: source.id })
      }
      return source.enabled
    })

    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1))
    const results: RunResult[] = []

    for (let i = 0; i < sources.length; i += concurrency) {
      const batch = sources.slice(i, i + concurrency)
      const settled = await Promise.allSettled(batch.map((source) => this.runSource(source)))

      settled.forEach((outcome, index) => {
        if (outcome.status === 'fulfilled') {
          results.push(outcome.value)
          return
        }

        const source = batch[index]
        this.log.error('Source run aborted', { sourceId: source.id }, outcome.reason)
        results.push({
          sourceId: source.id,
          runId: '',
          status: 'failed',
          targets: 0,
          listingsFound: 0,
          listingsNew: 0,
          listingsDuplicates: 0,
          errors: 0,
          errorMessage: errorMessage(outcome.reason),
          sessionId: null,
        })
      })
    }

    return results
  }

  /**
   * One orchestration run for one source.
   *
   * Resolves with the run outcome for completed and failed runs alike.
   * Rejects only when the session record cannot be written.
   */
  async runSource(source: SourceConfig): Promise<RunResult> {
    const runId = randomUUID()
    const scrapeStart = new Date(this.now())
    const log = createWorkflowLogger(this.log, {
      workflow: 'harvest',
      stage: 'run',
      runId,
      sourceId: source.id,
      extractorId: source.extractor,
    })

    let state: RunState = 'idle'
    const transition = (next: RunState): void => {
      log.debug('Run state changed', { from: state, to: next })
      this.ctx.onTransition?.(source.id, state, next)
      state = next
    }

    const counts: RunCounts = { targets: 0, found: 0, new: 0, duplicates: 0, errors: 0 }
    let failure: unknown = null
    let session: FetchSession | null = null

    log.info('Harvest run started', { maxListings: source.maxListings })

    try {
      const extractor = this.ctx.registry.get(source.extractor)
      if (!extractor) {
        throw new ConfigError(`Unknown extractor '${source.extractor}' for source '${source.id}'`)
      }

      session = this.ctx.createSession(source)
      await session.open()

      const openSession = session
      const limiter = this.ctx.createRateLimiter?.(source) ?? this.defaultRateLimiter(source)
      const extractorCtx: ExtractorContext = {
        source,
        logger: log,
        fetch: (url) => this.politeFetch(url, openSession, limiter, log),
      }

      transition('discovering')
      let targets: FetchTarget[]
      try {
        targets = await extractor.discover(extractorCtx)
      } catch (error) {
        throw error instanceof DiscoveryError
          ? error
          : new DiscoveryError(`Discovery failed for '${source.id}': ${errorMessage(error)}`, { cause: error })
      }
      counts.targets = targets.length
      log.info('Discovery finished', { targets: targets.length })

      transition('fetching')
      const pending = await this.fetchAndExtract(extractor, targets, extractorCtx, counts, log)
      counts.found = pending.length

      transition('normalizing')
      const listings = this.normalize(pending, source, log)

      transition('persisting')
      if (listings.length > 0) {
        try {
          const result = await this.ctx.store.bulkInsert(listings)
          counts.new = result.newCount
          counts.duplicates = result.duplicateCount
        } catch (error) {
          throw error instanceof PersistenceError
            ? error
            : new PersistenceError(`Persisting listings failed: ${errorMessage(error)}`, { cause: error })
        }
      }
    } catch (error) {
      failure = error
    } finally {
      if (session) {
        await this.closeSession(session, log)
      }
    }

    const status: SessionStatus = failure === null ? 'completed' : 'failed'
    const message = failure === null ? null : errorMessage(failure)
    transition(status)

    if (failure === null) {
      log.info('Harvest run completed', { ...counts })
    } else {
      log.error('Harvest run failed', { ...counts, reason: message }, failure)
    }

    const sessionId = await this.recordSession(
      {
        sourceWebsite: source.id,
        scrapeStart,
        listingsFound: counts.found,
        listingsNew: counts.new,
        listingsDuplicates: counts.duplicates,
        errors: counts.errors,
        status,
        errorMessage: message,
      },
      log
    )

    return {
      sourceId: source.id,
      runId,
      status,
      targets: counts.targets,
      listingsFound: counts.found,
      listingsNew: counts.new,
      listingsDuplicates: counts.duplicates,
      errors: counts.errors,
      errorMessage: message,
      sessionId,
    }
  }

  getSource(id: string): SourceConfig {
    const source = this.ctx.sources.find((candidate) => candidate.id === id)
    if (!source) {
      const known = this.ctx.sources.map((candidate) => candidate.id).join(', ')
      throw new ConfigError(`Unknown source '${id}'. Configured sources: ${known || '(none)'}`)
    }
    return source
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Stages
  // ═══════════════════════════════════════════════════════════════════════════════

  /** Sequential: one target in flight per source. */
  private async fetchAndExtract(
    extractor: Extractor,
    targets: readonly FetchTarget[],
    extractorCtx: ExtractorContext,
    counts: RunCounts,
    log: ILogger
  ): Promise<PendingCandidate[]> {
    const maxListings = extractorCtx.source.maxListings
    const pending: PendingCandidate[] = []

    for (const [index, target] of targets.entries()) {
      if (pending.length >= maxListings) {
        log.info('Listing cap reached', { maxListings, skippedTargets: targets.length - index })
        break
      }

      const targetLog = log.child({ targetId: target.id })
      try {
        const response = await extractorCtx.fetch(target.url)
        const candidates = extractor.extract(response.body, target, extractorCtx)
        const room = maxListings - pending.length

        for (const candidate of candidates.slice(0, room)) {
          pending.push({ candidate, target })
        }
        targetLog.debug('Target extracted', { candidates: candidates.length, ...sanitizeUrl(target.url) })
      } catch (error) {
        counts.errors++
        targetLog.warn('Target failed, continuing', { ...sanitizeUrl(target.url), reason: errorMessage(error) })
      }
    }

    return pending
  }

  /** Invalid and out-of-area candidates are dropped without counting as errors. */
  private normalize(pending: readonly PendingCandidate[], source: SourceConfig, log: ILogger): NewListing[] {
    const allowedStates = new Set(source.allowedStates.map((state) => state.trim().toUpperCase()))
    const listings: NewListing[] = []
    let invalid = 0
    let outOfArea = 0

    for (const { candidate, target } of pending) {
      const address = normalizeAddress(candidate)
      if (!isValidAddress(address)) {
        invalid++
        continue
      }
      if (allowedStates.size > 0 && !allowedStates.has(address.state)) {
        outOfArea++
        continue
      }
      listings.push(toNewListing(address, source.id, candidate.url ?? target.url))
    }

    log.debug('Normalization finished', { valid: listings.length, invalid, outOfArea })
    return listings
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Fetching
  // ═══════════════════════════════════════════════════════════════════════════════

  private defaultRateLimiter(source: SourceConfig): RateLimiter {
    return new SourceRateLimiter({
      minDelay: source.minDelay,
      maxDelay: source.maxDelay,
      sleep: this.sleep,
      now: this.now,
    })
  }

  /**
   * Throttler (per registrable domain) → rate limiter (per source) → fetch,
   * every attempt wrapped by the retry policy.
   */
  private politeFetch(url: string, session: FetchSession, limiter: RateLimiter, log: ILogger): Promise<FetchResponse> {
    const domain = getRegistrableDomain(url)

    return withRetry(
      async () => {
        await this.waitForThrottle(domain, log)
        await limiter.wait()
        // Another run on the same domain may have taken the slot while the limiter waited
        await this.acquireThrottleSlot(domain, log)
        return session.fetch(url)
      },
      this.ctx.retryPolicy,
      { logger: log, sleep: this.sleep, context: { domain, ...sanitizeUrl(url) } }
    )
  }

  private async waitForThrottle(domain: string, log: ILogger): Promise<void> {
    while (this.ctx.throttler.shouldThrottle(domain)) {
      await this.sleepOutThrottle(domain, log)
    }
  }

  private async acquireThrottleSlot(domain: string, log: ILogger): Promise<void> {
    while (!this.ctx.throttler.tryAcquire(domain)) {
      await this.sleepOutThrottle(domain, log)
    }
  }

  private async sleepOutThrottle(domain: string, log: ILogger): Promise<void> {
    const waitSeconds = this.ctx.throttler.getWaitTime(domain)
    log.info('Domain throttled, waiting', { domain, waitSeconds })
    // At least 1ms so a zero wait at the window edge still yields
    await this.sleep(Math.max(1, Math.ceil(waitSeconds * 1000)))
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Bookkeeping
  // ═══════════════════════════════════════════════════════════════════════════════

  private async closeSession(session: FetchSession, log: ILogger): Promise<void> {
    try {
      await session.close()
    } catch (error) {
      log.warn('Closing fetch session failed', { kind: session.kind, reason: errorMessage(error) })
    }
  }

  private async recordSession(record: SessionRecord, log: ILogger): Promise<number> {
    try {
      const session = await this.ctx.store.recordSession(record)
      return session.id
    } catch (error) {
      log.error('Recording scrape session failed', { status: record.status }, error)
      throw error instanceof PersistenceError
        ? error
        : new PersistenceError(`Recording session failed: ${errorMessage(error)}`, { cause: error })
    }
  }
}
