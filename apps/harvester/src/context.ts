/**
 * Harvest context
 *
 * Built once per process and handed to the orchestrator and CLI commands.
 * Nothing in the scraper reaches for a global logger, store or settings.
 */

import { createPool } from '@doorstep/db'
import type { ILogger } from '@doorstep/logger'
import { loggers as defaultLoggers, type ComponentLoggers } from './config/logger.js'
import { retryPolicyOf, type HarvestSettings } from './config/settings.js'
import { DEFAULT_MAX_LISTINGS, loadSitesConfig } from './config/sites.js'
import { ConfigError } from './scraper/errors.js'
import { createExtractorRegistry } from './scraper/extractors/index.js'
import { createHttpSessionFactory } from './scraper/fetch/session.js'
import { RequestThrottler } from './scraper/fetch/throttler.js'
import type { OrchestratorContext } from './scraper/orchestrator.js'
import { MemoryHarvestStore } from './scraper/store/memory-store.js'
import { PgHarvestStore } from './scraper/store/pg-store.js'
import type { HarvestStore } from './scraper/store/types.js'
import type { ExtractorRegistry, SourceConfig } from './scraper/types.js'

export interface HarvestContext extends OrchestratorContext {
  settings: HarvestSettings
  store: HarvestStore
  loggers: ComponentLoggers
}

export interface CreateHarvestContextOptions {
  loggers?: ComponentLoggers
  store?: HarvestStore
  registry?: ExtractorRegistry
  /** Skips reading the sites file */
  sources?: readonly SourceConfig[]
}

export function createStore(settings: HarvestSettings, logger?: ILogger): HarvestStore {
  if (settings.store === 'memory') {
    logger?.info('Using in-memory store; nothing persists after exit')
    return new MemoryHarvestStore()
  }

  if (!settings.databaseUrl) {
    throw new ConfigError('DATABASE_URL is required when STORE=pg')
  }
  return new PgHarvestStore(createPool(settings.databaseUrl))
}

export async function loadSources(
  settings: HarvestSettings,
  registry: ExtractorRegistry,
  logger?: ILogger
): Promise<SourceConfig[]> {
  return loadSitesConfig(settings.sitesConfigPath, {
    defaults: {
      minDelay: settings.minRequestDelay,
      maxDelay: settings.maxRequestDelay,
      maxListings: DEFAULT_MAX_LISTINGS,
    },
    knownExtractors: registry.list(),
    logger,
  })
}

export async function createHarvestContext(
  settings: HarvestSettings,
  options: CreateHarvestContextOptions = {}
): Promise<HarvestContext> {
  const loggers = options.loggers ?? defaultLoggers
  const registry = options.registry ?? createExtractorRegistry()
  const sources = options.sources ?? (await loadSources(settings, registry, loggers.scraper))
  const store = options.store ?? createStore(settings, loggers.store)

  return {
    settings,
    loggers,
    logger: loggers.scraper,
    store,
    registry,
    sources,
    throttler: new RequestThrottler({ maxRequestsPerMinute: settings.maxRequestsPerMinute }),
    retryPolicy: retryPolicyOf(settings),
    createSession: createHttpSessionFactory({ timeoutMs: settings.requestTimeoutMs }),
  }
}
