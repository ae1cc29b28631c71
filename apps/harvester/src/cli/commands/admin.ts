import { createPool, runMigrations } from '@doorstep/db'
import type { ILogger } from '@doorstep/logger'
import type pg from 'pg'
import type { HarvestSettings } from '../../config/settings.js'
import type { ListingStore } from '../../scraper/store/types.js'
import type { SourceConfig } from '../../scraper/types.js'
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, type CommandIO } from '../io.js'

export async function runClearCommand(args: { yes?: boolean }, store: ListingStore, io: CommandIO): Promise<number> {
  if (!args.yes) {
    io.err('clear deletes every listing and scrape session; re-run with --yes to confirm')
    return EXIT_USAGE
  }

  await store.clearAll()
  io.out('All listings and scrape sessions deleted.')
  return EXIT_OK
}

/** Credentials in a connection string are never printed. */
export function redactConnectionString(url: string): string {
  try {
    const parsed = new URL(url)
    if (parsed.password) parsed.password = '***'
    return parsed.toString()
  } catch {
    return '(unparseable)'
  }
}

export async function runConfigCommand(
  settings: HarvestSettings,
  sources: readonly SourceConfig[],
  io: CommandIO
): Promise<number> {
  io.out(`Store: ${settings.store}`)
  if (settings.databaseUrl) {
    io.out(`Database: ${redactConnectionString(settings.databaseUrl)}`)
  }
  io.out(`Export dir: ${settings.exportDir}`)
  io.out(`Sites config: ${settings.sitesConfigPath}`)
  io.out('')
  io.out('Request settings:')
  io.out(`  Default delay: ${settings.minRequestDelay}s - ${settings.maxRequestDelay}s`)
  io.out(`  Timeout: ${settings.requestTimeoutMs}ms`)
  io.out(`  Retries: ${settings.maxRetries} (backoff ${settings.retryBackoff})`)
  io.out(`  Max requests per minute per domain: ${settings.maxRequestsPerMinute}`)
  io.out(`  Source concurrency: ${settings.sourceConcurrency}`)
  io.out('')
  io.out('Sources:')
  if (sources.length === 0) {
    io.out('  (none)')
  }
  for (const source of sources) {
    const states = source.allowedStates.length > 0 ? source.allowedStates.join(',') : 'any'
    io.out(
      `  ${source.enabled ? '+' : '-'} ${source.id} [${source.extractor}] ${source.name}: ` +
        `delay ${source.minDelay}s-${source.maxDelay}s, max ${source.maxListings}, states ${states}`
    )
  }
  return EXIT_OK
}

export interface MigrateCommandDeps {
  /** Default: a pool on settings.databaseUrl, closed afterwards */
  pool?: Pick<pg.Pool, 'connect'>
  logger?: ILogger
}

export async function runMigrateCommand(
  settings: HarvestSettings,
  io: CommandIO,
  deps: MigrateCommandDeps = {}
): Promise<number> {
  if (deps.pool) {
    return applyMigrations(deps.pool, io, deps.logger)
  }

  if (!settings.databaseUrl) {
    io.err('migrate requires DATABASE_URL')
    return EXIT_FAILURE
  }

  const pool = createPool(settings.databaseUrl)
  try {
    return await applyMigrations(pool, io, deps.logger)
  } finally {
    await pool.end()
  }
}

async function applyMigrations(pool: Pick<pg.Pool, 'connect'>, io: CommandIO, logger?: ILogger): Promise<number> {
  const applied = await runMigrations(pool, { logger })
  io.out(applied.length > 0 ? `Applied migrations: ${applied.join(', ')}` : 'Schema is up to date.')
  return EXIT_OK
}
