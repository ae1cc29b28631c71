/**
 * Command dispatch. Returns an exit code instead of exiting so commands can
 * be driven from tests with an in-memory store.
 *
 *   0  success
 *   1  runtime failure (including a failed source run)
 *   2  usage error
 */

import type { ILogger } from '@doorstep/logger'
import { loggers } from '../config/logger.js'
import { loadSettings, type HarvestSettings } from '../config/settings.js'
import { createHarvestContext, createStore, type HarvestContext } from '../context.js'
import { errorMessage } from '../scraper/errors.js'
import type { HarvestStore } from '../scraper/store/types.js'
import { runClearCommand, runConfigCommand, runMigrateCommand } from './commands/admin.js'
import { runExportCommand, runMarkExportedCommand } from './commands/export.js'
import { runHistoryCommand, runListingsCommand, runStatsCommand } from './commands/listings.js'
import { runScrapeCommand } from './commands/scrape.js'
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, consoleIO, type CommandIO } from './io.js'
import { asIdList, asPositiveInt, asString, parseFlags, type Flags } from './parse-flags.js'

const COMMANDS = [
  'scrape',
  'export',
  'mark-exported',
  'listings',
  'stats',
  'history',
  'clear',
  'config',
  'migrate',
] as const

type Command = (typeof COMMANDS)[number]

export interface RunCliOptions {
  io?: CommandIO
  env?: NodeJS.ProcessEnv
  settings?: HarvestSettings
  /** Prebuilt context; its store serves every command */
  context?: HarvestContext
  logger?: ILogger
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value)
}

export function printHelp(io: CommandIO): void {
  io.out('Doorstep address harvester')
  io.out('')
  io.out('Commands:')
  io.out('  scrape [--site <id>] [--output <path>] [--no-export]')
  io.out('  export --output <path> [--site <id>] [--exported-only]')
  io.out('  mark-exported --ids <id,id,...>')
  io.out('  listings [--limit <n>] [--site <id>] [--all]')
  io.out('  stats')
  io.out('  history [--site <id>] [--limit <n>]')
  io.out('  clear --yes')
  io.out('  config')
  io.out('  migrate')
}

/** undefined when absent; null when present but not a positive integer. */
function limitFlag(flags: Flags): number | undefined | null {
  if (flags.limit === undefined) return undefined
  return asPositiveInt(flags.limit) ?? null
}

export async function runCli(argv: readonly string[], options: RunCliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO
  const log = options.logger ?? loggers.cli
  const [command, ...rest] = argv

  if (!command || command === '--help' || command === '-h') {
    printHelp(io)
    return EXIT_OK
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp(io)
    return EXIT_OK
  }

  if (!isCommand(command)) {
    io.err(`Unknown command: ${command}`)
    printHelp(io)
    return EXIT_USAGE
  }

  const limit = limitFlag(flags)
  if (limit === null) {
    io.err('--limit must be a positive integer')
    return EXIT_USAGE
  }

  let store: HarvestStore | null = null
  try {
    const settings = options.settings ?? options.context?.settings ?? loadSettings(options.env)

    if (command === 'migrate') {
      return await runMigrateCommand(settings, io, { logger: log })
    }

    const needsSources = command === 'scrape' || command === 'config' || command === 'stats'
    const ctx = options.context ?? (needsSources ? await createHarvestContext(settings) : null)
    store = ctx?.store ?? createStore(settings, loggers.store)
    const site = asString(flags.site)

    switch (command) {
      case 'scrape':
        if (!ctx) return EXIT_FAILURE
        return await runScrapeCommand(
          { site, output: asString(flags.output), export: flags['no-export'] !== true },
          ctx,
          io
        )
      case 'export':
        return await runExportCommand(
          { output: asString(flags.output), site, exportedOnly: flags['exported-only'] === true },
          store,
          io,
          loggers.export
        )
      case 'mark-exported':
        return await runMarkExportedCommand({ ids: asIdList(flags.ids) }, store, io)
      case 'listings':
        return await runListingsCommand({ limit, site, all: flags.all === true }, store, io)
      case 'stats':
        return await runStatsCommand(store, ctx?.sources ?? [], io)
      case 'history':
        return await runHistoryCommand({ site, limit }, store, io)
      case 'clear':
        return await runClearCommand({ yes: flags.yes === true }, store, io)
      case 'config':
        return await runConfigCommand(settings, ctx?.sources ?? [], io)
      default: {
        const unhandled: never = command
        io.err(`Unknown command: ${String(unhandled)}`)
        return EXIT_USAGE
      }
    }
  } catch (error) {
    log.error('Command failed', { command }, error)
    io.err(`Error: ${errorMessage(error)}`)
    return EXIT_FAILURE
  } finally {
    if (store && !options.context) {
      await store.close()
    }
  }
}
