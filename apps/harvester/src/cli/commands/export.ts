import type { ILogger } from '@doorstep/logger'
import { exportListings } from '../../scraper/export/csv-exporter.js'
import type { ListingStore } from '../../scraper/store/types.js'
import { EXIT_OK, EXIT_USAGE, type CommandIO } from '../io.js'

export interface ExportCommandArgs {
  output?: string
  site?: string
  exportedOnly?: boolean
}

/** Export never marks rows; run mark-exported once the file has been used. */
export async function runExportCommand(
  args: ExportCommandArgs,
  store: ListingStore,
  io: CommandIO,
  logger?: ILogger
): Promise<number> {
  if (!args.output) {
    io.err('export requires --output <path>')
    return EXIT_USAGE
  }

  const count = await exportListings(store, args.output, {
    source: args.site,
    exportedOnly: args.exportedOnly ?? false,
    logger,
  })

  io.out(count > 0 ? `Exported ${count} listings to ${args.output}` : 'No listings to export')
  return EXIT_OK
}

export interface MarkExportedCommandArgs {
  ids?: number[]
}

export async function runMarkExportedCommand(
  args: MarkExportedCommandArgs,
  store: ListingStore,
  io: CommandIO
): Promise<number> {
  if (!args.ids || args.ids.length === 0) {
    io.err('mark-exported requires --ids <id,id,...> (positive integers)')
    return EXIT_USAGE
  }

  const changed = await store.markExported(args.ids)
  io.out(`Marked ${changed} of ${args.ids.length} listings as exported`)
  return EXIT_OK
}
