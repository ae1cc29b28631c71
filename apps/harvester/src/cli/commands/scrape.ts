import { join } from 'path'
import type { HarvestContext } from '../../context.js'
import { defaultExportFilename, exportListings } from '../../scraper/export/csv-exporter.js'
import { HarvestOrchestrator, type RunResult } from '../../scraper/orchestrator.js'
import { EXIT_FAILURE, EXIT_OK, type CommandIO } from '../io.js'

export interface ScrapeCommandArgs {
  site?: string
  output?: string
  /** Export after scraping. Default: true */
  export?: boolean
  now?: Date
}

export function formatRunResult(result: RunResult): string {
  const counts = `found ${result.listingsFound}, new ${result.listingsNew}, duplicates ${result.listingsDuplicates}, errors ${result.errors}`
  return result.status === 'completed'
    ? `${result.sourceId}: completed (${counts})`
    : `${result.sourceId}: failed (${counts}): ${result.errorMessage ?? 'unknown error'}`
}

/**
 * Run one source (--site) or every enabled source, then export the
 * not-yet-exported listings unless --no-export is given.
 */
export async function runScrapeCommand(args: ScrapeCommandArgs, ctx: HarvestContext, io: CommandIO): Promise<number> {
  const orchestrator = new HarvestOrchestrator(ctx)
  const results = await orchestrator.runSources(args.site ? [args.site] : undefined, {
    concurrency: ctx.settings.sourceConcurrency,
  })

  if (results.length === 0) {
    io.out('No enabled sources to scrape')
    return EXIT_OK
  }

  for (const result of results) {
    io.out(formatRunResult(result))
  }

  const totalNew = results.reduce((sum, r) => sum + r.listingsNew, 0)
  const totalDuplicates = results.reduce((sum, r) => sum + r.listingsDuplicates, 0)
  const failed = results.filter((r) => r.status === 'failed').length
  io.out(`Total: ${totalNew} new, ${totalDuplicates} duplicates, ${failed} failed sources`)

  if (args.export ?? true) {
    const outputPath = args.output ?? join(ctx.settings.exportDir, defaultExportFilename(args.now))
    const count = await exportListings(ctx.store, outputPath, {
      source: args.site,
      logger: ctx.loggers.export,
    })
    io.out(count > 0 ? `Exported ${count} listings to ${outputPath}` : 'No listings to export')
  }

  return failed > 0 ? EXIT_FAILURE : EXIT_OK
}
