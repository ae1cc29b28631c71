import { formatMailingLabel } from '../../scraper/normalize/address.js'
import type { ListingStore, SessionStore } from '../../scraper/store/types.js'
import type { ScrapeSession, SourceConfig } from '../../scraper/types.js'
import { EXIT_OK, type CommandIO } from '../io.js'

export const DEFAULT_LISTINGS_LIMIT = 10

export interface ListingsCommandArgs {
  limit?: number
  site?: string
  /** Include listings already exported */
  all?: boolean
}

export async function runListingsCommand(
  args: ListingsCommandArgs,
  store: ListingStore,
  io: CommandIO
): Promise<number> {
  const exported = args.all ? 'all' : false
  const listings = await store.getListings({
    source: args.site,
    exported,
    limit: args.limit ?? DEFAULT_LISTINGS_LIMIT,
  })

  if (listings.length === 0) {
    io.out('No listings found.')
    return EXIT_OK
  }

  const total = await store.countListings({ source: args.site, exported: args.all ? undefined : false })
  io.out(`Showing ${listings.length} of ${total} listings:`)

  for (const listing of listings) {
    const [line1, line2] = formatMailingLabel(listing).split('\n')
    io.out('')
    io.out(`#${listing.id} ${line1}`)
    io.out(`   ${line2}`)
    io.out(`   Source: ${listing.sourceWebsite}${listing.isExported ? ' (exported)' : ''}`)
    if (listing.listingUrl) {
      io.out(`   URL: ${listing.listingUrl}`)
    }
  }

  return EXIT_OK
}

function formatSession(session: ScrapeSession): string {
  const line =
    `${session.scrapeStart.toISOString()} ${session.sourceWebsite} ${session.status}: ` +
    `found ${session.listingsFound}, new ${session.listingsNew}, ` +
    `duplicates ${session.listingsDuplicates}, errors ${session.errors}`
  return session.errorMessage ? `${line} (${session.errorMessage})` : line
}

export async function runStatsCommand(
  store: ListingStore & SessionStore,
  sources: readonly SourceConfig[],
  io: CommandIO
): Promise<number> {
  const [total, exported] = await Promise.all([store.countListings(), store.countListings({ exported: true })])

  io.out(`Total listings: ${total}`)
  io.out(`Exported: ${exported}`)
  io.out(`Pending export: ${total - exported}`)

  if (sources.length > 0) {
    io.out('')
    io.out('Listings by source:')
    for (const source of sources) {
      const count = await store.countListings({ source: source.id })
      io.out(`  ${source.enabled ? '+' : '-'} ${source.name} (${source.id}): ${count}`)
    }
  }

  io.out('')
  io.out('Recent scrape sessions:')
  const history = await store.getHistory({ limit: 5 })
  if (history.length === 0) {
    io.out('  No scrape history found.')
  }
  for (const session of history) {
    io.out(`  ${formatSession(session)}`)
  }

  return EXIT_OK
}

export interface HistoryCommandArgs {
  site?: string
  limit?: number
}

export async function runHistoryCommand(args: HistoryCommandArgs, store: SessionStore, io: CommandIO): Promise<number> {
  const history = await store.getHistory({ source: args.site, limit: args.limit })

  if (history.length === 0) {
    io.out('No scrape history found.')
    return EXIT_OK
  }
  for (const session of history) {
    io.out(formatSession(session))
  }
  return EXIT_OK
}
