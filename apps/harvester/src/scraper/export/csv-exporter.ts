/**
 * CSV export of persisted listings
 *
 * Read-only: exporting never flips the exported flag. Operators mark rows
 * with markExported once the file has been delivered.
 */

import { mkdir, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@doorstep/logger'
import type { Listing } from '../types.js'
import type { ListingStore } from '../store/types.js'

export const EXPORT_COLUMNS = [
  'id',
  'street',
  'city',
  'state',
  'zip_code',
  'listing_url',
  'source_website',
  'scraped_at',
] as const

export type ExportColumn = (typeof EXPORT_COLUMNS)[number]

export interface ExportOptions {
  source?: string
  /** true: rows already marked exported; false (default): rows not yet exported */
  exportedOnly?: boolean
  logger?: ILogger
}

function toRecord(listing: Listing): Record<ExportColumn, string | number> {
  return {
    id: listing.id,
    street: listing.street,
    city: listing.city,
    state: listing.state,
    zip_code: listing.zipCode,
    listing_url: listing.listingUrl ?? '',
    source_website: listing.sourceWebsite,
    scraped_at: listing.scrapedAt.toISOString(),
  }
}

/** UTF-8, comma-delimited, header row first. */
export function renderListingsCsv(listings: readonly Listing[]): string {
  return stringify(listings.map(toRecord), {
    header: true,
    columns: [...EXPORT_COLUMNS],
  })
}

/**
 * Write matching listings to outputPath. Returns the number of data rows;
 * writes nothing and warns when there are none.
 */
export async function exportListings(
  store: ListingStore,
  outputPath: string,
  options: ExportOptions = {}
): Promise<number> {
  const listings = await store.getListings({
    source: options.source,
    exported: options.exportedOnly ?? false,
  })

  if (listings.length === 0) {
    options.logger?.warn('No listings to export', {
      source: options.source,
      exportedOnly: options.exportedOnly ?? false,
    })
    return 0
  }

  await mkdir(dirname(outputPath), { recursive: true })
  await writeFile(outputPath, renderListingsCsv(listings), 'utf-8')

  options.logger?.info('Exported listings', { count: listings.length, outputPath })
  return listings.length
}

/** listings_YYYYMMDD_HHMMSS.csv in local time */
export function defaultExportFilename(at: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`
  return `listings_${date}_${time}.csv`
}
