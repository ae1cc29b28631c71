/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/harvester/.env.local in development only; production injects
 * variables directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'

const here = dirname(fileURLToPath(import.meta.url))

if (process.env.NODE_ENV !== 'production') {
  config({ path: resolve(here, '..', '.env.local') })
}
