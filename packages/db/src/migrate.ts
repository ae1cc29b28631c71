/**
 * Minimal forward-only migration runner.
 *
 * Applies every `sql/NNN_*.sql` file not yet recorded in `schema_migrations`,
 * in filename order, each inside its own transaction.
 */

import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import type pg from 'pg'
import type { ILogger } from '@doorstep/logger'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export const MIGRATIONS_DIR = path.join(__dirname, '../sql')

export interface Migration {
  name: string
  sql: string
}

export function loadMigrations(dir: string = MIGRATIONS_DIR): Migration[] {
  return fs
    .readdirSync(dir)
    .filter((file) => /^\d+_.+\.sql$/.test(file))
    .sort()
    .map((file) => ({
      name: file.replace(/\.sql$/, ''),
      sql: fs.readFileSync(path.join(dir, file), 'utf-8'),
    }))
}

export interface RunMigrationsOptions {
  migrations?: Migration[]
  logger?: ILogger
}

/** Returns the names of the migrations applied by this call. */
export async function runMigrations(
  pool: Pick<pg.Pool, 'connect'>,
  options: RunMigrationsOptions = {}
): Promise<string[]> {
  const migrations = options.migrations ?? loadMigrations()
  const log = options.logger
  const client = await pool.connect()

  try {
    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )`
    )

    const result = await client.query<{ name: string }>('SELECT name FROM schema_migrations')
    const applied = new Set(result.rows.map((row) => row.name))
    const appliedNow: string[] = []

    for (const migration of migrations) {
      if (applied.has(migration.name)) continue

      await client.query('BEGIN')
      try {
        await client.query(migration.sql)
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.name])
        await client.query('COMMIT')
      } catch (error) {
        await client.query('ROLLBACK')
        log?.error('Migration failed', { migration: migration.name }, error)
        throw error
      }

      appliedNow.push(migration.name)
      log?.info('Migration applied', { migration: migration.name })
    }

    return appliedNow
  } finally {
    client.release()
  }
}
