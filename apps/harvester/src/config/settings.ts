/**
 * Process settings
 *
 * Read once from the environment (after env.ts has loaded .env.local) and
 * passed down through HarvestContext. Delays are seconds, as configured.
 */

import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { ConfigError } from '../scraper/errors.js'
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../scraper/types.js'

/** apps/harvester */
export const APP_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

export const DEFAULT_SITES_CONFIG = resolve(APP_ROOT, 'config', 'sites.json')

export type StoreKind = 'pg' | 'memory'

export interface HarvestSettings {
  store: StoreKind
  databaseUrl: string | undefined
  exportDir: string
  sitesConfigPath: string
  /** Seconds; per-source default */
  minRequestDelay: number
  /** Seconds; per-source default */
  maxRequestDelay: number
  requestTimeoutMs: number
  maxRetries: number
  retryBackoff: number
  maxRequestsPerMinute: number
  sourceConcurrency: number
}

/** Unset and empty variables both fall back to the default. */
function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema)
}

const envSchema = z
  .object({
    STORE: fromEnv(z.enum(['pg', 'memory']).default('pg')),
    DATABASE_URL: fromEnv(z.string().optional()),
    EXPORT_DIR: fromEnv(z.string().default('exports')),
    SITES_CONFIG: fromEnv(z.string().optional()),
    MIN_REQUEST_DELAY: fromEnv(z.coerce.number().nonnegative().default(1.0)),
    MAX_REQUEST_DELAY: fromEnv(z.coerce.number().nonnegative().default(5.0)),
    REQUEST_TIMEOUT: fromEnv(z.coerce.number().positive().default(10)),
    MAX_RETRIES: fromEnv(z.coerce.number().int().nonnegative().default(3)),
    RETRY_BACKOFF: fromEnv(z.coerce.number().positive().default(2.0)),
    MAX_REQUESTS_PER_MINUTE: fromEnv(z.coerce.number().int().positive().default(60)),
    SOURCE_CONCURRENCY: fromEnv(z.coerce.number().int().positive().default(1)),
  })
  .refine((env) => env.MIN_REQUEST_DELAY <= env.MAX_REQUEST_DELAY, {
    message: 'MIN_REQUEST_DELAY must not exceed MAX_REQUEST_DELAY',
    path: ['MIN_REQUEST_DELAY'],
  })
  .refine((env) => env.STORE !== 'pg' || env.DATABASE_URL !== undefined, {
    message: 'DATABASE_URL is required when STORE=pg',
    path: ['DATABASE_URL'],
  })

/**
 * Relative EXPORT_DIR and SITES_CONFIG resolve against `baseDir`, the app
 * directory that holds .env.local, not the process working directory.
 *
 * @throws ConfigError naming every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env, baseDir: string = APP_ROOT): HarvestSettings {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`)
  }

  const values = parsed.data
  return {
    store: values.STORE,
    databaseUrl: values.DATABASE_URL,
    exportDir: resolve(baseDir, values.EXPORT_DIR),
    sitesConfigPath: values.SITES_CONFIG ? resolve(baseDir, values.SITES_CONFIG) : DEFAULT_SITES_CONFIG,
    minRequestDelay: values.MIN_REQUEST_DELAY,
    maxRequestDelay: values.MAX_REQUEST_DELAY,
    requestTimeoutMs: Math.round(values.REQUEST_TIMEOUT * 1000),
    maxRetries: values.MAX_RETRIES,
    retryBackoff: values.RETRY_BACKOFF,
    maxRequestsPerMinute: values.MAX_REQUESTS_PER_MINUTE,
    sourceConcurrency: values.SOURCE_CONCURRENCY,
  }
}

export function retryPolicyOf(settings: HarvestSettings): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    maxRetries: settings.maxRetries,
    backoffFactor: settings.retryBackoff,
  }
}
