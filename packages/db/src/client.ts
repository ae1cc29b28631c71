import pg, { type PoolConfig } from 'pg'

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 10)
 * - DB_POOL_MIN: Minimum idle connections (default: 0)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: doorstep)
 */
export function getPoolConfig(
  connectionString: string,
  env: NodeJS.ProcessEnv = process.env
): PoolConfig {
  return {
    connectionString,

    // === Pool Size ===
    // A harvest run is a handful of sequential writes; keep the pool small.
    max: parseIntOr(env.DB_POOL_MAX, 10),
    min: parseIntOr(env.DB_POOL_MIN, 0),

    // === Timeouts ===
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    // === Connection Recycling ===
    maxUses: 7500,
    maxLifetimeSeconds: 1800,

    // === Keep-Alive ===
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: env.DB_SERVICE_NAME || 'doorstep',
  }
}

/**
 * Creates a pg pool for the given connection string (or DATABASE_URL).
 * Callers own the pool and must `end()` it.
 */
export function createPool(connectionString = process.env.DATABASE_URL): pg.Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }

  return new pg.Pool(getPoolConfig(connectionString))
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback
}
