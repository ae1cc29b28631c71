export { createPool, getPoolConfig } from './client.js'
export { loadMigrations, runMigrations, MIGRATIONS_DIR, type Migration, type RunMigrationsOptions } from './migrate.js'
