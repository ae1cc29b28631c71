import { createLogger, type ILogger } from '@doorstep/logger'

export const rootLogger: ILogger = createLogger('harvester')

/** Component loggers. Pass these down through HarvestContext; do not reach for them from core code. */
export const loggers = {
  scraper: rootLogger.child('scraper'),
  fetch: rootLogger.child('fetch'),
  store: rootLogger.child('store'),
  export: rootLogger.child('export'),
  cli: rootLogger.child('cli'),
} as const

export type ComponentLoggers = typeof loggers
