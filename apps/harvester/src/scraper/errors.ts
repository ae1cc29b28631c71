/**
 * Harvest error taxonomy.
 *
 * Per-target errors (FetchError, ParseError) are caught by the orchestrator,
 * counted and skipped. Run-level errors (DiscoveryError, PersistenceError)
 * end the run as a failed session. Invalid addresses are not errors; they
 * are dropped during normalization.
 */

export type HarvestErrorCode =
  | 'FETCH_FAILED'
  | 'PARSE_FAILED'
  | 'DISCOVERY_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'CONFIG_INVALID'

export class HarvestError extends Error {
  readonly code: HarvestErrorCode

  constructor(code: HarvestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HarvestError'
    this.code = code
  }
}

export type FetchFailureKind = 'http' | 'timeout' | 'network' | 'too_large' | 'blocked'

export class FetchError extends HarvestError {
  readonly url: string
  readonly kind: FetchFailureKind
  readonly statusCode?: number

  constructor(
    url: string,
    kind: FetchFailureKind,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super('FETCH_FAILED', message, { cause: options.cause })
    this.name = 'FetchError'
    this.url = url
    this.kind = kind
    this.statusCode = options.statusCode
  }
}

export class ParseError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE_FAILED', message, options)
    this.name = 'ParseError'
  }
}

export class DiscoveryError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DISCOVERY_FAILED', message, options)
    this.name = 'DiscoveryError'
  }
}

export class PersistenceError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILED', message, options)
    this.name = 'PersistenceError'
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options)
    this.name = 'ConfigError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
