/**
 * Structured logging helpers for harvest workflows.
 *
 * Adds a common envelope (workflow, stage, runId, sourceId, ...) to every entry
 * and provides URL redaction. Do not log page bodies or full URLs with query strings.
 */

import { createHash } from 'crypto'
import type { ILogger, LogContext } from '@doorstep/logger'

export type WorkflowLogContext = {
  workflow: string
  stage: string
  runId?: string
  sourceId?: string
  extractorId?: string
  targetId?: string
  attempt?: number
  [key: string]: unknown
}

export function createWorkflowLogger(base: ILogger, context: WorkflowLogContext): ILogger {
  return withEnvelope(base, compact(context))
}

function withEnvelope(base: ILogger, envelope: LogContext): ILogger {
  const payload = (event: string, meta?: LogContext): LogContext => ({
    event_name: event,
    ...envelope,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, payload(event, meta)),
    info: (event, meta) => base.info(event, payload(event, meta)),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    fatal: (event, meta, err) => base.fatal(event, payload(event, meta), err),
    child: (componentOrContext, defaultContext) => {
      if (typeof componentOrContext === 'string') {
        return withEnvelope(base.child(componentOrContext), {
          ...envelope,
          ...compact(defaultContext ?? {}),
        })
      }
      return withEnvelope(base, { ...envelope, ...compact(componentOrContext) })
    },
  }
}

/** Host and path only; query strings can carry session tokens. */
export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

function compact(value: LogContext): LogContext {
  const next: LogContext = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
