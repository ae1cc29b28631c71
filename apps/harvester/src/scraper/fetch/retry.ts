/**
 * Exponential backoff around a single fallible attempt.
 *
 * Attempts 0..maxRetries. Before attempt n+1 it sleeps backoffFactor ** n
 * seconds. Non-retryable failures propagate immediately; after the last
 * attempt the last failure propagates.
 */

import type { ILogger } from '@doorstep/logger'
import { FetchError, errorMessage } from '../errors.js'
import type { RetryPolicy } from '../types.js'
import { DEFAULT_RETRY_POLICY } from '../types.js'
import { sleep as defaultSleep, type Sleep } from '../utils/timing.js'

/**
 * Network errors and timeouts retry; HTTP errors retry only for the policy's
 * status codes. Blocked and oversized responses never retry.
 */
export function isRetryableError(error: unknown, policy: RetryPolicy = DEFAULT_RETRY_POLICY): boolean {
  if (!(error instanceof FetchError)) return false

  switch (error.kind) {
    case 'network':
    case 'timeout':
      return true
    case 'http':
      return error.statusCode !== undefined && policy.retryableStatusCodes.includes(error.statusCode)
    case 'too_large':
    case 'blocked':
      return false
  }
}

export function backoffDelayMs(attempt: number, policy: RetryPolicy): number {
  return Math.pow(policy.backoffFactor, attempt) * 1000
}

export interface WithRetryOptions {
  logger?: ILogger
  sleep?: Sleep
  /** Extra fields for retry log lines */
  context?: Record<string, unknown>
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: WithRetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep
  let lastError: unknown

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    try {
      return await operation(attempt)
    } catch (error) {
      lastError = error

      if (!isRetryableError(error, policy)) {
        throw error
      }
      if (attempt === policy.maxRetries) {
        break
      }

      const delayMs = backoffDelayMs(attempt, policy)
      options.logger?.warn('Retrying after transient failure', {
        ...options.context,
        attempt: attempt + 1,
        maxRetries: policy.maxRetries,
        delayMs,
        reason: errorMessage(error),
      })
      await sleep(delayMs)
    }
  }

  options.logger?.error('Retries exhausted', {
    ...options.context,
    attempts: policy.maxRetries + 1,
    reason: errorMessage(lastError),
  })
  throw lastError
}
