/**
 * HTTP Fetcher
 *
 * Native fetch with a per-request timeout, a body size limit and an honest
 * User-Agent. One attempt per call; every failure surfaces as a FetchError
 * so withRetry can classify it.
 */

import { createHash } from 'crypto'
import { FetchError } from '../errors.js'
import type { Fetcher, FetchOptions, FetchResponse } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS } from '../types.js'

export class HttpFetcher implements Fetcher {
  private readonly defaults: FetchOptions

  constructor(defaults: FetchOptions = {}) {
    this.defaults = defaults
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResponse> {
    const startTime = Date.now()
    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    const maxSizeBytes =
      options.maxSizeBytes ?? this.defaults.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
    const headers = {
      ...DEFAULT_FETCH_HEADERS,
      ...(this.defaults.headers ?? {}),
      ...(options.headers ?? {}),
    }

    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)

    const outerSignal = options.signal ?? this.defaults.signal
    const onOuterAbort = () => controller.abort()
    outerSignal?.addEventListener('abort', onOuterAbort, { once: true })

    try {
      let response: Response
      try {
        response = await fetch(url, {
          method: 'GET',
          headers,
          signal: controller.signal,
          redirect: 'follow',
        })
      } catch (error) {
        if (timedOut) {
          throw new FetchError(url, 'timeout', `Request timed out after ${timeoutMs}ms`, { cause: error })
        }
        const message = error instanceof Error ? error.message : String(error)
        throw new FetchError(url, 'network', `Network error: ${message}`, { cause: error })
      }

      // 403 with captcha markers: report, never try to get around it.
      // A 503 stays an http error so the retry policy applies.
      if (response.status === 403) {
        const text = await response.text()
        if (this.looksLikeBlockedPage(text)) {
          throw new FetchError(url, 'blocked', 'Request blocked (captcha or access denied)', {
            statusCode: response.status,
          })
        }
      }

      if (!response.ok) {
        throw new FetchError(url, 'http', `HTTP ${response.status}: ${response.statusText}`, {
          statusCode: response.status,
        })
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        throw new FetchError(url, 'too_large', `Response too large: ${contentLength} bytes`, {
          statusCode: response.status,
        })
      }

      const body = await this.readBodyWithLimit(response, maxSizeBytes)
      if (body === null) {
        throw new FetchError(url, 'too_large', 'Response exceeded size limit', {
          statusCode: response.status,
        })
      }

      return {
        url: response.url || url,
        statusCode: response.status,
        body,
        contentHash: createHash('sha256').update(body).digest('hex').slice(0, 32),
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof FetchError) throw error
      if (timedOut) {
        throw new FetchError(url, 'timeout', `Request timed out after ${timeoutMs}ms`, { cause: error })
      }
      const message = error instanceof Error ? error.message : String(error)
      throw new FetchError(url, 'network', `Failed reading response: ${message}`, { cause: error })
    } finally {
      clearTimeout(timeoutId)
      outerSignal?.removeEventListener('abort', onOuterAbort)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  /**
   * Heuristic check for captcha/access-denied pages.
   */
  private looksLikeBlockedPage(html: string): boolean {
    const lowerHtml = html.toLowerCase()
    const blockIndicators = [
      'captcha',
      'challenge-form',
      'cf-browser-verification',
      'please verify you are a human',
      'access denied',
      'bot detection',
    ]

    return blockIndicators.some((indicator) => lowerHtml.includes(indicator))
  }
}
