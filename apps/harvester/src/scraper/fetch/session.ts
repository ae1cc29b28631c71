/**
 * Run-scoped fetch sessions
 *
 * A session is opened before discovery and closed in the orchestrator's
 * finally block. Closing aborts anything still in flight. Browser-backed
 * sessions implement the same FetchSession contract.
 */

import type { Fetcher, FetchOptions, FetchResponse, FetchSession, FetchSessionFactory } from '../types.js'
import { HttpFetcher } from './http-fetcher.js'

export class HttpFetchSession implements FetchSession {
  readonly kind = 'http'
  private controller: AbortController | null = null
  private readonly fetcher: Fetcher
  private readonly options: FetchOptions

  constructor(fetcher: Fetcher = new HttpFetcher(), options: FetchOptions = {}) {
    this.fetcher = fetcher
    this.options = options
  }

  get isOpen(): boolean {
    return this.controller !== null
  }

  async open(): Promise<void> {
    if (this.controller) return
    this.controller = new AbortController()
  }

  async fetch(url: string): Promise<FetchResponse> {
    if (!this.controller) {
      throw new Error('Fetch session is not open')
    }
    return this.fetcher.fetch(url, { ...this.options, signal: this.controller.signal })
  }

  async close(): Promise<void> {
    this.controller?.abort()
    this.controller = null
  }
}

/** One fresh HTTP session per source run. */
export function createHttpSessionFactory(options: FetchOptions = {}, fetcher?: Fetcher): FetchSessionFactory {
  return () => new HttpFetchSession(fetcher ?? new HttpFetcher(options), options)
}
