import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { HttpFetchSession, createHttpSessionFactory } from '../fetch/session.js'
import { FetchError } from '../errors.js'
import { isRetryableError } from '../fetch/retry.js'
import { DEFAULT_FETCH_HEADERS } from '../types.js'
import type { SourceConfig } from '../types.js'

describe('HttpFetcher', () => {
  const originalFetch = globalThis.fetch

  beforeEach(() => {
    vi.restoreAllMocks()
  })

  afterEach(() => {
    globalThis.fetch = originalFetch
  })

  it('returns the body, status and content hash on success', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('<html>ok</html>', { status: 200 }))
    globalThis.fetch = fetchSpy

    const result = await new HttpFetcher().fetch('https://example.com/homes/1')

    expect(result.statusCode).toBe(200)
    expect(result.body).toBe('<html>ok</html>')
    expect(result.url).toBe('https://example.com/homes/1')
    expect(result.contentHash).toHaveLength(32)
  })

  it('sends the bot user agent', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }))
    globalThis.fetch = fetchSpy

    await new HttpFetcher().fetch('https://example.com/')

    const init = fetchSpy.mock.calls[0][1]
    expect(init.headers['User-Agent']).toBe(DEFAULT_FETCH_HEADERS['User-Agent'])
  })

  it('throws an http FetchError carrying the status code', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('nope', { status: 404, statusText: 'Not Found' }))

    const error = await new HttpFetcher().fetch('https://example.com/missing').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(FetchError)
    expect(error).toMatchObject({ kind: 'http', statusCode: 404, message: 'HTTP 404: Not Found' })
  })

  it('classifies captcha pages as blocked', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('<div class="g-recaptcha">Please verify you are a human</div>', { status: 403 })
    )

    await expect(new HttpFetcher().fetch('https://example.com/')).rejects.toMatchObject({
      kind: 'blocked',
      statusCode: 403,
    })
  })

  it('leaves a 503 with captcha markers retryable', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('<div class="g-recaptcha">Access denied</div>', { status: 503 })
    )

    const error = await new HttpFetcher().fetch('https://example.com/').catch((e: unknown) => e)

    expect(error).toMatchObject({ kind: 'http', statusCode: 503 })
    expect(isRetryableError(error)).toBe(true)
  })

  it('wraps network failures', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'))

    await expect(new HttpFetcher().fetch('https://example.com/')).rejects.toMatchObject({
      kind: 'network',
      message: 'Network error: fetch failed',
    })
  })

  it('times out slow responses', async () => {
    globalThis.fetch = vi.fn().mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => {
            reject(new DOMException('The operation was aborted.', 'AbortError'))
          })
        })
    )

    await expect(new HttpFetcher({ timeoutMs: 20 }).fetch('https://example.com/')).rejects.toMatchObject({
      kind: 'timeout',
      message: 'Request timed out after 20ms',
    })
  })

  it('rejects bodies over the size limit', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('x'.repeat(64), { status: 200 }))

    await expect(new HttpFetcher({ maxSizeBytes: 16 }).fetch('https://example.com/')).rejects.toMatchObject({
      kind: 'too_large',
    })
  })
})

describe('HttpFetchSession', () => {
  const source: SourceConfig = {
    id: 'example',
    name: 'Example',
    extractor: 'landing_pages',
    enabled: true,
    minDelay: 0,
    maxDelay: 0,
    maxListings: 10,
    allowedStates: [],
    discovery: {},
  }

  it('refuses to fetch before open and after close', async () => {
    const fetcher = { fetch: vi.fn() }
    const session = new HttpFetchSession(fetcher)

    await expect(session.fetch('https://example.com/')).rejects.toThrow('Fetch session is not open')

    await session.open()
    expect(session.isOpen).toBe(true)
    await session.close()
    expect(session.isOpen).toBe(false)
    await expect(session.fetch('https://example.com/')).rejects.toThrow('Fetch session is not open')
    expect(fetcher.fetch).not.toHaveBeenCalled()
  })

  it('passes an abort signal that fires on close', async () => {
    const fetcher = {
      fetch: vi.fn().mockResolvedValue({
        url: 'https://example.com/',
        statusCode: 200,
        body: '',
        contentHash: '',
        durationMs: 1,
      }),
    }
    const session = createHttpSessionFactory({ timeoutMs: 500 }, fetcher)(source)

    await session.open()
    await session.fetch('https://example.com/')
    const options = fetcher.fetch.mock.calls[0][1]
    expect(options.timeoutMs).toBe(500)
    expect(options.signal.aborted).toBe(false)

    await session.close()
    expect(options.signal.aborted).toBe(true)
  })
})
