/**
 * Sliding-window request throttler
 *
 * Caps requests per registrable domain over a trailing 60 second window.
 * Shared across source runs in one process, on top of each source's
 * SourceRateLimiter.
 */

import { systemClock, type Clock } from '../utils/timing.js'

export interface RequestThrottlerOptions {
  maxRequestsPerMinute: number
  /** Window length in ms. Default: 60000 */
  windowMs?: number
  now?: Clock
}

export class RequestThrottler {
  private readonly requests = new Map<string, number[]>()
  private readonly maxRequests: number
  private readonly windowMs: number
  private readonly now: Clock

  constructor(options: RequestThrottlerOptions) {
    this.maxRequests = Math.max(1, Math.floor(options.maxRequestsPerMinute))
    this.windowMs = options.windowMs ?? 60_000
    this.now = options.now ?? systemClock
  }

  /** True once the domain has used its full budget for the current window. */
  shouldThrottle(domain: string): boolean {
    return this.prune(domain).length >= this.maxRequests
  }

  recordRequest(domain: string): void {
    const times = this.prune(domain)
    times.push(this.now())
    this.requests.set(domain, times)
  }

  /**
   * Check and record in one step: false when the domain is at its cap,
   * otherwise the request is counted. Concurrent runs must use this rather
   * than shouldThrottle followed by recordRequest across an await.
   */
  tryAcquire(domain: string): boolean {
    if (this.shouldThrottle(domain)) return false
    this.recordRequest(domain)
    return true
  }

  /** Seconds until the oldest request in the window expires; 0 when under the cap. */
  getWaitTime(domain: string): number {
    const times = this.prune(domain)
    if (times.length < this.maxRequests) return 0

    const waitMs = times[0] + this.windowMs - this.now()
    return Math.max(0, waitMs) / 1000
  }

  reset(domain?: string): void {
    if (domain === undefined) {
      this.requests.clear()
    } else {
      this.requests.delete(domain)
    }
  }

  private prune(domain: string): number[] {
    const cutoff = this.now() - this.windowMs
    const times = (this.requests.get(domain) ?? []).filter((t) => t > cutoff)
    if (times.length === 0) {
      this.requests.delete(domain)
    } else {
      this.requests.set(domain, times)
    }
    return times
  }
}
