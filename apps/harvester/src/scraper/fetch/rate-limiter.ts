/**
 * Per-source rate limiter
 *
 * Enforces a minimum gap between consecutive requests of one source run.
 * One instance per source run; never shared, so a slow source cannot starve
 * another. Cross-source, per-domain limits are RequestThrottler's job.
 */

import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from '../utils/timing.js'

export interface SourceRateLimiterOptions {
  /** Seconds */
  minDelay: number
  /** Seconds. Ignored unless jitter is on and it exceeds minDelay */
  maxDelay?: number
  /** Draw each delay uniformly from [minDelay, maxDelay]. Default: true */
  jitter?: boolean
  sleep?: Sleep
  now?: Clock
  random?: () => number
}

export class SourceRateLimiter {
  private readonly minDelayMs: number
  private readonly maxDelayMs: number
  private readonly jitter: boolean
  private readonly sleep: Sleep
  private readonly now: Clock
  private readonly random: () => number
  private lastRequestAt = 0

  constructor(options: SourceRateLimiterOptions) {
    this.minDelayMs = Math.max(0, options.minDelay * 1000)
    this.maxDelayMs = Math.max(this.minDelayMs, (options.maxDelay ?? options.minDelay) * 1000)
    this.jitter = options.jitter ?? true
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? systemClock
    this.random = options.random ?? Math.random
  }

  /** Delay to enforce before the next request, in ms. */
  nextDelayMs(): number {
    if (!this.jitter || this.maxDelayMs === this.minDelayMs) {
      return this.minDelayMs
    }
    return this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs)
  }

  /**
   * Resolves once at least one delay has passed since the previous call,
   * then records this call as the latest request.
   */
  async wait(): Promise<void> {
    const delayMs = this.nextDelayMs()
    const elapsed = this.now() - this.lastRequestAt

    if (elapsed < delayMs) {
      await this.sleep(delayMs - elapsed)
    }

    this.lastRequestAt = this.now()
  }
}
