import { describe, it, expect, vi } from 'vitest'
import { SourceRateLimiter } from '../fetch/rate-limiter.js'

describe('SourceRateLimiter', () => {
  it('does not wait on the first call', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const limiter = new SourceRateLimiter({ minDelay: 1, jitter: false, sleep, now: () => 5_000 })

    await limiter.wait()

    expect(sleep).not.toHaveBeenCalled()
  })

  it('sleeps for the remainder of the delay since the previous call', async () => {
    let now = 10_000
    const sleep = vi.fn(async (ms: number) => {
      now += ms
    })
    const limiter = new SourceRateLimiter({ minDelay: 1, maxDelay: 3, jitter: false, sleep, now: () => now })

    await limiter.wait()
    now += 400
    await limiter.wait()

    expect(sleep).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(600)
  })

  it('draws jittered delays from [minDelay, maxDelay]', () => {
    const low = new SourceRateLimiter({ minDelay: 1, maxDelay: 3, random: () => 0 })
    const mid = new SourceRateLimiter({ minDelay: 1, maxDelay: 3, random: () => 0.5 })

    expect(low.nextDelayMs()).toBe(1000)
    expect(mid.nextDelayMs()).toBe(2000)
  })

  it('uses minDelay when maxDelay is below it', () => {
    const limiter = new SourceRateLimiter({ minDelay: 2, maxDelay: 1, random: () => 0.9 })
    expect(limiter.nextDelayMs()).toBe(2000)
  })

  it('spaces two back-to-back calls by at least minDelay on real timers', async () => {
    const limiter = new SourceRateLimiter({ minDelay: 0.1, jitter: false })

    const start = performance.now()
    await limiter.wait()
    await limiter.wait()
    const elapsed = performance.now() - start

    expect(elapsed).toBeGreaterThanOrEqual(95)
  })
})
