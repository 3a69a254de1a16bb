import { setTimeout as delay } from 'node:timers/promises'
import { ProviderHooks } from './types'

export interface RetryOptions {
  retries: number
  baseDelayMs: number
  factor?: number
  maxDelayMs?: number
  jitter?: boolean
  /** Only errors accepted here are retried; everything else is rethrown at once. */
  shouldRetry?: (err: unknown) => boolean
}

export class CircuitOpenError extends Error {
  constructor(readonly until: number) {
    super('circuit_open')
    this.name = 'CircuitOpenError'
  }
}

export class RateLimitedError extends Error {
  constructor(readonly provider: string, readonly retryAfter?: string) {
    super(`${provider.toLowerCase()}_rate_limited`)
    this.name = 'RateLimitedError'
  }
}

export const isRateLimited = (err: unknown) => err instanceof RateLimitedError

export class CircuitBreaker {
  private failureCount = 0
  private openUntil = 0

  constructor(private readonly failureThreshold = 5, private readonly cooldownMs = 15000) {}

  get isOpen() {
    return this.openUntil > Date.now()
  }

  async exec<T>(fn: () => Promise<T>, hooks?: ProviderHooks): Promise<T> {
    const now = Date.now()
    if (this.openUntil > now) {
      hooks?.logger?.warn('[circuit-breaker] short-circuiting call')
      throw new CircuitOpenError(this.openUntil)
    }
    try {
      const result = await fn()
      this.failureCount = 0
      return result
    } catch (err) {
      this.failureCount += 1
      hooks?.logger?.warn('[circuit-breaker] failure count', this.failureCount)
      if (this.failureCount >= this.failureThreshold) {
        this.openUntil = now + this.cooldownMs
        hooks?.onTrace?.({ name: 'circuit_open', meta: { until: this.openUntil } })
      }
      throw err
    }
  }
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions, hooks?: ProviderHooks): Promise<T> {
  const { retries, baseDelayMs, factor = 2, jitter = true, maxDelayMs = 5000, shouldRetry = () => true } = options
  let attempt = 0
  while (true) {
    try {
      return await fn()
    } catch (err) {
      if (attempt >= retries || !shouldRetry(err)) throw err
      const expo = baseDelayMs * Math.pow(factor, attempt)
      const sleep = Math.min(maxDelayMs, jitter ? expo * (0.5 + Math.random()) : expo)
      hooks?.logger?.warn('[retry] transient failure', { attempt, sleep, error: err instanceof Error ? err.message : String(err) })
      hooks?.onTrace?.({ name: 'retry_backoff', meta: { attempt, sleep } })
      await delay(sleep)
      attempt += 1
    }
  }
}
