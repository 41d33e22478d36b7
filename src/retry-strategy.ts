import axios from 'axios'

import { BuildClientError } from './errors'
import { logger } from './logger'

export interface BackoffOptions {
  baseDelayMs: number
  attempt: number
  jitter?: boolean
}

export function calculateBackoff(options: BackoffOptions): number {
  const { baseDelayMs, attempt, jitter = true } = options
  const baseDelay = baseDelayMs * Math.pow(2, attempt)
  if (!jitter) {
    return baseDelay
  }
  return Math.round(baseDelay * (0.5 + Math.random() * 0.5))
}

export interface RetryOptions {
  maxRetries: number
  baseDelayMs: number
}

/** Retries idempotent daemon requests only; a build POST never goes through here. */
export class RetryStrategy {
  constructor(private readonly options: RetryOptions) {}

  shouldRetry(error: unknown): boolean {
    if (error instanceof BuildClientError) {
      return false // Caller input defect
    }
    if (!axios.isAxiosError(error) || !error.response) {
      return true // Network error, daemon not up yet
    }
    const status = error.response.status
    if (status === 408 || status === 429) {
      return true
    }
    return status >= 500
  }

  async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    const { maxRetries, baseDelayMs } = this.options
    let lastError: unknown
    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        return await fn()
      } catch (error) {
        lastError = error
        if (!this.shouldRetry(error)) {
          throw error
        }
        if (attempt < maxRetries - 1) {
          const delay = calculateBackoff({ baseDelayMs, attempt })
          logger.debug(`Daemon request failed (attempt ${attempt + 1}/${maxRetries}), retrying in ${delay}ms`)
          await new Promise((resolve) => setTimeout(resolve, delay))
        }
      }
    }
    throw lastError
  }
}
