// src/main/utils/network.ts
import { createLogger } from './logger'
import { delay } from './async'

const logger = createLogger('Network')

export interface RetryOptions {
  maxRetries?: number
  retryDelay?: number
  timeout?: number
}

export class RequestTimeoutError extends Error {
  constructor(url: string, timeout: number) {
    super(`Request timeout after ${timeout}ms: ${url}`)
    this.name = 'RequestTimeoutError'
  }
}

export class NetworkError extends Error {
  constructor(url: string, cause: unknown) {
    super(`Network connection failed for ${url}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
    this.name = 'NetworkError'
  }
}

/**
 * Fetch with automatic retry for network failures, timeouts and 5xx responses.
 * 4xx responses are returned to the caller untouched.
 */
export async function fetchWithRetry(
  url: string,
  options: RequestInit = {},
  retryOptions: RetryOptions = {}
): Promise<Response> {
  const {
    maxRetries = 3,
    retryDelay = 1000,
    timeout = 10000
  } = retryOptions

  let lastError: Error = new Error('Max retries exceeded')

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeout)

    try {
      const response = await fetch(url, {
        ...options,
        signal: controller.signal
      })

      if (response.status >= 500 && attempt < maxRetries) {
        logger.warn(`Server error ${response.status}, retrying (${attempt}/${maxRetries})`)
        await delay(retryDelay * attempt)
        continue
      }

      return response
    } catch (error) {
      lastError = controller.signal.aborted ? new RequestTimeoutError(url, timeout) : new NetworkError(url, error)

      if (attempt === maxRetries) {
        logger.error('Max retries exceeded:', lastError.message)
        throw lastError
      }

      logger.warn(`Network error, retrying (${attempt}/${maxRetries}):`, lastError.message)
      await delay(retryDelay * attempt)
    } finally {
      clearTimeout(timeoutId)
    }
  }

  throw lastError
}
