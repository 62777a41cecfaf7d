/**
 * Feed Fetcher
 *
 * Retrieves the raw feed document. Server errors, timeouts and transport
 * failures are retried; client errors fail at once.
 */

import { FetchError } from '../../types/errors.js'
import type { Logger } from '../../utils/logger.js'
import { safeHostname, sleep } from '../../utils/url.js'

const USER_AGENT =
  'Mozilla/5.0 (compatible; headline-relay/1.0; +https://news.google.com/rss)'

export interface FeedFetcherDeps {
  log: Logger
  timeoutMs: number
  /** Delay between attempts */
  retryDelayMs: number
  maxAttempts?: number
}

async function fetchOnce(url: string, timeoutMs: number): Promise<string> {
  const controller = new AbortController()
  let timedOut = false
  const timeout = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8',
        'User-Agent': USER_AGENT,
      },
      signal: controller.signal,
    })

    if (!response.ok) {
      await response.body?.cancel()
      throw new FetchError(
        `Feed request failed: ${response.status} ${response.statusText}`,
        'http_status',
        response.status,
      )
    }

    return await response.text()
  } catch (error) {
    if (error instanceof FetchError) {
      throw error
    }
    if (timedOut) {
      throw new FetchError(
        `Feed request timed out after ${timeoutMs}ms`,
        'timeout',
        undefined,
        { cause: error },
      )
    }
    throw new FetchError(
      `Feed request failed: ${error instanceof Error ? error.message : String(error)}`,
      'network',
      undefined,
      { cause: error },
    )
  } finally {
    clearTimeout(timeout)
  }
}

function isRetryable(error: FetchError): boolean {
  if (error.kind === 'http_status') {
    return error.status !== undefined && error.status >= 500
  }
  return error.kind === 'timeout' || error.kind === 'network'
}

/**
 * Downloads the feed document.
 *
 * @returns The response body as text
 * @throws FetchError once all attempts are used or on a non-retryable status
 */
export async function fetchFeed(
  url: string,
  deps: FeedFetcherDeps,
): Promise<string> {
  const { log } = deps
  const maxAttempts = deps.maxAttempts ?? 3
  const host = safeHostname(url)

  for (let attempt = 1; ; attempt++) {
    const startedAt = Date.now()
    try {
      const body = await fetchOnce(url, deps.timeoutMs)
      log.debug(
        { host, attempt, bytes: body.length, durationMs: Date.now() - startedAt },
        'Feed downloaded',
      )
      return body
    } catch (error) {
      if (
        !(error instanceof FetchError) ||
        !isRetryable(error) ||
        attempt >= maxAttempts
      ) {
        throw error
      }
      log.warn(
        { host, attempt, maxAttempts, kind: error.kind, status: error.status },
        `Feed request failed, retrying in ${deps.retryDelayMs}ms`,
      )
      await sleep(deps.retryDelayMs)
    }
  }
}
