/**
 * Timing and URL helpers shared by the feed fetcher, link resolver and
 * webhook client.
 */

/**
 * Resolves after the given number of milliseconds. Zero or negative values
 * resolve on the next macrotask.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)))
}

/**
 * Computes an exponential backoff delay with 10% jitter.
 *
 * @param attempt The current attempt number (0-based)
 * @param baseDelayMs Base delay in milliseconds
 * @param maxDelayMs Maximum delay in milliseconds
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs = 60_000,
): number {
  const exponentialDelay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs)
  const jitter = Math.random() * 0.1 * exponentialDelay
  return exponentialDelay + jitter
}

/**
 * Returns the hostname of a URL, or undefined when it cannot be parsed.
 *
 * @example
 * ```typescript
 * safeHostname('https://news.google.com/rss?hl=en') // 'news.google.com'
 * safeHostname('not a url') // undefined
 * ```
 */
export function safeHostname(url: string): string | undefined {
  try {
    return new URL(url).hostname
  } catch {
    return undefined
  }
}

/**
 * Reads a single query parameter from a URL or a bare query string
 * ("?hl=en&gl=US" or "hl=en&gl=US").
 */
export function readQueryParam(
  urlOrQuery: string,
  name: string,
): string | undefined {
  const queryIndex = urlOrQuery.indexOf('?')
  const query =
    queryIndex >= 0 ? urlOrQuery.slice(queryIndex + 1) : urlOrQuery
  const value = new URLSearchParams(query).get(name)
  return value === null || value === '' ? undefined : value
}
