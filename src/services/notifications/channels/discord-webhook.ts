/**
 * Discord Webhook Channel
 *
 * Pure functions for posting news messages to a Discord webhook.
 * No state, no bot client dependency - just HTTP POST to the webhook URL.
 */

import { createHash } from 'node:crypto'
import { z } from 'zod'
import {
  DISCORD_WEBHOOK_HOSTS,
  type DeliveryResult,
  type DiscordWebhookPayload,
} from '../../../types/discord.types.js'
import { DeliveryError } from '../../../types/errors.js'
import type { NewsItem } from '../../../types/news.types.js'
import type { Logger } from '../../../utils/logger.js'
import { backoffDelay, sleep } from '../../../utils/url.js'
import {
  formatNewsMessage,
  type MessageContext,
} from '../templates/discord-message.js'

export interface DiscordWebhookDeps {
  log: Logger
  webhookUrl: string
  timeoutMs: number
  /** Base delay for server error backoff */
  retryDelayMs: number
  /** Attempts for server errors, timeouts and network failures */
  maxAttempts?: number
  /** Retries after 429 responses */
  maxRateLimitRetries?: number
  /** Longest wait honoured for one 429 */
  maxRateLimitWaitMs?: number
}

/** Longest single wait after a 429; Retry-After can ask for hours */
export const MAX_RATE_LIMIT_WAIT_MS = 60_000

const RateLimitBodySchema = z.object({
  retry_after: z.number().nonnegative(),
})

type PostOutcome =
  | { kind: 'ok'; status: number }
  | { kind: 'status'; status: number; statusText: string; retryAfterMs?: number }
  | { kind: 'timeout' }
  | { kind: 'network'; error: unknown }

/**
 * Generates a stable, anonymized fingerprint for a webhook endpoint URL.
 * Used for safe logging without exposing the actual webhook token.
 */
export function endpointFingerprint(url: string): string {
  try {
    return createHash('sha256').update(url).digest('hex').slice(0, 8)
  } catch {
    return 'unknown'
  }
}

/**
 * Checks that a URL is an https Discord webhook endpoint.
 */
export function isDiscordWebhookUrl(url: string): boolean {
  let parsedUrl: URL
  try {
    parsedUrl = new URL(url)
  } catch {
    return false
  }

  return (
    parsedUrl.protocol === 'https:' &&
    DISCORD_WEBHOOK_HOSTS.some((host) => host === parsedUrl.hostname) &&
    parsedUrl.pathname.startsWith('/api/webhooks/') &&
    (!parsedUrl.port || parsedUrl.port === '443')
  )
}

/**
 * Reads how long Discord asks us to wait, from the Retry-After header or
 * the JSON body's retry_after, both in seconds.
 */
async function readRetryAfterMs(response: Response): Promise<number | undefined> {
  const header = response.headers.get('retry-after')
  if (header !== null) {
    const seconds = Number.parseFloat(header)
    if (Number.isFinite(seconds) && seconds >= 0) {
      await response.body?.cancel()
      return seconds * 1000
    }
  }

  try {
    const parsed = RateLimitBodySchema.safeParse(await response.json())
    return parsed.success ? parsed.data.retry_after * 1000 : undefined
  } catch {
    return undefined
  }
}

async function postOnce(
  payload: DiscordWebhookPayload,
  deps: DiscordWebhookDeps,
): Promise<PostOutcome> {
  const controller = new AbortController()
  let timedOut = false
  const timeout = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, deps.timeoutMs)

  try {
    const response = await fetch(deps.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: controller.signal,
    })

    if (response.ok) {
      await response.body?.cancel()
      return { kind: 'ok', status: response.status }
    }

    if (response.status === 429) {
      return {
        kind: 'status',
        status: response.status,
        statusText: response.statusText,
        retryAfterMs: await readRetryAfterMs(response),
      }
    }

    await response.body?.cancel()
    return {
      kind: 'status',
      status: response.status,
      statusText: response.statusText,
    }
  } catch (error) {
    return timedOut ? { kind: 'timeout' } : { kind: 'network', error }
  } finally {
    clearTimeout(timeout)
  }
}

/**
 * Posts a payload to the webhook, retrying where Discord or the network
 * allow it.
 *
 * - 429: waits Retry-After (capped at `maxRateLimitWaitMs`) and retries, up
 *   to `maxRateLimitRetries` times
 * - 5xx, timeout, network error: up to `maxAttempts` attempts with backoff
 * - other 4xx: fails at once
 *
 * Never throws; failures come back as a DeliveryResult.
 */
export async function sendWebhookMessage(
  payload: DiscordWebhookPayload,
  deps: DiscordWebhookDeps,
): Promise<DeliveryResult> {
  const { log } = deps
  const maxAttempts = deps.maxAttempts ?? 3
  const maxRateLimitRetries = deps.maxRateLimitRetries ?? 5
  const maxRateLimitWaitMs = deps.maxRateLimitWaitMs ?? MAX_RATE_LIMIT_WAIT_MS
  const endpoint = endpointFingerprint(deps.webhookUrl)

  let attempts = 0
  let rateLimitRetries = 0
  let failures = 0

  for (;;) {
    attempts++
    const startedAt = Date.now()
    const outcome = await postOnce(payload, deps)
    const durationMs = Date.now() - startedAt

    if (outcome.kind === 'ok') {
      log.debug(
        { endpoint, status: outcome.status, attempts, durationMs },
        'Discord webhook request succeeded',
      )
      return { ok: true, attempts }
    }

    if (outcome.kind === 'status' && outcome.status === 429) {
      if (rateLimitRetries >= maxRateLimitRetries) {
        return {
          ok: false,
          attempts,
          error: new DeliveryError(
            `Discord rate limit persisted after ${rateLimitRetries} retries`,
            true,
            429,
          ),
        }
      }
      const waitMs = Math.min(
        outcome.retryAfterMs ??
          backoffDelay(rateLimitRetries, deps.retryDelayMs),
        maxRateLimitWaitMs,
      )
      rateLimitRetries++
      log.warn(
        { endpoint, attempt: rateLimitRetries, maxRateLimitRetries },
        `Discord rate limit hit (429), retrying after ${Math.round(waitMs)}ms`,
      )
      await sleep(waitMs)
      continue
    }

    if (outcome.kind === 'status' && outcome.status < 500) {
      return {
        ok: false,
        attempts,
        error: new DeliveryError(
          `Discord webhook rejected the message: ${outcome.status} ${outcome.statusText}`,
          false,
          outcome.status,
        ),
      }
    }

    failures++
    const error =
      outcome.kind === 'status'
        ? new DeliveryError(
            `Discord webhook server error: ${outcome.status} ${outcome.statusText}`,
            true,
            outcome.status,
          )
        : outcome.kind === 'timeout'
          ? new DeliveryError(
              `Discord webhook request timed out after ${deps.timeoutMs}ms`,
              true,
            )
          : new DeliveryError('Discord webhook request failed', true, undefined, {
              cause: outcome.error,
            })

    if (failures >= maxAttempts) {
      return { ok: false, attempts, error }
    }

    const waitMs = backoffDelay(failures - 1, deps.retryDelayMs)
    log.warn(
      { endpoint, error, attempt: failures, maxAttempts, durationMs },
      `Discord webhook request failed, retrying after ${Math.round(waitMs)}ms`,
    )
    await sleep(waitMs)
  }
}

/**
 * Formats and posts one news item.
 */
export async function deliverNewsItem(
  item: NewsItem,
  context: MessageContext,
  deps: DiscordWebhookDeps,
): Promise<DeliveryResult> {
  let payload: DiscordWebhookPayload
  try {
    payload = formatNewsMessage(item, context)
  } catch (error) {
    if (!(error instanceof DeliveryError)) throw error
    deps.log.error(
      { guid: item.guid, error },
      'Message cannot be formatted, item will be retried next run',
    )
    return { ok: false, attempts: 0, error }
  }

  const result = await sendWebhookMessage(payload, deps)

  if (result.ok) {
    deps.log.info(
      { guid: item.guid, attempts: result.attempts },
      `Delivered "${item.title}"`,
    )
  } else {
    deps.log.error(
      {
        guid: item.guid,
        endpoint: endpointFingerprint(deps.webhookUrl),
        attempts: result.attempts,
        error: result.error,
      },
      'Delivery failed, item will be retried next run',
    )
  }

  return result
}
