/**
 * Pipeline Controller
 *
 * One run: open the store, fetch, filter, diff against known guids,
 * deliver sequentially, record what was delivered.
 *
 *   init -> fetching -> filtering -> diffing -> delivering -> persisting -> done
 *
 * Config, store and fetch failures end the run as `aborted` before any
 * message is sent, leaving the store as it was. Delivery failures are per
 * item: the item stays unrecorded and is picked up by the next run.
 */

import type { RunConfig } from '../types/config.types.js'
import type { DeliveryError } from '../types/errors.js'
import { isRelayError, toError } from '../types/errors.js'
import type { NewsItem } from '../types/news.types.js'
import type { Logger } from '../utils/logger.js'
import { sleep } from '../utils/url.js'
import { fetchFeed } from './feed/feed-fetcher.js'
import { parseFeed } from './feed/feed-parser.js'
import { type FeedSource, resolveFeedSource } from './feed/google-news.js'
import { applyFilters, resolveItemLinks } from './filter/filter-engine.js'
import { NewsStore } from './news-store.service.js'
import { deliverNewsItem } from './notifications/channels/discord-webhook.js'
import { createMessageContext } from './notifications/templates/discord-message.js'

export type PipelineState =
  | 'init'
  | 'fetching'
  | 'filtering'
  | 'diffing'
  | 'delivering'
  | 'persisting'
  | 'done'
  | 'aborted'

export interface FailedDelivery {
  guid: string
  error: DeliveryError
}

export interface RunSummary {
  state: Extract<PipelineState, 'done' | 'aborted'>
  /** Items parsed from the feed */
  fetched: number
  /** Items left after filtering */
  eligible: number
  /** Eligible items not delivered by an earlier run */
  fresh: number
  /** Guids delivered and recorded, in delivery order */
  delivered: string[]
  failed: FailedDelivery[]
  /** The error that aborted the run */
  error?: Error
}

export interface PipelineDeps {
  log: Logger
  /** Run start time, defaults to the current time */
  now?: Date
}

/**
 * Keeps items whose guid is neither recorded nor repeated earlier in the
 * feed, then orders them oldest first. The sort is stable; items without a
 * date keep their feed order after the dated ones.
 */
export function selectFreshItems(
  items: NewsItem[],
  known: ReadonlySet<string>,
): NewsItem[] {
  const seen = new Set<string>()
  const fresh: NewsItem[] = []
  for (const item of items) {
    if (known.has(item.guid) || seen.has(item.guid)) continue
    seen.add(item.guid)
    fresh.push(item)
  }

  return fresh
    .map((item, index) => ({ item, index }))
    .sort((a, b) => {
      const aTime = a.item.pubDate?.getTime()
      const bTime = b.item.pubDate?.getTime()
      if (aTime === undefined && bTime === undefined) return a.index - b.index
      if (aTime === undefined) return 1
      if (bTime === undefined) return -1
      return aTime - bTime || a.index - b.index
    })
    .map(({ item }) => item)
}

/**
 * Executes one relay run. Never throws; the outcome is in the summary.
 */
export async function runPipeline(
  config: Readonly<RunConfig>,
  deps: PipelineDeps,
): Promise<RunSummary> {
  const { log } = deps
  const now = deps.now ?? new Date()

  const summary: RunSummary = {
    state: 'done',
    fetched: 0,
    eligible: 0,
    fresh: 0,
    delivered: [],
    failed: [],
  }

  let state: PipelineState = 'init'
  const enter = (next: PipelineState) => {
    log.debug({ from: state, to: next }, 'Pipeline state change')
    state = next
  }

  let store: NewsStore | undefined
  try {
    const source: FeedSource = resolveFeedSource(config.feed)
    store = await NewsStore.open(config.dbPath, {
      log,
      initialize: config.initialize,
    })
    log.info(
      {
        path: config.dbPath,
        recorded: await store.count(),
        initialize: config.initialize,
      },
      'Store opened',
    )

    enter('fetching')
    log.info({ url: source.url, mode: config.feed.mode }, 'Fetching feed')
    const xml = await fetchFeed(source.url, {
      log,
      timeoutMs: config.fetchTimeoutMs,
      retryDelayMs: config.retryDelayMs,
    })
    const items = await parseFeed(xml, { log })
    summary.fetched = items.length

    enter('filtering')
    const eligible = applyFilters(
      items,
      { dateFilter: config.dateFilter, advancedFilter: config.advancedFilter },
      { log, now },
    )
    summary.eligible = eligible.length

    enter('diffing')
    const unseen = selectFreshItems(eligible, await store.knownGuids())
    // Links are resolved for new items only; known ones are never posted
    const fresh = config.originLink
      ? await resolveItemLinks(unseen, { log, timeoutMs: config.fetchTimeoutMs })
      : unseen
    summary.fresh = fresh.length
    log.info(
      { fetched: items.length, eligible: eligible.length, fresh: fresh.length },
      fresh.length > 0
        ? `${fresh.length} new item(s) to deliver`
        : 'No new items to deliver',
    )

    enter('delivering')
    const context = createMessageContext(source, config.discord)
    const webhookDeps = {
      log,
      webhookUrl: config.discord.webhookUrl,
      timeoutMs: config.webhookTimeoutMs,
      retryDelayMs: config.retryDelayMs,
    }
    const deliveredItems: NewsItem[] = []
    for (const [index, item] of fresh.entries()) {
      if (index > 0) {
        await sleep(config.deliveryDelayMs)
      }
      const result = await deliverNewsItem(item, context, webhookDeps)
      if (result.ok) {
        deliveredItems.push(item)
      } else {
        summary.failed.push({ guid: item.guid, error: result.error })
      }
    }

    enter('persisting')
    summary.delivered = deliveredItems.map((item) => item.guid)
    await store.record(deliveredItems, source.topic)

    enter('done')
    log.info(
      {
        delivered: summary.delivered.length,
        failed: summary.failed.length,
      },
      'Run complete',
    )
  } catch (error) {
    const failedIn = state
    enter('aborted')
    summary.state = 'aborted'
    summary.error = toError(error)
    log.error(
      {
        error: summary.error,
        state: failedIn,
        code: isRelayError(error) ? error.code : undefined,
      },
      'Run aborted',
    )
  } finally {
    await store?.close()
  }

  return summary
}
