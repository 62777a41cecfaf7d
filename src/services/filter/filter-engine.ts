import type { FilterSettings } from '../../types/filter.types.js'
import type { NewsItem } from '../../types/news.types.js'
import type { Logger } from '../../utils/logger.js'
import {
  filterableText,
  matchesAdvancedFilter,
} from './advanced-filter.js'
import { isWithinDateRange } from './date-filter.js'
import { resolveOriginalUrl } from './link-resolver.js'

export interface FilterEngineDeps {
  log: Logger
  /** Run start time; date windows are measured from it */
  now: Date
  /** Timeout for link lookups */
  timeoutMs: number
}

/**
 * Applies the date filter, then the advanced filter. Input order is kept.
 */
export function applyFilters(
  items: NewsItem[],
  settings: Pick<FilterSettings, 'dateFilter' | 'advancedFilter'>,
  deps: Pick<FilterEngineDeps, 'log' | 'now'>,
): NewsItem[] {
  const { log, now } = deps
  const { dateFilter, advancedFilter } = settings

  const kept = items.filter((item) => {
    if (dateFilter && !isWithinDateRange(dateFilter, item.pubDate, now)) {
      log.debug(
        { guid: item.guid, pubDate: item.pubDate?.toISOString() ?? null },
        'Item excluded by date filter',
      )
      return false
    }
    if (
      advancedFilter &&
      !matchesAdvancedFilter(advancedFilter, filterableText(item))
    ) {
      log.debug({ guid: item.guid }, 'Item excluded by advanced filter')
      return false
    }
    return true
  })

  log.info(
    {
      total: items.length,
      kept: kept.length,
      dateFilter: dateFilter?.expression,
      advancedFilter: advancedFilter?.expression,
    },
    'Filters applied',
  )

  return kept
}

/**
 * Replaces aggregator links, including related article links, with
 * publisher links. Items are never dropped; unresolved links stay as they
 * were. Lookups run one after another.
 */
export async function resolveItemLinks(
  items: NewsItem[],
  deps: Pick<FilterEngineDeps, 'log' | 'timeoutMs'>,
): Promise<NewsItem[]> {
  const resolverDeps = { log: deps.log, timeoutMs: deps.timeoutMs }
  const resolved: NewsItem[] = []

  for (const item of items) {
    const link = await resolveOriginalUrl(item.link, resolverDeps)
    const related = []
    for (const article of item.related) {
      related.push({
        ...article,
        link: await resolveOriginalUrl(article.link, resolverDeps),
      })
    }
    resolved.push({ ...item, link, related })
  }

  return resolved
}

/**
 * Full filter pass: date filter, advanced filter, then link resolution
 * when `originLink` is on.
 */
export async function filterItems(
  items: NewsItem[],
  settings: FilterSettings,
  deps: FilterEngineDeps,
): Promise<NewsItem[]> {
  const kept = applyFilters(items, settings, deps)
  return settings.originLink ? resolveItemLinks(kept, deps) : kept
}
