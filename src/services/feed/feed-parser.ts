/**
 * Feed Parser
 *
 * Turns an RSS or Atom document into NewsItems in document order.
 * Google News descriptions are HTML lists of related coverage; those are
 * unpacked into `related` and `fullCoverageLink`.
 */

import * as cheerio from 'cheerio'
import Parser from 'rss-parser'
import { z } from 'zod'
import { FetchError } from '../../types/errors.js'
import type { NewsItem, RelatedArticle } from '../../types/news.types.js'
import type { Logger } from '../../utils/logger.js'

interface GoogleNewsItemFields {
  source?: unknown
  description?: unknown
  id?: unknown
}

const parser = new Parser<Record<string, unknown>, GoogleNewsItemFields>({
  customFields: {
    item: ['source', 'description'],
  },
})

/** <source url="...">Name</source>, or a bare name when it has no attributes */
const SourceFieldSchema = z.union([
  z.string(),
  z.object({ _: z.string().optional() }),
])

const FULL_COVERAGE_LABELS = [
  'View Full Coverage on Google News',
  'Google 뉴스에서 전체 콘텐츠 보기',
]

const PRESS_SELECTOR = 'font[color="#6f6f6f"]'

export interface FeedParserDeps {
  log: Logger
}

/**
 * Replaces characters that would break Discord markdown links with
 * full-width look-alikes, padding them with a space where they touch text.
 *
 * @example
 * ```typescript
 * replaceBrackets('Market[Live] <Update>') // 'Market ［Live］ 〈Update〉'
 * ```
 */
export function replaceBrackets(text: string): string {
  return text
    .replace(/\[/g, '［')
    .replace(/]/g, '］')
    .replace(/</g, '〈')
    .replace(/>/g, '〉')
    .replace(/(?<!\s)(?<!^)［/g, ' ［')
    .replace(/］(?!\s)/g, '］ ')
    .replace(/(?<!\s)(?<!^)〈/g, ' 〈')
    .replace(/〉(?!\s)/g, '〉 ')
    .trim()
}

/**
 * Extracts the related-coverage list Google News puts in an item description.
 */
export function parseDescription(html: string): {
  related: RelatedArticle[]
  fullCoverageLink?: string
} {
  const $ = cheerio.load(html)
  const related: RelatedArticle[] = []
  let fullCoverageLink: string | undefined

  for (const element of $('li').toArray()) {
    const $item = $(element)
    const $anchor = $item.find('a').first()
    const href = $anchor.attr('href')
    if (!href) continue

    const text = $item.text()
    if (FULL_COVERAGE_LABELS.some((label) => text.includes(label))) {
      fullCoverageLink = href
      continue
    }

    related.push({
      title: replaceBrackets($anchor.text().trim()),
      link: href,
      press: $item.find(PRESS_SELECTOR).first().text().trim(),
    })
  }

  return fullCoverageLink ? { related, fullCoverageLink } : { related }
}

function parseSource(value: unknown): { source?: string } {
  if (value === undefined) return {}
  const parsed = SourceFieldSchema.safeParse(value)
  if (!parsed.success) return {}
  const source = (
    typeof parsed.data === 'string' ? parsed.data : (parsed.data._ ?? '')
  ).trim()
  return source ? { source } : {}
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? null : date
}

function nonEmpty(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

/**
 * Parses a feed document.
 *
 * @throws FetchError('parse') when the document is not a readable feed
 */
export async function parseFeed(
  xml: string,
  deps: FeedParserDeps,
): Promise<NewsItem[]> {
  const { log } = deps

  let feed: Awaited<ReturnType<typeof parser.parseString>>
  try {
    feed = await parser.parseString(xml)
  } catch (error) {
    throw new FetchError(
      `Feed document could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
      'parse',
      undefined,
      { cause: error },
    )
  }

  const items: NewsItem[] = []
  for (const [index, entry] of feed.items.entries()) {
    const link = nonEmpty(entry.link)
    const guid = nonEmpty(entry.guid) ?? nonEmpty(entry.id) ?? link
    if (!guid) {
      log.warn(
        { index, title: entry.title },
        'Skipping feed entry without guid or link',
      )
      continue
    }

    const description = nonEmpty(entry.description) ?? nonEmpty(entry.content)
    const { related, fullCoverageLink } = description
      ? parseDescription(description)
      : { related: [], fullCoverageLink: undefined }

    items.push({
      guid,
      title: replaceBrackets(entry.title?.trim() ?? ''),
      link: link ?? guid,
      pubDate: parseDate(entry.pubDate ?? entry.isoDate),
      ...parseSource(entry.source),
      related,
      ...(fullCoverageLink ? { fullCoverageLink } : {}),
    })
  }

  log.debug(
    { title: feed.title, entries: feed.items.length, kept: items.length },
    'Feed parsed',
  )

  return items
}
